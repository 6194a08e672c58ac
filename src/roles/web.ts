/**
 * Web front end: gunicorn for Flask apps, `streamlit run` for Streamlit.
 */

import path from 'node:path';
import { ConfigError } from '../errors.js';
import type { Descriptor, WebConfig } from './schema.js';
import {
  checkDependencies,
  checkPortFree,
  launchEnv,
  readDescriptor,
  type RoleContract,
} from './common.js';

export interface Command {
  command: string;
  args: string[];
}

export function webCommand(config: WebConfig, descriptor: Descriptor, appDir: string): Command {
  const server = descriptor.web_server.toLowerCase();
  if (server === 'flask') {
    return {
      command: 'gunicorn',
      args: ['-b', `0.0.0.0:${config.port}`, '-w', String(config.workers), descriptor.app_module],
    };
  }
  if (server === 'streamlit') {
    return {
      command: 'streamlit',
      args: ['run', path.join(appDir, descriptor.app_file), '--server.port', String(config.port)],
    };
  }
  throw new ConfigError('E_CONFIG_INVALID', `unsupported web_server "${descriptor.web_server}" (expected flask or streamlit)`);
}

export const webRole: RoleContract<WebConfig> = {
  async validate(config, ctx) {
    webCommand(config, await readDescriptor(ctx.appDir), ctx.appDir);
    await checkDependencies(config.dependencies, ctx);
    await checkPortFree(config.port, ctx);
  },

  async start(config, ctx) {
    const descriptor = await readDescriptor(ctx.appDir);
    const { command, args } = webCommand(config, descriptor, ctx.appDir);
    const instance = await ctx.supervisor.start('web', {
      kind: 'process',
      command,
      args,
      cwd: ctx.appDir,
      env: launchEnv(config.environment),
    });
    return {
      instance,
      runtime: null,
      details: [`Web server (${descriptor.web_server}) started on port ${config.port}`],
    };
  },

  async stop() {
    // Nothing beyond the supervised process
  },

  describe(config) {
    return [`Port: ${config.port}`];
  },
};
