/**
 * Inference API: uvicorn for FastAPI modules, gunicorn otherwise. The
 * process finds its model through MODEL_PATH.
 */

import path from 'node:path';
import type { ApiConfig, Descriptor } from './schema.js';
import {
  checkDependencies,
  checkPortFree,
  launchEnv,
  readDescriptor,
  type RoleContract,
} from './common.js';
import type { Command } from './web.js';

export function apiCommand(config: ApiConfig, descriptor: Descriptor): Command {
  const appModule = descriptor.api_module;
  if (appModule.toLowerCase().includes('fastapi')) {
    return {
      command: 'uvicorn',
      args: [appModule, '--host', '0.0.0.0', '--port', String(config.port), '--workers', String(config.workers)],
    };
  }
  return {
    command: 'gunicorn',
    args: ['-b', `0.0.0.0:${config.port}`, '-w', String(config.workers), appModule],
  };
}

export function modelPath(appDir: string, descriptor: Descriptor): string {
  return path.join(appDir, descriptor.model_path);
}

export const apiRole: RoleContract<ApiConfig> = {
  async validate(config, ctx) {
    await readDescriptor(ctx.appDir);
    await checkDependencies(config.dependencies, ctx);
    await checkPortFree(config.port, ctx);
  },

  async start(config, ctx) {
    const descriptor = await readDescriptor(ctx.appDir);
    const { command, args } = apiCommand(config, descriptor);
    const instance = await ctx.supervisor.start('api', {
      kind: 'process',
      command,
      args,
      cwd: ctx.appDir,
      env: launchEnv(config.environment, { MODEL_PATH: modelPath(ctx.appDir, descriptor) }),
    });
    return {
      instance,
      runtime: null,
      details: [
        `Inference API (${command}, ${config.workers} worker(s)) started on port ${config.port}`,
        `Model: ${modelPath(ctx.appDir, descriptor)}`,
      ],
    };
  },

  async stop() {
    // Nothing beyond the supervised process
  },

  describe(config) {
    return [`Port: ${config.port}`, `Workers: ${config.workers}`];
  },
};
