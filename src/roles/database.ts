/**
 * Database role: a SQLite file under the data directory, or the system
 * PostgreSQL service. Starting never truncates or re-initialises existing
 * data.
 */

import { existsSync, statSync } from 'node:fs';
import { mkdir, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { ConfigError } from '../errors.js';
import type { DatabaseConfig } from './schema.js';
import { Rollback, checkDependencies, type RoleContract } from './common.js';
import { log } from '../logger.js';

export const SQLITE_FILE = 'app.db';

export function dataDir(config: DatabaseConfig, appDir: string): string {
  return config.data_dir ?? path.join(appDir, 'database');
}

interface Credentials {
  user: string;
  password: string;
  name: string;
}

function credentials(config: DatabaseConfig): Credentials {
  const missing = (['db_user', 'db_password', 'db_name'] as const).filter(key => !config[key]);
  if (!config.db_user || !config.db_password || !config.db_name) {
    throw new ConfigError('E_CONFIG_INVALID', `postgres database requires ${missing.join(', ')}`);
  }
  return { user: config.db_user, password: config.db_password, name: config.db_name };
}

/** Connection string for the status report; the password is masked unless asked for. */
export function databaseUrl(config: DatabaseConfig, appDir: string, reveal = false): string {
  if (config.db_type === 'sqlite') {
    return `sqlite:///${path.join(dataDir(config, appDir), SQLITE_FILE)}`;
  }
  const { user, password, name } = credentials(config);
  const port = config.port === 5432 ? '' : `:${config.port}`;
  return `postgresql://${user}:${reveal ? password : '***'}@localhost${port}/${name}`;
}

export const databaseRole: RoleContract<DatabaseConfig> = {
  async validate(config, ctx) {
    if (config.db_type === 'postgres') credentials(config);

    const dir = dataDir(config, ctx.appDir);
    if (existsSync(dir) && !statSync(dir).isDirectory()) {
      throw new ConfigError('E_CONFIG_INVALID', `data_dir ${dir} exists and is not a directory`);
    }
    await checkDependencies(config.dependencies, ctx);
  },

  async start(config, ctx) {
    const dir = dataDir(config, ctx.appDir);
    const rollback = new Rollback();

    return rollback.guard(async () => {
      const created = await mkdir(dir, { recursive: true });
      if (created) {
        log(`[Database] Created data directory ${dir}`);
        rollback.add(`directory ${created}`, () => rm(created, { recursive: true, force: true }));
      }

      if (config.db_type === 'sqlite') {
        const file = path.join(dir, SQLITE_FILE);
        if (existsSync(file)) {
          log(`[Database] Using existing ${file}`);
        } else {
          await writeFile(file, '', { flag: 'wx' });
          rollback.add(`file ${file}`, () => rm(file, { force: true }));
        }
        const instance = await ctx.supervisor.start('database', { kind: 'embedded', path: file });
        return {
          instance,
          runtime: null,
          details: [`SQLite database at ${file}`, `DATABASE_URL=${databaseUrl(config, ctx.appDir)}`],
        };
      }

      const instance = await ctx.supervisor.start('database', {
        kind: 'service',
        unit: config.service_name,
        action: 'start',
      });
      return {
        instance,
        runtime: null,
        details: [
          `PostgreSQL service ${config.service_name} started (data directory ${dir})`,
          `DATABASE_URL=${databaseUrl(config, ctx.appDir)}`,
        ],
      };
    });
  },

  async stop() {
    // Data stays in place; the supervisor releases the handle
  },

  describe(config, ctx) {
    return [
      `Type: ${config.db_type}`,
      `Data directory: ${dataDir(config, ctx.appDir)}`,
      `DATABASE_URL=${databaseUrl(config, ctx.appDir)}`,
    ];
  },
};
