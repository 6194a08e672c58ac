/**
 * ConfigStore: loads `<role>_server.json`, resolves `${NAME}` references,
 * validates against the role schemas and hands back a deep-frozen
 * RoleConfig.
 */

import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { ZodError } from 'zod';
import { ConfigError, errorMessage } from '../errors.js';
import type { Role } from '../types.js';
import { RoleConfigSchema, type ConfigFor, type RoleConfig } from './schema.js';

export interface LoadOptions {
  /** Resolved application directory, substituted for `${APP_DIR}` */
  appDir: string;
  env?: NodeJS.ProcessEnv;
}

export function configPath(configDir: string, role: Role): string {
  return path.join(configDir, `${role}_server.json`);
}

const REFERENCE = /\$\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/** Replace `${NAME}` in every string value. Throws on an unresolved name. */
export function interpolate(
  value: unknown,
  lookup: (name: string) => string | undefined,
  where = '',
): unknown {
  if (typeof value === 'string') {
    return value.replace(REFERENCE, (_, name: string) => {
      const resolved = lookup(name);
      if (resolved === undefined) {
        throw new ConfigError('E_CONFIG_INVALID', `${where || 'value'}: \${${name}} is not set`);
      }
      return resolved;
    });
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown, i) => interpolate(item, lookup, `${where}[${i}]`));
  }
  if (value !== null && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, interpolate(item, lookup, where ? `${where}.${key}` : key)]),
    );
  }
  return value;
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/** Parse and validate an already-read document. */
export function parseRoleConfig<R extends Role>(
  text: string,
  role: R,
  options: LoadOptions,
  source = `${role}_server.json`,
): ConfigFor<R> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError('E_CONFIG_INVALID', `${source} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const env = options.env ?? process.env;
  const resolved = interpolate(raw, name => (name === 'APP_DIR' ? options.appDir : env[name]));

  const result = RoleConfigSchema.safeParse(resolved);
  if (!result.success) {
    throw new ConfigError('E_CONFIG_INVALID', `${source}: ${formatIssues(result.error)}`);
  }

  const config = result.data;
  if (!isRole(config, role)) {
    throw new ConfigError(
      'E_CONFIG_INVALID',
      `${source} declares server_type "${config.server_type}" but role "${role}" was requested`,
    );
  }
  return deepFreeze(config);
}

export async function loadRoleConfig<R extends Role>(
  configDir: string,
  role: R,
  options: LoadOptions,
): Promise<ConfigFor<R>> {
  const file = configPath(configDir, role);
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError('E_CONFIG_MISSING', `${file}: ${errorMessage(err)}`, { cause: err });
  }
  return parseRoleConfig(text, role, options, file);
}

function isRole<R extends Role>(config: RoleConfig, role: R): config is ConfigFor<R> {
  return config.server_type === role;
}
