/**
 * nginx site management for the load balancer role.
 *
 * The site lives at `<nginxRoot>/sites-available/<site>` and is enabled by a
 * symlink in `sites-enabled`. After a start, UpstreamSync rewrites the
 * upstream block from the HealthChecker's eligible set and reloads nginx.
 */

import { existsSync } from 'node:fs';
import { lstat, mkdir, readFile, rm, symlink, writeFile } from 'node:fs/promises';
import path from 'node:path';
import type { CommandRunner } from '../services/runner.js';
import type { Rollback } from './common.js';
import { log } from '../logger.js';

export interface SitePaths {
  available: string;
  enabled: string;
}

export function sitePaths(nginxRoot: string, siteName: string): SitePaths {
  return {
    available: path.join(nginxRoot, 'sites-available', siteName),
    enabled: path.join(nginxRoot, 'sites-enabled', siteName),
  };
}

const PROXY_HEADERS = [
  'proxy_set_header Host $host;',
  'proxy_set_header X-Real-IP $remote_addr;',
  'proxy_set_header X-Forwarded-For $proxy_add_x_forwarded_for;',
  'proxy_set_header X-Forwarded-Proto $scheme;',
];

function location(prefix: string): string[] {
  return [
    `    location ${prefix} {`,
    '        proxy_pass http://backend;',
    ...PROXY_HEADERS.map(h => `        ${h}`),
    '    }',
  ];
}

export function renderSite(backends: readonly string[], port: number): string {
  return [
    'upstream backend {',
    ...backends.map(b => `    server ${b};`),
    '}',
    '',
    'server {',
    `    listen ${port};`,
    '',
    ...location('/api/'),
    '',
    ...location('/'),
    '}',
    '',
  ].join('\n');
}

async function mkdirTracked(dir: string, rollback: Rollback): Promise<void> {
  const created = await mkdir(dir, { recursive: true });
  if (created) rollback.add(`directory ${created}`, () => rm(created, { recursive: true, force: true }));
}

/** Write the site and enable it, registering the undo steps. */
export async function installSite(paths: SitePaths, content: string, rollback: Rollback): Promise<void> {
  await mkdirTracked(path.dirname(paths.available), rollback);
  await mkdirTracked(path.dirname(paths.enabled), rollback);

  const previous = existsSync(paths.available) ? await readFile(paths.available, 'utf8') : null;
  await writeFile(paths.available, content);
  rollback.add(`site ${paths.available}`, async () => {
    if (previous === null) await rm(paths.available, { force: true });
    else await writeFile(paths.available, previous);
  });

  const linked = await isSymlink(paths.enabled);
  if (!linked) {
    await rm(paths.enabled, { force: true });
    await symlink(paths.available, paths.enabled);
    rollback.add(`link ${paths.enabled}`, () => rm(paths.enabled, { force: true }));
  }
}

export async function removeSite(paths: SitePaths): Promise<void> {
  await rm(paths.enabled, { force: true });
  await rm(paths.available, { force: true });
}

async function isSymlink(file: string): Promise<boolean> {
  try {
    return (await lstat(file)).isSymbolicLink();
  } catch {
    return false;
  }
}

export interface UpstreamSyncOptions {
  file: string;
  port: number;
  serviceName: string;
  runner: CommandRunner;
  /** Content currently on disk */
  initial: string;
}

/**
 * Applies eligible-set changes to the site one at a time, in the order
 * they were published. Identical renders are skipped.
 */
export class UpstreamSync {
  private chain: Promise<void> = Promise.resolve();
  private rendered: string;

  constructor(private readonly options: UpstreamSyncOptions) {
    this.rendered = options.initial;
  }

  update(eligible: readonly string[]): Promise<void> {
    const next = this.chain.then(() => this.apply(eligible));
    this.chain = next.catch(() => undefined);
    return next;
  }

  /** Resolves once every queued update has been applied or has failed. */
  idle(): Promise<void> {
    return this.chain;
  }

  private async apply(eligible: readonly string[]): Promise<void> {
    const content = renderSite(eligible, this.options.port);
    if (content === this.rendered) return;

    await writeFile(this.options.file, content);
    const result = await this.options.runner.run('systemctl', ['reload', this.options.serviceName]);
    if (result.code !== 0) {
      throw new Error(`systemctl reload ${this.options.serviceName} failed: ${result.stderr || `exit ${result.code}`}`);
    }
    this.rendered = content;
    log(`[LoadBalancer] Upstream now ${eligible.join(', ')}`);
  }
}
