/**
 * Shared pieces of the role lifecycle contract.
 */

import { constants, existsSync } from 'node:fs';
import { access, readFile } from 'node:fs/promises';
import net from 'node:net';
import path from 'node:path';
import type { Config } from '../config.js';
import { ConfigError, StartError, errorMessage } from '../errors.js';
import type { AlertEvaluator } from '../alerts/evaluator.js';
import type { MetricsSource } from '../alerts/metrics-source.js';
import type { HealthChecker } from '../health/health-checker.js';
import type { ProbeFn } from '../health/probe.js';
import type { EventSink } from '../services/events.js';
import type { CommandRunner } from '../services/runner.js';
import type { StateStore } from '../services/state-store.js';
import type { ProcessSupervisor } from '../supervisor/process-supervisor.js';
import type { ServerInstance } from '../types.js';
import { DescriptorSchema, type Descriptor, type RoleConfig } from './schema.js';
import { formatIssues } from './config-store.js';
import { log } from '../logger.js';

/** Everything a role needs from the outside world. Tests swap any of it. */
export interface RoleContext {
  appDir: string;
  stateDir: string;
  settings: Config;
  supervisor: ProcessSupervisor;
  runner: CommandRunner;
  /** True when something already listens on `port` */
  portInUse(port: number): Promise<boolean>;
  /** Absolute path of an executable on PATH, or null */
  which(name: string): Promise<string | null>;
  probe?: ProbeFn;
  metricsSource(targets: readonly string[]): MetricsSource;
  events: EventSink;
  store: StateStore;
  notify(message: string): Promise<void>;
}

/** Background loops owned by a started role. */
export interface RoleRuntime {
  healthChecker?: HealthChecker;
  alertEvaluator?: AlertEvaluator;
  /** Stop every loop, waiting for the tick in progress */
  stop(): Promise<void>;
}

export interface StartedRole {
  instance: ServerInstance;
  runtime: RoleRuntime | null;
  /** Human-readable lines for the CLI */
  details: string[];
}

/**
 * Lifecycle contract, one implementation per role.
 *
 * `validate` must not touch any OS resource. `start` either returns a
 * RUNNING instance or throws after undoing everything it created.
 */
export interface RoleContract<C extends RoleConfig> {
  validate(config: C, ctx: RoleContext): Promise<void>;
  start(config: C, ctx: RoleContext): Promise<StartedRole>;
  /** Role-level teardown; background loops are already stopped */
  stop(config: C, instance: ServerInstance | null, ctx: RoleContext): Promise<void>;
  /** Extra status lines (data paths, rendered files) */
  describe(config: C, ctx: RoleContext): string[];
}

// ---------------------------------------------------------------------------
// Rollback
// ---------------------------------------------------------------------------

/**
 * Undo steps registered while starting a role, run newest first when the
 * start fails.
 */
export class Rollback {
  private readonly steps: { label: string; undo: () => Promise<void> }[] = [];

  add(label: string, undo: () => Promise<void>): void {
    this.steps.push({ label, undo });
  }

  /** Runs every step; returns the labels of steps that failed. */
  async run(): Promise<string[]> {
    const failed: string[] = [];
    for (const step of this.steps.reverse()) {
      try {
        await step.undo();
        log(`[Rollback] Undid ${step.label}`);
      } catch (err) {
        log(`[Rollback] Could not undo ${step.label}: ${errorMessage(err)}`);
        failed.push(step.label);
      }
    }
    this.steps.length = 0;
    return failed;
  }

  /** Run `body`; on failure roll back and rethrow. */
  async guard<T>(body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } catch (err) {
      const failed = await this.run();
      if (failed.length > 0 && err instanceof Error) {
        err.message += ` (rollback incomplete: ${failed.join(', ')})`;
      }
      throw err;
    }
  }
}

/**
 * Fire-and-forget work started from loop listeners (store writes, events,
 * reloads). Failures are logged; `drain` waits for whatever is still
 * running.
 */
export class PendingTasks {
  private readonly tasks = new Set<Promise<void>>();

  constructor(private readonly component: string) {}

  add(label: string, task: Promise<void>): void {
    const tracked: Promise<void> = task
      .catch((err: unknown) => log(`[${this.component}] ${label} failed: ${errorMessage(err)}`))
      .finally(() => { this.tasks.delete(tracked); });
    this.tasks.add(tracked);
  }

  async drain(): Promise<void> {
    await Promise.all([...this.tasks]);
  }
}

// ---------------------------------------------------------------------------
// Validation helpers
// ---------------------------------------------------------------------------

/** `gunicorn>=21.2` → `gunicorn` */
export function dependencyName(spec: string): string {
  return spec.split(/[<>=!~\s[]/)[0];
}

export async function checkDependencies(dependencies: readonly string[], ctx: RoleContext): Promise<void> {
  const missing: string[] = [];
  for (const spec of dependencies) {
    const name = dependencyName(spec);
    if (!name || !(await ctx.which(name))) missing.push(spec);
  }
  if (missing.length > 0) {
    throw new StartError('E_DEPENDENCY_UNRESOLVED', `not found on PATH: ${missing.join(', ')}`);
  }
}

export async function checkPortFree(port: number, ctx: RoleContext): Promise<void> {
  if (await ctx.portInUse(port)) {
    throw new StartError('E_PORT_IN_USE', `port ${port} is already in use`);
  }
}

export async function readDescriptor(appDir: string): Promise<Descriptor> {
  const file = path.join(appDir, 'descriptor.json');
  let text: string;
  try {
    text = await readFile(file, 'utf8');
  } catch (err) {
    throw new ConfigError('E_CONFIG_MISSING', `application descriptor ${file}: ${errorMessage(err)}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError('E_CONFIG_INVALID', `${file} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const result = DescriptorSchema.safeParse(raw);
  if (!result.success) throw new ConfigError('E_CONFIG_INVALID', `${file}: ${formatIssues(result.error)}`);
  return result.data;
}

/** Environment for a launched process: ours, overlaid with the role's. */
export function launchEnv(
  environment: Readonly<Record<string, string>>,
  extra: Record<string, string> = {},
  base: NodeJS.ProcessEnv = process.env,
): Record<string, string> {
  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(base)) {
    if (value !== undefined) env[key] = value;
  }
  return { ...env, ...environment, ...extra };
}

// ---------------------------------------------------------------------------
// OS probes used by the default context
// ---------------------------------------------------------------------------

/** Binds the port briefly; only EADDRINUSE counts as taken. */
export function portInUse(port: number): Promise<boolean> {
  return new Promise((resolve) => {
    const server = net.createServer();
    server.once('error', (err: NodeJS.ErrnoException) => {
      resolve(err.code === 'EADDRINUSE');
    });
    server.once('listening', () => {
      server.close(() => resolve(false));
    });
    server.listen(port);
  });
}

export async function which(name: string, envPath = process.env.PATH ?? ''): Promise<string | null> {
  if (name.includes('/')) return existsSync(name) ? path.resolve(name) : null;
  for (const dir of envPath.split(path.delimiter)) {
    if (!dir) continue;
    const candidate = path.join(dir, name);
    try {
      await access(candidate, constants.X_OK);
      return candidate;
    } catch {
      continue;
    }
  }
  return null;
}
