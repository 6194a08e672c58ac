/**
 * Orchestrator
 *
 * Resolves a role, loads its document and drives one action:
 *   start  → validate, start, report the instance
 *   stop   → stop background loops, role teardown, stop the handle
 *   status → supervisor view plus HealthChecker / AlertEvaluator state
 *
 * Role and action names are checked before any file or process access.
 * The registry of running loops is owned here, one entry per role.
 */

import { existsSync, statSync } from 'node:fs';
import { stateDirFor, type Config } from './config.js';
import {
  ConfigError,
  OrchestratorError,
  StartError,
  StopError,
  errorMessage,
} from './errors.js';
import { ScrapeMetricsSource, type MetricsSource } from './alerts/metrics-source.js';
import type { ProbeFn } from './health/probe.js';
import { loadRoleConfig, configPath } from './roles/config-store.js';
import { portInUse, which } from './roles/common.js';
import { bindRole, type BoundRole, type RoleContext, type RoleRuntime } from './roles/index.js';
import { EventPublisher, type EventSink } from './services/events.js';
import { notify } from './services/notify.js';
import { createRunner, type CommandRunner } from './services/runner.js';
import { createStateStore, type StateStore } from './services/state-store.js';
import { SystemDriver, type HandleDriver } from './supervisor/drivers.js';
import { ProcessSupervisor } from './supervisor/process-supervisor.js';
import { signalWatcher } from './supervisor/watcher.js';
import {
  ALL_ACTIONS,
  ALL_ROLES,
  LOOP_ROLES,
  type Action,
  type AlertSnapshot,
  type HandleRef,
  type LifecycleStatus,
  type PoolSnapshot,
  type Role,
} from './types.js';
import { log } from './logger.js';

export interface RunRequest {
  role: string;
  action: string;
  configDir: string;
  appDir: string;
}

export interface RoleReport {
  role: Role;
  action: Action;
  status: LifecycleStatus;
  /** Human-readable lines for the CLI */
  lines: string[];
  health: PoolSnapshot | null;
  alerts: AlertSnapshot | null;
  /** True when this process now runs background loops for the role */
  ownsLoops: boolean;
}

/** Collaborators; anything left out gets the production implementation. */
export interface OrchestratorDeps {
  runner?: CommandRunner;
  driver?: (stateDir: string) => HandleDriver;
  probe?: ProbeFn;
  metricsSource?: (targets: readonly string[]) => MetricsSource;
  portInUse?: (port: number) => Promise<boolean>;
  which?: (name: string) => Promise<string | null>;
  events?: EventSink;
  store?: StateStore;
  notify?: (message: string) => Promise<void>;
}

export function isRole(value: string): value is Role {
  return ALL_ROLES.some(r => r === value);
}

export function isAction(value: string): value is Action {
  return ALL_ACTIONS.some(a => a === value);
}

export class Orchestrator {
  private readonly runtimes = new Map<Role, RoleRuntime>();
  private readonly supervisors = new Map<string, ProcessSupervisor>();
  private readonly runner: CommandRunner;
  private readonly events: EventSink;
  private readonly stores = new Map<string, StateStore>();

  constructor(
    private readonly settings: Config,
    private readonly deps: OrchestratorDeps = {},
  ) {
    this.runner = deps.runner ?? createRunner(settings);
    this.events = deps.events ?? new EventPublisher(settings);
  }

  async run(request: RunRequest): Promise<RoleReport> {
    const { role, action } = request;
    if (!isRole(role)) {
      throw new ConfigError('E_ROLE_UNKNOWN', `unknown role "${role}" (expected one of ${ALL_ROLES.join(', ')})`);
    }
    if (!isAction(action)) {
      throw new ConfigError('E_ACTION_UNKNOWN', `unknown action "${action}" (expected one of ${ALL_ACTIONS.join(', ')})`);
    }

    const file = configPath(request.configDir, role);
    if (!existsSync(file)) {
      throw new ConfigError('E_CONFIG_MISSING', `configuration file ${file} not found`);
    }
    if (!existsSync(request.appDir) || !statSync(request.appDir).isDirectory()) {
      throw new ConfigError('E_APP_DIR_MISSING', `application directory ${request.appDir} does not exist`);
    }

    const config = await loadRoleConfig(request.configDir, role, { appDir: request.appDir });
    const bound = bindRole(config);
    const ctx = this.context(request.appDir);

    switch (action) {
      case 'start':
        return this.start(bound, ctx);
      case 'stop':
        return this.stop(bound, ctx);
      case 'status':
        return this.status(bound, ctx);
    }
  }

  hasRuntime(role: Role): boolean {
    return this.runtimes.has(role);
  }

  // ── Actions ───────────────────────────────────────────────────────────────

  private async start(bound: BoundRole, ctx: RoleContext): Promise<RoleReport> {
    const { role } = bound;
    log(`[Orchestrator] Starting ${role}`);

    try {
      await bound.validate(ctx);
      const started = await bound.start(ctx);
      if (started.runtime) this.runtimes.set(role, started.runtime);

      await this.events.publish({
        eventType: 'ROLE_START',
        role,
        message: started.details.join('; '),
        details: { handle: started.instance.handle },
      });

      const report = await this.report(bound, ctx, 'start', started.instance.status);
      return { ...report, lines: [...started.details, ...report.lines] };
    } catch (err) {
      const failure = err instanceof OrchestratorError
        ? err
        : new StartError('E_RESOURCE_CREATE', errorMessage(err), { cause: err });
      await this.events.publish({
        eventType: 'ROLE_START_FAILED',
        role,
        severity: 'CRITICAL',
        message: failure.message,
        details: { code: failure.code },
      });
      throw failure;
    }
  }

  private async stop(bound: BoundRole, ctx: RoleContext): Promise<RoleReport> {
    const { role } = bound;
    log(`[Orchestrator] Stopping ${role}`);

    try {
      const runtime = this.runtimes.get(role);
      if (runtime) {
        await runtime.stop();
        this.runtimes.delete(role);
      } else if (LOOP_ROLES.includes(role)) {
        // Loops run in a foreground watcher elsewhere; it stops them itself
        await signalWatcher(ctx.stateDir, role, this.settings.stopGraceSeconds * 1000);
      }

      const instance = await ctx.supervisor.locate(role);
      await bound.stop(instance, ctx);
      const stopped = await ctx.supervisor.stop(role);

      await this.events.publish({ eventType: 'ROLE_STOP', role });
      return this.report(bound, ctx, 'stop', stopped.status);
    } catch (err) {
      if (err instanceof OrchestratorError) throw err;
      throw new StopError('E_STOP_FAILED', errorMessage(err), { cause: err });
    }
  }

  private async status(bound: BoundRole, ctx: RoleContext): Promise<RoleReport> {
    const status = await ctx.supervisor.status(bound.role);
    return this.report(bound, ctx, 'status', status);
  }

  private async report(
    bound: BoundRole,
    ctx: RoleContext,
    action: Action,
    status: LifecycleStatus,
  ): Promise<RoleReport> {
    const { role } = bound;
    const runtime = this.runtimes.get(role);

    let health: PoolSnapshot | null = null;
    let alerts: AlertSnapshot | null = null;
    if (role === 'loadbalancer') {
      health = runtime?.healthChecker?.getSnapshot() ?? (await ctx.store.loadHealth(role));
    }
    if (role === 'monitoring') {
      alerts = runtime?.alertEvaluator?.getSnapshot() ?? (await ctx.store.loadAlerts(role));
    }

    const handle = ctx.supervisor.get(role)?.handle ?? null;
    const lines = [
      `${role}: ${status}${handle ? ` (${describeHandle(handle)})` : ''}`,
      ...(action === 'stop' ? [] : bound.describe(ctx)),
      ...(health ? formatHealth(health) : []),
      ...(alerts ? formatAlerts(alerts) : []),
    ];

    return { role, action, status, lines, health, alerts, ownsLoops: runtime !== undefined };
  }

  // ── Wiring ────────────────────────────────────────────────────────────────

  private context(appDir: string): RoleContext {
    const stateDir = stateDirFor(this.settings, appDir);
    const deps = this.deps;
    return {
      appDir,
      stateDir,
      settings: this.settings,
      supervisor: this.supervisorFor(stateDir),
      runner: this.runner,
      portInUse: deps.portInUse ?? portInUse,
      which: deps.which ?? (name => which(name)),
      probe: deps.probe,
      metricsSource: deps.metricsSource ?? (targets => new ScrapeMetricsSource(targets)),
      events: this.events,
      store: this.storeFor(stateDir),
      notify: deps.notify ?? (message => notify(this.settings, message)),
    };
  }

  private storeFor(stateDir: string): StateStore {
    const existing = this.stores.get(stateDir);
    if (existing) return existing;

    const store = this.deps.store ?? createStateStore(this.settings, stateDir);
    this.stores.set(stateDir, store);
    return store;
  }

  private supervisorFor(stateDir: string): ProcessSupervisor {
    const existing = this.supervisors.get(stateDir);
    if (existing) return existing;

    const driver = this.deps.driver?.(stateDir) ?? new SystemDriver({
      stateDir,
      runner: this.runner,
      stopGraceMs: this.settings.stopGraceSeconds * 1000,
      startupGraceMs: this.settings.startupGraceMs,
    });
    const supervisor = new ProcessSupervisor(driver);
    this.supervisors.set(stateDir, supervisor);
    return supervisor;
  }

  /** Stop every loop this process owns and close shared connections. */
  async shutdown(): Promise<void> {
    for (const [role, runtime] of this.runtimes) {
      try {
        await runtime.stop();
      } catch (err) {
        log(`[Orchestrator] Failed to stop ${role} loops: ${errorMessage(err)}`);
      }
    }
    this.runtimes.clear();
    await this.events.close();
    for (const store of new Set(this.stores.values())) await store.close();
    this.stores.clear();
  }
}

// ---------------------------------------------------------------------------
// Report formatting
// ---------------------------------------------------------------------------

export function describeHandle(handle: HandleRef): string {
  switch (handle.kind) {
    case 'process':
      return `pid ${handle.pid}, ${handle.command}`;
    case 'service':
      return `service ${handle.unit}`;
    case 'embedded':
      return `embedded ${handle.path}`;
  }
}

export function formatHealth(snapshot: PoolSnapshot): string[] {
  const lines = [
    `Eligible backends: ${snapshot.eligible.join(', ')}` +
      (snapshot.degraded ? ' (DEGRADED: no healthy backend, routing best-effort)' : ''),
  ];
  for (const t of snapshot.targets) {
    if (t.state === 'HEALTHY') {
      lines.push(`  ${t.address} HEALTHY${t.lastLatencyMs === null ? '' : ` (${t.lastLatencyMs}ms)`}`);
    } else {
      lines.push(`  ${t.address} UNHEALTHY (${t.consecutiveFailures} consecutive failure(s)` +
        `${t.lastError ? `, ${t.lastError}` : ''})`);
    }
  }
  return lines;
}

export function formatAlerts(snapshot: AlertSnapshot): string[] {
  const lines = ['Alerts:'];
  for (const s of snapshot.states) {
    const value = s.lastValue === null ? '' : ` (value ${Math.round(s.lastValue * 10_000) / 10_000})`;
    const unknown = s.lastError ? ` [condition unknown: ${s.lastError}]` : '';
    lines.push(`  ${s.rule} ${s.status}${value}${unknown}`);
  }
  return lines;
}
