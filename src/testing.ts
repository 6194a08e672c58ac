/**
 * In-process stand-ins for the OS and network collaborators, shared by the
 * role and orchestrator tests.
 */

import type { Config } from './config.js';
import type { MetricsSource } from './alerts/metrics-source.js';
import type { RoleContext } from './roles/common.js';
import type { EventSink, OrchestratorEvent } from './services/events.js';
import type { CommandRunner } from './services/runner.js';
import type { ExecResult } from './services/ssh.js';
import { MemoryStateStore } from './services/state-store.js';
import { SystemDriver, type HandleDriver } from './supervisor/drivers.js';
import { ProcessSupervisor } from './supervisor/process-supervisor.js';
import type { HandleRef, LaunchSpec, Role } from './types.js';

export function testSettings(overrides: Partial<Config> = {}): Config {
  return {
    defaultConfigDir: './configs',
    defaultAppDir: '/srv/app',
    nginxRoot: '/etc/nginx',
    evaluationIntervalSeconds: 15,
    stopGraceSeconds: 1,
    startupGraceMs: 0,
    ...overrides,
  };
}

/** Records every command; exits 0 unless a result is scripted for the line. */
export class FakeRunner implements CommandRunner {
  readonly target = 'localhost';
  readonly calls: string[] = [];
  readonly results = new Map<string, ExecResult>();

  async run(command: string, args: string[]): Promise<ExecResult> {
    const line = [command, ...args].join(' ');
    this.calls.push(line);
    return this.results.get(line) ?? { stdout: '', stderr: '', code: 0 };
  }
}

export class RecordingEvents implements EventSink {
  readonly events: OrchestratorEvent[] = [];

  async publish(event: OrchestratorEvent): Promise<void> {
    this.events.push(event);
  }

  async close(): Promise<void> {
    // nothing held
  }

  types(): string[] {
    return this.events.map(e => e.eventType);
  }
}

/** Handle driver that launches nothing; liveness is whatever `alive` holds. */
export class MemoryDriver implements HandleDriver {
  readonly recorded = new Map<Role, HandleRef>();
  readonly alive = new Set<string>();
  readonly launched: LaunchSpec[] = [];
  readonly terminated: HandleRef[] = [];
  failLaunch: Error | null = null;
  failTerminate: Error | null = null;
  private nextPid = 100;

  async launch(role: Role, spec: LaunchSpec): Promise<HandleRef> {
    if (this.failLaunch) throw this.failLaunch;
    const handle: HandleRef = spec.kind === 'process'
      ? { kind: 'process', pid: this.nextPid++, command: spec.command }
      : spec.kind === 'service'
        ? { kind: 'service', unit: spec.unit }
        : { kind: 'embedded', path: spec.path };
    this.launched.push(spec);
    this.recorded.set(role, handle);
    this.alive.add(handleKey(handle));
    return handle;
  }

  async isAlive(handle: HandleRef): Promise<boolean> {
    return this.alive.has(handleKey(handle));
  }

  async terminate(handle: HandleRef): Promise<void> {
    if (this.failTerminate) throw this.failTerminate;
    this.terminated.push(handle);
    this.alive.delete(handleKey(handle));
  }

  async discover(role: Role): Promise<HandleRef | null> {
    return this.recorded.get(role) ?? null;
  }

  async release(role: Role): Promise<void> {
    this.recorded.delete(role);
  }
}

export function handleKey(handle: HandleRef): string {
  switch (handle.kind) {
    case 'process': return `pid:${handle.pid}`;
    case 'service': return `unit:${handle.unit}`;
    case 'embedded': return `path:${handle.path}`;
  }
}

/** Metrics source that always reports a fixed value. */
export function constantMetrics(value: number): MetricsSource {
  return { sample: async (_rule, now) => ({ kind: 'value', timestamp: now, value }) };
}

export interface TestContext extends RoleContext {
  runner: FakeRunner;
  events: RecordingEvents;
  notifications: string[];
}

/** Collaborators a test may replace; the runner and event sink are always the recording fakes. */
export type ContextOverrides = Partial<Omit<RoleContext, 'runner' | 'events'>>;

export function makeContext(
  dirs: { appDir: string; stateDir: string; nginxRoot?: string },
  overrides: ContextOverrides = {},
): TestContext {
  const runner = new FakeRunner();
  const settings = testSettings({ nginxRoot: dirs.nginxRoot ?? '/etc/nginx', stateDir: dirs.stateDir });
  const notifications: string[] = [];
  return {
    appDir: dirs.appDir,
    stateDir: dirs.stateDir,
    settings,
    supervisor: new ProcessSupervisor(new SystemDriver({
      stateDir: dirs.stateDir,
      runner,
      stopGraceMs: 1_000,
      startupGraceMs: 0,
    })),
    portInUse: async () => false,
    which: async name => `/usr/bin/${name}`,
    metricsSource: () => constantMetrics(0),
    store: new MemoryStateStore(),
    notify: async (message) => { notifications.push(message); },
    ...overrides,
    runner,
    events: new RecordingEvents(),
    notifications,
  };
}
