/** Server roles the orchestrator knows how to run */
export type Role = 'web' | 'api' | 'loadbalancer' | 'database' | 'monitoring';

export const ALL_ROLES: readonly Role[] = ['web', 'api', 'loadbalancer', 'database', 'monitoring'];

/** Roles that own a background loop for the lifetime of their instance */
export const LOOP_ROLES: readonly Role[] = ['loadbalancer', 'monitoring'];

export type Action = 'start' | 'stop' | 'status';

export const ALL_ACTIONS: readonly Action[] = ['start', 'stop', 'status'];

export type LifecycleStatus = 'STOPPED' | 'STARTING' | 'RUNNING' | 'STOPPING' | 'FAILED';

// ---------------------------------------------------------------------------
// Process / service handles
// ---------------------------------------------------------------------------

/** OS-level handle a ServerInstance is bound to */
export type HandleRef =
  | { kind: 'process'; pid: number; command: string }
  | { kind: 'service'; unit: string }
  | { kind: 'embedded'; path: string };

/** What the supervisor should bring up for a role */
export type LaunchSpec =
  | {
      kind: 'process';
      command: string;
      args: string[];
      cwd: string;
      env: Record<string, string>;
    }
  | { kind: 'service'; unit: string; action: 'start' | 'restart' }
  | { kind: 'embedded'; path: string };

export interface ServerInstance {
  readonly role: Role;
  readonly handle: HandleRef | null;
  readonly status: LifecycleStatus;
  /** ISO timestamp of the last status change */
  readonly updatedAt: string;
}

// ---------------------------------------------------------------------------
// Health checking
// ---------------------------------------------------------------------------

export type MembershipState = 'HEALTHY' | 'UNHEALTHY';

export interface BackendTarget {
  readonly address: string;
  readonly consecutiveFailures: number;
  readonly consecutiveSuccesses: number;
  readonly state: MembershipState;
  readonly lastCheckedAt: string | null;
  readonly lastLatencyMs: number | null;
  readonly lastError: string | null;
}

/** Result of a single probe against one backend */
export interface HealthCheckResult {
  address: string;
  timestamp: number;
  ok: boolean;
  latencyMs: number;
  error?: string;
}

/** Pool view published to the routing layer and status reporting */
export interface PoolSnapshot {
  readonly targets: readonly BackendTarget[];
  readonly eligible: readonly string[];
  /** True when no target is HEALTHY and routing is best-effort */
  readonly degraded: boolean;
  readonly updatedAt: string;
}

// ---------------------------------------------------------------------------
// Alerting
// ---------------------------------------------------------------------------

export type AlertStatus = 'OK' | 'PENDING' | 'FIRING' | 'RESOLVED';

export type AlertThreshold =
  | { kind: 'absolute'; value: number }
  | { kind: 'ratio'; fraction: number };

export interface AlertRule {
  readonly name: string;
  /** Metric selector, e.g. `http_request_duration_seconds{quantile="0.99"}` */
  readonly metric: string;
  /** Denominator counter for ratio rules */
  readonly totalMetric: string | null;
  readonly threshold: AlertThreshold;
  readonly durationMs: number;
}

export interface AlertState {
  readonly rule: string;
  readonly status: AlertStatus;
  /** Epoch ms at which the condition became continuously true */
  readonly conditionSince: number | null;
  readonly lastValue: number | null;
  readonly lastEvaluatedAt: number | null;
  /** Set while the metrics source is failing (condition unknown) */
  readonly lastError: string | null;
}

export interface AlertTransition {
  rule: string;
  from: AlertStatus;
  to: AlertStatus;
  at: number;
  value: number | null;
}

export interface AlertSnapshot {
  readonly states: readonly AlertState[];
  readonly updatedAt: string;
}

/** One observation pulled from the metrics source for a rule */
export type MetricSample =
  | { kind: 'value'; timestamp: number; value: number }
  | { kind: 'ratio'; timestamp: number; failed: number; total: number };
