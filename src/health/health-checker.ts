/**
 * Backend Health Checker
 *
 * Keeps load-balancer pool membership with hysteresis:
 *   HEALTHY   → UNHEALTHY after `unhealthyThreshold` consecutive failures
 *   UNHEALTHY → HEALTHY   after `healthyThreshold` consecutive successes
 *
 * Targets start HEALTHY. The eligible set is never empty while targets
 * exist: if every target is ejected, the last one to leave stays eligible
 * and the pool is flagged degraded.
 *
 * Records are replaced, never mutated; readers get frozen snapshots.
 */

import type { BackendTarget, HealthCheckResult, PoolSnapshot } from '../types.js';
import { errorMessage } from '../errors.js';
import { httpProbe, type ProbeFn } from './probe.js';
import { log } from '../logger.js';

export interface HealthCheckerOptions {
  targets: readonly string[];
  path: string;
  intervalMs: number;
  timeoutMs: number;
  /** Consecutive failures before a HEALTHY target is ejected (`retries`) */
  unhealthyThreshold: number;
  /** Consecutive successes before an UNHEALTHY target is restored */
  healthyThreshold?: number;
  probe?: ProbeFn;
}

export type PoolListener = (snapshot: PoolSnapshot) => void;

function initialTarget(address: string): BackendTarget {
  return Object.freeze({
    address,
    consecutiveFailures: 0,
    consecutiveSuccesses: 0,
    state: 'HEALTHY',
    lastCheckedAt: null,
    lastLatencyMs: null,
    lastError: null,
  });
}

/**
 * Pure counter/state update for one probe result.
 * Exported for testing.
 */
export function applyResult(
  target: BackendTarget,
  result: HealthCheckResult,
  unhealthyThreshold: number,
  healthyThreshold: number,
): BackendTarget {
  const consecutiveSuccesses = result.ok ? target.consecutiveSuccesses + 1 : 0;
  const consecutiveFailures = result.ok ? 0 : target.consecutiveFailures + 1;

  let state = target.state;
  if (state === 'HEALTHY' && consecutiveFailures >= unhealthyThreshold) state = 'UNHEALTHY';
  if (state === 'UNHEALTHY' && consecutiveSuccesses >= healthyThreshold) state = 'HEALTHY';

  return Object.freeze({
    address: target.address,
    consecutiveFailures,
    consecutiveSuccesses,
    state,
    lastCheckedAt: new Date(result.timestamp).toISOString(),
    lastLatencyMs: result.latencyMs,
    lastError: result.ok ? null : result.error ?? 'probe failed',
  });
}

export class HealthChecker {
  private readonly order: readonly string[];
  private readonly targets = new Map<string, BackendTarget>();
  private readonly inFlight = new Set<string>();
  private readonly listeners = new Set<PoolListener>();
  private readonly probe: ProbeFn;
  private readonly healthyThreshold: number;

  private snapshot: PoolSnapshot;
  /** Last target to leave the pool; kept eligible while nothing is healthy */
  private lastResort: string | null = null;

  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private currentTick: Promise<void> | null = null;

  constructor(private readonly options: HealthCheckerOptions) {
    this.order = [...new Set(options.targets)];
    for (const address of this.order) {
      this.targets.set(address, initialTarget(address));
    }
    this.probe = options.probe ?? httpProbe;
    this.healthyThreshold = options.healthyThreshold ?? 1;
    this.snapshot = this.buildSnapshot();
  }

  // ── Loop control ──────────────────────────────────────────────────────────

  /** Start polling in the background; the first check runs immediately. */
  start(): void {
    if (this.running) return;
    this.running = true;
    log(`[HealthChecker] Polling ${this.order.length} target(s) every ${this.options.intervalMs}ms ` +
      `(path ${this.options.path}, timeout ${this.options.timeoutMs}ms, ` +
      `eject after ${this.options.unhealthyThreshold}, restore after ${this.healthyThreshold})`);
    this.scheduleNext(0);
  }

  /** Stop polling; resolves once the in-progress check (if any) finishes. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentTick) await this.currentTick;
    log('[HealthChecker] Stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  private scheduleNext(delayMs: number): void {
    if (!this.running) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.currentTick = this.runTick();
    }, delayMs);
  }

  private async runTick(): Promise<void> {
    try {
      await this.checkNow();
    } catch (err) {
      log(`[HealthChecker] Unexpected error during check: ${errorMessage(err)}`);
    } finally {
      this.currentTick = null;
      this.scheduleNext(this.options.intervalMs);
    }
  }

  // ── Probing ───────────────────────────────────────────────────────────────

  /**
   * Probe every target once. Targets with a probe still in flight are
   * skipped. Results are applied as each probe completes.
   */
  async checkNow(): Promise<PoolSnapshot> {
    const probes = this.order
      .filter(address => !this.inFlight.has(address))
      .map(address => this.probeTarget(address));
    await Promise.all(probes);
    return this.snapshot;
  }

  private async probeTarget(address: string): Promise<void> {
    this.inFlight.add(address);
    let result: HealthCheckResult;
    try {
      result = await this.probe(address, this.options.path, this.options.timeoutMs);
    } catch (err) {
      result = { address, timestamp: Date.now(), ok: false, latencyMs: 0, error: errorMessage(err) };
    } finally {
      this.inFlight.delete(address);
    }
    this.record(result);
  }

  /** Apply one probe result. Exposed so callers can feed passive checks. */
  record(result: HealthCheckResult): void {
    const prev = this.targets.get(result.address);
    if (!prev) return;

    const next = applyResult(prev, result, this.options.unhealthyThreshold, this.healthyThreshold);
    this.targets.set(next.address, next);

    const wasDegraded = this.snapshot.degraded;

    if (next.state !== prev.state) {
      if (next.state === 'UNHEALTHY') {
        log(`[HealthChecker] ${next.address} UNHEALTHY after ${next.consecutiveFailures} consecutive failure(s): ${next.lastError}`);
        if (!this.order.some(a => this.targets.get(a)?.state === 'HEALTHY')) {
          this.lastResort = next.address;
        }
      } else {
        log(`[HealthChecker] ${next.address} HEALTHY again after ${next.consecutiveSuccesses} success(es)`);
      }
    }

    this.snapshot = this.buildSnapshot();

    if (this.snapshot.degraded !== wasDegraded) {
      if (this.snapshot.degraded) {
        log(`[HealthChecker] All targets UNHEALTHY, routing best-effort to ${this.snapshot.eligible.join(', ')}`);
      } else {
        log('[HealthChecker] Pool recovered from degraded mode');
      }
    }

    if (next.state !== prev.state) this.publish();
  }

  // ── Snapshots ─────────────────────────────────────────────────────────────

  private buildSnapshot(): PoolSnapshot {
    const targets = this.order.flatMap(a => {
      const t = this.targets.get(a);
      return t ? [t] : [];
    });
    const healthy = targets.filter(t => t.state === 'HEALTHY').map(t => t.address);

    let eligible = healthy;
    let degraded = false;
    if (healthy.length === 0 && targets.length > 0) {
      eligible = [this.lastResort ?? targets[0].address];
      degraded = true;
    }

    return Object.freeze({
      targets: Object.freeze(targets),
      eligible: Object.freeze(eligible),
      degraded,
      updatedAt: new Date().toISOString(),
    });
  }

  getSnapshot(): PoolSnapshot {
    return this.snapshot;
  }

  eligibleTargets(): readonly string[] {
    return this.snapshot.eligible;
  }

  /** Called with a fresh snapshot on every membership transition. */
  subscribe(listener: PoolListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private publish(): void {
    const snapshot = this.snapshot;
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (err) {
        log(`[HealthChecker] Listener failed: ${errorMessage(err)}`);
      }
    }
  }
}
