/**
 * Health Checker Tests
 *
 * Membership hysteresis, the never-empty eligible set, probe overlap and
 * the polling loop, all against scripted probes.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { HealthChecker, applyResult, type HealthCheckerOptions } from './health-checker.js';
import type { ProbeFn } from './probe.js';
import type { BackendTarget, HealthCheckResult } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

function result(address: string, ok: boolean, error?: string): HealthCheckResult {
  return { address, timestamp: Date.now(), ok, latencyMs: 4, error };
}

/** Probe whose outcome per address is decided by `healthy`. */
function scriptedProbe(healthy: (address: string) => boolean) {
  return vi.fn(async (address: string) => result(address, healthy(address), healthy(address) ? undefined : 'E_PROBE_FAILED: HTTP 503'));
}

function makeChecker(overrides: Partial<HealthCheckerOptions> = {}): HealthChecker {
  return new HealthChecker({
    targets: ['A:8080', 'B:8080'],
    path: '/health',
    intervalMs: 5_000,
    timeoutMs: 3_000,
    unhealthyThreshold: 3,
    ...overrides,
  });
}

const fresh: BackendTarget = {
  address: 'B:8080',
  consecutiveFailures: 0,
  consecutiveSuccesses: 0,
  state: 'HEALTHY',
  lastCheckedAt: null,
  lastLatencyMs: null,
  lastError: null,
};

// ---------------------------------------------------------------------------
// applyResult
// ---------------------------------------------------------------------------

describe('applyResult', () => {
  it('ejects exactly on the configured failure count', () => {
    let target = fresh;
    target = applyResult(target, result('B:8080', false), 3, 1);
    target = applyResult(target, result('B:8080', false), 3, 1);
    expect(target.state).toBe('HEALTHY');
    expect(target.consecutiveFailures).toBe(2);

    target = applyResult(target, result('B:8080', false, 'E_PROBE_TIMEOUT: timed out after 3000ms'), 3, 1);
    expect(target.state).toBe('UNHEALTHY');
    expect(target.consecutiveFailures).toBe(3);
    expect(target.lastError).toBe('E_PROBE_TIMEOUT: timed out after 3000ms');
  });

  it('restores after a single success by default', () => {
    const down: BackendTarget = { ...fresh, state: 'UNHEALTHY', consecutiveFailures: 5 };
    const up = applyResult(down, result('B:8080', true), 3, 1);
    expect(up.state).toBe('HEALTHY');
    expect(up.consecutiveFailures).toBe(0);
    expect(up.consecutiveSuccesses).toBe(1);
    expect(up.lastError).toBeNull();
  });

  it('honours a larger healthy threshold', () => {
    const down: BackendTarget = { ...fresh, state: 'UNHEALTHY', consecutiveFailures: 3 };
    const once = applyResult(down, result('B:8080', true), 3, 2);
    expect(once.state).toBe('UNHEALTHY');
    expect(applyResult(once, result('B:8080', true), 3, 2).state).toBe('HEALTHY');
  });

  it('resets the success streak on a failure', () => {
    const streak: BackendTarget = { ...fresh, consecutiveSuccesses: 7 };
    const failed = applyResult(streak, result('B:8080', false), 3, 1);
    expect(failed.consecutiveSuccesses).toBe(0);
    expect(failed.consecutiveFailures).toBe(1);
    expect(failed.state).toBe('HEALTHY');
  });

  it('returns a new frozen record', () => {
    const next = applyResult(fresh, result('B:8080', true), 3, 1);
    expect(next).not.toBe(fresh);
    expect(Object.isFrozen(next)).toBe(true);
    expect(fresh.consecutiveSuccesses).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// HealthChecker
// ---------------------------------------------------------------------------

describe('HealthChecker', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('starts with every target HEALTHY and eligible', () => {
    const snapshot = makeChecker().getSnapshot();
    expect(snapshot.eligible).toEqual(['A:8080', 'B:8080']);
    expect(snapshot.degraded).toBe(false);
    expect(snapshot.targets.map(t => t.state)).toEqual(['HEALTHY', 'HEALTHY']);
  });

  it('drops a backend after three failed checks', async () => {
    const probe = scriptedProbe(address => address === 'A:8080');
    const checker = makeChecker({ probe });

    await checker.checkNow();
    await checker.checkNow();
    expect(checker.eligibleTargets()).toEqual(['A:8080', 'B:8080']);

    const snapshot = await checker.checkNow();
    expect(snapshot.eligible).toEqual(['A:8080']);
    expect(snapshot.targets[1]).toMatchObject({ address: 'B:8080', state: 'UNHEALTHY', consecutiveFailures: 3 });
    expect(probe).toHaveBeenCalledWith('B:8080', '/health', 3_000);
  });

  it('keeps the last target to leave eligible and flags the pool degraded', () => {
    const checker = makeChecker({ unhealthyThreshold: 1 });

    checker.record(result('A:8080', false));
    expect(checker.getSnapshot()).toMatchObject({ eligible: ['B:8080'], degraded: false });

    checker.record(result('B:8080', false));
    expect(checker.getSnapshot()).toMatchObject({ eligible: ['B:8080'], degraded: true });

    checker.record(result('A:8080', true));
    expect(checker.getSnapshot()).toMatchObject({ eligible: ['A:8080'], degraded: false });
  });

  it('never publishes an empty eligible set', () => {
    const checker = makeChecker({ targets: ['A:8080'], unhealthyThreshold: 1 });
    for (let i = 0; i < 5; i++) checker.record(result('A:8080', false));
    expect(checker.eligibleTargets()).toEqual(['A:8080']);
    expect(checker.getSnapshot().degraded).toBe(true);
  });

  it('ignores results for unknown addresses', () => {
    const checker = makeChecker();
    const before = checker.getSnapshot();
    checker.record(result('C:8080', false));
    expect(checker.getSnapshot()).toBe(before);
  });

  it('publishes only on membership transitions', () => {
    const checker = makeChecker();
    const listener = vi.fn();
    checker.subscribe(listener);

    checker.record(result('B:8080', false));
    checker.record(result('B:8080', false));
    expect(listener).not.toHaveBeenCalled();

    checker.record(result('B:8080', false));
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener.mock.calls[0][0].eligible).toEqual(['A:8080']);

    checker.record(result('B:8080', true));
    expect(listener).toHaveBeenCalledTimes(2);
    expect(listener.mock.calls[1][0].eligible).toEqual(['A:8080', 'B:8080']);
  });

  it('hands out snapshots that later checks do not change', () => {
    const checker = makeChecker({ unhealthyThreshold: 1 });
    const before = checker.getSnapshot();
    checker.record(result('B:8080', false));

    expect(before.eligible).toEqual(['A:8080', 'B:8080']);
    expect(Object.isFrozen(before.targets)).toBe(true);
    expect(checker.getSnapshot()).not.toBe(before);
  });

  it('counts a throwing probe as a failure', async () => {
    const probe: ProbeFn = async (address) => {
      if (address === 'B:8080') throw new Error('socket hang up');
      return result(address, true);
    };
    const checker = makeChecker({ probe, unhealthyThreshold: 1 });

    const snapshot = await checker.checkNow();
    expect(snapshot.targets[1]).toMatchObject({ state: 'UNHEALTHY', lastError: 'socket hang up' });
  });

  it('never has two probes in flight for one target', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>(resolve => { release = resolve; });
    const probe = vi.fn(async (address: string) => {
      await gate;
      return result(address, true);
    });
    const checker = makeChecker({ probe });

    const first = checker.checkNow();
    await checker.checkNow();
    expect(probe).toHaveBeenCalledTimes(2);

    release();
    await first;
    await checker.checkNow();
    expect(probe).toHaveBeenCalledTimes(4);
  });

  it('polls on the interval until stopped', async () => {
    vi.useFakeTimers();
    const probe = scriptedProbe(() => true);
    const checker = makeChecker({ probe });

    checker.start();
    expect(checker.isRunning()).toBe(true);
    await vi.advanceTimersByTimeAsync(0);
    expect(probe).toHaveBeenCalledTimes(2);

    await vi.advanceTimersByTimeAsync(5_000);
    expect(probe).toHaveBeenCalledTimes(4);

    await checker.stop();
    expect(checker.isRunning()).toBe(false);
    await vi.advanceTimersByTimeAsync(20_000);
    expect(probe).toHaveBeenCalledTimes(4);
  });
});
