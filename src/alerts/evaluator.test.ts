/**
 * Alert Evaluator Tests
 *
 * Drives evaluate(now) with explicit timestamps against scripted metrics
 * sources; no timers involved.
 */

import { describe, it, expect, vi } from 'vitest';
import { AlertEvaluator, nextStatus, tickInterval } from './evaluator.js';
import { compileRule } from './rules.js';
import type { MetricsSource } from './metrics-source.js';
import { AlertEvalError } from '../errors.js';
import type { AlertRule, MetricSample } from '../types.js';

// ---------------------------------------------------------------------------
// Test helpers
// ---------------------------------------------------------------------------

const SEC = 1_000;

function scripted(script: (rule: AlertRule, now: number) => MetricSample): MetricsSource {
  return { sample: async (rule, now) => script(rule, now) };
}

function value(now: number, v: number): MetricSample {
  return { kind: 'value', timestamp: now, value: v };
}

function ratio(now: number, failed: number, total: number): MetricSample {
  return { kind: 'ratio', timestamp: now, failed, total };
}

function makeEvaluator(rule: AlertRule, source: MetricsSource): AlertEvaluator {
  return new AlertEvaluator({ rules: [rule], source, intervalMs: 15 * SEC, now: () => 0 });
}

const latencyRule = compileRule('high_latency', { threshold: '0.5s', duration: '5m' });
const errorRule = compileRule('error_rate', { threshold: '5%', duration: '1m' });

// ---------------------------------------------------------------------------
// Absolute rules
// ---------------------------------------------------------------------------

describe('AlertEvaluator absolute rules', () => {
  it('fires only after the condition held for the full duration', async () => {
    const evaluator = makeEvaluator(latencyRule, scripted((_, now) => value(now, 0.6)));

    const first = await evaluator.evaluate(0);
    expect(first).toEqual([{ rule: 'high_latency', from: 'OK', to: 'PENDING', at: 0, value: 0.6 }]);

    for (let t = 15 * SEC; t < 300 * SEC; t += 15 * SEC) {
      expect(await evaluator.evaluate(t)).toEqual([]);
    }
    expect(evaluator.getState('high_latency')?.status).toBe('PENDING');

    const fired = await evaluator.evaluate(300 * SEC);
    expect(fired).toEqual([{ rule: 'high_latency', from: 'PENDING', to: 'FIRING', at: 300 * SEC, value: 0.6 }]);
    expect(evaluator.firing()).toEqual(['high_latency']);
  });

  it('does not fire on a single spike', async () => {
    const evaluator = makeEvaluator(latencyRule, scripted((_, now) => value(now, now === 0 ? 0.9 : 0.1)));

    for (let t = 0; t <= 600 * SEC; t += 15 * SEC) {
      await evaluator.evaluate(t);
    }
    const state = evaluator.getState('high_latency');
    expect(state?.status).toBe('OK');
    expect(state?.conditionSince).toBeNull();
    expect(evaluator.firing()).toEqual([]);
  });

  it('restarts the run after a dip below the threshold', async () => {
    const dipAt = 150 * SEC;
    const evaluator = makeEvaluator(latencyRule, scripted((_, now) => value(now, now === dipAt ? 0.2 : 0.7)));

    for (let t = 0; t <= 300 * SEC; t += 15 * SEC) {
      await evaluator.evaluate(t);
    }
    // Run restarted at 165s, so 300s is only 135s in
    expect(evaluator.getState('high_latency')?.status).toBe('PENDING');
    expect(evaluator.getState('high_latency')?.conditionSince).toBe(165 * SEC);

    await evaluator.evaluate(465 * SEC);
    expect(evaluator.getState('high_latency')?.status).toBe('FIRING');
  });

  it('does not re-fire while the condition stays true', async () => {
    const rule = compileRule('cpu', { threshold: 90, duration: 0 });
    const evaluator = makeEvaluator(rule, scripted((_, now) => value(now, 95)));

    expect((await evaluator.evaluate(0)).map(t => t.to)).toEqual(['FIRING']);
    expect(await evaluator.evaluate(15 * SEC)).toEqual([]);
    expect(await evaluator.evaluate(30 * SEC)).toEqual([]);
  });

  it('resolves once, then returns to OK', async () => {
    const rule = compileRule('cpu', { threshold: 90, duration: 0 });
    const evaluator = makeEvaluator(rule, scripted((_, now) => value(now, now === 0 ? 95 : 10)));

    await evaluator.evaluate(0);
    expect((await evaluator.evaluate(15 * SEC)).map(t => `${t.from}->${t.to}`)).toEqual(['FIRING->RESOLVED']);
    expect((await evaluator.evaluate(30 * SEC)).map(t => `${t.from}->${t.to}`)).toEqual(['RESOLVED->OK']);
    expect(await evaluator.evaluate(45 * SEC)).toEqual([]);
  });

  it('goes from RESOLVED back to PENDING when the condition returns', async () => {
    const values = new Map([[0, 1.0], [60 * SEC, 1.0], [75 * SEC, 0.1], [90 * SEC, 1.0]]);
    const rule = compileRule('slow', { threshold: '0.5s', duration: '1m' });
    const evaluator = makeEvaluator(rule, scripted((_, now) => value(now, values.get(now) ?? 0)));

    await evaluator.evaluate(0);
    await evaluator.evaluate(60 * SEC);
    expect(evaluator.getState('slow')?.status).toBe('FIRING');
    await evaluator.evaluate(75 * SEC);
    expect(evaluator.getState('slow')?.status).toBe('RESOLVED');
    expect((await evaluator.evaluate(90 * SEC)).map(t => `${t.from}->${t.to}`)).toEqual(['RESOLVED->PENDING']);
  });
});

// ---------------------------------------------------------------------------
// Ratio rules
// ---------------------------------------------------------------------------

describe('AlertEvaluator ratio rules', () => {
  // 25 requests per 15s tick; the t=0 sample falls out of the window at t=60s
  function errorSource(failures: number[]): MetricsSource {
    return scripted((_, now) => ratio(now, failures[now / (15 * SEC)] ?? 0, 25));
  }

  it('fires when failures over the window exceed the fraction', async () => {
    const evaluator = makeEvaluator(errorRule, errorSource([0, 2, 1, 2, 1]));

    for (let t = 0; t < 60 * SEC; t += 15 * SEC) {
      expect(await evaluator.evaluate(t)).toEqual([]);
    }
    // 6 failed of 100 in (0s, 60s]
    const fired = await evaluator.evaluate(60 * SEC);
    expect(fired).toEqual([{ rule: 'error_rate', from: 'OK', to: 'FIRING', at: 60 * SEC, value: 0.06 }]);
  });

  it('stays OK at 4 failures out of 100', async () => {
    const evaluator = makeEvaluator(errorRule, errorSource([0, 1, 1, 1, 1]));

    for (let t = 0; t <= 60 * SEC; t += 15 * SEC) {
      await evaluator.evaluate(t);
    }
    expect(evaluator.getState('error_rate')?.status).toBe('OK');
    expect(evaluator.getState('error_rate')?.lastValue).toBe(0.04);
  });

  it('waits for a full window before firing', async () => {
    const evaluator = makeEvaluator(errorRule, scripted((_, now) => ratio(now, 10, 20)));

    expect((await evaluator.evaluate(0)).map(t => t.to)).toEqual(['PENDING']);
    expect(await evaluator.evaluate(30 * SEC)).toEqual([]);
    expect((await evaluator.evaluate(60 * SEC)).map(t => t.to)).toEqual(['FIRING']);
  });

  it('fires on the first sample over the fraction when the duration is zero', async () => {
    const burstRule = compileRule('burst', { threshold: '5%', duration: '0s' });
    const failures = [50, 50, 0];
    const evaluator = makeEvaluator(burstRule, scripted((_, now) => ratio(now, failures[now / (15 * SEC)] ?? 0, 100)));

    expect(await evaluator.evaluate(0)).toEqual([{ rule: 'burst', from: 'OK', to: 'FIRING', at: 0, value: 0.5 }]);
    expect(await evaluator.evaluate(15 * SEC)).toEqual([]);
    expect((await evaluator.evaluate(30 * SEC)).map(t => t.to)).toEqual(['RESOLVED']);
  });

  it('treats a window with no requests as condition false', async () => {
    const evaluator = makeEvaluator(errorRule, scripted((_, now) => ratio(now, 0, 0)));

    await evaluator.evaluate(0);
    await evaluator.evaluate(60 * SEC);
    expect(evaluator.getState('error_rate')?.status).toBe('OK');
    expect(evaluator.getState('error_rate')?.lastValue).toBe(0);
  });
});

// ---------------------------------------------------------------------------
// Metrics source failures
// ---------------------------------------------------------------------------

describe('AlertEvaluator with an unavailable source', () => {
  it('holds state and keeps the run start while the condition is unknown', async () => {
    const down = new Set([15 * SEC, 30 * SEC]);
    const evaluator = makeEvaluator(latencyRule, scripted((_, now) => {
      if (down.has(now)) throw new AlertEvalError('no metrics target reachable');
      return value(now, 0.8);
    }));

    await evaluator.evaluate(0);
    expect(await evaluator.evaluate(15 * SEC)).toEqual([]);

    const state = evaluator.getState('high_latency');
    expect(state?.status).toBe('PENDING');
    expect(state?.conditionSince).toBe(0);
    expect(state?.lastError).toBe('no metrics target reachable');

    await evaluator.evaluate(30 * SEC);
    await evaluator.evaluate(300 * SEC);
    expect(evaluator.getState('high_latency')?.status).toBe('FIRING');
    expect(evaluator.getState('high_latency')?.lastError).toBeNull();
  });

  it('never resolves a FIRING rule on an outage', async () => {
    const rule = compileRule('cpu', { threshold: 90, duration: 0 });
    const evaluator = makeEvaluator(rule, scripted((_, now) => {
      if (now > 0) throw new AlertEvalError('scrape failed');
      return value(now, 99);
    }));

    await evaluator.evaluate(0);
    await evaluator.evaluate(15 * SEC);
    await evaluator.evaluate(30 * SEC);
    expect(evaluator.getState('cpu')?.status).toBe('FIRING');
  });
});

// ---------------------------------------------------------------------------
// Publishing and helpers
// ---------------------------------------------------------------------------

describe('AlertEvaluator subscribers', () => {
  it('receive each transition with the updated snapshot', async () => {
    const rule = compileRule('cpu', { threshold: 90, duration: 0 });
    const evaluator = makeEvaluator(rule, scripted((_, now) => value(now, 95)));
    const listener = vi.fn();
    evaluator.subscribe(listener);

    await evaluator.evaluate(0);

    expect(listener).toHaveBeenCalledTimes(1);
    const [transition, snapshot] = listener.mock.calls[0];
    expect(transition).toEqual({ rule: 'cpu', from: 'OK', to: 'FIRING', at: 0, value: 95 });
    expect(snapshot.states[0].status).toBe('FIRING');
    expect(Object.isFrozen(snapshot)).toBe(true);
  });

  it('stop receiving after unsubscribing', async () => {
    const rule = compileRule('cpu', { threshold: 90, duration: 0 });
    const evaluator = makeEvaluator(rule, scripted((_, now) => value(now, 95)));
    const listener = vi.fn();
    const unsubscribe = evaluator.subscribe(listener);
    unsubscribe();

    await evaluator.evaluate(0);
    expect(listener).not.toHaveBeenCalled();
  });
});

describe('tickInterval', () => {
  it('is bounded by the shortest rule duration', () => {
    expect(tickInterval([latencyRule, errorRule], 15 * SEC)).toBe(15 * SEC);
    expect(tickInterval([latencyRule, errorRule], 120 * SEC)).toBe(60 * SEC);
  });

  it('never drops below one second', () => {
    const fast = compileRule('fast', { threshold: 1, duration: '200ms' });
    expect(tickInterval([fast], 15 * SEC)).toBe(1 * SEC);
  });

  it('ignores zero-duration rules', () => {
    const instant = compileRule('instant', { threshold: 1, duration: 0 });
    expect(tickInterval([instant], 15 * SEC)).toBe(15 * SEC);
  });
});

describe('nextStatus', () => {
  it('follows the rule state machine', () => {
    expect(nextStatus('OK', true, false)).toBe('PENDING');
    expect(nextStatus('OK', true, true)).toBe('FIRING');
    expect(nextStatus('PENDING', false, false)).toBe('OK');
    expect(nextStatus('FIRING', true, false)).toBe('FIRING');
    expect(nextStatus('FIRING', false, false)).toBe('RESOLVED');
    expect(nextStatus('RESOLVED', false, false)).toBe('OK');
    expect(nextStatus('RESOLVED', true, false)).toBe('PENDING');
  });
});
