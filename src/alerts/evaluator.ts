/**
 * Alert Evaluator
 *
 * Evaluates threshold + duration rules against a metrics source on a fixed
 * tick and drives each rule through OK → PENDING → FIRING → RESOLVED → OK.
 *
 * Absolute rules fire once the value has exceeded the threshold on every
 * sample for the whole duration. Ratio rules (percent thresholds) compare
 * Σfailed / Σtotal over the trailing duration window, and only once the
 * window has been observed in full.
 *
 * A failing metrics source makes the rule's condition unknown: no
 * transition happens in either direction.
 */

import type {
  AlertRule,
  AlertSnapshot,
  AlertState,
  AlertStatus,
  AlertTransition,
  MetricSample,
} from '../types.js';
import { errorMessage } from '../errors.js';
import type { MetricsSource } from './metrics-source.js';
import { describeThreshold } from './rules.js';
import { formatDuration } from '../units.js';
import { log } from '../logger.js';

const MIN_TICK_MS = 1_000;

export interface AlertEvaluatorOptions {
  rules: readonly AlertRule[];
  source: MetricsSource;
  /** Configured evaluation interval; the tick never exceeds the shortest rule duration */
  intervalMs: number;
  now?: () => number;
}

export type TransitionListener = (transition: AlertTransition, snapshot: AlertSnapshot) => void;

interface RatioPoint {
  timestamp: number;
  failed: number;
  total: number;
}

/** Tick length: the evaluation interval, bounded by the shortest rule duration. */
export function tickInterval(rules: readonly AlertRule[], intervalMs: number): number {
  const durations = rules.map(r => r.durationMs).filter(d => d > 0);
  const bound = durations.length > 0 ? Math.min(intervalMs, ...durations) : intervalMs;
  return Math.max(MIN_TICK_MS, bound);
}

function initialState(rule: AlertRule): AlertState {
  return Object.freeze({
    rule: rule.name,
    status: 'OK',
    conditionSince: null,
    lastValue: null,
    lastEvaluatedAt: null,
    lastError: null,
  });
}

export class AlertEvaluator {
  private readonly states = new Map<string, AlertState>();
  private readonly windows = new Map<string, RatioPoint[]>();
  /** First sample time per ratio rule; the window is complete `durationMs` after it */
  private readonly observedSince = new Map<string, number>();
  private readonly listeners = new Set<TransitionListener>();
  private readonly now: () => number;
  readonly tickMs: number;

  private snapshot: AlertSnapshot;
  private running = false;
  private timer: ReturnType<typeof setTimeout> | null = null;
  private currentTick: Promise<void> | null = null;

  constructor(private readonly options: AlertEvaluatorOptions) {
    for (const rule of options.rules) {
      this.states.set(rule.name, initialState(rule));
    }
    this.now = options.now ?? Date.now;
    this.tickMs = tickInterval(options.rules, options.intervalMs);
    this.snapshot = this.buildSnapshot();
  }

  // ── Loop control ──────────────────────────────────────────────────────────

  start(): void {
    if (this.running) return;
    this.running = true;
    log(`[Alerts] Evaluating ${this.options.rules.length} rule(s) every ${formatDuration(this.tickMs)}`);
    for (const rule of this.options.rules) {
      log(`[Alerts]   ${rule.name}: ${rule.metric} ${describeThreshold(rule)} for ${formatDuration(rule.durationMs)}`);
    }
    this.scheduleNext(0);
  }

  /** Stop ticking; resolves once the in-progress evaluation finishes. */
  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    if (this.currentTick) await this.currentTick;
    log('[Alerts] Evaluator stopped');
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
      await this.evaluate();
    } catch (err) {
      log(`[Alerts] Unexpected evaluation error: ${errorMessage(err)}`);
    } finally {
      this.currentTick = null;
      this.scheduleNext(this.tickMs);
    }
  }

  // ── Evaluation ────────────────────────────────────────────────────────────

  /**
   * Run one evaluation of every rule at `now`. Samples are pulled in
   * parallel and applied in rule order. Returns the transitions made.
   */
  async evaluate(now = this.now()): Promise<AlertTransition[]> {
    const rules = this.options.rules;
    const samples = await Promise.allSettled(rules.map(rule => this.options.source.sample(rule, now)));

    const transitions: AlertTransition[] = [];
    rules.forEach((rule, i) => {
      const outcome = samples[i];
      const transition = outcome.status === 'fulfilled'
        ? this.apply(rule, outcome.value, now)
        : this.markUnknown(rule, outcome.reason, now);
      if (transition) transitions.push(transition);
    });

    this.snapshot = this.buildSnapshot();
    for (const transition of transitions) this.publish(transition);
    return transitions;
  }

  private markUnknown(rule: AlertRule, reason: unknown, now: number): null {
    const prev = this.state(rule);
    const message = errorMessage(reason);
    if (prev.lastError !== message) {
      log(`[Alerts] ${rule.name}: condition unknown (${message}), holding ${prev.status}`);
    }
    this.states.set(rule.name, Object.freeze({ ...prev, lastEvaluatedAt: now, lastError: message }));
    return null;
  }

  private apply(rule: AlertRule, sample: MetricSample, now: number): AlertTransition | null {
    const prev = this.state(rule);

    let exceeded: boolean;
    let ready: boolean;
    let value: number;

    if (rule.threshold.kind === 'ratio') {
      const window = this.addToWindow(rule, sample, now);
      const failed = window.reduce((sum, p) => sum + p.failed, 0);
      const total = window.reduce((sum, p) => sum + p.total, 0);
      value = total > 0 ? failed / total : 0;
      exceeded = total > 0 && value > rule.threshold.fraction;
      // The window already spans the duration; it only has to be complete
      ready = now - (this.observedSince.get(rule.name) ?? now) >= rule.durationMs;
    } else {
      value = sample.kind === 'value' ? sample.value : sample.total > 0 ? sample.failed / sample.total : 0;
      exceeded = value > rule.threshold.value;
      const since = exceeded ? prev.conditionSince ?? now : null;
      ready = since !== null && now - since >= rule.durationMs;
    }

    const conditionSince = exceeded ? prev.conditionSince ?? now : null;
    const status = nextStatus(prev.status, exceeded, ready);

    this.states.set(rule.name, Object.freeze({
      rule: rule.name,
      status,
      conditionSince,
      lastValue: value,
      lastEvaluatedAt: now,
      lastError: null,
    }));

    if (status === prev.status) return null;
    log(`[Alerts] ${rule.name}: ${prev.status} → ${status} (value ${round(value)}, threshold ${describeThreshold(rule)})`);
    return { rule: rule.name, from: prev.status, to: status, at: now, value };
  }

  private addToWindow(rule: AlertRule, sample: MetricSample, now: number): RatioPoint[] {
    if (!this.observedSince.has(rule.name)) this.observedSince.set(rule.name, now);

    const point: RatioPoint = sample.kind === 'ratio'
      ? { timestamp: sample.timestamp, failed: sample.failed, total: sample.total }
      : { timestamp: sample.timestamp, failed: sample.value, total: 1 };

    // Keep samples inside (now - duration, now]; the current one always counts
    const cutoff = now - rule.durationMs;
    const window = [...(this.windows.get(rule.name) ?? []), point].filter(p => p === point || p.timestamp > cutoff);
    this.windows.set(rule.name, window);
    return window;
  }

  private state(rule: AlertRule): AlertState {
    return this.states.get(rule.name) ?? initialState(rule);
  }

  // ── Snapshots ─────────────────────────────────────────────────────────────

  private buildSnapshot(): AlertSnapshot {
    const states = this.options.rules.map(r => this.state(r));
    return Object.freeze({ states: Object.freeze(states), updatedAt: new Date(this.now()).toISOString() });
  }

  getSnapshot(): AlertSnapshot {
    return this.snapshot;
  }

  getState(ruleName: string): AlertState | undefined {
    return this.states.get(ruleName);
  }

  firing(): string[] {
    return this.snapshot.states.filter(s => s.status === 'FIRING').map(s => s.rule);
  }

  subscribe(listener: TransitionListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private publish(transition: AlertTransition): void {
    for (const listener of this.listeners) {
      try {
        listener(transition, this.snapshot);
      } catch (err) {
        log(`[Alerts] Listener failed: ${errorMessage(err)}`);
      }
    }
  }
}

/**
 * Rule state machine.
 *
 *   exceeded & ready     → FIRING (stays FIRING, never re-fires)
 *   exceeded & !ready    → PENDING (FIRING stays FIRING)
 *   !exceeded from FIRING   → RESOLVED
 *   !exceeded otherwise     → OK
 */
export function nextStatus(current: AlertStatus, exceeded: boolean, ready: boolean): AlertStatus {
  if (exceeded) {
    if (current === 'FIRING') return 'FIRING';
    return ready ? 'FIRING' : 'PENDING';
  }
  return current === 'FIRING' ? 'RESOLVED' : 'OK';
}

function round(value: number): number {
  return Math.round(value * 10_000) / 10_000;
}
