/**
 * Metrics sources for the AlertEvaluator.
 *
 * The scrape source reads the Prometheus text exposition format from
 * `http://<target>/metrics` on every monitored target:
 *   - absolute rules take the highest value of the selected series
 *   - ratio rules sum the failed and total counters across targets and turn
 *     them into per-tick deltas
 *
 * A source that cannot produce a value throws AlertEvalError; the evaluator
 * treats that as "condition unknown".
 */

import { AlertEvalError, errorMessage } from '../errors.js';
import type { AlertRule, MetricSample } from '../types.js';
import { log } from '../logger.js';

const SCRAPE_TIMEOUT = 5_000;

export interface MetricsSource {
  sample(rule: AlertRule, now: number): Promise<MetricSample>;
}

export interface Selector {
  name: string;
  labels: Record<string, string>;
}

export interface Series {
  name: string;
  labels: Record<string, string>;
  value: number;
}

const LABEL_PAIR = /([a-zA-Z_][a-zA-Z0-9_]*)\s*=\s*"((?:[^"\\]|\\.)*)"/g;

function parseLabels(body: string): Record<string, string> {
  const labels: Record<string, string> = {};
  for (const match of body.matchAll(LABEL_PAIR)) {
    labels[match[1]] = match[2].replace(/\\(.)/g, (_, c: string) => (c === 'n' ? '\n' : c));
  }
  return labels;
}

/** `name{label="v"}` → selector. Returns null when malformed. */
export function parseSelector(text: string): Selector | null {
  const match = /^\s*([a-zA-Z_:][a-zA-Z0-9_:]*)\s*(?:\{(.*)\})?\s*$/.exec(text);
  if (!match) return null;
  return { name: match[1], labels: match[2] ? parseLabels(match[2]) : {} };
}

/** Parse Prometheus text exposition format. Comments and bad lines are skipped. */
export function parseExposition(text: string): Series[] {
  const series: Series[] = [];
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (!line || line.startsWith('#')) continue;

    const match = /^([a-zA-Z_:][a-zA-Z0-9_:]*)(?:\{(.*)\})?\s+(\S+)(?:\s+\d+)?$/.exec(line);
    if (!match) continue;

    const value = match[3] === '+Inf' ? Infinity : match[3] === '-Inf' ? -Infinity : parseFloat(match[3]);
    if (Number.isNaN(value)) continue;

    series.push({ name: match[1], labels: match[2] ? parseLabels(match[2]) : {}, value });
  }
  return series;
}

export function matchSeries(all: readonly Series[], selector: Selector): Series[] {
  return all.filter(s =>
    s.name === selector.name &&
    Object.entries(selector.labels).every(([k, v]) => s.labels[k] === v),
  );
}

export type FetchText = (url: string, timeoutMs: number) => Promise<string>;

const fetchText: FetchText = async (url, timeoutMs) => {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const res = await fetch(url, { signal: controller.signal });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    return await res.text();
  } finally {
    clearTimeout(timer);
  }
};

export class ScrapeMetricsSource implements MetricsSource {
  /** Last raw counter values per rule, for delta computation */
  private readonly counters = new Map<string, { failed: number; total: number }>();
  /** One scrape per evaluation tick, shared by every rule */
  private cached: { at: number; series: Promise<Series[]> } | null = null;

  constructor(
    private readonly targets: readonly string[],
    private readonly fetcher: FetchText = fetchText,
  ) {}

  private async scrapeAll(): Promise<Series[]> {
    const results = await Promise.allSettled(
      this.targets.map(t => this.fetcher(`http://${t}/metrics`, SCRAPE_TIMEOUT)),
    );

    const series: Series[] = [];
    let reachable = 0;
    results.forEach((r, i) => {
      if (r.status === 'fulfilled') {
        reachable++;
        series.push(...parseExposition(r.value));
      } else {
        log(`[Alerts] Scrape of ${this.targets[i]} failed: ${errorMessage(r.reason)}`);
      }
    });

    if (reachable === 0) {
      throw new AlertEvalError(`no metrics target reachable (${this.targets.join(', ')})`);
    }
    return series;
  }

  private scrape(now: number): Promise<Series[]> {
    if (this.cached?.at === now) return this.cached.series;
    const series = this.scrapeAll();
    this.cached = { at: now, series };
    return series;
  }

  async sample(rule: AlertRule, now: number): Promise<MetricSample> {
    const series = await this.scrape(now);

    const selector = parseSelector(rule.metric);
    if (!selector) throw new AlertEvalError(`rule "${rule.name}": bad selector "${rule.metric}"`);
    const matched = matchSeries(series, selector);
    if (matched.length === 0) throw new AlertEvalError(`rule "${rule.name}": no series for ${rule.metric}`);

    if (rule.threshold.kind === 'absolute' || rule.totalMetric === null) {
      return { kind: 'value', timestamp: now, value: Math.max(...matched.map(s => s.value)) };
    }

    const totalSelector = parseSelector(rule.totalMetric);
    if (!totalSelector) throw new AlertEvalError(`rule "${rule.name}": bad selector "${rule.totalMetric}"`);
    const totals = matchSeries(series, totalSelector);
    if (totals.length === 0) throw new AlertEvalError(`rule "${rule.name}": no series for ${rule.totalMetric}`);

    const current = {
      failed: matched.reduce((sum, s) => sum + s.value, 0),
      total: totals.reduce((sum, s) => sum + s.value, 0),
    };
    const previous = this.counters.get(rule.name);
    this.counters.set(rule.name, current);

    if (!previous) {
      // First scrape only establishes the counter baseline
      return { kind: 'ratio', timestamp: now, failed: 0, total: 0 };
    }

    return {
      kind: 'ratio',
      timestamp: now,
      failed: counterDelta(previous.failed, current.failed),
      total: counterDelta(previous.total, current.total),
    };
  }
}

/** Counter increase; a decrease means the counter was reset. */
export function counterDelta(previous: number, current: number): number {
  return current >= previous ? current - previous : current;
}
