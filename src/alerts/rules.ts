/**
 * Alert rule compilation.
 *
 * Turns the `alert_rules` map of a monitoring document into immutable
 * AlertRule records:
 *
 *   { "high_latency": { "threshold": "0.5s", "duration": "5m",
 *                       "metric": "http_request_duration_seconds" },
 *     "error_rate":   { "threshold": "5%",   "duration": "1m" } }
 */

import { ConfigError } from '../errors.js';
import type { AlertRule } from '../types.js';
import { parseDuration, parseThreshold } from '../units.js';

export interface AlertRuleSpec {
  threshold: string | number;
  duration: string | number;
  metric?: string;
  total_metric?: string;
}

/** Counters read by percentage rules when the document names none */
export const DEFAULT_FAILED_METRIC = 'http_requests_failed_total';
export const DEFAULT_TOTAL_METRIC = 'http_requests_total';

export function compileRule(name: string, spec: AlertRuleSpec): AlertRule {
  const threshold = parseThreshold(spec.threshold);
  if (!threshold) {
    throw new ConfigError('E_CONFIG_INVALID', `alert rule "${name}": invalid threshold "${spec.threshold}"`);
  }

  const durationMs = parseDuration(spec.duration);
  if (durationMs === null) {
    throw new ConfigError('E_CONFIG_INVALID', `alert rule "${name}": invalid duration "${spec.duration}"`);
  }

  if (threshold.kind === 'ratio') {
    return Object.freeze({
      name,
      metric: spec.metric ?? DEFAULT_FAILED_METRIC,
      totalMetric: spec.total_metric ?? DEFAULT_TOTAL_METRIC,
      threshold,
      durationMs,
    });
  }

  return Object.freeze({
    name,
    metric: spec.metric ?? name,
    totalMetric: null,
    threshold,
    durationMs,
  });
}

export function compileRules(specs: Readonly<Record<string, AlertRuleSpec>>): AlertRule[] {
  const names = Object.keys(specs);
  if (names.length === 0) {
    throw new ConfigError('E_CONFIG_INVALID', 'alert_rules must define at least one rule');
  }
  return names.map(name => compileRule(name, specs[name]));
}

/** Human-readable threshold, e.g. `> 5%` or `> 0.5`. */
export function describeThreshold(rule: AlertRule): string {
  return rule.threshold.kind === 'ratio'
    ? `> ${+(rule.threshold.fraction * 100).toFixed(4)}%`
    : `> ${rule.threshold.value}`;
}
