import { describe, it, expect } from 'vitest';
import {
  DEFAULT_FAILED_METRIC,
  DEFAULT_TOTAL_METRIC,
  compileRule,
  compileRules,
  describeThreshold,
} from './rules.js';
import { ConfigError } from '../errors.js';

describe('compileRule', () => {
  it('compiles an absolute latency rule', () => {
    const rule = compileRule('high_latency', {
      threshold: '0.5s',
      duration: '5m',
      metric: 'http_request_duration_seconds{quantile="0.99"}',
    });
    expect(rule).toEqual({
      name: 'high_latency',
      metric: 'http_request_duration_seconds{quantile="0.99"}',
      totalMetric: null,
      threshold: { kind: 'absolute', value: 0.5 },
      durationMs: 300_000,
    });
    expect(Object.isFrozen(rule)).toBe(true);
  });

  it('defaults the metric of an absolute rule to its name', () => {
    expect(compileRule('queue_depth', { threshold: 100, duration: '1m' }).metric).toBe('queue_depth');
  });

  it('defaults percentage rules to the request counters', () => {
    const rule = compileRule('error_rate', { threshold: '5%', duration: '1m' });
    expect(rule.metric).toBe(DEFAULT_FAILED_METRIC);
    expect(rule.totalMetric).toBe(DEFAULT_TOTAL_METRIC);
    expect(rule.threshold).toEqual({ kind: 'ratio', fraction: 0.05 });
    expect(rule.durationMs).toBe(60_000);
  });

  it('rejects a bad threshold with a ConfigError', () => {
    expect(() => compileRule('x', { threshold: 'lots', duration: '1m' })).toThrow(ConfigError);
    expect(() => compileRule('x', { threshold: 'lots', duration: '1m' }))
      .toThrow('alert rule "x": invalid threshold "lots"');
  });

  it('rejects a bad duration', () => {
    expect(() => compileRule('x', { threshold: '5%', duration: 'soon' }))
      .toThrow('alert rule "x": invalid duration "soon"');
  });
});

describe('compileRules', () => {
  it('keeps document order', () => {
    const rules = compileRules({
      high_latency: { threshold: '0.5s', duration: '5m' },
      error_rate: { threshold: '5%', duration: '1m' },
    });
    expect(rules.map(r => r.name)).toEqual(['high_latency', 'error_rate']);
  });

  it('requires at least one rule', () => {
    expect(() => compileRules({})).toThrow('alert_rules must define at least one rule');
  });
});

describe('describeThreshold', () => {
  it('prints ratios as percentages', () => {
    expect(describeThreshold(compileRule('e', { threshold: '5%', duration: '1m' }))).toBe('> 5%');
    expect(describeThreshold(compileRule('l', { threshold: '0.5s', duration: '1m' }))).toBe('> 0.5');
  });
});
