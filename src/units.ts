/**
 * Duration and threshold parsing for config documents.
 *
 *   parseDuration('5s')     → 5000
 *   parseDuration('1m30s')  → 90000
 *   parseThreshold('5%')    → { kind: 'ratio', fraction: 0.05 }
 *   parseThreshold('0.5s')  → { kind: 'absolute', value: 0.5 }   (seconds)
 */

import type { AlertThreshold } from './types.js';

const UNIT_MS: Record<string, number> = {
  ms: 1,
  s: 1_000,
  m: 60_000,
  h: 3_600_000,
  d: 86_400_000,
};

const SEGMENT = /(\d+(?:\.\d+)?)(ms|s|m|h|d)/g;
const WHOLE = /^(?:\d+(?:\.\d+)?(?:ms|s|m|h|d))+$/;

/**
 * Parse a duration string into milliseconds. Bare numbers are seconds.
 * Returns null when the value is not a duration.
 */
export function parseDuration(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value >= 0 ? value * 1000 : null;
  }

  const text = value.trim();
  if (/^\d+(?:\.\d+)?$/.test(text)) return parseFloat(text) * 1000;
  if (!WHOLE.test(text)) return null;

  let total = 0;
  for (const match of text.matchAll(SEGMENT)) {
    total += parseFloat(match[1]) * UNIT_MS[match[2]];
  }
  return total;
}

export function isDuration(value: string | number): boolean {
  return parseDuration(value) !== null;
}

/**
 * Parse an alert threshold. Percentages become ratio thresholds; durations
 * and plain numbers become absolute thresholds expressed in seconds/units.
 */
export function parseThreshold(value: string | number): AlertThreshold | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? { kind: 'absolute', value } : null;
  }

  const text = value.trim();
  const pct = /^(\d+(?:\.\d+)?)\s*%$/.exec(text);
  if (pct) {
    const percent = parseFloat(pct[1]);
    return percent <= 100 ? { kind: 'ratio', fraction: percent / 100 } : null;
  }

  if (/^-?\d+(?:\.\d+)?$/.test(text)) return { kind: 'absolute', value: parseFloat(text) };

  const ms = parseDuration(text);
  return ms === null ? null : { kind: 'absolute', value: ms / 1000 };
}

/** `90000` → `1m30s`, for log lines. */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  const parts: string[] = [];
  let rest = Math.round(ms / 1000);
  for (const [unit, size] of [['h', 3600], ['m', 60], ['s', 1]] as const) {
    const n = Math.floor(rest / size);
    if (n > 0) parts.push(`${n}${unit}`);
    rest -= n * size;
  }
  return parts.join('');
}
