/**
 * HTTP health probe against one backend target.
 *
 * Never throws: timeouts, refused connections and non-2xx responses come
 * back as a failed HealthCheckResult carrying the ProbeError message.
 */

import { ProbeError, errorMessage } from '../errors.js';
import type { HealthCheckResult } from '../types.js';

export type ProbeFn = (address: string, path: string, timeoutMs: number) => Promise<HealthCheckResult>;

export interface ParsedAddress {
  host: string;
  port: number;
}

/** `host:port` (IPv6 hosts in brackets). Returns null when malformed. */
export function parseAddress(address: string): ParsedAddress | null {
  const match = /^(\[[0-9a-fA-F:.]+\]|[^\s:/[\]]+):(\d{1,5})$/.exec(address.trim());
  if (!match) return null;
  const port = parseInt(match[2], 10);
  if (port < 1 || port > 65535) return null;
  return { host: match[1], port };
}

export const httpProbe: ProbeFn = async (address, path, timeoutMs) => {
  const started = Date.now();
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const res = await fetch(`http://${address}${path}`, { signal: controller.signal });
    // Drain the body so the socket is released
    await res.arrayBuffer().catch(() => undefined);
    if (!res.ok) {
      throw new ProbeError('E_PROBE_FAILED', `HTTP ${res.status}`);
    }
    return { address, timestamp: Date.now(), ok: true, latencyMs: Date.now() - started };
  } catch (err) {
    const failure = controller.signal.aborted
      ? new ProbeError('E_PROBE_TIMEOUT', `timed out after ${timeoutMs}ms`)
      : err instanceof ProbeError
        ? err
        : new ProbeError('E_PROBE_FAILED', errorMessage(err), { cause: err });
    return {
      address,
      timestamp: Date.now(),
      ok: false,
      latencyMs: Date.now() - started,
      error: `${failure.code}: ${failure.message}`,
    };
  } finally {
    clearTimeout(timer);
  }
};
