/**
 * State Store
 *
 * Shares HealthChecker and AlertEvaluator snapshots with `status`
 * invocations running in other processes. Backed by Redis when REDIS_URL is
 * set, otherwise by JSON files in the state directory.
 *
 * Keys:
 *   orchestrator:<role>:health   PoolSnapshot JSON   (<stateDir>/<role>.health.json)
 *   orchestrator:<role>:alerts   AlertSnapshot JSON  (<stateDir>/<role>.alerts.json)
 */

import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { Redis } from 'ioredis';
import { z } from 'zod';
import type { Config } from '../config.js';
import { errorMessage } from '../errors.js';
import type { AlertSnapshot, PoolSnapshot, Role } from '../types.js';
import { log } from '../logger.js';

/** Snapshots outlive their writer by this long before Redis drops them */
const SNAPSHOT_TTL_SECONDS = 24 * 60 * 60;

const BackendTargetSchema = z.object({
  address: z.string(),
  consecutiveFailures: z.number(),
  consecutiveSuccesses: z.number(),
  state: z.enum(['HEALTHY', 'UNHEALTHY']),
  lastCheckedAt: z.string().nullable(),
  lastLatencyMs: z.number().nullable(),
  lastError: z.string().nullable(),
});

const PoolSnapshotSchema = z.object({
  targets: z.array(BackendTargetSchema),
  eligible: z.array(z.string()),
  degraded: z.boolean(),
  updatedAt: z.string(),
});

const AlertSnapshotSchema = z.object({
  states: z.array(z.object({
    rule: z.string(),
    status: z.enum(['OK', 'PENDING', 'FIRING', 'RESOLVED']),
    conditionSince: z.number().nullable(),
    lastValue: z.number().nullable(),
    lastEvaluatedAt: z.number().nullable(),
    lastError: z.string().nullable(),
  })),
  updatedAt: z.string(),
});

export interface StateStore {
  saveHealth(role: Role, snapshot: PoolSnapshot): Promise<void>;
  loadHealth(role: Role): Promise<PoolSnapshot | null>;
  saveAlerts(role: Role, snapshot: AlertSnapshot): Promise<void>;
  loadAlerts(role: Role): Promise<AlertSnapshot | null>;
  clear(role: Role): Promise<void>;
  close(): Promise<void>;
}

function healthKey(role: Role): string {
  return `orchestrator:${role}:health`;
}

function alertsKey(role: Role): string {
  return `orchestrator:${role}:alerts`;
}

function decode<T>(raw: string | null, schema: z.ZodType<T>): T | null {
  if (!raw) return null;
  try {
    const parsed = schema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export class MemoryStateStore implements StateStore {
  private readonly entries = new Map<string, string>();

  async saveHealth(role: Role, snapshot: PoolSnapshot): Promise<void> {
    this.entries.set(healthKey(role), JSON.stringify(snapshot));
  }

  async loadHealth(role: Role): Promise<PoolSnapshot | null> {
    return decode(this.entries.get(healthKey(role)) ?? null, PoolSnapshotSchema);
  }

  async saveAlerts(role: Role, snapshot: AlertSnapshot): Promise<void> {
    this.entries.set(alertsKey(role), JSON.stringify(snapshot));
  }

  async loadAlerts(role: Role): Promise<AlertSnapshot | null> {
    return decode(this.entries.get(alertsKey(role)) ?? null, AlertSnapshotSchema);
  }

  async clear(role: Role): Promise<void> {
    this.entries.delete(healthKey(role));
    this.entries.delete(alertsKey(role));
  }

  async close(): Promise<void> {
    this.entries.clear();
  }
}

/**
 * File-backed store under the state directory, next to the handle records.
 * Writes go through a temporary file and a rename, one at a time, so a
 * reader never sees a partial or out-of-order snapshot.
 */
export class FileStateStore implements StateStore {
  private writes: Promise<void> = Promise.resolve();
  private seq = 0;

  constructor(private readonly stateDir: string) {}

  private file(role: Role, kind: 'health' | 'alerts'): string {
    return path.join(this.stateDir, `${role}.${kind}.json`);
  }

  private write(file: string, value: unknown): Promise<void> {
    const body = JSON.stringify(value);
    const next = this.writes.then(async () => {
      const tmp = `${file}.${process.pid}.${this.seq++}.tmp`;
      try {
        await mkdir(this.stateDir, { recursive: true });
        await writeFile(tmp, body);
        await rename(tmp, file);
      } catch (err) {
        log(`[StateStore] Failed to write ${file}: ${errorMessage(err)}`);
        await rm(tmp, { force: true }).catch((rmErr: unknown) => {
          log(`[StateStore] Failed to remove ${tmp}: ${errorMessage(rmErr)}`);
        });
      }
    });
    this.writes = next;
    return next;
  }

  private async read(file: string): Promise<string | null> {
    try {
      return await readFile(file, 'utf8');
    } catch (err) {
      if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return null;
      log(`[StateStore] Failed to read ${file}: ${errorMessage(err)}`);
      return null;
    }
  }

  async saveHealth(role: Role, snapshot: PoolSnapshot): Promise<void> {
    await this.write(this.file(role, 'health'), snapshot);
  }

  async loadHealth(role: Role): Promise<PoolSnapshot | null> {
    await this.writes;
    return decode(await this.read(this.file(role, 'health')), PoolSnapshotSchema);
  }

  async saveAlerts(role: Role, snapshot: AlertSnapshot): Promise<void> {
    await this.write(this.file(role, 'alerts'), snapshot);
  }

  async loadAlerts(role: Role): Promise<AlertSnapshot | null> {
    await this.writes;
    return decode(await this.read(this.file(role, 'alerts')), AlertSnapshotSchema);
  }

  async clear(role: Role): Promise<void> {
    await this.writes;
    await rm(this.file(role, 'health'), { force: true });
    await rm(this.file(role, 'alerts'), { force: true });
  }

  async close(): Promise<void> {
    await this.writes;
  }
}

/**
 * Redis-backed store. Connection problems are logged and make reads return
 * null; they never fail the orchestration action.
 */
export class RedisStateStore implements StateStore {
  private redis: Redis;
  private redisAvailable = true;

  constructor(redisUrl: string) {
    this.redis = new Redis(redisUrl, {
      maxRetriesPerRequest: 1,
      connectTimeout: 5000,
      commandTimeout: 3000,
      lazyConnect: true,
      retryStrategy: (times: number) => {
        if (times > 3) {
          log('[StateStore] Redis connection failed, snapshots will not be shared');
          return null;
        }
        return Math.min(times * 200, 1000);
      },
    });

    this.redis.on('error', (err: Error) => {
      if (this.redisAvailable) {
        log(`[StateStore] Redis error: ${err.message}`);
        this.redisAvailable = false;
      }
    });

    this.redis.on('connect', () => {
      if (!this.redisAvailable) log('[StateStore] Redis reconnected');
      this.redisAvailable = true;
    });
  }

  private async write(key: string, value: unknown): Promise<void> {
    try {
      await this.redis.set(key, JSON.stringify(value), 'EX', SNAPSHOT_TTL_SECONDS);
    } catch (err) {
      log(`[StateStore] Failed to write ${key}: ${err}`);
    }
  }

  private async read(key: string): Promise<string | null> {
    try {
      return await this.redis.get(key);
    } catch (err) {
      log(`[StateStore] Failed to read ${key}: ${err}`);
      return null;
    }
  }

  async saveHealth(role: Role, snapshot: PoolSnapshot): Promise<void> {
    await this.write(healthKey(role), snapshot);
  }

  async loadHealth(role: Role): Promise<PoolSnapshot | null> {
    return decode(await this.read(healthKey(role)), PoolSnapshotSchema);
  }

  async saveAlerts(role: Role, snapshot: AlertSnapshot): Promise<void> {
    await this.write(alertsKey(role), snapshot);
  }

  async loadAlerts(role: Role): Promise<AlertSnapshot | null> {
    return decode(await this.read(alertsKey(role)), AlertSnapshotSchema);
  }

  async clear(role: Role): Promise<void> {
    try {
      await this.redis.del(healthKey(role), alertsKey(role));
    } catch (err) {
      log(`[StateStore] Failed to clear ${role}: ${err}`);
    }
  }

  async close(): Promise<void> {
    this.redis.disconnect();
  }
}

export function createStateStore(config: Config, stateDir: string): StateStore {
  return config.redisUrl ? new RedisStateStore(config.redisUrl) : new FileStateStore(stateDir);
}
