/**
 * Event Publisher
 *
 * Writes orchestration events (role lifecycle, pool membership, alert
 * transitions) to Postgres so they can be shown on a status page.
 */

import pg from 'pg';
import type { Config } from '../config.js';
import type { Role } from '../types.js';
import { log } from '../logger.js';

const { Pool } = pg;

export type OrchestratorEventType =
  | 'ROLE_START'
  | 'ROLE_START_FAILED'
  | 'ROLE_STOP'
  | 'BACKEND_DOWN'
  | 'BACKEND_UP'
  | 'POOL_DEGRADED'
  | 'POOL_RECOVERED'
  | 'ALERT_FIRING'
  | 'ALERT_RESOLVED';

export type EventSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export interface OrchestratorEvent {
  eventType: OrchestratorEventType;
  role: Role;
  severity?: EventSeverity;
  subject?: string;
  message?: string;
  details?: Record<string, unknown>;
}

export interface EventSink {
  publish(event: OrchestratorEvent): Promise<void>;
  close(): Promise<void>;
}

/**
 * Event publisher that writes directly to Postgres.
 * Disabled when no URL is configured; never throws.
 */
export class EventPublisher implements EventSink {
  private pool: pg.Pool | null = null;
  private postgresAvailable = true;

  constructor(config: Config) {
    this.initPostgres(config);
  }

  private initPostgres(config: Config): void {
    if (!config.postgresUrl) {
      this.postgresAvailable = false;
      return;
    }

    try {
      this.pool = new Pool({
        connectionString: config.postgresUrl,
        max: 2,
        idleTimeoutMillis: 10_000,
        connectionTimeoutMillis: 5_000,
      });

      this.pool.on('error', (err) => {
        log(`[Events] Postgres pool error: ${err.message}`);
        this.postgresAvailable = false;
      });
    } catch (err) {
      log(`[Events] Failed to initialize Postgres: ${err}`);
      this.postgresAvailable = false;
    }
  }

  get enabled(): boolean {
    return this.pool !== null && this.postgresAvailable;
  }

  async publish(event: OrchestratorEvent): Promise<void> {
    if (!this.pool || !this.postgresAvailable) return;

    try {
      await this.pool.query(
        `INSERT INTO orchestrator_events
         (event_type, role, severity, subject, message, details)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          event.eventType,
          event.role,
          event.severity ?? 'INFO',
          event.subject ?? null,
          event.message ?? null,
          event.details ? JSON.stringify(event.details) : null,
        ],
      );
    } catch (err) {
      if (err instanceof Error && err.message.includes('does not exist')) {
        log('[Events] orchestrator_events table does not exist, disabling event publishing');
        this.postgresAvailable = false;
      } else {
        log(`[Events] Failed to publish ${event.eventType}: ${err}`);
      }
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
