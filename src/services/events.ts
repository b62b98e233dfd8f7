/**
 * Event Publisher
 *
 * Writes lifecycle events (start, stop, purge) to Postgres so operators have
 * a record of what was done to the stack and when. Schema: sql/fleet_events.sql.
 */

import pg from 'pg';
import type { Config } from '../config.js';
import { errorMessage } from '../errors.js';
import { log } from '../logger.js';

const { Pool } = pg;

export type LifecycleAction = 'START' | 'STOP' | 'PURGE';

export type FleetEventType = `FLEET_${LifecycleAction}` | `FLEET_${LifecycleAction}_FAILED`;

export type EventSeverity = 'INFO' | 'WARNING' | 'CRITICAL';

export interface FleetEvent {
  eventType: FleetEventType;
  severity?: EventSeverity;
  services?: string[];
  success?: boolean;
  message?: string;
  details?: Record<string, unknown>;
}

/** The slice of a pg pool the publisher needs */
export interface EventSink {
  query(text: string, values: unknown[]): Promise<unknown>;
  end(): Promise<void>;
}

const SEVERITY: Record<LifecycleAction, EventSeverity> = {
  START: 'INFO',
  STOP: 'WARNING',
  PURGE: 'CRITICAL',
};

/**
 * Event publisher backed by Postgres.
 * Publishing never throws; an unavailable database only disables it.
 */
export class EventPublisher {
  private sink: EventSink | null = null;
  private available = true;

  constructor(config: Config, sink?: EventSink) {
    if (sink) {
      this.sink = sink;
    } else {
      this.initPostgres(config);
    }
  }

  private initPostgres(config: Config): void {
    if (!config.postgresUrl) {
      this.available = false;
      return;
    }

    const pool = new Pool({
      connectionString: config.postgresUrl,
      max: 2,
      idleTimeoutMillis: 10_000,
      connectionTimeoutMillis: 5_000,
    });

    pool.on('error', (err) => {
      log(`[Events] Postgres pool error: ${err.message}`);
      this.available = false;
    });

    this.sink = {
      query: (text, values) => pool.query(text, values),
      end: () => pool.end(),
    };
  }

  async publish(event: FleetEvent): Promise<void> {
    if (!this.sink || !this.available) return;

    try {
      await this.sink.query(
        `INSERT INTO fleet_events
         (event_type, severity, services, success, message, details)
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          event.eventType,
          event.severity ?? 'INFO',
          event.services ?? null,
          event.success ?? null,
          event.message ?? null,
          event.details ? JSON.stringify(event.details) : null,
        ],
      );
      log(`[Events] Published ${event.eventType}`);
    } catch (err) {
      const message = errorMessage(err);
      if (message.includes('does not exist')) {
        log('[Events] fleet_events table does not exist, disabling event publishing');
        this.available = false;
      } else {
        log(`[Events] Failed to publish event: ${message}`);
      }
    }
  }

  async publishLifecycle(
    action: LifecycleAction,
    services: readonly string[],
    error?: string,
  ): Promise<void> {
    const success = error === undefined;
    const scope = services.length > 0 ? services.join(', ') : 'all services';

    await this.publish({
      eventType: success ? `FLEET_${action}` : `FLEET_${action}_FAILED`,
      severity: success ? SEVERITY[action] : 'CRITICAL',
      services: [...services],
      success,
      message: success
        ? `${action.toLowerCase()} completed: ${scope}`
        : `${action.toLowerCase()} failed: ${error}`,
      details: error ? { error } : undefined,
    });
  }

  async close(): Promise<void> {
    if (this.sink) {
      await this.sink.end();
      this.sink = null;
    }
  }
}
