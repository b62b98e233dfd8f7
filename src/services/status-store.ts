/**
 * Status Store
 *
 * Publishes the latest status snapshot and health results to Redis so
 * dashboards and other tooling can read them without shelling out.
 *
 * Keys (JSON, expiring after `statusTtlSeconds`):
 *   fleet:status:latest   SystemStatus
 *   fleet:health:latest   HealthStatus[]
 */

import { Redis } from 'ioredis';
import type { Config } from '../config.js';
import { errorMessage } from '../errors.js';
import type { HealthStatus, SystemStatus } from '../types.js';
import { log } from '../logger.js';

export const STATUS_KEY = 'fleet:status:latest';
export const HEALTH_KEY = 'fleet:health:latest';

/** The slice of a Redis client the store needs */
export interface KeyValueSink {
  set(key: string, value: string, mode: 'EX', seconds: number): Promise<unknown>;
  disconnect(): void;
}

/** Wire form of a snapshot; the timestamp becomes an ISO string */
export function serializeStatus(status: SystemStatus): string {
  return JSON.stringify({ ...status, timestamp: status.timestamp.toISOString() });
}

export class StatusStore {
  private redis: KeyValueSink | null = null;
  private ttlSeconds: number;

  constructor(config: Config, sink?: KeyValueSink) {
    this.ttlSeconds = config.statusTtlSeconds;
    if (sink) {
      this.redis = sink;
    } else {
      this.initRedis(config);
    }
  }

  private initRedis(config: Config): void {
    if (!config.redisUrl) return;

    const redis = new Redis(config.redisUrl, {
      maxRetriesPerRequest: 1,
      connectTimeout: 5000,
      commandTimeout: 3000,
      lazyConnect: true,
      retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 200, 1000)),
    });

    redis.on('error', (err: Error) => {
      log(`[Store] Redis error: ${err.message}`);
    });

    this.redis = redis;
  }

  get enabled(): boolean {
    return this.redis !== null;
  }

  async saveStatus(status: SystemStatus): Promise<void> {
    await this.write(STATUS_KEY, serializeStatus(status));
  }

  async saveHealth(results: HealthStatus[]): Promise<void> {
    await this.write(HEALTH_KEY, JSON.stringify(results));
  }

  private async write(key: string, value: string): Promise<void> {
    if (!this.redis) return;
    try {
      await this.redis.set(key, value, 'EX', this.ttlSeconds);
      log(`[Store] Wrote ${key} (ttl ${this.ttlSeconds}s)`);
    } catch (err) {
      log(`[Store] Failed to write ${key}: ${errorMessage(err)}`);
    }
  }

  close(): void {
    if (this.redis) {
      this.redis.disconnect();
      this.redis = null;
    }
  }
}
