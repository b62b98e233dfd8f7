import { describe, it, expect, beforeEach } from 'vitest';
import { StatusStore, STATUS_KEY, HEALTH_KEY, serializeStatus, type KeyValueSink } from './status-store.js';
import { loadConfig } from '../config.js';
import { StatusAggregator } from '../status/aggregator.js';

class FakeRedis implements KeyValueSink {
  writes: Array<{ key: string; value: string; seconds: number }> = [];
  disconnected = false;
  fail = false;

  async set(key: string, value: string, _mode: 'EX', seconds: number): Promise<unknown> {
    if (this.fail) throw new Error('Connection is closed.');
    this.writes.push({ key, value, seconds });
    return 'OK';
  }

  disconnect(): void {
    this.disconnected = true;
  }
}

const config = loadConfig({ FLEET_STATUS_TTL_SECONDS: '120' });

let redis: FakeRedis;
let store: StatusStore;

beforeEach(() => {
  redis = new FakeRedis();
  store = new StatusStore(config, redis);
});

async function sampleStatus() {
  const aggregator = new StatusAggregator({
    queryTopology: async () => ({
      states: new Map([['pds', { running: true, state: 'running', ports: ['3000:3000'] }]]),
      droppedLines: 0,
    }),
  });
  return aggregator.snapshot(true);
}

describe('StatusStore', () => {
  it('writes the snapshot with an ISO timestamp and TTL', async () => {
    const status = await sampleStatus();

    await store.saveStatus(status);

    expect(redis.writes).toHaveLength(1);
    expect(redis.writes[0].key).toBe(STATUS_KEY);
    expect(redis.writes[0].seconds).toBe(120);

    const stored = JSON.parse(redis.writes[0].value);
    expect(stored.timestamp).toBe(status.timestamp.toISOString());
    expect(stored.services.pds).toEqual({
      name: 'pds',
      running: true,
      healthy: false,
      details: { state: 'running', port_0: '3000:3000' },
    });
    expect(stored.services.plc.running).toBe(false);
  });

  it('writes health results', async () => {
    await store.saveHealth([{ service: 'pds', status: 'Healthy', latencyMs: 8 }]);

    expect(redis.writes[0]).toEqual({
      key: HEALTH_KEY,
      value: '[{"service":"pds","status":"Healthy","latencyMs":8}]',
      seconds: 120,
    });
  });

  it('swallows write errors', async () => {
    redis.fail = true;

    await expect(store.saveHealth([])).resolves.toBeUndefined();
  });

  it('is disabled without a Redis URL', async () => {
    const disabled = new StatusStore(loadConfig({}));

    expect(disabled.enabled).toBe(false);
    await expect(disabled.saveStatus(await sampleStatus())).resolves.toBeUndefined();
  });

  it('disconnects on close', () => {
    store.close();

    expect(redis.disconnected).toBe(true);
    expect(store.enabled).toBe(false);
  });
});

describe('serializeStatus()', () => {
  it('round-trips the catalog keys', async () => {
    const status = await sampleStatus();

    expect(Object.keys(JSON.parse(serializeStatus(status)).services)).toEqual(Object.keys(status.services));
  });
});
