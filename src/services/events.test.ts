import { describe, it, expect, beforeEach } from 'vitest';
import { EventPublisher, type EventSink } from './events.js';
import { loadConfig } from '../config.js';

class FakeSink implements EventSink {
  rows: unknown[][] = [];
  ended = false;
  failWith: Error | null = null;

  async query(_text: string, values: unknown[]): Promise<unknown> {
    if (this.failWith) throw this.failWith;
    this.rows.push(values);
    return { rowCount: 1 };
  }

  async end(): Promise<void> {
    this.ended = true;
  }
}

const config = loadConfig({});

let sink: FakeSink;
let publisher: EventPublisher;

beforeEach(() => {
  sink = new FakeSink();
  publisher = new EventPublisher(config, sink);
});

describe('EventPublisher.publishLifecycle()', () => {
  it('records a successful start', async () => {
    await publisher.publishLifecycle('START', ['pds', 'plc']);

    expect(sink.rows).toEqual([
      ['FLEET_START', 'INFO', ['pds', 'plc'], true, 'start completed: pds, plc', null],
    ]);
  });

  it('records a purge as critical', async () => {
    await publisher.publishLifecycle('PURGE', []);

    expect(sink.rows[0].slice(0, 5)).toEqual(['FLEET_PURGE', 'CRITICAL', [], true, 'purge completed: all services']);
  });

  it('records a failure with its error', async () => {
    await publisher.publishLifecycle('STOP', [], 'docker down exited with code 1');

    expect(sink.rows).toEqual([
      [
        'FLEET_STOP_FAILED',
        'CRITICAL',
        [],
        false,
        'stop failed: docker down exited with code 1',
        JSON.stringify({ error: 'docker down exited with code 1' }),
      ],
    ]);
  });
});

describe('EventPublisher failures', () => {
  it('swallows write errors', async () => {
    sink.failWith = new Error('connection refused');

    await expect(publisher.publishLifecycle('START', [])).resolves.toBeUndefined();
  });

  it('stops publishing once the table is found missing', async () => {
    sink.failWith = new Error('relation "fleet_events" does not exist');
    await publisher.publishLifecycle('START', []);

    sink.failWith = null;
    await publisher.publishLifecycle('STOP', []);

    expect(sink.rows).toHaveLength(0);
  });

  it('is a no-op without a database URL', async () => {
    const disabled = new EventPublisher(config);

    await expect(disabled.publishLifecycle('START', [])).resolves.toBeUndefined();
    await disabled.close();
  });

  it('closes the sink', async () => {
    await publisher.close();

    expect(sink.ended).toBe(true);
  });
});
