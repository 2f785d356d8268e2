/**
 * Monitoring Pipeline Tests
 *
 * End-to-end through reconciler, history writer and dispatcher with an
 * in-memory repository, a fake poll-only connector and a recording handler.
 */

import { describe, it, expect } from 'vitest';
import type {
  NotificationEvent,
  Observation,
  ObservationKind,
  SessionSnapshot,
} from '@reelwatch/shared';
import { MonitoringPipeline, type MonitoringPipelineOptions } from '../pipeline.js';
import { MemoryHistoryRepository } from '../../services/history/repository.js';
import type { NotificationHandler } from '../../services/notifications/types.js';
import { ValidationError } from '../../utils/errors.js';
import { FakeMediaServerClient } from '../../test/fakeClient.js';
import { at, createMockSnapshot, T0 } from '../../test/fixtures.js';

class RecordingHandler implements NotificationHandler {
  readonly name = 'recorder';
  readonly events: NotificationEvent[] = [];

  async send(event: NotificationEvent): Promise<void> {
    this.events.push(event);
  }

  get actions(): string[] {
    return this.events.map((e) => e.action);
  }
}

function createPipeline(overrides: Partial<MonitoringPipelineOptions> = {}) {
  const client = new FakeMediaServerClient();
  const repository = new MemoryHistoryRepository();
  const handler = new RecordingHandler();
  let clock = T0;
  const pipeline = new MonitoringPipeline({
    client,
    historyRepository: repository,
    handlers: [handler],
    now: () => clock,
    ...overrides,
  });
  const setTime = (date: Date) => {
    clock = date;
  };
  return { client, repository, handler, pipeline, setTime };
}

function snapshot(
  state: SessionSnapshot['state'],
  positionMs: number,
  sessionKey = 'session-1'
): SessionSnapshot {
  return createMockSnapshot({ sessionKey, state, positionMs, durationMs: 300_000 });
}

function observe(
  seconds: number,
  kind: ObservationKind,
  snap?: SessionSnapshot,
  sessionKey = 'session-1'
): Observation {
  return {
    sessionKey,
    source: 'push',
    kind,
    revision: seconds + 1,
    observedAt: at(seconds),
    snapshot: snap,
  };
}

describe('MonitoringPipeline', () => {
  it('turns a start, pause, resume and stop into one history entry and five notifications', async () => {
    const { pipeline, handler, repository } = createPipeline();
    const { reconciler } = pipeline;

    await reconciler.apply(observe(0, 'start', snapshot('playing', 0)));
    await reconciler.apply(observe(30, 'update', snapshot('paused', 30_000)));
    await reconciler.apply(observe(45, 'update', snapshot('playing', 30_000)));
    await reconciler.apply(observe(300, 'stop', snapshot('playing', 270_000)));
    await pipeline.drain();

    expect(handler.actions).toEqual(['on_start', 'on_pause', 'on_resume', 'on_stop', 'on_watched']);

    const entries = await repository.listRecent(10);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      sessionKeyGroup: ['session-1'],
      userId: 'user-1',
      itemId: 'item-42',
      startedAt: T0,
      stoppedAt: at(300),
      pausedDurationMs: 15_000,
      watchedPercent: 90,
      note: null,
    });

    // flushed: the key is gone from the live table
    expect(reconciler.size).toBe(0);
    expect(pipeline.getStatus().history.pendingWrites).toBe(0);
  });

  it('merges a restart of the same item within the gap into the previous entry', async () => {
    const { pipeline, repository } = createPipeline();
    const { reconciler } = pipeline;

    await reconciler.apply(observe(0, 'start', snapshot('playing', 0)));
    await reconciler.apply(observe(100, 'stop', snapshot('playing', 100_000)));
    await pipeline.drain();
    await reconciler.apply(observe(110, 'start', snapshot('playing', 100_000, 'session-2'), 'session-2'));
    await reconciler.apply(observe(200, 'stop', snapshot('playing', 200_000, 'session-2'), 'session-2'));
    await pipeline.drain();

    const entries = await repository.listRecent(10);
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({
      sessionKeyGroup: ['session-1', 'session-2'],
      startedAt: T0,
      stoppedAt: at(200),
      watchedPercent: 66.67,
    });
  });

  it('records each item separately when the player moves on under the same key', async () => {
    const { pipeline, handler, repository } = createPipeline();
    const { reconciler } = pipeline;
    const episode = (itemId: string, positionMs: number) =>
      createMockSnapshot({ itemId, positionMs, durationMs: 300_000 });

    await reconciler.apply(observe(0, 'start', episode('ep-1', 0)));
    await reconciler.apply(observe(280, 'update', episode('ep-1', 280_000)));
    await reconciler.apply(observe(300, 'update', episode('ep-2', 15_000)));
    await reconciler.apply(observe(400, 'stop', episode('ep-2', 115_000)));
    await pipeline.drain();

    expect(handler.events.map((e) => `${e.action}:${e.itemId}`)).toEqual([
      'on_start:ep-1',
      'on_stop:ep-1',
      'on_watched:ep-1',
      'on_start:ep-2',
      'on_stop:ep-2',
    ]);

    const entries = await repository.listRecent(10);
    expect(entries.map((e) => [e.itemId, e.startedAt, e.stoppedAt, e.watchedPercent])).toEqual([
      ['ep-2', at(300), at(400), 38.33],
      ['ep-1', T0, at(300), 93.33],
    ]);
    expect(reconciler.size).toBe(0);
  });

  it('stops sessions past the grace period on sweep', async () => {
    const { pipeline, repository, setTime } = createPipeline();

    await pipeline.reconciler.apply(observe(0, 'start', snapshot('playing', 0)));
    setTime(at(61));

    await expect(pipeline.sweep()).resolves.toBe(1);
    await pipeline.drain();

    const [entry] = await repository.listRecent(1);
    expect(entry?.note).toBe('stale');
  });

  describe('lifecycle', () => {
    it('flushes live sessions as shutdown on stop', async () => {
      const { pipeline, client, handler, repository } = createPipeline();
      client.sessions = [snapshot('playing', 60_000)];

      pipeline.start();
      await pipeline.poller.drain();
      expect(pipeline.reconciler.getSession('session-1')?.sources).toEqual(['poll']);

      await pipeline.stop();

      const [entry] = await repository.listRecent(1);
      expect(entry?.note).toBe('shutdown');
      expect(handler.actions).toEqual(['on_start', 'on_stop']);
      expect(pipeline.reconciler.size).toBe(0);
      expect(pipeline.isRunning).toBe(false);
      expect(pipeline.poller.running).toBe(false);
    });

    it('ignores stop() when not running', async () => {
      const { pipeline, repository } = createPipeline();
      await pipeline.reconciler.apply(observe(0, 'start', snapshot('playing', 0)));

      await pipeline.stop();

      expect(pipeline.reconciler.size).toBe(1);
      await expect(repository.listRecent(1)).resolves.toEqual([]);
    });
  });

  describe('updateConfig', () => {
    it('re-issues new values to the running components', () => {
      const { pipeline } = createPipeline();

      const config = pipeline.updateConfig({ pollIntervalMs: 10_000, dispatcherQueueCapacity: 50 });

      expect(config.pollIntervalMs).toBe(10_000);
      expect(config.dispatcherQueueCapacity).toBe(50);
      expect(pipeline.getConfig()).toEqual(config);
      expect(pipeline.getStatus().poller.intervalMs).toBe(10_000);
    });

    it('rejects unknown keys', () => {
      const { pipeline } = createPipeline();

      expect(() => pipeline.updateConfig({ pollEveryMs: 1000 })).toThrow(ValidationError);
    });

    it('rejects out-of-range values and keeps the running config', () => {
      const { pipeline } = createPipeline();
      const before = pipeline.getConfig();

      expect(() => pipeline.updateConfig({ pollIntervalMs: 100 })).toThrow(ValidationError);
      expect(() => pipeline.updateConfig({ pushReconnectInitialMs: 120_000 })).toThrow(
        ValidationError
      );
      expect(pipeline.getConfig()).toEqual(before);
    });
  });

  describe('status', () => {
    it('reports every component', () => {
      const { pipeline } = createPipeline();

      expect(pipeline.getStatus()).toEqual({
        running: false,
        serverType: 'emby',
        liveSessions: 0,
        poller: { intervalMs: 5000, consecutiveFailures: 0, lastPollAt: null, inFlight: false },
        push: null,
        connector: { unauthorized: false },
        history: { pendingWrites: 0, storageDegraded: false },
        reconciler: {
          accepted: 0,
          touched: 0,
          transitions: 0,
          malformed: 0,
          stale: 0,
          illegal: 0,
          newLogicalSessions: 0,
        },
        dispatcher: { enqueued: 0, delivered: 0, dropped: 0, failedDeliveries: 0, pending: 0 },
      });
    });

    it('clears a latched unauthorized connector on reconfigure', () => {
      const { pipeline, client } = createPipeline();
      client.isUnauthorized = true;
      expect(pipeline.getStatus().connector.unauthorized).toBe(true);

      pipeline.reconfigureConnector({ token: 'new-test-token' });

      expect(client.reconfigure).toHaveBeenCalledWith({ token: 'new-test-token' });
      expect(pipeline.getStatus().connector.unauthorized).toBe(false);
    });
  });
});
