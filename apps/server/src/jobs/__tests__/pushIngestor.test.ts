/**
 * Push Event Ingestor Tests
 *
 * The manager is never started; tests emit its events directly.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Observation } from '@reelwatch/shared';
import { PushIngestor } from '../pushIngestor.js';
import type { ObservationIntake } from '../poller/types.js';
import { PushManager } from '../../services/pushManager.js';
import { PlexClient } from '../../services/mediaServer/plex/client.js';
import { SessionReconciler } from '../../services/sessions/reconciler.js';
import { at, createMockSnapshot, T0 } from '../../test/fixtures.js';

function createIntake() {
  const applied: Observation[] = [];
  return {
    applied,
    apply: vi.fn<ObservationIntake['apply']>(async (observation) => {
      applied.push(observation);
      return { outcome: 'touch' };
    }),
    stopSessionsOnlyFrom: vi.fn<ObservationIntake['stopSessionsOnlyFrom']>(async () => 0),
  };
}

const a = createMockSnapshot({ sessionKey: 'a' });
const b = createMockSnapshot({ sessionKey: 'b' });

function kinds(observations: Observation[]): string[] {
  return observations.map((o) => `${o.kind}:${o.sessionKey}`);
}

describe('PushIngestor', () => {
  let manager: PushManager;
  let intake: ReturnType<typeof createIntake>;
  let ingestor: PushIngestor;

  beforeEach(() => {
    manager = new PushManager({
      client: new PlexClient({ url: 'http://plex.local:32400', token: 'test-token' }),
    });
    intake = createIntake();
    ingestor = new PushIngestor({ manager, intake, now: () => T0 });
    ingestor.start();
  });

  it('turns a session list into push observations', async () => {
    manager.emit('sessions', [a, b], at(5));
    await ingestor.drain();

    expect(intake.applied).toEqual([
      { sessionKey: 'a', source: 'push', kind: 'start', revision: T0.getTime(), observedAt: at(5), snapshot: a },
      { sessionKey: 'b', source: 'push', kind: 'start', revision: T0.getTime(), observedAt: at(5), snapshot: b },
    ]);
  });

  it('updates present keys and stops keys missing from the next list', async () => {
    manager.emit('sessions', [a, b], at(0));
    manager.emit('sessions', [a], at(2));
    await ingestor.drain();

    expect(kinds(intake.applied)).toEqual(['start:a', 'start:b', 'update:a', 'stop:b']);
    expect(intake.applied[3]?.revision).toBe(T0.getTime() + 1);
  });

  it('stops a session on PlaybackStopped and forgets the key', async () => {
    manager.emit('sessions', [a], at(0));
    manager.emit('session:stopped', 'a', at(1));
    manager.emit('sessions', [], at(2));
    await ingestor.drain();

    expect(kinds(intake.applied)).toEqual(['start:a', 'stop:a']);
    expect(intake.applied[1]).toEqual({
      sessionKey: 'a',
      source: 'push',
      kind: 'stop',
      revision: T0.getTime() + 1,
      observedAt: at(1),
    });
  });

  it('ignores events after stop()', async () => {
    ingestor.stop();
    manager.emit('sessions', [a], at(0));
    await ingestor.drain();

    expect(intake.applied).toEqual([]);
    expect(manager.listenerCount('sessions')).toBe(0);
  });

  it('keeps ingesting after the intake rejects', async () => {
    intake.apply.mockRejectedValueOnce(new Error('store offline'));

    manager.emit('sessions', [a], at(0));
    manager.emit('sessions', [a], at(1));
    await ingestor.drain();

    expect(intake.apply).toHaveBeenCalledTimes(2);
    expect(kinds(intake.applied)).toEqual(['update:a']);
  });

  it('drives the reconciler through a pause and a stop', async () => {
    const reconciler = new SessionReconciler({ now: () => T0 });
    ingestor.stop();
    const live = new PushIngestor({ manager, intake: reconciler, now: () => T0 });
    live.start();

    manager.emit('sessions', [a], at(0));
    manager.emit('sessions', [{ ...a, state: 'paused' }], at(10));
    await live.drain();
    expect(reconciler.getSession('a')?.state).toBe('paused');

    manager.emit('session:stopped', 'a', at(20));
    await live.drain();

    const session = reconciler.getSession('a');
    expect(session?.state).toBe('stopped');
    expect(session?.pausedDurationMs).toBe(10_000);
    expect(session?.sources).toEqual(['push']);
  });
});
