/**
 * Transition -> notification action mapping tests
 */

import { describe, it, expect } from 'vitest';
import type { SessionState } from '@reelwatch/shared';
import { actionsForTransition } from '../actions.js';
import { createLifecycleEvent } from '../../../test/fixtures.js';

describe('actionsForTransition', () => {
  it('emits on_start for the first observation', () => {
    for (const to of ['playing', 'paused', 'buffering'] as const) {
      const event = createLifecycleEvent('starting', to, {}, { isFirstObservation: true });
      expect(actionsForTransition(event)).toEqual(['on_start']);
    }
  });

  const cases: Array<[SessionState, SessionState, string[]]> = [
    ['playing', 'paused', ['on_pause']],
    ['paused', 'playing', ['on_resume']],
    ['playing', 'buffering', ['on_buffer']],
    ['buffering', 'playing', []],
    ['paused', 'buffering', []],
    ['playing', 'error', ['on_error']],
  ];

  it.each(cases)('%s -> %s emits %j', (from, to, expected) => {
    expect(actionsForTransition(createLifecycleEvent(from, to))).toEqual(expected);
  });

  it('emits on_stop alone below the watched threshold', () => {
    const event = createLifecycleEvent('playing', 'stopped', {
      positionMs: 240_000,
      durationMs: 300_000,
    });
    expect(actionsForTransition(event, 0.85)).toEqual(['on_stop']);
  });

  it('adds on_watched at or above the watched threshold', () => {
    const event = createLifecycleEvent('paused', 'stopped', {
      positionMs: 270_000,
      durationMs: 300_000,
    });
    expect(actionsForTransition(event, 0.85)).toEqual(['on_stop', 'on_watched']);
    expect(actionsForTransition(event, 0.95)).toEqual(['on_stop']);
  });

  it('does not treat unknown duration as watched', () => {
    const event = createLifecycleEvent('playing', 'stopped', { positionMs: 1000, durationMs: 0 });
    expect(actionsForTransition(event)).toEqual(['on_stop']);
  });
});
