/**
 * Lifecycle transition -> notification actions
 */

import {
  NOTIFICATION_ACTIONS,
  SESSION_LIMITS,
  type LifecycleEvent,
  type NotificationAction,
} from '@reelwatch/shared';
import { calculateWatchedPercent, checkWatchCompletion } from '../sessions/stateTracker.js';

/**
 * Actions a transition triggers, in emission order. Most transitions
 * trigger none (buffering -> playing, paused -> buffering, ...).
 *
 * @example
 * actionsForTransition({ fromState: 'playing', toState: 'stopped', ... }); // ['on_stop'] or ['on_stop', 'on_watched']
 */
export function actionsForTransition(
  event: LifecycleEvent,
  watchedThreshold: number = SESSION_LIMITS.WATCH_COMPLETION_THRESHOLD
): NotificationAction[] {
  const { fromState: from, toState: to } = event;

  if (to === 'stopped') {
    const { positionMs, durationMs } = event.sessionSnapshot;
    const watched = checkWatchCompletion(calculateWatchedPercent(positionMs, durationMs), watchedThreshold);
    return watched
      ? [NOTIFICATION_ACTIONS.STOP, NOTIFICATION_ACTIONS.WATCHED]
      : [NOTIFICATION_ACTIONS.STOP];
  }
  if (to === 'error') return [NOTIFICATION_ACTIONS.ERROR];

  if (from === 'starting') {
    return event.isFirstObservation ? [NOTIFICATION_ACTIONS.START] : [];
  }
  if (from === 'playing' && to === 'paused') return [NOTIFICATION_ACTIONS.PAUSE];
  if (from === 'paused' && to === 'playing') return [NOTIFICATION_ACTIONS.RESUME];
  if (from === 'playing' && to === 'buffering') return [NOTIFICATION_ACTIONS.BUFFER];

  return [];
}
