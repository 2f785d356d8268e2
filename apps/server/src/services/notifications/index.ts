/**
 * Notifications
 */

export { NotificationDispatcher, type DispatcherOptions } from './dispatcher.js';
export { actionsForTransition } from './actions.js';
export { BoundedQueue } from './boundedQueue.js';
export type { NotificationHandler } from './types.js';
export * from './agents/index.js';
