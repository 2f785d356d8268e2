/**
 * Poller Module
 *
 * Timer-driven snapshot fetch of every active session on the media server.
 *
 * @example
 * import { Poller } from './jobs/poller/index.js';
 *
 * const poller = new Poller({ client, intake: reconciler, intervalMs: 5000 });
 * poller.start();
 * await poller.triggerPoll();
 * poller.stop();
 */

export { Poller, POLL_MISS_THRESHOLD } from './processor.js';

export type {
  ObservationIntake,
  PollerOptions,
  PollerStatus,
  MissCounts,
  SnapshotDiff,
} from './types.js';

// Pure utility functions (exported for testing and the push ingestor)
export { diffSnapshots, diffToObservations } from './utils.js';
