/**
 * Presenter-side state and per-handle snapshot queues.
 */

export { PresenterState, cborClone, deepFreeze } from './snapshot.js';
export type { CloneFn, PresenterStateOptions } from './snapshot.js';
export { StateQueue, DEFAULT_THINNING_FACTOR } from './queue.js';
export type { QueueStats } from './queue.js';
