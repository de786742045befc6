/**
 * StateQueue — FIFO of pending snapshots with adaptive thinning.
 *
 * Storage is unbounded; delivery cost is bounded instead. When a drain
 * pass starts with `size` items, only about every (size / K)th item is
 * forwarded, and the ratio is recomputed after each forward so it adapts
 * as the backlog shrinks or as new items arrive mid-drain:
 *
 *   size = 20, K = 8 → n = 2: forward, skip, forward, skip, ...
 *   size <  K        → n = 0: forward everything
 *
 * The last queued item is always forwarded. A drain only ends on an
 * empty queue (or a revoked permission), so the newest snapshot of any
 * burst reaches the consumer.
 */

import { assertThinningFactor } from '../core/runtime-config.js';

export const DEFAULT_THINNING_FACTOR = 8;

export interface QueueStats {
  /** Items ever posted. */
  posted: number;
  /** Items handed to the deliver callback. */
  forwarded: number;
  /** Items dropped by thinning. */
  skipped: number;
}

export class StateQueue<T extends object> {
  private items: T[] = [];
  private readonly _stats: QueueStats = { posted: 0, forwarded: 0, skipped: 0 };

  constructor(readonly thinningFactor: number = DEFAULT_THINNING_FACTOR) {
    assertThinningFactor(thinningFactor);
  }

  /** Enqueue an item. Never blocks. */
  post(item: T): void {
    this.items.push(item);
    this._stats.posted++;
  }

  get size(): number {
    return this.items.length;
  }

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  /** Counters since construction (a copy). */
  get stats(): QueueStats {
    return { ...this._stats };
  }

  /** Drop every queued item. Dropped items count as skipped. */
  clear(): void {
    this._stats.skipped += this.items.length;
    this.items = [];
  }

  /**
   * Pop items while `isPermitted()` holds and the queue is non-empty,
   * forwarding the ones the thinning policy keeps.
   *
   * `deliver` may post more items (re-entrantly); they join this pass.
   * Returns the number of items forwarded.
   */
  drain(deliver: (item: T) => void, isPermitted: () => boolean): number {
    let n = this.stride(this.items.length);
    let forwarded = 0;

    while (this.items.length > 0 && isPermitted()) {
      const remaining = this.items.length;
      const item = this.items.shift();
      if (item === undefined) break;

      if (n === 0 || remaining === 1 || remaining % n === 0) {
        this._stats.forwarded++;
        forwarded++;
        deliver(item);
        n = this.stride(this.items.length);
      } else {
        this._stats.skipped++;
      }
    }

    return forwarded;
  }

  private stride(size: number): number {
    return Math.floor(size / this.thinningFactor);
  }
}
