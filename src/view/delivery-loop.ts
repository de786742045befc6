/**
 * DeliveryLoop — per-handle controller that drains a StateQueue into a
 * view on the delivery executor.
 *
 * Delivery is permitted only while the view is both enabled (ready to
 * render) and resumed (in the foreground):
 *
 *   idle ──post (permitted)──→ scheduled ──task runs──→ draining ──queue empty──→ idle
 *                                                            └──permission lost──→ idle
 *
 * At most one drain runs at a time. A drain that finds delivery not
 * permitted exits without consuming, leaving the queue for the next
 * resume.
 */

import type { Executor, Snapshot } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { StateQueue, DEFAULT_THINNING_FACTOR } from '../state/queue.js';
import type { QueueStats } from '../state/queue.js';

export type DeliveryPhase = 'idle' | 'scheduled' | 'draining';

export interface DeliveryLoopOptions {
  thinningFactor?: number;
  logger?: Logger;
}

export class DeliveryLoop<T> {
  private readonly queue: StateQueue<Snapshot<T>>;
  private readonly logger: Logger;
  private enabled = false;
  private resumed = false;
  private _phase: DeliveryPhase = 'idle';
  private _lastDelivered: Snapshot<T> | undefined;

  /**
   * @param consume - Hands one snapshot to the view; a no-op once the
   *   view is gone.
   * @param executor - The delivery executor drains are scheduled on.
   */
  constructor(
    private readonly consume: (snapshot: Snapshot<T>) => void,
    private readonly executor: Executor,
    options: DeliveryLoopOptions = {},
  ) {
    this.queue = new StateQueue(options.thinningFactor ?? DEFAULT_THINNING_FACTOR);
    this.logger = options.logger ?? silentLogger;
  }

  get phase(): DeliveryPhase {
    return this._phase;
  }

  /** Most recent snapshot actually forwarded to the view. */
  get lastDelivered(): Snapshot<T> | undefined {
    return this._lastDelivered;
  }

  /** Snapshots waiting in the queue. */
  get pending(): number {
    return this.queue.size;
  }

  get stats(): QueueStats {
    return this.queue.stats;
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  isResumed(): boolean {
    return this.resumed;
  }

  /** enabled AND resumed. */
  isPermitted(): boolean {
    return this.enabled && this.resumed;
  }

  /** Queue a snapshot and schedule a drain if one is needed. */
  post(snapshot: Snapshot<T>): void {
    this.queue.post(snapshot);
    this.schedule();
  }

  /**
   * Enable or disable delivery. Enabling while resumed drains right away
   * rather than on the next scheduled pass: the view just became able to
   * render outside of a resume transition.
   */
  setEnabled(value: boolean): void {
    if (this.enabled === value) return;
    this.enabled = value;
    if (value && this.resumed) {
      this.drain();
    }
  }

  /**
   * The view came to the foreground. If nothing arrived while paused,
   * re-render the last delivered snapshot; otherwise drain.
   */
  onResumed(): void {
    this.resumed = true;
    if (!this.isPermitted()) return;

    const last = this._lastDelivered;
    if (this.queue.isEmpty() && last !== undefined) {
      this.deliver(last);
    } else {
      this.logger.debug(`resumed with ${this.queue.size} queued snapshot(s), draining`);
      this.drain();
    }
  }

  /** The view left the foreground. Queued snapshots are kept. */
  onPaused(): void {
    this.resumed = false;
  }

  /**
   * Drain the queue into the view. No-op if a drain is already running
   * further up the stack.
   */
  drain(): void {
    if (this._phase === 'draining') return;
    this._phase = 'draining';
    try {
      this.queue.drain(
        (snapshot) => this.deliver(snapshot),
        () => this.isPermitted(),
      );
    } finally {
      this._phase = 'idle';
    }
    // A snapshot may have arrived between the last empty check and the
    // phase reset; pick it up rather than leave it stranded.
    if (!this.queue.isEmpty()) {
      this.schedule();
    }
  }

  private schedule(): void {
    if (this._phase !== 'idle' || !this.isPermitted()) return;
    this._phase = 'scheduled';
    this.executor.execute(() => this.runScheduled());
  }

  private runScheduled(): void {
    // A synchronous drain (enable/resume) may have run in the meantime
    // and already reset the phase; draining again is harmless.
    if (this._phase === 'draining') return;
    this._phase = 'idle';
    this.drain();
  }

  private deliver(snapshot: Snapshot<T>): void {
    this._lastDelivered = snapshot;
    try {
      this.consume(snapshot);
    } catch (err) {
      this.logger.error(`state handling error (revision ${snapshot.revision}):`, err);
    }
  }
}
