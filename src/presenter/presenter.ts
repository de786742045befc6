/**
 * BasePresenter — long-lived owner of business logic and state.
 *
 * Keeps the set of connected view handles and broadcasts state to them.
 * Subclasses mutate `this.state` and call commit(); connect/disconnect
 * hooks are where they acquire and release resources.
 *
 * Ordering: hooks run one at a time on the presenter's own executor, and
 * commit() is synchronous, so broadcasts from two commits can never
 * interleave. Every handle observes revisions in increasing order.
 */

import type {
  Executor,
  Presenter,
  Snapshot,
  ViewEvent,
  ViewHandle,
} from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { SerialExecutor } from '../scheduling/executor.js';
import { PresenterState } from '../state/snapshot.js';
import type { CloneFn } from '../state/snapshot.js';

let lastId = 0;

/** Process-unique, monotonically increasing presenter id. */
export function nextPresenterId(): number {
  return ++lastId;
}

export interface PresenterOptions<T> {
  /** Hook executor. Defaults to a fresh SerialExecutor per presenter. */
  executor?: Executor;
  logger?: Logger;
  /** State clone function (defaults to a CBOR round trip). */
  clone?: CloneFn<T>;
}

export abstract class BasePresenter<T> implements Presenter<T> {
  readonly id: number;
  readonly executor: Executor;
  protected readonly tag: string;
  protected readonly logger: Logger;
  protected readonly state: PresenterState<T>;
  /** Copy-on-write: replaced, never mutated, so broadcasts iterate a stable array. */
  private handles: readonly ViewHandle<T>[] = [];

  constructor(initial: T, options: PresenterOptions<T> = {}) {
    this.id = nextPresenterId();
    this.tag = `${this.constructor.name}#${this.id}`;
    this.logger = (options.logger ?? silentLogger).child(this.tag);
    this.state = new PresenterState(initial, { clone: options.clone });
    this.executor = options.executor ?? new SerialExecutor(this.logger);
  }

  // ── Connection Registry ──────────────────────────────────────

  /**
   * Attach a view handle. Hooks run on the presenter executor, then the
   * handle receives the current state, even if a hook failed.
   */
  connect(handle: ViewHandle<T>): void {
    if (this.handles.includes(handle)) return;
    const isFirst = this.handles.length === 0;
    this.handles = [...this.handles, handle];

    this.executor.execute(async () => {
      try {
        if (isFirst) {
          await this.onFirstViewConnected(handle);
        }
        await this.onViewConnected(handle);
      } catch (err) {
        this.logger.error('connect hook failed:', err);
      }
      // Post after the hooks: they usually initialize the state.
      if (this.handles.includes(handle)) {
        this.postSnapshot(handle);
      }
    });

    this.expungeStaleHandles(handle);
  }

  /**
   * Detach a view handle. Mandatory when a view is destroyed; otherwise
   * the presenter is never released. Detaching an unknown (or already
   * detached) handle does nothing.
   */
  disconnect(handle: ViewHandle<T>): void {
    if (!this.handles.includes(handle)) return;
    this.handles = this.handles.filter((h) => h !== handle);
    const isLast = this.handles.length === 0;

    this.executor.execute(async () => {
      try {
        await this.onViewDisconnected(handle);
      } catch (err) {
        this.logger.error('disconnect hook failed:', err);
      }
      if (isLast) {
        try {
          await this.onLastViewDisconnected();
        } catch (err) {
          this.logger.error('last-disconnect hook failed:', err);
        }
      }
    });

    this.expungeStaleHandles(handle);
  }

  /** True if no views are attached. */
  isDetached(): boolean {
    return this.handles.length === 0;
  }

  getId(): number {
    return this.id;
  }

  /** Number of attached views. */
  get viewCount(): number {
    return this.handles.length;
  }

  /** Ask every attached view to finish. */
  finish(): void {
    for (const handle of this.handles) {
      handle.finish();
    }
  }

  async whenIdle(): Promise<void> {
    await this.executor.whenIdle?.();
  }

  // ── State Broadcast ──────────────────────────────────────────

  /**
   * Send the current state to every attached view, if it changed since
   * the last commit (or was never committed). Each view gets its own
   * copy. Returns whether a broadcast happened.
   */
  protected commit(): boolean {
    if (!this.state.isChanged() && !this.state.isInitial()) return false;

    const handles = this.handles;
    let snapshots: Snapshot<T>[];
    try {
      snapshots = this.state.commit(handles.length);
    } catch (err) {
      // Left uncommitted: the next commit() retries the same change.
      this.logger.error(`cannot snapshot state at revision ${this.state.revision + 1}:`, err);
      return false;
    }

    handles.forEach((handle, i) => handle.post(snapshots[i]));
    return true;
  }

  protected getStateSnapshot(): Snapshot<T> {
    return this.state.snapshot();
  }

  // ── Hooks ────────────────────────────────────────────────────

  /**
   * The first view attached. Initialize state and subscribe to sources
   * here.
   */
  protected onFirstViewConnected(handle: ViewHandle<T>): void | Promise<void> {
    this.logger.debug(`onFirstViewConnected(${handle})`);
  }

  /** A view attached (including the first). */
  protected onViewConnected(handle: ViewHandle<T>): void | Promise<void> {
    this.logger.debug(`onViewConnected(${handle})`);
  }

  /** A view detached. */
  protected onViewDisconnected(handle: ViewHandle<T>): void | Promise<void> {
    this.logger.debug(`onViewDisconnected(${handle})`);
  }

  /**
   * The last view detached. The presenter is about to be released by its
   * owner; release acquired resources here.
   */
  protected onLastViewDisconnected(): void | Promise<void> {
    this.logger.debug('onLastViewDisconnected()');
  }

  onViewEvent(_handle: ViewHandle<T>, event: ViewEvent): void | Promise<void> {
    this.logger.debug(`onViewEvent(${JSON.stringify(event)})`);
  }

  onHostActionResult(
    _handle: ViewHandle<T>,
    requestCode: number,
    result: unknown,
  ): void | Promise<void> {
    this.logger.debug(`onHostActionResult(${requestCode})`, result);
  }

  toString(): string {
    return `${this.constructor.name} { id=${this.id}, views=${this.handles.length}, ${this.state} }`;
  }

  // ── Internals ────────────────────────────────────────────────

  private postSnapshot(handle: ViewHandle<T>): void {
    let snapshot: Snapshot<T>;
    try {
      snapshot = this.state.snapshot();
    } catch (err) {
      this.logger.error(`cannot snapshot state at revision ${this.state.revision}:`, err);
      return;
    }
    handle.post(snapshot);
  }

  /** Let every other handle check whether its view was collected. */
  private expungeStaleHandles(except: ViewHandle<T>): void {
    for (const handle of this.handles) {
      if (handle !== except) {
        handle.checkLiveness();
      }
    }
  }
}
