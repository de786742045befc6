/**
 * Core types shared by presenters, view handles, and views.
 *
 * A presenter owns mutable state and broadcasts immutable snapshots to
 * every connected view handle. Each handle funnels snapshots to exactly
 * one view (the consumer) on the delivery executor.
 *
 *   presenter.commit() → handle.post(snapshot) → queue → drain → view.onStateChanged()
 */

// ── Snapshots ────────────────────────────────────────────────────

/** Immutable copy of presenter state at a commit point. */
export interface Snapshot<T> {
  /** Number of commits the presenter had made when this copy was taken. */
  readonly revision: number;
  /** True if the state had never been committed when this copy was taken. */
  readonly initial: boolean;
  /** Deep-frozen state data. Never shared between handles. */
  readonly data: Readonly<T>;
}

// ── View Events ──────────────────────────────────────────────────

/**
 * Widget events forwarded from a view to its presenter.
 * Targets are opaque view-defined identifiers.
 */
export type ViewEvent =
  | { kind: 'click'; target: string }
  | { kind: 'text'; target: string; text: string }
  | { kind: 'checked'; target: string; checked: boolean }
  | { kind: 'select'; target: string; item: unknown }
  | { kind: 'menu'; itemId: string };

// ── Host Environment ─────────────────────────────────────────────

export type MessageDuration = 'short' | 'long';

/** A request for the host environment (navigate, open a screen, pick a file...). */
export interface HostAction {
  type: string;
  payload?: unknown;
  /** If set, the host reports the outcome via ViewHandle.deliverHostResult(). */
  requestCode?: number;
}

/** Host-environment capabilities reachable from a view. */
export interface HostContext {
  showMessage(text: string, duration: MessageDuration): void;
  startAction(action: HostAction): void;
}

/** Arguments a view was created with. */
export type ViewArguments = Readonly<Record<string, unknown>>;

// ── View (consumer) ──────────────────────────────────────────────

/**
 * A lifecycle-bound view instance. Views are short-lived; the handle only
 * holds them weakly (by default), so a view that is garbage-collected
 * without disconnecting is detected and cleaned up.
 */
export interface MvpView<T> {
  /** Render a new state snapshot. Called on the delivery executor. */
  onStateChanged(snapshot: Snapshot<T>): void;
  /** Terminate this view. */
  finish(): void;
  /** Host-environment accessor for messages and actions. */
  getContext(): HostContext;
  getArguments?(): ViewArguments;
}

// ── Handle & Presenter Contracts ─────────────────────────────────

/** What a presenter sees of a connected view. */
export interface ViewHandle<T> {
  post(snapshot: Snapshot<T>): void;
  finish(): void;
  showMessage(text: string, duration: MessageDuration): void;
  startHostAction(action: HostAction): void;
  getMvpView(): MvpView<T> | undefined;
  getArguments(): ViewArguments;
  /** Disconnect from the presenter if the view was collected. */
  checkLiveness(): void;
}

/** What an external owner (the presenter manager) sees of a presenter. */
export interface ManagedPresenter {
  isDetached(): boolean;
  getId(): number;
  finish(): void;
  /** Resolve once every queued hook has run. */
  whenIdle(): Promise<void>;
}

/** What a view handle sees of its presenter. */
export interface Presenter<T> extends ManagedPresenter {
  connect(handle: ViewHandle<T>): void;
  disconnect(handle: ViewHandle<T>): void;
  onViewEvent(handle: ViewHandle<T>, event: ViewEvent): void | Promise<void>;
  onHostActionResult(
    handle: ViewHandle<T>,
    requestCode: number,
    result: unknown,
  ): void | Promise<void>;
  /** Executor that serializes this presenter's hooks. */
  readonly executor: Executor;
}

// ── Scheduling ───────────────────────────────────────────────────

export type Task = () => void | Promise<void>;

/** Accepts tasks for asynchronous execution. Never blocks the caller. */
export interface Executor {
  execute(task: Task): void;
  /** Resolve once every submitted task has finished, if the executor can tell. */
  whenIdle?(): Promise<void>;
}
