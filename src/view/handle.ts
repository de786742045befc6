/**
 * ViewBinding — the handle that ties one view instance to its presenter.
 *
 * The view holds the binding strongly and drives it: lifecycle signals
 * (onResumed/onPaused), readiness (setEnabled), widget events
 * (dispatch). The presenter sees it as a ViewHandle and posts snapshots
 * and view-bound side effects to it.
 *
 * Everything that touches the view runs on the delivery executor and
 * resolves the view at run time; a view that is gone turns the call into
 * a no-op. After each externally started operation the binding polls its
 * consumer reference and, if the view was collected without
 * disconnecting, disconnects itself once.
 */

import type {
  Executor,
  HostAction,
  MessageDuration,
  MvpView,
  Presenter,
  Snapshot,
  ViewArguments,
  ViewEvent,
  ViewHandle,
} from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { QueueStats } from '../state/queue.js';
import { ConsumerRef, createConsumerRef } from './consumer-ref.js';
import { DeliveryLoop } from './delivery-loop.js';
import type { DeliveryPhase } from './delivery-loop.js';

const NO_ARGUMENTS: ViewArguments = Object.freeze({});

export interface ViewBindingOptions {
  /** The single executor all deliveries and view side effects run on. */
  deliveryExecutor: Executor;
  thinningFactor?: number;
  /** How a bare view is held: through WeakRef (default) or strongly. */
  weakReferences?: boolean;
  logger?: Logger;
}

/** A view, or a reference the caller already holds it through. */
export type BindingTarget<T> = MvpView<T> | ConsumerRef<MvpView<T>>;

export class ViewBinding<T> implements ViewHandle<T> {
  private readonly ref: ConsumerRef<MvpView<T>>;
  private readonly loop: DeliveryLoop<T>;
  private readonly deliveryExecutor: Executor;
  private readonly logger: Logger;
  private expunging = false;
  private detached = false;

  constructor(
    target: BindingTarget<T>,
    readonly presenter: Presenter<T>,
    options: ViewBindingOptions,
  ) {
    this.ref = target instanceof ConsumerRef
      ? target
      : createConsumerRef(target, options.weakReferences ?? true);
    this.deliveryExecutor = options.deliveryExecutor;
    this.logger = options.logger ?? silentLogger;

    // Scheduled drains poll liveness too, once they have run.
    const drainExecutor: Executor = {
      execute: (task) => this.deliveryExecutor.execute(() => {
        try {
          return task();
        } finally {
          this.expungeStaleView();
        }
      }),
    };

    this.loop = new DeliveryLoop<T>(
      (snapshot) => this.ref.get()?.onStateChanged(snapshot),
      drainExecutor,
      { thinningFactor: options.thinningFactor, logger: this.logger },
    );
  }

  // ── Presenter-facing ─────────────────────────────────────────

  post(snapshot: Snapshot<T>): void {
    this.loop.post(snapshot);
    this.expungeStaleView();
  }

  finish(): void {
    this.runOnView('finish', (view) => view.finish());
  }

  showMessage(text: string, duration: MessageDuration): void {
    this.runOnView('showMessage', (view) => view.getContext().showMessage(text, duration));
  }

  startHostAction(action: HostAction): void {
    this.runOnView('startHostAction', (view) => view.getContext().startAction(action));
  }

  getMvpView(): MvpView<T> | undefined {
    return this.ref.get();
  }

  getArguments(): ViewArguments {
    return this.ref.get()?.getArguments?.() ?? NO_ARGUMENTS;
  }

  checkLiveness(): void {
    this.expungeStaleView();
  }

  // ── View-facing ──────────────────────────────────────────────

  /** Gate delivery on view readiness (e.g., after deferred inflation). */
  setEnabled(value: boolean): void {
    this.loop.setEnabled(value);
    this.expungeStaleView();
  }

  onResumed(): void {
    this.loop.onResumed();
    this.expungeStaleView();
  }

  onPaused(): void {
    this.loop.onPaused();
  }

  /** Forward a widget event to the presenter's executor. */
  dispatch(event: ViewEvent): void {
    if (this.detached) return;
    const presenter = this.presenter;
    presenter.executor.execute(() => presenter.onViewEvent(this, event));
    this.expungeStaleView();
  }

  /** Report the outcome of a host action started with a requestCode. */
  deliverHostResult(requestCode: number, result: unknown): void {
    if (this.detached) return;
    const presenter = this.presenter;
    presenter.executor.execute(() => presenter.onHostActionResult(this, requestCode, result));
    this.expungeStaleView();
  }

  /** Detach from the presenter. Idempotent. */
  disconnect(): void {
    if (this.detached) return;
    this.detached = true;
    this.presenter.disconnect(this);
  }

  isDisconnected(): boolean {
    return this.detached;
  }

  // ── Introspection ────────────────────────────────────────────

  get phase(): DeliveryPhase {
    return this.loop.phase;
  }

  get lastDelivered(): Snapshot<T> | undefined {
    return this.loop.lastDelivered;
  }

  get pending(): number {
    return this.loop.pending;
  }

  get stats(): QueueStats {
    return this.loop.stats;
  }

  isPermitted(): boolean {
    return this.loop.isPermitted();
  }

  toString(): string {
    return `ViewBinding { presenter=${this.presenter.getId()}, phase=${this.loop.phase}, pending=${this.loop.pending} }`;
  }

  // ── Internals ────────────────────────────────────────────────

  private runOnView(name: string, action: (view: MvpView<T>) => void): void {
    this.deliveryExecutor.execute(() => {
      const view = this.ref.get();
      if (view !== undefined) {
        try {
          action(view);
        } catch (err) {
          this.logger.error(`${name} failed:`, err);
        }
      }
      this.expungeStaleView();
    });
  }

  private expungeStaleView(): void {
    if (this.expunging || this.detached) return;
    this.expunging = true;
    try {
      if (this.ref.pollReclaimed()) {
        this.logger.info('view was reclaimed without disconnecting; disconnecting');
        this.disconnect();
      }
    } finally {
      this.expunging = false;
    }
  }
}
