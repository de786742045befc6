/**
 * Binding test harness.
 *
 * Connects a presenter app → PresenterManager → recording views, with
 * the delivery executor under manual control. Tests attach views, drive
 * their lifecycles, and call settle() to run everything that is queued
 * on both the presenter executor and the delivery executor.
 *
 * Views are held through StrongConsumerRef so reclaim() can stand in for
 * garbage collection deterministically.
 */

import type { MvpView, Presenter, ViewArguments, ViewEvent } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { ManualExecutor } from '../scheduling/manual.js';
import { PresenterManager } from '../presenter/manager.js';
import type { PresenterOptions } from '../presenter/presenter.js';
import type { ViewBinding } from '../view/handle.js';
import { StrongConsumerRef } from '../view/consumer-ref.js';
import { ViewLifecycle } from '../view/lifecycle.js';
import { RecordingView } from './recording-view.js';
import { summarizeDelivery } from './metrics.js';
import type { DeliverySummary } from './metrics.js';

/** A presenter type the harness (and the sample apps) can instantiate. */
export interface PresenterApp<T, P extends Presenter<T>> {
  name: string;
  description: string;
  type: abstract new (...args: never[]) => P;
  create(options: PresenterOptions<T>): P;
}

export interface HarnessConfig<T, P extends Presenter<T>> {
  app: PresenterApp<T, P>;
  thinningFactor?: number;
  logger?: Logger;
}

export interface AttachOptions {
  args?: ViewArguments;
  /** Enable delivery right away (default true). */
  enabled?: boolean;
  /** Resume the lifecycle right away (default true). */
  resumed?: boolean;
}

export interface AttachedView<T> {
  view: RecordingView<T>;
  binding: ViewBinding<T>;
  lifecycle: ViewLifecycle<T>;
  ref: StrongConsumerRef<MvpView<T>>;
}

export class BindingHarness<T, P extends Presenter<T>> {
  readonly delivery: ManualExecutor;
  readonly manager: PresenterManager;
  readonly presenter: P;
  private readonly attached: AttachedView<T>[] = [];

  constructor(config: HarnessConfig<T, P>) {
    const logger = config.logger ?? silentLogger;
    this.delivery = new ManualExecutor(logger);
    this.manager = new PresenterManager({
      config: {
        thinningFactor: config.thinningFactor,
        weakReferences: false,
        logLevel: logger.level,
      },
      deliveryExecutor: this.delivery,
      logger,
    });
    const app = config.app;
    this.presenter = this.manager.getOrCreate(app.name, app.type, () =>
      app.create(this.manager.presenterOptions<T>()),
    );
  }

  /** Create a recording view and bind it to the presenter. */
  attach(options: AttachOptions = {}): AttachedView<T> {
    const view = new RecordingView<T>(options.args);
    const ref = new StrongConsumerRef<MvpView<T>>(view);
    const binding = this.manager.bind(ref, this.presenter);
    const lifecycle = new ViewLifecycle(binding);
    if (options.enabled ?? true) binding.setEnabled(true);
    if (options.resumed ?? true) lifecycle.resume();

    const attached: AttachedView<T> = { view, binding, lifecycle, ref };
    this.attached.push(attached);
    return attached;
  }

  /** Send a widget event from a view to the presenter. */
  dispatch(target: AttachedView<T>, event: ViewEvent): void {
    target.binding.dispatch(event);
  }

  /** Destroy a view the normal way. Resolves to whether the presenter was released. */
  async detach(target: AttachedView<T>): Promise<boolean> {
    target.lifecycle.destroy();
    return this.manager.unbind(target.binding);
  }

  /** Drop a view without disconnecting, as if it had been collected. */
  reclaim(target: AttachedView<T>): void {
    target.ref.clear();
  }

  /**
   * Run queued presenter hooks and deliveries until neither executor has
   * anything left.
   */
  async settle(): Promise<void> {
    let ran: number;
    do {
      await this.presenter.whenIdle();
      ran = this.delivery.runAll();
    } while (ran > 0);
  }

  get views(): readonly AttachedView<T>[] {
    return this.attached;
  }

  metrics(): DeliverySummary {
    return summarizeDelivery(
      this.attached.map(({ binding, view }) => ({
        stats: binding.stats,
        pending: binding.pending,
        rendered: view.snapshots.length,
      })),
    );
  }
}
