/**
 * PresenterManager — owns presenters and the delivery executor.
 *
 * Presenters outlive views: a view rebuilt by its host finds the same
 * presenter under the same key and rebinds to it. The manager releases a
 * presenter once its last view has detached and its hooks have finished.
 *
 * Usage:
 *   const manager = new PresenterManager({ config: await resolveRuntimeConfig() });
 *   const presenter = manager.getOrCreate('counter', CounterPresenter,
 *     () => new CounterPresenter(manager.presenterOptions()));
 *   const binding = manager.bind(view, presenter);
 *   ...
 *   await manager.unbind(binding);
 */

import type { Executor, ManagedPresenter, Presenter } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { createLogger } from '../core/logger.js';
import { mergeConfigs } from '../core/runtime-config.js';
import type { RuntimeConfig } from '../core/runtime-config.js';
import { SerialExecutor } from '../scheduling/executor.js';
import { ViewBinding } from '../view/handle.js';
import type { BindingTarget } from '../view/handle.js';
import type { PresenterOptions } from './presenter.js';

export interface PresenterManagerOptions {
  config?: Partial<RuntimeConfig>;
  /** Executor for every delivery. Defaults to a SerialExecutor. */
  deliveryExecutor?: Executor;
  logger?: Logger;
}

export class PresenterManager {
  readonly config: RuntimeConfig;
  readonly deliveryExecutor: Executor;
  readonly logger: Logger;
  private readonly byKey = new Map<string, ManagedPresenter>();
  private readonly byId = new Map<number, ManagedPresenter>();

  constructor(options: PresenterManagerOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    this.logger = options.logger ?? createLogger(this.config.logLevel);
    this.deliveryExecutor = options.deliveryExecutor ?? new SerialExecutor(this.logger.child('delivery'));
  }

  // ── Presenters ───────────────────────────────────────────────

  /**
   * Return the presenter registered under `key`, creating it with
   * `create` if there is none. Throws if the key holds a presenter of a
   * different class.
   */
  getOrCreate<P extends ManagedPresenter>(
    key: string,
    type: abstract new (...args: never[]) => P,
    create: () => P,
  ): P {
    const existing = this.byKey.get(key);
    if (existing !== undefined) {
      if (existing instanceof type) return existing;
      throw new Error(`Presenter "${key}" is a ${existing.constructor.name}, not a ${type.name}`);
    }

    const presenter = create();
    this.byKey.set(key, presenter);
    this.byId.set(presenter.getId(), presenter);
    this.logger.debug(`created presenter ${presenter.getId()} for "${key}"`);
    return presenter;
  }

  get(id: number): ManagedPresenter | undefined {
    return this.byId.get(id);
  }

  /** Number of live presenters. */
  get size(): number {
    return this.byId.size;
  }

  /** Options for constructing a presenter that logs like the manager. */
  presenterOptions<T>(): PresenterOptions<T> {
    return { logger: this.logger };
  }

  // ── Views ────────────────────────────────────────────────────

  /**
   * Create a binding and connect it to `presenter`. A bare view is held
   * the way the config says; a ConsumerRef is used as given.
   */
  bind<T>(target: BindingTarget<T>, presenter: Presenter<T>): ViewBinding<T> {
    const binding = new ViewBinding<T>(target, presenter, {
      deliveryExecutor: this.deliveryExecutor,
      thinningFactor: this.config.thinningFactor,
      weakReferences: this.config.weakReferences,
      logger: this.logger.child(`view@${presenter.getId()}`),
    });
    presenter.connect(binding);
    return binding;
  }

  /**
   * Disconnect a binding, wait for the presenter's hooks to finish, and
   * release the presenter if no views remain. Resolves to whether the
   * presenter was released.
   */
  async unbind<T>(binding: ViewBinding<T>): Promise<boolean> {
    binding.disconnect();
    const presenter = binding.presenter;
    await presenter.whenIdle();
    return this.release(presenter);
  }

  /** Release a presenter if it has no views. Returns whether it was released. */
  release(presenter: ManagedPresenter): boolean {
    if (!presenter.isDetached()) return false;
    const id = presenter.getId();
    if (!this.byId.delete(id)) return false;
    for (const [key, value] of this.byKey) {
      if (value === presenter) this.byKey.delete(key);
    }
    this.logger.debug(`released presenter ${id}`);
    return true;
  }

  /** Release every presenter without views. Returns the released ids. */
  sweep(): number[] {
    const released: number[] = [];
    for (const presenter of [...this.byId.values()]) {
      if (this.release(presenter)) released.push(presenter.getId());
    }
    return released;
  }

  /** Ask every view of every presenter to finish. */
  finishAll(): void {
    for (const presenter of this.byId.values()) {
      presenter.finish();
    }
  }
}
