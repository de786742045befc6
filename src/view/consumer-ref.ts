/**
 * Consumer references — how a handle holds its view.
 *
 * The view owns its handle, not the other way around. A handle keeps its
 * view through a ConsumerRef and polls it after every externally started
 * operation. If the view is gone without having disconnected,
 * pollReclaimed() reports it exactly once and the handle disconnects
 * itself. Explicit disconnect remains the primary cleanup path; this
 * one depends on garbage-collection timing.
 */

export abstract class ConsumerRef<V extends object> {
  private reclaimed = false;
  private reported = false;

  /** The view, or undefined once it is gone. */
  abstract get(): V | undefined;

  /**
   * Returns true exactly once after the view has been reclaimed or
   * released, then false forever.
   */
  pollReclaimed(): boolean {
    if (this.reported) return false;
    if (this.reclaimed || this.get() === undefined) {
      this.reported = true;
      return true;
    }
    return false;
  }

  /** Called from the notification channel when the view goes away. */
  protected markReclaimed(): void {
    this.reclaimed = true;
  }
}

/**
 * Holds the view through WeakRef. A FinalizationRegistry acts as the
 * finalization-notification channel.
 */
export class WeakConsumerRef<V extends object> extends ConsumerRef<V> {
  private readonly ref: WeakRef<V>;
  private readonly registry: FinalizationRegistry<undefined>;

  constructor(view: V) {
    super();
    this.ref = new WeakRef(view);
    this.registry = new FinalizationRegistry(() => this.markReclaimed());
    this.registry.register(view, undefined);
  }

  get(): V | undefined {
    return this.ref.deref();
  }
}

/**
 * Holds the view strongly until clear() is called. Used when weak
 * references are turned off, and to release a view deterministically.
 */
export class StrongConsumerRef<V extends object> extends ConsumerRef<V> {
  private view: V | undefined;

  constructor(view: V) {
    super();
    this.view = view;
  }

  get(): V | undefined {
    return this.view;
  }

  /** Release the view, as if it had been collected. */
  clear(): void {
    this.view = undefined;
    this.markReclaimed();
  }
}

export function createConsumerRef<V extends object>(view: V, weak: boolean): ConsumerRef<V> {
  return weak ? new WeakConsumerRef(view) : new StrongConsumerRef(view);
}
