/**
 * An in-memory view used during testing.
 * Records every snapshot and host-environment call for inspection.
 */

import type {
  HostAction,
  HostContext,
  MessageDuration,
  MvpView,
  Snapshot,
  ViewArguments,
} from '../core/types.js';

export interface RecordedMessage {
  text: string;
  duration: MessageDuration;
}

export class RecordingView<T> implements MvpView<T> {
  /** All snapshots delivered, in order. */
  readonly snapshots: Snapshot<T>[] = [];
  readonly messages: RecordedMessage[] = [];
  readonly actions: HostAction[] = [];
  finished = false;

  /** If set, onStateChanged throws after recording a matching snapshot. */
  failWhen: ((snapshot: Snapshot<T>) => boolean) | null = null;

  private readonly context: HostContext = {
    showMessage: (text, duration) => {
      this.messages.push({ text, duration });
    },
    startAction: (action) => {
      this.actions.push(action);
    },
  };

  constructor(private readonly args: ViewArguments = {}) {}

  onStateChanged(snapshot: Snapshot<T>): void {
    this.snapshots.push(snapshot);
    if (this.failWhen?.(snapshot)) {
      throw new Error(`render failed at revision ${snapshot.revision}`);
    }
  }

  finish(): void {
    this.finished = true;
  }

  getContext(): HostContext {
    return this.context;
  }

  getArguments(): ViewArguments {
    return this.args;
  }

  /** The last snapshot delivered, if any. */
  get last(): Snapshot<T> | undefined {
    return this.snapshots[this.snapshots.length - 1];
  }

  /** Revisions of delivered snapshots, in delivery order. */
  get revisions(): number[] {
    return this.snapshots.map((s) => s.revision);
  }
}
