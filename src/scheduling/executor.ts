/**
 * Serial executors — the runtime's execution contexts.
 *
 * The delivery executor serializes every state delivery and view-bound
 * side effect. Each presenter gets its own serial executor for hook
 * invocations. Tasks never run on the caller's stack: execute() only
 * enqueues, so no operation blocks or re-enters its caller.
 */

import type { Executor, Task } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';

/**
 * FIFO executor that runs one task at a time on the event loop.
 *
 * A task that returns a promise holds the executor until it settles, so
 * async presenter hooks never overlap. Task faults are logged and the
 * next task still runs.
 */
export class SerialExecutor implements Executor {
  private tail: Promise<void> = Promise.resolve();
  private _pending = 0;

  constructor(private readonly logger: Logger = silentLogger) {}

  /** Tasks submitted but not yet finished. */
  get pending(): number {
    return this._pending;
  }

  execute(task: Task): void {
    this._pending++;
    this.tail = this.tail.then(async () => {
      try {
        await task();
      } catch (err) {
        this.logger.error('task failed:', err);
      } finally {
        this._pending--;
      }
    });
  }

  /**
   * Resolve once every task submitted so far (and any they submit in
   * turn) has finished.
   */
  async whenIdle(): Promise<void> {
    while (this._pending > 0) {
      await this.tail;
    }
  }
}

/** Run a task that may be async, logging a rejection instead of dropping it. */
export function runTask(task: Task, logger: Logger): void {
  try {
    const result = task();
    if (result instanceof Promise) {
      result.catch((err: unknown) => logger.error('task failed:', err));
    }
  } catch (err) {
    logger.error('task failed:', err);
  }
}
