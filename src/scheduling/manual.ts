/**
 * Manual executor — an in-process stand-in for the delivery executor.
 *
 * Tasks queue up until the test (or harness) runs them, which makes
 * interleavings explicit: post three snapshots, pause, run the queued
 * drain, and observe that nothing was consumed.
 */

import type { Executor, Task } from '../core/types.js';
import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import { runTask } from './executor.js';

export class ManualExecutor implements Executor {
  private tasks: Task[] = [];

  constructor(private readonly logger: Logger = silentLogger) {}

  execute(task: Task): void {
    this.tasks.push(task);
  }

  /** Number of queued tasks. */
  get pending(): number {
    return this.tasks.length;
  }

  /** Run the oldest queued task. Returns false if there was none. */
  runNext(): boolean {
    const task = this.tasks.shift();
    if (task === undefined) return false;
    runTask(task, this.logger);
    return true;
  }

  /**
   * Run queued tasks until the queue is empty, including tasks queued
   * by the tasks themselves. Async tasks are started, not awaited.
   * Returns the number of tasks run.
   */
  runAll(): number {
    let count = 0;
    while (this.runNext()) count++;
    return count;
  }

  /** Drop every queued task without running it. */
  clear(): void {
    this.tasks = [];
  }
}
