/**
 * Tests for the serial and manual executors.
 */

import { describe, it, expect, vi } from 'vitest';
import { SerialExecutor, runTask } from '../../src/scheduling/executor.js';
import { ManualExecutor } from '../../src/scheduling/manual.js';
import { createLogger } from '../../src/core/logger.js';

function createSink() {
  return { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('SerialExecutor', () => {
  it('never runs a task on the caller stack', async () => {
    const executor = new SerialExecutor();
    let ran = false;
    executor.execute(() => {
      ran = true;
    });

    expect(ran).toBe(false);
    await executor.whenIdle();
    expect(ran).toBe(true);
  });

  it('runs tasks in submission order', async () => {
    const executor = new SerialExecutor();
    const order: number[] = [];
    for (let i = 1; i <= 4; i++) executor.execute(() => void order.push(i));

    expect(executor.pending).toBe(4);
    await executor.whenIdle();
    expect(order).toEqual([1, 2, 3, 4]);
    expect(executor.pending).toBe(0);
  });

  it('holds the executor until an async task settles', async () => {
    const executor = new SerialExecutor();
    const events: string[] = [];
    executor.execute(async () => {
      events.push('a:start');
      await delay(5);
      events.push('a:end');
    });
    executor.execute(() => void events.push('b'));

    await executor.whenIdle();
    expect(events).toEqual(['a:start', 'a:end', 'b']);
  });

  it('logs a failing task and runs the next one', async () => {
    const sink = createSink();
    const executor = new SerialExecutor(createLogger('error', 'exec', sink));
    let ran = false;
    executor.execute(() => {
      throw new Error('boom');
    });
    executor.execute(async () => {
      ran = true;
    });

    await executor.whenIdle();
    expect(ran).toBe(true);
    expect(sink.error).toHaveBeenCalledTimes(1);
    expect(sink.error).toHaveBeenCalledWith('[exec] task failed:', expect.any(Error));
  });

  it('waits for tasks submitted by other tasks', async () => {
    const executor = new SerialExecutor();
    const order: string[] = [];
    executor.execute(() => {
      order.push('outer');
      executor.execute(() => void order.push('inner'));
    });

    await executor.whenIdle();
    expect(order).toEqual(['outer', 'inner']);
  });
});

describe('runTask', () => {
  it('logs a synchronous throw', () => {
    const sink = createSink();
    runTask(() => {
      throw new Error('sync');
    }, createLogger('error', 'run', sink));

    expect(sink.error).toHaveBeenCalledTimes(1);
  });

  it('logs a rejected promise', async () => {
    const sink = createSink();
    runTask(async () => {
      throw new Error('async');
    }, createLogger('error', 'run', sink));

    await delay(0);
    expect(sink.error).toHaveBeenCalledTimes(1);
  });
});

describe('ManualExecutor', () => {
  it('queues tasks until they are run', () => {
    const executor = new ManualExecutor();
    const order: number[] = [];
    executor.execute(() => void order.push(1));
    executor.execute(() => void order.push(2));

    expect(executor.pending).toBe(2);
    expect(executor.runNext()).toBe(true);
    expect(order).toEqual([1]);
    expect(executor.pending).toBe(1);
  });

  it('reports an empty queue', () => {
    expect(new ManualExecutor().runNext()).toBe(false);
  });

  it('runs nested tasks in runAll', () => {
    const executor = new ManualExecutor();
    const order: string[] = [];
    executor.execute(() => {
      order.push('a');
      executor.execute(() => void order.push('c'));
    });
    executor.execute(() => void order.push('b'));

    expect(executor.runAll()).toBe(3);
    expect(order).toEqual(['a', 'b', 'c']);
  });

  it('drops queued tasks on clear', () => {
    const executor = new ManualExecutor();
    const task = vi.fn();
    executor.execute(task);
    executor.clear();

    expect(executor.runAll()).toBe(0);
    expect(task).not.toHaveBeenCalled();
  });
});
