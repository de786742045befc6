/**
 * Tests for PresenterManager: presenter lookup, binding, and release.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { PresenterManager } from '../../src/presenter/manager.js';
import { ManualExecutor } from '../../src/scheduling/manual.js';
import { SerialExecutor } from '../../src/scheduling/executor.js';
import { silentLogger } from '../../src/core/logger.js';
import { DEFAULT_CONFIG } from '../../src/core/runtime-config.js';
import { RecordingView } from '../../src/harness/recording-view.js';
import { StrongConsumerRef } from '../../src/view/consumer-ref.js';
import type { MvpView } from '../../src/core/types.js';
import { CounterPresenter } from '../../src/test-apps/counter.js';
import type { CounterState } from '../../src/test-apps/counter.js';
import { TickerPresenter } from '../../src/test-apps/ticker.js';
import type { TickerState } from '../../src/test-apps/ticker.js';

describe('PresenterManager', () => {
  let delivery: ManualExecutor;
  let manager: PresenterManager;

  beforeEach(() => {
    delivery = new ManualExecutor();
    manager = new PresenterManager({
      config: { weakReferences: false },
      deliveryExecutor: delivery,
      logger: silentLogger,
    });
  });

  function counter(key = 'counter'): CounterPresenter {
    return manager.getOrCreate(key, CounterPresenter, () => new CounterPresenter(manager.presenterOptions()));
  }

  // ── Configuration ────────────────────────────────────────────

  it('uses the default configuration', () => {
    const plain = new PresenterManager();
    expect(plain.config).toEqual(DEFAULT_CONFIG);
    expect(plain.logger.level).toBe('info');
    expect(plain.deliveryExecutor).toBeInstanceOf(SerialExecutor);
  });

  it('overlays partial configuration on the defaults', () => {
    const tuned = new PresenterManager({ config: { thinningFactor: 3 } });
    expect(tuned.config).toEqual({ thinningFactor: 3, logLevel: 'info', weakReferences: true });
  });

  // ── Presenters ───────────────────────────────────────────────

  it('creates a presenter once per key', () => {
    const create = vi.fn(() => new CounterPresenter());
    const first = manager.getOrCreate('counter', CounterPresenter, create);
    const second = manager.getOrCreate('counter', CounterPresenter, create);

    expect(second).toBe(first);
    expect(create).toHaveBeenCalledTimes(1);
    expect(manager.size).toBe(1);
    expect(manager.get(first.getId())).toBe(first);
  });

  it('rejects a key held by a presenter of another class', () => {
    counter('screen');
    expect(() =>
      manager.getOrCreate('screen', TickerPresenter, () => new TickerPresenter()),
    ).toThrow('Presenter "screen" is a CounterPresenter, not a TickerPresenter');
  });

  // ── Binding ──────────────────────────────────────────────────

  it('connects a new binding to the presenter', () => {
    const presenter = counter();
    const binding = manager.bind(new RecordingView<CounterState>(), presenter);

    expect(binding.presenter).toBe(presenter);
    expect(presenter.viewCount).toBe(1);
  });

  it('binds through a reference the caller holds', () => {
    const presenter = counter();
    const view = new RecordingView<CounterState>();
    const ref = new StrongConsumerRef<MvpView<CounterState>>(view);
    const binding = manager.bind(ref, presenter);

    expect(binding.getMvpView()).toBe(view);
    ref.clear();
    binding.checkLiveness();
    expect(binding.isDisconnected()).toBe(true);
    expect(presenter.isDetached()).toBe(true);
  });

  it('applies the configured thinning factor to bindings', async () => {
    const unthinned = new PresenterManager({
      config: { thinningFactor: 1000, weakReferences: false },
      deliveryExecutor: delivery,
      logger: silentLogger,
    });
    const ticker = unthinned.getOrCreate('ticker', TickerPresenter, () => new TickerPresenter());
    const view = new RecordingView<TickerState>();
    const binding = unthinned.bind(view, ticker);
    binding.setEnabled(true);
    binding.onResumed();
    await ticker.whenIdle();

    ticker.burst(30);
    delivery.runAll();

    expect(view.snapshots).toHaveLength(31);
    expect(view.last?.data.tick).toBe(30);
  });

  // ── Release ──────────────────────────────────────────────────

  it('releases the presenter when its last view unbinds', async () => {
    const presenter = counter();
    const binding = manager.bind(new RecordingView<CounterState>(), presenter);

    await expect(manager.unbind(binding)).resolves.toBe(true);
    expect(manager.size).toBe(0);
    expect(manager.get(presenter.getId())).toBeUndefined();
    expect(counter()).not.toBe(presenter);
  });

  it('keeps the presenter while other views remain', async () => {
    const presenter = counter();
    const first = manager.bind(new RecordingView<CounterState>(), presenter);
    manager.bind(new RecordingView<CounterState>(), presenter);

    await expect(manager.unbind(first)).resolves.toBe(false);
    expect(manager.size).toBe(1);
    expect(manager.release(presenter)).toBe(false);
  });

  it('does not release a presenter twice', async () => {
    const presenter = counter();
    const binding = manager.bind(new RecordingView<CounterState>(), presenter);
    await manager.unbind(binding);

    expect(manager.release(presenter)).toBe(false);
  });

  it('sweeps every presenter without views', () => {
    const bound = counter('bound');
    const idle = counter('idle');
    manager.bind(new RecordingView<CounterState>(), bound);

    expect(manager.sweep()).toEqual([idle.getId()]);
    expect(manager.size).toBe(1);
    expect(manager.get(bound.getId())).toBe(bound);
  });

  it('asks every view to finish', () => {
    const a = new RecordingView<CounterState>();
    const b = new RecordingView<CounterState>();
    manager.bind(a, counter('a'));
    manager.bind(b, counter('b'));

    manager.finishAll();
    delivery.runAll();

    expect(a.finished).toBe(true);
    expect(b.finished).toBe(true);
  });
});
