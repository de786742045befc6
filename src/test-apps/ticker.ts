/**
 * Ticker app — a presenter that commits in bursts.
 *
 * Exercises: backlog thinning, pause/resume with a queued backlog, and
 * per-view ordering under many consecutive commits.
 */

import type { ViewEvent, ViewHandle } from '../core/types.js';
import { BasePresenter } from '../presenter/presenter.js';
import type { PresenterOptions } from '../presenter/presenter.js';
import type { PresenterApp } from '../harness/harness.js';

export interface TickerState {
  tick: number;
  history: number[];
}

/** Ticks kept in `history`. */
export const HISTORY_LENGTH = 5;

export class TickerPresenter extends BasePresenter<TickerState> {
  constructor(options: PresenterOptions<TickerState> = {}) {
    super({ tick: 0, history: [] }, options);
  }

  /** Commit `count` consecutive ticks. */
  burst(count: number): void {
    for (let i = 0; i < count; i++) {
      this.state.update((s) => {
        s.tick++;
        s.history = [...s.history, s.tick].slice(-HISTORY_LENGTH);
      });
      this.commit();
    }
  }

  override onViewEvent(handle: ViewHandle<TickerState>, event: ViewEvent): void {
    if (event.kind === 'text' && event.target === 'burst') {
      const count = Number.parseInt(event.text, 10);
      if (Number.isInteger(count) && count > 0) this.burst(count);
    }
  }
}

export const tickerApp: PresenterApp<TickerState, TickerPresenter> = {
  name: 'ticker',
  description: 'Commits ticks in bursts. Tests thinning, pause/resume, and ordering.',
  type: TickerPresenter,
  create: (options) => new TickerPresenter(options),
};
