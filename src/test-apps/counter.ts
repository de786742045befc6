/**
 * Counter app — the simplest interactive presenter.
 *
 * Exercises: first-connect initialization, click handling, commit
 * broadcast, host actions with results, and view messages.
 */

import type { ViewEvent, ViewHandle } from '../core/types.js';
import { BasePresenter } from '../presenter/presenter.js';
import type { PresenterOptions } from '../presenter/presenter.js';
import type { PresenterApp } from '../harness/harness.js';

export interface CounterState {
  count: number;
  lastAction: string | null;
}

/** Request code used for the "share" host action. */
export const SHARE_REQUEST = 1;

export class CounterPresenter extends BasePresenter<CounterState> {
  constructor(options: PresenterOptions<CounterState> = {}) {
    super({ count: 0, lastAction: null }, options);
  }

  protected override onFirstViewConnected(handle: ViewHandle<CounterState>): void {
    const start = handle.getArguments()['start'];
    if (typeof start === 'number') {
      this.state.update((s) => {
        s.count = start;
      });
    }
    this.commit();
  }

  override onViewEvent(handle: ViewHandle<CounterState>, event: ViewEvent): void {
    if (event.kind === 'click') {
      switch (event.target) {
        case 'increment':
          this.state.update((s) => {
            s.count++;
            s.lastAction = 'increment';
          });
          break;
        case 'decrement':
          this.state.update((s) => {
            s.count--;
            s.lastAction = 'decrement';
          });
          break;
        case 'reset':
          this.state.set({ count: 0, lastAction: 'reset' });
          break;
        default:
          return;
      }
      this.commit();
    } else if (event.kind === 'menu' && event.itemId === 'share') {
      handle.startHostAction({
        type: 'share',
        payload: { text: `Count: ${this.state.current.count}` },
        requestCode: SHARE_REQUEST,
      });
    }
  }

  override onHostActionResult(
    handle: ViewHandle<CounterState>,
    requestCode: number,
    result: unknown,
  ): void {
    if (requestCode === SHARE_REQUEST) {
      handle.showMessage(result === true ? 'Shared' : 'Share cancelled', 'short');
    }
  }
}

export const counterApp: PresenterApp<CounterState, CounterPresenter> = {
  name: 'counter',
  description: 'Counter with increment/decrement/reset clicks and a share action.',
  type: CounterPresenter,
  create: (options) => new CounterPresenter(options),
};
