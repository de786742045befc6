/**
 * Sample presenter apps.
 *
 * counter: first-connect init, clicks, host actions and results, messages
 * ticker:  burst commits, thinning, pause/resume backlog, ordering
 */

export { counterApp, CounterPresenter, SHARE_REQUEST } from './counter.js';
export type { CounterState } from './counter.js';
export { tickerApp, TickerPresenter, HISTORY_LENGTH } from './ticker.js';
export type { TickerState } from './ticker.js';
