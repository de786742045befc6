export { BasePresenter, nextPresenterId } from './presenter.js';
export type { PresenterOptions } from './presenter.js';
export { PresenterManager } from './manager.js';
export type { PresenterManagerOptions } from './manager.js';
