/**
 * viewbind — bind long-lived presenters to short-lived views.
 *
 * Presenters own state and broadcast immutable snapshots; each view gets
 * a ViewBinding that queues, thins, and delivers them on a single
 * delivery executor while the view is enabled and resumed.
 */

export type {
  Snapshot,
  ViewEvent,
  MessageDuration,
  HostAction,
  HostContext,
  ViewArguments,
  MvpView,
  ViewHandle,
  ManagedPresenter,
  Presenter,
  Task,
  Executor,
} from './core/types.js';
export { createLogger, silentLogger, isLogLevel, LOG_LEVELS } from './core/logger.js';
export type { Logger, LogLevel, LogSink } from './core/logger.js';
export {
  DEFAULT_CONFIG,
  RuntimeConfigError,
  mergeConfigs,
  validateConfig,
  parseRuntimeEnv,
  loadConfigFile,
  findConfigFile,
  resolveRuntimeConfig,
} from './core/runtime-config.js';
export type { RuntimeConfig } from './core/runtime-config.js';
export * from './state/index.js';
export * from './view/index.js';
export * from './presenter/index.js';
export * from './scheduling/index.js';
export * from './harness/index.js';
