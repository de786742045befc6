export { BindingHarness } from './harness.js';
export type { PresenterApp, HarnessConfig, AttachOptions, AttachedView } from './harness.js';
export { RecordingView } from './recording-view.js';
export type { RecordedMessage } from './recording-view.js';
export { summarizeDelivery, formatDelivery } from './metrics.js';
export type { DeliverySummary, DeliverySource } from './metrics.js';
