/**
 * View side — handles, delivery control, and consumer references.
 */

export { ViewBinding } from './handle.js';
export type { ViewBindingOptions, BindingTarget } from './handle.js';
export { DeliveryLoop } from './delivery-loop.js';
export type { DeliveryPhase, DeliveryLoopOptions } from './delivery-loop.js';
export {
  ConsumerRef,
  WeakConsumerRef,
  StrongConsumerRef,
  createConsumerRef,
} from './consumer-ref.js';
export { ViewLifecycle } from './lifecycle.js';
export type { LifecycleStage } from './lifecycle.js';
