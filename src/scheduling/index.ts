export { SerialExecutor, runTask } from './executor.js';
export { ManualExecutor } from './manual.js';
