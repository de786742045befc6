/**
 * ViewLifecycle — explicit lifecycle state machine for a bound view.
 *
 * Hosts call resume()/pause()/destroy() as their view comes and goes;
 * the lifecycle forwards the matching transitions to the binding:
 *
 *   created ──resume──→ resumed ──pause──→ paused ──resume──→ resumed
 *      └──────────┴────────destroy──────────┴──→ destroyed (disconnects)
 *
 * Repeated or out-of-order signals are ignored, so a host may forward
 * its raw lifecycle events without filtering them.
 */

import type { Logger } from '../core/logger.js';
import { silentLogger } from '../core/logger.js';
import type { ViewBinding } from './handle.js';

export type LifecycleStage = 'created' | 'resumed' | 'paused' | 'destroyed';

export class ViewLifecycle<T> {
  private _stage: LifecycleStage = 'created';

  constructor(
    private readonly binding: ViewBinding<T>,
    private readonly logger: Logger = silentLogger,
  ) {}

  get stage(): LifecycleStage {
    return this._stage;
  }

  resume(): void {
    if (this._stage === 'resumed' || this._stage === 'destroyed') {
      this.logger.debug(`ignoring resume in stage ${this._stage}`);
      return;
    }
    this._stage = 'resumed';
    this.binding.onResumed();
  }

  pause(): void {
    if (this._stage !== 'resumed') {
      this.logger.debug(`ignoring pause in stage ${this._stage}`);
      return;
    }
    this._stage = 'paused';
    this.binding.onPaused();
  }

  /** Pause if needed, then disconnect the binding from its presenter. */
  destroy(): void {
    if (this._stage === 'destroyed') return;
    if (this._stage === 'resumed') {
      this.binding.onPaused();
    }
    this._stage = 'destroyed';
    this.binding.disconnect();
  }
}
