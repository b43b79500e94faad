import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Fires repeatedly every `interval` seconds while actuated.
 *
 * `triggerLimit` caps the number of fires per actuation (0 is unlimited);
 * `triggerOnStart` also fires on the first actuated frame.
 */
export class PulseCondition implements InputCondition {
  readonly type = 'pulse';
  readonly kind = 'explicit';
  private active = false;
  private sinceLastSecs = 0;
  private triggerCount = 0;

  constructor(
    readonly interval: number,
    readonly triggerLimit: number,
    readonly triggerOnStart: boolean,
    readonly actuation: number,
  ) {}

  evaluate(_actions: ActionLookup, time: FrameTime, value: ActionValue): ActionState {
    if (!isActuated(value, this.actuation)) {
      this.active = false;
      this.sinceLastSecs = 0;
      this.triggerCount = 0;
      return ActionState.None;
    }

    if (this.limitReached()) {
      return ActionState.None;
    }

    if (!this.active) {
      this.active = true;
      this.sinceLastSecs = 0;
      if (this.triggerOnStart) {
        this.triggerCount += 1;
        return ActionState.Fired;
      }
      return ActionState.Ongoing;
    }

    this.sinceLastSecs += time.deltaSecs;
    if (this.sinceLastSecs >= this.interval) {
      this.sinceLastSecs -= this.interval;
      this.triggerCount += 1;
      return ActionState.Fired;
    }
    return ActionState.Ongoing;
  }

  private limitReached(): boolean {
    return this.triggerLimit > 0 && this.triggerCount >= this.triggerLimit;
  }
}
