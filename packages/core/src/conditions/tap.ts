import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Fires on release when the value was actuated for at most `releaseTime`
 * seconds. A longer hold drops back to `none` and cannot fire.
 */
export class TapCondition implements InputCondition {
  readonly type = 'tap';
  readonly kind = 'explicit';
  private actuated = false;
  private heldSecs = 0;

  constructor(
    readonly releaseTime: number,
    readonly actuation: number,
  ) {}

  evaluate(_actions: ActionLookup, time: FrameTime, value: ActionValue): ActionState {
    const previouslyActuated = this.actuated;
    this.actuated = isActuated(value, this.actuation);

    if (this.actuated) {
      this.heldSecs += time.deltaSecs;
      return this.heldSecs <= this.releaseTime ? ActionState.Ongoing : ActionState.None;
    }

    const heldSecs = this.heldSecs;
    this.heldSecs = 0;
    return previouslyActuated && heldSecs <= this.releaseTime
      ? ActionState.Fired
      : ActionState.None;
  }
}
