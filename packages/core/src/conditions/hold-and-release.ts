import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Fires on the release frame of a hold that lasted at least `holdTime`.
 */
export class HoldAndReleaseCondition implements InputCondition {
  readonly type = 'holdAndRelease';
  readonly kind = 'explicit';
  private actuated = false;
  private heldSecs = 0;

  constructor(
    readonly holdTime: number,
    readonly actuation: number,
  ) {}

  evaluate(_actions: ActionLookup, time: FrameTime, value: ActionValue): ActionState {
    const previouslyActuated = this.actuated;
    this.actuated = isActuated(value, this.actuation);

    if (this.actuated) {
      this.heldSecs += time.deltaSecs;
      return ActionState.Ongoing;
    }

    const heldSecs = this.heldSecs;
    this.heldSecs = 0;
    return previouslyActuated && heldSecs >= this.holdTime
      ? ActionState.Fired
      : ActionState.None;
  }
}
