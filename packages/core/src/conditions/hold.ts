import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Ongoing while actuated, fired once the value has stayed actuated for
 * `holdTime` seconds. With `oneShot` it fires on a single frame per hold.
 */
export class HoldCondition implements InputCondition {
  readonly type = 'hold';
  readonly kind = 'explicit';
  private heldSecs = 0;
  private firedThisHold = false;

  constructor(
    readonly holdTime: number,
    readonly oneShot: boolean,
    readonly actuation: number,
  ) {}

  evaluate(_actions: ActionLookup, time: FrameTime, value: ActionValue): ActionState {
    if (!isActuated(value, this.actuation)) {
      this.heldSecs = 0;
      this.firedThisHold = false;
      return ActionState.None;
    }

    this.heldSecs += time.deltaSecs;
    if (this.heldSecs < this.holdTime) {
      return ActionState.Ongoing;
    }
    if (this.oneShot && this.firedThisHold) {
      return ActionState.None;
    }
    this.firedThisHold = true;
    return ActionState.Fired;
  }
}
