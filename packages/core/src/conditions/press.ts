import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Fires once per actuation, on its first frame.
 */
export class PressCondition implements InputCondition {
  readonly type = 'press';
  readonly kind = 'explicit';
  private actuated = false;

  constructor(readonly actuation: number) {}

  evaluate(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionState {
    const previouslyActuated = this.actuated;
    this.actuated = isActuated(value, this.actuation);
    return this.actuated && !previouslyActuated ? ActionState.Fired : ActionState.None;
  }
}
