import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

export class ReleaseCondition implements InputCondition {
  readonly type = 'release';
  readonly kind = 'explicit';
  private actuated = false;

  constructor(readonly actuation: number) {}

  evaluate(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionState {
    const previouslyActuated = this.actuated;
    this.actuated = isActuated(value, this.actuation);
    if (this.actuated) {
      return ActionState.Ongoing;
    }
    return previouslyActuated ? ActionState.Fired : ActionState.None;
  }
}
