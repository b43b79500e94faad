import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { isActuated } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

export class DownCondition implements InputCondition {
  readonly type = 'down';
  readonly kind = 'explicit';

  constructor(readonly actuation: number) {}

  evaluate(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionState {
    return isActuated(value, this.actuation) ? ActionState.Fired : ActionState.None;
  }
}
