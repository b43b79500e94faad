import type { ActionId } from '../action.js';
import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import type { ActionValue } from '../action-value.js';
import { resolveDependency } from '../dependency.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Reports `none`, which blocks the action, while the other action is fired
 * or cannot be found.
 */
export class BlockByCondition implements InputCondition {
  readonly type = 'blockBy';
  readonly kind = 'blocker';

  constructor(readonly action: ActionId) {}

  evaluate(actions: ActionLookup, _time: FrameTime, _value: ActionValue): ActionState {
    const dependency = resolveDependency(actions, this.action, this.type);
    if (!dependency || dependency.state === ActionState.Fired) {
      return ActionState.None;
    }
    return ActionState.Fired;
  }
}
