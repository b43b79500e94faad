import type { ActionId } from '../action.js';
import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import type { ActionValue } from '../action-value.js';
import { resolveDependency } from '../dependency.js';
import type { FrameTime } from '../input-time.js';
import type { InputCondition } from './condition.js';

/**
 * Reports the current-pass state of another action verbatim.
 *
 * The dependency must be declared earlier in the same context; otherwise
 * the chord reads `none`.
 */
export class ChordCondition implements InputCondition {
  readonly type = 'chord';
  readonly kind = 'implicit';

  constructor(readonly action: ActionId) {}

  evaluate(actions: ActionLookup, _time: FrameTime, _value: ActionValue): ActionState {
    return resolveDependency(actions, this.action, this.type)?.state ?? ActionState.None;
  }
}
