import type { ActionId } from '../action.js';
import type { ActionLookup } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { asAxis3D, fromVec3 } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import { resolveDependency } from '../dependency.js';
import type { Vec3 } from '../device.js';
import type { FrameTime } from '../input-time.js';
import type { InputModifier } from './modifier.js';

const ZERO: Vec3 = Object.freeze({ x: 0, y: 0, z: 0 });

/**
 * Sums the value across frames while another action is fired, and reads
 * zero otherwise. A missing dependency passes the value through unchanged.
 */
export class AccumulateByModifier implements InputModifier {
  readonly type = 'accumulateBy';
  private accumulated: Vec3 = ZERO;

  constructor(readonly action: ActionId) {}

  apply(actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    const dependency = resolveDependency(actions, this.action, this.type);
    if (!dependency) {
      return value;
    }

    if (dependency.state === ActionState.Fired) {
      const vec = asAxis3D(value);
      this.accumulated = {
        x: this.accumulated.x + vec.x,
        y: this.accumulated.y + vec.y,
        z: this.accumulated.z + vec.z,
      };
    } else {
      this.accumulated = ZERO;
    }

    return fromVec3(this.accumulated, value.kind);
  }
}
