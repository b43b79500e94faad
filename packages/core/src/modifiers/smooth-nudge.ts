import type { ActionLookup } from '../action-map.js';
import { asAxis3D, convertValue, fromVec3 } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { Vec3 } from '../device.js';
import type { FrameTime } from '../input-time.js';
import type { InputModifier } from './modifier.js';

const SNAP_DISTANCE_SQUARED = 1e-4;

/**
 * Eases the value towards its target with exponential decay.
 *
 * Stateful: one instance belongs to one binding.
 */
export class SmoothNudgeModifier implements InputModifier {
  readonly type = 'smoothNudge';
  private current: Vec3 = { x: 0, y: 0, z: 0 };

  constructor(readonly decayRate: number) {}

  apply(_actions: ActionLookup, time: FrameTime, value: ActionValue): ActionValue {
    const source = value.kind === 'bool' ? convertValue(value, 'axis1d') : value;
    const target = asAxis3D(source);
    const dx = this.current.x - target.x;
    const dy = this.current.y - target.y;
    const dz = this.current.z - target.z;

    if (dx * dx + dy * dy + dz * dz < SNAP_DISTANCE_SQUARED) {
      this.current = target;
      return source;
    }

    const retained = Math.exp(-this.decayRate * time.deltaSecs);
    this.current = {
      x: target.x + dx * retained,
      y: target.y + dy * retained,
      z: target.z + dz * retained,
    };
    return fromVec3(this.current, source.kind);
  }
}
