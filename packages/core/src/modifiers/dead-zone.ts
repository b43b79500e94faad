import type { ActionLookup } from '../action-map.js';
import { asAxis3D, fromVec3, valueLength } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import { mapComponents } from './modifier.js';
import type { DeadZoneShape, InputModifier } from './modifier.js';

/**
 * Remaps magnitudes between `lower` and `upper` onto `[0, 1]`.
 *
 * `radial` works on the vector length and keeps the direction; `axial`
 * treats every component on its own.
 */
export class DeadZoneModifier implements InputModifier {
  readonly type = 'deadZone';

  constructor(
    readonly shape: DeadZoneShape,
    readonly lower: number,
    readonly upper: number,
  ) {}

  apply(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    if (this.shape === 'axial' || value.kind === 'bool' || value.kind === 'axis1d') {
      return mapComponents(value, (component) => this.remap(component));
    }

    const length = valueLength(value);
    if (length === 0) {
      return value;
    }
    const factor = this.remap(length) / length;
    const vec = asAxis3D(value);
    return fromVec3(
      { x: vec.x * factor, y: vec.y * factor, z: vec.z * factor },
      value.kind,
    );
  }

  private remap(component: number): number {
    const range = this.upper - this.lower;
    const above = Math.max(Math.abs(component) - this.lower, 0);
    const scaled = range > 0 ? Math.min(above / range, 1) : above > 0 ? 1 : 0;
    return Math.sign(component) * scaled;
  }
}
