import type { ActionLookup } from '../action-map.js';
import { asAxis3D, convertValue, fromVec3 } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { Axis, InputModifier, SwizzleOrder } from './modifier.js';

const letterToAxis = (letter: string): Axis => {
  switch (letter) {
    case 'X':
      return 'x';
    case 'Y':
      return 'y';
    default:
      return 'z';
  }
};

/**
 * Reorders the components of the value; the dimension is kept, so a key
 * converted to `axis2d` as (1, 0) reads (0, 1) under `YXZ`.
 */
export class SwizzleAxisModifier implements InputModifier {
  readonly type = 'swizzleAxis';
  private readonly sources: readonly [Axis, Axis, Axis];

  constructor(readonly order: SwizzleOrder) {
    this.sources = [
      letterToAxis(order.charAt(0)),
      letterToAxis(order.charAt(1)),
      letterToAxis(order.charAt(2)),
    ];
  }

  apply(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    const source = value.kind === 'bool' ? convertValue(value, 'axis1d') : value;
    const vec = asAxis3D(source);
    const [x, y, z] = this.sources;
    return fromVec3({ x: vec[x], y: vec[y], z: vec[z] }, source.kind);
  }
}
