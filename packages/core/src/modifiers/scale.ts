import type { ActionLookup } from '../action-map.js';
import type { ActionValue } from '../action-value.js';
import type { Vec3 } from '../device.js';
import type { FrameTime } from '../input-time.js';
import { mapComponents } from './modifier.js';
import type { InputModifier } from './modifier.js';

/**
 * Scales the value independently along each axis.
 *
 * A `bool` value becomes `axis1d`: a press of factor 2 reads as 2.
 */
export class ScaleModifier implements InputModifier {
  readonly type = 'scale';

  constructor(readonly factor: Vec3) {}

  apply(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    return mapComponents(value, (component, axis) => component * this.factor[axis]);
  }
}
