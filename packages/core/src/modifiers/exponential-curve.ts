import type { ActionLookup } from '../action-map.js';
import type { ActionValue } from '../action-value.js';
import type { Vec3 } from '../device.js';
import type { FrameTime } from '../input-time.js';
import { mapComponents } from './modifier.js';
import type { InputModifier } from './modifier.js';

/**
 * Raises the magnitude of each component to a per-axis exponent, keeping the
 * sign. Used to flatten stick response near the center.
 */
export class ExponentialCurveModifier implements InputModifier {
  readonly type = 'exponentialCurve';

  constructor(readonly exponent: Vec3) {}

  apply(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    return mapComponents(value, (component, axis) => {
      const magnitude = Math.abs(component) ** this.exponent[axis];
      return component < 0 ? -magnitude : magnitude;
    });
  }
}
