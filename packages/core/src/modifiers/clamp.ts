import type { ActionLookup } from '../action-map.js';
import type { ActionValue } from '../action-value.js';
import type { Vec3 } from '../device.js';
import type { FrameTime } from '../input-time.js';
import { mapComponents } from './modifier.js';
import type { InputModifier } from './modifier.js';

export class ClampModifier implements InputModifier {
  readonly type = 'clamp';

  constructor(
    readonly min: Vec3,
    readonly max: Vec3,
  ) {}

  apply(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    return mapComponents(value, (component, axis) =>
      Math.min(Math.max(component, this.min[axis]), this.max[axis]),
    );
  }
}
