import type { ActionLookup } from '../action-map.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import { mapComponents } from './modifier.js';
import type { Axis, InputModifier } from './modifier.js';

export class NegateModifier implements InputModifier {
  readonly type = 'negate';

  constructor(readonly axes: Readonly<Record<Axis, boolean>>) {}

  apply(_actions: ActionLookup, _time: FrameTime, value: ActionValue): ActionValue {
    return mapComponents(value, (component, axis) =>
      this.axes[axis] ? -component : component,
    );
  }
}
