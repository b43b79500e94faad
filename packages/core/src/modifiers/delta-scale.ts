import type { ActionLookup } from '../action-map.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import { mapComponents } from './modifier.js';
import type { InputModifier } from './modifier.js';

/**
 * Multiplies the value by the frame delta, turning a per-frame impulse into a
 * per-second rate. A `bool` value becomes `axis1d`.
 */
export class DeltaScaleModifier implements InputModifier {
  readonly type = 'deltaScale';

  apply(_actions: ActionLookup, time: FrameTime, value: ActionValue): ActionValue {
    return mapComponents(value, (component) => component * time.deltaSecs);
  }
}
