import type { ActionId } from '../action.js';
import type { ActionLookup } from '../action-map.js';
import { axis1d, axis2d, axis3d } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import type { Vec3 } from '../device.js';
import type { FrameTime } from '../input-time.js';
import type { VariantOptions } from '../variant-registry.js';

export type Axis = 'x' | 'y' | 'z';

type AxisLetter = 'X' | 'Y' | 'Z';

/**
 * Output axis order; `YXZ` writes the input's y into x and its x into y.
 */
export type SwizzleOrder = `${AxisLetter}${AxisLetter}${AxisLetter}`;

export type DeadZoneShape = 'radial' | 'axial';

/**
 * Transform applied to an action value before conditions see it.
 */
export interface InputModifier {
  readonly type: string;
  apply(actions: ActionLookup, time: FrameTime, value: ActionValue): ActionValue;
}

export type ModifierDefinition =
  | Readonly<{ type: 'scale'; factor: Vec3 }>
  | Readonly<{ type: 'deltaScale' }>
  | Readonly<{ type: 'negate'; x: boolean; y: boolean; z: boolean }>
  | Readonly<{ type: 'swizzleAxis'; order: SwizzleOrder }>
  | Readonly<{ type: 'deadZone'; shape: DeadZoneShape; lower: number; upper: number }>
  | Readonly<{ type: 'clamp'; min: Vec3; max: Vec3 }>
  | Readonly<{ type: 'exponentialCurve'; exponent: Vec3 }>
  | Readonly<{ type: 'smoothNudge'; decayRate: number }>
  | Readonly<{ type: 'accumulateBy'; action: ActionId }>
  | Readonly<{ type: 'custom'; name: string; options?: VariantOptions }>;

export type ModifierType = ModifierDefinition['type'];

const splat = (value: number): Vec3 => ({ x: value, y: value, z: value });

const toVec3 = (value: number | Partial<Vec3>, fallback: number): Vec3 =>
  typeof value === 'number'
    ? splat(value)
    : { x: value.x ?? fallback, y: value.y ?? fallback, z: value.z ?? fallback };

/**
 * Multiplies each component by a per-axis factor. A number applies to all
 * axes; missing axes keep a factor of 1.
 */
export const scale = (factor: number | Partial<Vec3>): ModifierDefinition => ({
  type: 'scale',
  factor: toVec3(factor, 1),
});

export const deltaScale = (): ModifierDefinition => ({ type: 'deltaScale' });

export const negate = (
  axes: Partial<Readonly<Record<Axis, boolean>>> = { x: true, y: true, z: true },
): ModifierDefinition => ({
  type: 'negate',
  x: axes.x ?? false,
  y: axes.y ?? false,
  z: axes.z ?? false,
});

export const swizzleAxis = (order: SwizzleOrder): ModifierDefinition => ({
  type: 'swizzleAxis',
  order,
});

export const deadZone = (
  options: Readonly<{ shape?: DeadZoneShape; lower?: number; upper?: number }> = {},
): ModifierDefinition => ({
  type: 'deadZone',
  shape: options.shape ?? 'radial',
  lower: options.lower ?? 0.2,
  upper: options.upper ?? 1,
});

export const clamp = (
  min: number | Partial<Vec3>,
  max: number | Partial<Vec3>,
): ModifierDefinition => ({
  type: 'clamp',
  min: toVec3(min, Number.NEGATIVE_INFINITY),
  max: toVec3(max, Number.POSITIVE_INFINITY),
});

export const exponentialCurve = (exponent: number | Partial<Vec3>): ModifierDefinition => ({
  type: 'exponentialCurve',
  exponent: toVec3(exponent, 1),
});

export const smoothNudge = (decayRate = 8): ModifierDefinition => ({
  type: 'smoothNudge',
  decayRate,
});

export const accumulateBy = (action: ActionId): ModifierDefinition => ({
  type: 'accumulateBy',
  action,
});

export const customModifier = (
  name: string,
  options?: VariantOptions,
): ModifierDefinition => ({ type: 'custom', name, options });

/**
 * Maps every present component of the value. Booleans are widened to
 * `axis1d` first, so a press becomes a magnitude.
 */
export function mapComponents(
  value: ActionValue,
  map: (component: number, axis: Axis) => number,
): ActionValue {
  switch (value.kind) {
    case 'bool':
      return axis1d(map(value.value ? 1 : 0, 'x'));
    case 'axis1d':
      return axis1d(map(value.value, 'x'));
    case 'axis2d':
      return axis2d(map(value.x, 'x'), map(value.y, 'y'));
    case 'axis3d':
      return axis3d(map(value.x, 'x'), map(value.y, 'y'), map(value.z, 'z'));
  }
}
