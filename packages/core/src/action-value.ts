import type { Vec2, Vec3 } from './device.js';

export const ACTION_VALUE_DIMS = ['bool', 'axis1d', 'axis2d', 'axis3d'] as const;

export type ActionValueDim = (typeof ACTION_VALUE_DIMS)[number];

export type BoolValue = Readonly<{ kind: 'bool'; value: boolean }>;
export type Axis1DValue = Readonly<{ kind: 'axis1d'; value: number }>;
export type Axis2DValue = Readonly<{ kind: 'axis2d'; x: number; y: number }>;
export type Axis3DValue = Readonly<{
  kind: 'axis3d';
  x: number;
  y: number;
  z: number;
}>;

/**
 * Value of an action in one of four dimensions.
 */
export type ActionValue = BoolValue | Axis1DValue | Axis2DValue | Axis3DValue;

// Collapses -0 so structurally equal values compare equal.
const normalizeZero = (value: number): number => (value === 0 ? 0 : value);

export const boolValue = (value: boolean): BoolValue => ({ kind: 'bool', value });

export const axis1d = (value: number): Axis1DValue => ({
  kind: 'axis1d',
  value: normalizeZero(value),
});

export const axis2d = (x: number, y: number): Axis2DValue => ({
  kind: 'axis2d',
  x: normalizeZero(x),
  y: normalizeZero(y),
});

export const axis3d = (x: number, y: number, z: number): Axis3DValue => ({
  kind: 'axis3d',
  x: normalizeZero(x),
  y: normalizeZero(y),
  z: normalizeZero(z),
});

export function zeroValue(dim: ActionValueDim): ActionValue {
  switch (dim) {
    case 'bool':
      return boolValue(false);
    case 'axis1d':
      return axis1d(0);
    case 'axis2d':
      return axis2d(0, 0);
    case 'axis3d':
      return axis3d(0, 0, 0);
  }
}

/**
 * Non-zero in any component is `true`.
 */
export function asBool(value: ActionValue): boolean {
  switch (value.kind) {
    case 'bool':
      return value.value;
    case 'axis1d':
      return value.value !== 0;
    case 'axis2d':
      return value.x !== 0 || value.y !== 0;
    case 'axis3d':
      return value.x !== 0 || value.y !== 0 || value.z !== 0;
  }
}

/**
 * Booleans widen to 0 or 1; vectors narrow to their first component.
 */
export function asAxis1D(value: ActionValue): number {
  switch (value.kind) {
    case 'bool':
      return value.value ? 1 : 0;
    case 'axis1d':
      return value.value;
    case 'axis2d':
    case 'axis3d':
      return value.x;
  }
}

export function asAxis2D(value: ActionValue): Vec2 {
  switch (value.kind) {
    case 'bool':
    case 'axis1d':
      return { x: asAxis1D(value), y: 0 };
    case 'axis2d':
    case 'axis3d':
      return { x: value.x, y: value.y };
  }
}

export function asAxis3D(value: ActionValue): Vec3 {
  switch (value.kind) {
    case 'bool':
    case 'axis1d':
      return { x: asAxis1D(value), y: 0, z: 0 };
    case 'axis2d':
      return { x: value.x, y: value.y, z: 0 };
    case 'axis3d':
      return { x: value.x, y: value.y, z: value.z };
  }
}

const DIM_RANK: Readonly<Record<ActionValueDim, number>> = {
  bool: 0,
  axis1d: 1,
  axis2d: 2,
  axis3d: 3,
};

export const widerDim = (left: ActionValueDim, right: ActionValueDim): ActionValueDim =>
  DIM_RANK[left] >= DIM_RANK[right] ? left : right;

/**
 * Converts only upward: the result keeps every component of `value` and is at
 * least `dim`. Narrowing is left to the published output.
 */
export function widenValue(value: ActionValue, dim: ActionValueDim): ActionValue {
  return convertValue(value, widerDim(value.kind, dim));
}

export function convertValue(value: ActionValue, dim: ActionValueDim): ActionValue {
  if (value.kind === dim) {
    return value;
  }
  switch (dim) {
    case 'bool':
      return boolValue(asBool(value));
    case 'axis1d':
      return axis1d(asAxis1D(value));
    case 'axis2d': {
      const { x, y } = asAxis2D(value);
      return axis2d(x, y);
    }
    case 'axis3d': {
      const { x, y, z } = asAxis3D(value);
      return axis3d(x, y, z);
    }
  }
}

/**
 * Builds a value of the given dimension from a vector, using the same
 * narrowing rules as {@link convertValue}.
 */
export function fromVec3(vec: Vec3, dim: ActionValueDim): ActionValue {
  return convertValue(axis3d(vec.x, vec.y, vec.z), dim);
}

export function valueLength(value: ActionValue): number {
  const { x, y, z } = asAxis3D(value);
  return Math.sqrt(x * x + y * y + z * z);
}

/**
 * Whether the magnitude of the value reaches the actuation threshold.
 */
export function isActuated(value: ActionValue, threshold: number): boolean {
  const { x, y, z } = asAxis3D(value);
  return x * x + y * y + z * z >= threshold * threshold;
}

export function valuesEqual(left: ActionValue, right: ActionValue): boolean {
  if (left.kind !== right.kind) {
    return false;
  }
  const a = asAxis3D(left);
  const b = asAxis3D(right);
  return a.x === b.x && a.y === b.y && a.z === b.z;
}

export function formatValue(value: ActionValue): string {
  switch (value.kind) {
    case 'bool':
      return String(value.value);
    case 'axis1d':
      return String(value.value);
    case 'axis2d':
      return `(${value.x}, ${value.y})`;
    case 'axis3d':
      return `(${value.x}, ${value.y}, ${value.z})`;
  }
}
