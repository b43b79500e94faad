import {
  bindInput,
  gamepadAxis,
  gamepadButton,
  keyboard,
  negate,
  swizzleAxis,
} from '@action-input/core';
import type {
  GamepadAxis,
  Input,
  InputBindingDefinition,
  ModifierDefinition,
} from '@action-input/core';

/*
 * Presets map each input onto a unit direction of the action's value:
 * x is right, y is up and -z is forward. Bound inputs read as (1, 0, 0)
 * once converted to the action's dimension, so every direction is reached
 * by swizzling and negating that vector.
 */

const toward = (
  input: Input,
  ...modifiers: readonly ModifierDefinition[]
): InputBindingDefinition => bindInput(input, { modifiers });

export type CardinalInputs = Readonly<{
  north: Input;
  east: Input;
  south: Input;
  west: Input;
}>;

/**
 * Four directions on a 2D plane, for `axis2d` or `axis3d` actions. Opposite
 * inputs held together cancel out.
 */
export function cardinal(inputs: CardinalInputs): InputBindingDefinition[] {
  return [
    toward(inputs.north, swizzleAxis('YXZ')),
    toward(inputs.east),
    toward(inputs.south, negate(), swizzleAxis('YXZ')),
    toward(inputs.west, negate()),
  ];
}

export const wasdKeys = (): InputBindingDefinition[] =>
  cardinal({
    north: keyboard('KeyW'),
    west: keyboard('KeyA'),
    south: keyboard('KeyS'),
    east: keyboard('KeyD'),
  });

export const arrowKeys = (): InputBindingDefinition[] =>
  cardinal({
    north: keyboard('ArrowUp'),
    west: keyboard('ArrowLeft'),
    south: keyboard('ArrowDown'),
    east: keyboard('ArrowRight'),
  });

export const dpadButtons = (): InputBindingDefinition[] =>
  cardinal({
    north: gamepadButton('DPadUp'),
    west: gamepadButton('DPadLeft'),
    south: gamepadButton('DPadDown'),
    east: gamepadButton('DPadRight'),
  });

export type BidirectionalInputs = Readonly<{
  positive: Input;
  negative: Input;
}>;

/**
 * Two opposite directions on the first axis.
 */
export function bidirectional(inputs: BidirectionalInputs): InputBindingDefinition[] {
  return [toward(inputs.positive), toward(inputs.negative, negate())];
}

export type AxialInputs = Readonly<{
  x: Input;
  y: Input;
}>;

/**
 * Two analog axes combined into one 2D value.
 */
export function axial(inputs: AxialInputs): InputBindingDefinition[] {
  return [toward(inputs.x), toward(inputs.y, swizzleAxis('YXZ'))];
}

const stick = (x: GamepadAxis, y: GamepadAxis): InputBindingDefinition[] =>
  axial({ x: gamepadAxis(x), y: gamepadAxis(y) });

export const leftStick = (): InputBindingDefinition[] =>
  stick('LeftStickX', 'LeftStickY');

export const rightStick = (): InputBindingDefinition[] =>
  stick('RightStickX', 'RightStickY');

export type SpatialInputs = Readonly<{
  forward: Input;
  backward: Input;
  left: Input;
  right: Input;
  up: Input;
  down: Input;
}>;

/**
 * Six directions in 3D space. Forward points along -z.
 */
export function spatial(inputs: SpatialInputs): InputBindingDefinition[] {
  return [
    toward(inputs.forward, swizzleAxis('ZYX'), negate()),
    toward(inputs.backward, swizzleAxis('ZYX')),
    toward(inputs.left, negate()),
    toward(inputs.right),
    toward(inputs.up, swizzleAxis('YXZ')),
    toward(inputs.down, swizzleAxis('YXZ'), negate()),
  ];
}

export type OrdinalInputs = Readonly<{
  north: Input;
  northEast: Input;
  east: Input;
  southEast: Input;
  south: Input;
  southWest: Input;
  west: Input;
  northWest: Input;
}>;

/**
 * Eight directions on a 2D plane. Diagonals are not normalized and read
 * as (±1, ±1).
 */
export function ordinal(inputs: OrdinalInputs): InputBindingDefinition[] {
  return [
    toward(inputs.north, swizzleAxis('YXZ')),
    toward(inputs.northEast, swizzleAxis('XXZ')),
    toward(inputs.east),
    toward(inputs.southEast, swizzleAxis('XXZ'), negate({ y: true })),
    toward(inputs.south, negate(), swizzleAxis('YXZ')),
    toward(inputs.southWest, swizzleAxis('XXZ'), negate()),
    toward(inputs.west, negate()),
    toward(inputs.northWest, swizzleAxis('XXZ'), negate({ x: true })),
  ];
}

export const numpadKeys = (): InputBindingDefinition[] =>
  ordinal({
    north: keyboard('Numpad8'),
    northEast: keyboard('Numpad9'),
    east: keyboard('Numpad6'),
    southEast: keyboard('Numpad3'),
    south: keyboard('Numpad2'),
    southWest: keyboard('Numpad1'),
    west: keyboard('Numpad4'),
    northWest: keyboard('Numpad7'),
  });

/**
 * Roguelike layout: `hjkl` for the cardinal directions, `yubn` for the
 * diagonals.
 */
export const hjklyubnKeys = (): InputBindingDefinition[] =>
  ordinal({
    north: keyboard('KeyK'),
    northEast: keyboard('KeyU'),
    east: keyboard('KeyL'),
    southEast: keyboard('KeyN'),
    south: keyboard('KeyJ'),
    southWest: keyboard('KeyB'),
    west: keyboard('KeyH'),
    northWest: keyboard('KeyY'),
  });
