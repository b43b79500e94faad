/**
 * Physical device vocabulary shared by inputs, readers and snapshots.
 *
 * Keyboard keys use W3C `KeyboardEvent.code` names (`KeyA`, `ArrowUp`,
 * `ControlLeft`, ...) so hosts can forward DOM events without translation.
 */

export type KeyCode = string;

export const MOUSE_BUTTONS = [
  'Left',
  'Right',
  'Middle',
  'Back',
  'Forward',
] as const;

export type MouseButton = (typeof MOUSE_BUTTONS)[number];

export const GAMEPAD_BUTTONS = [
  'South',
  'East',
  'North',
  'West',
  'LeftTrigger',
  'LeftTrigger2',
  'RightTrigger',
  'RightTrigger2',
  'Select',
  'Start',
  'Mode',
  'LeftThumb',
  'RightThumb',
  'DPadUp',
  'DPadDown',
  'DPadLeft',
  'DPadRight',
] as const;

export type GamepadButton = (typeof GAMEPAD_BUTTONS)[number];

export const GAMEPAD_AXES = [
  'LeftStickX',
  'LeftStickY',
  'LeftZ',
  'RightStickX',
  'RightStickY',
  'RightZ',
] as const;

export type GamepadAxis = (typeof GAMEPAD_AXES)[number];

export type GamepadId = string;

/**
 * Gamepad filter of an input context.
 *
 * `any` aggregates every connected gamepad: axes are summed, buttons report
 * the strongest press. `single` reads one gamepad only.
 */
export type GamepadDevice =
  | Readonly<{ kind: 'any' }>
  | Readonly<{ kind: 'single'; id: GamepadId }>;

export const ANY_GAMEPAD: GamepadDevice = Object.freeze({ kind: 'any' });

export const singleGamepad = (id: GamepadId): GamepadDevice =>
  Object.freeze({ kind: 'single', id });

export type GamepadSnapshot = Readonly<{
  id: GamepadId;
  buttons: Readonly<Partial<Record<GamepadButton, number>>>;
  axes: Readonly<Partial<Record<GamepadAxis, number>>>;
}>;

export type Vec2 = Readonly<{ x: number; y: number }>;

export type Vec3 = Readonly<{ x: number; y: number; z: number }>;

/**
 * Raw device state for one frame, as produced by the host.
 *
 * Mouse motion and wheel are the deltas accumulated since the previous frame.
 */
export type DeviceSnapshot = Readonly<{
  keys: ReadonlySet<KeyCode>;
  justPressedKeys: ReadonlySet<KeyCode>;
  justReleasedKeys: ReadonlySet<KeyCode>;
  mouseButtons: ReadonlySet<MouseButton>;
  mouseMotion: Vec2;
  mouseWheel: Vec2;
  gamepads: readonly GamepadSnapshot[];
}>;

export const EMPTY_DEVICE_SNAPSHOT: DeviceSnapshot = Object.freeze({
  keys: new Set<KeyCode>(),
  justPressedKeys: new Set<KeyCode>(),
  justReleasedKeys: new Set<KeyCode>(),
  mouseButtons: new Set<MouseButton>(),
  mouseMotion: Object.freeze({ x: 0, y: 0 }),
  mouseWheel: Object.freeze({ x: 0, y: 0 }),
  gamepads: Object.freeze([]),
});
