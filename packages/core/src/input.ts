import type {
  GamepadAxis,
  GamepadButton,
  KeyCode,
  MouseButton,
} from './device.js';
import { ModKeys } from './mod-keys.js';

/**
 * A single physical input source.
 *
 * Keyboard and mouse sources carry the keyboard modifiers that must be held
 * for the source to register. Gamepad sources never carry modifiers.
 */
export type Input =
  | Readonly<{ kind: 'keyboard'; key: KeyCode; modKeys: ModKeys }>
  | Readonly<{ kind: 'mouseButton'; button: MouseButton; modKeys: ModKeys }>
  | Readonly<{ kind: 'mouseMotion'; modKeys: ModKeys }>
  | Readonly<{ kind: 'mouseWheel'; modKeys: ModKeys }>
  | Readonly<{ kind: 'gamepadButton'; button: GamepadButton }>
  | Readonly<{ kind: 'gamepadAxis'; axis: GamepadAxis }>;

export type InputKind = Input['kind'];

export const INPUT_ERROR_CODES = {
  GAMEPAD_MOD_KEYS: 'input.modKeys.gamepad',
} as const;

export type InputErrorCode =
  (typeof INPUT_ERROR_CODES)[keyof typeof INPUT_ERROR_CODES];

export interface InputError {
  readonly code: InputErrorCode;
  readonly message: string;
}

export type InputResult =
  | Readonly<{ success: true; input: Input }>
  | Readonly<{ success: false; error: InputError }>;

export const keyboard = (
  key: KeyCode,
  modKeys: ModKeys = ModKeys.empty(),
): Input => Object.freeze({ kind: 'keyboard', key, modKeys });

export const mouseButton = (
  button: MouseButton,
  modKeys: ModKeys = ModKeys.empty(),
): Input => Object.freeze({ kind: 'mouseButton', button, modKeys });

export const mouseMotion = (modKeys: ModKeys = ModKeys.empty()): Input =>
  Object.freeze({ kind: 'mouseMotion', modKeys });

export const mouseWheel = (modKeys: ModKeys = ModKeys.empty()): Input =>
  Object.freeze({ kind: 'mouseWheel', modKeys });

export const gamepadButton = (button: GamepadButton): Input =>
  Object.freeze({ kind: 'gamepadButton', button });

export const gamepadAxis = (axis: GamepadAxis): Input =>
  Object.freeze({ kind: 'gamepadAxis', axis });

export function inputModKeys(input: Input): ModKeys {
  switch (input.kind) {
    case 'keyboard':
    case 'mouseButton':
    case 'mouseMotion':
    case 'mouseWheel':
      return input.modKeys;
    case 'gamepadButton':
    case 'gamepadAxis':
      return ModKeys.empty();
  }
}

/**
 * Returns a copy of the input with its modifiers replaced.
 *
 * Modifiers are a keyboard and mouse concept; asking for them on a gamepad
 * source fails instead of silently dropping them.
 */
export function withModKeys(input: Input, modKeys: ModKeys): InputResult {
  switch (input.kind) {
    case 'keyboard':
      return { success: true, input: keyboard(input.key, modKeys) };
    case 'mouseButton':
      return { success: true, input: mouseButton(input.button, modKeys) };
    case 'mouseMotion':
      return { success: true, input: mouseMotion(modKeys) };
    case 'mouseWheel':
      return { success: true, input: mouseWheel(modKeys) };
    case 'gamepadButton':
    case 'gamepadAxis':
      return {
        success: false,
        error: {
          code: INPUT_ERROR_CODES.GAMEPAD_MOD_KEYS,
          message: `Keyboard modifiers can't be applied to gamepad input "${formatInput(input)}".`,
        },
      };
  }
}

export function withoutModKeys(input: Input): Input {
  const result = withModKeys(input, ModKeys.empty());
  return result.success ? result.input : input;
}

export function inputModKeysCount(input: Input): number {
  return inputModKeys(input).count();
}

/**
 * Stable identity of the physical source, ignoring modifiers.
 */
export function inputSourceKey(input: Input): string {
  switch (input.kind) {
    case 'keyboard':
      return `key:${input.key}`;
    case 'mouseButton':
      return `mouse:${input.button}`;
    case 'mouseMotion':
      return 'mouse:motion';
    case 'mouseWheel':
      return 'mouse:wheel';
    case 'gamepadButton':
      return `gamepad:button:${input.button}`;
    case 'gamepadAxis':
      return `gamepad:axis:${input.axis}`;
  }
}

/**
 * Stable identity of the input including its modifiers, suitable as a map key.
 */
export function inputKey(input: Input): string {
  const modKeys = inputModKeys(input);
  const source = inputSourceKey(input);
  return modKeys.isEmpty() ? source : `${source}+${modKeys.bits}`;
}

/**
 * Exact equality: same source and the same modifiers. `Ctrl + KeyA` is not
 * equal to `KeyA`.
 */
export function inputsEqual(left: Input, right: Input): boolean {
  return inputKey(left) === inputKey(right);
}

function formatSource(input: Input): string {
  switch (input.kind) {
    case 'keyboard':
      return input.key;
    case 'mouseButton':
      return `Mouse ${input.button}`;
    case 'mouseMotion':
      return 'Mouse Motion';
    case 'mouseWheel':
      return 'Scroll Wheel';
    case 'gamepadButton':
      return input.button;
    case 'gamepadAxis':
      return input.axis;
  }
}

export function formatInput(input: Input): string {
  const modKeys = inputModKeys(input);
  const source = formatSource(input);
  return modKeys.isEmpty() ? source : `${modKeys.toString()} + ${source}`;
}
