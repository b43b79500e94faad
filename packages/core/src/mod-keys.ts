import type { KeyCode } from './device.js';

export type ModKeyName = 'control' | 'shift' | 'alt' | 'super';

/**
 * Fixed iteration and display order.
 */
export const MOD_KEY_NAMES: readonly ModKeyName[] = Object.freeze([
  'control',
  'shift',
  'alt',
  'super',
]);

const MOD_KEY_BITS: Readonly<Record<ModKeyName, number>> = Object.freeze({
  control: 0b0001,
  shift: 0b0010,
  alt: 0b0100,
  super: 0b1000,
});

const MOD_KEY_LABELS: Readonly<Record<ModKeyName, string>> = Object.freeze({
  control: 'Ctrl',
  shift: 'Shift',
  alt: 'Alt',
  super: 'Super',
});

const MOD_KEY_CODES: Readonly<Record<ModKeyName, readonly [KeyCode, KeyCode]>> =
  Object.freeze({
    control: ['ControlLeft', 'ControlRight'],
    shift: ['ShiftLeft', 'ShiftRight'],
    alt: ['AltLeft', 'AltRight'],
    super: ['MetaLeft', 'MetaRight'],
  });

const ALL_BITS = 0b1111;

/**
 * Anything that can answer whether a physical key is held.
 */
export type PressedKeys =
  | ReadonlySet<KeyCode>
  | Readonly<{ isPressed(key: KeyCode): boolean }>;

const isKeyPressed = (keys: PressedKeys, key: KeyCode): boolean =>
  'isPressed' in keys ? keys.isPressed(key) : keys.has(key);

/**
 * Keyboard modifiers, with the left and right physical keys of each pair
 * treated as the same logical modifier.
 */
export class ModKeys {
  static readonly CONTROL = new ModKeys(MOD_KEY_BITS.control);
  static readonly SHIFT = new ModKeys(MOD_KEY_BITS.shift);
  static readonly ALT = new ModKeys(MOD_KEY_BITS.alt);
  static readonly SUPER = new ModKeys(MOD_KEY_BITS.super);

  private static readonly EMPTY = new ModKeys(0);
  private static readonly ALL = new ModKeys(ALL_BITS);

  private constructor(readonly bits: number) {
    Object.freeze(this);
  }

  static empty(): ModKeys {
    return ModKeys.EMPTY;
  }

  static all(): ModKeys {
    return ModKeys.ALL;
  }

  static fromBits(bits: number): ModKeys {
    const masked = bits & ALL_BITS;
    if (masked === 0) {
      return ModKeys.EMPTY;
    }
    if (masked === ALL_BITS) {
      return ModKeys.ALL;
    }
    return new ModKeys(masked);
  }

  static of(...names: readonly ModKeyName[]): ModKeys {
    let bits = 0;
    for (const name of names) {
      bits |= MOD_KEY_BITS[name];
    }
    return ModKeys.fromBits(bits);
  }

  /**
   * Modifiers whose left or right key is currently held.
   */
  static pressed(keys: PressedKeys): ModKeys {
    let bits = 0;
    for (const name of MOD_KEY_NAMES) {
      const [left, right] = MOD_KEY_CODES[name];
      if (isKeyPressed(keys, left) || isKeyPressed(keys, right)) {
        bits |= MOD_KEY_BITS[name];
      }
    }
    return ModKeys.fromBits(bits);
  }

  /**
   * Maps a physical key to its logical modifier, or the empty set when the
   * key is not a modifier.
   */
  static fromKey(key: KeyCode): ModKeys {
    for (const name of MOD_KEY_NAMES) {
      if (MOD_KEY_CODES[name].includes(key)) {
        return ModKeys.fromBits(MOD_KEY_BITS[name]);
      }
    }
    return ModKeys.EMPTY;
  }

  isEmpty(): boolean {
    return this.bits === 0;
  }

  count(): number {
    return this.names().length;
  }

  contains(other: ModKeys): boolean {
    return (this.bits & other.bits) === other.bits;
  }

  intersects(other: ModKeys): boolean {
    return (this.bits & other.bits) !== 0;
  }

  union(other: ModKeys): ModKeys {
    return ModKeys.fromBits(this.bits | other.bits);
  }

  intersection(other: ModKeys): ModKeys {
    return ModKeys.fromBits(this.bits & other.bits);
  }

  difference(other: ModKeys): ModKeys {
    return ModKeys.fromBits(this.bits & ~other.bits);
  }

  equals(other: ModKeys): boolean {
    return this.bits === other.bits;
  }

  names(): ModKeyName[] {
    return MOD_KEY_NAMES.filter((name) => (this.bits & MOD_KEY_BITS[name]) !== 0);
  }

  /**
   * Left and right key codes for every set modifier, in display order.
   */
  keyPairs(): (readonly [KeyCode, KeyCode])[] {
    return this.names().map((name) => MOD_KEY_CODES[name]);
  }

  toString(): string {
    return this.names()
      .map((name) => MOD_KEY_LABELS[name])
      .join(' + ');
  }
}
