import { axis1d, axis2d, boolValue } from './action-value.js';
import type { ActionValue } from './action-value.js';
import { ANY_GAMEPAD } from './device.js';
import type {
  DeviceSnapshot,
  GamepadAxis,
  GamepadButton,
  GamepadDevice,
  GamepadSnapshot,
  Vec2,
} from './device.js';
import { inputModKeys, inputSourceKey } from './input.js';
import type { Input } from './input.js';
import { ModKeys } from './mod-keys.js';

/**
 * Reads input values from one frame's device snapshot.
 *
 * @remarks
 * A single reader is shared by every context evaluated in a frame, so that
 * inputs consumed by one action stay hidden from later actions and
 * contexts. The gamepad filter is switched per context with
 * {@link InputReader.setGamepad}.
 *
 * Keyboard and mouse sources read as released unless every modifier the
 * input requires is held; holding extra modifiers does not prevent a read.
 */
export class InputReader {
  private readonly consumedSources = new Set<string>();
  private consumedModKeys = ModKeys.empty();
  private readonly pressedModKeys: ModKeys;
  private gamepad: GamepadDevice = ANY_GAMEPAD;

  constructor(readonly snapshot: DeviceSnapshot) {
    this.pressedModKeys = ModKeys.pressed(snapshot.keys);
  }

  setGamepad(gamepad: GamepadDevice): void {
    this.gamepad = gamepad;
  }

  value(input: Input): ActionValue {
    switch (input.kind) {
      case 'keyboard':
        return boolValue(
          this.isAvailable(input) && this.snapshot.keys.has(input.key),
        );
      case 'mouseButton':
        return boolValue(
          this.isAvailable(input) && this.snapshot.mouseButtons.has(input.button),
        );
      case 'mouseMotion':
        return this.readVec2(input, this.snapshot.mouseMotion);
      case 'mouseWheel':
        return this.readVec2(input, this.snapshot.mouseWheel);
      case 'gamepadButton':
        return axis1d(this.isAvailable(input) ? this.readButton(input.button) : 0);
      case 'gamepadAxis':
        return axis1d(this.isAvailable(input) ? this.readAxis(input.axis) : 0);
    }
  }

  /**
   * Hides the input's source and modifiers from the rest of the pass.
   */
  consume(input: Input): void {
    this.consumedSources.add(inputSourceKey(input));
    this.consumedModKeys = this.consumedModKeys.union(inputModKeys(input));
  }

  isConsumed(input: Input): boolean {
    return this.consumedSources.has(inputSourceKey(input));
  }

  private isAvailable(input: Input): boolean {
    if (this.consumedSources.has(inputSourceKey(input))) {
      return false;
    }
    const required = inputModKeys(input);
    if (required.isEmpty()) {
      return true;
    }
    return (
      this.pressedModKeys.contains(required) &&
      !this.consumedModKeys.intersects(required)
    );
  }

  private readVec2(input: Input, vec: Vec2): ActionValue {
    return this.isAvailable(input) ? axis2d(vec.x, vec.y) : axis2d(0, 0);
  }

  private readButton(button: GamepadButton): number {
    let pressed = 0;
    for (const gamepad of this.selectedGamepads()) {
      pressed = Math.max(pressed, gamepad.buttons[button] ?? 0);
    }
    return pressed;
  }

  private readAxis(axis: GamepadAxis): number {
    let sum = 0;
    for (const gamepad of this.selectedGamepads()) {
      sum += gamepad.axes[axis] ?? 0;
    }
    return sum;
  }

  private selectedGamepads(): readonly GamepadSnapshot[] {
    const gamepad = this.gamepad;
    if (gamepad.kind === 'any') {
      return this.snapshot.gamepads;
    }
    return this.snapshot.gamepads.filter((candidate) => candidate.id === gamepad.id);
  }
}
