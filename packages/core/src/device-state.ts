import type {
  DeviceSnapshot,
  GamepadAxis,
  GamepadButton,
  GamepadId,
  KeyCode,
  MouseButton,
  Vec2,
} from './device.js';

type MutableGamepad = {
  buttons: Partial<Record<GamepadButton, number>>;
  axes: Partial<Record<GamepadAxis, number>>;
};

/**
 * Host-side recorder of raw device events.
 *
 * Events are accumulated between frames; {@link DeviceState.snapshot}
 * freezes them for evaluation and {@link DeviceState.endFrame} clears the
 * per-frame parts (edges, mouse motion, wheel).
 */
export class DeviceState {
  private readonly keys = new Set<KeyCode>();
  private readonly justPressedKeys = new Set<KeyCode>();
  private readonly justReleasedKeys = new Set<KeyCode>();
  private readonly mouseButtons = new Set<MouseButton>();
  private mouseMotion: Vec2 = { x: 0, y: 0 };
  private mouseWheel: Vec2 = { x: 0, y: 0 };
  private readonly gamepads = new Map<GamepadId, MutableGamepad>();

  press(key: KeyCode): void {
    if (!this.keys.has(key)) {
      this.keys.add(key);
      this.justPressedKeys.add(key);
    }
  }

  release(key: KeyCode): void {
    if (this.keys.delete(key)) {
      this.justReleasedKeys.add(key);
    }
  }

  isPressed(key: KeyCode): boolean {
    return this.keys.has(key);
  }

  pressMouseButton(button: MouseButton): void {
    this.mouseButtons.add(button);
  }

  releaseMouseButton(button: MouseButton): void {
    this.mouseButtons.delete(button);
  }

  moveMouse(dx: number, dy: number): void {
    this.mouseMotion = { x: this.mouseMotion.x + dx, y: this.mouseMotion.y + dy };
  }

  scroll(dx: number, dy: number): void {
    this.mouseWheel = { x: this.mouseWheel.x + dx, y: this.mouseWheel.y + dy };
  }

  connectGamepad(id: GamepadId): void {
    if (!this.gamepads.has(id)) {
      this.gamepads.set(id, { buttons: {}, axes: {} });
    }
  }

  disconnectGamepad(id: GamepadId): boolean {
    return this.gamepads.delete(id);
  }

  /**
   * Records an analog button value in `[0, 1]`; digital buttons use 0 or 1.
   * Connects the gamepad if needed.
   */
  setGamepadButton(id: GamepadId, button: GamepadButton, value: number): void {
    this.gamepad(id).buttons[button] = value;
  }

  setGamepadAxis(id: GamepadId, axis: GamepadAxis, value: number): void {
    this.gamepad(id).axes[axis] = value;
  }

  snapshot(): DeviceSnapshot {
    return Object.freeze({
      keys: new Set(this.keys),
      justPressedKeys: new Set(this.justPressedKeys),
      justReleasedKeys: new Set(this.justReleasedKeys),
      mouseButtons: new Set(this.mouseButtons),
      mouseMotion: Object.freeze({ ...this.mouseMotion }),
      mouseWheel: Object.freeze({ ...this.mouseWheel }),
      gamepads: Object.freeze(
        Array.from(this.gamepads, ([id, gamepad]) =>
          Object.freeze({
            id,
            buttons: Object.freeze({ ...gamepad.buttons }),
            axes: Object.freeze({ ...gamepad.axes }),
          }),
        ),
      ),
    });
  }

  endFrame(): void {
    this.justPressedKeys.clear();
    this.justReleasedKeys.clear();
    this.mouseMotion = { x: 0, y: 0 };
    this.mouseWheel = { x: 0, y: 0 };
  }

  private gamepad(id: GamepadId): MutableGamepad {
    let gamepad = this.gamepads.get(id);
    if (!gamepad) {
      gamepad = { buttons: {}, axes: {} };
      this.gamepads.set(id, gamepad);
    }
    return gamepad;
  }
}
