import { describe, expect, it } from 'vitest';

import { DeviceState } from '../device-state.js';
import { InputConfigurationError } from '../errors.js';
import { parseDeviceSnapshot, serializeDeviceSnapshot } from './device-snapshot.js';

describe('device snapshot parsing', () => {
  it('fills omitted fields with empty state', () => {
    const snapshot = parseDeviceSnapshot({ keys: ['KeyW'] });

    expect([...snapshot.keys]).toEqual(['KeyW']);
    expect(snapshot.justPressedKeys.size).toBe(0);
    expect(snapshot.mouseButtons.size).toBe(0);
    expect(snapshot.mouseMotion).toEqual({ x: 0, y: 0 });
    expect(snapshot.gamepads).toEqual([]);
  });

  it('restores a serialized recorder snapshot', () => {
    const device = new DeviceState();
    device.press('KeyA');
    device.pressMouseButton('Right');
    device.moveMouse(2, 3);
    device.setGamepadAxis('pad-1', 'LeftStickY', -0.5);

    const parsed = parseDeviceSnapshot(serializeDeviceSnapshot(device.snapshot()));

    expect([...parsed.keys]).toEqual(['KeyA']);
    expect([...parsed.justPressedKeys]).toEqual(['KeyA']);
    expect([...parsed.mouseButtons]).toEqual(['Right']);
    expect(parsed.mouseMotion).toEqual({ x: 2, y: 3 });
    expect(parsed.gamepads).toEqual([
      { id: 'pad-1', buttons: {}, axes: { LeftStickY: -0.5 } },
    ]);
  });

  it('rejects unknown device names and non-finite values', () => {
    let caught: unknown;
    try {
      parseDeviceSnapshot({
        mouseButtons: ['Thumb'],
        gamepads: [{ id: 'pad-1', axes: { LeftStickX: Number.POSITIVE_INFINITY } }],
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(InputConfigurationError);
    const paths =
      caught instanceof InputConfigurationError
        ? caught.issues.map((issue) => issue.path.join('.'))
        : [];
    expect(paths).toEqual(['mouseButtons.0', 'gamepads.0.axes.LeftStickX']);
  });
});
