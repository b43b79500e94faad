import { describe, expect, it } from 'vitest';

import {
  DeviceState,
  InputRuntime,
  asAxis3D,
  keyboard,
} from '@action-input/core';
import type { ActionValueDim, InputBindingDefinition, Vec3 } from '@action-input/core';

import {
  arrowKeys,
  bidirectional,
  dpadButtons,
  hjklyubnKeys,
  leftStick,
  numpadKeys,
  rightStick,
  spatial,
  wasdKeys,
} from './presets.js';

const readDirection = (
  inputs: readonly InputBindingDefinition[],
  drive: (device: DeviceState) => void,
  output: ActionValueDim = 'axis3d',
): Vec3 => {
  const runtime = new InputRuntime();
  runtime.registerContext({
    id: 'preset',
    actions: [{ id: 'direction', output, inputs }],
  });
  const device = new DeviceState();
  drive(device);
  runtime.update(device.snapshot(), 1 / 60);

  const value = runtime.value('preset', 'direction');
  if (!value) {
    throw new Error('direction action was not evaluated');
  }
  return asAxis3D(value);
};

const pressing =
  (...keys: string[]) =>
  (device: DeviceState): void => {
    for (const key of keys) {
      device.press(key);
    }
  };

describe('cardinal presets', () => {
  it.each([
    ['KeyW', { x: 0, y: 1, z: 0 }],
    ['KeyA', { x: -1, y: 0, z: 0 }],
    ['KeyS', { x: 0, y: -1, z: 0 }],
    ['KeyD', { x: 1, y: 0, z: 0 }],
  ])('maps %s onto its direction', (key, expected) => {
    expect(readDirection(wasdKeys(), pressing(key))).toEqual(expected);
  });

  it('combines adjacent keys and cancels opposite ones', () => {
    expect(readDirection(arrowKeys(), pressing('ArrowUp', 'ArrowRight'))).toEqual({
      x: 1,
      y: 1,
      z: 0,
    });
    expect(readDirection(arrowKeys(), pressing('ArrowLeft', 'ArrowRight'))).toEqual({
      x: 0,
      y: 0,
      z: 0,
    });
  });

  it('reads the d-pad of any connected gamepad', () => {
    const direction = readDirection(dpadButtons(), (device) => {
      device.setGamepadButton('pad-1', 'DPadDown', 1);
      device.setGamepadButton('pad-2', 'DPadLeft', 1);
    });

    expect(direction).toEqual({ x: -1, y: -1, z: 0 });
  });
});

describe('bidirectional preset', () => {
  it('negates the negative side on the first axis', () => {
    const inputs = bidirectional({ positive: keyboard('KeyE'), negative: keyboard('KeyQ') });

    expect(readDirection(inputs, pressing('KeyQ'), 'axis1d')).toEqual({ x: -1, y: 0, z: 0 });
    expect(readDirection(inputs, pressing('KeyE'), 'axis1d')).toEqual({ x: 1, y: 0, z: 0 });
  });
});

describe('axial presets', () => {
  it('passes analog stick deflection through unchanged', () => {
    const direction = readDirection(leftStick(), (device) => {
      device.setGamepadAxis('pad-1', 'LeftStickX', 0.5);
      device.setGamepadAxis('pad-1', 'LeftStickY', -0.25);
    });

    expect(direction).toEqual({ x: 0.5, y: -0.25, z: 0 });
  });

  it('ignores the other stick', () => {
    const direction = readDirection(rightStick(), (device) => {
      device.setGamepadAxis('pad-1', 'LeftStickX', 1);
    });

    expect(direction).toEqual({ x: 0, y: 0, z: 0 });
  });
});

describe('spatial preset', () => {
  const inputs = spatial({
    forward: keyboard('KeyW'),
    backward: keyboard('KeyS'),
    left: keyboard('KeyA'),
    right: keyboard('KeyD'),
    up: keyboard('Space'),
    down: keyboard('ControlLeft'),
  });

  it.each([
    ['KeyW', { x: 0, y: 0, z: -1 }],
    ['KeyS', { x: 0, y: 0, z: 1 }],
    ['KeyA', { x: -1, y: 0, z: 0 }],
    ['KeyD', { x: 1, y: 0, z: 0 }],
    ['Space', { x: 0, y: 1, z: 0 }],
    ['ControlLeft', { x: 0, y: -1, z: 0 }],
  ])('maps %s onto its direction', (key, expected) => {
    expect(readDirection(inputs, pressing(key))).toEqual(expected);
  });
});

describe('ordinal presets', () => {
  it.each([
    ['Numpad8', { x: 0, y: 1, z: 0 }],
    ['Numpad9', { x: 1, y: 1, z: 0 }],
    ['Numpad6', { x: 1, y: 0, z: 0 }],
    ['Numpad3', { x: 1, y: -1, z: 0 }],
    ['Numpad2', { x: 0, y: -1, z: 0 }],
    ['Numpad1', { x: -1, y: -1, z: 0 }],
    ['Numpad4', { x: -1, y: 0, z: 0 }],
    ['Numpad7', { x: -1, y: 1, z: 0 }],
  ])('maps %s onto its direction', (key, expected) => {
    expect(readDirection(numpadKeys(), pressing(key))).toEqual(expected);
  });

  it('uses the roguelike diagonals', () => {
    expect(readDirection(hjklyubnKeys(), pressing('KeyY'))).toEqual({ x: -1, y: 1, z: 0 });
    expect(readDirection(hjklyubnKeys(), pressing('KeyN'))).toEqual({ x: 1, y: -1, z: 0 });
  });
});
