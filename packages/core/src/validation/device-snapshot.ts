import { z } from 'zod';

import { GAMEPAD_AXES, GAMEPAD_BUTTONS, MOUSE_BUTTONS } from '../device.js';
import type { DeviceSnapshot } from '../device.js';
import { InputConfigurationError } from '../errors.js';
import { finiteNumberSchema, finiteVec2Schema, identifierSchema } from './primitives.js';

const zeroVec2 = () => ({ x: 0, y: 0 });

const gamepadSnapshotSchema = z.object({
  id: identifierSchema,
  buttons: z.record(z.enum(GAMEPAD_BUTTONS), finiteNumberSchema).default({}),
  axes: z.record(z.enum(GAMEPAD_AXES), finiteNumberSchema).default({}),
});

/**
 * Wire form of a {@link DeviceSnapshot}: sets become arrays and every field
 * may be omitted.
 */
export const serializedDeviceSnapshotSchema = z.object({
  keys: z.array(identifierSchema).default([]),
  justPressedKeys: z.array(identifierSchema).default([]),
  justReleasedKeys: z.array(identifierSchema).default([]),
  mouseButtons: z.array(z.enum(MOUSE_BUTTONS)).default([]),
  mouseMotion: finiteVec2Schema.default(zeroVec2),
  mouseWheel: finiteVec2Schema.default(zeroVec2),
  gamepads: z.array(gamepadSnapshotSchema).default([]),
});

export type SerializedDeviceSnapshot = z.input<typeof serializedDeviceSnapshotSchema>;

/**
 * Validates a snapshot received from outside the process (a recorded
 * session, a worker message) and returns it in runtime form.
 */
export function parseDeviceSnapshot(value: unknown): DeviceSnapshot {
  const result = serializedDeviceSnapshotSchema.safeParse(value);
  if (!result.success) {
    throw new InputConfigurationError(
      'Device snapshot is invalid.',
      result.error.issues.map((issue) => ({
        code: 'deviceSnapshot.invalid',
        message: issue.message,
        path: issue.path,
      })),
    );
  }

  const snapshot = result.data;
  return Object.freeze({
    keys: new Set(snapshot.keys),
    justPressedKeys: new Set(snapshot.justPressedKeys),
    justReleasedKeys: new Set(snapshot.justReleasedKeys),
    mouseButtons: new Set(snapshot.mouseButtons),
    mouseMotion: Object.freeze(snapshot.mouseMotion),
    mouseWheel: Object.freeze(snapshot.mouseWheel),
    gamepads: Object.freeze(snapshot.gamepads.map((gamepad) => Object.freeze(gamepad))),
  });
}

export function serializeDeviceSnapshot(snapshot: DeviceSnapshot): SerializedDeviceSnapshot {
  return {
    keys: [...snapshot.keys],
    justPressedKeys: [...snapshot.justPressedKeys],
    justReleasedKeys: [...snapshot.justReleasedKeys],
    mouseButtons: [...snapshot.mouseButtons],
    mouseMotion: { ...snapshot.mouseMotion },
    mouseWheel: { ...snapshot.mouseWheel },
    gamepads: snapshot.gamepads.map((gamepad) => ({
      id: gamepad.id,
      buttons: { ...gamepad.buttons },
      axes: { ...gamepad.axes },
    })),
  };
}
