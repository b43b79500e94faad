import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import type { InputContextDefinition } from '../binding.js';
import { chord, down, hold } from '../conditions/condition.js';
import { DeviceState } from '../device-state.js';
import { keyboard } from '../input.js';
import { InputRuntime } from '../input-runtime.js';
import { negate, swizzleAxis } from '../modifiers/modifier.js';

const PROPERTY_SEED = 731000;
const PROPERTY_RUNS = 300;
const MAX_FRAMES = 12;

const propertyConfig = (offset: number): fc.Parameters<unknown> => ({
  seed: PROPERTY_SEED + offset,
  numRuns: PROPERTY_RUNS,
  endOnFailure: true,
});

const MOVE_KEYS = ['KeyW', 'KeyA', 'KeyS', 'KeyD'] as const;
const ALL_KEYS = [...MOVE_KEYS, 'ShiftLeft', 'KeyE'] as const;

const playerContext: InputContextDefinition = {
  id: 'player',
  actions: [
    {
      id: 'move',
      output: 'axis2d',
      inputs: [
        { input: keyboard('KeyW'), modifiers: [swizzleAxis('YXZ')] },
        { input: keyboard('KeyA'), modifiers: [negate()] },
        { input: keyboard('KeyS'), modifiers: [negate(), swizzleAxis('YXZ')] },
        keyboard('KeyD'),
      ],
    },
    { id: 'sprint', output: 'bool', inputs: [keyboard('ShiftLeft')], conditions: [chord('move')] },
    { id: 'interact', output: 'bool', inputs: [keyboard('KeyE')], conditions: [hold(0.4)] },
    { id: 'crouch', output: 'axis1d', inputs: [keyboard('KeyE')], conditions: [down()] },
  ],
};

type Frame = Readonly<{
  held: readonly boolean[];
  deltaSecs: number;
}>;

const frameArb: fc.Arbitrary<Frame> = fc.record({
  held: fc.array(fc.boolean(), { minLength: ALL_KEYS.length, maxLength: ALL_KEYS.length }),
  deltaSecs: fc.double({ min: 0, max: 0.5, noNaN: true }),
});

const applyFrame = (device: DeviceState, frame: Frame): void => {
  device.endFrame();
  ALL_KEYS.forEach((key, index) => {
    if (frame.held[index]) {
      device.press(key);
    } else {
      device.release(key);
    }
  });
};

describe('InputRuntime properties', () => {
  it('reports the same states and values when a frame repeats with no elapsed time', () => {
    fc.assert(
      fc.property(fc.array(frameArb, { minLength: 1, maxLength: MAX_FRAMES }), (frames) => {
        const runtime = new InputRuntime();
        const context = runtime.registerContext(playerContext);
        const device = new DeviceState();

        for (const frame of frames) {
          applyFrame(device, frame);
          runtime.update(device.snapshot(), frame.deltaSecs);
        }
        const before = Array.from(context.actions, ({ id, state, value }) => ({ id, state, value }));

        runtime.update(device.snapshot(), 0);
        const after = Array.from(context.actions, ({ id, state, value }) => ({ id, state, value }));

        expect(after).toEqual(before);
      }),
      propertyConfig(0),
    );
  });

  it('sums opposing movement keys into one direction', () => {
    fc.assert(
      fc.property(
        fc.array(fc.boolean(), { minLength: MOVE_KEYS.length, maxLength: MOVE_KEYS.length }),
        (held) => {
          const runtime = new InputRuntime();
          runtime.registerContext(playerContext);
          const device = new DeviceState();
          MOVE_KEYS.forEach((key, index) => {
            if (held[index]) {
              device.press(key);
            }
          });

          runtime.update(device.snapshot(), 1 / 60);

          const axis = (index: number): number => (held[index] ? 1 : 0);
          expect(runtime.value('player', 'move')).toEqual({
            kind: 'axis2d',
            x: axis(3) - axis(1),
            y: axis(0) - axis(2),
          });
        },
      ),
      propertyConfig(1),
    );
  });
});
