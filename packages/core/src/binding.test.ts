import { describe, expect, it } from 'vitest';

import { bindInput, toInputBinding, withConditions, withModifiers } from './binding.js';
import { chord, down, press } from './conditions/condition.js';
import { gamepadButton, keyboard } from './input.js';
import { negate, scale, swizzleAxis } from './modifiers/modifier.js';

describe('binding helpers', () => {
  it('wraps raw inputs and keeps explicit bindings as they are', () => {
    const explicit = bindInput(keyboard('KeyE'), { conditions: [press()] });

    expect(toInputBinding(keyboard('KeyQ'))).toEqual({ input: keyboard('KeyQ') });
    expect(toInputBinding(explicit)).toBe(explicit);
    expect(bindInput(gamepadButton('South'))).toEqual({
      input: gamepadButton('South'),
      modifiers: [],
      conditions: [],
    });
  });

  it('appends modifiers after the ones a binding already has', () => {
    const bindings = withModifiers(
      [keyboard('KeyD'), bindInput(keyboard('KeyW'), { modifiers: [swizzleAxis('YXZ')] })],
      negate(),
      scale(2),
    );

    expect(bindings.map((binding) => binding.modifiers)).toEqual([
      [negate(), scale(2)],
      [swizzleAxis('YXZ'), negate(), scale(2)],
    ]);
    expect(bindings[1]?.input).toEqual(keyboard('KeyW'));
  });

  it('appends conditions after the ones a binding already has', () => {
    const bindings = withConditions(
      [bindInput(keyboard('KeyF'), { conditions: [chord('aim')] }), keyboard('KeyG')],
      down(),
    );

    expect(bindings.map((binding) => binding.conditions)).toEqual([[chord('aim'), down()], [down()]]);
    expect(bindings[1]?.modifiers).toBeUndefined();
  });
});
