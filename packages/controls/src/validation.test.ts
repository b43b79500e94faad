import { describe, expect, it } from 'vitest';

import { accumulateBy, bindInput, blockBy, chord, keyboard } from '@action-input/core';
import type { InputContextDefinition } from '@action-input/core';

import { INPUT_CONTEXT_VALIDATION_CODES, validateInputContext } from './validation.js';

describe('validateInputContext', () => {
  it('accepts references to earlier actions', () => {
    const definition: InputContextDefinition = {
      id: 'player',
      actions: [
        { id: 'aim', output: 'bool', inputs: [keyboard('KeyQ')] },
        { id: 'fire', output: 'bool', inputs: [keyboard('KeyF')], conditions: [chord('aim')] },
        { id: 'reload', output: 'bool', inputs: [keyboard('KeyR')], conditions: [blockBy('fire')] },
      ],
    };

    expect(validateInputContext(definition)).toEqual([]);
  });

  it('reports duplicate action ids', () => {
    const issues = validateInputContext({
      id: 'player',
      actions: [
        { id: 'jump', output: 'bool' },
        { id: 'jump', output: 'bool' },
      ],
    });

    expect(issues).toEqual([
      {
        code: INPUT_CONTEXT_VALIDATION_CODES.DUPLICATE_ACTION_ID,
        message: 'Duplicate action id "jump" also defined at index 0.',
        path: ['actions', 1, 'id'],
        severity: 'error',
      },
    ]);
  });

  it('reports forward references with a reordering suggestion', () => {
    const issues = validateInputContext({
      id: 'player',
      actions: [
        { id: 'sprint', output: 'bool', conditions: [chord('move')] },
        { id: 'move', output: 'axis2d' },
      ],
    });

    expect(issues).toEqual([
      {
        code: INPUT_CONTEXT_VALIDATION_CODES.FORWARD_ACTION_REFERENCE,
        message: 'Action "sprint" references action "move" declared after it at index 1.',
        path: ['actions', 0, 'conditions', 0, 'action'],
        severity: 'error',
        suggestion: 'Declare "move" before "sprint".',
      },
    ]);
  });

  it('reports missing and self references inside per-input bindings', () => {
    const issues = validateInputContext({
      id: 'camera',
      actions: [
        {
          id: 'zoom',
          output: 'axis1d',
          inputs: [
            keyboard('Equal'),
            bindInput(keyboard('Minus'), { modifiers: [accumulateBy('zoom')] }),
            bindInput(keyboard('KeyZ'), { conditions: [blockBy('menu')] }),
          ],
        },
      ],
    });

    expect(issues.map(({ code, path }) => ({ code, path }))).toEqual([
      {
        code: INPUT_CONTEXT_VALIDATION_CODES.SELF_ACTION_REFERENCE,
        path: ['actions', 0, 'inputs', 1, 'modifiers', 0, 'action'],
      },
      {
        code: INPUT_CONTEXT_VALIDATION_CODES.MISSING_ACTION_REFERENCE,
        path: ['actions', 0, 'inputs', 2, 'conditions', 0, 'action'],
      },
    ]);
    expect(issues[1]?.message).toBe(
      'Action "zoom" references missing action id "menu" through blockBy.',
    );
  });
});
