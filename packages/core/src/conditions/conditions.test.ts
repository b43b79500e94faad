import { afterEach, describe, expect, it, vi } from 'vitest';

import { Action } from '../action.js';
import { ActionMap } from '../action-map.js';
import { ActionState } from '../action-state.js';
import { axis1d, boolValue } from '../action-value.js';
import type { ActionValue } from '../action-value.js';
import { DEFAULT_INPUT_CONFIG } from '../config.js';
import { DIAGNOSTIC_EVENTS } from '../dependency.js';
import { InputConfigurationError } from '../errors.js';
import { frameTime } from '../input-time.js';
import { resetTelemetry, telemetry } from '../telemetry.js';
import {
  blockBy,
  chord,
  customCondition,
  down,
  hold,
  holdAndRelease,
  press,
  pulse,
  release,
  tap,
} from './condition.js';
import type { ConditionDefinition, InputCondition } from './condition.js';
import { createCondition, createConditionRegistry } from './create-condition.js';

const context = { config: DEFAULT_INPUT_CONFIG };
const HALF_SECOND = frameTime(0.5);
const PRESSED = boolValue(true);
const RELEASED = boolValue(false);

/**
 * Feeds one value per frame and collects the reported states.
 */
const run = (
  condition: InputCondition,
  values: readonly ActionValue[],
  actions: ActionMap = new ActionMap(),
): ActionState[] => values.map((value) => condition.evaluate(actions, HALF_SECOND, value));

const runDefinition = (
  definition: ConditionDefinition,
  values: readonly ActionValue[],
): ActionState[] => run(createCondition(definition, context), values);

const actionsWith = (id: string, state: ActionState): ActionMap => {
  const action = new Action(id, 'bool');
  action.update(frameTime(0.1), state, boolValue(state !== ActionState.None));
  return ActionMap.from([action.snapshot()]);
};

const { None, Ongoing, Fired } = ActionState;

describe('conditions', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('down fires while the value is actuated', () => {
    expect(runDefinition(down(), [axis1d(0.6), axis1d(0.4), PRESSED])).toEqual([
      Fired,
      None,
      Fired,
    ]);
    expect(runDefinition(down({ actuation: 0.3 }), [axis1d(0.4)])).toEqual([Fired]);
  });

  it('press fires only on the first actuated frame', () => {
    expect(runDefinition(press(), [PRESSED, PRESSED, RELEASED, PRESSED])).toEqual([
      Fired,
      None,
      None,
      Fired,
    ]);
  });

  it('release fires on the frame the value is released', () => {
    expect(runDefinition(release(), [PRESSED, PRESSED, RELEASED, RELEASED])).toEqual([
      Ongoing,
      Ongoing,
      Fired,
      None,
    ]);
  });

  it('hold fires once the hold time is reached', () => {
    expect(runDefinition(hold(1), [PRESSED, PRESSED, PRESSED, RELEASED])).toEqual([
      Ongoing,
      Fired,
      Fired,
      None,
    ]);
  });

  it('hold with oneShot fires on a single frame per hold', () => {
    expect(
      runDefinition(hold(1, { oneShot: true }), [
        PRESSED,
        PRESSED,
        PRESSED,
        RELEASED,
        PRESSED,
        PRESSED,
      ]),
    ).toEqual([Ongoing, Fired, None, None, Ongoing, Fired]);
  });

  it('holdAndRelease fires on release after a long enough hold', () => {
    expect(runDefinition(holdAndRelease(1), [PRESSED, PRESSED, RELEASED])).toEqual([
      Ongoing,
      Ongoing,
      Fired,
    ]);
    expect(runDefinition(holdAndRelease(1), [PRESSED, RELEASED, RELEASED])).toEqual([
      Ongoing,
      None,
      None,
    ]);
  });

  it('tap fires on a quick release and gives up on a long hold', () => {
    expect(runDefinition(tap(0.5), [PRESSED, RELEASED])).toEqual([Ongoing, Fired]);
    expect(runDefinition(tap(0.5), [PRESSED, PRESSED, RELEASED])).toEqual([
      Ongoing,
      None,
      None,
    ]);
  });

  it('pulse fires at an interval up to its trigger limit', () => {
    expect(
      runDefinition(pulse(1, { triggerLimit: 2 }), [
        PRESSED,
        PRESSED,
        PRESSED,
        PRESSED,
        RELEASED,
        PRESSED,
      ]),
    ).toEqual([Fired, Ongoing, Fired, None, None, Fired]);
  });

  it('pulse can skip the first frame', () => {
    expect(
      runDefinition(pulse(1, { triggerOnStart: false }), [PRESSED, PRESSED, PRESSED]),
    ).toEqual([Ongoing, Ongoing, Fired]);
  });

  it('chord reports the state of its dependency verbatim', () => {
    const condition = createCondition(chord('move'), context);

    expect(condition.kind).toBe('implicit');
    expect(run(condition, [RELEASED], actionsWith('move', Fired))).toEqual([Fired]);
    expect(run(condition, [PRESSED], actionsWith('move', Ongoing))).toEqual([Ongoing]);
    expect(run(condition, [PRESSED], actionsWith('move', None))).toEqual([None]);
  });

  it('chord degrades to none with one warning when the dependency is missing', () => {
    const warnSpy = vi.spyOn(telemetry, 'recordWarning');
    const condition = createCondition(chord('move'), context);

    expect(run(condition, [PRESSED])).toEqual([None]);
    expect(warnSpy).toHaveBeenCalledTimes(1);
    expect(warnSpy).toHaveBeenCalledWith(DIAGNOSTIC_EVENTS.ACTION_DEPENDENCY_MISSING, {
      dependency: 'move',
      requester: 'chord',
      message: 'action "move" is not present in context',
    });
  });

  it('blockBy reports none while the other action is fired or missing', () => {
    const condition = createCondition(blockBy('menu'), context);

    expect(condition.kind).toBe('blocker');
    expect(run(condition, [PRESSED], actionsWith('menu', Fired))).toEqual([None]);
    expect(run(condition, [PRESSED], actionsWith('menu', Ongoing))).toEqual([Fired]);
    expect(run(condition, [PRESSED])).toEqual([None]);
  });

  it('falls back to the configured actuation threshold', () => {
    const lenient = createCondition(down(), {
      config: {
        ...DEFAULT_INPUT_CONFIG,
        thresholds: { actuation: 0.1 },
      },
    });

    expect(run(lenient, [axis1d(0.2)])).toEqual([Fired]);
    expect(runDefinition(down(), [axis1d(0.2)])).toEqual([None]);
  });
});

describe('custom conditions', () => {
  it('resolves registered kinds through the registry', () => {
    const registry = createConditionRegistry();
    registry.register('always', () => ({
      type: 'always',
      kind: 'explicit',
      evaluate: () => ActionState.Fired,
    }));

    const condition = createCondition(customCondition('always'), context, registry);

    expect(run(condition, [RELEASED])).toEqual([Fired]);
    expect(registry.names()).toEqual(['always']);
  });

  it('throws for an unregistered kind', () => {
    expect(() => createCondition(customCondition('never'), context)).toThrow(
      InputConfigurationError,
    );
  });
});
