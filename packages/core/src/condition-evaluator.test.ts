import { describe, expect, it } from 'vitest';

import { ActionMap } from './action-map.js';
import { ActionState } from './action-state.js';
import { axis1d, axis2d, boolValue } from './action-value.js';
import type { ActionValue } from './action-value.js';
import { ConditionEvaluator, accumulate } from './condition-evaluator.js';
import type { ConditionKind, InputCondition } from './conditions/condition.js';
import { frameTime } from './input-time.js';
import { createModifier, createModifierPipeline } from './modifiers/modifier-pipeline.js';
import { scale } from './modifiers/modifier.js';
import { DEFAULT_INPUT_CONFIG } from './config.js';

const { None, Ongoing, Fired } = ActionState;
const actions = new ActionMap();
const time = frameTime(0.5);

const fixed = (kind: ConditionKind, state: ActionState): InputCondition => ({
  type: `fixed-${kind}`,
  kind,
  evaluate: () => state,
});

const evaluate = (
  value: ActionValue,
  conditions: readonly InputCondition[],
): ConditionEvaluator => {
  const evaluator = new ConditionEvaluator(value);
  evaluator.applyConditions(conditions, actions, time);
  return evaluator;
};

describe('ConditionEvaluator', () => {
  it('uses the truthiness of the value without conditions', () => {
    expect(evaluate(boolValue(true), []).state()).toBe(Fired);
    expect(evaluate(axis2d(0, 0.01), []).state()).toBe(Fired);
    expect(evaluate(axis1d(0), []).state()).toBe(None);
  });

  it('ANDs explicit conditions applied together', () => {
    expect(evaluate(boolValue(true), [fixed('explicit', Fired)]).state()).toBe(Fired);
    expect(
      evaluate(boolValue(true), [fixed('explicit', Fired), fixed('explicit', Ongoing)]).state(),
    ).toBe(Ongoing);
    expect(
      evaluate(boolValue(true), [fixed('explicit', None), fixed('explicit', None)]).state(),
    ).toBe(None);
  });

  it('ORs explicit results across combined inputs', () => {
    const merged = evaluate(boolValue(false), [fixed('explicit', None)]);
    merged.combine(evaluate(boolValue(true), [fixed('explicit', Fired)]), 'cumulative');

    expect(merged.state()).toBe(Fired);
  });

  it('lets explicit conditions of one input gate inputs without conditions', () => {
    const merged = evaluate(boolValue(false), [fixed('explicit', None)]);
    merged.combine(evaluate(boolValue(true), []), 'cumulative');

    expect(merged.state()).toBe(None);
  });

  it('requires every implicit condition to fire', () => {
    expect(evaluate(axis1d(0), [fixed('implicit', Fired)]).state()).toBe(Fired);
    expect(
      evaluate(boolValue(true), [fixed('explicit', Fired), fixed('implicit', Ongoing)]).state(),
    ).toBe(Ongoing);

    const merged = evaluate(boolValue(true), [fixed('implicit', Fired)]);
    merged.combine(evaluate(boolValue(true), [fixed('implicit', None)]), 'cumulative');
    expect(merged.state()).toBe(Ongoing);
  });

  it('blocks when a blocker reports none', () => {
    expect(
      evaluate(boolValue(true), [fixed('explicit', Fired), fixed('blocker', None)]).state(),
    ).toBe(None);
    expect(
      evaluate(boolValue(true), [fixed('explicit', Fired), fixed('blocker', Fired)]).state(),
    ).toBe(Fired);
    expect(evaluate(boolValue(true), [fixed('blocker', Fired)]).state()).toBe(Fired);
  });

  it('evaluates every condition even when the outcome is known', () => {
    let calls = 0;
    const counting: InputCondition = {
      type: 'counting',
      kind: 'explicit',
      evaluate: () => {
        calls += 1;
        return Fired;
      },
    };

    evaluate(boolValue(true), [fixed('blocker', None), counting, counting]);

    expect(calls).toBe(2);
  });

  it('applies modifiers before conditions see the value', () => {
    const evaluator = new ConditionEvaluator(boolValue(true));
    const pipeline = createModifierPipeline([
      createModifier(scale(0.25), { config: DEFAULT_INPUT_CONFIG }),
    ]);

    evaluator.applyModifiers(pipeline, actions, time);

    expect(evaluator.value).toEqual(axis1d(0.25));
  });

  it('merges values into the wider of the two dimensions', () => {
    const cumulative = new ConditionEvaluator(axis2d(1, 0));
    cumulative.combine(new ConditionEvaluator(axis2d(-1, 0)), 'cumulative');
    expect(cumulative.value).toEqual(axis2d(0, 0));
    expect(cumulative.state()).toBe(None);

    const widened = new ConditionEvaluator(axis2d(0, 1));
    widened.combine(new ConditionEvaluator(axis1d(0.5)), 'cumulative');
    expect(widened.value).toEqual(axis2d(0.5, 1));

    const narrowFirst = new ConditionEvaluator(axis1d(0.5));
    narrowFirst.combine(new ConditionEvaluator(axis2d(0, -1)), 'cumulative');
    expect(narrowFirst.value).toEqual(axis2d(0.5, -1));
  });
});

describe('accumulate', () => {
  it('sums contributions cumulatively', () => {
    expect(accumulate({ x: 1, y: 2, z: 0 }, { x: -1, y: 0.5, z: 0 }, 'cumulative')).toEqual({
      x: 0,
      y: 2.5,
      z: 0,
    });
  });

  it('keeps the larger magnitude per axis with maxAbs', () => {
    expect(accumulate({ x: 0.5, y: -1, z: 0 }, { x: -0.8, y: 0.2, z: 0 }, 'maxAbs')).toEqual({
      x: -0.8,
      y: -1,
      z: 0,
    });
  });
});
