import { Action } from './action.js';
import type { ActionId, ActionSnapshot } from './action.js';
import { ActionMap } from './action-map.js';
import { ActionState } from './action-state.js';
import type { ActionValue, ActionValueDim } from './action-value.js';
import { widenValue, zeroValue } from './action-value.js';
import { toInputBinding } from './binding.js';
import type { ActionDefinition, InputContextDefinition } from './binding.js';
import { ConditionEvaluator } from './condition-evaluator.js';
import type { InputCondition } from './conditions/condition.js';
import { createCondition } from './conditions/create-condition.js';
import type { ConditionRegistry } from './conditions/create-condition.js';
import type { Accumulation, InputConfig } from './config.js';
import { ANY_GAMEPAD } from './device.js';
import type { GamepadDevice } from './device.js';
import type { Input } from './input.js';
import type { InputReader } from './input-reader.js';
import type { FrameTime } from './input-time.js';
import { createModifier, createModifierPipeline } from './modifiers/modifier-pipeline.js';
import type { ModifierPipeline, ModifierRegistry } from './modifiers/modifier-pipeline.js';

export interface InputContextOptions {
  readonly config: InputConfig;
  readonly conditionRegistry?: ConditionRegistry;
  readonly modifierRegistry?: ModifierRegistry;
}

interface BoundInput {
  readonly input: Input;
  readonly modifiers: ModifierPipeline;
  readonly conditions: readonly InputCondition[];
}

interface BoundAction {
  readonly action: Action;
  readonly inputs: readonly BoundInput[];
  readonly modifiers: ModifierPipeline;
  readonly conditions: readonly InputCondition[];
  readonly accumulation: Accumulation;
  readonly consumeInput: boolean;
}

/**
 * Runtime form of an {@link InputContextDefinition}: owns the action state
 * machines and the per-binding modifier and condition instances.
 *
 * @remarks
 * Each update builds a fresh {@link ActionMap} one action at a time in
 * declaration order; that map is what chords and other cross-action reads
 * see, so they only ever observe actions evaluated earlier in the pass.
 */
export class InputContext {
  readonly id: string;
  readonly gamepad: GamepadDevice;
  private readonly bound: readonly BoundAction[];
  private current: ActionMap;

  constructor(definition: InputContextDefinition, options: InputContextOptions) {
    this.id = definition.id;
    this.gamepad = definition.gamepad ?? ANY_GAMEPAD;
    this.bound = definition.actions.map((action) => bindAction(action, options));
    this.current = ActionMap.from(this.bound.map(({ action }) => action.snapshot()));
  }

  update(reader: InputReader, time: FrameTime): void {
    reader.setGamepad(this.gamepad);
    const actions = new ActionMap();

    for (const binding of this.bound) {
      const { state, value } = evaluateAction(binding, reader, actions, time);
      binding.action.update(time, state, value);
      actions.insert(binding.action.snapshot());

      if (binding.consumeInput && state !== ActionState.None) {
        for (const { input } of binding.inputs) {
          reader.consume(input);
        }
      }
    }

    this.current = actions;
  }

  /**
   * Returns every action to its initial state, as on first bind.
   */
  reset(): void {
    for (const { action } of this.bound) {
      action.reset();
    }
    this.current = ActionMap.from(this.bound.map(({ action }) => action.snapshot()));
  }

  get actions(): ActionMap {
    return this.current;
  }

  action(id: ActionId): ActionSnapshot | undefined {
    return this.current.get(id);
  }

  state(id: ActionId): ActionState | undefined {
    return this.current.state(id);
  }

  value(id: ActionId): ActionValue | undefined {
    return this.current.value(id);
  }
}

function bindAction(definition: ActionDefinition, options: InputContextOptions): BoundAction {
  const context = { config: options.config };
  const pipeline = (definitions: ActionDefinition['modifiers']): ModifierPipeline =>
    createModifierPipeline(
      (definitions ?? []).map((modifier) =>
        createModifier(modifier, context, options.modifierRegistry),
      ),
    );
  const conditions = (
    definitions: ActionDefinition['conditions'],
  ): readonly InputCondition[] =>
    (definitions ?? []).map((condition) =>
      createCondition(condition, context, options.conditionRegistry),
    );

  return {
    action: new Action(definition.id, definition.output),
    inputs: (definition.inputs ?? []).map((source) => {
      const binding = toInputBinding(source);
      return {
        input: binding.input,
        modifiers: pipeline(binding.modifiers),
        conditions: conditions(binding.conditions),
      };
    }),
    modifiers: pipeline(definition.modifiers),
    conditions: conditions(definition.conditions),
    accumulation: definition.accumulation ?? options.config.defaults.accumulation,
    consumeInput: definition.consumeInput ?? options.config.defaults.consumeInput,
  };
}

function evaluateInput(
  bound: BoundInput,
  dim: ActionValueDim,
  reader: InputReader,
  actions: ActionMap,
  time: FrameTime,
): ConditionEvaluator {
  const evaluator = new ConditionEvaluator(widenValue(reader.value(bound.input), dim));
  evaluator.applyModifiers(bound.modifiers, actions, time);
  evaluator.applyConditions(bound.conditions, actions, time);
  return evaluator;
}

function evaluateAction(
  binding: BoundAction,
  reader: InputReader,
  actions: ActionMap,
  time: FrameTime,
): { state: ActionState; value: ActionValue } {
  const dim = binding.action.dim;
  let merged: ConditionEvaluator | undefined;

  for (const input of binding.inputs) {
    const evaluator = evaluateInput(input, dim, reader, actions, time);
    if (merged) {
      merged.combine(evaluator, binding.accumulation);
    } else {
      merged = evaluator;
    }
  }

  const evaluator = merged ?? new ConditionEvaluator(zeroValue(dim));
  evaluator.applyModifiers(binding.modifiers, actions, time);
  evaluator.applyConditions(binding.conditions, actions, time);

  return { state: evaluator.state(), value: evaluator.value };
}
