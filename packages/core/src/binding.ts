import type { ActionId } from './action.js';
import type { ActionValueDim } from './action-value.js';
import type { ConditionDefinition } from './conditions/condition.js';
import type { Accumulation } from './config.js';
import type { GamepadDevice } from './device.js';
import type { Input } from './input.js';
import type { ModifierDefinition } from './modifiers/modifier.js';

/**
 * One input bound to an action, with the modifiers and conditions that only
 * apply to it.
 */
export type InputBindingDefinition = Readonly<{
  input: Input;
  modifiers?: readonly ModifierDefinition[];
  conditions?: readonly ConditionDefinition[];
}>;

export type BindingSource = Input | InputBindingDefinition;

export type ActionDefinition = Readonly<{
  id: ActionId;
  /**
   * Declared output dimension; the published value is converted to it.
   */
  output: ActionValueDim;
  inputs?: readonly BindingSource[];
  /**
   * Applied to the merged value of all inputs.
   */
  modifiers?: readonly ModifierDefinition[];
  conditions?: readonly ConditionDefinition[];
  accumulation?: Accumulation;
  /**
   * While the action is not `none`, hide its inputs from the actions and
   * contexts evaluated after it.
   */
  consumeInput?: boolean;
}>;

/**
 * Ordered set of actions evaluated together. Declaration order is the
 * evaluation order, so chords and other cross-action reads must point at
 * earlier actions.
 */
export type InputContextDefinition = Readonly<{
  id: string;
  actions: readonly ActionDefinition[];
  gamepad?: GamepadDevice;
}>;

export const bindInput = (
  input: Input,
  options: Readonly<{
    modifiers?: readonly ModifierDefinition[];
    conditions?: readonly ConditionDefinition[];
  }> = {},
): InputBindingDefinition => ({
  input,
  modifiers: options.modifiers ?? [],
  conditions: options.conditions ?? [],
});

export function toInputBinding(source: BindingSource): InputBindingDefinition {
  return 'kind' in source ? { input: source } : source;
}

/**
 * Appends modifiers to every binding, after the ones it already has.
 */
export function withModifiers(
  sources: readonly BindingSource[],
  ...modifiers: readonly ModifierDefinition[]
): InputBindingDefinition[] {
  return sources.map((source) => {
    const binding = toInputBinding(source);
    return {
      ...binding,
      modifiers: [...(binding.modifiers ?? []), ...modifiers],
    };
  });
}

/**
 * Appends conditions to every binding, after the ones it already has.
 */
export function withConditions(
  sources: readonly BindingSource[],
  ...conditions: readonly ConditionDefinition[]
): InputBindingDefinition[] {
  return sources.map((source) => {
    const binding = toInputBinding(source);
    return {
      ...binding,
      conditions: [...(binding.conditions ?? []), ...conditions],
    };
  });
}
