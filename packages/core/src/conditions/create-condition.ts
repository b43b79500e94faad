import type { InputConfig } from '../config.js';
import { VariantRegistry } from '../variant-registry.js';
import { BlockByCondition } from './block-by.js';
import { ChordCondition } from './chord.js';
import type { ConditionDefinition, InputCondition } from './condition.js';
import { DownCondition } from './down.js';
import { HoldAndReleaseCondition } from './hold-and-release.js';
import { HoldCondition } from './hold.js';
import { PressCondition } from './press.js';
import { PulseCondition } from './pulse.js';
import { ReleaseCondition } from './release.js';
import { TapCondition } from './tap.js';

export interface ConditionFactoryContext {
  readonly config: InputConfig;
}

export type ConditionRegistry = VariantRegistry<InputCondition, ConditionFactoryContext>;

export const createConditionRegistry = (): ConditionRegistry =>
  new VariantRegistry<InputCondition, ConditionFactoryContext>('condition');

/**
 * Instantiates a condition for one binding. Conditions are stateful, so
 * every binding gets its own instance. An omitted `actuation` falls back to
 * `config.thresholds.actuation`.
 */
export function createCondition(
  definition: ConditionDefinition,
  context: ConditionFactoryContext,
  registry?: ConditionRegistry,
): InputCondition {
  const fallback = context.config.thresholds.actuation;

  switch (definition.type) {
    case 'down':
      return new DownCondition(definition.actuation ?? fallback);
    case 'press':
      return new PressCondition(definition.actuation ?? fallback);
    case 'release':
      return new ReleaseCondition(definition.actuation ?? fallback);
    case 'hold':
      return new HoldCondition(
        definition.holdTime,
        definition.oneShot,
        definition.actuation ?? fallback,
      );
    case 'holdAndRelease':
      return new HoldAndReleaseCondition(
        definition.holdTime,
        definition.actuation ?? fallback,
      );
    case 'tap':
      return new TapCondition(definition.releaseTime, definition.actuation ?? fallback);
    case 'pulse':
      return new PulseCondition(
        definition.interval,
        definition.triggerLimit,
        definition.triggerOnStart,
        definition.actuation ?? fallback,
      );
    case 'chord':
      return new ChordCondition(definition.action);
    case 'blockBy':
      return new BlockByCondition(definition.action);
    case 'custom':
      return (registry ?? createConditionRegistry()).create(
        definition.name,
        definition.options ?? {},
        context,
      );
  }
}
