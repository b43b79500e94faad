import type { ActionLookup } from '../action-map.js';
import type { ActionValue } from '../action-value.js';
import type { InputConfig } from '../config.js';
import type { FrameTime } from '../input-time.js';
import { VariantRegistry } from '../variant-registry.js';
import { AccumulateByModifier } from './accumulate-by.js';
import { ClampModifier } from './clamp.js';
import { DeadZoneModifier } from './dead-zone.js';
import { DeltaScaleModifier } from './delta-scale.js';
import { ExponentialCurveModifier } from './exponential-curve.js';
import type { InputModifier, ModifierDefinition } from './modifier.js';
import { NegateModifier } from './negate.js';
import { ScaleModifier } from './scale.js';
import { SmoothNudgeModifier } from './smooth-nudge.js';
import { SwizzleAxisModifier } from './swizzle-axis.js';

export interface ModifierFactoryContext {
  readonly config: InputConfig;
}

export type ModifierRegistry = VariantRegistry<InputModifier, ModifierFactoryContext>;

export const createModifierRegistry = (): ModifierRegistry =>
  new VariantRegistry<InputModifier, ModifierFactoryContext>('modifier');

/**
 * Instantiates a modifier for one binding. Stateful kinds (smoothing,
 * accumulation) get fresh state per call.
 */
export function createModifier(
  definition: ModifierDefinition,
  context: ModifierFactoryContext,
  registry?: ModifierRegistry,
): InputModifier {
  switch (definition.type) {
    case 'scale':
      return new ScaleModifier(definition.factor);
    case 'deltaScale':
      return new DeltaScaleModifier();
    case 'negate':
      return new NegateModifier({ x: definition.x, y: definition.y, z: definition.z });
    case 'swizzleAxis':
      return new SwizzleAxisModifier(definition.order);
    case 'deadZone':
      return new DeadZoneModifier(definition.shape, definition.lower, definition.upper);
    case 'clamp':
      return new ClampModifier(definition.min, definition.max);
    case 'exponentialCurve':
      return new ExponentialCurveModifier(definition.exponent);
    case 'smoothNudge':
      return new SmoothNudgeModifier(definition.decayRate);
    case 'accumulateBy':
      return new AccumulateByModifier(definition.action);
    case 'custom':
      return (registry ?? createModifierRegistry()).create(
        definition.name,
        definition.options ?? {},
        context,
      );
  }
}

export interface ModifierPipeline {
  readonly modifiers: readonly InputModifier[];
  apply(actions: ActionLookup, time: FrameTime, value: ActionValue): ActionValue;
}

/**
 * Chains modifiers in declaration order. Each modifier sees only the output
 * of the one before it.
 */
export function createModifierPipeline(
  modifiers: readonly InputModifier[],
): ModifierPipeline {
  const frozenModifiers = Object.freeze([...modifiers]);

  return Object.freeze({
    modifiers: frozenModifiers,
    apply(actions: ActionLookup, time: FrameTime, value: ActionValue): ActionValue {
      let current = value;
      for (const modifier of frozenModifiers) {
        current = modifier.apply(actions, time, current);
      }
      return current;
    },
  });
}
