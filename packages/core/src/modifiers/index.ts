export {
  accumulateBy,
  clamp,
  customModifier,
  deadZone,
  deltaScale,
  exponentialCurve,
  mapComponents,
  negate,
  scale,
  smoothNudge,
  swizzleAxis,
} from './modifier.js';
export type {
  Axis,
  DeadZoneShape,
  InputModifier,
  ModifierDefinition,
  ModifierType,
  SwizzleOrder,
} from './modifier.js';
export {
  createModifier,
  createModifierPipeline,
  createModifierRegistry,
} from './modifier-pipeline.js';
export type {
  ModifierFactoryContext,
  ModifierPipeline,
  ModifierRegistry,
} from './modifier-pipeline.js';
export { AccumulateByModifier } from './accumulate-by.js';
export { ClampModifier } from './clamp.js';
export { DeadZoneModifier } from './dead-zone.js';
export { DeltaScaleModifier } from './delta-scale.js';
export { ExponentialCurveModifier } from './exponential-curve.js';
export { NegateModifier } from './negate.js';
export { ScaleModifier } from './scale.js';
export { SmoothNudgeModifier } from './smooth-nudge.js';
export { SwizzleAxisModifier } from './swizzle-axis.js';
