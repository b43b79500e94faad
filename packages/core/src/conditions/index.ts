export {
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
export type {
  ConditionDefinition,
  ConditionKind,
  ConditionType,
  InputCondition,
} from './condition.js';
export { createCondition, createConditionRegistry } from './create-condition.js';
export type {
  ConditionFactoryContext,
  ConditionRegistry,
} from './create-condition.js';
export { BlockByCondition } from './block-by.js';
export { ChordCondition } from './chord.js';
export { DownCondition } from './down.js';
export { HoldAndReleaseCondition } from './hold-and-release.js';
export { HoldCondition } from './hold.js';
export { PressCondition } from './press.js';
export { PulseCondition } from './pulse.js';
export { ReleaseCondition } from './release.js';
export { TapCondition } from './tap.js';
