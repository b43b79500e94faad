import type { ActionId } from '../action.js';
import type { ActionLookup } from '../action-map.js';
import type { ActionState } from '../action-state.js';
import type { ActionValue } from '../action-value.js';
import type { FrameTime } from '../input-time.js';
import type { VariantOptions } from '../variant-registry.js';

/**
 * How a condition's verdict combines with the others on the same action.
 *
 * - `explicit` conditions decide firing.
 * - `implicit` conditions must all be fired; they gate or inherit state.
 * - `blocker` conditions cancel the action when they report `none`.
 */
export type ConditionKind = 'explicit' | 'implicit' | 'blocker';

/**
 * Stateful classifier of the post-modifier value.
 *
 * Instances keep per-binding state (timers, previous actuation) and are
 * evaluated exactly once per frame.
 */
export interface InputCondition {
  readonly type: string;
  readonly kind: ConditionKind;
  evaluate(actions: ActionLookup, time: FrameTime, value: ActionValue): ActionState;
}

export type ConditionDefinition =
  | Readonly<{ type: 'down'; actuation?: number }>
  | Readonly<{ type: 'press'; actuation?: number }>
  | Readonly<{ type: 'release'; actuation?: number }>
  | Readonly<{ type: 'hold'; holdTime: number; oneShot: boolean; actuation?: number }>
  | Readonly<{ type: 'holdAndRelease'; holdTime: number; actuation?: number }>
  | Readonly<{ type: 'tap'; releaseTime: number; actuation?: number }>
  | Readonly<{
      type: 'pulse';
      interval: number;
      triggerLimit: number;
      triggerOnStart: boolean;
      actuation?: number;
    }>
  | Readonly<{ type: 'chord'; action: ActionId }>
  | Readonly<{ type: 'blockBy'; action: ActionId }>
  | Readonly<{ type: 'custom'; name: string; options?: VariantOptions }>;

export type ConditionType = ConditionDefinition['type'];

type ActuationOptions = Readonly<{ actuation?: number }>;

/**
 * Fired every frame the value is actuated.
 */
export const down = (options: ActuationOptions = {}): ConditionDefinition => ({
  type: 'down',
  ...options,
});

/**
 * Fired on the first frame the value becomes actuated.
 */
export const press = (options: ActuationOptions = {}): ConditionDefinition => ({
  type: 'press',
  ...options,
});

/**
 * Ongoing while actuated, fired on the frame it is released.
 */
export const release = (options: ActuationOptions = {}): ConditionDefinition => ({
  type: 'release',
  ...options,
});

export const hold = (
  holdTime: number,
  options: ActuationOptions & Readonly<{ oneShot?: boolean }> = {},
): ConditionDefinition => ({
  type: 'hold',
  holdTime,
  oneShot: options.oneShot ?? false,
  ...(options.actuation === undefined ? {} : { actuation: options.actuation }),
});

export const holdAndRelease = (
  holdTime: number,
  options: ActuationOptions = {},
): ConditionDefinition => ({
  type: 'holdAndRelease',
  holdTime,
  ...options,
});

export const tap = (
  releaseTime: number,
  options: ActuationOptions = {},
): ConditionDefinition => ({
  type: 'tap',
  releaseTime,
  ...options,
});

export const pulse = (
  interval: number,
  options: ActuationOptions &
    Readonly<{ triggerLimit?: number; triggerOnStart?: boolean }> = {},
): ConditionDefinition => ({
  type: 'pulse',
  interval,
  triggerLimit: options.triggerLimit ?? 0,
  triggerOnStart: options.triggerOnStart ?? true,
  ...(options.actuation === undefined ? {} : { actuation: options.actuation }),
});

/**
 * Inherits the state of another action of the same context.
 */
export const chord = (action: ActionId): ConditionDefinition => ({
  type: 'chord',
  action,
});

/**
 * Blocks the action while another action of the same context is fired.
 */
export const blockBy = (action: ActionId): ConditionDefinition => ({
  type: 'blockBy',
  action,
});

export const customCondition = (
  name: string,
  options?: VariantOptions,
): ConditionDefinition => ({ type: 'custom', name, options });
