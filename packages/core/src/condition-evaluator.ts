import type { ActionLookup } from './action-map.js';
import { ActionState } from './action-state.js';
import { asAxis3D, asBool, fromVec3, widerDim } from './action-value.js';
import type { ActionValue } from './action-value.js';
import type { InputCondition } from './conditions/condition.js';
import type { Accumulation } from './config.js';
import type { Vec3 } from './device.js';
import type { FrameTime } from './input-time.js';
import type { ModifierPipeline } from './modifiers/modifier-pipeline.js';

/**
 * Combines two vectors per axis.
 *
 * @remarks
 * `cumulative` sums the contributions, so opposite inputs cancel.
 * `maxAbs` keeps, per axis, the contribution with the larger magnitude;
 * on a tie the first one wins.
 */
export function accumulate(left: Vec3, right: Vec3, accumulation: Accumulation): Vec3 {
  if (accumulation === 'cumulative') {
    return { x: left.x + right.x, y: left.y + right.y, z: left.z + right.z };
  }
  const pick = (a: number, b: number): number => (Math.abs(b) > Math.abs(a) ? b : a);
  return { x: pick(left.x, right.x), y: pick(left.y, right.y), z: pick(left.z, right.z) };
}

/**
 * Collects the verdicts of every condition an action sees in one frame and
 * folds them into a single {@link ActionState}.
 *
 * @remarks
 * One evaluator is created per bound input; they are merged with
 * {@link ConditionEvaluator.combine} and then the action-level modifiers
 * and conditions are applied to the merged evaluator.
 *
 * Policy:
 * - every condition is evaluated, even once the outcome is known, so
 *   stateful conditions keep counting;
 * - explicit conditions applied to one evaluator are AND-ed, while
 *   evaluators merged with `combine` OR their explicit results;
 * - implicit conditions are AND-ed everywhere;
 * - a blocker reporting `none` blocks the action;
 * - with no explicit or implicit condition at all the truthiness of the
 *   value decides between `fired` and `none`.
 */
export class ConditionEvaluator {
  private foundExplicit = false;
  private explicitFired = true;
  private foundImplicit = false;
  private allImplicitsFired = true;
  private foundActive = false;
  private blocked = false;

  constructor(private currentValue: ActionValue) {}

  get value(): ActionValue {
    return this.currentValue;
  }

  applyModifiers(
    pipeline: ModifierPipeline,
    actions: ActionLookup,
    time: FrameTime,
  ): void {
    this.currentValue = pipeline.apply(actions, time, this.currentValue);
  }

  applyConditions(
    conditions: readonly InputCondition[],
    actions: ActionLookup,
    time: FrameTime,
  ): void {
    for (const condition of conditions) {
      const state = condition.evaluate(actions, time, this.currentValue);
      switch (condition.kind) {
        case 'explicit':
          this.foundExplicit = true;
          this.explicitFired = this.explicitFired && state === ActionState.Fired;
          this.foundActive = this.foundActive || state !== ActionState.None;
          break;
        case 'implicit':
          this.foundImplicit = true;
          this.allImplicitsFired = this.allImplicitsFired && state === ActionState.Fired;
          this.foundActive = this.foundActive || state !== ActionState.None;
          break;
        case 'blocker':
          this.blocked = this.blocked || state === ActionState.None;
          break;
      }
    }
  }

  /**
   * Merges another input's evaluator into this one. The merged value keeps
   * this evaluator's dimension.
   */
  combine(other: ConditionEvaluator, accumulation: Accumulation): void {
    const merged = accumulate(
      asAxis3D(this.currentValue),
      asAxis3D(other.currentValue),
      accumulation,
    );
    this.currentValue = fromVec3(
      merged,
      widerDim(this.currentValue.kind, other.currentValue.kind),
    );

    if (other.foundExplicit) {
      this.explicitFired = this.foundExplicit
        ? this.explicitFired || other.explicitFired
        : other.explicitFired;
      this.foundExplicit = true;
    }
    this.foundImplicit = this.foundImplicit || other.foundImplicit;
    this.allImplicitsFired = this.allImplicitsFired && other.allImplicitsFired;
    this.foundActive = this.foundActive || other.foundActive;
    this.blocked = this.blocked || other.blocked;
  }

  state(): ActionState {
    if (this.blocked) {
      return ActionState.None;
    }
    if (!this.foundExplicit && !this.foundImplicit) {
      return asBool(this.currentValue) ? ActionState.Fired : ActionState.None;
    }
    if ((!this.foundExplicit || this.explicitFired) && this.allImplicitsFired) {
      return ActionState.Fired;
    }
    return this.foundActive ? ActionState.Ongoing : ActionState.None;
  }
}
