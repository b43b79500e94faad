import { ActionState, actionEventsFor } from './action-state.js';
import type { ActionEvent } from './action-state.js';
import { convertValue, zeroValue } from './action-value.js';
import type { ActionValue, ActionValueDim } from './action-value.js';
import type { FrameTime } from './input-time.js';

export type ActionId = string;

/**
 * Published, immutable view of one action after a frame.
 */
export type ActionSnapshot = Readonly<{
  id: ActionId;
  dim: ActionValueDim;
  state: ActionState;
  value: ActionValue;
  events: readonly ActionEvent[];
  /**
   * Seconds since the action left `none`. Zero while `none`.
   */
  elapsedSecs: number;
  /**
   * Seconds the action has been continuously `fired`. Zero otherwise.
   */
  firedSecs: number;
  /**
   * Seconds spent in the current state; reset on every transition.
   */
  stateSecs: number;
}>;

/**
 * State machine of one bound action.
 *
 * The condition evaluator decides the state; the action records it, keeps
 * the last value in the declared dimension and advances its timers.
 */
export class Action {
  private currentState: ActionState = ActionState.None;
  private currentValue: ActionValue;
  private currentEvents: readonly ActionEvent[] = [];
  private elapsedSecs = 0;
  private firedSecs = 0;
  private stateSecs = 0;

  constructor(
    readonly id: ActionId,
    readonly dim: ActionValueDim,
  ) {
    this.currentValue = zeroValue(dim);
  }

  get state(): ActionState {
    return this.currentState;
  }

  get value(): ActionValue {
    return this.currentValue;
  }

  get events(): readonly ActionEvent[] {
    return this.currentEvents;
  }

  update(time: FrameTime, state: ActionState, value: ActionValue): void {
    const delta = time.deltaSecs;

    switch (state) {
      case ActionState.None:
        this.elapsedSecs = 0;
        this.firedSecs = 0;
        break;
      case ActionState.Ongoing:
        this.elapsedSecs += delta;
        this.firedSecs = 0;
        break;
      case ActionState.Fired:
        this.elapsedSecs += delta;
        this.firedSecs += delta;
        break;
    }

    this.stateSecs = state === this.currentState ? this.stateSecs + delta : 0;
    this.currentEvents = actionEventsFor(this.currentState, state);
    this.currentState = state;
    this.currentValue = convertValue(value, this.dim);
  }

  /**
   * Returns the action to its initial state, as when it was first bound.
   */
  reset(): void {
    this.currentState = ActionState.None;
    this.currentValue = zeroValue(this.dim);
    this.currentEvents = [];
    this.elapsedSecs = 0;
    this.firedSecs = 0;
    this.stateSecs = 0;
  }

  snapshot(): ActionSnapshot {
    return Object.freeze({
      id: this.id,
      dim: this.dim,
      state: this.currentState,
      value: this.currentValue,
      events: this.currentEvents,
      elapsedSecs: this.elapsedSecs,
      firedSecs: this.firedSecs,
      stateSecs: this.stateSecs,
    });
  }
}
