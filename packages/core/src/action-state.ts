export const ActionState = {
  None: 'none',
  Ongoing: 'ongoing',
  Fired: 'fired',
} as const;

/**
 * Activation lifecycle of an action in one frame.
 */
export type ActionState = (typeof ActionState)[keyof typeof ActionState];

export const ACTION_EVENTS = [
  'started',
  'ongoing',
  'fired',
  'canceled',
  'completed',
] as const;

/**
 * Event derived from the transition between two consecutive frame states.
 */
export type ActionEvent = (typeof ACTION_EVENTS)[number];

const NO_EVENTS: readonly ActionEvent[] = Object.freeze([]);

const TRANSITION_EVENTS: Readonly<
  Record<ActionState, Readonly<Record<ActionState, readonly ActionEvent[]>>>
> = Object.freeze({
  none: {
    none: NO_EVENTS,
    ongoing: Object.freeze(['started', 'ongoing'] as const),
    fired: Object.freeze(['started', 'fired'] as const),
  },
  ongoing: {
    none: Object.freeze(['canceled'] as const),
    ongoing: Object.freeze(['ongoing'] as const),
    fired: Object.freeze(['fired'] as const),
  },
  fired: {
    none: Object.freeze(['completed'] as const),
    ongoing: Object.freeze(['ongoing'] as const),
    fired: Object.freeze(['fired'] as const),
  },
});

export function actionEventsFor(
  previous: ActionState,
  next: ActionState,
): readonly ActionEvent[] {
  return TRANSITION_EVENTS[previous][next];
}
