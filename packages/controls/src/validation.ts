import { toInputBinding } from '@action-input/core';
import type {
  ActionDefinition,
  ActionId,
  ConditionDefinition,
  InputContextDefinition,
  ModifierDefinition,
} from '@action-input/core';

export const INPUT_CONTEXT_VALIDATION_CODES = {
  DUPLICATE_ACTION_ID: 'controls.context.duplicateActionId',
  MISSING_ACTION_REFERENCE: 'controls.context.missingActionReference',
  FORWARD_ACTION_REFERENCE: 'controls.context.forwardActionReference',
  SELF_ACTION_REFERENCE: 'controls.context.selfActionReference',
} as const;

export type InputContextValidationCode =
  (typeof INPUT_CONTEXT_VALIDATION_CODES)[keyof typeof INPUT_CONTEXT_VALIDATION_CODES];

export type InputContextValidationIssueSeverity = 'error' | 'warning' | 'info';

export type InputContextValidationIssue = Readonly<{
  code: InputContextValidationCode;
  message: string;
  path: readonly (string | number)[];
  severity: InputContextValidationIssueSeverity;
  suggestion?: string;
}>;

type ActionReference = Readonly<{
  action: ActionId;
  kind: string;
  path: readonly (string | number)[];
}>;

const createValidationIssue = (
  code: InputContextValidationCode,
  message: string,
  path: readonly (string | number)[],
  suggestion?: string,
): InputContextValidationIssue => ({
  code,
  message,
  path,
  severity: 'error',
  ...(suggestion === undefined ? {} : { suggestion }),
});

const referenceOf = (
  definition: ModifierDefinition | ConditionDefinition,
): ActionId | undefined => {
  switch (definition.type) {
    case 'chord':
    case 'blockBy':
    case 'accumulateBy':
      return definition.action;
    default:
      return undefined;
  }
};

const collectReferences = (
  definitions: readonly (ModifierDefinition | ConditionDefinition)[] | undefined,
  path: readonly (string | number)[],
): ActionReference[] =>
  (definitions ?? []).flatMap((definition, index) => {
    const action = referenceOf(definition);
    return action === undefined
      ? []
      : [{ action, kind: definition.type, path: [...path, index, 'action'] }];
  });

const actionReferences = (action: ActionDefinition, actionIndex: number): ActionReference[] => {
  const base = ['actions', actionIndex] as const;
  const fromInputs = (action.inputs ?? []).flatMap((source, inputIndex) => {
    const binding = toInputBinding(source);
    return [
      ...collectReferences(binding.modifiers, [...base, 'inputs', inputIndex, 'modifiers']),
      ...collectReferences(binding.conditions, [...base, 'inputs', inputIndex, 'conditions']),
    ];
  });
  return [
    ...fromInputs,
    ...collectReferences(action.modifiers, [...base, 'modifiers']),
    ...collectReferences(action.conditions, [...base, 'conditions']),
  ];
};

/**
 * Static checks a context definition passes before it is registered.
 *
 * Cross-action reads (chord, blockBy, accumulateBy) only see actions
 * evaluated earlier in the same pass, so references to later or unknown
 * actions always read as missing at runtime.
 */
export const validateInputContext = (
  definition: InputContextDefinition,
): readonly InputContextValidationIssue[] => {
  const issues: InputContextValidationIssue[] = [];

  const actionIndices = new Map<ActionId, number>();
  definition.actions.forEach((action, index) => {
    const existing = actionIndices.get(action.id);
    if (existing !== undefined) {
      issues.push(
        createValidationIssue(
          INPUT_CONTEXT_VALIDATION_CODES.DUPLICATE_ACTION_ID,
          `Duplicate action id "${action.id}" also defined at index ${existing}.`,
          ['actions', index, 'id'],
        ),
      );
      return;
    }
    actionIndices.set(action.id, index);
  });

  definition.actions.forEach((action, index) => {
    for (const reference of actionReferences(action, index)) {
      const target = actionIndices.get(reference.action);
      if (reference.action === action.id) {
        issues.push(
          createValidationIssue(
            INPUT_CONTEXT_VALIDATION_CODES.SELF_ACTION_REFERENCE,
            `Action "${action.id}" references itself through ${reference.kind}.`,
            reference.path,
          ),
        );
      } else if (target === undefined) {
        issues.push(
          createValidationIssue(
            INPUT_CONTEXT_VALIDATION_CODES.MISSING_ACTION_REFERENCE,
            `Action "${action.id}" references missing action id "${reference.action}" through ${reference.kind}.`,
            reference.path,
          ),
        );
      } else if (target > index) {
        issues.push(
          createValidationIssue(
            INPUT_CONTEXT_VALIDATION_CODES.FORWARD_ACTION_REFERENCE,
            `Action "${action.id}" references action "${reference.action}" declared after it at index ${target}.`,
            reference.path,
            `Declare "${reference.action}" before "${action.id}".`,
          ),
        );
      }
    }
  });

  return issues;
};
