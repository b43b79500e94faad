import { z } from 'zod';

import { ACTION_VALUE_DIMS } from '../action-value.js';
import type { InputContextDefinition } from '../binding.js';
import { GAMEPAD_AXES, GAMEPAD_BUTTONS, MOUSE_BUTTONS } from '../device.js';
import { InputConfigurationError } from '../errors.js';
import type { InputConfigurationIssue } from '../errors.js';
import { ModKeys } from '../mod-keys.js';
import {
  finiteNumberSchema,
  finiteVec3Schema,
  identifierSchema,
  nonNegativeNumberSchema,
  positiveNumberSchema,
  vec3Schema,
} from './primitives.js';

export const CONTEXT_VALIDATION_CODES = {
  duplicateActionId: 'context.duplicateActionId',
  invalidDefinition: 'context.invalidDefinition',
} as const;

const modKeysSchema = z.custom<ModKeys>((data) => data instanceof ModKeys, {
  message: 'Modifier keys must be a ModKeys value.',
});

const GAMEPAD_MOD_KEYS_MESSAGE = "Gamepad inputs can't carry keyboard modifiers.";

export const inputSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('keyboard'), key: identifierSchema, modKeys: modKeysSchema }),
  z.object({
    kind: z.literal('mouseButton'),
    button: z.enum(MOUSE_BUTTONS),
    modKeys: modKeysSchema,
  }),
  z.object({ kind: z.literal('mouseMotion'), modKeys: modKeysSchema }),
  z.object({ kind: z.literal('mouseWheel'), modKeys: modKeysSchema }),
  z
    .object({ kind: z.literal('gamepadButton'), button: z.enum(GAMEPAD_BUTTONS) })
    .strict(GAMEPAD_MOD_KEYS_MESSAGE),
  z
    .object({ kind: z.literal('gamepadAxis'), axis: z.enum(GAMEPAD_AXES) })
    .strict(GAMEPAD_MOD_KEYS_MESSAGE),
]);

const customOptionsSchema = z.record(z.unknown()).optional();

export const modifierDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('scale'), factor: finiteVec3Schema }),
  z.object({ type: z.literal('deltaScale') }),
  z.object({
    type: z.literal('negate'),
    x: z.boolean(),
    y: z.boolean(),
    z: z.boolean(),
  }),
  z.object({
    type: z.literal('swizzleAxis'),
    order: z.string().regex(/^[XYZ]{3}$/, {
      message: 'Swizzle order must be three of X, Y and Z.',
    }),
  }),
  z.object({
    type: z.literal('deadZone'),
    shape: z.enum(['radial', 'axial']),
    lower: nonNegativeNumberSchema,
    upper: nonNegativeNumberSchema,
  }),
  z.object({ type: z.literal('clamp'), min: vec3Schema, max: vec3Schema }),
  z.object({ type: z.literal('exponentialCurve'), exponent: finiteVec3Schema }),
  z.object({ type: z.literal('smoothNudge'), decayRate: nonNegativeNumberSchema }),
  z.object({ type: z.literal('accumulateBy'), action: identifierSchema }),
  z.object({
    type: z.literal('custom'),
    name: identifierSchema,
    options: customOptionsSchema,
  }),
]);

const actuationSchema = nonNegativeNumberSchema.optional();

export const conditionDefinitionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('down'), actuation: actuationSchema }),
  z.object({ type: z.literal('press'), actuation: actuationSchema }),
  z.object({ type: z.literal('release'), actuation: actuationSchema }),
  z.object({
    type: z.literal('hold'),
    holdTime: nonNegativeNumberSchema,
    oneShot: z.boolean(),
    actuation: actuationSchema,
  }),
  z.object({
    type: z.literal('holdAndRelease'),
    holdTime: nonNegativeNumberSchema,
    actuation: actuationSchema,
  }),
  z.object({
    type: z.literal('tap'),
    releaseTime: nonNegativeNumberSchema,
    actuation: actuationSchema,
  }),
  z.object({
    type: z.literal('pulse'),
    interval: positiveNumberSchema,
    triggerLimit: finiteNumberSchema.int().nonnegative(),
    triggerOnStart: z.boolean(),
    actuation: actuationSchema,
  }),
  z.object({ type: z.literal('chord'), action: identifierSchema }),
  z.object({ type: z.literal('blockBy'), action: identifierSchema }),
  z.object({
    type: z.literal('custom'),
    name: identifierSchema,
    options: customOptionsSchema,
  }),
]);

const inputBindingSchema = z.object({
  input: inputSchema,
  modifiers: z.array(modifierDefinitionSchema).optional(),
  conditions: z.array(conditionDefinitionSchema).optional(),
});

export const actionDefinitionSchema = z.object({
  id: identifierSchema,
  output: z.enum(ACTION_VALUE_DIMS),
  inputs: z.array(z.union([inputSchema, inputBindingSchema])).optional(),
  modifiers: z.array(modifierDefinitionSchema).optional(),
  conditions: z.array(conditionDefinitionSchema).optional(),
  accumulation: z.enum(['cumulative', 'maxAbs']).optional(),
  consumeInput: z.boolean().optional(),
});

const gamepadDeviceSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('any') }),
  z.object({ kind: z.literal('single'), id: identifierSchema }),
]);

export const inputContextDefinitionSchema = z
  .object({
    id: identifierSchema,
    actions: z.array(actionDefinitionSchema),
    gamepad: gamepadDeviceSchema.optional(),
  })
  .superRefine((context, ctx) => {
    const seen = new Map<string, number>();
    context.actions.forEach((action, index) => {
      const existingIndex = seen.get(action.id);
      if (existingIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['actions', index, 'id'],
          message: `Action "${action.id}" duplicates index ${existingIndex}.`,
          params: { code: CONTEXT_VALIDATION_CODES.duplicateActionId },
        });
        return;
      }
      seen.set(action.id, index);
    });
  });

const issueCode = (issue: z.ZodIssue): string => {
  if (issue.code === z.ZodIssueCode.custom) {
    const code: unknown = issue.params?.code;
    if (typeof code === 'string') {
      return code;
    }
  }
  return CONTEXT_VALIDATION_CODES.invalidDefinition;
};

export function toConfigurationIssues(error: z.ZodError): InputConfigurationIssue[] {
  return error.issues.map((issue) => ({
    code: issueCode(issue),
    message: issue.message,
    path: issue.path,
  }));
}

/**
 * Checks the shape of a context definition before any binding is built.
 *
 * @throws InputConfigurationError listing every issue found.
 */
export function assertInputContextDefinition(definition: InputContextDefinition): void {
  const result = inputContextDefinitionSchema.safeParse(definition);
  if (!result.success) {
    const issues = toConfigurationIssues(result.error);
    throw new InputConfigurationError(
      `Input context "${definition.id}" is invalid: ${issues
        .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
        .join('; ')}`,
      issues,
    );
  }
}
