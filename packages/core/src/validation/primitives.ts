import { z } from 'zod';

export const finiteNumberSchema = z.number().finite({
  message: 'Value must be a finite number.',
});

export const nonNegativeNumberSchema = finiteNumberSchema.nonnegative({
  message: 'Value must be zero or greater.',
});

export const positiveNumberSchema = finiteNumberSchema.positive({
  message: 'Value must be greater than zero.',
});

export const identifierSchema = z
  .string()
  .refine((value) => value.trim().length > 0, {
    message: 'Identifier must contain at least one non-blank character.',
  });

/**
 * Per-axis numbers; infinite bounds are allowed (clamp limits).
 */
export const vec3Schema = z
  .object({
    x: z.number(),
    y: z.number(),
    z: z.number(),
  })
  .strict();

export const finiteVec3Schema = z
  .object({
    x: finiteNumberSchema,
    y: finiteNumberSchema,
    z: finiteNumberSchema,
  })
  .strict();

export const finiteVec2Schema = z
  .object({
    x: finiteNumberSchema,
    y: finiteNumberSchema,
  })
  .strict();
