import { z } from 'zod';

const FINITE_NUMBER_MESSAGE = 'Value must be a finite number.';
const NONNEGATIVE_NUMBER_MESSAGE = 'Value must be greater than or equal to 0.';
const NONNEGATIVE_INTEGER_MESSAGE =
  'Value must be an integer greater than or equal to 0.';

const ensureFinite = (value: number, ctx: z.RefinementCtx) => {
  if (!Number.isFinite(value)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: FINITE_NUMBER_MESSAGE,
    });
    return z.NEVER;
  }

  return value;
};

export const finiteNumberSchema = z
  .number()
  .transform((value, ctx) => ensureFinite(value, ctx));

export const nonNegativeNumberSchema = finiteNumberSchema.refine(
  (value) => value >= 0,
  {
    message: NONNEGATIVE_NUMBER_MESSAGE,
  },
);

export const integerSchema = finiteNumberSchema.refine(Number.isInteger, {
  message: 'Value must be an integer.',
});

export const nonNegativeIntSchema = finiteNumberSchema
  .refine(Number.isInteger, {
    message: NONNEGATIVE_INTEGER_MESSAGE,
  })
  .refine((value) => value >= 0, {
    message: NONNEGATIVE_INTEGER_MESSAGE,
  });

export const colorChannelSchema = z
  .number()
  .int({ message: 'Color channels must be integers.' })
  .min(0, { message: 'Color channels must be between 0 and 255.' })
  .max(255, { message: 'Color channels must be between 0 and 255.' });

export const rgbColorSchema = z.tuple([
  colorChannelSchema,
  colorChannelSchema,
  colorChannelSchema,
]);

export type RgbColor = z.infer<typeof rgbColorSchema>;
