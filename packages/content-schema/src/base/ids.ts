import semver from 'semver';
import { z } from 'zod';

const CONTENT_ID_PATTERN = /^[A-Za-z0-9][-./:\w]{0,63}$/;
const PACK_SLUG_PATTERN = /^(?:@[a-z0-9][a-z0-9\-._]*\/)?[a-z0-9][a-z0-9\-._]*$/;
const PACK_SLUG_SEPARATOR_PATTERN = /\/{2,}/g;

const normalizePackSlug = (value: string): string =>
  value
    .trim()
    .replace(PACK_SLUG_SEPARATOR_PATTERN, '/')
    .toLowerCase();

const validateSemver = (value: string, ctx: z.RefinementCtx): string => {
  const cleaned = semver.clean(value.trim());
  if (cleaned) {
    return cleaned;
  }

  ctx.addIssue({
    code: z.ZodIssueCode.custom,
    message: 'Invalid semantic version.',
  });
  return z.NEVER;
};

export const packSlugSchema = z
  .string()
  .trim()
  .min(1, { message: 'Pack slug must contain at least one character.' })
  .max(64, { message: 'Pack slug must contain at most 64 characters.' })
  .transform(normalizePackSlug)
  .refine((value) => PACK_SLUG_PATTERN.test(value), {
    message:
      'Pack slug must match npm-style package syntax (optionally "@scope/name").',
  })
  .pipe(z.string().brand<'PackId'>());

// Ids stay case-sensitive: saves and cross references compare them verbatim.
const createContentSlugSchema = <Brand extends string>(label: string) =>
  z
    .string()
    .trim()
    .min(1, { message: `${label} must contain at least one character.` })
    .max(64, { message: `${label} must contain at most 64 characters.` })
    .regex(CONTENT_ID_PATTERN, {
      message: `${label} must start with an alphanumeric character and may include "-", "_", ".", "/", or ":" thereafter.`,
    })
    .pipe(z.string().brand<Brand>());

export const contentIdSchema =
  createContentSlugSchema<'ContentId'>('Content id');

export const exclusiveGroupIdSchema =
  createContentSlugSchema<'ExclusiveGroupId'>('Exclusive group id');

export const semverSchema = z
  .string()
  .trim()
  .min(1, { message: 'Semantic versions must not be empty.' })
  .transform((value, ctx) => validateSemver(value, ctx))
  .pipe(z.string().brand<'SemanticVersion'>());

export type ContentId = z.infer<typeof contentIdSchema>;
export type ExclusiveGroupId = z.infer<typeof exclusiveGroupIdSchema>;
export type PackId = z.infer<typeof packSlugSchema>;
export type SemanticVersion = z.infer<typeof semverSchema>;
