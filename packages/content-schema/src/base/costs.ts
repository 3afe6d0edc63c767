import { z } from 'zod';

import { contentIdSchema, type ContentId } from './ids.js';
import { finiteNumberSchema, nonNegativeNumberSchema } from './numbers.js';

export const resourceCostSchema = z
  .object({
    resource: contentIdSchema,
    amount: nonNegativeNumberSchema,
  })
  .strict()
  .transform(
    (entry): ResourceCost => ({
      resourceId: entry.resource,
      amount: entry.amount,
    }),
  );

export type ResourceCost = {
  readonly resourceId: ContentId;
  readonly amount: number;
};

export type ResourceCostInput = z.input<typeof resourceCostSchema>;

export const effectKindSchema = z.enum(['add', 'mult'] as const);

export type EffectKind = z.infer<typeof effectKindSchema>;

export const resourceEffectSchema = z
  .object({
    resource: contentIdSchema,
    effect: effectKindSchema,
    value: finiteNumberSchema,
  })
  .strict()
  .transform(
    (entry): ResourceEffect => ({
      resourceId: entry.resource,
      kind: entry.effect,
      value: entry.value,
    }),
  );

/**
 * A modifier applied to a resource's production rate. `add` contributes to
 * the additive base, `mult` composes into the running multiplier product.
 */
export type ResourceEffect = {
  readonly resourceId: ContentId;
  readonly kind: EffectKind;
  readonly value: number;
};

export type ResourceEffectInput = z.input<typeof resourceEffectSchema>;

export const ensureUniqueCostResources = (
  entries: readonly ResourceCost[],
  ctx: z.RefinementCtx,
  path: readonly (string | number)[],
): void => {
  const seen = new Map<string, number>();
  entries.forEach((entry, index) => {
    const existing = seen.get(entry.resourceId);
    if (existing !== undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [...path, index, 'resource'],
        message: `Duplicate cost resource "${entry.resourceId}" also declared at index ${existing}.`,
      });
      return;
    }
    seen.set(entry.resourceId, index);
  });
};
