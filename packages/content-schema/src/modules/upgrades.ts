import { z } from 'zod';

import {
  ensureUniqueCostResources,
  resourceCostSchema,
  resourceEffectSchema,
  type ResourceCost,
  type ResourceEffect,
} from '../base/costs.js';
import {
  contentIdSchema,
  exclusiveGroupIdSchema,
  type ContentId,
  type ExclusiveGroupId,
} from '../base/ids.js';
import { integerSchema, nonNegativeIntSchema } from '../base/numbers.js';

/**
 * One top-level prerequisite entry. Entries are combined with AND; an
 * `anyOf` entry is satisfied by owning at least one of its ids.
 */
export type Requirement =
  | { readonly kind: 'direct'; readonly upgradeId: ContentId }
  | { readonly kind: 'anyOf'; readonly upgradeIds: readonly ContentId[] };

const requirementEntrySchema = z.union([
  contentIdSchema.transform(
    (upgradeId): Requirement => ({ kind: 'direct', upgradeId }),
  ),
  z
    .array(contentIdSchema)
    .min(1, { message: 'OR requirements must list at least one upgrade id.' })
    .transform(
      (upgradeIds): Requirement => ({
        kind: 'anyOf',
        upgradeIds: Object.freeze([...new Set(upgradeIds)]),
      }),
    ),
]);

const exclusiveGroupSchema = z
  .union([exclusiveGroupIdSchema, z.array(exclusiveGroupIdSchema)])
  .nullable()
  .optional()
  .transform((value): readonly ExclusiveGroupId[] => {
    if (value === undefined || value === null) {
      return Object.freeze([]);
    }
    const groups = Array.isArray(value) ? value : [value];
    return Object.freeze([...new Set(groups)]);
  });

export type UpgradeDefinition = {
  readonly id: ContentId;
  readonly treeId: ContentId;
  readonly name: string;
  readonly description: string;
  /** Layout and sort hint only. */
  readonly tier: number;
  /** Earliest year the upgrade may be purchased. */
  readonly year: number;
  readonly costs: readonly ResourceCost[];
  readonly effects: readonly ResourceEffect[];
  readonly exclusiveGroups: readonly ExclusiveGroupId[];
  readonly requires: readonly Requirement[];
};

export const upgradeDefinitionSchema = z
  .object({
    id: contentIdSchema,
    tree: contentIdSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Upgrade names must contain at least one character.' }),
    description: z.string().default(''),
    tier: nonNegativeIntSchema.default(0),
    year: integerSchema.default(0),
    cost: z.array(resourceCostSchema).default([]),
    effects: z.array(resourceEffectSchema).default([]),
    exclusive_group: exclusiveGroupSchema,
    requires: z.array(requirementEntrySchema).default([]),
  })
  .strict()
  .superRefine((upgrade, ctx) => {
    ensureUniqueCostResources(upgrade.cost, ctx, ['cost']);
  })
  .transform(
    (upgrade): UpgradeDefinition => ({
      id: upgrade.id,
      treeId: upgrade.tree,
      name: upgrade.name,
      description: upgrade.description,
      tier: upgrade.tier,
      year: upgrade.year,
      costs: Object.freeze([...upgrade.cost]),
      effects: Object.freeze([...upgrade.effects]),
      exclusiveGroups: upgrade.exclusive_group,
      requires: Object.freeze([...upgrade.requires]),
    }),
  );

export type UpgradeInput = z.input<typeof upgradeDefinitionSchema>;

export const upgradeCollectionSchema = z
  .array(upgradeDefinitionSchema)
  .superRefine((upgrades, ctx) => {
    const seen = new Map<string, number>();
    upgrades.forEach((upgrade, index) => {
      const existingIndex = seen.get(upgrade.id);
      if (existingIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate upgrade id "${upgrade.id}" also defined at index ${existingIndex}.`,
        });
      } else {
        seen.set(upgrade.id, index);
      }
    });
  })
  .transform((upgrades) => Object.freeze([...upgrades]));

/** Every upgrade id an upgrade's prerequisites mention, in declaration order. */
export const listRequirementIds = (
  requires: readonly Requirement[],
): readonly ContentId[] =>
  requires.flatMap((requirement) =>
    requirement.kind === 'direct'
      ? [requirement.upgradeId]
      : [...requirement.upgradeIds],
  );

export type Upgrade = UpgradeDefinition;
