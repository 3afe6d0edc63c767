import { z } from 'zod';

import { contentIdSchema, type ContentId } from '../base/ids.js';

export type UpgradeTreeDefinition = {
  readonly id: ContentId;
  readonly name: string;
  readonly description: string;
  readonly icon: string;
};

export const upgradeTreeDefinitionSchema = z
  .object({
    id: contentIdSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Tree names must contain at least one character.' }),
    description: z.string().default(''),
    icon: z.string().default(''),
  })
  .strict()
  .transform(
    (tree): UpgradeTreeDefinition => ({
      id: tree.id,
      name: tree.name,
      description: tree.description,
      icon: tree.icon,
    }),
  );

export type UpgradeTreeInput = z.input<typeof upgradeTreeDefinitionSchema>;

export const upgradeTreeCollectionSchema = z
  .array(upgradeTreeDefinitionSchema)
  .superRefine((trees, ctx) => {
    const seen = new Map<string, number>();
    trees.forEach((tree, index) => {
      const existingIndex = seen.get(tree.id);
      if (existingIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate tree id "${tree.id}" also defined at index ${existingIndex}.`,
        });
      } else {
        seen.set(tree.id, index);
      }
    });
  })
  .transform((trees) => Object.freeze([...trees]));
