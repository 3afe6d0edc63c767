import { z } from 'zod';

import { contentIdSchema, type ContentId } from '../base/ids.js';
import {
  finiteNumberSchema,
  nonNegativeIntSchema,
  rgbColorSchema,
  type RgbColor,
} from '../base/numbers.js';

type ResourceDefinitionInput = {
  readonly id: z.input<typeof contentIdSchema>;
  readonly name: string;
  readonly description?: string;
  readonly icon?: string;
  readonly color?: readonly [number, number, number];
  readonly base_production?: number;
  readonly min_value?: number;
  readonly start_amount?: number;
  readonly unlock_year?: number;
  readonly requires?: readonly z.input<typeof contentIdSchema>[];
};

export type ResourceDefinition = {
  readonly id: ContentId;
  readonly name: string;
  readonly description: string;
  readonly icon: string;
  readonly color: RgbColor;
  /** Production per second before modifiers. */
  readonly baseProduction: number;
  /** Floor the current value is clamped to after every update. */
  readonly minValue: number;
  readonly startAmount?: number;
  readonly unlockYear: number;
  /** Upgrade ids that must all be owned before the resource unlocks. */
  readonly requires: readonly ContentId[];
};

export const resourceDefinitionSchema: z.ZodType<
  ResourceDefinition,
  z.ZodTypeDef,
  ResourceDefinitionInput
> = z
  .object({
    id: contentIdSchema,
    name: z
      .string()
      .trim()
      .min(1, { message: 'Resource names must contain at least one character.' }),
    description: z.string().default(''),
    icon: z.string().default(''),
    color: rgbColorSchema.default([255, 255, 255]),
    base_production: finiteNumberSchema.default(0),
    min_value: finiteNumberSchema.default(0),
    start_amount: finiteNumberSchema.optional(),
    unlock_year: nonNegativeIntSchema.default(0),
    requires: z.array(contentIdSchema).default([]),
  })
  .strict()
  .superRefine((resource, ctx) => {
    if (
      resource.start_amount !== undefined &&
      resource.start_amount < resource.min_value
    ) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['start_amount'],
        message: 'Starting amount cannot be below the resource minimum value.',
      });
    }
  })
  .transform((resource) => ({
    id: resource.id,
    name: resource.name,
    description: resource.description,
    icon: resource.icon,
    color: resource.color,
    baseProduction: resource.base_production,
    minValue: resource.min_value,
    ...(resource.start_amount !== undefined
      ? { startAmount: resource.start_amount }
      : {}),
    unlockYear: resource.unlock_year,
    requires: Object.freeze([...new Set(resource.requires)]),
  }));

export const resourceCollectionSchema = z
  .array(resourceDefinitionSchema)
  .superRefine((resources, ctx) => {
    const seen = new Map<string, number>();
    resources.forEach((resource, index) => {
      const existingIndex = seen.get(resource.id);
      if (existingIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate resource id "${resource.id}" also defined at index ${existingIndex}.`,
        });
      } else {
        seen.set(resource.id, index);
      }
    });
  })
  .transform((resources) => Object.freeze([...resources]));

/**
 * A resource is dynamic when something other than the start of the game
 * gates it: a calendar year or a set of owned upgrades.
 */
export const isDynamicResource = (resource: ResourceDefinition): boolean =>
  resource.unlockYear > 0 || resource.requires.length > 0;

export type Resource = ResourceDefinition;
export type ResourceInput = ResourceDefinitionInput;
