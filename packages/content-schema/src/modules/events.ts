import { z } from 'zod';

import {
  ensureUniqueCostResources,
  resourceCostSchema,
  resourceEffectSchema,
  type ResourceCost,
  type ResourceEffect,
} from '../base/costs.js';
import { contentIdSchema, type ContentId } from '../base/ids.js';
import { finiteNumberSchema, nonNegativeNumberSchema } from '../base/numbers.js';

export const thresholdComparisonSchema = z.enum([
  '>=',
  '<=',
  '>',
  '<',
  '==',
] as const);

export type ThresholdComparison = z.infer<typeof thresholdComparisonSchema>;

export type EventTrigger = {
  readonly resourceId: ContentId;
  readonly threshold: number;
  readonly comparison: ThresholdComparison;
};

const eventTriggerSchema = z
  .object({
    resource: contentIdSchema,
    threshold: finiteNumberSchema,
    comparison: thresholdComparisonSchema.default('>='),
  })
  .strict()
  .transform(
    (trigger): EventTrigger => ({
      resourceId: trigger.resource,
      threshold: trigger.threshold,
      comparison: trigger.comparison,
    }),
  );

export type EventChoiceDefinition = {
  readonly id: ContentId;
  readonly text: string;
  readonly description: string;
  readonly costs: readonly ResourceCost[];
  readonly effects: readonly ResourceEffect[];
  /** Upgrade ids that must all be owned to pick this choice. */
  readonly requirements: readonly ContentId[];
};

const eventChoiceSchema = z
  .object({
    id: contentIdSchema,
    text: z
      .string()
      .trim()
      .min(1, { message: 'Choice text must contain at least one character.' }),
    description: z.string().default(''),
    costs: z.array(resourceCostSchema).default([]),
    effects: z.array(resourceEffectSchema).default([]),
    requirements: z.array(contentIdSchema).default([]),
  })
  .strict()
  .superRefine((choice, ctx) => {
    ensureUniqueCostResources(choice.costs, ctx, ['costs']);
  })
  .transform(
    (choice): EventChoiceDefinition => ({
      id: choice.id,
      text: choice.text,
      description: choice.description,
      costs: Object.freeze([...choice.costs]),
      effects: Object.freeze([...choice.effects]),
      requirements: Object.freeze([...new Set(choice.requirements)]),
    }),
  );

export type EventDefinition = {
  readonly id: ContentId;
  readonly title: string;
  readonly description: string;
  readonly icon: string;
  /** All triggers must hold for the event to fire. */
  readonly triggers: readonly EventTrigger[];
  readonly choices: readonly EventChoiceDefinition[];
  readonly oneTime: boolean;
  readonly cooldownSeconds: number;
};

export const eventDefinitionSchema = z
  .object({
    id: contentIdSchema,
    title: z
      .string()
      .trim()
      .min(1, { message: 'Event titles must contain at least one character.' }),
    description: z.string().default(''),
    icon: z.string().default('!'),
    triggers: z.array(eventTriggerSchema).default([]),
    choices: z
      .array(eventChoiceSchema)
      .min(1, { message: 'Events must offer at least one choice.' }),
    one_time: z.boolean().default(true),
    cooldown: nonNegativeNumberSchema.default(0),
  })
  .strict()
  .superRefine((event, ctx) => {
    const seen = new Map<string, number>();
    event.choices.forEach((choice, index) => {
      const existing = seen.get(choice.id);
      if (existing !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['choices', index, 'id'],
          message: `Duplicate choice id "${choice.id}" also defined at index ${existing}.`,
        });
        return;
      }
      seen.set(choice.id, index);
    });
  })
  .transform(
    (event): EventDefinition => ({
      id: event.id,
      title: event.title,
      description: event.description,
      icon: event.icon,
      triggers: Object.freeze([...event.triggers]),
      choices: Object.freeze([...event.choices]),
      oneTime: event.one_time,
      cooldownSeconds: event.cooldown,
    }),
  );

export type EventInput = z.input<typeof eventDefinitionSchema>;

export const eventCollectionSchema = z
  .array(eventDefinitionSchema)
  .superRefine((events, ctx) => {
    const seen = new Map<string, number>();
    events.forEach((event, index) => {
      const existingIndex = seen.get(event.id);
      if (existingIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `Duplicate event id "${event.id}" also defined at index ${existingIndex}.`,
        });
      } else {
        seen.set(event.id, index);
      }
    });
  })
  .transform((events) => Object.freeze([...events]));
