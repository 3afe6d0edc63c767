import { z } from 'zod';

import { ContentSchemaError, type ContentSchemaWarning } from '../errors.js';
import { contentPackSchema, type ParsedContentPack } from './schema.js';
import type {
  ContentPackSafeParseResult,
  ContentPackValidationResult,
  ContentPackValidator,
  ContentSchemaOptions,
  NormalizedContentPack,
} from './types.js';
import { validateCrossReferences } from './validate-cross-references.js';
import { validateRequirementCycles } from './validate-cycles.js';

export { contentPackSchema };
export type { ContentPackInput, ParsedContentPack } from './schema.js';

export type {
  ContentPackSafeParseFailure,
  ContentPackSafeParseSuccess,
  ContentPackSafeParseResult,
  ContentPackValidationResult,
  ContentPackValidator,
  ContentSchemaOptions,
  NormalizedContentPack,
  NormalizedEvent,
  NormalizedMetadata,
  NormalizedResource,
  NormalizedUpgrade,
  NormalizedUpgradeTree,
} from './types.js';

const buildContentPackSchema = (
  warningSink: (warning: ContentSchemaWarning) => void,
) =>
  contentPackSchema.superRefine((pack, ctx) => {
    validateCrossReferences(pack, ctx, warningSink);
    validateRequirementCycles(pack, ctx);
  });

const freezePack = (pack: ParsedContentPack): NormalizedContentPack =>
  Object.freeze({
    metadata: pack.metadata,
    resources: pack.resources,
    trees: pack.trees,
    upgrades: pack.upgrades,
    events: pack.events,
  });

const formatIssues = (issues: readonly z.ZodIssue[]): string =>
  issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${path}: ${issue.message}`;
    })
    .join('\n');

export const createContentPackValidator = (
  options: ContentSchemaOptions = {},
): ContentPackValidator => ({
  parse(input: unknown): ContentPackValidationResult {
    const warnings: ContentSchemaWarning[] = [];
    const sink = (warning: ContentSchemaWarning) => {
      warnings.push(warning);
      options.warningSink?.(warning);
    };

    const result = buildContentPackSchema(sink).safeParse(input);
    if (!result.success) {
      throw new ContentSchemaError(
        `Content pack validation failed:\n${formatIssues(result.error.issues)}`,
        result.error.issues,
      );
    }

    return {
      pack: freezePack(result.data),
      warnings: Object.freeze(warnings),
    };
  },
  safeParse(input: unknown): ContentPackSafeParseResult {
    try {
      return { success: true, data: this.parse(input) };
    } catch (error) {
      return { success: false, error };
    }
  },
});

export const parseContentPack = (
  input: unknown,
  options?: ContentSchemaOptions,
): ContentPackValidationResult => createContentPackValidator(options).parse(input);
