import type { ContentSchemaWarning } from '../errors.js';
import type { EventDefinition } from '../modules/events.js';
import type { PackMetadata } from '../modules/metadata.js';
import type { ResourceDefinition } from '../modules/resources.js';
import type { UpgradeTreeDefinition } from '../modules/upgrade-trees.js';
import type { UpgradeDefinition } from '../modules/upgrades.js';

export type NormalizedMetadata = PackMetadata;
export type NormalizedResource = ResourceDefinition;
export type NormalizedUpgradeTree = UpgradeTreeDefinition;
export type NormalizedUpgrade = UpgradeDefinition;
export type NormalizedEvent = EventDefinition;

/**
 * Validated, immutable content. Collections keep catalog order, which the
 * runtime relies on for deterministic iteration.
 */
export interface NormalizedContentPack {
  readonly metadata: NormalizedMetadata;
  readonly resources: readonly NormalizedResource[];
  readonly trees: readonly NormalizedUpgradeTree[];
  readonly upgrades: readonly NormalizedUpgrade[];
  readonly events: readonly NormalizedEvent[];
}

export interface ContentSchemaOptions {
  readonly warningSink?: (warning: ContentSchemaWarning) => void;
}

export interface ContentPackValidationResult {
  readonly pack: NormalizedContentPack;
  readonly warnings: readonly ContentSchemaWarning[];
}

export interface ContentPackSafeParseSuccess {
  readonly success: true;
  readonly data: ContentPackValidationResult;
}

export interface ContentPackSafeParseFailure {
  readonly success: false;
  readonly error: unknown;
}

export type ContentPackSafeParseResult =
  | ContentPackSafeParseSuccess
  | ContentPackSafeParseFailure;

export interface ContentPackValidator {
  parse(input: unknown): ContentPackValidationResult;
  safeParse(input: unknown): ContentPackSafeParseResult;
}
