export {
  contentPackSchema,
  createContentPackValidator,
  parseContentPack,
  type ContentPackInput,
  type ContentPackSafeParseFailure,
  type ContentPackSafeParseResult,
  type ContentPackSafeParseSuccess,
  type ContentPackValidationResult,
  type ContentPackValidator,
  type ContentSchemaOptions,
  type NormalizedContentPack,
  type NormalizedEvent,
  type NormalizedMetadata,
  type NormalizedResource,
  type NormalizedUpgrade,
  type NormalizedUpgradeTree,
  type ParsedContentPack,
} from './pack/index.js';

export {
  ContentSchemaError,
  type ContentSchemaWarning,
  type ContentSchemaWarningSeverity,
} from './errors.js';

export * from './base/ids.js';
export * from './base/numbers.js';
export * from './base/costs.js';

export * from './modules/metadata.js';
export * from './modules/resources.js';
export * from './modules/upgrade-trees.js';
export * from './modules/upgrades.js';
export * from './modules/events.js';

export { detectCycles } from './pack/validate-cycles.js';

export {
  createEvent,
  createResource,
  createUpgrade,
  createUpgradeTree,
} from './factories.js';
