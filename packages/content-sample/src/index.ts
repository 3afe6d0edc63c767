import { readFileSync } from 'node:fs';

import JSON5 from 'json5';

import {
  parseContentPack,
  type ContentPackValidationResult,
  type NormalizedContentPack,
  type NormalizedResource,
  type NormalizedUpgrade,
} from '@epochs/content-schema';

export type ContentPack = NormalizedContentPack;
export type ResourceDefinition = NormalizedResource;
export type UpgradeDefinition = NormalizedUpgrade;

export const SAMPLE_PACK_URL = new URL('../content/pack.json5', import.meta.url);

/** Reads and validates a JSON or JSON5 pack document from disk. */
export function loadContentPack(location: URL | string): ContentPackValidationResult {
  const raw = readFileSync(location, 'utf8');
  let document: unknown;
  try {
    document = JSON5.parse(raw);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse content pack ${String(location)}: ${message}`);
  }
  return parseContentPack(document);
}

const { pack, warnings } = loadContentPack(SAMPLE_PACK_URL);

if (warnings.length > 0) {
  throw new Error(
    `Sample content pack emitted ${warnings.length} validation warning(s): ${warnings
      .map((warning) => warning.code)
      .join(', ')}`,
  );
}

export const sampleContent: ContentPack = pack;

export const sampleContentSummary = Object.freeze({
  slug: pack.metadata.id,
  version: pack.metadata.version,
  resourceCount: pack.resources.length,
  treeCount: pack.trees.length,
  upgradeCount: pack.upgrades.length,
  eventCount: pack.events.length,
  warningCount: warnings.length,
});
