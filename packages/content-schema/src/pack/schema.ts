import { z } from 'zod';

import { eventCollectionSchema } from '../modules/events.js';
import { metadataSchema } from '../modules/metadata.js';
import { resourceCollectionSchema } from '../modules/resources.js';
import { upgradeTreeCollectionSchema } from '../modules/upgrade-trees.js';
import { upgradeCollectionSchema } from '../modules/upgrades.js';

export const contentPackSchema = z
  .object({
    metadata: metadataSchema,
    resources: resourceCollectionSchema.default([]),
    trees: upgradeTreeCollectionSchema.default([]),
    upgrades: upgradeCollectionSchema.default([]),
    events: eventCollectionSchema.default([]),
  })
  .strict();

export type ParsedContentPack = z.infer<typeof contentPackSchema>;
export type ContentPackInput = z.input<typeof contentPackSchema>;
