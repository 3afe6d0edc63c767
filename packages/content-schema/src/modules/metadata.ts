import { z } from 'zod';

import {
  packSlugSchema,
  semverSchema,
  type PackId,
  type SemanticVersion,
} from '../base/ids.js';

export type PackMetadata = {
  readonly id: PackId;
  readonly version: SemanticVersion;
  readonly title?: string;
};

export const metadataSchema = z
  .object({
    id: packSlugSchema,
    version: semverSchema,
    title: z.string().trim().min(1).optional(),
  })
  .strict()
  .transform(
    (metadata): PackMetadata => ({
      id: metadata.id,
      version: metadata.version,
      ...(metadata.title !== undefined ? { title: metadata.title } : {}),
    }),
  );

export type PackMetadataInput = z.input<typeof metadataSchema>;
