import { describe, expect, it } from 'vitest';

import { metadataSchema } from '../metadata.js';

describe('metadataSchema', () => {
  it('normalizes the slug, version and title', () => {
    expect(
      metadataSchema.parse({ id: 'Epochs-Sample', version: 'v0.1.0', title: ' Age of Engines ' }),
    ).toEqual({ id: 'epochs-sample', version: '0.1.0', title: 'Age of Engines' });
  });

  it('omits an absent title', () => {
    const metadata = metadataSchema.parse({ id: 'pack', version: '1.0.0' });

    expect(metadata).toEqual({ id: 'pack', version: '1.0.0' });
    expect('title' in metadata).toBe(false);
  });

  it('rejects unknown keys', () => {
    expect(
      metadataSchema.safeParse({ id: 'pack', version: '1.0.0', authors: ['someone'] }).success,
    ).toBe(false);
  });
});
