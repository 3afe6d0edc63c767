import {
  parseContentPack,
  resourceCostSchema,
  resourceEffectSchema,
  type EffectKind,
  type EventInput,
  type NormalizedContentPack,
  type ResourceCost,
  type ResourceEffect,
  type ResourceInput,
  type UpgradeInput,
  type UpgradeTreeInput,
} from '@epochs/content-schema';

export interface TestContentInput {
  readonly resources?: readonly ResourceInput[];
  readonly trees?: readonly UpgradeTreeInput[];
  readonly upgrades?: readonly (Omit<UpgradeInput, 'tree'> & { readonly tree?: string })[];
  readonly events?: readonly EventInput[];
}

/**
 * Builds a validated content pack for tests. Upgrades default to the
 * `main` tree, which is added when no trees are given.
 */
export function createTestContent(input: TestContentInput = {}): NormalizedContentPack {
  return parseContentPack({
    metadata: { id: 'test-pack', version: '1.0.0' },
    resources: input.resources ?? [],
    trees: input.trees ?? [{ id: 'main', name: 'Main' }],
    upgrades: (input.upgrades ?? []).map((upgrade) => ({
      ...upgrade,
      tree: upgrade.tree ?? 'main',
    })),
    events: input.events ?? [],
  }).pack;
}

/** `money` with base 10 (starting at 100) and `science` with base 1. */
export function createEconomyResources(): ResourceInput[] {
  return [
    { id: 'money', name: 'Money', base_production: 10 },
    { id: 'science', name: 'Science', base_production: 1 },
  ];
}

export function createEffect(resource: string, effect: EffectKind, value: number): ResourceEffect {
  return resourceEffectSchema.parse({ resource, effect, value });
}

export function createCost(resource: string, amount: number): ResourceCost {
  return resourceCostSchema.parse({ resource, amount });
}
