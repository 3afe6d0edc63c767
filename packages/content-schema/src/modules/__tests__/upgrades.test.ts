import { describe, expect, it } from 'vitest';

import {
  listRequirementIds,
  upgradeCollectionSchema,
  upgradeDefinitionSchema,
} from '../upgrades.js';

describe('upgradeDefinitionSchema', () => {
  it('normalizes costs, effects, groups and prerequisites', () => {
    const upgrade = upgradeDefinitionSchema.parse({
      id: 'railway',
      tree: 'industry',
      name: 'Railway',
      year: 1830,
      cost: [{ resource: 'money', amount: 500 }],
      effects: [{ resource: 'money', effect: 'mult', value: 1.5 }],
      exclusive_group: 'transport',
      requires: ['steam_engine', ['canal', 'turnpike', 'canal']],
    });

    expect(upgrade).toEqual({
      id: 'railway',
      treeId: 'industry',
      name: 'Railway',
      description: '',
      tier: 0,
      year: 1830,
      costs: [{ resourceId: 'money', amount: 500 }],
      effects: [{ resourceId: 'money', kind: 'mult', value: 1.5 }],
      exclusiveGroups: ['transport'],
      requires: [
        { kind: 'direct', upgradeId: 'steam_engine' },
        { kind: 'anyOf', upgradeIds: ['canal', 'turnpike'] },
      ],
    });
    expect(listRequirementIds(upgrade.requires)).toEqual([
      'steam_engine',
      'canal',
      'turnpike',
    ]);
  });

  it('accepts null or a list of exclusive groups', () => {
    const base = { id: 'mill', tree: 'industry', name: 'Mill' };

    expect(upgradeDefinitionSchema.parse({ ...base, exclusive_group: null }).exclusiveGroups).toEqual([]);
    expect(
      upgradeDefinitionSchema.parse({ ...base, exclusive_group: ['power', 'water', 'power'] })
        .exclusiveGroups,
    ).toEqual(['power', 'water']);
  });

  it('rejects duplicate cost resources', () => {
    const result = upgradeDefinitionSchema.safeParse({
      id: 'mill',
      tree: 'industry',
      name: 'Mill',
      cost: [
        { resource: 'money', amount: 1 },
        { resource: 'money', amount: 2 },
      ],
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['cost', 1, 'resource']);
      expect(result.error.issues[0]?.message).toBe(
        'Duplicate cost resource "money" also declared at index 0.',
      );
    }
  });

  it('rejects empty OR sets, negative costs and unknown effect kinds', () => {
    const base = { id: 'mill', tree: 'industry', name: 'Mill' };

    const emptyOr = upgradeDefinitionSchema.safeParse({ ...base, requires: [[]] });
    expect(emptyOr.success).toBe(false);
    if (!emptyOr.success) {
      expect(emptyOr.error.issues.map((issue) => issue.message)).toContain(
        'OR requirements must list at least one upgrade id.',
      );
    }

    expect(
      upgradeDefinitionSchema.safeParse({ ...base, cost: [{ resource: 'money', amount: -1 }] })
        .success,
    ).toBe(false);
    expect(
      upgradeDefinitionSchema.safeParse({
        ...base,
        effects: [{ resource: 'money', effect: 'pow', value: 2 }],
      }).success,
    ).toBe(false);
  });
});

describe('upgradeCollectionSchema', () => {
  it('rejects duplicate ids', () => {
    const result = upgradeCollectionSchema.safeParse([
      { id: 'mill', tree: 'industry', name: 'Mill' },
      { id: 'mill', tree: 'agriculture', name: 'Mill' },
    ]);

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe(
        'Duplicate upgrade id "mill" also defined at index 0.',
      );
    }
  });
});
