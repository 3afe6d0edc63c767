import { createUpgrade } from '@epochs/content-schema';
import { describe, expect, it } from 'vitest';

import {
  areRequirementsSatisfied,
  isRequirementSatisfied,
  listBlockingRequirements,
} from './requirements.js';

// Requires `literacy` AND (`paper_mill` OR `imported_paper`).
const { requires } = createUpgrade({
  id: 'printing_press',
  tree: 'culture',
  name: 'Printing Press',
  requires: ['literacy', ['paper_mill', 'imported_paper']],
});

describe('requirements', () => {
  it('satisfies a direct entry only when the id is owned', () => {
    const [direct] = requires;
    if (!direct) {
      throw new Error('expected a requirement');
    }

    expect(isRequirementSatisfied(direct, new Set(['literacy']))).toBe(true);
    expect(isRequirementSatisfied(direct, new Set(['paper_mill']))).toBe(false);
  });

  it('satisfies an OR entry with any one alternative', () => {
    expect(areRequirementsSatisfied(requires, new Set(['literacy', 'imported_paper']))).toBe(true);
    expect(areRequirementsSatisfied(requires, new Set(['literacy', 'paper_mill']))).toBe(true);
    expect(areRequirementsSatisfied(requires, new Set(['literacy']))).toBe(false);
    expect(areRequirementsSatisfied(requires, new Set(['paper_mill']))).toBe(false);
  });

  it('treats an empty list as satisfied', () => {
    expect(areRequirementsSatisfied([], new Set<string>())).toBe(true);
    expect(listBlockingRequirements([], new Set<string>())).toEqual([]);
  });

  it('lists missing ids in declaration order', () => {
    expect(listBlockingRequirements(requires, new Set<string>())).toEqual([
      'literacy',
      'paper_mill',
      'imported_paper',
    ]);
    expect(listBlockingRequirements(requires, new Set(['imported_paper']))).toEqual(['literacy']);
    expect(listBlockingRequirements(requires, new Set(['literacy', 'paper_mill']))).toEqual([]);
  });
});
