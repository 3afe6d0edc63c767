import { describe, expect, it } from 'vitest';

import { ContentSchemaError, type ContentSchemaWarning } from '../errors.js';
import { createContentPackValidator, parseContentPack } from './index.js';

type CatalogEntry = Record<string, unknown>;

const baseInput = () => ({
  metadata: { id: 'test-pack', version: '1.0.0' },
  resources: [
    { id: 'money', name: 'Money', base_production: 10 },
    { id: 'science', name: 'Science', base_production: 1 },
  ] as CatalogEntry[],
  trees: [{ id: 'industry', name: 'Industry' }],
  upgrades: [
    {
      id: 'mill',
      tree: 'industry',
      name: 'Mill',
      cost: [{ resource: 'money', amount: 50 }],
      effects: [{ resource: 'money', effect: 'add', value: 5 }],
    },
    {
      id: 'factory',
      tree: 'industry',
      name: 'Factory',
      year: 1820,
      requires: ['mill'],
      exclusive_group: 'power',
    },
    {
      id: 'workshop',
      tree: 'industry',
      name: 'Workshop',
      requires: [['mill', 'factory']],
      exclusive_group: 'power',
    },
  ] as CatalogEntry[],
  events: [] as CatalogEntry[],
});

const expectIssueMessages = (input: unknown): string[] => {
  try {
    parseContentPack(input);
  } catch (error) {
    expect(error).toBeInstanceOf(ContentSchemaError);
    if (error instanceof ContentSchemaError) {
      return error.issues.map((issue) => issue.message);
    }
  }
  throw new Error('Expected content pack validation to fail.');
};

describe('parseContentPack', () => {
  it('normalizes a valid pack and keeps catalog order', () => {
    const { pack, warnings } = parseContentPack(baseInput());

    expect(pack.metadata).toEqual({ id: 'test-pack', version: '1.0.0' });
    expect(pack.resources.map((resource) => resource.id)).toEqual([
      'money',
      'science',
    ]);
    expect(pack.upgrades.map((upgrade) => upgrade.id)).toEqual([
      'mill',
      'factory',
      'workshop',
    ]);
    expect(warnings).toEqual([]);
    expect(Object.isFrozen(pack)).toBe(true);
  });

  it('reports references to unknown resources, trees and upgrades', () => {
    const input = baseInput();
    input.upgrades.push({
      id: 'railway',
      tree: 'transport',
      name: 'Railway',
      cost: [{ resource: 'steel', amount: 10 }],
      requires: ['canal'],
    });

    const messages = expectIssueMessages(input);

    expect(messages).toContain('Upgrade tree "transport" is not defined in this pack.');
    expect(messages).toContain('Resource "steel" is not defined in this pack.');
    expect(messages).toContain('Upgrade "canal" is not defined in this pack.');
  });

  it('rejects an upgrade that requires itself', () => {
    const input = baseInput();
    input.upgrades.push({
      id: 'loop',
      tree: 'industry',
      name: 'Loop',
      requires: ['loop'],
    });

    expect(expectIssueMessages(input)).toContain(
      'Upgrade "loop" cannot require itself.',
    );
  });

  it('rejects prerequisite cycles with a canonical path', () => {
    const input = baseInput();
    input.upgrades.push(
      { id: 'b', tree: 'industry', name: 'B', requires: ['c'] },
      { id: 'c', tree: 'industry', name: 'C', requires: [['a']] },
      { id: 'a', tree: 'industry', name: 'A', requires: ['b'] },
    );

    expect(expectIssueMessages(input)).toEqual([
      'Upgrade prerequisites form a cycle: a→b→c→a.',
    ]);
  });

  it('allows a loop through a multi-id OR set', () => {
    const input = baseInput();
    input.upgrades.push(
      { id: 'x', tree: 'industry', name: 'X', requires: [['y', 'mill']] },
      { id: 'y', tree: 'industry', name: 'Y', requires: ['x'] },
    );

    expect(() => parseContentPack(input)).not.toThrow();
  });

  it('rejects duplicate ids', () => {
    const input = baseInput();
    input.resources.push({ id: 'money', name: 'More Money', base_production: 1 });

    expect(expectIssueMessages(input)).toEqual([
      'Duplicate resource id "money" also defined at index 0.',
    ]);
  });

  it('validates event references', () => {
    const input = baseInput();
    input.events.push({
      id: 'boom',
      title: 'Boom',
      triggers: [{ resource: 'gold', threshold: 1 }],
      choices: [{ id: 'ok', text: 'OK', requirements: ['telegraph'] }],
    });

    const messages = expectIssueMessages(input);

    expect(messages).toContain('Resource "gold" is not defined in this pack.');
    expect(messages).toContain('Upgrade "telegraph" is not defined in this pack.');
  });

  it('sends soft authoring problems to the warning sink', () => {
    const input = baseInput();
    input.upgrades.push({
      id: 'early_bird',
      tree: 'industry',
      name: 'Early Bird',
      year: 1800,
      requires: ['factory'],
      exclusive_group: 'lonely',
    });
    const sunk: ContentSchemaWarning[] = [];

    const { warnings } = createContentPackValidator({
      warningSink: (warning) => sunk.push(warning),
    }).parse(input);

    expect(warnings.map((warning) => warning.code)).toEqual([
      'upgrade.yearBeforePrerequisite',
      'exclusiveGroup.singleMember',
    ]);
    expect(sunk).toEqual(warnings);
  });

  it('returns failures from safeParse instead of throwing', () => {
    const result = createContentPackValidator().safeParse({
      metadata: { id: 'Bad Slug!', version: 'one' },
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error).toBeInstanceOf(ContentSchemaError);
    }
  });
});
