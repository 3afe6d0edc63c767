import { describe, expect, it } from 'vitest';

import { ExclusiveGroupSelections } from './exclusive-selections.js';

describe('ExclusiveGroupSelections', () => {
  it('lets the first selection in a group win', () => {
    const selections = new ExclusiveGroupSelections();

    expect(selections.isOpenTo('energy', 'coal')).toBe(true);
    selections.select('energy', 'coal');
    selections.select('energy', 'water');

    expect(selections.get('energy')).toBe('coal');
    expect(selections.isOpenTo('energy', 'coal')).toBe(true);
    expect(selections.isOpenTo('energy', 'water')).toBe(false);
  });

  it('keeps groups independent', () => {
    const selections = new ExclusiveGroupSelections();

    selections.select('energy', 'coal');

    expect(selections.has('transport')).toBe(false);
    expect(selections.isOpenTo('transport', 'rail')).toBe(true);
  });

  it('replaces every choice on restore and exports them as a record', () => {
    const selections = new ExclusiveGroupSelections();
    selections.select('energy', 'coal');

    selections.restore([
      ['energy', 'water'],
      ['transport', 'rail'],
    ]);

    expect(selections.toRecord()).toEqual({ energy: 'water', transport: 'rail' });
    expect(selections.entries()).toEqual([
      ['energy', 'water'],
      ['transport', 'rail'],
    ]);

    selections.clear();
    expect(selections.toRecord()).toEqual({});
  });
});
