import type { NormalizedContentPack } from '@epochs/content-schema';
import fc from 'fast-check';
import { afterEach, describe, expect, it, vi } from 'vitest';

import {
  createEconomyResources,
  createTestContent,
  type TestContentInput,
} from './content-test-helpers.js';
import { GameState } from './game-state.js';
import { ResourceManager } from './progression/resource-manager.js';
import { UpgradeCatalog } from './progression/upgrade-catalog.js';
import {
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
} from './telemetry.js';
import { TimeSystem } from './time-system.js';

const UPGRADES: TestContentInput['upgrades'] = [
  {
    id: 'plough',
    name: 'Plough',
    cost: [{ resource: 'money', amount: 50 }],
    effects: [{ resource: 'money', effect: 'add', value: 5 }],
  },
  {
    id: 'irrigation',
    name: 'Irrigation',
    cost: [{ resource: 'money', amount: 20 }],
    effects: [{ resource: 'money', effect: 'mult', value: 2 }],
    requires: ['plough'],
  },
  { id: 'steam', name: 'Steam Engine', year: 1810, cost: [{ resource: 'money', amount: 10 }] },
  { id: 'railway', name: 'Railway', year: 1820, requires: ['steam'] },
  { id: 'coal', name: 'Coal Power', exclusive_group: 'energy', cost: [{ resource: 'money', amount: 10 }] },
  { id: 'water', name: 'Water Power', exclusive_group: 'energy', cost: [{ resource: 'money', amount: 10 }] },
  { id: 'press', name: 'Press', requires: [['coal', 'water']], cost: [{ resource: 'science', amount: 5 }] },
  { id: 'palace', name: 'Palace', cost: [{ resource: 'money', amount: 1000 }] },
];

function createSession(content: NormalizedContentPack, onUpgradePurchased = vi.fn()) {
  const time = new TimeSystem();
  const resources = new ResourceManager({ resources: content.resources });
  const catalog = new UpgradeCatalog({ upgrades: content.upgrades, trees: content.trees });
  const state = new GameState({ resources, catalog, time, onUpgradePurchased });
  return { time, resources, state, onUpgradePurchased };
}

function createDefaultSession() {
  return createSession(
    createTestContent({ resources: createEconomyResources(), upgrades: UPGRADES }),
  );
}

describe('GameState', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('pays for an upgrade and applies its effect', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const { state, resources, onUpgradePurchased } = createDefaultSession();

    expect(state.getUpgradeStatus('plough')).toBe('available');
    expect(state.purchaseUpgrade('plough')).toBe(true);

    expect(resources.getValue('money')).toBe(50);
    expect(resources.get('money')?.getProductionPerSecond()).toBe(15);
    expect(state.ownedUpgrades).toEqual(['plough']);
    expect(state.getUpgradeStatus('plough')).toBe('owned');
    expect(onUpgradePurchased).toHaveBeenCalledTimes(1);
    expect(recording.records).toEqual([
      { level: 'progress', event: 'UpgradePurchased', data: { upgradeId: 'plough', year: 1800 } },
    ]);
  });

  it('applies effects in purchase order', () => {
    const { state, resources } = createDefaultSession();

    state.purchaseUpgrade('plough');
    state.purchaseUpgrade('irrigation');

    expect(resources.get('money')?.getProductionPerSecond()).toBe(30);
    expect(resources.getValue('money')).toBe(30);
  });

  it('explains each rejected purchase without changing anything', () => {
    const { state, resources } = createDefaultSession();
    state.purchaseUpgrade('coal');
    const before = resources.getValue('money');

    expect(state.tryPurchaseUpgrade('missing')).toEqual({
      success: false,
      error: {
        code: 'UPGRADE_UNKNOWN',
        message: 'Upgrade "missing" does not exist.',
        details: { upgradeId: 'missing' },
      },
    });
    expect(state.tryPurchaseUpgrade('coal')).toMatchObject({ error: { code: 'UPGRADE_OWNED' } });
    expect(state.tryPurchaseUpgrade('steam')).toEqual({
      success: false,
      error: {
        code: 'UPGRADE_LOCKED_YEAR',
        message: 'Upgrade "steam" cannot be purchased before 1810.',
        details: { upgradeId: 'steam' },
      },
    });
    expect(state.tryPurchaseUpgrade('water')).toMatchObject({
      error: { code: 'UPGRADE_EXCLUSIVE_BLOCKED' },
    });
    expect(state.tryPurchaseUpgrade('irrigation')).toMatchObject({
      error: { code: 'UPGRADE_REQUIREMENTS_NOT_MET' },
    });
    expect(state.tryPurchaseUpgrade('palace')).toMatchObject({
      error: { code: 'UPGRADE_UNAFFORDABLE' },
    });

    expect(resources.getValue('money')).toBe(before);
    expect(state.ownedUpgrades).toEqual(['coal']);
  });

  it('reports the year gate before missing prerequisites', () => {
    const { state, time } = createDefaultSession();

    expect(state.getUpgradeStatus('railway')).toBe('locked_year_1820');

    time.restore(1820);
    expect(state.getUpgradeStatus('railway')).toBe('requirements_not_met');
    expect(state.getBlockingRequirements('railway')).toEqual(['steam']);
  });

  it('keeps affordability out of availability', () => {
    const { state } = createDefaultSession();

    expect(state.isUpgradeAvailable('palace')).toBe(true);
    expect(state.canAffordUpgrade('palace')).toBe(false);
    expect(state.getUpgradeStatus('palace')).toBe('cannot_afford');
    expect(state.isUpgradeAvailable('missing')).toBe(false);
    expect(state.getAvailableUpgradeIds()).toEqual(['plough', 'coal', 'water', 'palace']);
  });

  it('accepts either alternative of an OR prerequisite', () => {
    const { state } = createDefaultSession();

    expect(state.getUpgradeStatus('press')).toBe('requirements_not_met');
    expect(state.getBlockingRequirements('press')).toEqual(['coal', 'water']);

    state.purchaseUpgrade('water');

    expect(state.getBlockingRequirements('press')).toEqual([]);
    expect(state.purchaseUpgrade('press')).toBe(true);
  });

  it('never owns two upgrades from the same exclusive group', () => {
    const content = createTestContent({
      resources: [
        { id: 'money', name: 'Money', base_production: 1, start_amount: 1_000_000 },
        { id: 'science', name: 'Science', base_production: 1 },
      ],
      upgrades: UPGRADES,
    });

    fc.assert(
      fc.property(
        fc.array(fc.constantFrom('plough', 'irrigation', 'coal', 'water', 'press'), { maxLength: 12 }),
        (attempts) => {
          const { state } = createSession(content);
          for (const upgradeId of attempts) {
            state.purchaseUpgrade(upgradeId);
          }
          const energy = state.ownedUpgrades.filter(
            (upgradeId) => upgradeId === 'coal' || upgradeId === 'water',
          );
          expect(energy.length).toBeLessThanOrEqual(1);
          expect(state.selectedExclusive['energy']).toBe(energy[0]);
        },
      ),
    );
  });

  it('describes an exclusive group and its selection', () => {
    const { state } = createDefaultSession();
    state.purchaseUpgrade('coal');

    expect(state.getExclusiveGroupInfo('energy')).toEqual({
      groupName: 'energy',
      totalOptions: 2,
      selected: 'Coal Power',
      selectedId: 'coal',
      options: [
        { id: 'coal', name: 'Coal Power', owned: true },
        { id: 'water', name: 'Water Power', owned: false },
      ],
    });
    expect(state.getExclusiveGroupInfo('unknown')).toEqual({
      groupName: 'unknown',
      totalOptions: 0,
      selected: null,
      selectedId: null,
      options: [],
    });
  });

  it('summarizes progress', () => {
    const { state } = createDefaultSession();
    state.purchaseUpgrade('plough');

    expect(state.getStatistics()).toEqual({
      currentYear: 1800,
      totalUpgrades: 8,
      ownedUpgrades: 1,
      availableUpgrades: 4,
      completionPercentage: 12.5,
      treeStatistics: { main: { total: 8, owned: 1, percentage: 12.5 } },
      nextUnlockYear: 1810,
      yearsUntilNextUnlock: 10,
    });
  });

  it('reports zero completion for an empty catalog', () => {
    const { state } = createSession(createTestContent({ resources: createEconomyResources() }));

    expect(state.getStatistics()).toMatchObject({
      totalUpgrades: 0,
      completionPercentage: 0,
      treeStatistics: { main: { total: 0, owned: 0, percentage: 0 } },
      nextUnlockYear: null,
      yearsUntilNextUnlock: null,
    });
  });

  it('groups upcoming upgrades by year', () => {
    const { state } = createDefaultSession();

    expect(state.getUpgradesByYear(1810).map((upgrade) => upgrade.id)).toEqual(['steam']);
    expect(
      [...state.getUpgradesLockedByYear()].map(([year, upgrades]) => [
        year,
        upgrades.map((upgrade) => upgrade.id),
      ]),
    ).toEqual([
      [1810, ['steam']],
      [1820, ['railway']],
    ]);
  });

  it('integrates production scaled by the time scale', () => {
    const { state, resources } = createDefaultSession();

    state.update(2, 0.5);

    expect(resources.getValue('money')).toBe(110);
    expect(resources.getValue('science')).toBe(11);
  });

  it('credits projected production when skipping time', () => {
    const { state, resources, time } = createDefaultSession();
    const years: number[] = [];
    time.addYearListener((year) => {
      years.push(year);
    });

    expect(state.canTimeSkipToYear(1800)).toBe(false);
    expect(state.timeSkipToYear(1805)).toBe(true);

    expect(years).toEqual([1801, 1802, 1803, 1804, 1805]);
    expect(resources.getValue('money')).toBe(200);
    expect(resources.getValue('science')).toBe(20);
  });

  it('refuses a skip that would push a resource below its floor', () => {
    const { state, resources, time } = createSession(
      createTestContent({
        resources: [{ id: 'food', name: 'Food', base_production: -4, start_amount: 10 }],
      }),
    );

    expect(state.canTimeSkipToYear(1801)).toBe(true);
    expect(state.timeSkipToYear(1802)).toBe(false);
    expect(resources.getValue('food')).toBe(10);
    expect(time.currentYear).toBe(1800);
  });

  it('refuses a skip requested by a year listener without crediting anything', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const { state, resources, time } = createDefaultSession();
    const outcomes: boolean[] = [];
    time.addYearListener(() => {
      outcomes.push(state.canTimeSkipToYear(1810), state.timeSkipToYear(1810));
    });

    time.update(1);

    expect(outcomes).toEqual([false, false]);
    expect(time.currentYear).toBe(1801);
    expect(resources.getValue('money')).toBe(100);
    expect(resources.getValue('science')).toBe(10);
    expect(recording.records).toEqual([
      {
        level: 'warning',
        event: 'TimeSystemReentrantCall',
        data: { operation: 'timeSkipToYear', year: 1801 },
      },
    ]);
  });

  it('counts owned upgrades after each purchase', () => {
    const recording = createRecordingTelemetry();
    setTelemetry(recording);
    const { state } = createDefaultSession();

    state.purchaseUpgrade('plough');
    state.purchaseUpgrade('coal');

    expect(recording.counters.get('upgrades')).toEqual({ owned: 2, total: 8 });
  });

  it('restores ownership and selections, then resets to a fresh session', () => {
    const { state, resources, time } = createDefaultSession();

    state.restore(['plough', 'irrigation', 'water'], [['energy', 'water']]);

    expect(resources.get('money')?.getProductionPerSecond()).toBe(30);
    expect(state.selectedExclusive).toEqual({ energy: 'water' });
    expect(state.getUpgradeStatus('coal')).toBe('exclusive_blocked');

    resources.spend('money', 40);
    time.restore(1830);
    state.reset();

    expect(state.ownedUpgrades).toEqual([]);
    expect(state.selectedExclusive).toEqual({});
    expect(resources.getValue('money')).toBe(100);
    expect(state.currentYear).toBe(1800);
  });
});
