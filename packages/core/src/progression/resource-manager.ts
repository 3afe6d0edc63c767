import {
  isDynamicResource,
  type NormalizedResource,
  type NormalizedUpgrade,
  type ResourceCost,
  type ResourceEffect,
} from '@epochs/content-schema';

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from '../config.js';
import { ResourceState } from '../resource-state.js';
import { telemetry } from '../telemetry.js';

/**
 * Membership view over owned upgrades. Both `Set<string>` and the
 * {@link OwnedUpgradeLedger} satisfy it.
 */
export interface OwnershipLookup {
  has(upgradeId: string): boolean;
}

export interface ResourceManagerOptions {
  readonly resources: readonly NormalizedResource[];
  readonly config?: EngineConfig;
  readonly onResourceUnlocked?: (resource: ResourceState) => void;
}

/**
 * ResourceManager owns every {@link ResourceState} for a session.
 *
 * Responsibilities:
 * - Build initial states from definitions (starting amounts, lock flags)
 * - Spend and pay costs with all-or-nothing semantics
 * - Derive production modifiers from owned upgrades
 * - Integrate production over time and resolve dynamic unlocks
 *
 * Resources are iterated in catalog order everywhere.
 */
export class ResourceManager {
  private readonly states: ReadonlyMap<string, ResourceState>;
  private readonly ordered: readonly ResourceState[];
  private readonly startAmountMultiplier: number;
  private readonly onResourceUnlocked?: (resource: ResourceState) => void;
  private readonly persistentEffects: ResourceEffect[] = [];

  constructor(options: ResourceManagerOptions) {
    const config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.startAmountMultiplier = config.resources.startAmountMultiplier;
    this.onResourceUnlocked = options.onResourceUnlocked;

    const ordered = options.resources.map(
      (definition) =>
        new ResourceState(definition, {
          initialValue: this.getStartingAmount(definition),
          unlocked: !isDynamicResource(definition),
        }),
    );
    this.ordered = Object.freeze(ordered);
    this.states = new Map(ordered.map((state) => [state.id, state]));
  }

  get(resourceId: string): ResourceState | undefined {
    return this.states.get(resourceId);
  }

  has(resourceId: string): boolean {
    return this.states.has(resourceId);
  }

  getValue(resourceId: string): number {
    return this.states.get(resourceId)?.currentValue ?? 0;
  }

  list(): readonly ResourceState[] {
    return this.ordered;
  }

  getStartingAmount(definition: NormalizedResource): number {
    return definition.startAmount ?? definition.baseProduction * this.startAmountMultiplier;
  }

  spend(resourceId: string, amount: number): boolean {
    return this.states.get(resourceId)?.spend(amount) ?? false;
  }

  /**
   * Pure affordability query. Amounts listed more than once for the same
   * resource are summed, so the answer matches what {@link payCosts} can
   * actually deduct.
   */
  canAfford(costs: readonly ResourceCost[]): boolean {
    const totals = new Map<string, number>();
    for (const cost of costs) {
      if (!Number.isFinite(cost.amount) || cost.amount < 0) {
        return false;
      }
      totals.set(cost.resourceId, (totals.get(cost.resourceId) ?? 0) + cost.amount);
    }

    for (const [resourceId, amount] of totals) {
      const state = this.states.get(resourceId);
      if (!state || state.currentValue < amount) {
        return false;
      }
    }
    return true;
  }

  /** All-or-nothing: nothing is deducted unless every cost is covered. */
  payCosts(costs: readonly ResourceCost[]): boolean {
    if (!this.canAfford(costs)) {
      return false;
    }
    for (const cost of costs) {
      this.spend(cost.resourceId, cost.amount);
    }
    return true;
  }

  /**
   * Applies a transient modifier. It lasts until the next
   * {@link recalculateProduction}; use {@link applyPersistentEffect} for
   * modifiers that must survive recalculation.
   */
  applyEffect(effect: ResourceEffect): void {
    this.states.get(effect.resourceId)?.applyEffect(effect);
  }

  /**
   * Records a modifier that is re-applied after upgrade effects on every
   * recalculation (event choice outcomes).
   */
  applyPersistentEffect(effect: ResourceEffect): void {
    this.persistentEffects.push(effect);
    this.applyEffect(effect);
  }

  getPersistentEffects(): readonly ResourceEffect[] {
    return this.persistentEffects;
  }

  /**
   * Replaces the persistent ledger without touching current modifiers; the
   * caller recalculates afterwards (save loading).
   */
  replacePersistentEffects(effects: Iterable<ResourceEffect>): void {
    this.persistentEffects.length = 0;
    this.persistentEffects.push(...effects);
  }

  /**
   * Resets every modifier and re-applies effects from scratch: upgrade
   * effects in the iteration order of `ownedUpgradeIds`, then persistent
   * effects in the order they were recorded. Callers pass an ordered
   * sequence so `mult` products are reproducible.
   */
  recalculateProduction(
    ownedUpgradeIds: Iterable<string>,
    allUpgrades: ReadonlyMap<string, NormalizedUpgrade>,
  ): void {
    for (const state of this.ordered) {
      state.resetModifiers();
    }

    for (const upgradeId of ownedUpgradeIds) {
      const upgrade = allUpgrades.get(upgradeId);
      if (!upgrade) {
        continue;
      }
      for (const effect of upgrade.effects) {
        this.applyEffect(effect);
      }
    }

    for (const effect of this.persistentEffects) {
      this.applyEffect(effect);
    }
  }

  /**
   * Advances every resource by `dt` seconds. Rates are read before any
   * value changes, so the whole step integrates at the pre-update rates.
   */
  update(dt: number): void {
    if (!Number.isFinite(dt) || dt <= 0) {
      return;
    }
    const deltas = this.ordered.map((state) => state.getProductionPerSecond() * dt);
    this.ordered.forEach((state, index) => {
      state.advanceBy(deltas[index] ?? 0);
    });
  }

  /**
   * Unlocks every locked dynamic resource whose year has arrived and whose
   * required upgrades are all owned. Returns `true` when at least one
   * resource changed state during this call. With `notify: false` the
   * unlock is applied without telemetry or the unlock callback (save loading).
   */
  checkAndUnlockResources(
    currentYear: number,
    owned: OwnershipLookup,
    options: { readonly notify?: boolean } = {},
  ): boolean {
    const notify = options.notify ?? true;
    let anyUnlocked = false;

    for (const state of this.ordered) {
      if (state.isUnlocked) {
        continue;
      }

      const { definition } = state;
      if (definition.unlockYear > currentYear) {
        continue;
      }
      if (!definition.requires.every((upgradeId) => owned.has(upgradeId))) {
        continue;
      }

      if (state.unlock()) {
        anyUnlocked = true;
        if (!notify) {
          continue;
        }
        telemetry.recordProgress('ResourceUnlocked', {
          resourceId: state.id,
          year: currentYear,
        });
        this.onResourceUnlocked?.(state);
      }
    }

    return anyUnlocked;
  }

  getUnlockedResources(): readonly ResourceState[] {
    return this.ordered.filter((state) => state.isUnlocked);
  }

  getLockedResources(): readonly ResourceState[] {
    return this.ordered.filter((state) => !state.isUnlocked);
  }

  /**
   * Returns every resource to its session-start shape: starting amount, no
   * modifiers, no persistent effects, dynamic resources locked again.
   */
  resetToStart(): void {
    this.persistentEffects.length = 0;
    for (const state of this.ordered) {
      state.resetModifiers();
      state.setValue(this.getStartingAmount(state.definition));
    }
    this.relockDynamicResources();
  }

  /** Locks every dynamic resource again so unlocks can be re-derived. */
  relockDynamicResources(): void {
    for (const state of this.ordered) {
      if (isDynamicResource(state.definition)) {
        state.relock();
      }
    }
  }
}
