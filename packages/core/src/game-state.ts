import type { NormalizedUpgrade } from '@epochs/content-schema';

import {
  COMMAND_SUCCESS,
  commandFailure,
  type CommandResult,
} from './command-result.js';
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { ExclusiveGroupSelections } from './progression/exclusive-selections.js';
import { OwnedUpgradeLedger } from './progression/owned-upgrades.js';
import {
  areRequirementsSatisfied,
  listBlockingRequirements,
} from './progression/requirements.js';
import type { ResourceManager } from './progression/resource-manager.js';
import type { UpgradeCatalog } from './progression/upgrade-catalog.js';
import { telemetry } from './telemetry.js';
import type { TimeSystem } from './time-system.js';

export type LockedYearStatus = `locked_year_${number}`;

export type UpgradeStatus =
  | 'owned'
  | 'unknown'
  | LockedYearStatus
  | 'exclusive_blocked'
  | 'requirements_not_met'
  | 'cannot_afford'
  | 'available';

export const UPGRADE_ERROR_CODES = Object.freeze({
  unknown: 'UPGRADE_UNKNOWN',
  owned: 'UPGRADE_OWNED',
  lockedYear: 'UPGRADE_LOCKED_YEAR',
  exclusiveBlocked: 'UPGRADE_EXCLUSIVE_BLOCKED',
  requirementsNotMet: 'UPGRADE_REQUIREMENTS_NOT_MET',
  unaffordable: 'UPGRADE_UNAFFORDABLE',
} as const);

export type UpgradeErrorCode =
  (typeof UPGRADE_ERROR_CODES)[keyof typeof UPGRADE_ERROR_CODES];

export interface TreeStatistics {
  readonly total: number;
  readonly owned: number;
  readonly percentage: number;
}

export interface GameStatistics {
  readonly currentYear: number;
  readonly totalUpgrades: number;
  readonly ownedUpgrades: number;
  readonly availableUpgrades: number;
  readonly completionPercentage: number;
  readonly treeStatistics: Readonly<Record<string, TreeStatistics>>;
  readonly nextUnlockYear: number | null;
  readonly yearsUntilNextUnlock: number | null;
}

export interface ExclusiveGroupOption {
  readonly id: string;
  readonly name: string;
  readonly owned: boolean;
}

export interface ExclusiveGroupInfo {
  readonly groupName: string;
  readonly totalOptions: number;
  /** Display name of the selected upgrade. */
  readonly selected: string | null;
  readonly selectedId: string | null;
  readonly options: readonly ExclusiveGroupOption[];
}

export interface GameStateOptions {
  readonly resources: ResourceManager;
  readonly catalog: UpgradeCatalog;
  readonly time: TimeSystem;
  readonly config?: EngineConfig;
  readonly onUpgradePurchased?: (upgrade: NormalizedUpgrade) => void;
}

/**
 * Ownership and exclusive-group state for a session, plus every
 * availability and purchase decision derived from it.
 *
 * Queries never mutate. The only commands are {@link purchaseUpgrade},
 * {@link timeSkipToYear}, {@link update}, {@link restore} and {@link reset}.
 */
export class GameState {
  readonly resources: ResourceManager;
  readonly catalog: UpgradeCatalog;
  readonly time: TimeSystem;

  private readonly config: EngineConfig;
  private readonly owned = new OwnedUpgradeLedger();
  private readonly exclusive = new ExclusiveGroupSelections();
  private readonly onUpgradePurchased?: (upgrade: NormalizedUpgrade) => void;

  constructor(options: GameStateOptions) {
    this.resources = options.resources;
    this.catalog = options.catalog;
    this.time = options.time;
    this.config = options.config ?? DEFAULT_ENGINE_CONFIG;
    this.onUpgradePurchased = options.onUpgradePurchased;
  }

  get currentYear(): number {
    return this.time.currentYear;
  }

  /** Owned upgrade ids in purchase order. */
  get ownedUpgrades(): readonly string[] {
    return this.owned.toArray();
  }

  /** Group name to the upgrade that claimed it. */
  get selectedExclusive(): Readonly<Record<string, string>> {
    return this.exclusive.toRecord();
  }

  isOwned(upgradeId: string): boolean {
    return this.owned.has(upgradeId);
  }

  /** Prerequisites (AND of direct or OR entries) and the year gate. */
  checkRequirementsMet(upgrade: NormalizedUpgrade): boolean {
    return (
      areRequirementsSatisfied(upgrade.requires, this.owned) &&
      upgrade.year <= this.currentYear
    );
  }

  checkExclusiveGroupAvailable(upgrade: NormalizedUpgrade): boolean {
    return upgrade.exclusiveGroups.every((group) =>
      this.exclusive.isOpenTo(group, upgrade.id),
    );
  }

  /** Affordability is deliberately not part of availability. */
  isUpgradeAvailable(upgradeId: string): boolean {
    if (this.owned.has(upgradeId)) {
      return false;
    }
    const upgrade = this.catalog.get(upgradeId);
    if (!upgrade) {
      return false;
    }
    return this.checkRequirementsMet(upgrade) && this.checkExclusiveGroupAvailable(upgrade);
  }

  /** Catalog order. Scans every upgrade; cache the result when polling per frame. */
  getAvailableUpgradeIds(): readonly string[] {
    const available: string[] = [];
    for (const upgrade of this.catalog.values()) {
      if (this.isUpgradeAvailable(upgrade.id)) {
        available.push(upgrade.id);
      }
    }
    return available;
  }

  canAffordUpgrade(upgradeId: string): boolean {
    const upgrade = this.catalog.get(upgradeId);
    return upgrade !== undefined && this.resources.canAfford(upgrade.costs);
  }

  getUpgradeStatus(upgradeId: string): UpgradeStatus {
    if (this.owned.has(upgradeId)) {
      return 'owned';
    }
    const upgrade = this.catalog.get(upgradeId);
    if (!upgrade) {
      return 'unknown';
    }
    if (upgrade.year > this.currentYear) {
      return `locked_year_${upgrade.year}`;
    }
    if (!this.checkExclusiveGroupAvailable(upgrade)) {
      return 'exclusive_blocked';
    }
    if (!this.checkRequirementsMet(upgrade)) {
      return 'requirements_not_met';
    }
    if (!this.resources.canAfford(upgrade.costs)) {
      return 'cannot_afford';
    }
    return 'available';
  }

  getBlockingRequirements(upgradeId: string): readonly string[] {
    const upgrade = this.catalog.get(upgradeId);
    return upgrade ? listBlockingRequirements(upgrade.requires, this.owned) : [];
  }

  /**
   * Buys an upgrade. Nothing changes unless every check passes and every
   * cost is paid; on success ownership, exclusive selections and
   * production modifiers are all updated.
   */
  purchaseUpgrade(upgradeId: string): boolean {
    return this.tryPurchaseUpgrade(upgradeId).success;
  }

  /** {@link purchaseUpgrade} with the reason for a rejection. */
  tryPurchaseUpgrade(upgradeId: string): CommandResult {
    const upgrade = this.catalog.get(upgradeId);
    const status = this.getUpgradeStatus(upgradeId);
    if (!upgrade || status !== 'available') {
      return describeRejection(upgradeId, status);
    }

    if (!this.resources.payCosts(upgrade.costs)) {
      return describeRejection(upgradeId, 'cannot_afford');
    }

    this.owned.add(upgrade.id);
    for (const group of upgrade.exclusiveGroups) {
      this.exclusive.select(group, upgrade.id);
    }
    this.recalculateProduction();

    telemetry.recordProgress('UpgradePurchased', {
      upgradeId: upgrade.id,
      year: this.currentYear,
    });
    telemetry.recordCounters('upgrades', {
      owned: this.owned.size,
      total: this.catalog.size,
    });
    this.onUpgradePurchased?.(upgrade);
    return COMMAND_SUCCESS;
  }

  recalculateProduction(): void {
    this.resources.recalculateProduction(this.owned, this.catalog.upgrades);
  }

  /** Integrates production over `dt * timeScale` seconds. */
  update(dt: number, timeScale = 1): void {
    this.resources.update(dt * timeScale);
  }

  /** Re-evaluates dynamic resource unlocks against the current year and ownership. */
  checkResourceUnlocks(options: { readonly notify?: boolean } = {}): boolean {
    return this.resources.checkAndUnlockResources(this.currentYear, this.owned, options);
  }

  getUpgradesByYear(year: number): readonly NormalizedUpgrade[] {
    return [...this.catalog.values()].filter((upgrade) => upgrade.year === year);
  }

  /** Earliest future year in which an unowned upgrade becomes purchasable. */
  getNextYearWithUpgrades(): number | null {
    let next: number | null = null;
    for (const upgrade of this.catalog.values()) {
      if (upgrade.year <= this.currentYear || this.owned.has(upgrade.id)) {
        continue;
      }
      if (next === null || upgrade.year < next) {
        next = upgrade.year;
      }
    }
    return next;
  }

  /** Unowned future upgrades keyed by year, ascending. */
  getUpgradesLockedByYear(): ReadonlyMap<number, readonly NormalizedUpgrade[]> {
    const byYear = new Map<number, NormalizedUpgrade[]>();
    for (const upgrade of this.catalog.values()) {
      if (upgrade.year <= this.currentYear || this.owned.has(upgrade.id)) {
        continue;
      }
      const bucket = byYear.get(upgrade.year);
      if (bucket) {
        bucket.push(upgrade);
      } else {
        byYear.set(upgrade.year, [upgrade]);
      }
    }
    return new Map([...byYear.entries()].sort(([left], [right]) => left - right));
  }

  getStatistics(): GameStatistics {
    const totalUpgrades = this.catalog.size;
    const ownedUpgrades = this.owned.size;

    const treeStatistics: Record<string, TreeStatistics> = {};
    for (const [treeId, tree] of this.catalog.trees) {
      const total = tree.upgrades.size;
      let owned = 0;
      for (const upgradeId of tree.upgrades.keys()) {
        if (this.owned.has(upgradeId)) {
          owned += 1;
        }
      }
      treeStatistics[treeId] = {
        total,
        owned,
        percentage: percentage(owned, total),
      };
    }

    const nextUnlockYear = this.getNextYearWithUpgrades();
    return {
      currentYear: this.currentYear,
      totalUpgrades,
      ownedUpgrades,
      availableUpgrades: this.getAvailableUpgradeIds().length,
      completionPercentage: percentage(ownedUpgrades, totalUpgrades),
      treeStatistics,
      nextUnlockYear,
      yearsUntilNextUnlock: nextUnlockYear === null ? null : nextUnlockYear - this.currentYear,
    };
  }

  getExclusiveGroupInfo(groupName: string): ExclusiveGroupInfo {
    const members = this.catalog.getGroupMembers(groupName);
    const selectedId = this.exclusive.get(groupName) ?? null;
    const selected = selectedId === null ? undefined : this.catalog.get(selectedId);

    return {
      groupName,
      totalOptions: members.length,
      selected: selected?.name ?? null,
      selectedId,
      options: members.map((upgrade) => ({
        id: upgrade.id,
        name: upgrade.name,
        owned: this.owned.has(upgrade.id),
      })),
    };
  }

  /**
   * A skip is allowed only forward, and only when no resource would end up
   * below its floor after `years * secondsPerYear` seconds at today's rates.
   */
  canTimeSkipToYear(targetYear: number): boolean {
    if (
      this.time.isNotifying ||
      !Number.isInteger(targetYear) ||
      targetYear <= this.currentYear
    ) {
      return false;
    }
    const seconds = this.skipSeconds(targetYear);
    return this.resources.list().every(
      (state) =>
        state.currentValue + state.getProductionPerSecond() * seconds >=
        state.definition.minValue,
    );
  }

  /**
   * Credits the projected production, then steps the clock to `targetYear`,
   * notifying year listeners once per skipped year in ascending order.
   */
  timeSkipToYear(targetYear: number): boolean {
    if (this.time.isNotifying) {
      telemetry.recordWarning('TimeSystemReentrantCall', {
        operation: 'timeSkipToYear',
        year: this.currentYear,
      });
      return false;
    }
    if (!this.canTimeSkipToYear(targetYear)) {
      return false;
    }
    const seconds = this.skipSeconds(targetYear);
    for (const state of this.resources.list()) {
      state.advanceBy(state.getProductionPerSecond() * seconds);
    }
    return this.time.skipToYear(targetYear);
  }

  /**
   * Replaces ownership and exclusive selections wholesale and recomputes
   * production. Used when loading a save.
   */
  restore(ownedUpgradeIds: Iterable<string>, selections: Iterable<readonly [string, string]>): void {
    this.owned.replace(ownedUpgradeIds);
    this.exclusive.restore(selections);
    this.recalculateProduction();
  }

  /** Back to a fresh session: nothing owned, starting amounts, clock at the start year. */
  reset(): void {
    this.owned.clear();
    this.exclusive.clear();
    this.resources.resetToStart();
    this.time.reset();
  }

  private skipSeconds(targetYear: number): number {
    return (targetYear - this.currentYear) * this.config.timeSkip.secondsPerYear;
  }
}

function percentage(part: number, total: number): number {
  return total > 0 ? (part / total) * 100 : 0;
}

function describeRejection(upgradeId: string, status: UpgradeStatus): CommandResult {
  switch (status) {
    case 'unknown':
      return commandFailure(
        UPGRADE_ERROR_CODES.unknown,
        `Upgrade "${upgradeId}" does not exist.`,
        { upgradeId },
      );
    case 'owned':
      return commandFailure(
        UPGRADE_ERROR_CODES.owned,
        `Upgrade "${upgradeId}" is already owned.`,
        { upgradeId },
      );
    case 'exclusive_blocked':
      return commandFailure(
        UPGRADE_ERROR_CODES.exclusiveBlocked,
        `Upgrade "${upgradeId}" is blocked by another choice in its exclusive group.`,
        { upgradeId },
      );
    case 'requirements_not_met':
      return commandFailure(
        UPGRADE_ERROR_CODES.requirementsNotMet,
        `Upgrade "${upgradeId}" is missing prerequisites.`,
        { upgradeId },
      );
    case 'cannot_afford':
    case 'available':
      return commandFailure(
        UPGRADE_ERROR_CODES.unaffordable,
        `Upgrade "${upgradeId}" costs more than is available.`,
        { upgradeId },
      );
    default:
      return commandFailure(
        UPGRADE_ERROR_CODES.lockedYear,
        `Upgrade "${upgradeId}" cannot be purchased before ${status.slice('locked_year_'.length)}.`,
        { upgradeId },
      );
  }
}
