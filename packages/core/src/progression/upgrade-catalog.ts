import type {
  NormalizedUpgrade,
  NormalizedUpgradeTree,
} from '@epochs/content-schema';

export interface UpgradeTree {
  readonly definition: NormalizedUpgradeTree;
  /** Upgrades belonging to this tree, keyed by id, in catalog order. */
  readonly upgrades: ReadonlyMap<string, NormalizedUpgrade>;
}

/**
 * Read-only index over the upgrade catalog: lookup by id, by tree and by
 * exclusive group. Built once per session; definitions never change.
 */
export class UpgradeCatalog {
  readonly upgrades: ReadonlyMap<string, NormalizedUpgrade>;
  readonly trees: ReadonlyMap<string, UpgradeTree>;

  private readonly groups: ReadonlyMap<string, readonly NormalizedUpgrade[]>;

  constructor(options: {
    readonly upgrades: readonly NormalizedUpgrade[];
    readonly trees?: readonly NormalizedUpgradeTree[];
  }) {
    this.upgrades = new Map(options.upgrades.map((upgrade) => [upgrade.id, upgrade]));

    const trees = new Map<string, UpgradeTree>();
    for (const definition of options.trees ?? []) {
      trees.set(definition.id, {
        definition,
        upgrades: new Map(
          options.upgrades
            .filter((upgrade) => upgrade.treeId === definition.id)
            .map((upgrade) => [upgrade.id, upgrade]),
        ),
      });
    }
    this.trees = trees;

    const groups = new Map<string, NormalizedUpgrade[]>();
    for (const upgrade of options.upgrades) {
      for (const group of upgrade.exclusiveGroups) {
        const members = groups.get(group);
        if (members) {
          members.push(upgrade);
        } else {
          groups.set(group, [upgrade]);
        }
      }
    }
    this.groups = groups;
  }

  get size(): number {
    return this.upgrades.size;
  }

  get(upgradeId: string): NormalizedUpgrade | undefined {
    return this.upgrades.get(upgradeId);
  }

  has(upgradeId: string): boolean {
    return this.upgrades.has(upgradeId);
  }

  values(): IterableIterator<NormalizedUpgrade> {
    return this.upgrades.values();
  }

  getGroupMembers(group: string): readonly NormalizedUpgrade[] {
    return this.groups.get(group) ?? [];
  }

  listGroups(): readonly string[] {
    return [...this.groups.keys()];
  }
}
