/**
 * Records which upgrade claimed each exclusive group.
 *
 * Each group moves one way, from unset to set; the first purchase in a group
 * wins for the rest of the session. Only {@link restore} and {@link clear}
 * (load and reset) replace recorded choices.
 */
export class ExclusiveGroupSelections {
  private readonly selections = new Map<string, string>();

  get(group: string): string | undefined {
    return this.selections.get(group);
  }

  has(group: string): boolean {
    return this.selections.has(group);
  }

  /** A group is open to `upgradeId` when unset or already set to it. */
  isOpenTo(group: string, upgradeId: string): boolean {
    const selected = this.selections.get(group);
    return selected === undefined || selected === upgradeId;
  }

  /** Claims `group` for `upgradeId` unless the group is already set. */
  select(group: string, upgradeId: string): void {
    if (!this.selections.has(group)) {
      this.selections.set(group, upgradeId);
    }
  }

  restore(entries: Iterable<readonly [string, string]>): void {
    this.selections.clear();
    for (const [group, upgradeId] of entries) {
      this.selections.set(group, upgradeId);
    }
  }

  clear(): void {
    this.selections.clear();
  }

  entries(): readonly (readonly [string, string])[] {
    return [...this.selections.entries()];
  }

  toRecord(): Readonly<Record<string, string>> {
    return Object.fromEntries(this.selections);
  }
}
