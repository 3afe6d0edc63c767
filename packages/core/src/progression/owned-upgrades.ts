/**
 * Insertion-ordered set of owned upgrade ids.
 *
 * Effects are re-applied in purchase order, and `mult` effects compose by
 * floating-point product, so ownership keeps an explicit sequence alongside
 * the membership set instead of relying on set enumeration.
 */
export class OwnedUpgradeLedger implements Iterable<string> {
  private readonly order: string[] = [];
  private readonly members = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const upgradeId of initial) {
      this.add(upgradeId);
    }
  }

  get size(): number {
    return this.order.length;
  }

  has(upgradeId: string): boolean {
    return this.members.has(upgradeId);
  }

  /** Appends the id. Returns `false` when it was already owned. */
  add(upgradeId: string): boolean {
    if (this.members.has(upgradeId)) {
      return false;
    }
    this.members.add(upgradeId);
    this.order.push(upgradeId);
    return true;
  }

  /** Replaces the whole sequence, as on load. Duplicates keep their first position. */
  replace(upgradeIds: Iterable<string>): void {
    this.clear();
    for (const upgradeId of upgradeIds) {
      this.add(upgradeId);
    }
  }

  clear(): void {
    this.order.length = 0;
    this.members.clear();
  }

  toArray(): readonly string[] {
    return [...this.order];
  }

  [Symbol.iterator](): Iterator<string> {
    return this.order[Symbol.iterator]();
  }
}
