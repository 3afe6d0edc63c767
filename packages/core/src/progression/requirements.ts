import type { Requirement } from '@epochs/content-schema';

import type { OwnershipLookup } from './resource-manager.js';

export function isRequirementSatisfied(
  requirement: Requirement,
  owned: OwnershipLookup,
): boolean {
  switch (requirement.kind) {
    case 'direct':
      return owned.has(requirement.upgradeId);
    case 'anyOf':
      return requirement.upgradeIds.some((upgradeId) => owned.has(upgradeId));
  }
}

/** Top-level entries combine with AND. */
export function areRequirementsSatisfied(
  requires: readonly Requirement[],
  owned: OwnershipLookup,
): boolean {
  return requires.every((requirement) => isRequirementSatisfied(requirement, owned));
}

/**
 * Ids still missing, in declaration order. An unsatisfied OR entry
 * contributes every unowned alternative; a satisfied one contributes none.
 */
export function listBlockingRequirements(
  requires: readonly Requirement[],
  owned: OwnershipLookup,
): readonly string[] {
  const blocking: string[] = [];
  for (const requirement of requires) {
    if (isRequirementSatisfied(requirement, owned)) {
      continue;
    }
    if (requirement.kind === 'direct') {
      blocking.push(requirement.upgradeId);
    } else {
      blocking.push(...requirement.upgradeIds.filter((upgradeId) => !owned.has(upgradeId)));
    }
  }
  return blocking;
}
