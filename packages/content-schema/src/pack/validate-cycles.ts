import { z } from 'zod';

import { listRequirementIds } from '../modules/upgrades.js';
import type { ParsedContentPack } from './schema.js';

type AdjacencyGraph = Map<string, Set<string>>;
type CyclePath = string[];

/**
 * Normalizes a cycle path to its canonical form for deduplication.
 * The canonical form starts with the lexicographically smallest element.
 * For example: [B, C, A, B] becomes [A, B, C, A]
 */
const normalizeCyclePath = (cyclePath: CyclePath): string => {
  if (cyclePath.length <= 1) {
    return cyclePath.join('→');
  }

  const cycle = cyclePath.slice(0, -1);

  let minIndex = 0;
  for (let i = 1; i < cycle.length; i += 1) {
    const candidate = cycle[i];
    const current = cycle[minIndex];
    if (candidate !== undefined && current !== undefined && candidate < current) {
      minIndex = i;
    }
  }

  const normalized = [...cycle.slice(minIndex), ...cycle.slice(0, minIndex)];
  const first = normalized[0];
  if (first !== undefined) {
    normalized.push(first);
  }

  return normalized.join('→');
};

/**
 * Depth-first cycle detection with path tracking. Returns every distinct
 * cycle reachable from `nodes`, each closed on its starting node.
 */
export const detectCycles = (
  adjacency: AdjacencyGraph,
  nodes: Iterable<string>,
): CyclePath[] => {
  const visited = new Set<string>();
  const stack = new Set<string>();
  const path: CyclePath = [];
  const cycles: CyclePath[] = [];
  const seenCycles = new Set<string>();

  const visit = (node: string): void => {
    if (stack.has(node)) {
      const cycleStartIndex = path.indexOf(node);
      const cyclePath: CyclePath = [...path.slice(cycleStartIndex), node];
      const normalizedCycle = normalizeCyclePath(cyclePath);
      if (!seenCycles.has(normalizedCycle)) {
        seenCycles.add(normalizedCycle);
        cycles.push(cyclePath);
      }
      return;
    }

    if (visited.has(node)) {
      return;
    }

    visited.add(node);
    stack.add(node);
    path.push(node);

    const edges = adjacency.get(node);
    if (edges) {
      for (const target of edges) {
        visit(target);
      }
    }

    stack.delete(node);
    path.pop();
  };

  for (const nodeId of nodes) {
    if (!visited.has(nodeId)) {
      visit(nodeId);
    }
  }

  return cycles;
};

/**
 * Hard prerequisites must form a DAG: an upgrade that transitively requires
 * itself could never become available. Only entries without an alternative
 * (direct ids and single-id OR sets) are edges; a multi-id OR set can still
 * be satisfied through a branch outside the loop.
 */
export const validateRequirementCycles = (
  pack: ParsedContentPack,
  ctx: z.RefinementCtx,
): void => {
  const adjacency: AdjacencyGraph = new Map();
  const indexById = new Map<string, number>();

  pack.upgrades.forEach((upgrade, index) => {
    indexById.set(upgrade.id, index);
    const edges = new Set<string>();
    const hardRequirements = upgrade.requires.filter(
      (requirement) =>
        requirement.kind === 'direct' || requirement.upgradeIds.length === 1,
    );
    for (const upgradeId of listRequirementIds(hardRequirements)) {
      if (upgradeId !== upgrade.id) {
        edges.add(upgradeId);
      }
    }
    adjacency.set(upgrade.id, edges);
  });

  const cycles = detectCycles(
    adjacency,
    pack.upgrades.map((upgrade) => upgrade.id),
  );

  for (const cycle of cycles) {
    const start = cycle[0];
    const index = start === undefined ? undefined : indexById.get(start);
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: index === undefined ? ['upgrades'] : ['upgrades', index, 'requires'],
      message: `Upgrade prerequisites form a cycle: ${normalizeCyclePath(cycle)}.`,
    });
  }
};
