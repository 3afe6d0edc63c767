import {
  eventDefinitionSchema,
  type EventDefinition,
  type EventInput,
} from './modules/events.js';
import {
  resourceDefinitionSchema,
  type ResourceDefinition,
  type ResourceInput,
} from './modules/resources.js';
import {
  upgradeTreeDefinitionSchema,
  type UpgradeTreeDefinition,
  type UpgradeTreeInput,
} from './modules/upgrade-trees.js';
import {
  upgradeDefinitionSchema,
  type UpgradeDefinition,
  type UpgradeInput,
} from './modules/upgrades.js';

// ============================================================================
// Factory Functions
// ============================================================================
// Each factory validates and normalizes plain catalog input into the
// corresponding definition. Cross references are not checked here; use
// parseContentPack for a whole catalog.

/**
 * Creates a normalized resource definition from plain input.
 *
 * @example
 * ```typescript
 * const money = createResource({
 *   id: 'money',
 *   name: 'Money',
 *   base_production: 10,
 * });
 * ```
 */
export function createResource(input: ResourceInput): ResourceDefinition {
  return resourceDefinitionSchema.parse(input);
}

/**
 * Creates a normalized upgrade tree definition from plain input.
 */
export function createUpgradeTree(input: UpgradeTreeInput): UpgradeTreeDefinition {
  return upgradeTreeDefinitionSchema.parse(input);
}

/**
 * Creates a normalized upgrade definition from plain input.
 *
 * @example
 * ```typescript
 * const printingPress = createUpgrade({
 *   id: 'printing_press',
 *   tree: 'culture',
 *   name: 'Printing Press',
 *   year: 1810,
 *   cost: [{ resource: 'money', amount: 50 }],
 *   effects: [{ resource: 'knowledge', effect: 'mult', value: 1.5 }],
 *   requires: ['literacy', ['paper_mill', 'imported_paper']],
 * });
 * ```
 */
export function createUpgrade(input: UpgradeInput): UpgradeDefinition {
  return upgradeDefinitionSchema.parse(input);
}

/**
 * Creates a normalized threshold event definition from plain input.
 */
export function createEvent(input: EventInput): EventDefinition {
  return eventDefinitionSchema.parse(input);
}
