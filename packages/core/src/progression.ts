import type { EventSystem } from './event-system.js';
import type { GameState, UpgradeStatus } from './game-state.js';

export type ResourceView = Readonly<{
  id: string;
  displayName: string;
  amount: number;
  /** Production per second after modifiers. */
  rate: number;
  minValue: number;
  isUnlocked: boolean;
}>;

export type UpgradeCostView = Readonly<{
  resourceId: string;
  amount: number;
}>;

export type UpgradeView = Readonly<{
  id: string;
  treeId: string;
  displayName: string;
  tier: number;
  year: number;
  status: UpgradeStatus;
  costs: readonly UpgradeCostView[];
}>;

export type EventChoiceView = Readonly<{
  id: string;
  text: string;
  description: string;
  isAvailable: boolean;
}>;

export type ActiveEventView = Readonly<{
  id: string;
  title: string;
  description: string;
  icon: string;
  choices: readonly EventChoiceView[];
}>;

export type GameSnapshot = Readonly<{
  year: number;
  progressPercent: number;
  speed: number;
  isPaused: boolean;
  timeScale: number;
  resources: readonly ResourceView[];
  upgrades: readonly UpgradeView[];
  activeEvent: ActiveEventView | null;
}>;

/**
 * Plain, frozen view of a session for rendering. Nothing in it refers back
 * to live engine objects.
 */
export function buildGameSnapshot(state: GameState, events?: EventSystem): GameSnapshot {
  const resources = state.resources.list().map(
    (resource): ResourceView =>
      Object.freeze({
        id: resource.id,
        displayName: resource.definition.name,
        amount: resource.currentValue,
        rate: resource.getProductionPerSecond(),
        minValue: resource.definition.minValue,
        isUnlocked: resource.isUnlocked,
      }),
  );

  const upgrades = [...state.catalog.values()].map(
    (upgrade): UpgradeView =>
      Object.freeze({
        id: upgrade.id,
        treeId: upgrade.treeId,
        displayName: upgrade.name,
        tier: upgrade.tier,
        year: upgrade.year,
        status: state.getUpgradeStatus(upgrade.id),
        costs: Object.freeze(
          upgrade.costs.map((cost) =>
            Object.freeze({ resourceId: cost.resourceId, amount: cost.amount }),
          ),
        ),
      }),
  );

  return Object.freeze({
    year: state.currentYear,
    progressPercent: state.time.getProgressPercent(),
    speed: state.time.getSpeed(),
    isPaused: state.time.isPaused(),
    timeScale: state.time.getEffectiveTimeScale(),
    resources: Object.freeze(resources),
    upgrades: Object.freeze(upgrades),
    activeEvent: events ? createActiveEventView(events) : null,
  });
}

function createActiveEventView(events: EventSystem): ActiveEventView | null {
  const event = events.activeEvent;
  if (!event) {
    return null;
  }
  return Object.freeze({
    id: event.id,
    title: event.title,
    description: event.description,
    icon: event.icon,
    choices: Object.freeze(
      event.choices.map((choice) =>
        Object.freeze({
          id: choice.id,
          text: choice.text,
          description: choice.description,
          isAvailable: events.canMakeChoice(choice.id),
        }),
      ),
    ),
  });
}
