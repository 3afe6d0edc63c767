import type { NormalizedContentPack } from '@epochs/content-schema';

import { commandFailure, type CommandResult } from './command-result.js';
import {
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './config.js';
import {
  EventBus,
  type EventHandler,
  type EventSubscriptionOptions,
} from './events/event-bus.js';
import type { RuntimeEventType } from './events/runtime-event.js';
import { EventSystem } from './event-system.js';
import {
  GameState,
  type GameStatistics,
  type UpgradeStatus,
} from './game-state.js';
import {
  decodeGameStateSave,
  hydrateGameState,
  serializeGameState,
  type GameStateSaveFormat,
  type SchemaMigration,
} from './game-state-save.js';
import { buildGameSnapshot, type GameSnapshot } from './progression.js';
import { ResourceManager } from './progression/resource-manager.js';
import { UpgradeCatalog } from './progression/upgrade-catalog.js';
import { TimeSystem } from './time-system.js';

export type SerializedGameState = GameStateSaveFormat;

export type Unsubscribe = () => void;

const DEFAULT_SCHEDULER_INTERVAL_MS = 100;

export type CreateGameOptions = Readonly<{
  readonly config?: EngineConfigOverrides;
  readonly saveMigrations?: readonly SchemaMigration[];
  readonly scheduler?: Readonly<{
    readonly intervalMs?: number; // default: 100
  }>;
}>;

export interface GameWiring {
  readonly config: EngineConfig;
  readonly bus: EventBus;
  readonly time: TimeSystem;
  readonly resources: ResourceManager;
  readonly catalog: UpgradeCatalog;
  readonly state: GameState;
  readonly events: EventSystem;
}

export interface Game {
  start(): void;
  stop(): void;
  /** Advances the session by `deltaMs` real milliseconds. */
  tick(deltaMs: number): void;
  /** Advances the session by `dt` real seconds. */
  update(dt: number): void;

  getSnapshot(): GameSnapshot;
  getStatistics(): GameStatistics;
  getUpgradeStatus(upgradeId: string): UpgradeStatus;
  isUpgradeAvailable(upgradeId: string): boolean;
  getAvailableUpgradeIds(): readonly string[];

  serialize(): SerializedGameState;
  hydrate(save: unknown): void;

  purchaseUpgrade(upgradeId: string): CommandResult;
  setSpeed(multiplier: number): number;
  togglePause(): boolean;
  timeSkipToYear(targetYear: number): CommandResult;
  makeEventChoice(choiceId: string): CommandResult;
  reset(): void;

  on<TType extends RuntimeEventType>(
    eventType: TType,
    handler: EventHandler<TType>,
    options?: EventSubscriptionOptions,
  ): Unsubscribe;

  readonly internals: GameWiring;
}

function toValidIntervalMs(
  intervalMs: unknown,
  fallback: number,
): number {
  if (typeof intervalMs !== 'number' || !Number.isFinite(intervalMs) || intervalMs <= 0) {
    return fallback;
  }
  return intervalMs;
}

/**
 * Wires the engine for one session.
 *
 * Each {@link Game.update} integrates resources at the rates in force when
 * the frame began, scaled by the effective time scale, then evaluates event
 * triggers, and only then advances the clock. Year listeners (resource
 * unlocks, `year:changed`) therefore observe the frame's production.
 */
export function createGame(
  content: NormalizedContentPack,
  options?: CreateGameOptions,
): Game {
  const config = resolveEngineConfig(options?.config);
  const bus = new EventBus();
  const time = new TimeSystem({ config });
  const catalog = new UpgradeCatalog({
    upgrades: content.upgrades,
    trees: content.trees,
  });
  const resources = new ResourceManager({
    resources: content.resources,
    config,
    onResourceUnlocked: (resource) => {
      bus.publish('resource:unlocked', {
        resourceId: resource.id,
        year: time.currentYear,
      });
    },
  });
  const state: GameState = new GameState({
    resources,
    catalog,
    time,
    config,
    onUpgradePurchased: (upgrade) => {
      bus.publish('upgrade:purchased', {
        upgradeId: upgrade.id,
        year: time.currentYear,
      });
      state.checkResourceUnlocks();
    },
  });
  const pauseWhileActive = config.events.pauseTimeWhileActive;
  const events = new EventSystem({
    events: content.events,
    resources,
    owned: { has: (upgradeId) => state.isOwned(upgradeId) },
    config,
    onEventTriggered: (event) => {
      if (pauseWhileActive) {
        time.setPaused(true);
      }
      bus.publish('event:triggered', { eventId: event.id, year: time.currentYear });
    },
    onEventResolved: (event, choice) => {
      if (pauseWhileActive) {
        time.setPaused(false);
      }
      bus.publish('event:resolved', {
        eventId: event.id,
        choiceId: choice.id,
        year: time.currentYear,
      });
    },
  });

  time.addYearListener((year) => {
    state.checkResourceUnlocks();
    bus.publish('year:changed', { year });
  });
  state.checkResourceUnlocks();

  const wiring: GameWiring = Object.freeze({
    config,
    bus,
    time,
    resources,
    catalog,
    state,
    events,
  });

  const update = (dt: number): void => {
    if (!Number.isFinite(dt) || dt <= 0) {
      return;
    }
    const scale = time.getEffectiveTimeScale();
    state.update(dt, scale);
    events.update(dt * scale);
    time.update(dt);
  };

  let intervalHandle: ReturnType<typeof setInterval> | null = null;

  const stop = (): void => {
    if (intervalHandle === null) {
      return;
    }
    clearInterval(intervalHandle);
    intervalHandle = null;
  };

  const tick = (deltaMs: number): void => {
    update(deltaMs / 1000);
  };

  const start = (): void => {
    if (intervalHandle !== null) {
      return;
    }

    const intervalMs = toValidIntervalMs(
      options?.scheduler?.intervalMs,
      DEFAULT_SCHEDULER_INTERVAL_MS,
    );

    intervalHandle = setInterval(() => {
      tick(intervalMs);
    }, intervalMs);
  };

  const hydrate = (save: unknown): void => {
    const loadedSave = decodeGameStateSave(
      save,
      options?.saveMigrations ? { migrations: options.saveMigrations } : {},
    );
    hydrateGameState(loadedSave, { state, events });
    if (pauseWhileActive) {
      time.setPaused(events.activeEvent !== null);
    }
  };

  const game: Game = {
    start,
    stop,
    tick,
    update,
    getSnapshot: () => buildGameSnapshot(state, events),
    getStatistics: () => state.getStatistics(),
    getUpgradeStatus: (upgradeId) => state.getUpgradeStatus(upgradeId),
    isUpgradeAvailable: (upgradeId) => state.isUpgradeAvailable(upgradeId),
    getAvailableUpgradeIds: () => state.getAvailableUpgradeIds(),
    serialize: () => serializeGameState({ state, events }),
    hydrate,
    purchaseUpgrade: (upgradeId) => state.tryPurchaseUpgrade(upgradeId),
    setSpeed: (multiplier) => time.setSpeed(multiplier),
    togglePause: () => time.togglePause(),
    timeSkipToYear: (targetYear) => {
      if (state.timeSkipToYear(targetYear)) {
        return { success: true };
      }
      return commandFailure(
        'TIME_SKIP_REJECTED',
        'Time can only skip forward, and only when no resource would fall below its minimum.',
        { targetYear, currentYear: time.currentYear },
      );
    },
    makeEventChoice: (choiceId) => {
      const active = events.activeEvent;
      if (!active) {
        return commandFailure('EVENT_NOT_ACTIVE', 'No event is waiting for a choice.', {
          choiceId,
        });
      }
      if (!events.makeChoice(choiceId)) {
        return commandFailure(
          'EVENT_CHOICE_UNAVAILABLE',
          'Choice cannot be made right now.',
          { eventId: active.id, choiceId },
        );
      }
      return { success: true };
    },
    reset: () => {
      events.reset();
      state.reset();
      state.checkResourceUnlocks();
    },
    on: (eventType, handler, subscriptionOptions) => {
      const subscription = bus.on(eventType, handler, subscriptionOptions);
      return () => subscription.unsubscribe();
    },
    internals: wiring,
  };

  return Object.freeze(game);
}
