export {
  DEFAULT_ENGINE_CONFIG,
  resolveEngineConfig,
  type EngineConfig,
  type EngineConfigOverrides,
} from './config.js';

export {
  createConsoleTelemetry,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
  type RecordingTelemetry,
  type TelemetryEventData,
  type TelemetryFacade,
  type TelemetryLevel,
  type TelemetryRecord,
} from './telemetry.js';

export {
  COMMAND_SUCCESS,
  commandFailure,
  type CommandError,
  type CommandResult,
  type CommandResultFailure,
  type CommandResultSuccess,
} from './command-result.js';

export { ResourceState, type ResourceStateOptions } from './resource-state.js';
export {
  ResourceManager,
  type OwnershipLookup,
  type ResourceManagerOptions,
} from './progression/resource-manager.js';
export { OwnedUpgradeLedger } from './progression/owned-upgrades.js';
export { ExclusiveGroupSelections } from './progression/exclusive-selections.js';
export {
  areRequirementsSatisfied,
  isRequirementSatisfied,
  listBlockingRequirements,
} from './progression/requirements.js';
export { UpgradeCatalog, type UpgradeTree } from './progression/upgrade-catalog.js';

export { TimeSystem, type TimeSystemOptions, type YearListener } from './time-system.js';

export {
  GameState,
  UPGRADE_ERROR_CODES,
  type ExclusiveGroupInfo,
  type ExclusiveGroupOption,
  type GameStateOptions,
  type GameStatistics,
  type LockedYearStatus,
  type TreeStatistics,
  type UpgradeErrorCode,
  type UpgradeStatus,
} from './game-state.js';

export {
  EventSystem,
  type EventSystemOptions,
  type EventSystemState,
  type ResolvedEventChoice,
} from './event-system.js';

export {
  EventBus,
  type EventHandler,
  type EventPublisher,
  type EventSubscription,
  type EventSubscriptionOptions,
} from './events/event-bus.js';
export {
  RUNTIME_EVENT_TYPES,
  createRuntimeEvent,
  type RuntimeEvent,
  type RuntimeEventPayload,
  type RuntimeEventPayloadMap,
  type RuntimeEventType,
} from './events/runtime-event.js';

export {
  DEFAULT_GAME_STATE_SAVE_MIGRATIONS,
  GAME_STATE_SAVE_SCHEMA_VERSION,
  SaveFormatError,
  decodeGameStateSave,
  encodeGameStateSave,
  hydrateGameState,
  parseGameStateSave,
  serializeGameState,
  type GameStateSaveFormat,
  type GameStateSaveFormatV1,
  type GameStateSaveTarget,
  type SchemaMigration,
  type SerializeGameStateOptions,
  type SerializedEventState,
} from './game-state-save.js';

export {
  describeEffect,
  formatProductionRate,
  formatResourceValue,
  getBonusPercent,
} from './progression-format.js';

export {
  buildGameSnapshot,
  type ActiveEventView,
  type EventChoiceView,
  type GameSnapshot,
  type ResourceView,
  type UpgradeCostView,
  type UpgradeView,
} from './progression.js';

export {
  createGame,
  type CreateGameOptions,
  type Game,
  type GameWiring,
  type SerializedGameState,
  type Unsubscribe,
} from './game.js';
