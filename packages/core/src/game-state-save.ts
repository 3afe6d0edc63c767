import { DEFAULT_ENGINE_CONFIG } from './config.js';
import type { EventSystem, EventSystemState } from './event-system.js';
import type { GameState } from './game-state.js';
import { telemetry } from './telemetry.js';

export const GAME_STATE_SAVE_SCHEMA_VERSION = 1;

export type SerializedEventState = Readonly<{
  readonly triggered: readonly string[];
  readonly resolved: readonly Readonly<{ eventId: string; choiceId: string }>[];
  readonly active?: string | null;
}>;

/**
 * Persisted session. Only accumulated values and ownership are stored;
 * production rates are re-derived from the catalog on load.
 */
export type GameStateSaveFormatV1 = Readonly<{
  readonly version: 1;
  /** ISO-8601. */
  readonly timestamp: string;
  readonly resources: Readonly<Record<string, number>>;
  /** Purchase order. */
  readonly owned_upgrades: readonly string[];
  readonly selected_exclusive: Readonly<Record<string, string>>;
  readonly current_year: number;
  readonly year_progress?: number;
  readonly events?: SerializedEventState;
}>;

export type GameStateSaveFormat = GameStateSaveFormatV1;

export class SaveFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SaveFormatError';
  }
}

export interface SchemaMigration {
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly migrate: (data: unknown) => unknown;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readFiniteNumber(value: unknown): number | undefined {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return undefined;
  }
  return value;
}

function readNonNegativeInt(value: unknown): number | undefined {
  const numberValue = readFiniteNumber(value);
  if (numberValue === undefined || numberValue < 0) {
    return undefined;
  }
  return Math.floor(numberValue);
}

function getSaveVersion(value: unknown): number | undefined {
  if (!isRecord(value)) {
    return undefined;
  }

  return readNonNegativeInt(value.version);
}

/** Unversioned saves written before the `version` field existed. */
function hasLegacyV0Shape(value: unknown): value is Record<string, unknown> {
  if (!isRecord(value)) {
    return false;
  }

  return !('version' in value) && 'resources' in value && 'owned_upgrades' in value;
}

function migrateLegacyV0ToV1(value: unknown): unknown {
  if (!hasLegacyV0Shape(value)) {
    throw new SaveFormatError('Unsupported legacy game state save format.');
  }

  return {
    ...value,
    version: GAME_STATE_SAVE_SCHEMA_VERSION,
    timestamp:
      typeof value.timestamp === 'string' ? value.timestamp : new Date(0).toISOString(),
    selected_exclusive: isRecord(value.selected_exclusive) ? value.selected_exclusive : {},
    current_year:
      typeof value.current_year === 'number'
        ? value.current_year
        : DEFAULT_ENGINE_CONFIG.time.startYear,
  };
}

export const DEFAULT_GAME_STATE_SAVE_MIGRATIONS: readonly SchemaMigration[] =
  Object.freeze([
    {
      fromVersion: 0,
      toVersion: GAME_STATE_SAVE_SCHEMA_VERSION,
      migrate: migrateLegacyV0ToV1,
    },
  ]);

function findMigrationPath(
  migrations: readonly SchemaMigration[],
  fromVersion: number,
  toVersion: number,
): readonly SchemaMigration[] | undefined {
  if (fromVersion === toVersion) {
    return [];
  }

  const migrationsByFrom = new Map<number, SchemaMigration[]>();
  for (const migration of migrations) {
    const list = migrationsByFrom.get(migration.fromVersion);
    if (list) {
      list.push(migration);
    } else {
      migrationsByFrom.set(migration.fromVersion, [migration]);
    }
  }

  const queue: Array<{ version: number; path: SchemaMigration[] }> = [
    { version: fromVersion, path: [] },
  ];
  const visited = new Set<number>([fromVersion]);

  while (queue.length > 0) {
    const current = queue.shift();
    if (!current) {
      break;
    }

    const nextMigrations = migrationsByFrom.get(current.version) ?? [];
    for (const migration of nextMigrations) {
      if (visited.has(migration.toVersion)) {
        continue;
      }

      const path = [...current.path, migration];
      if (migration.toVersion === toVersion) {
        return path;
      }

      visited.add(migration.toVersion);
      queue.push({ version: migration.toVersion, path });
    }
  }

  return undefined;
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function readStringList(value: unknown, field: string): readonly string[] {
  if (!isStringList(value)) {
    throw new SaveFormatError(`Save data field "${field}" must be a list of strings.`);
  }
  return [...value];
}

function readNumberRecord(value: unknown, field: string): Record<string, number> {
  if (!isRecord(value)) {
    throw new SaveFormatError(`Save data field "${field}" must be an object.`);
  }
  const result: Record<string, number> = {};
  for (const [key, entry] of Object.entries(value)) {
    const numeric = readFiniteNumber(entry);
    if (numeric === undefined) {
      throw new SaveFormatError(`Save data field "${field}.${key}" must be a finite number.`);
    }
    result[key] = numeric;
  }
  return result;
}

function readStringRecord(value: unknown, field: string): Record<string, string> {
  if (!isRecord(value)) {
    throw new SaveFormatError(`Save data field "${field}" must be an object.`);
  }
  const result: Record<string, string> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new SaveFormatError(`Save data field "${field}.${key}" must be a string.`);
    }
    result[key] = entry;
  }
  return result;
}

function readEventState(value: unknown): SerializedEventState {
  if (!isRecord(value)) {
    throw new SaveFormatError('Save data field "events" must be an object.');
  }
  const triggered = readStringList(value.triggered ?? [], 'events.triggered');
  const resolvedInput = value.resolved ?? [];
  if (!Array.isArray(resolvedInput)) {
    throw new SaveFormatError('Save data field "events.resolved" must be a list.');
  }
  const resolved = resolvedInput.map((entry, index) => {
    if (
      !isRecord(entry) ||
      typeof entry.eventId !== 'string' ||
      typeof entry.choiceId !== 'string'
    ) {
      throw new SaveFormatError(
        `Save data field "events.resolved.${index}" must name an eventId and a choiceId.`,
      );
    }
    return { eventId: entry.eventId, choiceId: entry.choiceId };
  });
  const active = typeof value.active === 'string' ? value.active : null;
  return { triggered, resolved, active };
}

function validateSaveFormatV1(value: unknown): GameStateSaveFormatV1 {
  if (!isRecord(value)) {
    throw new SaveFormatError('Save data must be an object.');
  }

  if (value.version !== GAME_STATE_SAVE_SCHEMA_VERSION) {
    throw new SaveFormatError(
      `Unsupported game state save version: ${String(value.version)}`,
    );
  }

  const { timestamp } = value;
  if (typeof timestamp !== 'string' || Number.isNaN(Date.parse(timestamp))) {
    throw new SaveFormatError('Save data has an invalid timestamp.');
  }

  const currentYear = readFiniteNumber(value.current_year);
  if (currentYear === undefined || !Number.isInteger(currentYear)) {
    throw new SaveFormatError('Save data has an invalid current_year.');
  }

  const yearProgress = readFiniteNumber(value.year_progress);

  return {
    version: GAME_STATE_SAVE_SCHEMA_VERSION,
    timestamp,
    resources: readNumberRecord(value.resources, 'resources'),
    owned_upgrades: readStringList(value.owned_upgrades, 'owned_upgrades'),
    selected_exclusive: readStringRecord(value.selected_exclusive ?? {}, 'selected_exclusive'),
    current_year: currentYear,
    ...(yearProgress !== undefined && yearProgress >= 0 && yearProgress < 1
      ? { year_progress: yearProgress }
      : {}),
    ...(value.events !== undefined ? { events: readEventState(value.events) } : {}),
  };
}

/**
 * Validates an untrusted payload, migrating older versions forward through
 * `migrations`. Newer versions and malformed payloads throw
 * {@link SaveFormatError}.
 */
export function decodeGameStateSave(
  value: unknown,
  options: {
    readonly migrations?: readonly SchemaMigration[];
    readonly targetVersion?: number;
  } = {},
): GameStateSaveFormat {
  const targetVersion =
    options.targetVersion ?? GAME_STATE_SAVE_SCHEMA_VERSION;
  const migrations = options.migrations ?? DEFAULT_GAME_STATE_SAVE_MIGRATIONS;

  const detectedVersion = getSaveVersion(value);
  const fromVersion =
    detectedVersion ?? (hasLegacyV0Shape(value) ? 0 : undefined);

  if (fromVersion === undefined) {
    throw new SaveFormatError('Unable to determine game state save version.');
  }

  if (fromVersion > targetVersion) {
    throw new SaveFormatError(
      `Save version ${fromVersion} is newer than the supported version ${targetVersion}.`,
    );
  }

  let migrated: unknown = value;

  if (fromVersion !== targetVersion) {
    const path = findMigrationPath(migrations, fromVersion, targetVersion);
    if (!path) {
      throw new SaveFormatError(
        `No migration path from version ${fromVersion} to ${targetVersion}.`,
      );
    }

    let currentVersion = fromVersion;
    for (const migration of path) {
      migrated = migration.migrate(migrated);
      const nextVersion = getSaveVersion(migrated);
      if (nextVersion !== migration.toVersion) {
        throw new SaveFormatError(
          `Migration from ${currentVersion} to ${migration.toVersion} did not set the expected version.`,
        );
      }
      currentVersion = nextVersion;
    }
  }

  return validateSaveFormatV1(migrated);
}

export interface GameStateSaveTarget {
  readonly state: GameState;
  readonly events?: EventSystem;
}

export interface SerializeGameStateOptions {
  readonly savedAt?: Date;
}

export function serializeGameState(
  target: GameStateSaveTarget,
  options: SerializeGameStateOptions = {},
): GameStateSaveFormatV1 {
  const { state, events } = target;
  const savedAt = options.savedAt ?? new Date();

  const resources: Record<string, number> = {};
  for (const resource of state.resources.list()) {
    resources[resource.id] = resource.currentValue;
  }

  return {
    version: GAME_STATE_SAVE_SCHEMA_VERSION,
    timestamp: savedAt.toISOString(),
    resources,
    owned_upgrades: state.ownedUpgrades,
    selected_exclusive: state.selectedExclusive,
    current_year: state.currentYear,
    year_progress: state.time.yearProgress,
    ...(events ? { events: events.exportState() } : {}),
  };
}

/**
 * Applies a decoded save. Values are clamped to each resource's floor and
 * ids the catalog no longer knows are dropped with a warning. The year is
 * restored without notifying year listeners; production and dynamic
 * unlocks are then re-derived.
 */
export function hydrateGameState(
  save: GameStateSaveFormat,
  target: GameStateSaveTarget,
): void {
  const { state, events } = target;

  for (const [resourceId, value] of Object.entries(save.resources)) {
    const resource = state.resources.get(resourceId);
    if (!resource) {
      telemetry.recordWarning('SaveUnknownResourceIgnored', { resourceId });
      continue;
    }
    resource.setValue(value);
  }

  const owned: string[] = [];
  for (const upgradeId of save.owned_upgrades) {
    if (!state.catalog.has(upgradeId)) {
      telemetry.recordWarning('SaveUnknownUpgradeDropped', { upgradeId });
      continue;
    }
    owned.push(upgradeId);
  }

  const selections = new Map(
    Object.entries(save.selected_exclusive).filter(([, upgradeId]) =>
      state.catalog.has(upgradeId),
    ),
  );
  // An owned upgrade claims any of its groups the save left unset.
  for (const upgradeId of owned) {
    for (const group of state.catalog.get(upgradeId)?.exclusiveGroups ?? []) {
      if (!selections.has(group)) {
        selections.set(group, upgradeId);
      }
    }
  }

  if (events) {
    events.restoreState(toEventSystemState(save.events));
  } else {
    state.resources.replacePersistentEffects([]);
  }

  state.time.restore(save.current_year, save.year_progress ?? 0);
  state.restore(owned, selections);
  state.resources.relockDynamicResources();
  state.checkResourceUnlocks({ notify: false });
}

function toEventSystemState(saved: SerializedEventState | undefined): EventSystemState {
  return {
    triggered: saved?.triggered ?? [],
    resolved: saved?.resolved ?? [],
    active: saved?.active ?? null,
  };
}

export function encodeGameStateSave(save: GameStateSaveFormat): string {
  return JSON.stringify(save, null, 2);
}

/** Parses JSON text and decodes it; invalid JSON is a {@link SaveFormatError}. */
export function parseGameStateSave(
  json: string,
  options: { readonly migrations?: readonly SchemaMigration[] } = {},
): GameStateSaveFormat {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new SaveFormatError(
      `Save data is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }
  return decodeGameStateSave(parsed, options);
}
