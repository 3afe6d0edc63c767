/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[telemetry:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[telemetry:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[telemetry:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[telemetry:counters] ${group}`, counters);
  },
};

/**
 * Discards everything. This is the default facade, so the engine stays quiet
 * in tests and headless runs unless a host opts in.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
};

/**
 * Creates a telemetry facade that logs every record to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@epochs/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

export type TelemetryLevel = 'error' | 'warning' | 'progress';

export interface TelemetryRecord {
  readonly level: TelemetryLevel;
  readonly event: string;
  readonly data?: TelemetryEventData;
}

export interface RecordingTelemetry extends TelemetryFacade {
  readonly records: readonly TelemetryRecord[];
  readonly counters: ReadonlyMap<string, Readonly<Record<string, number>>>;
  count(level: TelemetryLevel): number;
  clear(): void;
}

/**
 * Keeps every record in memory. The headless simulator uses it to summarise a
 * run; tests use it to assert what the engine reported.
 */
export function createRecordingTelemetry(): RecordingTelemetry {
  const records: TelemetryRecord[] = [];
  const counters = new Map<string, Readonly<Record<string, number>>>();
  const push = (level: TelemetryLevel, event: string, data?: TelemetryEventData) => {
    records.push(data === undefined ? { level, event } : { level, event, data });
  };

  return {
    records,
    counters,
    recordError(event, data) {
      push('error', event, data);
    },
    recordWarning(event, data) {
      push('warning', event, data);
    },
    recordProgress(event, data) {
      push('progress', event, data);
    },
    recordCounters(group, values) {
      counters.set(group, { ...values });
    },
    count(level) {
      return records.filter((record) => record.level === level).length;
    },
    clear() {
      records.length = 0;
      counters.clear();
    },
  };
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}
