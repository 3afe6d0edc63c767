export interface EngineConfig {
  readonly time: {
    /**
     * Calendar year a new session starts in.
     *
     * @defaultValue `1800`
     */
    readonly startYear: number;
    /**
     * Simulated years that elapse per real second at 1x speed.
     *
     * @defaultValue `1`
     */
    readonly yearsPerRealSecond: number;
    /**
     * Speed multiplier a new session starts with. Clamped into
     * `[minSpeed, maxSpeed]`.
     *
     * @defaultValue `1`
     */
    readonly defaultSpeed: number;
    /**
     * @defaultValue `0.25`
     */
    readonly minSpeed: number;
    /**
     * @defaultValue `16`
     */
    readonly maxSpeed: number;
  };
  readonly timeSkip: {
    /**
     * Real seconds of production credited per skipped year when projecting
     * and applying a time skip.
     *
     * @defaultValue `2`
     */
    readonly secondsPerYear: number;
  };
  readonly events: {
    /**
     * Tolerance used by `==` threshold triggers.
     *
     * @defaultValue `0.01`
     */
    readonly equalityEpsilon: number;
    /**
     * When enabled the time system is paused while an event awaits a choice
     * and resumed once it is resolved.
     *
     * @defaultValue `false`
     */
    readonly pauseTimeWhileActive: boolean;
  };
  readonly resources: {
    /**
     * A resource without an authored starting amount begins with
     * `baseProduction * startAmountMultiplier`.
     *
     * @defaultValue `10`
     */
    readonly startAmountMultiplier: number;
  };
}

export type EngineConfigOverrides = Readonly<{
  readonly time?: Partial<EngineConfig['time']>;
  readonly timeSkip?: Partial<EngineConfig['timeSkip']>;
  readonly events?: Partial<EngineConfig['events']>;
  readonly resources?: Partial<EngineConfig['resources']>;
}>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = Object.freeze({
  time: Object.freeze({
    startYear: 1800,
    yearsPerRealSecond: 1,
    defaultSpeed: 1,
    minSpeed: 0.25,
    maxSpeed: 16,
  }),
  timeSkip: Object.freeze({
    secondsPerYear: 2,
  }),
  events: Object.freeze({
    equalityEpsilon: 0.01,
    pauseTimeWhileActive: false,
  }),
  resources: Object.freeze({
    startAmountMultiplier: 10,
  }),
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function toPositiveNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric > 0 ? numeric : undefined;
}

function toNonNegativeNumber(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric !== undefined && numeric >= 0 ? numeric : undefined;
}

function toInteger(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric === undefined ? undefined : Math.floor(numeric);
}

function toBoolean(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function resolveTimeConfig(
  overrides: EngineConfigOverrides['time'] | undefined,
): EngineConfig['time'] {
  const source = overrides ?? {};
  const defaults = DEFAULT_ENGINE_CONFIG.time;

  let minSpeed = toPositiveNumber(source.minSpeed) ?? defaults.minSpeed;
  let maxSpeed = toPositiveNumber(source.maxSpeed) ?? defaults.maxSpeed;
  if (minSpeed > maxSpeed) {
    [minSpeed, maxSpeed] = [maxSpeed, minSpeed];
  }
  const defaultSpeed = toPositiveNumber(source.defaultSpeed) ?? defaults.defaultSpeed;

  return {
    startYear: toInteger(source.startYear) ?? defaults.startYear,
    yearsPerRealSecond:
      toPositiveNumber(source.yearsPerRealSecond) ?? defaults.yearsPerRealSecond,
    defaultSpeed: Math.min(maxSpeed, Math.max(minSpeed, defaultSpeed)),
    minSpeed,
    maxSpeed,
  };
}

export function resolveEngineConfig(
  overrides?: EngineConfigOverrides,
): EngineConfig {
  const defaults = DEFAULT_ENGINE_CONFIG;

  return Object.freeze({
    time: Object.freeze(resolveTimeConfig(overrides?.time)),
    timeSkip: Object.freeze({
      secondsPerYear:
        toNonNegativeNumber(overrides?.timeSkip?.secondsPerYear) ??
        defaults.timeSkip.secondsPerYear,
    }),
    events: Object.freeze({
      equalityEpsilon:
        toNonNegativeNumber(overrides?.events?.equalityEpsilon) ??
        defaults.events.equalityEpsilon,
      pauseTimeWhileActive:
        toBoolean(overrides?.events?.pauseTimeWhileActive) ??
        defaults.events.pauseTimeWhileActive,
    }),
    resources: Object.freeze({
      startAmountMultiplier:
        toFiniteNumber(overrides?.resources?.startAmountMultiplier) ??
        defaults.resources.startAmountMultiplier,
    }),
  });
}
