import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import { telemetry } from './telemetry.js';

export type YearListener = (year: number) => void;

export interface TimeSystemOptions {
  readonly config?: EngineConfig;
}

/**
 * Converts real seconds into calendar years.
 *
 * Progress accumulates at `yearsPerRealSecond * speed`; each whole year
 * crossed increments {@link currentYear} and notifies listeners in
 * registration order, once per year, with that year's value.
 *
 * Listeners run synchronously and must not drive the clock themselves. Calls
 * that would move the year (`update`, `setYear`, `advanceYear`,
 * `skipToYear`) made while listeners are being notified are ignored and
 * reported as `TimeSystemReentrantCall`.
 */
export class TimeSystem {
  private readonly config: EngineConfig['time'];
  private readonly listeners: YearListener[] = [];

  private year: number;
  private progress = 0;
  private speed: number;
  private paused = false;
  private dispatching = false;

  constructor(options: TimeSystemOptions = {}) {
    this.config = (options.config ?? DEFAULT_ENGINE_CONFIG).time;
    this.year = this.config.startYear;
    this.speed = this.config.defaultSpeed;
  }

  get currentYear(): number {
    return this.year;
  }

  /** Fraction of the current year already elapsed, in `[0, 1)`. */
  get yearProgress(): number {
    return this.progress;
  }

  /** True while year listeners run; the year cannot change until they return. */
  get isNotifying(): boolean {
    return this.dispatching;
  }

  update(dt: number): void {
    if (this.paused || !Number.isFinite(dt) || dt <= 0) {
      return;
    }
    if (this.rejectReentrantCall('update')) {
      return;
    }

    this.progress += dt * this.config.yearsPerRealSecond * this.speed;
    while (this.progress >= 1) {
      this.progress -= 1;
      this.year += 1;
      this.notify(this.year);
    }
  }

  /** Clamps into `[minSpeed, maxSpeed]`; non-finite values are ignored. */
  setSpeed(multiplier: number): number {
    if (Number.isFinite(multiplier)) {
      this.speed = Math.min(this.config.maxSpeed, Math.max(this.config.minSpeed, multiplier));
    }
    return this.speed;
  }

  getSpeed(): number {
    return this.speed;
  }

  /** Returns the new paused state. */
  togglePause(): boolean {
    this.paused = !this.paused;
    return this.paused;
  }

  setPaused(paused: boolean): void {
    this.paused = paused;
  }

  isPaused(): boolean {
    return this.paused;
  }

  /** `0` while paused, the speed multiplier otherwise. */
  getEffectiveTimeScale(): number {
    return this.paused ? 0 : this.speed;
  }

  getProgressPercent(): number {
    return this.progress * 100;
  }

  /**
   * Registers a listener and returns a function that removes it. The same
   * function registered twice is notified twice.
   */
  addYearListener(listener: YearListener): () => void {
    this.listeners.push(listener);
    return () => {
      const index = this.listeners.indexOf(listener);
      if (index !== -1) {
        this.listeners.splice(index, 1);
      }
    };
  }

  /** Jumps to `year`, clears progress and notifies once. */
  setYear(year: number): void {
    if (!Number.isInteger(year) || this.rejectReentrantCall('setYear')) {
      return;
    }
    this.year = year;
    this.progress = 0;
    this.notify(year);
  }

  /** Moves forward `count` whole years, notifying once per year. Progress is kept. */
  advanceYear(count = 1): void {
    if (!Number.isInteger(count) || count <= 0 || this.rejectReentrantCall('advanceYear')) {
      return;
    }
    for (let step = 0; step < count; step += 1) {
      this.year += 1;
      this.notify(this.year);
    }
  }

  /**
   * Steps forward to `target`, notifying for every intermediate year in
   * ascending order, then clears progress. Targets at or before the current
   * year are ignored; returns whether the clock moved.
   */
  skipToYear(target: number): boolean {
    if (!Number.isInteger(target) || target <= this.year) {
      return false;
    }
    if (this.rejectReentrantCall('skipToYear')) {
      return false;
    }
    while (this.year < target) {
      this.year += 1;
      this.notify(this.year);
    }
    this.progress = 0;
    return true;
  }

  /** Sets year and progress without notifying listeners, as when loading a save. */
  restore(year: number, progress = 0): void {
    if (!Number.isInteger(year)) {
      return;
    }
    this.year = year;
    this.progress = Number.isFinite(progress) && progress >= 0 && progress < 1 ? progress : 0;
  }

  /** Back to the configured start year and speed, unpaused. Listeners stay registered. */
  reset(): void {
    this.year = this.config.startYear;
    this.progress = 0;
    this.speed = this.config.defaultSpeed;
    this.paused = false;
  }

  private rejectReentrantCall(operation: string): boolean {
    if (!this.dispatching) {
      return false;
    }
    telemetry.recordWarning('TimeSystemReentrantCall', {
      operation,
      year: this.year,
    });
    return true;
  }

  private notify(year: number): void {
    this.dispatching = true;
    try {
      for (const listener of [...this.listeners]) {
        try {
          listener(year);
        } catch (error) {
          telemetry.recordError('YearListenerFailed', {
            year,
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
    } finally {
      this.dispatching = false;
    }
  }
}
