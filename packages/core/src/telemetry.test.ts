import { afterEach, describe, expect, it, vi } from 'vitest';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';
import {
  createConsoleTelemetry,
  createRecordingTelemetry,
  resetTelemetry,
  setTelemetry,
  telemetry,
} from './telemetry.js';

describe('telemetry facade', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('preserves facade context when invoking delegated methods', () => {
    class StatefulTelemetryFacade implements TelemetryFacade {
      history: string[] = [];
      lastProgressData?: TelemetryEventData;

      constructor(private readonly label: string) {}

      recordError(event: string): void {
        this.history.push(`${this.label}:error:${event}`);
      }

      recordWarning(event: string): void {
        this.history.push(`${this.label}:warning:${event}`);
      }

      recordProgress(event: string, data?: TelemetryEventData): void {
        this.history.push(`${this.label}:progress:${event}`);
        this.lastProgressData = data;
      }

      recordCounters(group: string): void {
        this.history.push(`${this.label}:counters:${group}`);
      }
    }

    const facade = new StatefulTelemetryFacade('custom');
    setTelemetry(facade);

    const progressData = { year: 1801 };
    telemetry.recordError('failure');
    telemetry.recordWarning('unstable');
    telemetry.recordProgress('milestone', progressData);
    telemetry.recordCounters('upgrades', { owned: 3 });

    expect(facade.history).toEqual([
      'custom:error:failure',
      'custom:warning:unstable',
      'custom:progress:milestone',
      'custom:counters:upgrades',
    ]);
    expect(facade.lastProgressData).toBe(progressData);
  });

  it('logs a console error when delegated invocation fails', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const thrown = new Error('telemetry facade failed');

    setTelemetry({
      recordError: vi.fn(() => {
        throw thrown;
      }),
      recordWarning: vi.fn(),
      recordProgress: vi.fn(),
      recordCounters: vi.fn(),
    });

    telemetry.recordError('failure');
    expect(errorSpy).toHaveBeenCalledWith('[telemetry] invocation failed', thrown);
  });

  it('is silent by default', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    telemetry.recordError('error');
    telemetry.recordWarning('warning');
    telemetry.recordProgress('progress');
    telemetry.recordCounters('counters', { count: 1 });

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).not.toHaveBeenCalled();
    expect(infoSpy).not.toHaveBeenCalled();
  });

  it('createConsoleTelemetry returns a facade that logs to console', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});

    setTelemetry(createConsoleTelemetry());

    telemetry.recordError('error');
    telemetry.recordWarning('warning', { year: 1800 });
    telemetry.recordProgress('progress');
    telemetry.recordCounters('counters', { count: 1 });

    expect(errorSpy).toHaveBeenCalledWith('[telemetry:error] error', undefined);
    expect(warnSpy).toHaveBeenCalledWith('[telemetry:warning] warning', { year: 1800 });
    expect(infoSpy).toHaveBeenCalledWith('[telemetry:progress] progress', undefined);
    expect(infoSpy).toHaveBeenCalledWith('[telemetry:counters] counters', { count: 1 });
  });
});

describe('createRecordingTelemetry', () => {
  it('keeps records in order and counts them by level', () => {
    const recording = createRecordingTelemetry();

    recording.recordProgress('UpgradePurchased', { upgradeId: 'mill' });
    recording.recordWarning('SaveUnknownUpgradeDropped');
    recording.recordProgress('ResourceUnlocked');
    recording.recordCounters('run', { frames: 10 });

    expect(recording.records).toEqual([
      { level: 'progress', event: 'UpgradePurchased', data: { upgradeId: 'mill' } },
      { level: 'warning', event: 'SaveUnknownUpgradeDropped' },
      { level: 'progress', event: 'ResourceUnlocked' },
    ]);
    expect(recording.count('progress')).toBe(2);
    expect(recording.count('error')).toBe(0);
    expect(recording.counters.get('run')).toEqual({ frames: 10 });

    recording.clear();
    expect(recording.records).toEqual([]);
    expect(recording.counters.size).toBe(0);
  });
});
