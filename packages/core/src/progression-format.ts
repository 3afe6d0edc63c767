import type { ResourceEffect } from '@epochs/content-schema';

const ZERO_BASE_EPSILON = 1e-9;

function trimFixed(value: number, digits: number): string {
  return String(Number(value.toFixed(digits)));
}

/**
 * One-line description of an effect, e.g. `+5 money/s` or `-25% money`.
 * `label` defaults to the resource id.
 */
export function describeEffect(effect: ResourceEffect, label: string = effect.resourceId): string {
  if (effect.kind === 'add') {
    const sign = effect.value >= 0 ? '+' : '';
    return `${sign}${trimFixed(effect.value, 1)} ${label}/s`;
  }

  if (effect.value > 1) {
    return `+${Math.round((effect.value - 1) * 100)}% ${label}`;
  }
  if (effect.value < 1) {
    return `-${Math.round((1 - effect.value) * 100)}% ${label}`;
  }
  return `No change to ${label}`;
}

/**
 * Percentage by which `rate` exceeds `baseRate`. A base within `1e-9` of
 * zero yields `0`.
 */
export function getBonusPercent(rate: number, baseRate: number): number {
  if (!Number.isFinite(rate) || !Number.isFinite(baseRate)) {
    return 0;
  }
  if (Math.abs(baseRate) < ZERO_BASE_EPSILON) {
    return 0;
  }
  return (rate / baseRate - 1) * 100;
}

/** `1234.5` → `1.23K`; below a thousand one decimal is kept. */
export function formatResourceValue(value: number): string {
  const magnitude = Math.abs(value);
  if (magnitude >= 1_000_000_000) {
    return `${(value / 1_000_000_000).toFixed(2)}B`;
  }
  if (magnitude >= 1_000_000) {
    return `${(value / 1_000_000).toFixed(2)}M`;
  }
  if (magnitude >= 1_000) {
    return `${(value / 1_000).toFixed(2)}K`;
  }
  return value.toFixed(1);
}

export function formatProductionRate(rate: number): string {
  const sign = rate >= 0 ? '+' : '';
  const magnitude = Math.abs(rate);
  if (magnitude >= 1000) {
    return `${sign}${(rate / 1000).toFixed(1)}K/s`;
  }
  if (magnitude >= 1) {
    return `${sign}${rate.toFixed(1)}/s`;
  }
  return `${sign}${rate.toFixed(2)}/s`;
}
