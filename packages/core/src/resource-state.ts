import type { NormalizedResource, ResourceEffect } from '@epochs/content-schema';

export interface ResourceStateOptions {
  readonly initialValue: number;
  readonly unlocked: boolean;
}

/**
 * Mutable runtime state for one resource.
 *
 * The value never drops below `definition.minValue`; every mutator clamps
 * from below and none clamps from above. Modifiers are transient: the
 * manager resets them and re-applies effects from scratch, so repeated
 * recalculation cannot drift.
 */
export class ResourceState {
  readonly definition: NormalizedResource;

  private value: number;
  private unlocked: boolean;
  private additions = 0;
  private multiplier = 1;

  constructor(definition: NormalizedResource, options: ResourceStateOptions) {
    this.definition = definition;
    this.value = Math.max(definition.minValue, options.initialValue);
    this.unlocked = options.unlocked;
  }

  get id(): string {
    return this.definition.id;
  }

  get currentValue(): number {
    return this.value;
  }

  get isUnlocked(): boolean {
    return this.unlocked;
  }

  /** Sum of every active `add` effect. */
  get baseAdditions(): number {
    return this.additions;
  }

  /** Running product of every active `mult` effect. */
  get totalMultiplier(): number {
    return this.multiplier;
  }

  getProductionPerSecond(): number {
    return (this.definition.baseProduction + this.additions) * this.multiplier;
  }

  setValue(value: number): void {
    if (!Number.isFinite(value)) {
      return;
    }
    this.value = Math.max(this.definition.minValue, value);
  }

  /**
   * Deducts `amount` when the current value covers it. Non-finite and
   * negative amounts are rejected without mutation.
   */
  spend(amount: number): boolean {
    if (!Number.isFinite(amount) || amount < 0) {
      return false;
    }
    if (this.value < amount) {
      return false;
    }
    this.value = Math.max(this.definition.minValue, this.value - amount);
    return true;
  }

  /** Integrates production over `dt` seconds at the current rate. */
  update(dt: number): void {
    if (!Number.isFinite(dt) || dt <= 0) {
      return;
    }
    this.advanceBy(this.getProductionPerSecond() * dt);
  }

  /** Adds a precomputed delta, clamping to the floor. */
  advanceBy(delta: number): void {
    if (!Number.isFinite(delta)) {
      return;
    }
    this.value = Math.max(this.definition.minValue, this.value + delta);
  }

  resetModifiers(): void {
    this.additions = 0;
    this.multiplier = 1;
  }

  applyEffect(effect: ResourceEffect): void {
    if (effect.kind === 'add') {
      this.additions += effect.value;
    } else {
      this.multiplier *= effect.value;
    }
  }

  /** One-way transition. Returns `true` only when this call unlocked it. */
  unlock(): boolean {
    if (this.unlocked) {
      return false;
    }
    this.unlocked = true;
    return true;
  }

  /** Restores the locked flag; only used when a session is reset or reloaded. */
  relock(): void {
    this.unlocked = false;
  }
}
