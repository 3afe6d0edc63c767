import type {
  EventChoiceDefinition,
  EventTrigger,
  NormalizedEvent,
  ResourceEffect,
} from '@epochs/content-schema';

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from './config.js';
import type {
  OwnershipLookup,
  ResourceManager,
} from './progression/resource-manager.js';
import { telemetry } from './telemetry.js';

export interface ResolvedEventChoice {
  readonly eventId: string;
  readonly choiceId: string;
}

export interface EventSystemState {
  /** One-time events that have fired, in firing order. */
  readonly triggered: readonly string[];
  readonly resolved: readonly ResolvedEventChoice[];
  /** Event awaiting a choice when the state was exported. */
  readonly active: string | null;
}

export interface EventSystemOptions {
  readonly events: readonly NormalizedEvent[];
  readonly resources: ResourceManager;
  readonly owned: OwnershipLookup;
  readonly config?: EngineConfig;
  readonly onEventTriggered?: (event: NormalizedEvent) => void;
  readonly onEventResolved?: (
    event: NormalizedEvent,
    choice: EventChoiceDefinition,
  ) => void;
}

/**
 * Threshold-driven events.
 *
 * An event fires when every one of its triggers holds against current
 * resource values. At most one event is active; while it waits for a choice
 * no other trigger is evaluated, though cooldowns keep ticking. One-time
 * events never fire again, and a cooldown suppresses repeatable ones for
 * `cooldownSeconds` after firing. Events without triggers never fire.
 */
export class EventSystem {
  private readonly events: ReadonlyMap<string, NormalizedEvent>;
  private readonly resources: ResourceManager;
  private readonly owned: OwnershipLookup;
  private readonly equalityEpsilon: number;
  private readonly onEventTriggered?: (event: NormalizedEvent) => void;
  private readonly onEventResolved?: (
    event: NormalizedEvent,
    choice: EventChoiceDefinition,
  ) => void;

  private readonly triggered = new Set<string>();
  private readonly cooldowns = new Map<string, number>();
  private readonly resolved: ResolvedEventChoice[] = [];
  private active: NormalizedEvent | null = null;

  constructor(options: EventSystemOptions) {
    this.events = new Map(options.events.map((event) => [event.id, event]));
    this.resources = options.resources;
    this.owned = options.owned;
    this.equalityEpsilon = (options.config ?? DEFAULT_ENGINE_CONFIG).events.equalityEpsilon;
    this.onEventTriggered = options.onEventTriggered;
    this.onEventResolved = options.onEventResolved;
  }

  get activeEvent(): NormalizedEvent | null {
    return this.active;
  }

  getEvent(eventId: string): NormalizedEvent | undefined {
    return this.events.get(eventId);
  }

  /** Seconds left before `eventId` may fire again; `0` when not cooling down. */
  getCooldownRemaining(eventId: string): number {
    return this.cooldowns.get(eventId) ?? 0;
  }

  hasTriggered(eventId: string): boolean {
    return this.triggered.has(eventId);
  }

  /**
   * Ticks cooldowns by `dt` seconds, then, unless an event is already
   * active, fires the first eligible event in catalog order.
   */
  update(dt: number): NormalizedEvent | null {
    if (Number.isFinite(dt) && dt > 0) {
      for (const [eventId, remaining] of [...this.cooldowns]) {
        const next = remaining - dt;
        if (next <= 0) {
          this.cooldowns.delete(eventId);
        } else {
          this.cooldowns.set(eventId, next);
        }
      }
    }

    if (this.active) {
      return null;
    }

    for (const event of this.events.values()) {
      if (event.oneTime && this.triggered.has(event.id)) {
        continue;
      }
      if (this.cooldowns.has(event.id)) {
        continue;
      }
      if (this.checkTriggers(event)) {
        this.fire(event);
        return event;
      }
    }
    return null;
  }

  checkTriggers(event: NormalizedEvent): boolean {
    if (event.triggers.length === 0) {
      return false;
    }
    return event.triggers.every((trigger) => this.checkTrigger(trigger));
  }

  checkTrigger(trigger: EventTrigger): boolean {
    const state = this.resources.get(trigger.resourceId);
    if (!state) {
      return false;
    }
    const value = state.currentValue;
    switch (trigger.comparison) {
      case '>=':
        return value >= trigger.threshold;
      case '<=':
        return value <= trigger.threshold;
      case '>':
        return value > trigger.threshold;
      case '<':
        return value < trigger.threshold;
      case '==':
        return Math.abs(value - trigger.threshold) < this.equalityEpsilon;
    }
  }

  /** Whether the active event offers `choiceId` and it can be paid for now. */
  canMakeChoice(choiceId: string): boolean {
    const choice = this.findActiveChoice(choiceId);
    return choice !== undefined && this.isChoiceEligible(choice);
  }

  /**
   * Resolves the active event: pays the choice's costs, records its effects
   * as persistent modifiers and clears the active slot. Returns `false`
   * without changes when there is no active event, the choice is unknown,
   * a required upgrade is missing or the costs cannot be paid.
   */
  makeChoice(choiceId: string): boolean {
    const event = this.active;
    const choice = this.findActiveChoice(choiceId);
    if (!event || !choice || !this.isChoiceEligible(choice)) {
      return false;
    }
    if (!this.resources.payCosts(choice.costs)) {
      return false;
    }

    for (const effect of choice.effects) {
      this.resources.applyPersistentEffect(effect);
    }
    this.resolved.push({ eventId: event.id, choiceId: choice.id });
    this.active = null;

    telemetry.recordProgress('EventChoiceResolved', {
      eventId: event.id,
      choiceId: choice.id,
    });
    this.onEventResolved?.(event, choice);
    return true;
  }

  exportState(): EventSystemState {
    return {
      triggered: [...this.triggered],
      resolved: this.resolved.map((entry) => ({ ...entry })),
      active: this.active?.id ?? null,
    };
  }

  /**
   * Restores fired and resolved history. Persistent effects of the resolved
   * choices are handed back to the resource manager in resolution order;
   * entries naming unknown events or choices are skipped. Cooldowns are
   * cleared; a known active event is shown again without re-firing.
   */
  restoreState(state: EventSystemState): void {
    this.active = state.active === null ? null : (this.events.get(state.active) ?? null);
    this.cooldowns.clear();
    this.triggered.clear();
    this.resolved.length = 0;

    for (const eventId of state.triggered) {
      if (this.events.has(eventId)) {
        this.triggered.add(eventId);
      }
    }

    const effects: ResourceEffect[] = [];
    for (const entry of state.resolved) {
      const choice = this.events
        .get(entry.eventId)
        ?.choices.find((candidate) => candidate.id === entry.choiceId);
      if (!choice) {
        continue;
      }
      this.resolved.push({ eventId: entry.eventId, choiceId: entry.choiceId });
      effects.push(...choice.effects);
    }
    this.resources.replacePersistentEffects(effects);
  }

  reset(): void {
    this.active = null;
    this.cooldowns.clear();
    this.triggered.clear();
    this.resolved.length = 0;
  }

  private fire(event: NormalizedEvent): void {
    this.active = event;
    if (event.oneTime) {
      this.triggered.add(event.id);
    }
    if (event.cooldownSeconds > 0) {
      this.cooldowns.set(event.id, event.cooldownSeconds);
    }
    telemetry.recordProgress('EventTriggered', { eventId: event.id });
    this.onEventTriggered?.(event);
  }

  private findActiveChoice(choiceId: string): EventChoiceDefinition | undefined {
    return this.active?.choices.find((choice) => choice.id === choiceId);
  }

  private isChoiceEligible(choice: EventChoiceDefinition): boolean {
    return (
      choice.requirements.every((upgradeId) => this.owned.has(upgradeId)) &&
      this.resources.canAfford(choice.costs)
    );
  }
}
