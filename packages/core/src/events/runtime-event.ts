/**
 * Payloads for every event the engine publishes, keyed by event type.
 */
export interface RuntimeEventPayloadMap {
  'year:changed': {
    readonly year: number;
  };
  'upgrade:purchased': {
    readonly upgradeId: string;
    readonly year: number;
  };
  'resource:unlocked': {
    readonly resourceId: string;
    readonly year: number;
  };
  'event:triggered': {
    readonly eventId: string;
    readonly year: number;
  };
  'event:resolved': {
    readonly eventId: string;
    readonly choiceId: string;
    readonly year: number;
  };
}

export type RuntimeEventType = keyof RuntimeEventPayloadMap;

export type RuntimeEventPayload<TType extends RuntimeEventType> =
  RuntimeEventPayloadMap[TType];

export interface RuntimeEvent<TType extends RuntimeEventType = RuntimeEventType> {
  readonly type: TType;
  /** Monotonic publish counter for the owning bus. */
  readonly sequence: number;
  readonly payload: Readonly<RuntimeEventPayload<TType>>;
}

export const RUNTIME_EVENT_TYPES: readonly RuntimeEventType[] = Object.freeze([
  'year:changed',
  'upgrade:purchased',
  'resource:unlocked',
  'event:triggered',
  'event:resolved',
]);

export function createRuntimeEvent<TType extends RuntimeEventType>(
  type: TType,
  sequence: number,
  payload: RuntimeEventPayload<TType>,
): RuntimeEvent<TType> {
  return Object.freeze({
    type,
    sequence,
    payload: Object.freeze({ ...payload }),
  });
}
