import {
  createRuntimeEvent,
  type RuntimeEvent,
  type RuntimeEventPayload,
  type RuntimeEventType,
} from './runtime-event.js';
import { telemetry } from '../telemetry.js';

export type EventHandler<TType extends RuntimeEventType = RuntimeEventType> = (
  event: RuntimeEvent<TType>,
) => void;

export interface EventSubscription {
  unsubscribe(): void;
}

export interface EventSubscriptionOptions {
  readonly label?: string;
}

export interface EventPublisher {
  publish<TType extends RuntimeEventType>(
    eventType: TType,
    payload: RuntimeEventPayload<TType>,
  ): RuntimeEvent<TType>;
}

interface SubscriberRecord<TType extends RuntimeEventType> {
  readonly handler: EventHandler<TType>;
  readonly label?: string;
  active: boolean;
}

type SubscriberRegistry = {
  [TType in RuntimeEventType]: SubscriberRecord<TType>[];
};

/**
 * Synchronous, in-process bus. Handlers run in subscription order during
 * {@link publish}. A throwing handler is reported as `EventHandlerFailed`
 * and the remaining handlers still run.
 */
export class EventBus implements EventPublisher {
  private readonly subscribers: SubscriberRegistry = {
    'year:changed': [],
    'upgrade:purchased': [],
    'resource:unlocked': [],
    'event:triggered': [],
    'event:resolved': [],
  };
  private sequence = 0;

  publish<TType extends RuntimeEventType>(
    eventType: TType,
    payload: RuntimeEventPayload<TType>,
  ): RuntimeEvent<TType> {
    this.sequence += 1;
    const event = createRuntimeEvent(eventType, this.sequence, payload);
    const records: SubscriberRecord<TType>[] = this.subscribers[eventType];

    for (const subscriber of [...records]) {
      if (!subscriber.active) {
        continue;
      }
      try {
        subscriber.handler(event);
      } catch (error) {
        telemetry.recordError('EventHandlerFailed', {
          eventType,
          sequence: event.sequence,
          handler: subscriber.label,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return event;
  }

  on<TType extends RuntimeEventType>(
    eventType: TType,
    handler: EventHandler<TType>,
    options?: EventSubscriptionOptions,
  ): EventSubscription {
    const records: SubscriberRecord<TType>[] = this.subscribers[eventType];
    const record: SubscriberRecord<TType> = {
      handler,
      label: options?.label,
      active: true,
    };
    records.push(record);

    return {
      unsubscribe: () => {
        if (!record.active) {
          return;
        }
        record.active = false;
        const index = records.indexOf(record);
        if (index !== -1) {
          records.splice(index, 1);
        }
      },
    };
  }

  listenerCount(eventType: RuntimeEventType): number {
    return this.subscribers[eventType].length;
  }
}
