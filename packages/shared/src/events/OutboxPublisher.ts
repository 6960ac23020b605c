import { InvalidRoutingKeyError } from '../errors';
import type { SchemaRegistry } from '../schema/SchemaRegistry';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import { CURRENT_EVENT_VERSION, EventPayloadInputs, EventType } from './catalog';
import { createEnvelope } from './EventEnvelope';
import type { OutboxWriter } from './OutboxStore';

export interface PublishOptions<K extends EventType> {
  eventType: K;
  payload: EventPayloadInputs[K];
  correlationId: string;
  causationId?: string;
  routingKey?: string;
  eventVersion?: number;
}

/**
 * Writes events into the local outbox. Bind it to the same transaction as
 * the domain write; the relay forwards the row once it commits.
 */
export class OutboxPublisher {
  constructor(
    private readonly writer: OutboxWriter,
    private readonly registry: SchemaRegistry,
    private readonly producer: string,
    private readonly clock: Clock = systemClock
  ) {}

  async publish<K extends EventType>(options: PublishOptions<K>): Promise<string> {
    const routingKey = options.routingKey ?? options.eventType;
    if (!routingKey.trim()) {
      throw new InvalidRoutingKeyError(routingKey);
    }

    const eventVersion = options.eventVersion ?? CURRENT_EVENT_VERSION;
    const payload = this.registry.validate(options.eventType, eventVersion, options.payload);

    const envelope = createEnvelope(
      {
        eventType: options.eventType,
        eventVersion,
        routingKey,
        producer: this.producer,
        correlationId: options.correlationId,
        causationId: options.causationId,
        payload,
      },
      this.clock
    );

    await this.writer.append(envelope);
    return envelope.eventId;
  }
}
