import { InvalidRoutingKeyError } from '../errors';
import { CURRENT_EVENT_VERSION } from '../events/catalog';
import { createEnvelope, EventEnvelope } from '../events/EventEnvelope';
import type { SchemaRegistry } from '../schema/SchemaRegistry';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import type { MessageBroker } from './MessageBroker';

export interface PublishExtras {
  /** Defaults to the routing key. */
  eventType?: string;
  eventVersion?: number;
  causationId?: string;
}

/**
 * Direct publish path into the broker. Domain code publishes through the
 * outbox; the relay and operator tooling come through here.
 */
export class EventPublisher {
  constructor(
    private readonly broker: MessageBroker,
    private readonly registry: SchemaRegistry,
    private readonly producer: string,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Validates, wraps and routes `payload`. Returns the new event id; throws
   * BrokerUnavailableError when the broker cannot take the write.
   */
  async publish(
    routingKey: string,
    payload: unknown,
    correlationId: string,
    extras: PublishExtras = {}
  ): Promise<string> {
    if (!routingKey.trim()) {
      throw new InvalidRoutingKeyError(routingKey);
    }

    const eventType = extras.eventType ?? routingKey;
    const eventVersion = extras.eventVersion ?? CURRENT_EVENT_VERSION;
    const envelope = createEnvelope(
      {
        eventType,
        eventVersion,
        routingKey,
        producer: this.producer,
        correlationId,
        causationId: extras.causationId,
        payload: this.registry.validate(eventType, eventVersion, payload),
      },
      this.clock
    );

    await this.broker.publish(envelope);
    return envelope.eventId;
  }

  /** Forwards an envelope built elsewhere, revalidating its payload. */
  async publishEnvelope(envelope: EventEnvelope): Promise<string[]> {
    this.registry.validate(envelope.eventType, envelope.eventVersion, envelope.payload);
    return this.broker.publish(envelope);
  }
}
