import { z } from 'zod';
import { PayloadValidationError, UnknownEventTypeError } from '../errors';
import type { EventEnvelope } from '../events/EventEnvelope';
import {
  CURRENT_EVENT_VERSION,
  EventType,
  EventTypes,
  NotificationSentV1Schema,
  OrderCreatedV1Schema,
  PaymentFailedV1Schema,
  PaymentProcessedV1Schema,
  PipelineEvent,
  pipelineEventSchemas,
} from '../events/catalog';

export interface EventSchema {
  eventType: string;
  version: number;
  schema: z.ZodTypeAny;
}

export type DecodedEnvelope = EventEnvelope<PipelineEvent['payload']> & { event: PipelineEvent };

/**
 * Local registry of payload schemas keyed by `eventType:version`. Publishers
 * validate through it before anything is written; consumers decode through it
 * before a handler sees the payload.
 */
export class SchemaRegistry {
  private schemas: Map<string, EventSchema> = new Map();

  register(eventType: string, version: number, schema: z.ZodTypeAny): this {
    this.schemas.set(this.key(eventType, version), { eventType, version, schema });
    return this;
  }

  has(eventType: string, version: number): boolean {
    return this.schemas.has(this.key(eventType, version));
  }

  eventTypes(): string[] {
    return [...new Set([...this.schemas.values()].map((s) => s.eventType))];
  }

  getSchema(eventType: string, version: number): EventSchema {
    const schema = this.schemas.get(this.key(eventType, version));
    if (!schema) {
      throw new UnknownEventTypeError(eventType, version);
    }
    return schema;
  }

  /** Parses `payload`, returning it with schema defaults applied. */
  validate(eventType: string, version: number, payload: unknown): unknown {
    const result = this.getSchema(eventType, version).schema.safeParse(payload);
    if (!result.success) {
      throw new PayloadValidationError(
        eventType,
        result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      );
    }
    return result.data;
  }

  decode(envelope: EventEnvelope): DecodedEnvelope {
    const payload = this.validate(envelope.eventType, envelope.eventVersion, envelope.payload);
    const event = toPipelineEvent(envelope.eventType, envelope.eventVersion, payload);
    return { ...envelope, payload: event.payload, event };
  }

  private key(eventType: string, version: number): string {
    return `${eventType}:${version}`;
  }
}

const isEventType = (value: string): value is EventType =>
  Object.prototype.hasOwnProperty.call(pipelineEventSchemas, value);

const toPipelineEvent = (eventType: string, version: number, payload: unknown): PipelineEvent => {
  if (version !== CURRENT_EVENT_VERSION) {
    throw new UnknownEventTypeError(eventType, version);
  }
  switch (eventType) {
    case EventTypes.ORDER_CREATED:
      return { eventType: 'order.created', eventVersion: 1, payload: OrderCreatedV1Schema.parse(payload) };
    case EventTypes.PAYMENT_PROCESSED:
      return { eventType: 'payment.processed', eventVersion: 1, payload: PaymentProcessedV1Schema.parse(payload) };
    case EventTypes.PAYMENT_FAILED:
      return { eventType: 'payment.failed', eventVersion: 1, payload: PaymentFailedV1Schema.parse(payload) };
    case EventTypes.NOTIFICATION_SENT:
      return { eventType: 'notification.sent', eventVersion: 1, payload: NotificationSentV1Schema.parse(payload) };
    default:
      throw new UnknownEventTypeError(eventType, version);
  }
};

export const createPipelineSchemaRegistry = (): SchemaRegistry => {
  const registry = new SchemaRegistry();
  for (const eventType of Object.keys(pipelineEventSchemas)) {
    if (isEventType(eventType)) {
      registry.register(eventType, CURRENT_EVENT_VERSION, pipelineEventSchemas[eventType]);
    }
  }
  return registry;
};
