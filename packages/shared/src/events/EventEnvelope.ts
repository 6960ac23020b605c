import { v4 as uuidv4 } from 'uuid';
import { PayloadValidationError } from '../errors';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';

export interface EventEnvelope<T = unknown> {
  readonly eventId: string;
  readonly eventType: string;
  readonly eventVersion: number;
  readonly routingKey: string;
  readonly occurredAt: string;
  readonly producer: string;
  readonly correlationId: string;
  readonly causationId?: string;
  readonly payload: T;
}

export interface EnvelopeInit<T> {
  eventType: string;
  eventVersion: number;
  routingKey?: string;
  producer: string;
  correlationId: string;
  causationId?: string;
  payload: T;
}

export const createEnvelope = <T>(init: EnvelopeInit<T>, clock: Clock = systemClock): EventEnvelope<T> =>
  Object.freeze({
    eventId: uuidv4(),
    eventType: init.eventType,
    eventVersion: init.eventVersion,
    routingKey: init.routingKey || init.eventType,
    occurredAt: clock.now().toISOString(),
    producer: init.producer,
    correlationId: init.correlationId,
    ...(init.causationId ? { causationId: init.causationId } : {}),
    payload: init.payload,
  });

/** An envelope as written to a jsonb column. */
export type StoredEnvelope = Omit<EventEnvelope, 'payload'> & { readonly payload: object };

export const payloadObject = (envelope: EventEnvelope): object => {
  const { payload } = envelope;
  if (typeof payload !== 'object' || payload === null) {
    const actual = payload === null ? 'null' : typeof payload;
    throw new PayloadValidationError(envelope.eventType, [`payload must be an object, got ${actual}`]);
  }
  return payload;
};

export const toStoredEnvelope = (envelope: EventEnvelope): StoredEnvelope => ({
  ...envelope,
  payload: payloadObject(envelope),
});
