import { v4 as uuidv4 } from 'uuid';
import { BrokerUnavailableError, InvalidRoutingKeyError } from '../errors';
import type { EventEnvelope } from '../events/EventEnvelope';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';
import { DurableQueue, QueueStore } from './DurableQueue';
import type { RoutingTable } from './RoutingTable';

export interface MessageBrokerOptions {
  store: QueueStore;
  routing: RoutingTable;
  logger: Logger;
  metrics?: PipelineMetrics;
  clock?: Clock;
  publishTimeoutMs?: number;
}

export interface QueueOptions {
  maxAttempts: number;
  orderedByPartition?: boolean;
}

const DEFAULT_PUBLISH_TIMEOUT_MS = 2000;

/**
 * Routes envelopes through the current binding table and fans them out to
 * the matching durable queues in one store write.
 */
export class MessageBroker {
  private table: RoutingTable;
  private readonly store: QueueStore;
  private readonly logger: Logger;
  private readonly baseLogger: Logger;
  private readonly metrics?: PipelineMetrics;
  private readonly clock: Clock;
  private readonly publishTimeoutMs: number;

  constructor(options: MessageBrokerOptions) {
    this.table = options.routing;
    this.store = options.store;
    this.baseLogger = options.logger;
    this.logger = options.logger.child({ component: 'MessageBroker' });
    this.metrics = options.metrics;
    this.clock = options.clock ?? systemClock;
    this.publishTimeoutMs = options.publishTimeoutMs ?? DEFAULT_PUBLISH_TIMEOUT_MS;
  }

  get routing(): RoutingTable {
    return this.table;
  }

  /** Publishes already in flight keep the table they started with. */
  reconfigure(table: RoutingTable): void {
    const previous = this.table.version;
    this.table = table;
    this.logger.info('Routing table replaced', { previousVersion: previous, version: table.version });
  }

  /** Returns the queues the envelope was written to. */
  async publish(envelope: EventEnvelope): Promise<string[]> {
    if (!envelope.routingKey.trim()) {
      throw new InvalidRoutingKeyError(envelope.routingKey);
    }

    const queues = this.table.route(envelope.routingKey);
    if (queues.length === 0) {
      this.metrics?.eventsPublished.inc({ routing_key: envelope.routingKey, outcome: 'unroutable' });
      this.logger.warn('No binding matches routing key', {
        routingKey: envelope.routingKey,
        eventId: envelope.eventId,
        routingVersion: this.table.version,
      });
      return [];
    }

    const now = this.clock.now();
    const messages = queues.map((queueName) => ({
      id: uuidv4(),
      queueName,
      partitionKey: envelope.correlationId,
      envelope,
      enqueuedAt: now,
      visibleAt: now,
    }));

    try {
      await withTimeout(
        () => this.store.insert(messages),
        this.publishTimeoutMs,
        () => new BrokerUnavailableError(`Publish timed out after ${this.publishTimeoutMs}ms`)
      );
    } catch (error) {
      this.metrics?.eventsPublished.inc({ routing_key: envelope.routingKey, outcome: 'failed' });
      if (error instanceof BrokerUnavailableError) throw error;
      throw new BrokerUnavailableError(`Broker store rejected ${envelope.eventType} ${envelope.eventId}`, {
        cause: error,
      });
    }

    this.metrics?.eventsPublished.inc({ routing_key: envelope.routingKey, outcome: 'routed' });
    this.logger.debug('Envelope routed', {
      eventId: envelope.eventId,
      routingKey: envelope.routingKey,
      queues,
    });
    return queues;
  }

  /** Puts an envelope straight onto one queue, bypassing routing. Attempts start at zero. */
  async redeliver(queueName: string, envelope: EventEnvelope): Promise<string> {
    const now = this.clock.now();
    const id = uuidv4();
    try {
      await this.store.insert([
        { id, queueName, partitionKey: envelope.correlationId, envelope, enqueuedAt: now, visibleAt: now },
      ]);
    } catch (error) {
      throw new BrokerUnavailableError(`Could not redeliver ${envelope.eventId} to ${queueName}`, { cause: error });
    }
    return id;
  }

  queue(name: string, options: QueueOptions): DurableQueue {
    return new DurableQueue({
      name,
      store: this.store,
      maxAttempts: options.maxAttempts,
      orderedByPartition: options.orderedByPartition,
      logger: this.baseLogger,
      metrics: this.metrics,
      clock: this.clock,
    });
  }

  /** Bound queues plus any that still hold messages from an older table. */
  async queueNames(): Promise<string[]> {
    const stored = await this.store.queueNames();
    return [...new Set([...this.table.queues(), ...stored])].sort();
  }

  async isAvailable(): Promise<boolean> {
    try {
      await this.store.ping();
      return true;
    } catch (error) {
      this.logger.warn('Broker store ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }
}
