import { createRetryPolicy, PipelineConfig } from '../config';
import { OutboxRelay } from '../events/OutboxRelay';
import type { EventEnvelope } from '../events/EventEnvelope';
import type { OutboxReader } from '../events/OutboxStore';
import { IdempotencyLedger, IdempotentResult, runIdempotent } from '../idempotency/IdempotencyLedger';
import type { UnitOfWork } from '../database/UnitOfWork';
import { ConsumerRuntime, EventHandler } from '../messaging/ConsumerRuntime';
import type { DeadLetterSink } from '../messaging/DeadLetterSink';
import { DeadLetterService } from '../messaging/DeadLetterService';
import type { QueueStore } from '../messaging/DurableQueue';
import { EventPublisher } from '../messaging/EventPublisher';
import { MessageBroker } from '../messaging/MessageBroker';
import type { RetryPolicy } from '../messaging/RetryPolicy';
import type { RoutingTable } from '../messaging/RoutingTable';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { Tracer } from '../observability/tracer';
import { createPipelineSchemaRegistry, SchemaRegistry } from '../schema/SchemaRegistry';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';

export interface PipelineOptions {
  config: PipelineConfig;
  store: QueueStore;
  deadLetterSink: DeadLetterSink;
  routing: RoutingTable;
  logger: Logger;
  metrics?: PipelineMetrics;
  tracer?: Tracer;
  clock?: Clock;
  /** Jitter source for the retry policy. */
  random?: () => number;
}

export interface ConsumerOptions {
  queueName: string;
  consumerGroup: string;
  handler: EventHandler;
  orderedByPartition?: boolean;
  prefetch?: number;
}

/**
 * Everything one service needs to publish and consume, assembled from
 * configuration over a given queue store.
 */
export class Pipeline {
  readonly config: PipelineConfig;
  readonly registry: SchemaRegistry;
  readonly broker: MessageBroker;
  readonly publisher: EventPublisher;
  readonly deadLetters: DeadLetterService;
  readonly retryPolicy: RetryPolicy;
  readonly logger: Logger;
  readonly clock: Clock;
  private readonly metrics?: PipelineMetrics;
  private readonly tracer?: Tracer;

  constructor(options: PipelineOptions) {
    this.config = options.config;
    this.logger = options.logger;
    this.metrics = options.metrics;
    this.tracer = options.tracer;
    this.clock = options.clock ?? systemClock;
    this.registry = createPipelineSchemaRegistry();
    this.retryPolicy = createRetryPolicy(options.config, options.random);

    this.broker = new MessageBroker({
      store: options.store,
      routing: options.routing,
      logger: options.logger,
      metrics: options.metrics,
      clock: this.clock,
      publishTimeoutMs: options.config.publisher.publishTimeoutMs,
    });
    this.publisher = new EventPublisher(this.broker, this.registry, options.config.serviceName, this.clock);
    this.deadLetters = new DeadLetterService(
      {
        sink: options.deadLetterSink,
        broker: this.broker,
        maxReplayCount: options.config.deadLetters.maxReplayCount,
        metrics: options.metrics,
        clock: this.clock,
      },
      options.logger
    );

    for (const binding of options.routing.unmatchedBindings(this.registry.eventTypes())) {
      this.logger.warn('Binding matches no known event type', { ...binding });
    }
  }

  consumer(options: ConsumerOptions): ConsumerRuntime {
    const { consumer, retry } = this.config;
    return new ConsumerRuntime({
      consumerGroup: options.consumerGroup,
      queue: this.broker.queue(options.queueName, {
        maxAttempts: retry.maxAttempts,
        orderedByPartition: options.orderedByPartition,
      }),
      handler: options.handler,
      registry: this.registry,
      retryPolicy: this.retryPolicy,
      visibilityTimeoutMs: consumer.visibilityTimeoutMs,
      handlerTimeoutMs: consumer.handlerTimeoutMs,
      pollIntervalMs: consumer.pollIntervalMs,
      prefetch: options.prefetch ?? consumer.prefetch,
      logger: this.logger,
      tracer: this.tracer,
      metrics: this.metrics,
      clock: this.clock,
    });
  }

  /** `runIdempotent` that also counts and logs the duplicates it absorbs. */
  async idempotent<S extends { ledger: IdempotencyLedger }, T>(
    unitOfWork: UnitOfWork<S>,
    consumerGroup: string,
    envelope: Pick<EventEnvelope, 'eventId' | 'eventType'>,
    work: (scope: S) => Promise<T>,
    describe?: (result: T) => string
  ): Promise<IdempotentResult<T>> {
    const outcome = await runIdempotent(unitOfWork, consumerGroup, envelope, work, describe);
    if (outcome.status === 'duplicate') {
      this.metrics?.duplicatesSkipped.inc({ consumer_group: consumerGroup });
      this.logger.info('Duplicate delivery skipped', {
        consumerGroup,
        eventId: envelope.eventId,
        eventType: envelope.eventType,
      });
    }
    return outcome;
  }

  outboxRelay(reader: OutboxReader): OutboxRelay {
    return new OutboxRelay(
      {
        reader,
        publisher: this.publisher,
        backoff: this.retryPolicy,
        pollIntervalMs: this.config.outbox.pollIntervalMs,
        batchSize: this.config.outbox.batchSize,
        clock: this.clock,
      },
      this.logger
    );
  }
}
