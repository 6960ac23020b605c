import 'reflect-metadata';

export * from './config';
export * from './database';
export * from './errors';
export * from './events/catalog';
export * from './events/ConsumedEvent';
export * from './events/DeadLetterEvent';
export * from './events/EventEnvelope';
export * from './events/OutboxEvent';
export * from './events/OutboxPublisher';
export * from './events/OutboxRelay';
export * from './events/OutboxStore';
export * from './idempotency/IdempotencyLedger';
export * from './maintenance/RetentionSweeper';
export * from './messaging/ConsumerRuntime';
export * from './messaging/DeadLetterService';
export * from './messaging/DeadLetterSink';
export * from './messaging/DurableQueue';
export * from './messaging/EventPublisher';
export * from './messaging/InMemoryQueueStore';
export * from './messaging/MessageBroker';
export * from './messaging/QueuedMessageEntity';
export * from './messaging/RetryPolicy';
export * from './messaging/RoutingTable';
export * from './messaging/TypeOrmQueueStore';
export * from './nest/http';
export * from './nest/PipelineModule';
export * from './observability';
export * from './runtime/Pipeline';
export * from './runtime/postgres';
export * from './runtime/scope';
export * from './schema/SchemaRegistry';
export * from './service/PipelineHost';
export * from './types';
export * from './utils/clock';
export * from './utils/money';
export * from './utils/timeout';
