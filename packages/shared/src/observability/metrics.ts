import * as client from 'prom-client';

/**
 * Pipeline counters. Each service owns one registry, exposed on /metrics.
 */
export class PipelineMetrics {
  readonly registry: client.Registry;

  readonly eventsPublished: client.Counter<'routing_key' | 'outcome'>;
  readonly messagesAcked: client.Counter<'queue'>;
  readonly messagesRequeued: client.Counter<'queue'>;
  readonly messagesDeadLettered: client.Counter<'queue' | 'error_type'>;
  readonly duplicatesSkipped: client.Counter<'consumer_group'>;
  readonly deadLettersReplayed: client.Counter<'queue' | 'operator'>;
  readonly handlerDuration: client.Histogram<'queue' | 'outcome'>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new client.Registry();
    if (options.collectDefaults) {
      client.collectDefaultMetrics({ register: this.registry });
    }

    this.eventsPublished = new client.Counter({
      name: 'pipeline_events_published_total',
      help: 'Envelopes handed to the broker',
      labelNames: ['routing_key', 'outcome'],
      registers: [this.registry],
    });

    this.messagesAcked = new client.Counter({
      name: 'pipeline_messages_acked_total',
      help: 'Deliveries acknowledged by a consumer',
      labelNames: ['queue'],
      registers: [this.registry],
    });

    this.messagesRequeued = new client.Counter({
      name: 'pipeline_messages_requeued_total',
      help: 'Deliveries nacked for redelivery',
      labelNames: ['queue'],
      registers: [this.registry],
    });

    this.messagesDeadLettered = new client.Counter({
      name: 'pipeline_messages_dead_lettered_total',
      help: 'Messages moved to the dead-letter sink',
      labelNames: ['queue', 'error_type'],
      registers: [this.registry],
    });

    this.duplicatesSkipped = new client.Counter({
      name: 'pipeline_duplicates_skipped_total',
      help: 'Redeliveries absorbed by the idempotency ledger',
      labelNames: ['consumer_group'],
      registers: [this.registry],
    });

    this.deadLettersReplayed = new client.Counter({
      name: 'pipeline_dead_letters_replayed_total',
      help: 'Dead letters replayed by an operator',
      labelNames: ['queue', 'operator'],
      registers: [this.registry],
    });

    this.handlerDuration = new client.Histogram({
      name: 'pipeline_handler_duration_seconds',
      help: 'Handler wall time per delivery',
      labelNames: ['queue', 'outcome'],
      buckets: [0.005, 0.01, 0.05, 0.1, 0.5, 1, 5, 10],
      registers: [this.registry],
    });
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }
}
