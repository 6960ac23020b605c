import type { PipelineConfig } from '../config';
import type { OutboxRelay } from '../events/OutboxRelay';
import { RetentionSweeper, RetentionTarget } from '../maintenance/RetentionSweeper';
import type { ConsumerRuntime } from '../messaging/ConsumerRuntime';
import { createLogger, Logger } from '../observability/logger';
import { PipelineMetrics } from '../observability/metrics';
import { createTracer, Tracer } from '../observability/tracer';
import type { ConsumerOptions, Pipeline } from '../runtime/Pipeline';
import { createPostgresPipeline } from '../runtime/postgres';
import type { LocalStores } from '../runtime/scope';
import { healthStatus, HealthCheckResponse } from '../types';

export interface PipelineConnection {
  pipeline: Pipeline;
  close(): Promise<void>;
}

export type PipelineConnector = (
  config: PipelineConfig,
  observability: { logger: Logger; metrics: PipelineMetrics; tracer: Tracer }
) => Promise<PipelineConnection>;

export interface PipelineHostOptions {
  config: PipelineConfig;
  /** The service's own outbox and ledger. Broker-only tools have none. */
  local?: LocalStores;
  version?: string;
  logger?: Logger;
  metrics?: PipelineMetrics;
  tracer?: Tracer;
  /** Defaults to the Postgres broker. */
  connect?: PipelineConnector;
}

/**
 * Process-level lifecycle of one service: broker connection, outbox relay,
 * consumers and the retention sweeper.
 */
export class PipelineHost {
  readonly config: PipelineConfig;
  readonly logger: Logger;
  readonly metrics: PipelineMetrics;
  readonly tracer: Tracer;
  private readonly local?: LocalStores;
  private readonly version: string;
  private readonly connect: PipelineConnector;
  private connection: PipelineConnection | null = null;
  private relay: OutboxRelay | null = null;
  private sweeper: RetentionSweeper | null = null;
  private readonly consumerOptions: ConsumerOptions[] = [];
  private consumers: ConsumerRuntime[] = [];
  private started = false;

  constructor(options: PipelineHostOptions) {
    this.config = options.config;
    this.local = options.local;
    this.version = options.version ?? '1.0.0';
    this.connect = options.connect ?? createPostgresPipeline;
    this.logger =
      options.logger ??
      createLogger({
        serviceName: options.config.serviceName,
        level: options.config.logLevel,
        prettyPrint: options.config.nodeEnv !== 'production',
      });
    this.metrics = options.metrics ?? new PipelineMetrics({ collectDefaults: true });
    this.tracer =
      options.tracer ??
      createTracer({ serviceName: options.config.serviceName, jaegerEndpoint: options.config.jaegerEndpoint });
  }

  get pipeline(): Pipeline {
    if (!this.connection) {
      throw new Error(`${this.config.serviceName}: pipeline used before initialize()`);
    }
    return this.connection.pipeline;
  }

  async initialize(): Promise<void> {
    if (this.connection) return;
    try {
      this.connection = await this.connect(this.config, {
        logger: this.logger,
        metrics: this.metrics,
        tracer: this.tracer,
      });
    } catch (error) {
      this.logger.error('Failed to initialize pipeline', error);
      throw error;
    }

    const pipeline = this.connection.pipeline;
    const { retention } = this.config;
    const targets: RetentionTarget[] = [
      {
        name: 'dead_letter_events',
        retentionMs: retention.deadLetterMs,
        purge: (cutoff) => pipeline.deadLetters.purgeResolved(cutoff),
      },
    ];

    if (this.local) {
      const local = this.local;
      this.relay = pipeline.outboxRelay(local.outboxStore);
      targets.push(
        { name: 'consumed_events', retentionMs: retention.ledgerMs, purge: (cutoff) => local.ledger.purgeOlderThan(cutoff) },
        { name: 'outbox_events', retentionMs: retention.ledgerMs, purge: (cutoff) => local.outboxStore.purgeForwarded(cutoff) }
      );
    }

    this.sweeper = new RetentionSweeper(targets, retention.cron, this.logger, pipeline.clock);
    this.logger.info('Service initialized', { service: this.config.serviceName, version: this.version });
  }

  /** Registers a consumer. Consumers registered after start() begin at once. */
  consume(options: ConsumerOptions): void {
    this.consumerOptions.push(options);
    if (this.started) {
      this.startConsumer(options);
    }
  }

  start(): void {
    if (this.started) return;
    this.tracer.start();
    this.relay?.start();
    this.consumerOptions.forEach((options) => this.startConsumer(options));
    this.sweeper?.start();
    this.started = true;
    this.logger.info(`Service ${this.config.serviceName} started`, { consumers: this.consumers.length });
  }

  async stop(): Promise<void> {
    this.started = false;
    this.sweeper?.stop();
    await Promise.all(this.consumers.map((consumer) => consumer.stop()));
    this.consumers = [];
    await this.relay?.stop();
    await this.connection?.close();
    await this.tracer.stop();
    this.logger.info('Service stopped');
  }

  /** One retention pass now, outside the cron schedule. */
  sweep(): Promise<Record<string, number>> {
    if (!this.sweeper) {
      throw new Error(`${this.config.serviceName}: sweep() before initialize()`);
    }
    return this.sweeper.sweep();
  }

  async health(): Promise<HealthCheckResponse> {
    const brokerUp = this.connection ? await this.connection.pipeline.broker.isAvailable() : false;
    const database = this.local ? await this.pingLocal() : brokerUp;
    const messaging =
      this.consumers.length > 0 ? this.consumers.every((consumer) => consumer.isHealthy()) : brokerUp;
    const checks = { database, messaging };

    return {
      status: healthStatus(checks),
      service: this.config.serviceName,
      version: this.version,
      timestamp: new Date().toISOString(),
      checks,
    };
  }

  private startConsumer(options: ConsumerOptions): void {
    const consumer = this.pipeline.consumer(options);
    consumer.start();
    this.consumers.push(consumer);
  }

  private async pingLocal(): Promise<boolean> {
    try {
      await this.local?.ping();
      return true;
    } catch (error) {
      this.logger.warn('Database ping failed', { error: error instanceof Error ? error.message : String(error) });
      return false;
    }
  }
}
