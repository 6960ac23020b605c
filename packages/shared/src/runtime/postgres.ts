import type { DataSource } from 'typeorm';
import { loadBindings, PipelineConfig } from '../config';
import { createBrokerDataSource } from '../database';
import { TypeOrmDeadLetterSink } from '../messaging/DeadLetterSink';
import { TypeOrmQueueStore } from '../messaging/TypeOrmQueueStore';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { Tracer } from '../observability/tracer';
import { Pipeline } from './Pipeline';

export interface PostgresPipeline {
  pipeline: Pipeline;
  brokerDataSource: DataSource;
  close(): Promise<void>;
}

/** Connects to the broker database and assembles a pipeline over it. */
export const createPostgresPipeline = async (
  config: PipelineConfig,
  observability: { logger: Logger; metrics?: PipelineMetrics; tracer?: Tracer }
): Promise<PostgresPipeline> => {
  const routing = loadBindings(config.bindingsPath);
  const brokerDataSource = createBrokerDataSource({
    ...config.brokerDatabase,
    synchronize: config.nodeEnv === 'development',
  });
  await brokerDataSource.initialize();
  observability.logger.info('Broker database connected', {
    database: config.brokerDatabase.database,
    routingVersion: routing.version,
  });

  const pipeline = new Pipeline({
    config,
    store: new TypeOrmQueueStore(brokerDataSource),
    deadLetterSink: new TypeOrmDeadLetterSink(brokerDataSource.manager),
    routing,
    ...observability,
  });

  return {
    pipeline,
    brokerDataSource,
    close: async () => {
      if (brokerDataSource.isInitialized) {
        await brokerDataSource.destroy();
      }
    },
  };
};
