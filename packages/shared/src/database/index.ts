import { DataSource, DataSourceOptions, EntitySchema } from 'typeorm';
import { ConsumedEvent } from '../events/ConsumedEvent';
import { DeadLetterEvent } from '../events/DeadLetterEvent';
import { OutboxEvent } from '../events/OutboxEvent';
import { QueuedMessageEntity } from '../messaging/QueuedMessageEntity';

export interface DatabaseConfig {
  host: string;
  port: number;
  username: string;
  password: string;
  database: string;
  synchronize?: boolean;
  logging?: boolean;
}

export type EntityClass = Function | EntitySchema;

/** Entities every service's own database carries. */
export const LOCAL_PIPELINE_ENTITIES: EntityClass[] = [OutboxEvent, ConsumedEvent];

/** Entities of the shared broker database. */
export const BROKER_ENTITIES: EntityClass[] = [QueuedMessageEntity, DeadLetterEvent];

export const dataSourceOptions = (config: DatabaseConfig, entities: EntityClass[]): DataSourceOptions => ({
  type: 'postgres',
  host: config.host,
  port: config.port,
  username: config.username,
  password: config.password,
  database: config.database,
  entities,
  synchronize: config.synchronize || false,
  logging: config.logging || false,
});

/** The broker database: queued messages and dead letters. */
export const createBrokerDataSource = (config: DatabaseConfig): DataSource =>
  new DataSource(dataSourceOptions(config, BROKER_ENTITIES));

export { DataSource };
export * from './InMemoryDatabase';
export * from './UnitOfWork';
