import type { DataSource, EntityManager } from 'typeorm';
import type { InMemoryDatabase } from '../database/InMemoryDatabase';
import { OutboxPublisher } from '../events/OutboxPublisher';
import { InMemoryOutboxStore, OutboxReader, TypeOrmOutboxStore } from '../events/OutboxStore';
import {
  IdempotencyLedger,
  InMemoryLedger,
  LedgerRetention,
  TypeOrmLedger,
} from '../idempotency/IdempotencyLedger';
import type { SchemaRegistry } from '../schema/SchemaRegistry';
import type { Clock } from '../utils/clock';

/** What every consumer and command handler gets inside its local transaction. */
export interface PipelineScope {
  ledger: IdempotencyLedger;
  outbox: OutboxPublisher;
}

export const typeOrmPipelineScope = (
  manager: EntityManager,
  registry: SchemaRegistry,
  producer: string,
  clock?: Clock
): PipelineScope => ({
  ledger: new TypeOrmLedger(manager, clock),
  outbox: new OutboxPublisher(new TypeOrmOutboxStore(manager), registry, producer, clock),
});

/** The relay and retention side of a service's own database. */
export interface LocalStores {
  outboxStore: OutboxReader;
  ledger: LedgerRetention;
  ping(): Promise<void>;
}

export const typeOrmLocalStores = (dataSource: DataSource, clock?: Clock): LocalStores => ({
  outboxStore: new TypeOrmOutboxStore(dataSource.manager),
  ledger: new TypeOrmLedger(dataSource.manager, clock),
  ping: async () => {
    await dataSource.query('SELECT 1');
  },
});

/** In-memory ledger and outbox tables tracked by `database`. */
export class InMemoryPipelineStores implements LocalStores {
  readonly ledger: InMemoryLedger;
  readonly outboxStore: InMemoryOutboxStore;

  constructor(readonly database: InMemoryDatabase, clock?: Clock) {
    this.ledger = new InMemoryLedger(database, clock);
    this.outboxStore = new InMemoryOutboxStore(database);
  }

  async ping(): Promise<void> {}

  scope(registry: SchemaRegistry, producer: string, clock?: Clock): PipelineScope {
    return {
      ledger: this.ledger,
      outbox: new OutboxPublisher(this.outboxStore, registry, producer, clock),
    };
  }
}
