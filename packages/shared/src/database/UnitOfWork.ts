import type { DataSource, EntityManager } from 'typeorm';
import type { InMemoryDatabase } from './InMemoryDatabase';

/**
 * A local transaction boundary. `S` is whatever the work needs bound to the
 * transaction: repositories, the outbox, the idempotency ledger.
 */
export interface UnitOfWork<S> {
  transaction<T>(work: (scope: S) => Promise<T>): Promise<T>;
}

export class TypeOrmUnitOfWork<S> implements UnitOfWork<S> {
  constructor(
    private readonly dataSource: DataSource,
    private readonly createScope: (manager: EntityManager) => S
  ) {}

  transaction<T>(work: (scope: S) => Promise<T>): Promise<T> {
    return this.dataSource.transaction((manager) => work(this.createScope(manager)));
  }
}

export class InMemoryUnitOfWork<S> implements UnitOfWork<S> {
  constructor(
    private readonly database: InMemoryDatabase,
    private readonly scope: S
  ) {}

  transaction<T>(work: (scope: S) => Promise<T>): Promise<T> {
    return this.database.transaction(() => work(this.scope));
  }
}
