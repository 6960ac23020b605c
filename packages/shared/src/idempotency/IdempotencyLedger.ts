import { EntityManager, LessThan, QueryFailedError, Repository } from 'typeorm';
import { InMemoryDatabase, InMemoryTable } from '../database/InMemoryDatabase';
import type { UnitOfWork } from '../database/UnitOfWork';
import { DuplicateEventError } from '../errors';
import { ConsumedEvent } from '../events/ConsumedEvent';
import type { EventEnvelope } from '../events/EventEnvelope';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';

export interface LedgerEntry {
  consumerGroup: string;
  eventId: string;
  eventType: string;
  outcome: string;
  processedAt: Date;
}

/**
 * Record of which events a consumer group has already applied. Unique on
 * `(consumerGroup, eventId)`; recording a pair twice throws
 * DuplicateEventError.
 */
export interface IdempotencyLedger {
  alreadyProcessed(consumerGroup: string, eventId: string): Promise<boolean>;
  recordProcessed(consumerGroup: string, eventId: string, outcome: string, eventType?: string): Promise<void>;
}

export interface LedgerRetention {
  purgeOlderThan(cutoff: Date): Promise<number>;
}

export type IdempotentResult<T> = { status: 'processed'; result: T } | { status: 'duplicate' };

/**
 * Runs the ledger check, `work` and the ledger record in one transaction of
 * `unitOfWork`. A concurrent delivery that records first makes this one
 * roll back and report a duplicate.
 */
export const runIdempotent = async <S extends { ledger: IdempotencyLedger }, T>(
  unitOfWork: UnitOfWork<S>,
  consumerGroup: string,
  envelope: Pick<EventEnvelope, 'eventId' | 'eventType'>,
  work: (scope: S) => Promise<T>,
  describe: (result: T) => string = () => 'processed'
): Promise<IdempotentResult<T>> => {
  try {
    return await unitOfWork.transaction(async (scope): Promise<IdempotentResult<T>> => {
      if (await scope.ledger.alreadyProcessed(consumerGroup, envelope.eventId)) {
        return { status: 'duplicate' };
      }
      const result = await work(scope);
      await scope.ledger.recordProcessed(consumerGroup, envelope.eventId, describe(result), envelope.eventType);
      return { status: 'processed', result };
    });
  } catch (error) {
    if (error instanceof DuplicateEventError) {
      return { status: 'duplicate' };
    }
    throw error;
  }
};

const ledgerKey = (consumerGroup: string, eventId: string): string => `${consumerGroup}\u0000${eventId}`;

export class InMemoryLedger implements IdempotencyLedger, LedgerRetention {
  readonly table: InMemoryTable<LedgerEntry>;

  constructor(
    private readonly database: InMemoryDatabase,
    private readonly clock: Clock = systemClock
  ) {
    this.table = new InMemoryTable<LedgerEntry>(database);
  }

  async alreadyProcessed(consumerGroup: string, eventId: string): Promise<boolean> {
    return this.table.has(ledgerKey(consumerGroup, eventId));
  }

  async recordProcessed(consumerGroup: string, eventId: string, outcome: string, eventType = 'unknown'): Promise<void> {
    const key = ledgerKey(consumerGroup, eventId);
    if (this.table.has(key)) {
      throw new DuplicateEventError(consumerGroup, eventId);
    }
    this.table.set(key, { consumerGroup, eventId, eventType, outcome, processedAt: this.clock.now() });
  }

  entries(consumerGroup?: string): LedgerEntry[] {
    return this.table.values().filter((entry) => !consumerGroup || entry.consumerGroup === consumerGroup);
  }

  purgeOlderThan(cutoff: Date): Promise<number> {
    return this.database.transaction(async () => {
      let purged = 0;
      for (const entry of this.table.values()) {
        if (entry.processedAt < cutoff) {
          this.table.delete(ledgerKey(entry.consumerGroup, entry.eventId));
          purged++;
        }
      }
      return purged;
    });
  }
}

const UNIQUE_VIOLATION = '23505';

export const isUniqueViolation = (error: unknown): boolean => {
  if (!(error instanceof QueryFailedError)) return false;
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === 'object' &&
    driverError !== null &&
    'code' in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
};

/** `consumed_events` table; build it from the transaction's EntityManager. */
export class TypeOrmLedger implements IdempotencyLedger, LedgerRetention {
  private readonly repo: Repository<ConsumedEvent>;

  constructor(
    manager: EntityManager,
    private readonly clock: Clock = systemClock
  ) {
    this.repo = manager.getRepository(ConsumedEvent);
  }

  async alreadyProcessed(consumerGroup: string, eventId: string): Promise<boolean> {
    const count = await this.repo.count({ where: { consumerGroup, eventId } });
    return count > 0;
  }

  async recordProcessed(consumerGroup: string, eventId: string, outcome: string, eventType = 'unknown'): Promise<void> {
    try {
      await this.repo.insert({ consumerGroup, eventId, eventType, outcome, processedAt: this.clock.now() });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new DuplicateEventError(consumerGroup, eventId);
      }
      throw error;
    }
  }

  async purgeOlderThan(cutoff: Date): Promise<number> {
    const result = await this.repo.delete({ processedAt: LessThan(cutoff) });
    return result.affected ?? 0;
  }
}
