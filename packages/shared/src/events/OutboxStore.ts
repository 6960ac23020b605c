import { EntityManager, LessThan, LessThanOrEqual, Repository } from 'typeorm';
import { InMemoryDatabase, InMemoryTable } from '../database/InMemoryDatabase';
import { EventEnvelope, payloadObject } from './EventEnvelope';
import { OutboxEvent, OutboxStatus } from './OutboxEvent';

export interface OutboxRecord {
  envelope: EventEnvelope;
  status: OutboxStatus;
  attemptCount: number;
  nextAttemptAt: Date;
  lastError: string | null;
  forwardedAt: Date | null;
}

/** Write side, bound to the caller's transaction. */
export interface OutboxWriter {
  append(envelope: EventEnvelope): Promise<void>;
}

/** Relay side. */
export interface OutboxReader {
  fetchDue(limit: number, now: Date): Promise<OutboxRecord[]>;
  markForwarded(eventId: string, at: Date): Promise<void>;
  scheduleRetry(eventId: string, attemptCount: number, nextAttemptAt: Date, error: string): Promise<void>;
  markFailed(eventId: string, attemptCount: number, error: string): Promise<void>;
  purgeForwarded(before: Date): Promise<number>;
  countByStatus(status: OutboxStatus): Promise<number>;
}

const newRecord = (envelope: EventEnvelope): OutboxRecord => ({
  envelope,
  status: 'pending',
  attemptCount: 0,
  nextAttemptAt: new Date(envelope.occurredAt),
  lastError: null,
  forwardedAt: null,
});

export class InMemoryOutboxStore implements OutboxWriter, OutboxReader {
  readonly table: InMemoryTable<OutboxRecord>;

  constructor(private readonly database: InMemoryDatabase) {
    this.table = new InMemoryTable<OutboxRecord>(database);
  }

  // Called inside the caller's transaction; must not open another.
  async append(envelope: EventEnvelope): Promise<void> {
    this.table.set(envelope.eventId, newRecord(envelope));
  }

  async fetchDue(limit: number, now: Date): Promise<OutboxRecord[]> {
    return this.table
      .values()
      .filter((record) => record.status === 'pending' && record.nextAttemptAt.getTime() <= now.getTime())
      .sort((a, b) => Date.parse(a.envelope.occurredAt) - Date.parse(b.envelope.occurredAt))
      .slice(0, limit);
  }

  markForwarded(eventId: string, at: Date): Promise<void> {
    return this.update(eventId, { status: 'forwarded', forwardedAt: at, lastError: null });
  }

  scheduleRetry(eventId: string, attemptCount: number, nextAttemptAt: Date, error: string): Promise<void> {
    return this.update(eventId, { attemptCount, nextAttemptAt, lastError: error });
  }

  markFailed(eventId: string, attemptCount: number, error: string): Promise<void> {
    return this.update(eventId, { status: 'failed', attemptCount, lastError: error });
  }

  purgeForwarded(before: Date): Promise<number> {
    return this.database.transaction(async () => {
      let purged = 0;
      for (const record of this.table.values()) {
        if (record.status === 'forwarded' && record.forwardedAt && record.forwardedAt < before) {
          this.table.delete(record.envelope.eventId);
          purged++;
        }
      }
      return purged;
    });
  }

  async countByStatus(status: OutboxStatus): Promise<number> {
    return this.table.values().filter((record) => record.status === status).length;
  }

  private update(eventId: string, changes: Partial<OutboxRecord>): Promise<void> {
    return this.database.transaction(async () => {
      const record = this.table.get(eventId);
      if (record) {
        this.table.set(eventId, { ...record, ...changes });
      }
    });
  }
}

const toEntity = (repo: Repository<OutboxEvent>, envelope: EventEnvelope): OutboxEvent =>
  repo.create({
    eventId: envelope.eventId,
    occurredAt: new Date(envelope.occurredAt),
    routingKey: envelope.routingKey,
    eventType: envelope.eventType,
    eventVersion: envelope.eventVersion,
    producer: envelope.producer,
    correlationId: envelope.correlationId,
    causationId: envelope.causationId ?? null,
    payloadJson: payloadObject(envelope),
    status: 'pending',
    attemptCount: 0,
    nextAttemptAt: new Date(envelope.occurredAt),
    lastError: null,
    forwardedAt: null,
  });

const toRecord = (row: OutboxEvent): OutboxRecord => ({
  envelope: {
    eventId: row.eventId,
    eventType: row.eventType,
    eventVersion: row.eventVersion,
    routingKey: row.routingKey,
    occurredAt: row.occurredAt.toISOString(),
    producer: row.producer,
    correlationId: row.correlationId,
    ...(row.causationId ? { causationId: row.causationId } : {}),
    payload: row.payloadJson,
  },
  status: row.status,
  attemptCount: row.attemptCount,
  nextAttemptAt: row.nextAttemptAt,
  lastError: row.lastError,
  forwardedAt: row.forwardedAt,
});

/**
 * `outbox_events` table. Build it from the transaction's EntityManager for
 * writes, and from the data source's manager for the relay.
 */
export class TypeOrmOutboxStore implements OutboxWriter, OutboxReader {
  private readonly repo: Repository<OutboxEvent>;

  constructor(manager: EntityManager) {
    this.repo = manager.getRepository(OutboxEvent);
  }

  async append(envelope: EventEnvelope): Promise<void> {
    await this.repo.insert(toEntity(this.repo, envelope));
  }

  async fetchDue(limit: number, now: Date): Promise<OutboxRecord[]> {
    const rows = await this.repo.find({
      where: { status: 'pending', nextAttemptAt: LessThanOrEqual(now) },
      order: { occurredAt: 'ASC' },
      take: limit,
    });
    return rows.map(toRecord);
  }

  async markForwarded(eventId: string, at: Date): Promise<void> {
    await this.repo.update({ eventId }, { status: 'forwarded', forwardedAt: at, lastError: null });
  }

  async scheduleRetry(eventId: string, attemptCount: number, nextAttemptAt: Date, error: string): Promise<void> {
    await this.repo.update({ eventId }, { attemptCount, nextAttemptAt, lastError: error });
  }

  async markFailed(eventId: string, attemptCount: number, error: string): Promise<void> {
    await this.repo.update({ eventId }, { status: 'failed', attemptCount, lastError: error });
  }

  async purgeForwarded(before: Date): Promise<number> {
    const result = await this.repo.delete({ status: 'forwarded', forwardedAt: LessThan(before) });
    return result.affected ?? 0;
  }

  countByStatus(status: OutboxStatus): Promise<number> {
    return this.repo.count({ where: { status } });
  }
}
