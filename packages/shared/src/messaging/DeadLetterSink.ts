import { v4 as uuidv4 } from 'uuid';
import { EntityManager, In, LessThan, Repository } from 'typeorm';
import type { ErrorInfo } from '../errors';
import { DeadLetterErrorType, DeadLetterEvent, DeadLetterStatus } from '../events/DeadLetterEvent';
import { EventEnvelope, toStoredEnvelope } from '../events/EventEnvelope';

export interface DeadLetterRecord {
  id: string;
  messageId: string;
  queueName: string;
  consumerGroup: string | null;
  eventId: string;
  eventType: string;
  routingKey: string;
  correlationId: string;
  envelope: EventEnvelope;
  attempts: number;
  errorType: DeadLetterErrorType;
  lastError: ErrorInfo | null;
  status: DeadLetterStatus;
  replayCount: number;
  deadLetteredAt: Date;
  replayedAt: Date | null;
  replayedBy: string | null;
  resolvedAt: Date | null;
}

export interface NewDeadLetter {
  messageId: string;
  queueName: string;
  consumerGroup: string | null;
  envelope: EventEnvelope;
  attempts: number;
  errorType: DeadLetterErrorType;
  lastError: ErrorInfo | null;
  deadLetteredAt: Date;
}

export interface DeadLetterFilter {
  queueName?: string;
  status?: DeadLetterStatus;
  eventId?: string;
  limit?: number;
  offset?: number;
}

export type DeadLetterCounts = Record<DeadLetterStatus, number> & { total: number };

/** Read and resolve side of the dead-letter store. Queue stores do the writing. */
export interface DeadLetterSink {
  list(filter?: DeadLetterFilter): Promise<DeadLetterRecord[]>;
  get(id: string): Promise<DeadLetterRecord | null>;
  /** Moves a pending entry to `replayed`. Null when the entry is missing or no longer pending. */
  markReplayed(id: string, operator: string, at: Date): Promise<DeadLetterRecord | null>;
  /** Undoes a replay whose redelivery failed. */
  reopen(id: string): Promise<void>;
  markDiscarded(id: string, operator: string, at: Date): Promise<DeadLetterRecord | null>;
  countReplays(queueName: string, eventId: string): Promise<number>;
  countByStatus(): Promise<DeadLetterCounts>;
  purgeResolved(before: Date): Promise<number>;
}

const DEFAULT_LIST_LIMIT = 50;

const emptyCounts = (): DeadLetterCounts => ({ pending: 0, replayed: 0, discarded: 0, total: 0 });

const toRecord = (entry: NewDeadLetter, id: string): DeadLetterRecord => ({
  id,
  messageId: entry.messageId,
  queueName: entry.queueName,
  consumerGroup: entry.consumerGroup,
  eventId: entry.envelope.eventId,
  eventType: entry.envelope.eventType,
  routingKey: entry.envelope.routingKey,
  correlationId: entry.envelope.correlationId,
  envelope: entry.envelope,
  attempts: entry.attempts,
  errorType: entry.errorType,
  lastError: entry.lastError,
  status: 'pending',
  replayCount: 0,
  deadLetteredAt: entry.deadLetteredAt,
  replayedAt: null,
  replayedBy: null,
  resolvedAt: null,
});

export class InMemoryDeadLetterSink implements DeadLetterSink {
  private readonly records = new Map<string, DeadLetterRecord>();

  add(entry: NewDeadLetter): DeadLetterRecord {
    const record = toRecord(entry, uuidv4());
    this.records.set(record.id, record);
    return { ...record };
  }

  async list(filter: DeadLetterFilter = {}): Promise<DeadLetterRecord[]> {
    const offset = filter.offset ?? 0;
    return [...this.records.values()]
      .filter(
        (record) =>
          (!filter.queueName || record.queueName === filter.queueName) &&
          (!filter.status || record.status === filter.status) &&
          (!filter.eventId || record.eventId === filter.eventId)
      )
      .sort((a, b) => b.deadLetteredAt.getTime() - a.deadLetteredAt.getTime())
      .slice(offset, offset + (filter.limit ?? DEFAULT_LIST_LIMIT))
      .map((record) => ({ ...record }));
  }

  async get(id: string): Promise<DeadLetterRecord | null> {
    const record = this.records.get(id);
    return record ? { ...record } : null;
  }

  async markReplayed(id: string, operator: string, at: Date): Promise<DeadLetterRecord | null> {
    const record = this.records.get(id);
    if (!record || record.status !== 'pending') return null;
    const updated: DeadLetterRecord = {
      ...record,
      status: 'replayed',
      replayCount: record.replayCount + 1,
      replayedAt: at,
      replayedBy: operator,
      resolvedAt: at,
    };
    this.records.set(id, updated);
    return { ...updated };
  }

  async reopen(id: string): Promise<void> {
    const record = this.records.get(id);
    if (!record || record.status !== 'replayed') return;
    this.records.set(id, {
      ...record,
      status: 'pending',
      replayCount: record.replayCount - 1,
      replayedAt: null,
      replayedBy: null,
      resolvedAt: null,
    });
  }

  async markDiscarded(id: string, operator: string, at: Date): Promise<DeadLetterRecord | null> {
    const record = this.records.get(id);
    if (!record || record.status !== 'pending') return null;
    const updated: DeadLetterRecord = { ...record, status: 'discarded', replayedBy: operator, resolvedAt: at };
    this.records.set(id, updated);
    return { ...updated };
  }

  async countReplays(queueName: string, eventId: string): Promise<number> {
    let replays = 0;
    for (const record of this.records.values()) {
      if (record.queueName === queueName && record.eventId === eventId) {
        replays += record.replayCount;
      }
    }
    return replays;
  }

  async countByStatus(): Promise<DeadLetterCounts> {
    const counts = emptyCounts();
    for (const record of this.records.values()) {
      counts[record.status]++;
      counts.total++;
    }
    return counts;
  }

  async purgeResolved(before: Date): Promise<number> {
    let purged = 0;
    for (const record of [...this.records.values()]) {
      if (record.status !== 'pending' && record.resolvedAt && record.resolvedAt < before) {
        this.records.delete(record.id);
        purged++;
      }
    }
    return purged;
  }
}

export const deadLetterEntity = (repo: Repository<DeadLetterEvent>, entry: NewDeadLetter): DeadLetterEvent =>
  repo.create({
    messageId: entry.messageId,
    queueName: entry.queueName,
    consumerGroup: entry.consumerGroup,
    eventId: entry.envelope.eventId,
    eventType: entry.envelope.eventType,
    routingKey: entry.envelope.routingKey,
    correlationId: entry.envelope.correlationId,
    envelope: toStoredEnvelope(entry.envelope),
    attempts: entry.attempts,
    errorType: entry.errorType,
    errorCode: entry.lastError?.code ?? null,
    errorMessage: entry.lastError?.message ?? null,
    errorStack: entry.lastError?.stack ?? null,
    status: 'pending',
    replayCount: 0,
    deadLetteredAt: entry.deadLetteredAt,
  });

const fromEntity = (row: DeadLetterEvent): DeadLetterRecord => ({
  id: row.id,
  messageId: row.messageId,
  queueName: row.queueName,
  consumerGroup: row.consumerGroup,
  eventId: row.eventId,
  eventType: row.eventType,
  routingKey: row.routingKey,
  correlationId: row.correlationId,
  envelope: row.envelope,
  attempts: row.attempts,
  errorType: row.errorType,
  lastError:
    row.errorMessage !== null
      ? {
          name: 'Error',
          message: row.errorMessage,
          code: row.errorCode ?? 'UNCLASSIFIED',
          ...(row.errorStack ? { stack: row.errorStack } : {}),
        }
      : null,
  status: row.status,
  replayCount: row.replayCount,
  deadLetteredAt: row.deadLetteredAt,
  replayedAt: row.replayedAt,
  replayedBy: row.replayedBy,
  resolvedAt: row.resolvedAt,
});

export class TypeOrmDeadLetterSink implements DeadLetterSink {
  private readonly repo: Repository<DeadLetterEvent>;

  constructor(manager: EntityManager) {
    this.repo = manager.getRepository(DeadLetterEvent);
  }

  async list(filter: DeadLetterFilter = {}): Promise<DeadLetterRecord[]> {
    const rows = await this.repo.find({
      where: {
        ...(filter.queueName ? { queueName: filter.queueName } : {}),
        ...(filter.status ? { status: filter.status } : {}),
        ...(filter.eventId ? { eventId: filter.eventId } : {}),
      },
      order: { deadLetteredAt: 'DESC' },
      skip: filter.offset ?? 0,
      take: filter.limit ?? DEFAULT_LIST_LIMIT,
    });
    return rows.map(fromEntity);
  }

  async get(id: string): Promise<DeadLetterRecord | null> {
    const row = await this.repo.findOne({ where: { id } });
    return row ? fromEntity(row) : null;
  }

  async markReplayed(id: string, operator: string, at: Date): Promise<DeadLetterRecord | null> {
    const result = await this.repo.update(
      { id, status: 'pending' },
      {
        status: 'replayed',
        replayCount: () => '"replay_count" + 1',
        replayedAt: at,
        replayedBy: operator,
        resolvedAt: at,
      }
    );
    if ((result.affected ?? 0) === 0) return null;
    return this.get(id);
  }

  async reopen(id: string): Promise<void> {
    await this.repo.update(
      { id, status: 'replayed' },
      {
        status: 'pending',
        replayCount: () => '"replay_count" - 1',
        replayedAt: null,
        replayedBy: null,
        resolvedAt: null,
      }
    );
  }

  async markDiscarded(id: string, operator: string, at: Date): Promise<DeadLetterRecord | null> {
    const result = await this.repo.update(
      { id, status: 'pending' },
      { status: 'discarded', replayedBy: operator, resolvedAt: at }
    );
    if ((result.affected ?? 0) === 0) return null;
    return this.get(id);
  }

  async countReplays(queueName: string, eventId: string): Promise<number> {
    const replays = await this.repo.sum('replayCount', { queueName, eventId });
    return replays ?? 0;
  }

  async countByStatus(): Promise<DeadLetterCounts> {
    const rows: Array<{ status: string; count: string }> = await this.repo
      .createQueryBuilder('dlq')
      .select('dlq.status', 'status')
      .addSelect('COUNT(*)', 'count')
      .groupBy('dlq.status')
      .getRawMany();

    const counts = emptyCounts();
    for (const row of rows) {
      const count = parseInt(row.count, 10);
      if (row.status === 'pending' || row.status === 'replayed' || row.status === 'discarded') {
        counts[row.status] = count;
      }
      counts.total += count;
    }
    return counts;
  }

  async purgeResolved(before: Date): Promise<number> {
    const result = await this.repo.delete({
      status: In<DeadLetterStatus>(['replayed', 'discarded']),
      resolvedAt: LessThan(before),
    });
    return result.affected ?? 0;
  }
}
