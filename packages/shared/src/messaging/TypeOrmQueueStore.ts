import { DataSource } from 'typeorm';
import type { ErrorInfo } from '../errors';
import { DeadLetterEvent } from '../events/DeadLetterEvent';
import { toStoredEnvelope } from '../events/EventEnvelope';
import { deadLetterEntity, NewDeadLetter } from './DeadLetterSink';
import type { ClaimRequest, NewQueuedMessage, QueuedMessage, QueueStats, QueueStore } from './DurableQueue';
import { QueuedMessageEntity } from './QueuedMessageEntity';

const toMessage = (row: QueuedMessageEntity): QueuedMessage => ({
  id: row.messageId,
  queueName: row.queueName,
  partitionKey: row.partitionKey,
  envelope: row.envelope,
  attempts: row.attempts,
  enqueuedAt: row.enqueuedAt,
  visibleAt: row.visibleAt,
  leaseToken: row.leaseToken,
  lastError: row.lastError ? { ...row.lastError } : null,
});

const persistedError = (error: ErrorInfo | null): QueuedMessageEntity['lastError'] =>
  error ? { name: error.name, message: error.message, code: error.code } : null;

interface StatsRow {
  ready: string;
  in_flight: string;
  delayed: string;
  total: string;
  oldest: Date | null;
}

/**
 * Postgres-backed queue store over the broker database. Claims take the
 * oldest visible row with `FOR UPDATE SKIP LOCKED`, so competing consumers
 * never lease the same message.
 */
export class TypeOrmQueueStore implements QueueStore {
  constructor(private readonly dataSource: DataSource) {}

  async insert(messages: NewQueuedMessage[]): Promise<void> {
    if (messages.length === 0) return;
    await this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(QueuedMessageEntity);
      await repo.insert(
        messages.map((message) =>
          repo.create({
            messageId: message.id,
            queueName: message.queueName,
            partitionKey: message.partitionKey,
            envelope: toStoredEnvelope(message.envelope),
            attempts: 0,
            enqueuedAt: message.enqueuedAt,
            visibleAt: message.visibleAt,
            leaseToken: null,
            lastError: null,
          })
        )
      );
    });
  }

  claimNext(request: ClaimRequest): Promise<QueuedMessage | null> {
    return this.dataSource.transaction(async (manager) => {
      const repo = manager.getRepository(QueuedMessageEntity);
      const query = repo
        .createQueryBuilder('m')
        .where('m.queueName = :queueName', { queueName: request.queueName })
        .andWhere('m.visibleAt <= :now', { now: request.now })
        .orderBy('m.seq', 'ASC')
        .limit(1)
        .setLock('pessimistic_write')
        .setOnLocked('skip_locked');

      if (request.orderedByPartition) {
        query.andWhere(
          'NOT EXISTS (SELECT 1 FROM queue_messages p WHERE p.queue_name = m.queue_name ' +
            'AND p.partition_key = m.partition_key AND p.seq < m.seq)'
        );
      }

      const row = await query.getOne();
      if (!row) return null;

      row.attempts += 1;
      row.leaseToken = request.leaseToken;
      row.visibleAt = request.leaseExpiresAt;
      await repo.update(
        { seq: row.seq },
        { attempts: row.attempts, leaseToken: row.leaseToken, visibleAt: row.visibleAt }
      );
      return toMessage(row);
    });
  }

  async remove(messageId: string, leaseToken: string): Promise<boolean> {
    const result = await this.dataSource.getRepository(QueuedMessageEntity).delete({ messageId, leaseToken });
    return (result.affected ?? 0) > 0;
  }

  async release(messageId: string, leaseToken: string, visibleAt: Date, lastError: ErrorInfo | null): Promise<boolean> {
    const result = await this.dataSource.getRepository(QueuedMessageEntity).update(
      { messageId, leaseToken },
      {
        leaseToken: null,
        visibleAt,
        ...(lastError ? { lastError: persistedError(lastError) } : {}),
      }
    );
    return (result.affected ?? 0) > 0;
  }

  deadLetter(messageId: string, leaseToken: string, entry: NewDeadLetter): Promise<boolean> {
    return this.dataSource.transaction(async (manager) => {
      const removed = await manager.getRepository(QueuedMessageEntity).delete({ messageId, leaseToken });
      if ((removed.affected ?? 0) === 0) return false;

      const repo = manager.getRepository(DeadLetterEvent);
      await repo.insert(deadLetterEntity(repo, entry));
      return true;
    });
  }

  async stats(queueName: string, now: Date): Promise<QueueStats> {
    const row: StatsRow | undefined = await this.dataSource
      .getRepository(QueuedMessageEntity)
      .createQueryBuilder('m')
      .select('COUNT(*) FILTER (WHERE m.visible_at <= :now)', 'ready')
      .addSelect('COUNT(*) FILTER (WHERE m.visible_at > :now AND m.lease_token IS NOT NULL)', 'in_flight')
      .addSelect('COUNT(*) FILTER (WHERE m.visible_at > :now AND m.lease_token IS NULL)', 'delayed')
      .addSelect('COUNT(*)', 'total')
      .addSelect('MIN(m.enqueued_at)', 'oldest')
      .where('m.queueName = :queueName', { queueName })
      .setParameter('now', now)
      .getRawOne();

    return {
      queueName,
      ready: parseInt(row?.ready ?? '0', 10),
      inFlight: parseInt(row?.in_flight ?? '0', 10),
      delayed: parseInt(row?.delayed ?? '0', 10),
      total: parseInt(row?.total ?? '0', 10),
      oldestEnqueuedAt: row?.oldest ?? null,
    };
  }

  async queueNames(): Promise<string[]> {
    const rows: Array<{ queue_name: string }> = await this.dataSource
      .getRepository(QueuedMessageEntity)
      .createQueryBuilder('m')
      .select('DISTINCT m.queue_name', 'queue_name')
      .getRawMany();
    return rows.map((row) => row.queue_name);
  }

  async ping(): Promise<void> {
    await this.dataSource.query('SELECT 1');
  }
}
