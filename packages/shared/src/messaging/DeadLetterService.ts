import { DeadLetterNotFoundError, ReplayRejectedError } from '../errors';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import type { DeadLetterCounts, DeadLetterFilter, DeadLetterRecord, DeadLetterSink } from './DeadLetterSink';
import type { MessageBroker } from './MessageBroker';

export interface DeadLetterServiceConfig {
  sink: DeadLetterSink;
  broker: MessageBroker;
  maxReplayCount?: number;
  metrics?: PipelineMetrics;
  clock?: Clock;
}

export interface ReplayResult {
  deadLetter: DeadLetterRecord;
  queueName: string;
  messageId: string;
}

const DEFAULT_MAX_REPLAY_COUNT = 3;

/**
 * Operator tooling over the dead-letter sink. Replays go back onto the
 * original queue with attempts reset; the consumer's idempotency ledger
 * absorbs replays of events that already went through.
 */
export class DeadLetterService {
  private readonly sink: DeadLetterSink;
  private readonly broker: MessageBroker;
  private readonly maxReplayCount: number;
  private readonly metrics?: PipelineMetrics;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: DeadLetterServiceConfig, logger: Logger) {
    this.sink = config.sink;
    this.broker = config.broker;
    this.maxReplayCount = config.maxReplayCount ?? DEFAULT_MAX_REPLAY_COUNT;
    this.metrics = config.metrics;
    this.clock = config.clock ?? systemClock;
    this.logger = logger.child({ component: 'DeadLetterService' });
  }

  list(filter: DeadLetterFilter = {}): Promise<DeadLetterRecord[]> {
    return this.sink.list(filter);
  }

  async inspect(id: string): Promise<DeadLetterRecord> {
    const record = await this.sink.get(id);
    if (!record) {
      throw new DeadLetterNotFoundError(id);
    }
    return record;
  }

  async replay(id: string, operator: string): Promise<ReplayResult> {
    const record = await this.inspect(id);
    if (record.status !== 'pending') {
      throw new ReplayRejectedError(`Dead letter ${id} is already ${record.status}`);
    }

    const previousReplays = await this.sink.countReplays(record.queueName, record.eventId);
    if (previousReplays >= this.maxReplayCount) {
      throw new ReplayRejectedError(
        `Event ${record.eventId} on ${record.queueName} was replayed ${previousReplays} times (limit ${this.maxReplayCount})`
      );
    }

    // Claim first; a concurrent replay then finds the entry resolved.
    const updated = await this.sink.markReplayed(id, operator, this.clock.now());
    if (!updated) {
      throw new ReplayRejectedError(`Dead letter ${id} was resolved while replaying`);
    }

    let messageId: string;
    try {
      messageId = await this.broker.redeliver(record.queueName, record.envelope);
    } catch (error) {
      await this.sink.reopen(id);
      throw error;
    }

    this.metrics?.deadLettersReplayed.inc({ queue: record.queueName, operator });
    this.logger.info('Dead letter replayed', {
      dlqId: id,
      eventId: record.eventId,
      queue: record.queueName,
      operator,
      replayCount: previousReplays + 1,
    });

    return { deadLetter: updated, queueName: record.queueName, messageId };
  }

  /** Replays every pending entry of a queue. Entries over the replay limit are skipped. */
  async replayAll(queueName: string, operator: string): Promise<{ replayed: number; rejected: number }> {
    const pending = await this.sink.list({ queueName, status: 'pending', limit: 1000 });
    let replayed = 0;
    let rejected = 0;

    for (const record of pending) {
      try {
        await this.replay(record.id, operator);
        replayed++;
      } catch (error) {
        if (!(error instanceof ReplayRejectedError)) throw error;
        rejected++;
        this.logger.warn('Replay rejected', { dlqId: record.id, reason: error.message });
      }
    }

    return { replayed, rejected };
  }

  async discard(id: string, operator: string): Promise<DeadLetterRecord> {
    const record = await this.inspect(id);
    if (record.status !== 'pending') {
      throw new ReplayRejectedError(`Dead letter ${id} is already ${record.status}`);
    }

    const updated = await this.sink.markDiscarded(id, operator, this.clock.now());
    if (!updated) {
      throw new ReplayRejectedError(`Dead letter ${id} was resolved while discarding`);
    }
    this.logger.info('Dead letter discarded', { dlqId: id, eventId: record.eventId, operator });
    return updated;
  }

  stats(): Promise<DeadLetterCounts> {
    return this.sink.countByStatus();
  }

  async purgeResolved(olderThan: Date): Promise<number> {
    const purged = await this.sink.purgeResolved(olderThan);
    if (purged > 0) {
      this.logger.info('Resolved dead letters purged', { purged, olderThan: olderThan.toISOString() });
    }
    return purged;
  }
}
