import { v4 as uuidv4 } from 'uuid';
import { ConfigurationError, ErrorInfo, toErrorInfo } from '../errors';
import type { EventEnvelope } from '../events/EventEnvelope';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import type { DeadLetterErrorType } from '../events/DeadLetterEvent';
import type { NewDeadLetter } from './DeadLetterSink';

export interface QueuedMessage {
  id: string;
  queueName: string;
  partitionKey: string;
  envelope: EventEnvelope;
  /** Deliveries so far, including the one in flight. */
  attempts: number;
  enqueuedAt: Date;
  /** While leased, this is the lease expiry. */
  visibleAt: Date;
  leaseToken: string | null;
  lastError: ErrorInfo | null;
}

export interface NewQueuedMessage {
  id: string;
  queueName: string;
  partitionKey: string;
  envelope: EventEnvelope;
  enqueuedAt: Date;
  visibleAt: Date;
}

export interface ClaimRequest {
  queueName: string;
  now: Date;
  leaseToken: string;
  leaseExpiresAt: Date;
  /** Only the oldest message of each partition key may be claimed. */
  orderedByPartition: boolean;
}

export interface QueueStats {
  queueName: string;
  ready: number;
  inFlight: number;
  delayed: number;
  total: number;
  oldestEnqueuedAt: Date | null;
}

/**
 * Persistence behind every durable queue. Lease checks are conditional on
 * the lease token, so a consumer whose lease expired cannot ack or nack a
 * message that has since been handed to someone else.
 */
export interface QueueStore {
  /** Inserts all messages or none. */
  insert(messages: NewQueuedMessage[]): Promise<void>;
  /** Leases the next visible message and increments its attempts. */
  claimNext(request: ClaimRequest): Promise<QueuedMessage | null>;
  remove(messageId: string, leaseToken: string): Promise<boolean>;
  release(messageId: string, leaseToken: string, visibleAt: Date, lastError: ErrorInfo | null): Promise<boolean>;
  /** Writes the dead-letter entry, then removes the message. */
  deadLetter(messageId: string, leaseToken: string, entry: NewDeadLetter): Promise<boolean>;
  stats(queueName: string, now: Date): Promise<QueueStats>;
  queueNames(): Promise<string[]>;
  ping(): Promise<void>;
}

export interface AckToken {
  readonly messageId: string;
  readonly leaseToken: string;
  readonly queueName: string;
  readonly attempt: number;
  readonly envelope: EventEnvelope;
}

export interface Delivery {
  envelope: EventEnvelope;
  attempt: number;
  token: AckToken;
  enqueuedAt: Date;
  leaseExpiresAt: Date;
}

export interface NackOptions {
  requeue: boolean;
  delayMs?: number;
  error?: unknown;
  /** Recorded on the dead-letter entry; defaults from `requeue`. */
  errorType?: Exclude<DeadLetterErrorType, 'lease_expired'>;
  consumerGroup?: string;
}

export type NackResult =
  | { outcome: 'requeued'; visibleAt: Date }
  | { outcome: 'dead_lettered' }
  | { outcome: 'stale' };

export interface DurableQueueOptions {
  name: string;
  store: QueueStore;
  maxAttempts: number;
  orderedByPartition?: boolean;
  logger: Logger;
  metrics?: PipelineMetrics;
  clock?: Clock;
}

export class DurableQueue {
  readonly name: string;
  readonly maxAttempts: number;
  private readonly store: QueueStore;
  private readonly orderedByPartition: boolean;
  private readonly logger: Logger;
  private readonly metrics?: PipelineMetrics;
  private readonly clock: Clock;

  constructor(options: DurableQueueOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new ConfigurationError(`Queue ${options.name}: maxAttempts must be a positive integer`);
    }
    this.name = options.name;
    this.maxAttempts = options.maxAttempts;
    this.store = options.store;
    this.orderedByPartition = options.orderedByPartition ?? false;
    this.logger = options.logger.child({ component: 'DurableQueue', queue: options.name });
    this.metrics = options.metrics;
    this.clock = options.clock ?? systemClock;
  }

  /** Enqueues with attempts reset to zero. Used for replay as well. */
  async enqueue(envelope: EventEnvelope, delayMs = 0): Promise<string> {
    const now = this.clock.now();
    const id = uuidv4();
    await this.store.insert([
      {
        id,
        queueName: this.name,
        partitionKey: envelope.correlationId,
        envelope,
        enqueuedAt: now,
        visibleAt: new Date(now.getTime() + delayMs),
      },
    ]);
    return id;
  }

  async dequeue(visibilityTimeoutMs: number): Promise<Delivery | null> {
    for (;;) {
      const now = this.clock.now();
      const leaseExpiresAt = new Date(now.getTime() + visibilityTimeoutMs);
      const message = await this.store.claimNext({
        queueName: this.name,
        now,
        leaseToken: uuidv4(),
        leaseExpiresAt,
        orderedByPartition: this.orderedByPartition,
      });
      if (!message || !message.leaseToken) return null;

      const token: AckToken = {
        messageId: message.id,
        leaseToken: message.leaseToken,
        queueName: this.name,
        attempt: message.attempts,
        envelope: message.envelope,
      };

      // Claimed again after its last lease ran out with no deliveries left.
      if (message.attempts > this.maxAttempts) {
        await this.moveToDeadLetter(token, {
          attempts: message.attempts - 1,
          errorType: 'lease_expired',
          lastError: message.lastError ?? {
            name: 'LeaseExpired',
            message: `Visibility timeout expired after ${message.attempts - 1} deliveries`,
            code: 'LEASE_EXPIRED',
          },
          consumerGroup: null,
        });
        continue;
      }

      return {
        envelope: message.envelope,
        attempt: message.attempts,
        token,
        enqueuedAt: message.enqueuedAt,
        leaseExpiresAt,
      };
    }
  }

  /** False when the lease was lost; nothing changes in that case. */
  async ack(token: AckToken): Promise<boolean> {
    const removed = await this.store.remove(token.messageId, token.leaseToken);
    if (removed) {
      this.metrics?.messagesAcked.inc({ queue: this.name });
    } else {
      this.logger.warn('Ack with stale lease ignored', { messageId: token.messageId, eventId: token.envelope.eventId });
    }
    return removed;
  }

  async nack(token: AckToken, options: NackOptions): Promise<NackResult> {
    const lastError = options.error !== undefined ? toErrorInfo(options.error) : null;

    if (!options.requeue || token.attempt >= this.maxAttempts) {
      const moved = await this.moveToDeadLetter(token, {
        attempts: token.attempt,
        errorType: options.errorType ?? (options.requeue ? 'transient' : 'permanent'),
        lastError,
        consumerGroup: options.consumerGroup ?? null,
      });
      return moved ? { outcome: 'dead_lettered' } : { outcome: 'stale' };
    }

    const visibleAt = new Date(this.clock.now().getTime() + Math.max(options.delayMs ?? 0, 0));
    const released = await this.store.release(token.messageId, token.leaseToken, visibleAt, lastError);
    if (!released) {
      this.logger.warn('Nack with stale lease ignored', { messageId: token.messageId, eventId: token.envelope.eventId });
      return { outcome: 'stale' };
    }

    this.metrics?.messagesRequeued.inc({ queue: this.name });
    return { outcome: 'requeued', visibleAt };
  }

  stats(): Promise<QueueStats> {
    return this.store.stats(this.name, this.clock.now());
  }

  private async moveToDeadLetter(
    token: AckToken,
    details: Pick<NewDeadLetter, 'attempts' | 'errorType' | 'lastError' | 'consumerGroup'>
  ): Promise<boolean> {
    const moved = await this.store.deadLetter(token.messageId, token.leaseToken, {
      messageId: token.messageId,
      queueName: this.name,
      envelope: token.envelope,
      deadLetteredAt: this.clock.now(),
      ...details,
    });

    if (!moved) {
      this.logger.warn('Dead-letter with stale lease ignored', {
        messageId: token.messageId,
        eventId: token.envelope.eventId,
      });
      return false;
    }

    this.metrics?.messagesDeadLettered.inc({ queue: this.name, error_type: details.errorType });
    this.logger.warn('Message dead-lettered', {
      messageId: token.messageId,
      eventId: token.envelope.eventId,
      eventType: token.envelope.eventType,
      correlationId: token.envelope.correlationId,
      attempts: details.attempts,
      errorType: details.errorType,
      error: details.lastError?.message,
    });
    return true;
  }
}
