import { ErrorInfo, TransientError } from '../errors';
import { InMemoryDeadLetterSink, NewDeadLetter } from './DeadLetterSink';
import type { ClaimRequest, NewQueuedMessage, QueuedMessage, QueueStats, QueueStore } from './DurableQueue';

export class QueueStoreUnavailableError extends TransientError {
  readonly code = 'QUEUE_STORE_UNAVAILABLE';
}

/**
 * Single-process queue store. Map insertion order is enqueue order, which
 * is what partition ordering follows.
 */
export class InMemoryQueueStore implements QueueStore {
  private readonly messages = new Map<string, QueuedMessage>();
  private available = true;

  constructor(readonly deadLetters: InMemoryDeadLetterSink = new InMemoryDeadLetterSink()) {}

  /** While unavailable every operation rejects, like a lost connection. */
  setAvailable(available: boolean): void {
    this.available = available;
  }

  async insert(messages: NewQueuedMessage[]): Promise<void> {
    this.assertAvailable();
    for (const message of messages) {
      this.messages.set(message.id, { ...message, attempts: 0, leaseToken: null, lastError: null });
    }
  }

  async claimNext(request: ClaimRequest): Promise<QueuedMessage | null> {
    this.assertAvailable();
    const blocked = new Set<string>();

    for (const message of this.messages.values()) {
      if (message.queueName !== request.queueName) continue;
      if (request.orderedByPartition && blocked.has(message.partitionKey)) continue;

      if (message.visibleAt.getTime() <= request.now.getTime()) {
        const claimed: QueuedMessage = {
          ...message,
          attempts: message.attempts + 1,
          leaseToken: request.leaseToken,
          visibleAt: request.leaseExpiresAt,
        };
        this.messages.set(message.id, claimed);
        return { ...claimed };
      }
      blocked.add(message.partitionKey);
    }
    return null;
  }

  async remove(messageId: string, leaseToken: string): Promise<boolean> {
    this.assertAvailable();
    if (!this.holdsLease(messageId, leaseToken)) return false;
    return this.messages.delete(messageId);
  }

  async release(messageId: string, leaseToken: string, visibleAt: Date, lastError: ErrorInfo | null): Promise<boolean> {
    this.assertAvailable();
    const message = this.messages.get(messageId);
    if (!message || message.leaseToken !== leaseToken) return false;
    this.messages.set(messageId, {
      ...message,
      leaseToken: null,
      visibleAt,
      lastError: lastError ?? message.lastError,
    });
    return true;
  }

  async deadLetter(messageId: string, leaseToken: string, entry: NewDeadLetter): Promise<boolean> {
    this.assertAvailable();
    if (!this.holdsLease(messageId, leaseToken)) return false;
    this.deadLetters.add(entry);
    this.messages.delete(messageId);
    return true;
  }

  async stats(queueName: string, now: Date): Promise<QueueStats> {
    this.assertAvailable();
    const stats: QueueStats = { queueName, ready: 0, inFlight: 0, delayed: 0, total: 0, oldestEnqueuedAt: null };
    for (const message of this.messages.values()) {
      if (message.queueName !== queueName) continue;
      stats.total++;
      if (message.visibleAt.getTime() <= now.getTime()) {
        stats.ready++;
      } else if (message.leaseToken) {
        stats.inFlight++;
      } else {
        stats.delayed++;
      }
      if (!stats.oldestEnqueuedAt || message.enqueuedAt < stats.oldestEnqueuedAt) {
        stats.oldestEnqueuedAt = message.enqueuedAt;
      }
    }
    return stats;
  }

  async queueNames(): Promise<string[]> {
    this.assertAvailable();
    return [...new Set([...this.messages.values()].map((message) => message.queueName))];
  }

  async ping(): Promise<void> {
    this.assertAvailable();
  }

  /** Copies of the messages currently held for `queueName`, in enqueue order. */
  snapshot(queueName: string): QueuedMessage[] {
    return [...this.messages.values()]
      .filter((message) => message.queueName === queueName)
      .map((message) => ({ ...message }));
  }

  private holdsLease(messageId: string, leaseToken: string): boolean {
    return this.messages.get(messageId)?.leaseToken === leaseToken;
  }

  private assertAvailable(): void {
    if (!this.available) {
      throw new QueueStoreUnavailableError('Queue store unavailable');
    }
  }
}
