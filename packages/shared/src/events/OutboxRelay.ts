import { PermanentError, toError } from '../errors';
import type { EventPublisher } from '../messaging/EventPublisher';
import type { RetryPolicy } from '../messaging/RetryPolicy';
import type { Logger } from '../observability/logger';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import type { OutboxReader, OutboxRecord } from './OutboxStore';

export interface OutboxRelayConfig {
  reader: OutboxReader;
  publisher: EventPublisher;
  /** Backoff between forwarding attempts of one row; its attempt budget is ignored. */
  backoff: RetryPolicy;
  pollIntervalMs: number;
  batchSize: number;
  clock?: Clock;
}

export interface RelayBatchResult {
  forwarded: number;
  retried: number;
  failed: number;
}

/**
 * Forwards committed outbox rows to the broker. A row stays pending until the
 * broker accepts it, so a crash between commit and forward only delays it.
 */
export class OutboxRelay {
  private readonly config: OutboxRelayConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private isRunning = false;
  private timer: NodeJS.Timeout | null = null;
  private inFlight: Promise<void> | null = null;

  constructor(config: OutboxRelayConfig, logger: Logger) {
    this.config = config;
    this.clock = config.clock ?? systemClock;
    this.logger = logger.child({ component: 'OutboxRelay' });
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.schedule(0);
    this.logger.info('Outbox relay started', {
      pollIntervalMs: this.config.pollIntervalMs,
      batchSize: this.config.batchSize,
    });
  }

  async stop(): Promise<void> {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    await this.inFlight;
    this.logger.info('Outbox relay stopped');
  }

  /** One polling pass over due rows. */
  async runOnce(): Promise<RelayBatchResult> {
    const result: RelayBatchResult = { forwarded: 0, retried: 0, failed: 0 };
    const due = await this.config.reader.fetchDue(this.config.batchSize, this.clock.now());
    if (due.length === 0) return result;

    this.logger.debug(`Processing ${due.length} pending events`);

    for (const record of due) {
      const outcome = await this.forward(record);
      if (outcome === 'forwarded') {
        result.forwarded++;
      } else if (outcome === 'failed') {
        result.failed++;
      } else {
        result.retried++;
        // The broker is refusing writes; the rest of the batch would fail too.
        break;
      }
    }

    return result;
  }

  private async forward(record: OutboxRecord): Promise<'forwarded' | 'retried' | 'failed'> {
    const { envelope } = record;
    const attemptCount = record.attemptCount + 1;

    try {
      const queues = await this.config.publisher.publishEnvelope(envelope);
      await this.config.reader.markForwarded(envelope.eventId, this.clock.now());
      this.logger.debug('Event forwarded', {
        eventId: envelope.eventId,
        routingKey: envelope.routingKey,
        queues,
      });
      return 'forwarded';
    } catch (error) {
      const err = toError(error);

      if (error instanceof PermanentError) {
        await this.config.reader.markFailed(envelope.eventId, attemptCount, err.message);
        this.logger.error('Outbox event rejected, needs operator action', error, {
          eventId: envelope.eventId,
          eventType: envelope.eventType,
        });
        return 'failed';
      }

      const delayMs = this.config.backoff.nextDelay(attemptCount);
      const nextAttemptAt = new Date(this.clock.now().getTime() + delayMs);
      await this.config.reader.scheduleRetry(envelope.eventId, attemptCount, nextAttemptAt, err.message);
      this.logger.warn('Failed to forward event, will retry', {
        eventId: envelope.eventId,
        attemptCount,
        delayMs,
        error: err.message,
      });
      return 'retried';
    }
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.inFlight = this.poll();
    }, delayMs);
  }

  private async poll(): Promise<void> {
    if (!this.isRunning) return;

    try {
      await this.runOnce();
    } catch (error) {
      this.logger.error('Error during polling', error);
    }

    if (this.isRunning) {
      this.schedule(this.config.pollIntervalMs);
    }
  }
}
