import { classifyError, ErrorInfo, HandlerTimeoutError, toErrorInfo } from '../errors';
import type { Logger } from '../observability/logger';
import type { PipelineMetrics } from '../observability/metrics';
import type { Tracer } from '../observability/tracer';
import type { DecodedEnvelope, SchemaRegistry } from '../schema/SchemaRegistry';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';
import { withTimeout } from '../utils/timeout';
import type { Delivery, DurableQueue } from './DurableQueue';
import type { RetryPolicy } from './RetryPolicy';

export type MessageState = 'received' | 'processing' | 'acked' | 'nacked_requeue' | 'nacked_dead_letter';

export type TerminalState = Extract<MessageState, 'acked' | 'nacked_requeue' | 'nacked_dead_letter'>;

const TRANSITIONS: Record<MessageState, readonly MessageState[]> = {
  received: ['processing'],
  processing: ['acked', 'nacked_requeue', 'nacked_dead_letter'],
  acked: [],
  nacked_requeue: [],
  nacked_dead_letter: [],
};

/** Lifecycle of one delivery. Illegal transitions throw. */
export class DeliveryStateMachine {
  private current: MessageState = 'received';
  private readonly trail: MessageState[] = ['received'];

  get state(): MessageState {
    return this.current;
  }

  get history(): readonly MessageState[] {
    return this.trail;
  }

  transition(next: MessageState): void {
    if (!TRANSITIONS[this.current].includes(next)) {
      throw new Error(`Illegal delivery transition ${this.current} -> ${next}`);
    }
    this.current = next;
    this.trail.push(next);
  }
}

export interface HandlerContext {
  consumerGroup: string;
  queueName: string;
  attempt: number;
  signal: AbortSignal;
  logger: Logger;
}

export type EventHandler = (envelope: DecodedEnvelope, context: HandlerContext) => Promise<void>;

export interface ConsumerRuntimeOptions {
  consumerGroup: string;
  queue: DurableQueue;
  handler: EventHandler;
  registry: SchemaRegistry;
  retryPolicy: RetryPolicy;
  visibilityTimeoutMs: number;
  handlerTimeoutMs: number;
  pollIntervalMs: number;
  prefetch?: number;
  logger: Logger;
  tracer?: Tracer;
  metrics?: PipelineMetrics;
  clock?: Clock;
}

export interface ProcessResult {
  eventId: string;
  eventType: string;
  attempt: number;
  state: TerminalState;
  history: readonly MessageState[];
  /** Requeue delay chosen by the retry policy. */
  delayMs?: number;
  error?: ErrorInfo;
  /** False when the lease was lost before the outcome could be applied. */
  settled: boolean;
}

/**
 * Pulls deliveries from one queue for one consumer group and drives each
 * through the delivery state machine. Handler failures never escape: they
 * become an ack, a requeue or a dead-letter.
 */
export class ConsumerRuntime {
  readonly consumerGroup: string;
  private readonly options: ConsumerRuntimeOptions;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private running = false;
  private healthy = true;
  private workers: Promise<void>[] = [];
  private readonly wakers = new Set<() => void>();

  constructor(options: ConsumerRuntimeOptions) {
    this.options = options;
    this.consumerGroup = options.consumerGroup;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger.child({
      component: 'ConsumerRuntime',
      consumerGroup: options.consumerGroup,
      queue: options.queue.name,
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.healthy = true;

    const prefetch = Math.max(this.options.prefetch ?? 1, 1);
    this.workers = Array.from({ length: prefetch }, (_, worker) => this.work(worker));
    this.logger.info('Consumer started', { prefetch });
  }

  /** Stops polling and waits for in-flight deliveries to settle. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    for (const wake of this.wakers) wake();
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info('Consumer stopped');
  }

  /** Connected and consuming. */
  isHealthy(): boolean {
    return this.running && this.healthy;
  }

  /** Handles at most one delivery. Resolves null when the queue is empty. */
  async processNext(): Promise<ProcessResult | null> {
    const delivery = await this.options.queue.dequeue(this.options.visibilityTimeoutMs);
    if (!delivery) return null;
    return this.process(delivery);
  }

  private async process(delivery: Delivery): Promise<ProcessResult> {
    const { queue, retryPolicy, metrics } = this.options;
    const { envelope } = delivery;
    const machine = new DeliveryStateMachine();
    const log = this.logger.child({
      eventId: envelope.eventId,
      eventType: envelope.eventType,
      correlationId: envelope.correlationId,
      attempt: delivery.attempt,
    });

    machine.transition('processing');
    const startedAt = this.clock.now().getTime();

    try {
      await this.invoke(delivery, log);
    } catch (error) {
      const classification = classifyError(error);
      const errorInfo = toErrorInfo(error);
      const observe = (outcome: string) =>
        metrics?.handlerDuration.observe(
          { queue: queue.name, outcome },
          (this.clock.now().getTime() - startedAt) / 1000
        );

      if (classification === 'permanent' || retryPolicy.isExhausted(delivery.attempt)) {
        machine.transition('nacked_dead_letter');
        observe('dead_lettered');
        log.error('Delivery dead-lettered', error, { classification });
        const result = await queue.nack(delivery.token, {
          requeue: false,
          error,
          errorType: classification,
          consumerGroup: this.consumerGroup,
        });
        return this.result(delivery, machine, { error: errorInfo, settled: result.outcome !== 'stale' });
      }

      const delayMs = retryPolicy.nextDelay(delivery.attempt);
      observe('requeued');
      log.warn('Delivery failed, requeueing', { error: errorInfo.message, code: errorInfo.code, delayMs });
      const result = await queue.nack(delivery.token, {
        requeue: true,
        delayMs,
        error,
        errorType: classification,
        consumerGroup: this.consumerGroup,
      });

      // The queue may still dead-letter when its own attempt budget is spent.
      machine.transition(result.outcome === 'dead_lettered' ? 'nacked_dead_letter' : 'nacked_requeue');
      return this.result(delivery, machine, { delayMs, error: errorInfo, settled: result.outcome !== 'stale' });
    }

    machine.transition('acked');
    metrics?.handlerDuration.observe(
      { queue: queue.name, outcome: 'acked' },
      (this.clock.now().getTime() - startedAt) / 1000
    );
    const settled = await queue.ack(delivery.token);
    log.debug('Delivery acked');
    return this.result(delivery, machine, { settled });
  }

  private async invoke(delivery: Delivery, log: Logger): Promise<void> {
    const { registry, handler, handlerTimeoutMs, queue, tracer } = this.options;
    const run = async (): Promise<void> => {
      const decoded = registry.decode(delivery.envelope);
      await withTimeout(
        (signal) =>
          handler(decoded, {
            consumerGroup: this.consumerGroup,
            queueName: queue.name,
            attempt: delivery.attempt,
            signal,
            logger: log,
          }),
        handlerTimeoutMs,
        () => new HandlerTimeoutError(handlerTimeoutMs)
      );
    };

    if (!tracer) {
      await run();
      return;
    }

    await tracer.withSpan(`pipeline.consume ${delivery.envelope.eventType}`, run, {
      'messaging.consumer_group': this.consumerGroup,
      'messaging.destination': queue.name,
      'messaging.message_id': delivery.envelope.eventId,
      'pipeline.correlation_id': delivery.envelope.correlationId,
      'pipeline.attempt': delivery.attempt,
    });
  }

  private result(
    delivery: Delivery,
    machine: DeliveryStateMachine,
    extra: Pick<ProcessResult, 'settled'> & Partial<Pick<ProcessResult, 'delayMs' | 'error'>>
  ): ProcessResult {
    const state = machine.state;
    if (state !== 'acked' && state !== 'nacked_requeue' && state !== 'nacked_dead_letter') {
      throw new Error(`Delivery finished in non-terminal state ${state}`);
    }
    return {
      eventId: delivery.envelope.eventId,
      eventType: delivery.envelope.eventType,
      attempt: delivery.attempt,
      state,
      history: [...machine.history],
      ...extra,
    };
  }

  private async work(worker: number): Promise<void> {
    while (this.running) {
      try {
        const result = await this.processNext();
        this.healthy = true;
        if (!result) {
          await this.idle(this.options.pollIntervalMs);
        }
      } catch (error) {
        this.healthy = false;
        this.logger.error('Queue poll failed', error, { worker });
        await this.idle(this.options.pollIntervalMs);
      }
    }
  }

  private idle(ms: number): Promise<void> {
    if (!this.running) return Promise.resolve();
    return new Promise((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.wakers.delete(done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      this.wakers.add(done);
    });
  }
}
