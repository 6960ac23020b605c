export type ErrorClassification = 'transient' | 'permanent';

export interface ErrorInfo {
  name: string;
  message: string;
  code: string;
  stack?: string;
}

/**
 * Base class for every error the pipeline raises on purpose. `retryable`
 * drives the consumer runtime's ack/nack decision.
 */
export abstract class PipelineError extends Error {
  abstract readonly code: string;
  abstract readonly retryable: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network timeouts, downstream 5xx, lock contention. */
export class TransientError extends PipelineError {
  readonly code: string = 'TRANSIENT';
  readonly retryable = true;
}

/**
 * The external side effect may or may not have happened (e.g. a gateway
 * timeout). Retried; the external system's own idempotency key reconciles it.
 */
export class AmbiguousOutcomeError extends TransientError {
  readonly code = 'AMBIGUOUS_OUTCOME';
}

export class HandlerTimeoutError extends TransientError {
  readonly code = 'HANDLER_TIMEOUT';

  constructor(readonly timeoutMs: number) {
    super(`Handler exceeded ${timeoutMs}ms`);
  }
}

/** Poison messages and irrecoverable business-rule violations. */
export class PermanentError extends PipelineError {
  readonly code: string = 'PERMANENT';
  readonly retryable = false;
}

export class PayloadValidationError extends PermanentError {
  readonly code = 'PAYLOAD_INVALID';

  constructor(
    readonly eventType: string,
    readonly issues: string[],
  ) {
    super(`Invalid ${eventType} payload: ${issues.join('; ')}`);
  }
}

export class UnknownEventTypeError extends PermanentError {
  readonly code = 'UNKNOWN_EVENT_TYPE';

  constructor(
    readonly eventType: string,
    readonly eventVersion: number,
  ) {
    super(`No schema registered for ${eventType} v${eventVersion}`);
  }
}

export class InvalidRoutingKeyError extends PermanentError {
  readonly code = 'INVALID_ROUTING_KEY';

  constructor(readonly routingKey: string) {
    super(`Invalid routing key "${routingKey}"`);
  }
}

/** Raised by a ledger when `(consumerGroup, eventId)` is already recorded. */
export class DuplicateEventError extends PipelineError {
  readonly code = 'DUPLICATE_EVENT';
  readonly retryable = false;

  constructor(
    readonly consumerGroup: string,
    readonly eventId: string,
  ) {
    super(`Event ${eventId} already processed by ${consumerGroup}`);
  }
}

export class BrokerUnavailableError extends PipelineError {
  readonly code = 'BROKER_UNAVAILABLE';
  readonly retryable = true;
}

export class ConfigurationError extends PipelineError {
  readonly code = 'CONFIGURATION';
  readonly retryable = false;
}

export class DeadLetterNotFoundError extends PipelineError {
  readonly code = 'DEAD_LETTER_NOT_FOUND';
  readonly retryable = false;

  constructor(readonly deadLetterId: string) {
    super(`Dead letter ${deadLetterId} not found`);
  }
}

export class ReplayRejectedError extends PipelineError {
  readonly code = 'REPLAY_REJECTED';
  readonly retryable = false;
}

export const classifyError = (error: unknown): ErrorClassification => {
  if (error instanceof PipelineError) {
    return error.retryable ? 'transient' : 'permanent';
  }
  // Unclassified failures get the retry budget before dead-lettering.
  return 'transient';
};

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const toErrorInfo = (error: unknown): ErrorInfo => {
  const err = toError(error);
  return {
    name: err.name,
    message: err.message,
    code: error instanceof PipelineError ? error.code : 'UNCLASSIFIED',
    stack: err.stack,
  };
};
