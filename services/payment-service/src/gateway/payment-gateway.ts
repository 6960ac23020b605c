import { v4 as uuidv4 } from 'uuid';
import { AmbiguousOutcomeError, toCents } from '@orderflow/shared';

export interface CaptureRequest {
  /** Gateway-side deduplication key; one per order. */
  idempotencyKey: string;
  orderId: number;
  amount: string;
  currency: string;
  customerEmail: string;
}

export type CaptureResult =
  | { status: 'captured'; transactionId: string }
  | { status: 'declined'; reason: string };

/**
 * External card processor. A decline is a result, not an error. Rejecting
 * means the outcome is unknown and the caller should retry with the same key.
 */
export interface PaymentGateway {
  capture(request: CaptureRequest, signal: AbortSignal): Promise<CaptureResult>;
}

export interface SimulatedGatewayOptions {
  /** Amounts above this many cents are declined. */
  declineAboveCents?: number;
  latencyMs?: number;
}

export const gatewayIdempotencyKey = (orderId: number): string => `order-${orderId}`;

export const newTransactionId = (): string => `TXN-${uuidv4().replace(/-/g, '').slice(0, 12).toUpperCase()}`;

/**
 * In-process stand-in for a card processor. Remembers each idempotency key,
 * so a retried capture returns the first result instead of charging twice.
 */
export class SimulatedPaymentGateway implements PaymentGateway {
  private readonly results = new Map<string, CaptureResult>();
  private readonly declineAboveCents: number;
  private readonly latencyMs: number;

  constructor(options: SimulatedGatewayOptions = {}) {
    this.declineAboveCents = options.declineAboveCents ?? 1_000_000;
    this.latencyMs = options.latencyMs ?? 0;
  }

  async capture(request: CaptureRequest, signal: AbortSignal): Promise<CaptureResult> {
    const previous = this.results.get(request.idempotencyKey);
    if (previous) return previous;

    await this.respondAfterLatency(signal);

    const result: CaptureResult =
      toCents(request.amount) > this.declineAboveCents
        ? { status: 'declined', reason: `Amount ${request.amount} ${request.currency} exceeds the card limit` }
        : { status: 'captured', transactionId: newTransactionId() };
    this.results.set(request.idempotencyKey, result);
    return result;
  }

  captures(): number {
    return this.results.size;
  }

  private respondAfterLatency(signal: AbortSignal): Promise<void> {
    if (this.latencyMs <= 0) return Promise.resolve();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(resolve, this.latencyMs);
      signal.addEventListener(
        'abort',
        () => {
          clearTimeout(timer);
          reject(new AmbiguousOutcomeError('Capture aborted before the gateway answered'));
        },
        { once: true }
      );
    });
  }
}
