import {
  AmbiguousOutcomeError,
  DecodedEnvelope,
  HandlerContext,
  PermanentError,
  Pipeline,
  UnitOfWork,
  withTimeout,
} from '@orderflow/shared';
import { CONSUMER_GROUP } from './constants';
import type { Payment } from './entities/Payment';
import { gatewayIdempotencyKey, PaymentGateway } from './gateway/payment-gateway';
import type { PaymentScope } from './payments.repository';

export interface PaymentHandlerOptions {
  pipeline: Pipeline;
  unitOfWork: UnitOfWork<PaymentScope>;
  gateway: PaymentGateway;
  gatewayTimeoutMs: number;
  consumerGroup?: string;
}

/**
 * Captures payment for `order.created`. The payment row, its outcome event
 * and the ledger entry commit together; a gateway timeout is retried under
 * the same gateway key.
 */
export class PaymentHandler {
  private readonly consumerGroup: string;

  constructor(private readonly options: PaymentHandlerOptions) {
    this.consumerGroup = options.consumerGroup ?? CONSUMER_GROUP;
  }

  handle = async (envelope: DecodedEnvelope, context: HandlerContext): Promise<void> => {
    const { event } = envelope;
    if (event.eventType !== 'order.created') {
      throw new PermanentError(`Unexpected ${event.eventType} on ${context.queueName}`);
    }
    const order = event.payload;
    const { pipeline, unitOfWork, gateway, gatewayTimeoutMs } = this.options;

    const outcome = await pipeline.idempotent(
      unitOfWork,
      this.consumerGroup,
      envelope,
      async ({ payments, outbox }): Promise<Payment> => {
        const idempotencyKey = gatewayIdempotencyKey(order.orderId);
        const result = await withTimeout(
          (timeout) =>
            gateway.capture(
              {
                idempotencyKey,
                orderId: order.orderId,
                amount: order.amount,
                currency: order.currency,
                customerEmail: order.customerEmail,
              },
              AbortSignal.any([timeout, context.signal])
            ),
          gatewayTimeoutMs,
          () => new AmbiguousOutcomeError(`Payment gateway gave no answer for order ${order.orderId} within ${gatewayTimeoutMs}ms`)
        );

        const payment = await payments.create({
          orderId: order.orderId,
          userId: order.userId,
          amount: order.amount,
          currency: order.currency,
          status: result.status === 'captured' ? 'completed' : 'declined',
          transactionId: result.status === 'captured' ? result.transactionId : null,
          declineReason: result.status === 'declined' ? result.reason : null,
          idempotencyKey,
        });

        const common = {
          paymentId: payment.paymentId,
          orderId: order.orderId,
          userId: order.userId,
          customerEmail: order.customerEmail,
          amount: order.amount,
          currency: order.currency,
        };
        const trace = { correlationId: envelope.correlationId, causationId: envelope.eventId };

        if (result.status === 'captured') {
          await outbox.publish({
            eventType: 'payment.processed',
            payload: { ...common, transactionId: result.transactionId, status: 'completed' },
            ...trace,
          });
        } else {
          await outbox.publish({ eventType: 'payment.failed', payload: { ...common, reason: result.reason }, ...trace });
        }
        return payment;
      },
      (payment) => payment.status
    );

    if (outcome.status === 'processed') {
      context.logger.info('Payment recorded', {
        orderId: order.orderId,
        paymentId: outcome.result.paymentId,
        status: outcome.result.status,
        correlationId: envelope.correlationId,
      });
    }
  };
}
