import { DecodedEnvelope, HandlerContext, PermanentError, Pipeline, UnitOfWork } from '@orderflow/shared';
import { CONSUMER_GROUP } from './constants';
import type { OrderStatus } from './entities/Order';
import type { OrderScope } from './orders.service';

/**
 * Applies `payment.processed` and `payment.failed` to the order:
 * `pending_payment` moves to `paid` or `payment_failed`, once.
 */
export class PaymentUpdatesHandler {
  constructor(
    private readonly pipeline: Pipeline,
    private readonly unitOfWork: UnitOfWork<OrderScope>,
    private readonly consumerGroup = CONSUMER_GROUP
  ) {}

  handle = async (envelope: DecodedEnvelope, context: HandlerContext): Promise<void> => {
    const { event } = envelope;
    if (event.eventType !== 'payment.processed' && event.eventType !== 'payment.failed') {
      throw new PermanentError(`Unexpected ${event.eventType} on ${context.queueName}`);
    }

    const outcome = await this.pipeline.idempotent(
      this.unitOfWork,
      this.consumerGroup,
      envelope,
      async ({ orders }): Promise<OrderStatus> => {
        const order = await orders.findById(event.payload.orderId);
        if (!order) {
          throw new PermanentError(`Order ${event.payload.orderId} not found`);
        }

        const next: OrderStatus = event.eventType === 'payment.processed' ? 'paid' : 'payment_failed';
        if (order.status === next) {
          return next;
        }
        if (order.status !== 'pending_payment') {
          throw new PermanentError(`Order ${order.orderId} is ${order.status}, cannot move to ${next}`);
        }

        order.status = next;
        order.paymentId = event.payload.paymentId;
        order.failureReason = event.eventType === 'payment.failed' ? event.payload.reason : null;
        await orders.save(order);
        return next;
      },
      (status) => status
    );

    if (outcome.status === 'processed') {
      context.logger.info('Order status updated', {
        orderId: event.payload.orderId,
        status: outcome.result,
        correlationId: envelope.correlationId,
      });
    }
  };
}
