import {
  DecodedEnvelope,
  HandlerContext,
  PermanentError,
  Pipeline,
  TransientError,
  UnitOfWork,
} from '@orderflow/shared';
import { CONSUMER_GROUP } from './constants';
import type { Notification } from './entities/Notification';
import type { MailMessage, Mailer } from './mailer/mailer';
import type { NotificationScope } from './notifications.repository';
import { ORDER_CONFIRMATION, renderOrderConfirmation } from './templates/order-confirmation';

/**
 * Sends the order confirmation for `payment.processed`. Send failures are
 * always retried; exhausted ones wait in the dead-letter queue for a resend.
 */
export class NotificationHandler {
  constructor(
    private readonly pipeline: Pipeline,
    private readonly unitOfWork: UnitOfWork<NotificationScope>,
    private readonly mailer: Mailer,
    private readonly consumerGroup = CONSUMER_GROUP
  ) {}

  handle = async (envelope: DecodedEnvelope, context: HandlerContext): Promise<void> => {
    const { event } = envelope;
    if (event.eventType !== 'payment.processed') {
      throw new PermanentError(`Unexpected ${event.eventType} on ${context.queueName}`);
    }
    const payment = event.payload;

    const outcome = await this.pipeline.idempotent(
      this.unitOfWork,
      this.consumerGroup,
      envelope,
      async ({ notifications, outbox }): Promise<Notification> => {
        const mail = renderOrderConfirmation(payment);
        const sent = await this.send(
          { to: payment.customerEmail, ...mail, idempotencyKey: `${envelope.eventId}:${ORDER_CONFIRMATION}` },
          context.signal
        );

        const notification = await notifications.create({
          orderId: payment.orderId,
          sourceEventId: envelope.eventId,
          recipient: payment.customerEmail,
          template: ORDER_CONFIRMATION,
          channel: 'email',
          subject: mail.subject,
          providerMessageId: sent.messageId,
        });

        await outbox.publish({
          eventType: 'notification.sent',
          payload: {
            notificationId: notification.notificationId,
            orderId: payment.orderId,
            recipient: payment.customerEmail,
            template: ORDER_CONFIRMATION,
            channel: 'email',
          },
          correlationId: envelope.correlationId,
          causationId: envelope.eventId,
        });
        return notification;
      },
      (notification) => `sent:${notification.providerMessageId}`
    );

    if (outcome.status === 'processed') {
      context.logger.info('Order confirmation sent', {
        orderId: payment.orderId,
        notificationId: outcome.result.notificationId,
        correlationId: envelope.correlationId,
      });
    }
  };

  private async send(message: MailMessage, signal: AbortSignal): Promise<{ messageId: string }> {
    try {
      return await this.mailer.send(message, signal);
    } catch (error) {
      if (error instanceof TransientError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransientError(`Sending ${ORDER_CONFIRMATION} to ${message.to} failed: ${reason}`, { cause: error });
    }
  }
}
