import type { PaymentProcessedV1 } from '@orderflow/shared';

export const ORDER_CONFIRMATION = 'order-confirmation';

export interface RenderedMail {
  subject: string;
  text: string;
}

export const renderOrderConfirmation = (payment: PaymentProcessedV1): RenderedMail => ({
  subject: `Order #${payment.orderId} confirmed`,
  text: [
    'Thank you for your order.',
    '',
    `Order: #${payment.orderId}`,
    `Amount charged: ${payment.amount} ${payment.currency}`,
    `Transaction: ${payment.transactionId}`,
  ].join('\n'),
});
