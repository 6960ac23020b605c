import { z } from 'zod';
import { DECIMAL_AMOUNT } from '../utils/money';

const decimalAmount = z
  .string()
  .regex(DECIMAL_AMOUNT, 'must be a decimal string with at most ten integer and two fraction digits');

const currency = z.string().length(3).toUpperCase();

export const OrderItemSchema = z.object({
  productId: z.number().int().positive(),
  quantity: z.number().int().positive(),
  unitPrice: decimalAmount,
});

export const OrderCreatedV1Schema = z.object({
  orderId: z.number().int().positive(),
  userId: z.number().int().positive(),
  customerEmail: z.string().email(),
  amount: decimalAmount,
  currency: currency.default('USD'),
  items: z.array(OrderItemSchema).default([]),
});

export const PaymentProcessedV1Schema = z.object({
  paymentId: z.string().min(1),
  orderId: z.number().int().positive(),
  userId: z.number().int().positive(),
  customerEmail: z.string().email(),
  amount: decimalAmount,
  currency,
  transactionId: z.string().min(1),
  status: z.literal('completed'),
});

export const PaymentFailedV1Schema = z.object({
  paymentId: z.string().min(1),
  orderId: z.number().int().positive(),
  userId: z.number().int().positive(),
  customerEmail: z.string().email(),
  amount: decimalAmount,
  currency,
  reason: z.string().min(1),
});

export const NotificationSentV1Schema = z.object({
  notificationId: z.string().min(1),
  orderId: z.number().int().positive(),
  recipient: z.string().email(),
  template: z.string().min(1),
  channel: z.enum(['email']),
});

export type OrderItem = z.infer<typeof OrderItemSchema>;
export type OrderCreatedV1 = z.infer<typeof OrderCreatedV1Schema>;
export type PaymentProcessedV1 = z.infer<typeof PaymentProcessedV1Schema>;
export type PaymentFailedV1 = z.infer<typeof PaymentFailedV1Schema>;
export type NotificationSentV1 = z.infer<typeof NotificationSentV1Schema>;

export const EventTypes = {
  ORDER_CREATED: 'order.created',
  PAYMENT_PROCESSED: 'payment.processed',
  PAYMENT_FAILED: 'payment.failed',
  NOTIFICATION_SENT: 'notification.sent',
} as const;

/** Payload type per event type, at the current schema version. */
export interface EventPayloads {
  'order.created': OrderCreatedV1;
  'payment.processed': PaymentProcessedV1;
  'payment.failed': PaymentFailedV1;
  'notification.sent': NotificationSentV1;
}

export type EventType = keyof EventPayloads;

/** Input accepted by publishers; schema defaults may be omitted. */
export interface EventPayloadInputs {
  'order.created': z.input<typeof OrderCreatedV1Schema>;
  'payment.processed': z.input<typeof PaymentProcessedV1Schema>;
  'payment.failed': z.input<typeof PaymentFailedV1Schema>;
  'notification.sent': z.input<typeof NotificationSentV1Schema>;
}

export type PipelineEvent = {
  [K in EventType]: { eventType: K; eventVersion: 1; payload: EventPayloads[K] };
}[EventType];

export const CURRENT_EVENT_VERSION = 1;

export const pipelineEventSchemas: { [K in EventType]: z.ZodType<EventPayloads[K], z.ZodTypeDef, unknown> } = {
  'order.created': OrderCreatedV1Schema,
  'payment.processed': PaymentProcessedV1Schema,
  'payment.failed': PaymentFailedV1Schema,
  'notification.sent': NotificationSentV1Schema,
};
