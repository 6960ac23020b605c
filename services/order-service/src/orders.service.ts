import { Inject, Injectable } from '@nestjs/common';
import { z } from 'zod';
import {
  DECIMAL_AMOUNT,
  formatCents,
  MAX_AMOUNT_CENTS,
  OrderItemSchema,
  PipelineScope,
  toCents,
  UnitOfWork,
} from '@orderflow/shared';
import { ORDER_UNIT_OF_WORK } from './constants';
import { Order } from './entities/Order';
import type { OrderRepository } from './orders.repository';

export type OrderScope = PipelineScope & { orders: OrderRepository };

const itemsTotalCents = (items: z.infer<typeof OrderItemSchema>[]): number =>
  items.reduce((sum, item) => sum + toCents(item.unitPrice) * item.quantity, 0);

/**
 * Body of `POST /orders`. The amount is derived from the items when there
 * are any; a stated amount must then agree with it.
 */
export const createOrderSchema = z
  .object({
    userId: z.number().int().positive(),
    customerEmail: z.string().email(),
    amount: z.string().regex(DECIMAL_AMOUNT, 'must be a decimal string of at most 9999999999.99').optional(),
    currency: z.string().length(3).toUpperCase().default('USD'),
    items: z.array(OrderItemSchema).default([]),
  })
  .transform((body, ctx) => {
    const totalCents = body.items.length > 0 ? itemsTotalCents(body.items) : undefined;
    if (totalCents !== undefined && totalCents > MAX_AMOUNT_CENTS) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['items'], message: 'Total exceeds 9999999999.99' });
      return z.NEVER;
    }
    const total = totalCents === undefined ? undefined : formatCents(totalCents);
    const amount = total ?? body.amount;
    if (amount === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: 'Required when items is empty' });
      return z.NEVER;
    }
    if (total !== undefined && body.amount !== undefined && toCents(body.amount) !== toCents(total)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['amount'], message: `Does not match items total ${total}` });
      return z.NEVER;
    }
    return { ...body, amount };
  });

export type CreateOrderRequest = z.output<typeof createOrderSchema>;

@Injectable()
export class OrdersService {
  constructor(@Inject(ORDER_UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork<OrderScope>) {}

  /** Stores the order and its `order.created` event in one transaction. */
  createOrder(request: CreateOrderRequest, correlationId: string): Promise<{ order: Order; eventId: string }> {
    return this.unitOfWork.transaction(async ({ orders, outbox }) => {
      const order = await orders.create({ ...request, correlationId });
      const eventId = await outbox.publish({
        eventType: 'order.created',
        correlationId,
        payload: {
          orderId: order.orderId,
          userId: order.userId,
          customerEmail: order.customerEmail,
          amount: order.amount,
          currency: order.currency,
          items: order.items,
        },
      });
      return { order, eventId };
    });
  }

  getOrder(orderId: number): Promise<Order | null> {
    return this.unitOfWork.transaction(({ orders }) => orders.findById(orderId));
  }
}
