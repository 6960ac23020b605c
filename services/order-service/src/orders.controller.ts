import { Body, Controller, Get, Headers, NotFoundException, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiResponse, correlationIdFrom, describeIssues, failure, ok, RequestHeaders } from '@orderflow/shared';
import { Order } from './entities/Order';
import { createOrderSchema, OrdersService } from './orders.service';

export interface OrderView {
  orderId: number;
  userId: number;
  customerEmail: string;
  amount: string;
  currency: string;
  status: Order['status'];
  paymentId: string | null;
  failureReason: string | null;
  createdAt: string;
}

const toView = (order: Order): OrderView => ({
  orderId: order.orderId,
  userId: order.userId,
  customerEmail: order.customerEmail,
  amount: order.amount,
  currency: order.currency,
  status: order.status,
  paymentId: order.paymentId,
  failureReason: order.failureReason,
  createdAt: order.createdAt.toISOString(),
});

@Controller()
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post('/orders')
  async create(
    @Headers() headers: RequestHeaders,
    @Body() body: unknown
  ): Promise<ApiResponse<OrderView & { eventId: string }>> {
    const correlationId = correlationIdFrom(headers);

    const parsed = createOrderSchema.safeParse(body);
    if (!parsed.success) {
      return failure('VALIDATION_ERROR', describeIssues(parsed.error), correlationId);
    }

    const { order, eventId } = await this.ordersService.createOrder(parsed.data, correlationId);
    return ok({ ...toView(order), eventId }, correlationId);
  }

  @Get('/orders/:orderId')
  async get(
    @Headers() headers: RequestHeaders,
    @Param('orderId', ParseIntPipe) orderId: number
  ): Promise<ApiResponse<OrderView>> {
    const order = await this.ordersService.getOrder(orderId);
    if (!order) {
      throw new NotFoundException(`Order ${orderId} not found`);
    }
    return ok(toView(order), correlationIdFrom(headers));
  }
}
