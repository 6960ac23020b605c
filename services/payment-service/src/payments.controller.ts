import { Controller, Get, Headers, Inject, NotFoundException, Param, ParseIntPipe } from '@nestjs/common';
import { ApiResponse, correlationIdFrom, ok, RequestHeaders, UnitOfWork } from '@orderflow/shared';
import { PAYMENT_UNIT_OF_WORK } from './constants';
import { Payment } from './entities/Payment';
import type { PaymentScope } from './payments.repository';

@Controller()
export class PaymentsController {
  constructor(@Inject(PAYMENT_UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork<PaymentScope>) {}

  @Get('/payments/:paymentId')
  async get(@Headers() headers: RequestHeaders, @Param('paymentId') paymentId: string): Promise<ApiResponse<Payment>> {
    const payment = await this.unitOfWork.transaction(({ payments }) => payments.findById(paymentId));
    if (!payment) {
      throw new NotFoundException(`Payment ${paymentId} not found`);
    }
    return ok(payment, correlationIdFrom(headers));
  }

  @Get('/orders/:orderId/payment')
  async forOrder(
    @Headers() headers: RequestHeaders,
    @Param('orderId', ParseIntPipe) orderId: number
  ): Promise<ApiResponse<Payment>> {
    const payment = await this.unitOfWork.transaction(({ payments }) => payments.findByOrderId(orderId));
    if (!payment) {
      throw new NotFoundException(`No payment for order ${orderId}`);
    }
    return ok(payment, correlationIdFrom(headers));
  }
}
