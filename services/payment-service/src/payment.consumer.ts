import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { PipelineHost, UnitOfWork } from '@orderflow/shared';
import { CONSUMER_GROUP, ORDERS_QUEUE, PAYMENT_GATEWAY, PAYMENT_UNIT_OF_WORK } from './constants';
import type { PaymentGateway } from './gateway/payment-gateway';
import { PaymentHandler } from './payment.handler';
import type { PaymentScope } from './payments.repository';

@Injectable()
export class PaymentConsumer implements OnModuleInit {
  constructor(
    private readonly host: PipelineHost,
    @Inject(PAYMENT_UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork<PaymentScope>,
    @Inject(PAYMENT_GATEWAY) private readonly gateway: PaymentGateway
  ) {}

  onModuleInit(): void {
    const handler = new PaymentHandler({
      pipeline: this.host.pipeline,
      unitOfWork: this.unitOfWork,
      gateway: this.gateway,
      gatewayTimeoutMs: this.host.config.paymentGatewayTimeoutMs,
    });
    this.host.consume({ queueName: ORDERS_QUEUE, consumerGroup: CONSUMER_GROUP, handler: handler.handle });
  }
}
