import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { PipelineHost, UnitOfWork } from '@orderflow/shared';
import { CONSUMER_GROUP, ORDER_UNIT_OF_WORK, PAYMENT_UPDATES_QUEUE } from './constants';
import type { OrderScope } from './orders.service';
import { PaymentUpdatesHandler } from './payment-updates.handler';

@Injectable()
export class PaymentUpdatesConsumer implements OnModuleInit {
  constructor(
    private readonly host: PipelineHost,
    @Inject(ORDER_UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork<OrderScope>
  ) {}

  onModuleInit(): void {
    const handler = new PaymentUpdatesHandler(this.host.pipeline, this.unitOfWork);
    this.host.consume({
      queueName: PAYMENT_UPDATES_QUEUE,
      consumerGroup: CONSUMER_GROUP,
      handler: handler.handle,
      orderedByPartition: true,
    });
  }
}
