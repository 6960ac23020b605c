import { Module } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineHost, PipelineModule, TypeOrmUnitOfWork, typeOrmPipelineScope } from '@orderflow/shared';
import { ORDER_UNIT_OF_WORK, SERVICE_DEFAULTS } from './constants';
import { Order } from './entities/Order';
import { OrdersController } from './orders.controller';
import { TypeOrmOrderRepository } from './orders.repository';
import { OrderScope, OrdersService } from './orders.service';
import { PaymentUpdatesConsumer } from './payment-updates.consumer';

@Module({
  imports: [PipelineModule.forService({ ...SERVICE_DEFAULTS, entities: [Order] })],
  controllers: [OrdersController],
  providers: [
    {
      provide: ORDER_UNIT_OF_WORK,
      inject: [DataSource, PipelineHost],
      useFactory: (dataSource: DataSource, host: PipelineHost) =>
        new TypeOrmUnitOfWork<OrderScope>(dataSource, (manager) => ({
          ...typeOrmPipelineScope(manager, host.pipeline.registry, host.config.serviceName, host.pipeline.clock),
          orders: new TypeOrmOrderRepository(manager),
        })),
    },
    OrdersService,
    PaymentUpdatesConsumer,
  ],
})
export class AppModule {}
