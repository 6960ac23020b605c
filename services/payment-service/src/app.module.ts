import { Module } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineHost, PipelineModule, TypeOrmUnitOfWork, typeOrmPipelineScope } from '@orderflow/shared';
import { PAYMENT_GATEWAY, PAYMENT_UNIT_OF_WORK, SERVICE_DEFAULTS } from './constants';
import { Payment } from './entities/Payment';
import { SimulatedPaymentGateway } from './gateway/payment-gateway';
import { PaymentConsumer } from './payment.consumer';
import { PaymentsController } from './payments.controller';
import { PaymentScope, TypeOrmPaymentRepository } from './payments.repository';

@Module({
  imports: [PipelineModule.forService({ ...SERVICE_DEFAULTS, entities: [Payment] })],
  controllers: [PaymentsController],
  providers: [
    {
      provide: PAYMENT_UNIT_OF_WORK,
      inject: [DataSource, PipelineHost],
      useFactory: (dataSource: DataSource, host: PipelineHost) =>
        new TypeOrmUnitOfWork<PaymentScope>(dataSource, (manager) => ({
          ...typeOrmPipelineScope(manager, host.pipeline.registry, host.config.serviceName, host.pipeline.clock),
          payments: new TypeOrmPaymentRepository(manager),
        })),
    },
    { provide: PAYMENT_GATEWAY, useFactory: () => new SimulatedPaymentGateway() },
    PaymentConsumer,
  ],
})
export class AppModule {}
