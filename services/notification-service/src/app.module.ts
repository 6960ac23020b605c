import { Module } from '@nestjs/common';
import { DataSource } from 'typeorm';
import { PipelineHost, PipelineModule, TypeOrmUnitOfWork, typeOrmPipelineScope } from '@orderflow/shared';
import { MAILER, NOTIFICATION_UNIT_OF_WORK, SERVICE_DEFAULTS } from './constants';
import { Notification } from './entities/Notification';
import { HttpMailRelay, LoggingMailer, Mailer } from './mailer/mailer';
import { NotificationConsumer } from './notification.consumer';
import { NotificationsController } from './notifications.controller';
import { NotificationScope, TypeOrmNotificationRepository } from './notifications.repository';

@Module({
  imports: [PipelineModule.forService({ ...SERVICE_DEFAULTS, entities: [Notification] })],
  controllers: [NotificationsController],
  providers: [
    {
      provide: NOTIFICATION_UNIT_OF_WORK,
      inject: [DataSource, PipelineHost],
      useFactory: (dataSource: DataSource, host: PipelineHost) =>
        new TypeOrmUnitOfWork<NotificationScope>(dataSource, (manager) => ({
          ...typeOrmPipelineScope(manager, host.pipeline.registry, host.config.serviceName, host.pipeline.clock),
          notifications: new TypeOrmNotificationRepository(manager),
        })),
    },
    {
      provide: MAILER,
      inject: [PipelineHost],
      useFactory: (host: PipelineHost): Mailer =>
        host.config.mailRelayUrl
          ? new HttpMailRelay(host.config.mailRelayUrl)
          : new LoggingMailer(host.logger.child({ component: 'mailer' })),
    },
    NotificationConsumer,
  ],
})
export class AppModule {}
