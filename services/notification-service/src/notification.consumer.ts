import { Inject, Injectable, OnModuleInit } from '@nestjs/common';
import { PipelineHost, UnitOfWork } from '@orderflow/shared';
import { CONSUMER_GROUP, MAILER, NOTIFICATION_UNIT_OF_WORK, PAYMENTS_QUEUE } from './constants';
import type { Mailer } from './mailer/mailer';
import { NotificationHandler } from './notification.handler';
import type { NotificationScope } from './notifications.repository';

@Injectable()
export class NotificationConsumer implements OnModuleInit {
  constructor(
    private readonly host: PipelineHost,
    @Inject(NOTIFICATION_UNIT_OF_WORK) private readonly unitOfWork: UnitOfWork<NotificationScope>,
    @Inject(MAILER) private readonly mailer: Mailer
  ) {}

  onModuleInit(): void {
    const handler = new NotificationHandler(this.host.pipeline, this.unitOfWork, this.mailer);
    this.host.consume({ queueName: PAYMENTS_QUEUE, consumerGroup: CONSUMER_GROUP, handler: handler.handle });
  }
}
