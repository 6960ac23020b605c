import { EntityManager, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Clock, InMemoryDatabase, InMemoryTable, PipelineScope, systemClock } from '@orderflow/shared';
import { Notification } from './entities/Notification';

export type NewNotification = Omit<Notification, 'notificationId' | 'sentAt'>;

export interface NotificationRepository {
  create(notification: NewNotification): Promise<Notification>;
  listForOrder(orderId: number): Promise<Notification[]>;
}

export type NotificationScope = PipelineScope & { notifications: NotificationRepository };

export class TypeOrmNotificationRepository implements NotificationRepository {
  private readonly repo: Repository<Notification>;

  constructor(manager: EntityManager) {
    this.repo = manager.getRepository(Notification);
  }

  create(notification: NewNotification): Promise<Notification> {
    return this.repo.save(this.repo.create(notification));
  }

  listForOrder(orderId: number): Promise<Notification[]> {
    return this.repo.find({ where: { orderId }, order: { sentAt: 'ASC' } });
  }
}

export class InMemoryNotificationRepository implements NotificationRepository {
  readonly table: InMemoryTable<Notification>;

  constructor(
    database: InMemoryDatabase,
    private readonly clock: Clock = systemClock
  ) {
    this.table = new InMemoryTable<Notification>(database);
  }

  async create(input: NewNotification): Promise<Notification> {
    const notification = Object.assign(new Notification(), input, {
      notificationId: uuidv4(),
      sentAt: this.clock.now(),
    });
    this.table.set(notification.notificationId, notification);
    return Object.assign(new Notification(), notification);
  }

  async listForOrder(orderId: number): Promise<Notification[]> {
    return this.table
      .values()
      .filter((notification) => notification.orderId === orderId)
      .map((notification) => Object.assign(new Notification(), notification));
  }
}
