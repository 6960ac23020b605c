import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn } from 'typeorm';

@Entity('notifications')
@Index(['orderId'])
@Index(['sourceEventId', 'template'], { unique: true })
export class Notification {
  @PrimaryGeneratedColumn('uuid', { name: 'notification_id' })
  notificationId!: string;

  @Column({ name: 'order_id', type: 'integer' })
  orderId!: number;

  @Column({ name: 'source_event_id', type: 'uuid' })
  sourceEventId!: string;

  @Column({ name: 'recipient', type: 'text' })
  recipient!: string;

  @Column({ name: 'template', type: 'text' })
  template!: string;

  @Column({ name: 'channel', type: 'text', default: 'email' })
  channel!: 'email';

  @Column({ name: 'subject', type: 'text' })
  subject!: string;

  @Column({ name: 'provider_message_id', type: 'text' })
  providerMessageId!: string;

  @CreateDateColumn({ name: 'sent_at', type: 'timestamptz' })
  sentAt!: Date;
}
