import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import type { StoredEnvelope } from '../events/EventEnvelope';

@Entity('queue_messages')
@Index(['queueName', 'visibleAt'])
@Index(['queueName', 'partitionKey', 'seq'])
@Index(['messageId'], { unique: true })
export class QueuedMessageEntity {
  // Enqueue order; bigint comes back from pg as a string.
  @PrimaryGeneratedColumn('increment', { name: 'seq', type: 'bigint' })
  seq!: string;

  @Column({ name: 'message_id', type: 'uuid' })
  messageId!: string;

  @Column({ name: 'queue_name', type: 'text' })
  queueName!: string;

  @Column({ name: 'partition_key', type: 'text' })
  partitionKey!: string;

  @Column({ name: 'envelope_json', type: 'jsonb' })
  envelope!: StoredEnvelope;

  @Column({ name: 'attempts', type: 'int', default: 0 })
  attempts!: number;

  @Column({ name: 'enqueued_at', type: 'timestamptz' })
  enqueuedAt!: Date;

  @Column({ name: 'visible_at', type: 'timestamptz' })
  visibleAt!: Date;

  @Column({ name: 'lease_token', type: 'uuid', nullable: true })
  leaseToken!: string | null;

  @Column({ name: 'last_error_json', type: 'jsonb', nullable: true })
  lastError!: { name: string; message: string; code: string } | null;
}
