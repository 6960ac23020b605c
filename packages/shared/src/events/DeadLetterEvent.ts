import { Entity, PrimaryGeneratedColumn, Column, Index } from 'typeorm';
import type { StoredEnvelope } from './EventEnvelope';

export type DeadLetterStatus = 'pending' | 'replayed' | 'discarded';
export type DeadLetterErrorType = 'transient' | 'permanent' | 'lease_expired';

@Entity('dead_letter_events')
@Index(['queueName', 'status'])
@Index(['eventId'])
@Index(['deadLetteredAt'])
export class DeadLetterEvent {
  @PrimaryGeneratedColumn('uuid', { name: 'dlq_id' })
  id!: string;

  @Column({ name: 'message_id', type: 'uuid' })
  messageId!: string;

  @Column({ name: 'queue_name', type: 'text' })
  queueName!: string;

  @Column({ name: 'consumer_group', type: 'text', nullable: true })
  consumerGroup!: string | null;

  @Column({ name: 'event_id', type: 'uuid' })
  eventId!: string;

  @Column({ name: 'event_type', type: 'text' })
  eventType!: string;

  @Column({ name: 'routing_key', type: 'text' })
  routingKey!: string;

  @Column({ name: 'correlation_id', type: 'text' })
  correlationId!: string;

  @Column({ name: 'envelope_json', type: 'jsonb' })
  envelope!: StoredEnvelope;

  @Column({ name: 'attempts', type: 'int' })
  attempts!: number;

  @Column({ name: 'error_type', type: 'text' })
  errorType!: DeadLetterErrorType;

  @Column({ name: 'error_code', type: 'text', nullable: true })
  errorCode!: string | null;

  @Column({ name: 'error_message', type: 'text', nullable: true })
  errorMessage!: string | null;

  @Column({ name: 'error_stack', type: 'text', nullable: true })
  errorStack!: string | null;

  @Column({ name: 'status', type: 'text', default: 'pending' })
  status!: DeadLetterStatus;

  @Column({ name: 'replay_count', type: 'int', default: 0 })
  replayCount!: number;

  @Column({ name: 'replayed_at', type: 'timestamptz', nullable: true })
  replayedAt!: Date | null;

  @Column({ name: 'replayed_by', type: 'text', nullable: true })
  replayedBy!: string | null;

  @Column({ name: 'dead_lettered_at', type: 'timestamptz', default: () => 'NOW()' })
  deadLetteredAt!: Date;

  @Column({ name: 'resolved_at', type: 'timestamptz', nullable: true })
  resolvedAt!: Date | null;
}
