import { Entity, PrimaryColumn, Column, Index } from 'typeorm';

export type OutboxStatus = 'pending' | 'forwarded' | 'failed';

@Entity('outbox_events')
@Index(['status', 'nextAttemptAt'])
@Index(['correlationId'])
export class OutboxEvent {
  @PrimaryColumn({ name: 'event_id', type: 'uuid' })
  eventId!: string;

  @Column({ name: 'occurred_at', type: 'timestamptz' })
  occurredAt!: Date;

  @Column({ name: 'routing_key', type: 'text' })
  routingKey!: string;

  @Column({ name: 'event_type', type: 'text' })
  eventType!: string;

  @Column({ name: 'event_version', type: 'int' })
  eventVersion!: number;

  @Column({ name: 'producer', type: 'text' })
  producer!: string;

  @Column({ name: 'correlation_id', type: 'text' })
  correlationId!: string;

  @Column({ name: 'causation_id', type: 'text', nullable: true })
  causationId!: string | null;

  @Column({ name: 'payload_json', type: 'jsonb' })
  payloadJson!: object;

  @Column({ name: 'status', type: 'text', default: 'pending' })
  status!: OutboxStatus;

  @Column({ name: 'attempt_count', type: 'int', default: 0 })
  attemptCount!: number;

  @Column({ name: 'next_attempt_at', type: 'timestamptz' })
  nextAttemptAt!: Date;

  @Column({ name: 'last_error', type: 'text', nullable: true })
  lastError!: string | null;

  @Column({ name: 'forwarded_at', type: 'timestamptz', nullable: true })
  forwardedAt!: Date | null;
}
