import { Column, CreateDateColumn, Entity, Index, PrimaryGeneratedColumn, UpdateDateColumn } from 'typeorm';
import type { OrderItem } from '@orderflow/shared';

export type OrderStatus = 'pending_payment' | 'paid' | 'payment_failed';

@Entity('orders')
@Index(['userId'])
@Index(['status', 'updatedAt'])
export class Order {
  @PrimaryGeneratedColumn('increment', { name: 'order_id' })
  orderId!: number;

  @Column({ name: 'user_id', type: 'integer' })
  userId!: number;

  @Column({ name: 'customer_email', type: 'text' })
  customerEmail!: string;

  @Column({ name: 'amount', type: 'numeric', precision: 12, scale: 2 })
  amount!: string;

  @Column({ name: 'currency', type: 'char', length: 3 })
  currency!: string;

  @Column({ name: 'items', type: 'jsonb', default: () => "'[]'" })
  items!: OrderItem[];

  @Column({ name: 'status', type: 'text', default: 'pending_payment' })
  status!: OrderStatus;

  @Column({ name: 'payment_id', type: 'text', nullable: true })
  paymentId!: string | null;

  @Column({ name: 'failure_reason', type: 'text', nullable: true })
  failureReason!: string | null;

  @Column({ name: 'correlation_id', type: 'text' })
  correlationId!: string;

  @CreateDateColumn({ name: 'created_at', type: 'timestamptz' })
  createdAt!: Date;

  @UpdateDateColumn({ name: 'updated_at', type: 'timestamptz' })
  updatedAt!: Date;
}
