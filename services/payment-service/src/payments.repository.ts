import { EntityManager, Repository } from 'typeorm';
import { v4 as uuidv4 } from 'uuid';
import { Clock, InMemoryDatabase, InMemoryTable, PipelineScope, systemClock } from '@orderflow/shared';
import { Payment, PaymentStatus } from './entities/Payment';

export interface NewPayment {
  orderId: number;
  userId: number;
  amount: string;
  currency: string;
  status: PaymentStatus;
  transactionId: string | null;
  declineReason: string | null;
  idempotencyKey: string;
}

export interface PaymentRepository {
  create(payment: NewPayment): Promise<Payment>;
  findById(paymentId: string): Promise<Payment | null>;
  findByOrderId(orderId: number): Promise<Payment | null>;
}

export type PaymentScope = PipelineScope & { payments: PaymentRepository };

export class TypeOrmPaymentRepository implements PaymentRepository {
  private readonly repo: Repository<Payment>;

  constructor(manager: EntityManager) {
    this.repo = manager.getRepository(Payment);
  }

  create(payment: NewPayment): Promise<Payment> {
    return this.repo.save(this.repo.create(payment));
  }

  findById(paymentId: string): Promise<Payment | null> {
    return this.repo.findOne({ where: { paymentId } });
  }

  findByOrderId(orderId: number): Promise<Payment | null> {
    return this.repo.findOne({ where: { orderId } });
  }
}

export class InMemoryPaymentRepository implements PaymentRepository {
  readonly table: InMemoryTable<Payment>;

  constructor(
    database: InMemoryDatabase,
    private readonly clock: Clock = systemClock
  ) {
    this.table = new InMemoryTable<Payment>(database);
  }

  async create(input: NewPayment): Promise<Payment> {
    if (this.table.values().some((payment) => payment.orderId === input.orderId)) {
      throw new Error(`duplicate key value violates unique constraint on payments.order_id (${input.orderId})`);
    }
    const payment = Object.assign(new Payment(), input, { paymentId: uuidv4(), createdAt: this.clock.now() });
    this.table.set(payment.paymentId, payment);
    return Object.assign(new Payment(), payment);
  }

  async findById(paymentId: string): Promise<Payment | null> {
    const row = this.table.get(paymentId);
    return row ? Object.assign(new Payment(), row) : null;
  }

  async findByOrderId(orderId: number): Promise<Payment | null> {
    const row = this.table.values().find((payment) => payment.orderId === orderId);
    return row ? Object.assign(new Payment(), row) : null;
  }
}
