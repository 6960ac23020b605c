import { EntityManager, Repository } from 'typeorm';
import { Clock, InMemoryDatabase, InMemoryTable, OrderItem, systemClock } from '@orderflow/shared';
import { Order } from './entities/Order';

export interface NewOrder {
  userId: number;
  customerEmail: string;
  amount: string;
  currency: string;
  items: OrderItem[];
  correlationId: string;
}

export interface OrderRepository {
  create(order: NewOrder): Promise<Order>;
  findById(orderId: number): Promise<Order | null>;
  save(order: Order): Promise<void>;
}

export class TypeOrmOrderRepository implements OrderRepository {
  private readonly repo: Repository<Order>;

  constructor(manager: EntityManager) {
    this.repo = manager.getRepository(Order);
  }

  create(order: NewOrder): Promise<Order> {
    return this.repo.save(
      this.repo.create({ ...order, status: 'pending_payment', paymentId: null, failureReason: null })
    );
  }

  findById(orderId: number): Promise<Order | null> {
    return this.repo.findOne({ where: { orderId } });
  }

  async save(order: Order): Promise<void> {
    await this.repo.save(order);
  }
}

/** Rows are copied in and out so callers never mutate a stored row. */
export class InMemoryOrderRepository implements OrderRepository {
  readonly table: InMemoryTable<Order>;
  private nextId = 1;

  constructor(
    database: InMemoryDatabase,
    private readonly clock: Clock = systemClock
  ) {
    this.table = new InMemoryTable<Order>(database);
  }

  async create(input: NewOrder): Promise<Order> {
    const now = this.clock.now();
    const order = Object.assign(new Order(), input, {
      orderId: this.nextId++,
      status: 'pending_payment' as const,
      paymentId: null,
      failureReason: null,
      createdAt: now,
      updatedAt: now,
    });
    this.table.set(String(order.orderId), order);
    return Object.assign(new Order(), order);
  }

  async findById(orderId: number): Promise<Order | null> {
    const row = this.table.get(String(orderId));
    return row ? Object.assign(new Order(), row) : null;
  }

  async save(order: Order): Promise<void> {
    this.table.set(String(order.orderId), Object.assign(new Order(), order, { updatedAt: this.clock.now() }));
  }
}
