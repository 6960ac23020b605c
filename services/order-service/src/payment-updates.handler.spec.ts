import { InMemoryUnitOfWork, Pipeline, ProcessResult } from '@orderflow/shared';
import { createLocalStores, createTestBroker, TestBroker } from '../../../test/support/pipeline';
import { CONSUMER_GROUP, PAYMENT_UPDATES_QUEUE } from './constants';
import { InMemoryOrderRepository } from './orders.repository';
import { OrderScope, OrdersService } from './orders.service';
import { PaymentUpdatesHandler } from './payment-updates.handler';

describe('PaymentUpdatesHandler', () => {
  let broker: TestBroker;
  let payments: Pipeline;
  let orders: InMemoryOrderRepository;
  let service: OrdersService;
  let ledgerOutcomes: () => string[];
  let processNext: () => Promise<ProcessResult | null>;

  const payment = {
    paymentId: 'pay-1',
    orderId: 1,
    userId: 7,
    customerEmail: 'buyer@example.com',
    amount: '19.99',
    currency: 'USD',
  };

  beforeEach(async () => {
    broker = createTestBroker();
    const pipeline = broker.pipelineFor('order-service');
    payments = broker.pipelineFor('payment-service');

    const stores = createLocalStores(broker.clock);
    orders = new InMemoryOrderRepository(stores.database, broker.clock);
    const unitOfWork = new InMemoryUnitOfWork<OrderScope>(stores.database, {
      ...stores.scope(pipeline.registry, 'order-service', broker.clock),
      orders,
    });
    service = new OrdersService(unitOfWork);
    ledgerOutcomes = () => stores.ledger.entries(CONSUMER_GROUP).map((entry) => entry.outcome);

    const handler = new PaymentUpdatesHandler(pipeline, unitOfWork);
    const consumer = pipeline.consumer({
      queueName: PAYMENT_UPDATES_QUEUE,
      consumerGroup: CONSUMER_GROUP,
      handler: handler.handle,
    });
    processNext = () => consumer.processNext();

    await service.createOrder(
      { userId: 7, customerEmail: 'buyer@example.com', amount: '19.99', currency: 'USD', items: [] },
      'ORD-42'
    );
  });

  it('marks the order paid on payment.processed', async () => {
    await payments.publisher.publish(
      'payment.processed',
      { ...payment, transactionId: 'TXN-00000000000A', status: 'completed' },
      'ORD-42'
    );

    const result = await processNext();

    expect(result?.state).toBe('acked');
    const order = await orders.findById(1);
    expect(order?.status).toBe('paid');
    expect(order?.paymentId).toBe('pay-1');
    expect(ledgerOutcomes()).toEqual(['paid']);
  });

  it('records the reason on payment.failed', async () => {
    await payments.publisher.publish('payment.failed', { ...payment, reason: 'card declined' }, 'ORD-42');

    await processNext();

    const order = await orders.findById(1);
    expect(order?.status).toBe('payment_failed');
    expect(order?.failureReason).toBe('card declined');
    expect(ledgerOutcomes()).toEqual(['payment_failed']);
  });

  it('skips a redelivered event', async () => {
    await payments.publisher.publish(
      'payment.processed',
      { ...payment, transactionId: 'TXN-00000000000A', status: 'completed' },
      'ORD-42'
    );
    await processNext();
    expect(broker.store.snapshot(PAYMENT_UPDATES_QUEUE)).toHaveLength(0);

    const [delivered] = broker.store.snapshot('notification-service.payments');
    await payments.broker.redeliver(PAYMENT_UPDATES_QUEUE, delivered.envelope);
    const result = await processNext();

    expect(result?.state).toBe('acked');
    expect(ledgerOutcomes()).toEqual(['paid']);
    const duplicates = await broker.metrics.duplicatesSkipped.get();
    expect(duplicates.values).toEqual([expect.objectContaining({ value: 1, labels: { consumer_group: CONSUMER_GROUP } })]);
  });

  it('dead-letters a payment for an unknown order', async () => {
    await payments.publisher.publish('payment.failed', { ...payment, orderId: 99, reason: 'card declined' }, 'ORD-99');

    const result = await processNext();

    expect(result?.state).toBe('nacked_dead_letter');
    expect(result?.error?.message).toBe('Order 99 not found');
    expect(ledgerOutcomes()).toEqual([]);
  });

  it('refuses to move a paid order to payment_failed', async () => {
    await payments.publisher.publish(
      'payment.processed',
      { ...payment, transactionId: 'TXN-00000000000A', status: 'completed' },
      'ORD-42'
    );
    await processNext();
    await payments.publisher.publish('payment.failed', { ...payment, paymentId: 'pay-2', reason: 'late' }, 'ORD-42');

    const result = await processNext();

    expect(result?.state).toBe('nacked_dead_letter');
    expect(result?.error?.message).toBe('Order 1 is paid, cannot move to payment_failed');
    expect((await orders.findById(1))?.status).toBe('paid');
  });
});
