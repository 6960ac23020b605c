import { AmbiguousOutcomeError, InMemoryPipelineStores, InMemoryUnitOfWork, Pipeline, ProcessResult } from '@orderflow/shared';
import { createLocalStores, createTestBroker, TestBroker } from '../../../test/support/pipeline';
import { CONSUMER_GROUP, ORDERS_QUEUE } from './constants';
import { CaptureRequest, PaymentGateway, SimulatedPaymentGateway } from './gateway/payment-gateway';
import { PaymentHandler } from './payment.handler';
import { InMemoryPaymentRepository, PaymentScope } from './payments.repository';

describe('PaymentHandler', () => {
  let broker: TestBroker;
  let orders: Pipeline;
  let stores: InMemoryPipelineStores;
  let payments: InMemoryPaymentRepository;

  const orderCreated = {
    orderId: 42,
    userId: 7,
    customerEmail: 'buyer@example.com',
    amount: '19.99',
    currency: 'USD',
  };

  const consumerWith = (
    gateway: PaymentGateway,
    gatewayTimeoutMs = 1000,
    env?: NodeJS.ProcessEnv
  ): (() => Promise<ProcessResult | null>) => {
    const pipeline = broker.pipelineFor('payment-service', env);
    const unitOfWork = new InMemoryUnitOfWork<PaymentScope>(stores.database, {
      ...stores.scope(pipeline.registry, 'payment-service', broker.clock),
      payments,
    });
    const handler = new PaymentHandler({ pipeline, unitOfWork, gateway, gatewayTimeoutMs });
    const consumer = pipeline.consumer({ queueName: ORDERS_QUEUE, consumerGroup: CONSUMER_GROUP, handler: handler.handle });
    return () => consumer.processNext();
  };

  const outboxEvents = () => stores.outboxStore.table.values().map((record) => record.envelope);

  beforeEach(() => {
    broker = createTestBroker();
    orders = broker.pipelineFor('order-service');
    stores = createLocalStores(broker.clock);
    payments = new InMemoryPaymentRepository(stores.database, broker.clock);
  });

  it('captures and publishes payment.processed caused by the order event', async () => {
    const orderEventId = await orders.publisher.publish('order.created', orderCreated, 'ORD-42');
    const processNext = consumerWith(new SimulatedPaymentGateway());

    const result = await processNext();

    expect(result?.state).toBe('acked');
    const payment = await payments.findByOrderId(42);
    expect(payment).toMatchObject({ status: 'completed', idempotencyKey: 'order-42', declineReason: null });
    expect(payment?.transactionId).toMatch(/^TXN-[0-9A-F]{12}$/);

    const [event] = outboxEvents();
    expect(event).toMatchObject({
      eventType: 'payment.processed',
      correlationId: 'ORD-42',
      causationId: orderEventId,
      producer: 'payment-service',
      payload: {
        paymentId: payment?.paymentId,
        orderId: 42,
        amount: '19.99',
        transactionId: payment?.transactionId,
        status: 'completed',
      },
    });
    expect(stores.ledger.entries(CONSUMER_GROUP).map((entry) => entry.outcome)).toEqual(['completed']);
  });

  it('records a decline and publishes payment.failed', async () => {
    await orders.publisher.publish('order.created', { ...orderCreated, amount: '20000.00' }, 'ORD-42');
    const processNext = consumerWith(new SimulatedPaymentGateway());

    const result = await processNext();

    expect(result?.state).toBe('acked');
    expect((await payments.findByOrderId(42))?.status).toBe('declined');
    const [event] = outboxEvents();
    expect(event.eventType).toBe('payment.failed');
    expect(event.payload).toMatchObject({ reason: 'Amount 20000.00 USD exceeds the card limit' });
  });

  it('requeues when the gateway does not answer in time', async () => {
    await orders.publisher.publish('order.created', orderCreated, 'ORD-42');
    const silent: PaymentGateway = {
      capture: (_request, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener('abort', () => reject(signal.reason), { once: true });
        }),
    };
    const processNext = consumerWith(silent, 10);

    const result = await processNext();

    expect(result?.state).toBe('nacked_requeue');
    expect(result?.error).toMatchObject({
      code: 'AMBIGUOUS_OUTCOME',
      message: 'Payment gateway gave no answer for order 42 within 10ms',
    });
    expect(payments.table.size).toBe(0);
    expect(outboxEvents()).toHaveLength(0);
    expect(stores.ledger.entries()).toHaveLength(0);
  });

  it('aborts the capture when the handler runs out of time first', async () => {
    await orders.publisher.publish('order.created', orderCreated, 'ORD-42');
    let abortedWith: unknown;
    const stalled: PaymentGateway = {
      capture: (_request, signal) =>
        new Promise((_resolve, reject) => {
          signal.addEventListener(
            'abort',
            () => {
              abortedWith = signal.reason;
              reject(signal.reason);
            },
            { once: true }
          );
        }),
    };
    const processNext = consumerWith(stalled, 5000, { HANDLER_TIMEOUT_MS: '10' });

    const result = await processNext();

    expect(result?.state).toBe('nacked_requeue');
    expect(result?.error).toMatchObject({ code: 'HANDLER_TIMEOUT' });
    expect(abortedWith).toMatchObject({ code: 'HANDLER_TIMEOUT', message: 'Handler exceeded 10ms' });
  });

  it('retries an ambiguous capture under the same gateway key', async () => {
    await orders.publisher.publish('order.created', orderCreated, 'ORD-42');
    const keys: string[] = [];
    const flaky: PaymentGateway = {
      capture: async (request: CaptureRequest) => {
        keys.push(request.idempotencyKey);
        if (keys.length === 1) {
          throw new AmbiguousOutcomeError('connection reset after request was sent');
        }
        return { status: 'captured', transactionId: 'TXN-0000000000AB' };
      },
    };
    const processNext = consumerWith(flaky);

    expect((await processNext())?.delayMs).toBe(1000);
    broker.clock.advance(1000);
    const retried = await processNext();

    expect(retried).toMatchObject({ state: 'acked', attempt: 2 });
    expect(keys).toEqual(['order-42', 'order-42']);
    expect((await payments.findByOrderId(42))?.transactionId).toBe('TXN-0000000000AB');
  });

  it('dead-letters an event it does not handle', async () => {
    await orders.publisher.publish(
      'order.created',
      { ...orderCreated, paymentId: 'pay-1', reason: 'declined' },
      'ORD-42',
      { eventType: 'payment.failed' }
    );
    const processNext = consumerWith(new SimulatedPaymentGateway());

    const result = await processNext();

    expect(result?.state).toBe('nacked_dead_letter');
    expect(result?.error?.message).toBe('Unexpected payment.failed on payment-service.orders');
  });
});
