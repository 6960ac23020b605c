import {
  connectTo,
  createLocalStores,
  createTestBroker,
  testConfig,
  TestBroker,
  waitFor,
} from '../../../../test/support/pipeline';
import { createSilentLogger, PipelineMetrics } from '../observability';
import type { InMemoryPipelineStores } from '../runtime/scope';
import { PipelineHost } from './PipelineHost';

describe('PipelineHost', () => {
  let broker: TestBroker;
  let stores: InMemoryPipelineStores;

  const hostFor = (serviceName: string, local?: InMemoryPipelineStores): PipelineHost =>
    new PipelineHost({
      config: testConfig(serviceName, { POLL_INTERVAL_MS: '5', OUTBOX_POLL_INTERVAL_MS: '5' }),
      local,
      version: '2.1.0',
      logger: createSilentLogger(serviceName),
      metrics: new PipelineMetrics(),
      connect: connectTo(broker),
    });

  beforeEach(() => {
    broker = createTestBroker();
    stores = createLocalStores(broker.clock);
  });

  it('refuses pipeline access before initialize', () => {
    expect(() => hostFor('order-service').pipeline).toThrow('order-service: pipeline used before initialize()');
  });

  it('reports healthy with the broker and database up', async () => {
    const host = hostFor('order-service', stores);
    await host.initialize();

    const health = await host.health();

    expect(health).toMatchObject({
      status: 'healthy',
      service: 'order-service',
      version: '2.1.0',
      checks: { database: true, messaging: true },
    });
  });

  it('degrades while the broker is unreachable', async () => {
    const host = hostFor('order-service', stores);
    await host.initialize();
    broker.store.setAvailable(false);

    const health = await host.health();

    expect(health.status).toBe('degraded');
    expect(health.checks).toEqual({ database: true, messaging: false });
  });

  it('reports unhealthy with no broker and no local database', async () => {
    const host = hostFor('broker-admin');
    await host.initialize();
    broker.store.setAvailable(false);

    expect((await host.health()).status).toBe('unhealthy');
  });

  it('relays the outbox and runs consumers between start and stop', async () => {
    const orders = hostFor('order-service', stores);
    const payments = hostFor('payment-service');
    await orders.initialize();
    await payments.initialize();

    const seen: string[] = [];
    payments.consume({
      queueName: 'payment-service.orders',
      consumerGroup: 'payment-service',
      handler: async (envelope) => {
        seen.push(envelope.correlationId);
      },
    });

    const { outbox } = stores.scope(orders.pipeline.registry, 'order-service', broker.clock);
    await stores.database.transaction(() =>
      outbox.publish({
        eventType: 'order.created',
        payload: { orderId: 42, userId: 7, customerEmail: 'buyer@example.com', amount: '19.99' },
        correlationId: 'ORD-42',
      })
    );

    orders.start();
    payments.start();
    try {
      await waitFor(() => seen.length === 1);
      expect(seen).toEqual(['ORD-42']);
      expect((await payments.health()).checks.messaging).toBe(true);
    } finally {
      await payments.stop();
      await orders.stop();
    }
    expect(stores.outboxStore.table.values().map((record) => record.status)).toEqual(['forwarded']);
  });

  it('starts a consumer registered after start', async () => {
    const host = hostFor('payment-service');
    await host.initialize();
    host.start();

    try {
      host.consume({ queueName: 'payment-service.orders', consumerGroup: 'payment-service', handler: async () => {} });
      expect((await host.health()).checks.messaging).toBe(true);
    } finally {
      await host.stop();
    }
  });

  it('sweeps every retention target on demand', async () => {
    const host = hostFor('order-service', stores);
    await host.initialize();

    await expect(host.sweep()).resolves.toEqual({
      dead_letter_events: 0,
      consumed_events: 0,
      outbox_events: 0,
    });
  });
});
