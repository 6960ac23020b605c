import { BrokerUnavailableError, InvalidRoutingKeyError } from '../errors';
import { createEnvelope, EventEnvelope } from '../events/EventEnvelope';
import { createSilentLogger, PipelineMetrics } from '../observability';
import { ManualClock } from '../utils/clock';
import { InMemoryQueueStore } from './InMemoryQueueStore';
import { MessageBroker } from './MessageBroker';
import { RoutingTable } from './RoutingTable';

const envelope = (routingKey: string): EventEnvelope =>
  createEnvelope({
    eventType: routingKey,
    eventVersion: 1,
    routingKey,
    producer: 'order-service',
    correlationId: 'corr-7',
    payload: { orderId: 7 },
  });

describe('MessageBroker', () => {
  let store: InMemoryQueueStore;
  let metrics: PipelineMetrics;
  let broker: MessageBroker;

  beforeEach(() => {
    store = new InMemoryQueueStore();
    metrics = new PipelineMetrics();
    broker = new MessageBroker({
      store,
      routing: new RoutingTable([
        { queue: 'payment-service.orders', pattern: 'order.created' },
        { queue: 'audit.all', pattern: '#' },
      ]),
      logger: createSilentLogger(),
      metrics,
      clock: new ManualClock(),
    });
  });

  it('writes one copy per matching queue', async () => {
    const event = envelope('order.created');

    expect(await broker.publish(event)).toEqual(['payment-service.orders', 'audit.all']);
    expect(store.snapshot('payment-service.orders').map((m) => m.envelope.eventId)).toEqual([event.eventId]);
    expect(store.snapshot('audit.all').map((m) => m.envelope.eventId)).toEqual([event.eventId]);
    expect(store.snapshot('audit.all')[0]).toMatchObject({ attempts: 0, partitionKey: 'corr-7', leaseToken: null });
  });

  it('drops an unroutable envelope and counts it', async () => {
    broker.reconfigure(new RoutingTable([{ queue: 'payment-service.orders', pattern: 'order.created' }]));

    expect(await broker.publish(envelope('inventory.reserved'))).toEqual([]);
    const metric = await metrics.registry.getSingleMetricAsString('pipeline_events_published_total');
    expect(metric).toContain('pipeline_events_published_total{routing_key="inventory.reserved",outcome="unroutable"} 1');
  });

  it('rejects an empty routing key', async () => {
    await expect(broker.publish(envelope(' '))).rejects.toBeInstanceOf(InvalidRoutingKeyError);
  });

  it('raises BrokerUnavailableError when the store is down', async () => {
    store.setAvailable(false);

    const publishing = broker.publish(envelope('order.created'));
    await expect(publishing).rejects.toBeInstanceOf(BrokerUnavailableError);
    await expect(publishing).rejects.toThrow('Broker store rejected order.created');
    expect(await broker.isAvailable()).toBe(false);
  });

  it('routes new publishes through a replaced table', async () => {
    const before = broker.routing;
    const next = before.withBinding({ queue: 'notification-service.orders', pattern: 'order.*' });
    broker.reconfigure(next);

    expect(broker.routing.version).toBe(2);
    expect(await broker.publish(envelope('order.created'))).toEqual([
      'payment-service.orders',
      'audit.all',
      'notification-service.orders',
    ]);
    expect(before.route('order.created')).toEqual(['payment-service.orders', 'audit.all']);
  });

  it('redelivers straight to one queue with a fresh attempt count', async () => {
    const event = envelope('payment.failed');
    const id = await broker.redeliver('order-service.payment-updates', event);

    const [message] = store.snapshot('order-service.payment-updates');
    expect(message).toMatchObject({ id, attempts: 0 });
    expect(message.envelope).toBe(event);
  });

  it('builds queues that share its store', async () => {
    const queue = broker.queue('payment-service.orders', { maxAttempts: 5 });
    await broker.publish(envelope('order.created'));

    const delivery = await queue.dequeue(1000);
    expect(delivery?.envelope.routingKey).toBe('order.created');
    expect(queue.maxAttempts).toBe(5);
  });

  it('lists bound queues and queues left over from an older table', async () => {
    await broker.redeliver('legacy.orders', envelope('order.created'));

    expect(await broker.queueNames()).toEqual(['audit.all', 'legacy.orders', 'payment-service.orders']);
  });
});
