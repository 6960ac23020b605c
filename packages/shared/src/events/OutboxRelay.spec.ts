import { InMemoryDatabase } from '../database/InMemoryDatabase';
import { EventPublisher } from '../messaging/EventPublisher';
import { InMemoryQueueStore } from '../messaging/InMemoryQueueStore';
import { MessageBroker } from '../messaging/MessageBroker';
import { RetryPolicy } from '../messaging/RetryPolicy';
import { RoutingTable } from '../messaging/RoutingTable';
import { createSilentLogger } from '../observability';
import { createPipelineSchemaRegistry } from '../schema/SchemaRegistry';
import { ManualClock } from '../utils/clock';
import { createEnvelope } from './EventEnvelope';
import { OutboxPublisher } from './OutboxPublisher';
import { OutboxRelay } from './OutboxRelay';
import { InMemoryOutboxStore } from './OutboxStore';

const QUEUE = 'payment-service.orders';

describe('OutboxRelay', () => {
  let clock: ManualClock;
  let outbox: InMemoryOutboxStore;
  let queues: InMemoryQueueStore;
  let publisher: OutboxPublisher;
  let relay: OutboxRelay;

  const publishOrder = (orderId: number): Promise<string> => {
    const eventId = publisher.publish({
      eventType: 'order.created',
      payload: { orderId, userId: 7, customerEmail: 'buyer@example.com', amount: '10.00' },
      correlationId: `ORD-${orderId}`,
    });
    clock.advance(10);
    return eventId;
  };

  const queuedEventIds = () => queues.snapshot(QUEUE).map((message) => message.envelope.eventId);

  beforeEach(() => {
    clock = new ManualClock();
    outbox = new InMemoryOutboxStore(new InMemoryDatabase());
    queues = new InMemoryQueueStore();
    const registry = createPipelineSchemaRegistry();
    const broker = new MessageBroker({
      store: queues,
      routing: new RoutingTable([{ queue: QUEUE, pattern: 'order.created' }]),
      logger: createSilentLogger(),
      clock,
    });
    publisher = new OutboxPublisher(outbox, registry, 'order-service', clock);
    relay = new OutboxRelay(
      {
        reader: outbox,
        publisher: new EventPublisher(broker, registry, 'order-service', clock),
        backoff: new RetryPolicy({ maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000, random: () => 0 }),
        pollIntervalMs: 5,
        batchSize: 10,
        clock,
      },
      createSilentLogger()
    );
  });

  it('forwards due rows in the order they occurred', async () => {
    const first = await publishOrder(1);
    const second = await publishOrder(2);

    expect(await relay.runOnce()).toEqual({ forwarded: 2, retried: 0, failed: 0 });
    expect(queuedEventIds()).toEqual([first, second]);
    expect(outbox.table.get(first)).toMatchObject({ status: 'forwarded', forwardedAt: clock.now() });
    expect(await relay.runOnce()).toEqual({ forwarded: 0, retried: 0, failed: 0 });
  });

  it('keeps rows pending with backoff while the broker is down', async () => {
    const first = await publishOrder(1);
    const second = await publishOrder(2);
    queues.setAvailable(false);

    expect(await relay.runOnce()).toEqual({ forwarded: 0, retried: 1, failed: 0 });
    expect(outbox.table.get(first)).toMatchObject({
      status: 'pending',
      attemptCount: 1,
      nextAttemptAt: new Date(clock.now().getTime() + 1000),
    });
    expect(outbox.table.get(first)?.lastError).toContain('Broker store rejected order.created');
    expect(outbox.table.get(second)?.attemptCount).toBe(0);

    queues.setAvailable(true);
    expect(await relay.runOnce()).toEqual({ forwarded: 1, retried: 0, failed: 0 });
    clock.advance(1000);
    expect(await relay.runOnce()).toEqual({ forwarded: 1, retried: 0, failed: 0 });
    expect(queuedEventIds()).toEqual([second, first]);
  });

  it('marks a row the schema registry rejects as failed', async () => {
    const poison = createEnvelope(
      { eventType: 'order.created', eventVersion: 9, producer: 'order-service', correlationId: 'ORD-1', payload: {} },
      clock
    );
    await outbox.append(poison);

    expect(await relay.runOnce()).toEqual({ forwarded: 0, retried: 0, failed: 1 });
    expect(outbox.table.get(poison.eventId)).toMatchObject({ status: 'failed', attemptCount: 1 });
    expect(await outbox.countByStatus('failed')).toBe(1);
  });

  it('polls in the background until stopped', async () => {
    const eventId = await publishOrder(1);

    relay.start();
    for (let i = 0; i < 100 && queuedEventIds().length === 0; i++) {
      await new Promise((resolve) => setTimeout(resolve, 5));
    }
    await relay.stop();

    expect(queuedEventIds()).toEqual([eventId]);
  });

  it('purges forwarded rows older than the cutoff', async () => {
    const forwarded = await publishOrder(1);
    await relay.runOnce();
    const pending = await publishOrder(2);

    expect(await outbox.purgeForwarded(clock.now())).toBe(1);
    expect(outbox.table.has(forwarded)).toBe(false);
    expect(outbox.table.has(pending)).toBe(true);
  });
});
