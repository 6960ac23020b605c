import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import { PermanentError, PipelineHost } from '@orderflow/shared';
import { createTestBroker, createTestHost, TestBroker } from '../../../test/support/pipeline';
import { DeadLettersController } from './dead-letters.controller';
import { QueuesController } from './queues.controller';

describe('broker-admin controllers', () => {
  let broker: TestBroker;
  let host: PipelineHost;
  let deadLetters: DeadLettersController;
  let queues: QueuesController;
  let deadLetterId: string;

  beforeEach(async () => {
    broker = createTestBroker();
    host = await createTestHost(broker, 'broker-admin', undefined, { MAX_REPLAY_COUNT: '1' });

    const orders = broker.pipelineFor('order-service');
    await orders.publisher.publish(
      'order.created',
      { orderId: 42, userId: 7, customerEmail: 'buyer@example.com', amount: '19.99' },
      'ORD-42'
    );
    const consumer = broker.pipelineFor('payment-service').consumer({
      queueName: 'payment-service.orders',
      consumerGroup: 'payment-service',
      handler: async () => {
        throw new PermanentError('card processor rejected merchant');
      },
    });
    await consumer.processNext();
    [{ id: deadLetterId }] = await broker.deadLetters.list();

    const moduleRef = await Test.createTestingModule({
      controllers: [DeadLettersController, QueuesController],
      providers: [{ provide: PipelineHost, useValue: host }],
    }).compile();
    deadLetters = moduleRef.get(DeadLettersController);
    queues = moduleRef.get(QueuesController);
  });

  it('lists dead letters by queue and status', async () => {
    const response = await deadLetters.list({ 'x-correlation-id': 'ops-1' }, { queue: 'payment-service.orders', status: 'pending' });

    expect(response.success).toBe(true);
    expect(response.data).toHaveLength(1);
    expect(response.data?.[0]).toMatchObject({
      queueName: 'payment-service.orders',
      eventType: 'order.created',
      correlationId: 'ORD-42',
      attempts: 1,
      errorType: 'permanent',
      status: 'pending',
    });
  });

  it('rejects a malformed list query', async () => {
    const response = await deadLetters.list({ 'x-correlation-id': 'ops-1' }, { limit: '0' });

    expect(response.error).toEqual({
      code: 'VALIDATION_ERROR',
      message: 'limit: Number must be greater than or equal to 1',
    });
  });

  it('counts dead letters per status', async () => {
    const response = await deadLetters.stats({});

    expect(response.data).toEqual({ pending: 1, replayed: 0, discarded: 0, total: 1 });
  });

  it('replays onto the original queue once', async () => {
    const first = await deadLetters.replay({}, deadLetterId, { operator: 'alice' });

    expect(first.data?.queueName).toBe('payment-service.orders');
    expect(first.data?.deadLetter).toMatchObject({ status: 'replayed', replayedBy: 'alice' });
    expect(broker.store.snapshot('payment-service.orders')).toHaveLength(1);

    const second = await deadLetters.replay({ 'x-correlation-id': 'ops-2' }, deadLetterId, { operator: 'alice' });
    expect(second).toEqual({
      success: false,
      error: { code: 'REPLAY_REJECTED', message: `Dead letter ${deadLetterId} is already replayed` },
      correlationId: 'ops-2',
    });
  });

  it('requires an operator', async () => {
    const response = await deadLetters.replay({}, deadLetterId, {});

    expect(response.error).toEqual({ code: 'VALIDATION_ERROR', message: 'operator: Required' });
  });

  it('discards', async () => {
    const response = await deadLetters.discard({}, deadLetterId, { operator: 'bob' });

    expect(response.data?.status).toBe('discarded');
  });

  it('answers 404 for an unknown id', async () => {
    await expect(deadLetters.inspect({}, 'missing')).rejects.toBeInstanceOf(NotFoundException);
    await expect(deadLetters.replay({}, 'missing', { operator: 'alice' })).rejects.toBeInstanceOf(NotFoundException);
  });

  it('reports queue depth for every bound queue', async () => {
    await deadLetters.replay({}, deadLetterId, { operator: 'alice' });

    const one = await queues.stats({}, 'payment-service.orders');
    expect(one.data).toMatchObject({ queueName: 'payment-service.orders', ready: 1, total: 1 });

    const all = await queues.list({});
    expect(all.data?.map((stats) => stats.queueName)).toEqual([
      'notification-service.payments',
      'order-service.payment-updates',
      'payment-service.orders',
    ]);
  });

  it('replays a whole queue', async () => {
    const response = await queues.replayAll({}, 'payment-service.orders', { operator: 'alice' });

    expect(response.data).toEqual({ replayed: 1, rejected: 0 });
  });
});
