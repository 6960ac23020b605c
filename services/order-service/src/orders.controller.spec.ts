import { NotFoundException } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import {
  createPipelineSchemaRegistry,
  InMemoryDatabase,
  InMemoryPipelineStores,
  InMemoryUnitOfWork,
  ManualClock,
} from '@orderflow/shared';
import { ORDER_UNIT_OF_WORK } from './constants';
import { OrdersController } from './orders.controller';
import { InMemoryOrderRepository } from './orders.repository';
import { OrderScope, OrdersService } from './orders.service';

describe('OrdersController', () => {
  let controller: OrdersController;

  beforeEach(async () => {
    const clock = new ManualClock();
    const database = new InMemoryDatabase();
    const stores = new InMemoryPipelineStores(database, clock);
    const unitOfWork = new InMemoryUnitOfWork<OrderScope>(database, {
      ...stores.scope(createPipelineSchemaRegistry(), 'order-service', clock),
      orders: new InMemoryOrderRepository(database, clock),
    });

    const moduleRef = await Test.createTestingModule({
      controllers: [OrdersController],
      providers: [OrdersService, { provide: ORDER_UNIT_OF_WORK, useValue: unitOfWork }],
    }).compile();
    controller = moduleRef.get(OrdersController);
  });

  it('creates an order under the caller correlation id', async () => {
    const response = await controller.create(
      { 'x-correlation-id': 'ORD-42' },
      { userId: 7, customerEmail: 'buyer@example.com', amount: '19.99' }
    );

    expect(response.success).toBe(true);
    expect(response.correlationId).toBe('ORD-42');
    expect(response.data).toMatchObject({
      orderId: 1,
      status: 'pending_payment',
      amount: '19.99',
      currency: 'USD',
      createdAt: '2024-03-01T10:00:00.000Z',
    });
    expect(typeof response.data?.eventId).toBe('string');
  });

  it('reports validation errors in the response body', async () => {
    const response = await controller.create({ 'x-correlation-id': 'c-1' }, { userId: 'seven' });

    expect(response).toEqual({
      success: false,
      error: {
        code: 'VALIDATION_ERROR',
        message: 'userId: Expected number, received string; customerEmail: Required',
      },
      correlationId: 'c-1',
    });
  });

  it('rejects an amount wider than the amount column', async () => {
    const response = await controller.create(
      { 'x-correlation-id': 'c-2' },
      { userId: 7, customerEmail: 'buyer@example.com', amount: '100000000000.00' }
    );

    expect(response).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'amount: must be a decimal string of at most 9999999999.99' },
      correlationId: 'c-2',
    });
  });

  it('rejects items whose total does not fit the amount column', async () => {
    const response = await controller.create(
      { 'x-correlation-id': 'c-3' },
      {
        userId: 7,
        customerEmail: 'buyer@example.com',
        items: [{ productId: 1, quantity: 2, unitPrice: '9999999999.99' }],
      }
    );

    expect(response.success).toBe(false);
    expect(response.error).toEqual({ code: 'VALIDATION_ERROR', message: 'items: Total exceeds 9999999999.99' });
  });

  it('returns a stored order', async () => {
    await controller.create({}, { userId: 7, customerEmail: 'buyer@example.com', amount: '5' });

    const response = await controller.get({ 'x-correlation-id': 'c-2' }, 1);

    expect(response.data?.amount).toBe('5');
    expect(response.correlationId).toBe('c-2');
  });

  it('throws NotFoundException for an unknown order', async () => {
    await expect(controller.get({}, 404)).rejects.toBeInstanceOf(NotFoundException);
  });
});
