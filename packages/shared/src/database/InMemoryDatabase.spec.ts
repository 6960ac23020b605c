import { InMemoryDatabase, InMemoryTable } from './InMemoryDatabase';

describe('InMemoryDatabase', () => {
  it('restores every tracked table when a transaction rejects', async () => {
    const database = new InMemoryDatabase();
    const orders = new InMemoryTable<string>(database);
    const outbox = new InMemoryTable<string>(database);
    orders.set('1', 'pending_payment');

    await expect(
      database.transaction(async () => {
        orders.set('1', 'paid');
        orders.set('2', 'pending_payment');
        outbox.set('evt-1', 'order.created');
        throw new Error('constraint violated');
      })
    ).rejects.toThrow('constraint violated');

    expect(orders.values()).toEqual(['pending_payment']);
    expect(outbox.size).toBe(0);
  });

  it('commits the writes of a transaction that resolves', async () => {
    const database = new InMemoryDatabase();
    const orders = new InMemoryTable<string>(database);

    const result = await database.transaction(async () => {
      orders.set('1', 'paid');
      return orders.get('1');
    });

    expect(result).toBe('paid');
    expect(orders.get('1')).toBe('paid');
  });

  it('runs transactions one after another', async () => {
    const database = new InMemoryDatabase();
    const order: string[] = [];

    const slow = database.transaction(async () => {
      order.push('slow:start');
      await new Promise((resolve) => setTimeout(resolve, 10));
      order.push('slow:end');
    });
    const fast = database.transaction(async () => {
      order.push('fast');
    });
    await Promise.all([slow, fast]);

    expect(order).toEqual(['slow:start', 'slow:end', 'fast']);
  });

  it('keeps running transactions after one fails', async () => {
    const database = new InMemoryDatabase();
    const failed = database.transaction(async () => {
      throw new Error('boom');
    });

    await expect(failed).rejects.toThrow('boom');
    await expect(database.transaction(async () => 'next')).resolves.toBe('next');
  });
});
