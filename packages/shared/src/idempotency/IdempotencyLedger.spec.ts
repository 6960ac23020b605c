import { QueryFailedError } from 'typeorm';
import { InMemoryDatabase, InMemoryTable } from '../database/InMemoryDatabase';
import { InMemoryUnitOfWork } from '../database/UnitOfWork';
import { DuplicateEventError } from '../errors';
import { ManualClock } from '../utils/clock';
import { InMemoryLedger, isUniqueViolation, runIdempotent } from './IdempotencyLedger';

describe('InMemoryLedger', () => {
  it('records a (consumerGroup, eventId) pair once', async () => {
    const ledger = new InMemoryLedger(new InMemoryDatabase(), new ManualClock());

    await ledger.recordProcessed('payments', 'evt-1', 'charged', 'order.created');

    expect(await ledger.alreadyProcessed('payments', 'evt-1')).toBe(true);
    expect(await ledger.alreadyProcessed('notifications', 'evt-1')).toBe(false);
    await expect(ledger.recordProcessed('payments', 'evt-1', 'charged')).rejects.toBeInstanceOf(DuplicateEventError);
    expect(ledger.entries('payments')).toEqual([
      {
        consumerGroup: 'payments',
        eventId: 'evt-1',
        eventType: 'order.created',
        outcome: 'charged',
        processedAt: new Date('2024-03-01T10:00:00.000Z'),
      },
    ]);
  });

  it('purges entries processed before the cutoff', async () => {
    const clock = new ManualClock();
    const ledger = new InMemoryLedger(new InMemoryDatabase(), clock);
    await ledger.recordProcessed('payments', 'old', 'processed');
    clock.advance(60_000);
    await ledger.recordProcessed('payments', 'new', 'processed');

    expect(await ledger.purgeOlderThan(clock.now())).toBe(1);
    expect(ledger.entries().map((entry) => entry.eventId)).toEqual(['new']);
  });
});

describe('runIdempotent', () => {
  let database: InMemoryDatabase;
  let ledger: InMemoryLedger;
  let effects: InMemoryTable<string>;
  let unitOfWork: InMemoryUnitOfWork<{ ledger: InMemoryLedger; effects: InMemoryTable<string> }>;

  const envelope = { eventId: 'evt-42', eventType: 'order.created' };

  beforeEach(() => {
    database = new InMemoryDatabase();
    ledger = new InMemoryLedger(database, new ManualClock());
    effects = new InMemoryTable<string>(database);
    unitOfWork = new InMemoryUnitOfWork(database, { ledger, effects });
  });

  it('applies the work once and reports later deliveries as duplicates', async () => {
    const work = jest.fn(async (scope: { effects: InMemoryTable<string> }) => {
      scope.effects.set('payment-1', 'completed');
      return 'payment-1';
    });

    const first = await runIdempotent(unitOfWork, 'payments', envelope, work, (id) => `charged ${id}`);
    const second = await runIdempotent(unitOfWork, 'payments', envelope, work);

    expect(first).toEqual({ status: 'processed', result: 'payment-1' });
    expect(second).toEqual({ status: 'duplicate' });
    expect(work).toHaveBeenCalledTimes(1);
    expect(ledger.entries()[0].outcome).toBe('charged payment-1');
  });

  it('rolls back the effect and the ledger entry when the work fails', async () => {
    await expect(
      runIdempotent(unitOfWork, 'payments', envelope, async (scope) => {
        scope.effects.set('payment-1', 'completed');
        throw new Error('gateway timeout');
      })
    ).rejects.toThrow('gateway timeout');

    expect(effects.size).toBe(0);
    expect(await ledger.alreadyProcessed('payments', envelope.eventId)).toBe(false);
  });

  it('turns a lost race on the ledger into a duplicate and discards the work', async () => {
    const result = await runIdempotent(unitOfWork, 'payments', envelope, async (scope) => {
      scope.effects.set('payment-1', 'completed');
      // Another delivery of the same event recorded first.
      await scope.ledger.recordProcessed('payments', envelope.eventId, 'processed');
    });

    expect(result).toEqual({ status: 'duplicate' });
    expect(effects.size).toBe(0);
  });

  it('keeps consumer groups independent', async () => {
    await runIdempotent(unitOfWork, 'payments', envelope, async () => undefined);

    expect(await runIdempotent(unitOfWork, 'notifications', envelope, async () => 'sent')).toEqual({
      status: 'processed',
      result: 'sent',
    });
  });
});

describe('isUniqueViolation', () => {
  it('matches the Postgres unique_violation code only', () => {
    const duplicate = new QueryFailedError('INSERT', [], Object.assign(new Error('duplicate key'), { code: '23505' }));
    const other = new QueryFailedError('INSERT', [], Object.assign(new Error('deadlock'), { code: '40P01' }));

    expect(isUniqueViolation(duplicate)).toBe(true);
    expect(isUniqueViolation(other)).toBe(false);
    expect(isUniqueViolation(new Error('23505'))).toBe(false);
  });
});
