import * as path from 'path';
import { ConfigurationError } from '../errors';
import { loadBindings, loadPipelineConfig, parseBindings } from './index';

const defaults = { serviceName: 'payment-service', port: 3002 };

describe('loadPipelineConfig', () => {
  it('fills every setting from its default', () => {
    const config = loadPipelineConfig({}, defaults);

    expect(config).toMatchObject({
      serviceName: 'payment-service',
      port: 3002,
      logLevel: 'info',
      retry: { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 60_000, jitterRatio: 0.2 },
      consumer: { visibilityTimeoutMs: 30_000, handlerTimeoutMs: 10_000, pollIntervalMs: 500, prefetch: 1 },
      publisher: { publishTimeoutMs: 2000 },
      outbox: { pollIntervalMs: 1000, batchSize: 100 },
      retention: { ledgerMs: 30 * 86_400_000, deadLetterMs: 14 * 86_400_000, cron: '0 3 * * *' },
      deadLetters: { maxReplayCount: 3 },
    });
    expect(config.database).toEqual({
      host: 'localhost',
      port: 5432,
      username: 'postgres',
      password: 'postgres',
      database: 'payment_service',
    });
    expect(config.brokerDatabase).toEqual({ ...config.database, database: 'broker' });
  });

  it('reads overrides from the environment', () => {
    const config = loadPipelineConfig(
      {
        PORT: '4000',
        DB_HOST: 'db.internal',
        DB_PASSWORD: 'test-secret',
        BROKER_DB_HOST: 'broker.internal',
        MAX_ATTEMPTS: '8',
        RETRY_JITTER_RATIO: '0',
        PREFETCH: '4',
      },
      defaults
    );

    expect(config.port).toBe(4000);
    expect(config.retry).toMatchObject({ maxAttempts: 8, jitterRatio: 0 });
    expect(config.consumer.prefetch).toBe(4);
    expect(config.brokerDatabase).toMatchObject({ host: 'broker.internal', password: 'test-secret', port: 5432 });
  });

  it('lists every invalid variable', () => {
    expect(() => loadPipelineConfig({ MAX_ATTEMPTS: '0', RETRY_JITTER_RATIO: '1' }, defaults)).toThrow(
      /MAX_ATTEMPTS: .*; RETRY_JITTER_RATIO: /
    );
  });

  it('requires the handler timeout to fit inside the lease', () => {
    expect(() => loadPipelineConfig({ HANDLER_TIMEOUT_MS: '30000' }, defaults)).toThrow(
      'HANDLER_TIMEOUT_MS must be shorter than VISIBILITY_TIMEOUT_MS'
    );
  });

  it('requires ledger retention to outlast every redelivery', () => {
    const load = () =>
      loadPipelineConfig({ LEDGER_RETENTION_DAYS: '1', VISIBILITY_TIMEOUT_MS: '90000000' }, defaults);

    expect(load).toThrow(ConfigurationError);
    expect(load).toThrow('must exceed the maximum redelivery window');
  });
});

describe('bindings', () => {
  it('loads the checked-in binding file', () => {
    const table = loadBindings(path.resolve(__dirname, '../../../../config/bindings.json'));

    expect(table.route('payment.processed')).toEqual(['notification-service.payments', 'order-service.payment-updates']);
    expect(table.route('payment.failed')).toEqual(['order-service.payment-updates']);
  });

  it('rejects malformed bindings', () => {
    expect(() => parseBindings([{ queue: 'Q1' }], 'inline')).toThrow('Invalid inline: 0.pattern: Required');
  });

  it('reports a missing file as a configuration error', () => {
    expect(() => loadBindings('/nonexistent/bindings.json')).toThrow(
      'Cannot read bindings from /nonexistent/bindings.json'
    );
  });
});
