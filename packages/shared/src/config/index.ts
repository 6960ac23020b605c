import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import type { DatabaseConfig } from '../database';
import { ConfigurationError } from '../errors';
import { RetryPolicy } from '../messaging/RetryPolicy';
import { Binding, RoutingTable } from '../messaging/RoutingTable';

const DAY_MS = 24 * 60 * 60 * 1000;

const int = (fallback: number) => z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  SERVICE_NAME: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(1).max(65535).optional(),
  NODE_ENV: z.string().default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  DB_HOST: z.string().default('localhost'),
  DB_PORT: int(5432),
  DB_USER: z.string().default('postgres'),
  DB_PASSWORD: z.string().default('postgres'),
  DB_NAME: z.string().optional(),

  BROKER_DB_HOST: z.string().optional(),
  BROKER_DB_PORT: z.coerce.number().int().positive().optional(),
  BROKER_DB_USER: z.string().optional(),
  BROKER_DB_PASSWORD: z.string().optional(),
  BROKER_DB_NAME: z.string().default('broker'),

  MAX_ATTEMPTS: int(5),
  BASE_DELAY_MS: int(1000),
  MAX_DELAY_MS: int(60_000),
  RETRY_JITTER_RATIO: z.coerce.number().min(0).lt(1).default(0.2),

  VISIBILITY_TIMEOUT_MS: int(30_000),
  HANDLER_TIMEOUT_MS: int(10_000),
  POLL_INTERVAL_MS: int(500),
  PREFETCH: int(1),

  PUBLISH_TIMEOUT_MS: int(2000),
  OUTBOX_POLL_INTERVAL_MS: int(1000),
  OUTBOX_BATCH_SIZE: int(100),

  LEDGER_RETENTION_DAYS: int(30),
  DEAD_LETTER_RETENTION_DAYS: int(14),
  RETENTION_CRON: z.string().default('0 3 * * *'),
  MAX_REPLAY_COUNT: int(3),

  JAEGER_ENDPOINT: z.string().url().optional(),
  MAIL_RELAY_URL: z.string().url().optional(),
  PAYMENT_GATEWAY_TIMEOUT_MS: int(5000),
  BINDINGS_PATH: z.string().optional(),
});

export interface PipelineConfig {
  serviceName: string;
  port: number;
  nodeEnv: string;
  logLevel: string;
  database: DatabaseConfig;
  brokerDatabase: DatabaseConfig;
  retry: {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterRatio: number;
  };
  consumer: {
    visibilityTimeoutMs: number;
    handlerTimeoutMs: number;
    pollIntervalMs: number;
    prefetch: number;
  };
  publisher: {
    publishTimeoutMs: number;
  };
  outbox: {
    pollIntervalMs: number;
    batchSize: number;
  };
  retention: {
    ledgerMs: number;
    deadLetterMs: number;
    cron: string;
  };
  deadLetters: {
    maxReplayCount: number;
  };
  jaegerEndpoint?: string;
  mailRelayUrl?: string;
  paymentGatewayTimeoutMs: number;
  bindingsPath: string;
}

export interface ServiceDefaults {
  serviceName: string;
  port: number;
  databaseName?: string;
}

/**
 * Reads pipeline settings from the environment. Throws ConfigurationError
 * listing every invalid variable.
 */
export const loadPipelineConfig = (
  env: NodeJS.ProcessEnv = process.env,
  defaults: ServiceDefaults = { serviceName: 'orderflow', port: 3000 }
): PipelineConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid environment: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  const e = parsed.data;

  const database: DatabaseConfig = {
    host: e.DB_HOST,
    port: e.DB_PORT,
    username: e.DB_USER,
    password: e.DB_PASSWORD,
    database: e.DB_NAME ?? defaults.databaseName ?? defaults.serviceName.replace(/-/g, '_'),
  };

  const config: PipelineConfig = {
    serviceName: e.SERVICE_NAME ?? defaults.serviceName,
    port: e.PORT ?? defaults.port,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    database,
    brokerDatabase: {
      host: e.BROKER_DB_HOST ?? database.host,
      port: e.BROKER_DB_PORT ?? database.port,
      username: e.BROKER_DB_USER ?? database.username,
      password: e.BROKER_DB_PASSWORD ?? database.password,
      database: e.BROKER_DB_NAME,
    },
    retry: {
      maxAttempts: e.MAX_ATTEMPTS,
      baseDelayMs: e.BASE_DELAY_MS,
      maxDelayMs: e.MAX_DELAY_MS,
      jitterRatio: e.RETRY_JITTER_RATIO,
    },
    consumer: {
      visibilityTimeoutMs: e.VISIBILITY_TIMEOUT_MS,
      handlerTimeoutMs: e.HANDLER_TIMEOUT_MS,
      pollIntervalMs: e.POLL_INTERVAL_MS,
      prefetch: e.PREFETCH,
    },
    publisher: { publishTimeoutMs: e.PUBLISH_TIMEOUT_MS },
    outbox: { pollIntervalMs: e.OUTBOX_POLL_INTERVAL_MS, batchSize: e.OUTBOX_BATCH_SIZE },
    retention: {
      ledgerMs: e.LEDGER_RETENTION_DAYS * DAY_MS,
      deadLetterMs: e.DEAD_LETTER_RETENTION_DAYS * DAY_MS,
      cron: e.RETENTION_CRON,
    },
    deadLetters: { maxReplayCount: e.MAX_REPLAY_COUNT },
    jaegerEndpoint: e.JAEGER_ENDPOINT,
    mailRelayUrl: e.MAIL_RELAY_URL,
    paymentGatewayTimeoutMs: e.PAYMENT_GATEWAY_TIMEOUT_MS,
    bindingsPath: e.BINDINGS_PATH ?? path.resolve(process.cwd(), 'config', 'bindings.json'),
  };

  if (config.consumer.handlerTimeoutMs >= config.consumer.visibilityTimeoutMs) {
    throw new ConfigurationError('HANDLER_TIMEOUT_MS must be shorter than VISIBILITY_TIMEOUT_MS');
  }

  const window = createRetryPolicy(config).maxRedeliveryWindowMs(config.consumer.visibilityTimeoutMs);
  if (config.retention.ledgerMs <= window) {
    throw new ConfigurationError(
      `Ledger retention (${config.retention.ledgerMs}ms) must exceed the maximum redelivery window (${window}ms)`
    );
  }

  return config;
};

export const createRetryPolicy = (config: Pick<PipelineConfig, 'retry'>, random?: () => number): RetryPolicy =>
  new RetryPolicy({ ...config.retry, random });

const bindingsSchema = z.array(
  z.object({
    queue: z.string().min(1),
    pattern: z.string().min(1),
  })
);

export const parseBindings = (raw: unknown, source = 'bindings'): Binding[] => {
  const parsed = bindingsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid ${source}: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`
    );
  }
  return parsed.data;
};

/** Reads `[{ queue, pattern }]` from a JSON file into a routing table. */
export const loadBindings = (filePath: string): RoutingTable => {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read bindings from ${filePath}`, { cause: error });
  }
  return new RoutingTable(parseBindings(raw, filePath));
};
