import pino from 'pino';

export interface LoggerConfig {
  serviceName: string;
  level?: string;
  prettyPrint?: boolean;
}

export class Logger {
  private logger: pino.Logger;

  constructor(config: LoggerConfig, instance?: pino.Logger) {
    this.logger =
      instance ??
      pino({
        level: config.level || 'info',
        transport: config.prettyPrint
          ? { target: 'pino-pretty', options: { colorize: true } }
          : undefined,
        base: {
          service: config.serviceName,
        },
      });
  }

  info(msg: string, context?: Record<string, unknown>): void {
    this.logger.info(context || {}, msg);
  }

  error(msg: string, error?: unknown, context?: Record<string, unknown>): void {
    const err = error instanceof Error ? error : error !== undefined ? new Error(String(error)) : undefined;
    this.logger.error(
      {
        ...(context || {}),
        error: err
          ? { message: err.message, stack: err.stack, name: err.name }
          : undefined,
      },
      msg
    );
  }

  warn(msg: string, context?: Record<string, unknown>): void {
    this.logger.warn(context || {}, msg);
  }

  debug(msg: string, context?: Record<string, unknown>): void {
    this.logger.debug(context || {}, msg);
  }

  child(bindings: Record<string, unknown>): Logger {
    const service = this.logger.bindings().service;
    return new Logger(
      { serviceName: typeof service === 'string' ? service : 'unknown', level: this.logger.level },
      this.logger.child(bindings)
    );
  }
}

export const createLogger = (config: LoggerConfig): Logger => new Logger(config);

/** Logger for tests and tooling that should stay quiet. */
export const createSilentLogger = (serviceName = 'test'): Logger =>
  new Logger({ serviceName, level: 'silent' });
