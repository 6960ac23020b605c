import * as cron from 'node-cron';
import { ConfigurationError } from '../errors';
import type { Logger } from '../observability/logger';
import type { Clock } from '../utils/clock';
import { systemClock } from '../utils/clock';

export interface RetentionTarget {
  name: string;
  retentionMs: number;
  purge(cutoff: Date): Promise<number>;
}

/**
 * Deletes expired ledger entries, forwarded outbox rows and resolved dead
 * letters on a cron schedule.
 */
export class RetentionSweeper {
  private task: cron.ScheduledTask | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly targets: RetentionTarget[],
    private readonly schedule: string,
    logger: Logger,
    private readonly clock: Clock = systemClock
  ) {
    if (!cron.validate(schedule)) {
      throw new ConfigurationError(`Invalid retention schedule "${schedule}"`);
    }
    this.logger = logger.child({ component: 'RetentionSweeper' });
  }

  start(): void {
    if (this.task) return;
    this.task = cron.schedule(this.schedule, () => {
      this.sweep().catch((error) => this.logger.error('Retention sweep failed', error));
    });
    this.logger.info('Retention sweeper scheduled', { schedule: this.schedule });
  }

  stop(): void {
    this.task?.stop();
    this.task = null;
  }

  /** Purges every target; one failing target does not stop the others. */
  async sweep(): Promise<Record<string, number>> {
    const now = this.clock.now().getTime();
    const purged: Record<string, number> = {};
    const failures: unknown[] = [];

    for (const target of this.targets) {
      try {
        purged[target.name] = await target.purge(new Date(now - target.retentionMs));
      } catch (error) {
        failures.push(error);
        this.logger.error('Retention purge failed', error, { target: target.name });
      }
    }

    this.logger.info('Retention sweep finished', { purged });
    if (failures.length > 0) {
      throw new AggregateError(failures, `${failures.length} retention target(s) failed`);
    }
    return purged;
  }
}
