import cron, { type ScheduledTask } from 'node-cron';
import { logger } from '../infra/logger.js';
import type { Clock } from '../infra/clock.js';
import { systemClock } from '../infra/clock.js';
import { describeError } from '../domain/errors.js';
import type { JobRetentionService } from '../services/JobRetentionService.js';
import type { JobReconciliationService } from '../services/JobReconciliationService.js';

export interface CronSchedule {
  expression: string;
  /** false when the expression ticks more often and the interval is checked internally */
  exact: boolean;
}

/**
 * Six-field (seconds) cron expression for an interval in seconds.
 * Intervals cron cannot express exactly fall back to a per-second tick.
 */
export function toCronExpression(seconds: number): CronSchedule {
  if (seconds < 60) {
    if (60 % seconds === 0) {
      return { expression: `*/${seconds} * * * * *`, exact: true };
    }
    return { expression: '* * * * * *', exact: false };
  }

  if (seconds % 60 === 0 && seconds < 3600) {
    const minutes = seconds / 60;
    if (60 % minutes === 0) {
      return { expression: `0 */${minutes} * * * *`, exact: true };
    }
  }

  if (seconds % 3600 === 0 && seconds <= 86400) {
    const hours = seconds / 3600;
    if (24 % hours === 0) {
      return { expression: hours === 24 ? '0 0 0 * * *' : `0 0 */${hours} * * *`, exact: true };
    }
  }

  return { expression: '* * * * * *', exact: false };
}

interface PeriodicRun {
  name: string;
  intervalMs: number;
  schedule: CronSchedule;
  task: ScheduledTask | null;
  running: boolean;
  lastRunAt: number | null;
}

export interface MaintenanceSchedulerOptions {
  sweepIntervalSeconds: number;
  reconcileIntervalSeconds: number;
}

/**
 * MaintenanceScheduler - periodic expiry sweep and reconciliation using node-cron.
 * Runs of the same kind never overlap; a tick that finds the previous run busy is skipped.
 */
export class MaintenanceScheduler {
  private sweep: PeriodicRun;
  private reconcile: PeriodicRun;

  constructor(
    private retention: Pick<JobRetentionService, 'sweep'>,
    private reconciliation: Pick<JobReconciliationService, 'reconcile'>,
    options: MaintenanceSchedulerOptions,
    private clock: Clock = systemClock
  ) {
    this.sweep = createRun('expiry sweep', options.sweepIntervalSeconds);
    this.reconcile = createRun('reconciliation', options.reconcileIntervalSeconds);
  }

  start(): void {
    this.schedule(this.sweep, () => this.runSweep());
    this.schedule(this.reconcile, () => this.runReconcile());
  }

  stop(): void {
    for (const run of [this.sweep, this.reconcile]) {
      if (run.task) {
        run.task.stop();
        run.task = null;
        logger.info('Maintenance task stopped', { name: run.name });
      }
    }
  }

  async runSweep(): Promise<void> {
    await this.guarded(this.sweep, async (now) => {
      await this.retention.sweep(now);
    });
  }

  async runReconcile(): Promise<void> {
    await this.guarded(this.reconcile, async (now) => {
      await this.reconciliation.reconcile(now);
    });
  }

  private schedule(run: PeriodicRun, execute: () => Promise<void>): void {
    if (run.task) {
      return;
    }

    run.task = cron.schedule(run.schedule.expression, async () => {
      if (!run.schedule.exact && !this.isDue(run)) {
        return;
      }
      await execute();
    });

    logger.info('Maintenance task scheduled', {
      name: run.name,
      intervalSeconds: run.intervalMs / 1000,
      cronExpression: run.schedule.expression,
    });
  }

  private isDue(run: PeriodicRun): boolean {
    return run.lastRunAt === null || this.clock.now().getTime() - run.lastRunAt >= run.intervalMs;
  }

  private async guarded(run: PeriodicRun, body: (now: Date) => Promise<void>): Promise<void> {
    if (run.running) {
      logger.debug('Maintenance run skipped, previous run still active', { name: run.name });
      return;
    }

    run.running = true;
    const now = this.clock.now();
    run.lastRunAt = now.getTime();
    try {
      await body(now);
    } catch (error) {
      logger.error('Maintenance run failed', { name: run.name, error: describeError(error) });
    } finally {
      run.running = false;
    }
  }
}

function createRun(name: string, intervalSeconds: number): PeriodicRun {
  return {
    name,
    intervalMs: intervalSeconds * 1000,
    schedule: toCronExpression(intervalSeconds),
    task: null,
    running: false,
    lastRunAt: null,
  };
}
