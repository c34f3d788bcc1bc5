import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { ArtifactStore } from '../infra/storage/ArtifactStore.js';
import type { TaskQueue } from '../infra/queue/TaskQueue.js';
import { isActive } from '../domain/entities/Job.js';
import { describeError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobService } from './JobService.js';

export interface ReconciliationOptions {
  maxProcessingMs: number;
  dispatchGraceMs: number;
  maxDeliveryAttempts: number;
  retryBackoffMs: number;
}

export interface ReconciliationSummary {
  timedOut: number;
  requeued: number;
  abandoned: number;
  redispatched: number;
  missingInput: number;
  staleTasksRemoved: number;
}

function formatDuration(ms: number): string {
  const minutes = Math.round(ms / 60_000);
  if (minutes >= 1) {
    return minutes === 1 ? '1 minute' : `${minutes} minutes`;
  }
  const seconds = Math.round(ms / 1000);
  return seconds === 1 ? '1 second' : `${seconds} seconds`;
}

/**
 * JobReconciliationService - detect stuck or under-dispatched jobs and retry or fail them.
 */
export class JobReconciliationService {
  constructor(
    private jobRepo: JobRepository,
    private jobService: JobService,
    private queue: TaskQueue,
    private store: ArtifactStore,
    private options: ReconciliationOptions
  ) {}

  async reconcile(now: Date): Promise<ReconciliationSummary> {
    const summary: ReconciliationSummary = {
      timedOut: 0,
      requeued: 0,
      abandoned: 0,
      redispatched: 0,
      missingInput: 0,
      staleTasksRemoved: 0,
    };

    await this.failTimedOutJobs(now, summary);
    await this.recoverExpiredLeases(now, summary);
    await this.redispatchPendingJobs(now, summary);

    const changed = Object.values(summary).some((count) => count > 0);
    if (changed) {
      logger.info('Reconciliation finished', { ...summary });
    }
    return summary;
  }

  /**
   * Backoff before the next delivery after `attempts` lost deliveries
   */
  backoffFor(attempts: number): number {
    return this.options.retryBackoffMs * 2 ** Math.max(attempts - 1, 0);
  }

  private async failTimedOutJobs(now: Date, summary: ReconciliationSummary): Promise<void> {
    const cutoff = new Date(now.getTime() - this.options.maxProcessingMs);
    const reason = `Timed out after ${formatDuration(this.options.maxProcessingMs)}`;

    for (const job of this.jobRepo.listRunningStartedBefore(cutoff)) {
      try {
        if (await this.jobService.failIfActive(job.id, reason)) {
          summary.timedOut += 1;
        }
      } catch (error) {
        logger.error('Failed to time out discovery', { jobId: job.id, error: describeError(error) });
      }
    }
  }

  /**
   * A lease that ran out means the worker stopped heartbeating: it crashed or hung.
   */
  private async recoverExpiredLeases(now: Date, summary: ReconciliationSummary): Promise<void> {
    const leases = await this.queue.listExpiredLeases(now);

    for (const lease of leases) {
      try {
        const job = this.jobRepo.getById(lease.jobId);

        if (!job || !isActive(job.status)) {
          await this.queue.remove(lease.jobId);
          summary.staleTasksRemoved += 1;
          continue;
        }

        if (job.status === 'pending') {
          // Worker died between reserving the task and starting the job
          await this.queue.release(job.id, now);
          summary.requeued += 1;
          continue;
        }

        if (job.attempts >= this.options.maxDeliveryAttempts) {
          const reason = `Worker stopped responding on ${job.attempts} of ${this.options.maxDeliveryAttempts} attempts`;
          if (await this.jobService.failIfActive(job.id, reason)) {
            summary.abandoned += 1;
          }
          continue;
        }

        const availableAt = new Date(now.getTime() + this.backoffFor(job.attempts));
        const reason = `Worker stopped responding (attempt ${job.attempts} of ${this.options.maxDeliveryAttempts})`;
        if (await this.jobService.requeue(job.id, availableAt, reason)) {
          summary.requeued += 1;
        }
      } catch (error) {
        logger.error('Failed to recover expired task lease', {
          jobId: lease.jobId,
          error: describeError(error),
        });
      }
    }
  }

  private async redispatchPendingJobs(now: Date, summary: ReconciliationSummary): Promise<void> {
    const cutoff = new Date(now.getTime() - this.options.dispatchGraceMs);

    for (const job of this.jobRepo.listStalePending(cutoff)) {
      try {
        if (await this.queue.has(job.id)) {
          continue;
        }

        if (!(await this.store.exists(job.inputLogPath))) {
          if (await this.jobService.failIfActive(job.id, 'Event log artifact is missing')) {
            summary.missingInput += 1;
          }
          continue;
        }

        if (await this.jobService.dispatch(job)) {
          summary.redispatched += 1;
          logger.info('Pending discovery re-dispatched', { jobId: job.id });
        }
      } catch (error) {
        logger.warn('Re-dispatch of pending discovery failed', {
          jobId: job.id,
          error: describeError(error),
        });
      }
    }
  }
}
