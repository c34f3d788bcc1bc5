import type { Job, JobOutcome } from '../domain/entities/Job.js';
import { EngineError, NotFoundError, describeError } from '../domain/errors.js';
import type { DiscoveryEngine, DiscoveryResult } from '../infra/engine/DiscoveryEngine.js';
import type { TaskDelivery, TaskQueue } from '../infra/queue/TaskQueue.js';
import type { ArtifactStore } from '../infra/storage/ArtifactStore.js';
import { logger } from '../infra/logger.js';
import type { JobService } from './JobService.js';

/**
 * completed: outcome recorded and task acknowledged.
 * skipped: job was not pending (duplicate or stale delivery); task acknowledged.
 * unacknowledged: outcome could not be recorded; the lease runs out and reconciliation takes over.
 * abandoned: the lease was lost while running; the engine was stopped and nothing was reported.
 */
export type ExecutionResult = 'completed' | 'skipped' | 'unacknowledged' | 'abandoned';

export interface TaskHandler {
  execute(delivery: TaskDelivery): Promise<ExecutionResult>;
}

export interface WorkerExecutorOptions {
  leaseMs: number;
  /** Defaults to a third of the lease */
  heartbeatMs?: number;
}

/**
 * WorkerExecutor - runs one delivered task end to end.
 * The task is acknowledged only after the outcome is durably recorded.
 */
export class WorkerExecutor implements TaskHandler {
  private readonly heartbeatMs: number;

  constructor(
    private jobService: JobService,
    private queue: TaskQueue,
    private store: ArtifactStore,
    private engine: DiscoveryEngine,
    private options: WorkerExecutorOptions
  ) {
    this.heartbeatMs = options.heartbeatMs ?? Math.max(Math.floor(options.leaseMs / 3), 1);
  }

  async execute(delivery: TaskDelivery): Promise<ExecutionResult> {
    const { jobId } = delivery.message;

    let started: Job | null;
    try {
      started = this.jobService.markRunning(jobId);
    } catch (error) {
      logger.error('Could not start discovery, delivery left unacknowledged', {
        jobId,
        error: describeError(error),
      });
      return 'unacknowledged';
    }

    if (!started) {
      await this.acknowledge(delivery);
      return 'skipped';
    }

    const withdrawn = new AbortController();
    const heartbeat = setInterval(() => {
      void this.heartbeat(delivery, withdrawn);
    }, this.heartbeatMs);

    let outcome: JobOutcome;
    try {
      outcome = await this.runEngine(delivery, withdrawn.signal);
    } finally {
      clearInterval(heartbeat);
    }

    if (withdrawn.signal.aborted) {
      // Failed, requeued or deleted elsewhere; the job is no longer ours to report
      logger.warn('Task withdrawn while running, outcome discarded', { jobId });
      return 'abandoned';
    }

    try {
      await this.jobService.reportOutcome(jobId, outcome);
    } catch (error) {
      if (error instanceof NotFoundError) {
        // Deleted while running: drop whatever the engine left behind
        logger.info('Discovery deleted while running, outcome discarded', { jobId });
        await this.discardArtifacts(jobId);
        await this.acknowledge(delivery);
        return 'skipped';
      }
      logger.error('Could not record discovery outcome, delivery left unacknowledged', {
        jobId,
        error: describeError(error),
      });
      return 'unacknowledged';
    }

    await this.acknowledge(delivery);
    return 'completed';
  }

  private async runEngine(delivery: TaskDelivery, signal: AbortSignal): Promise<JobOutcome> {
    const { jobId, logRef, configRef } = delivery.message;
    try {
      const outputDir = await this.store.workspace(jobId);
      const result = await Promise.race([
        this.engine.run({
          jobId,
          logPath: this.store.resolve(logRef),
          configPath: configRef ? this.store.resolve(configRef) : null,
          outputDir,
          signal,
        }),
        rejectWhenAborted(signal),
      ]);
      const outputPath = await this.store.put(jobId, result.fileName, result.content);
      return { status: 'succeeded', outputPath };
    } catch (error) {
      logger.warn('Discovery engine failed', { jobId, error: describeError(error) });
      return { status: 'failed', errorDetail: describeError(error) };
    }
  }

  private async heartbeat(delivery: TaskDelivery, withdrawn: AbortController): Promise<void> {
    if (withdrawn.signal.aborted) {
      return;
    }
    try {
      const held = await this.queue.extendLease(delivery, this.options.leaseMs);
      if (!held) {
        logger.warn('Task lease lost while running, stopping engine', {
          jobId: delivery.message.jobId,
        });
        withdrawn.abort();
      }
    } catch (error) {
      logger.warn('Task lease heartbeat failed', {
        jobId: delivery.message.jobId,
        error: describeError(error),
      });
    }
  }

  private async acknowledge(delivery: TaskDelivery): Promise<void> {
    try {
      await this.queue.ack(delivery);
    } catch (error) {
      // The reconciliation sweep removes tasks of finished jobs
      logger.warn('Task acknowledgement failed', {
        jobId: delivery.message.jobId,
        error: describeError(error),
      });
    }
  }

  private async discardArtifacts(jobId: string): Promise<void> {
    try {
      await this.store.deleteJob(jobId);
    } catch (error) {
      logger.error('Failed to discard artifacts of deleted discovery', {
        jobId,
        error: describeError(error),
      });
    }
  }
}

/**
 * Settles the engine race once the task is withdrawn, even if the engine ignores the signal.
 */
function rejectWhenAborted(signal: AbortSignal): Promise<DiscoveryResult> {
  return new Promise((_resolve, reject) => {
    signal.addEventListener(
      'abort',
      () => reject(new EngineError('Discovery stopped: task withdrawn from this worker')),
      { once: true }
    );
  });
}
