import { randomUUID } from 'node:crypto';
import type { Job, JobOutcome, JobStatus } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import { createJob, isActive, isVisible, sourcesOf } from '../domain/entities/Job.js';
import {
  bindEventLog,
  parseDiscoveryConfiguration,
  serializeDiscoveryConfiguration,
} from '../domain/entities/DiscoveryConfiguration.js';
import { inferEventLogExtension, mediaTypeForFile } from '../domain/mediaTypes.js';
import {
  ConflictError,
  NotFoundError,
  StorageError,
  ValidationError,
  describeError,
} from '../domain/errors.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { JobEventRepository } from '../infra/repositories/JobEventRepository.js';
import type { ArtifactStore } from '../infra/storage/ArtifactStore.js';
import {
  CONFIGURATION_ARTIFACT,
  EVENT_LOG_ARTIFACT,
  artifactName,
} from '../infra/storage/ArtifactStore.js';
import type { TaskMessage, TaskQueue } from '../infra/queue/TaskQueue.js';
import type { CallbackPayload, Notifier } from '../infra/CallbackNotifier.js';
import type { Clock } from '../infra/clock.js';
import { systemClock } from '../infra/clock.js';
import { logger, safeUrl } from '../infra/logger.js';

export interface UploadedFile {
  fileName: string;
  mediaType: string;
  content: Buffer;
}

export interface SubmitDiscoveryInput {
  eventLog?: UploadedFile | null;
  configuration?: UploadedFile | null;
  callbackUrl?: string | null;
}

export interface StoredArtifact {
  fileName: string;
  mediaType: string;
  content: Buffer;
}

export interface OutcomeReport {
  job: Job;
  transitioned: boolean;
}

export interface JobServiceOptions {
  retentionMs: number;
  /** Absolute base for links sent in callbacks; relative links when unset */
  publicBaseUrl?: string;
}

export function resultPathFor(jobId: string): string {
  return `/discoveries/${jobId}/result`;
}

/**
 * JobService - the job lifecycle manager.
 *
 * Every status change goes through the repository's compare-and-set update, so
 * concurrent or duplicated reports resolve to exactly one transition.
 */
export class JobService {
  private notifications = new Set<Promise<void>>();

  constructor(
    private jobRepo: JobRepository,
    private eventRepo: JobEventRepository,
    private store: ArtifactStore,
    private queue: TaskQueue,
    private notifier: Notifier,
    private options: JobServiceOptions,
    private clock: Clock = systemClock
  ) {}

  /**
   * Validates and persists a submission, then dispatches it.
   * All-or-nothing up to the record; dispatch failures leave the job pending for reconciliation.
   */
  async submit(input: SubmitDiscoveryInput): Promise<Job> {
    const eventLog = input.eventLog;
    if (!eventLog || eventLog.content.length === 0) {
      throw new ValidationError('An event log file is required');
    }

    const extension = inferEventLogExtension(eventLog.mediaType, eventLog.fileName);
    if (!extension) {
      throw new ValidationError('Unsupported event log file type', {
        mediaType: eventLog.mediaType,
        fileName: eventLog.fileName,
      });
    }

    const callbackUrl = input.callbackUrl ? this.validateCallbackUrl(input.callbackUrl) : null;
    const configuration = input.configuration
      ? parseDiscoveryConfiguration(input.configuration.content)
      : null;

    const jobId = randomUUID();
    const submittedAt = this.clock.now();
    let job: Job;

    try {
      const logRef = await this.store.put(jobId, `${EVENT_LOG_ARTIFACT}${extension}`, eventLog.content);
      const configRef = configuration
        ? await this.store.put(
            jobId,
            CONFIGURATION_ARTIFACT,
            serializeDiscoveryConfiguration(bindEventLog(configuration, this.store.resolve(logRef)))
          )
        : null;

      job = createJob({
        id: jobId,
        submittedAt,
        retentionMs: this.options.retentionMs,
        inputLogPath: logRef,
        inputConfigPath: configRef,
        callbackUrl,
      });
      this.jobRepo.create(job);
    } catch (error) {
      await this.discardArtifacts(jobId);
      logger.error('Discovery submission could not be persisted', {
        jobId,
        error: describeError(error),
      });
      if (error instanceof StorageError) {
        throw error;
      }
      throw new StorageError('Failed to persist discovery submission', {
        cause: describeError(error),
      });
    }

    this.recordEvent(jobId, 'pending', 'Discovery submitted');
    logger.info('Discovery submitted', {
      jobId,
      hasConfiguration: configuration !== null,
      callbackUrl: callbackUrl ? safeUrl(callbackUrl) : null,
    });

    try {
      await this.dispatch(job);
    } catch (error) {
      logger.warn('Discovery dispatch failed, left pending for reconciliation', {
        jobId,
        error: describeError(error),
      });
    }

    return job;
  }

  /**
   * Enqueues the processing task of a pending job. Throws DispatchError when the queue is down.
   */
  async dispatch(job: Job): Promise<boolean> {
    return this.queue.enqueue(this.taskFor(job));
  }

  getJob(jobId: string): Job {
    const job = this.jobRepo.getById(jobId);
    if (!job || !isVisible(job, this.clock.now())) {
      throw new NotFoundError('Discovery', jobId);
    }
    return job;
  }

  listJobs(params: { status?: JobStatus; limit?: number } = {}): Job[] {
    return this.jobRepo.list({ now: this.clock.now(), ...params });
  }

  listEvents(jobId: string): JobEvent[] {
    this.getJob(jobId);
    return this.eventRepo.listByJob(jobId);
  }

  /**
   * pending -> running. Returns null when the job is not pending (already taken,
   * finished, expired or deleted), in which case the task must not run.
   */
  markRunning(jobId: string): Job | null {
    const startedAt = this.clock.now();
    const changed = this.jobRepo.transition({
      jobId,
      from: ['pending'],
      to: 'running',
      set: { startedAt, incrementAttempts: true },
    });

    if (!changed) {
      logger.info('Discovery not pending, task skipped', { jobId });
      return null;
    }

    this.recordEvent(jobId, 'running', 'Discovery started');
    logger.info('Discovery running', { jobId });
    return this.jobRepo.getById(jobId);
  }

  /**
   * running -> succeeded | failed. Idempotent: a report for a job that is no longer
   * running changes nothing and returns the current record.
   */
  async reportOutcome(jobId: string, outcome: JobOutcome): Promise<OutcomeReport> {
    const completedAt = this.clock.now();
    const expiresAt = new Date(completedAt.getTime() + this.options.retentionMs);

    const changed = this.jobRepo.transition({
      jobId,
      from: ['running'],
      to: outcome.status,
      set:
        outcome.status === 'succeeded'
          ? { completedAt, expiresAt, outputPath: outcome.outputPath, errorDetail: null }
          : { completedAt, expiresAt, outputPath: null, errorDetail: outcome.errorDetail },
    });

    const job = this.jobRepo.getById(jobId);
    if (!job) {
      throw new NotFoundError('Discovery', jobId);
    }

    if (!changed) {
      logger.info('Duplicate outcome ignored', {
        jobId,
        reported: outcome.status,
        current: job.status,
      });
      return { job, transitioned: false };
    }

    this.recordEvent(
      jobId,
      outcome.status,
      outcome.status === 'succeeded' ? 'Discovery succeeded' : outcome.errorDetail
    );
    logger.info(outcome.status === 'succeeded' ? 'Discovery succeeded' : 'Discovery failed', {
      jobId,
      ...(outcome.status === 'failed' ? { reason: outcome.errorDetail } : {}),
    });
    this.dispatchCallback(job);

    return { job, transitioned: true };
  }

  /**
   * running -> pending after a lost worker; the task becomes available again at `availableAt`.
   */
  async requeue(jobId: string, availableAt: Date, reason: string): Promise<boolean> {
    const changed = this.jobRepo.transition({
      jobId,
      from: ['running'],
      to: 'pending',
      set: { startedAt: null },
    });
    if (!changed) {
      return false;
    }

    const job = this.jobRepo.getById(jobId);
    if (job) {
      const released = await this.queue.release(jobId, availableAt);
      if (!released) {
        await this.queue.enqueue(this.taskFor(job), availableAt);
      }
    }

    this.recordEvent(jobId, 'pending', reason);
    logger.warn('Discovery requeued', { jobId, reason, availableAt: availableAt.toISOString() });
    return true;
  }

  /**
   * pending | running -> failed. Returns false when the job was not active.
   */
  async failIfActive(jobId: string, reason: string): Promise<boolean> {
    const completedAt = this.clock.now();
    const changed = this.jobRepo.transition({
      jobId,
      from: ['pending', 'running'],
      to: 'failed',
      set: {
        completedAt,
        expiresAt: new Date(completedAt.getTime() + this.options.retentionMs),
        outputPath: null,
        errorDetail: reason,
      },
    });
    if (!changed) {
      return false;
    }

    this.recordEvent(jobId, 'failed', reason);
    logger.warn('Discovery failed', { jobId, reason });

    await this.queue.remove(jobId);

    const job = this.jobRepo.getById(jobId);
    if (job) {
      this.dispatchCallback(job);
    }
    return true;
  }

  /**
   * Any status -> expired. Returns false when already expired or gone.
   */
  expire(jobId: string): boolean {
    const changed = this.jobRepo.transition({
      jobId,
      from: sourcesOf('expired'),
      to: 'expired',
    });
    if (changed) {
      logger.debug('Discovery expired', { jobId });
    }
    return changed;
  }

  async readResult(jobId: string): Promise<StoredArtifact> {
    const job = this.getJob(jobId);

    if (isActive(job.status)) {
      throw new ConflictError(`Discovery ${jobId} is still processing`, {
        id: jobId,
        status: job.status,
      });
    }
    if (job.status !== 'succeeded' || !job.outputPath) {
      throw new NotFoundError('Result', jobId);
    }

    return this.readArtifact(job.outputPath, 'Result', jobId);
  }

  async readConfiguration(jobId: string): Promise<StoredArtifact> {
    const job = this.getJob(jobId);
    if (!job.inputConfigPath) {
      throw new NotFoundError('Configuration', jobId);
    }
    return this.readArtifact(job.inputConfigPath, 'Configuration', jobId);
  }

  async deleteJob(jobId: string): Promise<void> {
    this.getJob(jobId);
    this.expire(jobId);
    await this.purge(jobId);
    logger.info('Discovery deleted', { jobId });
  }

  /**
   * Deletes every job. A job that fails to delete is logged and left hidden; the rest continue.
   */
  async deleteAllJobs(): Promise<number> {
    let deleted = 0;
    let failed = 0;
    for (const jobId of this.jobRepo.listIds()) {
      try {
        this.expire(jobId);
        if (await this.purge(jobId)) {
          deleted += 1;
        }
      } catch (error) {
        failed += 1;
        logger.error('Failed to delete discovery', { jobId, error: describeError(error) });
      }
    }
    logger.info('All discoveries deleted', { count: deleted, failed });
    return deleted;
  }

  /**
   * Removes artifacts first, then the queue entry, then history and record together.
   * Callers expire the job beforehand so clients stop seeing it before its artifacts go.
   * Returns whether a record was deleted.
   */
  async purge(jobId: string): Promise<boolean> {
    await this.store.deleteJob(jobId);
    await this.queue.remove(jobId);
    return this.jobRepo.delete(jobId);
  }

  /**
   * Waits for callbacks already dispatched. Used on shutdown and in tests.
   */
  async drainNotifications(): Promise<void> {
    await Promise.all([...this.notifications]);
  }

  private dispatchCallback(job: Job): void {
    const callbackUrl = job.callbackUrl;
    if (!callbackUrl) {
      return;
    }

    const payload: CallbackPayload = { discoveryId: job.id, status: job.status };
    if (job.status === 'succeeded') {
      payload.resultUrl = `${this.options.publicBaseUrl ?? ''}${resultPathFor(job.id)}`;
    }
    if (job.errorDetail) {
      payload.errorDetail = job.errorDetail;
    }

    const delivery: Promise<void> = this.notifier
      .notify(callbackUrl, payload)
      .then(
        () => undefined,
        (error: unknown) => {
          logger.error('Callback dispatch failed', { jobId: job.id, error: describeError(error) });
        }
      )
      .finally(() => {
        this.notifications.delete(delivery);
      });
    this.notifications.add(delivery);
  }

  private async readArtifact(ref: string, resource: string, jobId: string): Promise<StoredArtifact> {
    if (!(await this.store.exists(ref))) {
      throw new NotFoundError(resource, jobId);
    }
    const fileName = artifactName(ref);
    return {
      fileName,
      mediaType: mediaTypeForFile(fileName),
      content: await this.store.read(ref),
    };
  }

  private taskFor(job: Job): TaskMessage {
    return { jobId: job.id, logRef: job.inputLogPath, configRef: job.inputConfigPath };
  }

  private validateCallbackUrl(value: string): string {
    let parsed: URL;
    try {
      parsed = new URL(value);
    } catch {
      throw new ValidationError('callback_url must be an absolute URL');
    }
    if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
      throw new ValidationError('callback_url must use http or https');
    }
    return parsed.toString();
  }

  private async discardArtifacts(jobId: string): Promise<void> {
    try {
      await this.store.deleteJob(jobId);
    } catch (error) {
      logger.error('Failed to discard artifacts of rejected submission', {
        jobId,
        error: describeError(error),
      });
    }
  }

  /**
   * History is an audit aid; a failed insert never undoes a committed transition.
   */
  private recordEvent(jobId: string, status: JobStatus, message: string): void {
    try {
      this.eventRepo.record({
        id: randomUUID(),
        jobId,
        status,
        message,
        createdAt: this.clock.now(),
      });
    } catch (error) {
      logger.error('Failed to record job event', {
        jobId,
        status,
        error: describeError(error),
      });
    }
  }
}
