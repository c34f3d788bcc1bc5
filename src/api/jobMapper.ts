import type { Job } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import { resultPathFor } from '../services/JobService.js';

export function statusUrlFor(job: Job, baseUrl: string): string {
  return `${baseUrl}/discoveries/${job.id}`;
}

/**
 * Client-facing view of a job. Storage paths and the callback URL stay internal.
 */
export function mapJobToResponse(job: Job, baseUrl: string) {
  return {
    discoveryId: job.id,
    status: job.status,
    submittedAt: job.submittedAt,
    startedAt: job.startedAt,
    completedAt: job.completedAt,
    expiresAt: job.expiresAt,
    attempts: job.attempts,
    errorDetail: job.errorDetail,
    hasConfiguration: job.inputConfigPath !== null,
    hasCallback: job.callbackUrl !== null,
    statusUrl: statusUrlFor(job, baseUrl),
    ...(job.inputConfigPath ? { configurationUrl: `${statusUrlFor(job, baseUrl)}/configuration` } : {}),
    ...(job.status === 'succeeded' ? { resultUrl: `${baseUrl}${resultPathFor(job.id)}` } : {}),
  };
}

export function mapEventToResponse(event: JobEvent) {
  return {
    id: event.id,
    status: event.status,
    message: event.message,
    createdAt: event.createdAt,
  };
}
