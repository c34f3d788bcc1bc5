/**
 * Job entity - one discovery request and its lifecycle record
 */
export type JobStatus = 'pending' | 'running' | 'succeeded' | 'failed' | 'expired';

export const JOB_STATUSES: readonly JobStatus[] = [
  'pending',
  'running',
  'succeeded',
  'failed',
  'expired',
];

export const ACTIVE_STATUSES: readonly JobStatus[] = ['pending', 'running'];

/**
 * Allowed transitions. `expired` is final.
 */
export const jobTransitions: Record<JobStatus, readonly JobStatus[]> = {
  pending: ['running', 'failed', 'expired'],
  running: ['succeeded', 'failed', 'pending', 'expired'],
  succeeded: ['expired'],
  failed: ['expired'],
  expired: [],
};

export interface Job {
  id: string;
  status: JobStatus;
  submittedAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  expiresAt: Date;
  inputLogPath: string;
  inputConfigPath: string | null;
  outputPath: string | null;
  errorDetail: string | null;
  callbackUrl: string | null;
  attempts: number;
}

export type JobOutcome =
  | { status: 'succeeded'; outputPath: string }
  | { status: 'failed'; errorDetail: string };

/**
 * Factory function to create a new pending Job
 */
export function createJob(params: {
  id: string;
  submittedAt: Date;
  retentionMs: number;
  inputLogPath: string;
  inputConfigPath?: string | null;
  callbackUrl?: string | null;
}): Job {
  return {
    id: params.id,
    status: 'pending',
    submittedAt: params.submittedAt,
    startedAt: null,
    completedAt: null,
    expiresAt: new Date(params.submittedAt.getTime() + params.retentionMs),
    inputLogPath: params.inputLogPath,
    inputConfigPath: params.inputConfigPath ?? null,
    outputPath: null,
    errorDetail: null,
    callbackUrl: params.callbackUrl ?? null,
    attempts: 0,
  };
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

/**
 * Statuses a job may be in for a transition into `to` to be legal
 */
export function sourcesOf(to: JobStatus): JobStatus[] {
  return JOB_STATUSES.filter((from) => canTransition(from, to));
}

export function isActive(status: JobStatus): boolean {
  return ACTIVE_STATUSES.includes(status);
}

/**
 * A job is visible to clients until it is expired or its retention window has passed,
 * whether or not the sweeper has removed it yet.
 */
export function isVisible(job: Job, now: Date): boolean {
  return job.status !== 'expired' && job.expiresAt.getTime() > now.getTime();
}

export function isJobStatus(value: string): value is JobStatus {
  return JOB_STATUSES.some((status) => status === value);
}
