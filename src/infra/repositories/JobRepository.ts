import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Job, JobStatus } from '../../domain/entities/Job.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  status: JobStatus;
  submitted_at: string;
  started_at: string | null;
  completed_at: string | null;
  expires_at: string;
  input_log_path: string;
  input_config_path: string | null;
  output_path: string | null;
  error_detail: string | null;
  callback_url: string | null;
  attempts: number;
};

/**
 * Columns a transition may write together with the new status
 */
export type JobTransitionFields = {
  startedAt?: Date | null;
  completedAt?: Date | null;
  expiresAt?: Date;
  outputPath?: string | null;
  errorDetail?: string | null;
  incrementAttempts?: boolean;
};

function toIso(value: Date | null): string | null {
  return value ? value.toISOString() : null;
}

export class JobRepository {
  constructor(private db: DatabaseAdapter) {}

  create(job: Job): void {
    const sql = `
      INSERT INTO jobs (
        id, status, submitted_at, started_at, completed_at, expires_at,
        input_log_path, input_config_path, output_path, error_detail, callback_url, attempts
      ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      job.id,
      job.status,
      job.submittedAt.toISOString(),
      toIso(job.startedAt),
      toIso(job.completedAt),
      job.expiresAt.toISOString(),
      job.inputLogPath,
      job.inputConfigPath,
      job.outputPath,
      job.errorDetail,
      job.callbackUrl,
      job.attempts,
    ]);

    logger.debug('Job record created', { jobId: job.id, status: job.status });
  }

  /**
   * Compare-and-set status update. The new status and its fields are written in one
   * statement, and only if the current status is one of `from`.
   * Returns true when the row changed.
   */
  transition(params: {
    jobId: string;
    from: readonly JobStatus[];
    to: JobStatus;
    set?: JobTransitionFields;
  }): boolean {
    if (params.from.length === 0) {
      return false;
    }

    const assignments: string[] = ['status = ?'];
    const values: unknown[] = [params.to];
    const fields = params.set ?? {};

    // undefined leaves a column untouched, null clears it
    const columns: Array<[string, Date | string | null | undefined]> = [
      ['started_at', fields.startedAt],
      ['completed_at', fields.completedAt],
      ['expires_at', fields.expiresAt],
      ['output_path', fields.outputPath],
      ['error_detail', fields.errorDetail],
    ];

    for (const [column, value] of columns) {
      if (value === undefined) continue;
      assignments.push(`${column} = ?`);
      values.push(value instanceof Date ? value.toISOString() : value);
    }

    if (fields.incrementAttempts) {
      assignments.push('attempts = attempts + 1');
    }

    const placeholders = params.from.map(() => '?').join(', ');
    const sql = `
      UPDATE jobs
      SET ${assignments.join(', ')}
      WHERE id = ? AND status IN (${placeholders})
    `;

    const changes = this.db.execute(sql, [...values, params.jobId, ...params.from]);
    if (changes > 0) {
      logger.debug('Job status updated', { jobId: params.jobId, status: params.to });
    }
    return changes > 0;
  }

  getById(jobId: string): Job | null {
    const sql = `
      SELECT * FROM jobs
      WHERE id = ?
    `;

    const row = this.db.queryOne<JobRow>(sql, [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  /**
   * Jobs still visible at `now`, newest first
   */
  list(params: { now: Date; status?: JobStatus; limit?: number }): Job[] {
    const conditions: string[] = ["status != 'expired'", 'expires_at > ?'];
    const values: unknown[] = [params.now.toISOString()];

    if (params.status) {
      conditions.push('status = ?');
      values.push(params.status);
    }

    const limit = Math.min(Math.max(params.limit ?? 50, 1), 500);

    const sql = `
      SELECT * FROM jobs
      WHERE ${conditions.join(' AND ')}
      ORDER BY submitted_at DESC, id ASC
      LIMIT ?
    `;

    const rows = this.db.query<JobRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  listExpired(now: Date): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE expires_at <= ?
      ORDER BY expires_at ASC
    `;

    const rows = this.db.query<JobRow>(sql, [now.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  listStalePending(cutoff: Date): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE status = 'pending' AND submitted_at < ?
      ORDER BY submitted_at ASC
    `;

    const rows = this.db.query<JobRow>(sql, [cutoff.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  listRunningStartedBefore(cutoff: Date): Job[] {
    const sql = `
      SELECT * FROM jobs
      WHERE status = 'running' AND started_at IS NOT NULL AND started_at < ?
      ORDER BY started_at ASC
    `;

    const rows = this.db.query<JobRow>(sql, [cutoff.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  listIds(): string[] {
    const rows = this.db.query<{ id: string }>('SELECT id FROM jobs');
    return rows.map((row) => row.id);
  }

  countAll(): number {
    return this.db.queryOne<{ count: number }>('SELECT COUNT(*) AS count FROM jobs')?.count ?? 0;
  }

  /**
   * Deletes the record together with its transition history
   */
  delete(jobId: string): boolean {
    return this.db.transaction(() => {
      this.db.execute('DELETE FROM job_events WHERE job_id = ?', [jobId]);
      return this.db.execute('DELETE FROM jobs WHERE id = ?', [jobId]) > 0;
    });
  }

  private mapRowToJob(row: JobRow): Job {
    return {
      id: row.id,
      status: row.status,
      submittedAt: new Date(row.submitted_at),
      startedAt: row.started_at ? new Date(row.started_at) : null,
      completedAt: row.completed_at ? new Date(row.completed_at) : null,
      expiresAt: new Date(row.expires_at),
      inputLogPath: row.input_log_path,
      inputConfigPath: row.input_config_path,
      outputPath: row.output_path,
      errorDetail: row.error_detail,
      callbackUrl: row.callback_url,
      attempts: row.attempts,
    };
  }
}
