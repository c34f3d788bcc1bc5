import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { JobEvent } from '../../domain/entities/JobEvent.js';
import type { JobStatus } from '../../domain/entities/Job.js';
import { createJobEvent } from '../../domain/entities/JobEvent.js';
import { logger } from '../logger.js';

type JobEventRow = {
  id: string;
  job_id: string;
  status: JobStatus;
  message: string | null;
  created_at: string;
};

export class JobEventRepository {
  constructor(private db: DatabaseAdapter) {}

  record(params: {
    id: string;
    jobId: string;
    status: JobStatus;
    message?: string | null;
    createdAt: Date;
  }): void {
    const event = createJobEvent(params);

    const sql = `
      INSERT INTO job_events (id, job_id, status, message, created_at)
      VALUES (?, ?, ?, ?, ?)
    `;

    this.db.execute(sql, [
      event.id,
      event.jobId,
      event.status,
      event.message,
      event.createdAt.toISOString(),
    ]);

    logger.debug('Job event recorded', { jobId: event.jobId, status: event.status });
  }

  listByJob(jobId: string): JobEvent[] {
    const sql = `
      SELECT * FROM job_events
      WHERE job_id = ?
      ORDER BY created_at ASC, rowid ASC
    `;

    const rows = this.db.query<JobEventRow>(sql, [jobId]);
    return rows.map((row) => this.mapRowToJobEvent(row));
  }

  private mapRowToJobEvent(row: JobEventRow): JobEvent {
    return {
      id: row.id,
      jobId: row.job_id,
      status: row.status,
      message: row.message,
      createdAt: new Date(row.created_at),
    };
  }
}
