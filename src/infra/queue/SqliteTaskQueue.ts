import { randomUUID } from 'node:crypto';
import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { Clock } from '../clock.js';
import { systemClock } from '../clock.js';
import { logger } from '../logger.js';
import { DispatchError } from '../../domain/errors.js';
import type { ExpiredLease, TaskDelivery, TaskMessage, TaskQueue } from './TaskQueue.js';

type TaskRow = {
  job_id: string;
  log_ref: string;
  config_ref: string | null;
  state: 'ready' | 'leased';
  enqueued_at: string;
  available_at: string;
  delivery_id: string | null;
  leased_by: string | null;
  leased_until: string | null;
  deliveries: number;
};

/**
 * Durable task queue kept in the shared SQLite database.
 * Every state change is a single statement, so concurrent workers in several
 * processes never reserve the same task.
 */
export class SqliteTaskQueue implements TaskQueue {
  constructor(
    private db: DatabaseAdapter,
    private clock: Clock = systemClock
  ) {}

  async enqueue(message: TaskMessage, availableAt?: Date): Promise<boolean> {
    const now = this.clock.now();
    const sql = `
      INSERT INTO tasks (job_id, log_ref, config_ref, state, enqueued_at, available_at, deliveries)
      VALUES (?, ?, ?, 'ready', ?, ?, 0)
      ON CONFLICT (job_id) DO NOTHING
    `;

    const changes = this.guard('enqueue', () =>
      this.db.execute(sql, [
        message.jobId,
        message.logRef,
        message.configRef,
        now.toISOString(),
        (availableAt ?? now).toISOString(),
      ])
    );

    if (changes === 0) {
      logger.debug('Task already queued', { jobId: message.jobId });
      return false;
    }
    logger.info('Task enqueued', { jobId: message.jobId });
    return true;
  }

  async reserve(workerId: string, leaseMs: number): Promise<TaskDelivery | null> {
    const now = this.clock.now();
    const leasedUntil = new Date(now.getTime() + leaseMs);
    const sql = `
      UPDATE tasks
      SET state = 'leased', delivery_id = ?, leased_by = ?, leased_until = ?, deliveries = deliveries + 1
      WHERE job_id = (
        SELECT job_id FROM tasks
        WHERE state = 'ready' AND available_at <= ?
        ORDER BY available_at ASC, enqueued_at ASC
        LIMIT 1
      )
      RETURNING *
    `;

    const row = this.guard('reserve', () =>
      this.db.queryOne<TaskRow>(sql, [
        randomUUID(),
        workerId,
        leasedUntil.toISOString(),
        now.toISOString(),
      ])
    );

    if (!row || !row.delivery_id) {
      return null;
    }

    logger.debug('Task reserved', { jobId: row.job_id, workerId, deliveries: row.deliveries });
    return {
      deliveryId: row.delivery_id,
      message: { jobId: row.job_id, logRef: row.log_ref, configRef: row.config_ref },
      deliveries: row.deliveries,
      leasedUntil,
    };
  }

  async extendLease(delivery: TaskDelivery, leaseMs: number): Promise<boolean> {
    const leasedUntil = new Date(this.clock.now().getTime() + leaseMs);
    const sql = `
      UPDATE tasks
      SET leased_until = ?
      WHERE job_id = ? AND delivery_id = ? AND state = 'leased'
    `;

    const changes = this.guard('extendLease', () =>
      this.db.execute(sql, [leasedUntil.toISOString(), delivery.message.jobId, delivery.deliveryId])
    );
    if (changes > 0) {
      delivery.leasedUntil = leasedUntil;
    }
    return changes > 0;
  }

  async ack(delivery: TaskDelivery): Promise<boolean> {
    const sql = `
      DELETE FROM tasks
      WHERE job_id = ? AND delivery_id = ?
    `;

    const changes = this.guard('ack', () =>
      this.db.execute(sql, [delivery.message.jobId, delivery.deliveryId])
    );

    if (changes === 0) {
      logger.warn('Acknowledgment ignored, delivery no longer held', {
        jobId: delivery.message.jobId,
        deliveryId: delivery.deliveryId,
      });
      return false;
    }
    logger.debug('Task acknowledged', { jobId: delivery.message.jobId });
    return true;
  }

  async release(jobId: string, availableAt: Date): Promise<boolean> {
    const sql = `
      UPDATE tasks
      SET state = 'ready', available_at = ?, delivery_id = NULL, leased_by = NULL, leased_until = NULL
      WHERE job_id = ?
    `;

    const changes = this.guard('release', () =>
      this.db.execute(sql, [availableAt.toISOString(), jobId])
    );
    return changes > 0;
  }

  async remove(jobId: string): Promise<void> {
    this.guard('remove', () => this.db.execute('DELETE FROM tasks WHERE job_id = ?', [jobId]));
  }

  async has(jobId: string): Promise<boolean> {
    const row = this.guard('has', () =>
      this.db.queryOne<{ job_id: string }>('SELECT job_id FROM tasks WHERE job_id = ?', [jobId])
    );
    return row !== null;
  }

  async listExpiredLeases(now: Date): Promise<ExpiredLease[]> {
    const sql = `
      SELECT * FROM tasks
      WHERE state = 'leased' AND leased_until <= ?
      ORDER BY leased_until ASC
    `;

    const rows = this.guard('listExpiredLeases', () =>
      this.db.query<TaskRow>(sql, [now.toISOString()])
    );

    return rows.flatMap((row) =>
      row.delivery_id && row.leased_until
        ? [
            {
              jobId: row.job_id,
              deliveryId: row.delivery_id,
              leasedBy: row.leased_by,
              leasedUntil: new Date(row.leased_until),
            },
          ]
        : []
    );
  }

  private guard<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      throw new DispatchError(`Task queue ${operation} failed`, { error });
    }
  }
}
