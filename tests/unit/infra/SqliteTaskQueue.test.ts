import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { SqliteTaskQueue } from '../../../src/infra/queue/SqliteTaskQueue.js';
import { DispatchError } from '../../../src/domain/errors.js';
import { ManualClock, START } from '../../support/harness.js';

const LEASE_MS = 30_000;

function message(jobId: string) {
  return { jobId, logRef: `${jobId}/event_log.csv`, configRef: null };
}

describe('SqliteTaskQueue', () => {
  let db: DatabaseAdapter;
  let clock: ManualClock;
  let queue: SqliteTaskQueue;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    clock = new ManualClock();
    queue = new SqliteTaskQueue(db, clock);
  });

  afterEach(() => {
    db.close();
  });

  it('keeps at most one task per job', async () => {
    expect(await queue.enqueue(message('job-1'))).toBe(true);
    expect(await queue.enqueue(message('job-1'))).toBe(false);
    expect(await queue.has('job-1')).toBe(true);
    expect(await queue.has('job-2')).toBe(false);
  });

  it('delivers tasks in enqueue order, each to one worker', async () => {
    await queue.enqueue(message('job-1'));
    clock.advance(10);
    await queue.enqueue(message('job-2'));

    const first = await queue.reserve('worker-a', LEASE_MS);
    const second = await queue.reserve('worker-b', LEASE_MS);
    const third = await queue.reserve('worker-c', LEASE_MS);

    expect(first?.message).toEqual(message('job-1'));
    expect(first?.deliveries).toBe(1);
    expect(first?.leasedUntil.toISOString()).toBe('2026-03-01T10:00:30.010Z');
    expect(second?.message.jobId).toBe('job-2');
    expect(third).toBeNull();
  });

  it('holds back tasks that are not yet available', async () => {
    await queue.enqueue(message('job-1'), new Date(START.getTime() + 5000));

    expect(await queue.reserve('worker-a', LEASE_MS)).toBeNull();
    clock.advance(5000);
    expect((await queue.reserve('worker-a', LEASE_MS))?.message.jobId).toBe('job-1');
  });

  it('acknowledges only with the current delivery', async () => {
    await queue.enqueue(message('job-1'));
    const stale = await queue.reserve('worker-a', LEASE_MS);
    if (!stale) throw new Error('expected a delivery');

    await queue.release('job-1', clock.now());
    const current = await queue.reserve('worker-b', LEASE_MS);
    if (!current) throw new Error('expected a delivery');

    expect(current.deliveries).toBe(2);
    expect(await queue.ack(stale)).toBe(false);
    expect(await queue.extendLease(stale, LEASE_MS)).toBe(false);
    expect(await queue.has('job-1')).toBe(true);

    expect(await queue.ack(current)).toBe(true);
    expect(await queue.has('job-1')).toBe(false);
  });

  it('reports leases that ran out without redelivering them', async () => {
    await queue.enqueue(message('job-1'));
    const delivery = await queue.reserve('worker-a', LEASE_MS);
    if (!delivery) throw new Error('expected a delivery');

    clock.advance(LEASE_MS);
    expect(await queue.reserve('worker-b', LEASE_MS)).toBeNull();

    const expired = await queue.listExpiredLeases(clock.now());
    expect(expired).toEqual([
      {
        jobId: 'job-1',
        deliveryId: delivery.deliveryId,
        leasedBy: 'worker-a',
        leasedUntil: new Date(START.getTime() + LEASE_MS),
      },
    ]);
  });

  it('extends the lease of the current holder', async () => {
    await queue.enqueue(message('job-1'));
    const delivery = await queue.reserve('worker-a', LEASE_MS);
    if (!delivery) throw new Error('expected a delivery');

    clock.advance(20_000);
    expect(await queue.extendLease(delivery, LEASE_MS)).toBe(true);
    expect(delivery.leasedUntil.toISOString()).toBe('2026-03-01T10:00:50.000Z');

    clock.advance(20_000);
    expect(await queue.listExpiredLeases(clock.now())).toEqual([]);
  });

  it('removes a task regardless of its state', async () => {
    await queue.enqueue(message('job-1'));
    await queue.reserve('worker-a', LEASE_MS);

    await queue.remove('job-1');
    expect(await queue.has('job-1')).toBe(false);
  });

  it('surfaces database failures as dispatch errors', async () => {
    db.close();

    await expect(queue.enqueue(message('job-1'))).rejects.toBeInstanceOf(DispatchError);
  });
});
