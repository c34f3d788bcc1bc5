import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { Harness } from '../../support/harness.js';
import { createHarness, csvLog } from '../../support/harness.js';
import { JobReconciliationService } from '../../../src/services/JobReconciliationService.js';

const MINUTE = 60_000;
const LEASE_MS = 30_000;

describe('JobReconciliationService', () => {
  let h: Harness;
  let reconciliation: JobReconciliationService;

  beforeEach(async () => {
    h = await createHarness({ retentionMs: 24 * 60 * MINUTE });
    reconciliation = new JobReconciliationService(h.jobRepo, h.jobService, h.queue, h.store, {
      maxProcessingMs: 10 * MINUTE,
      dispatchGraceMs: 30_000,
      maxDeliveryAttempts: 2,
      retryBackoffMs: 10_000,
    });
  });

  afterEach(async () => {
    await h.close();
  });

  async function startJob() {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    const delivery = await h.queue.reserve('worker-a', LEASE_MS);
    if (!delivery) throw new Error('expected a delivery');
    h.jobService.markRunning(job.id);
    return { job, delivery };
  }

  it('fails jobs running longer than the processing limit', async () => {
    const { job, delivery } = await startJob();
    h.clock.advance(5 * MINUTE);
    await h.queue.extendLease(delivery, LEASE_MS);
    h.clock.advance(5 * MINUTE);
    await h.queue.extendLease(delivery, LEASE_MS);
    h.clock.advance(1);

    const summary = await reconciliation.reconcile(h.clock.now());

    expect(summary.timedOut).toBe(1);
    const failed = h.jobRepo.getById(job.id);
    expect(failed?.status).toBe('failed');
    expect(failed?.errorDetail).toBe('Timed out after 10 minutes');
    expect(await h.queue.has(job.id)).toBe(false);
  });

  it('requeues a job whose worker stopped heartbeating, with backoff', async () => {
    const { job } = await startJob();
    h.clock.advance(LEASE_MS);

    const summary = await reconciliation.reconcile(h.clock.now());

    expect(summary.requeued).toBe(1);
    const pending = h.jobRepo.getById(job.id);
    expect(pending?.status).toBe('pending');
    expect(pending?.attempts).toBe(1);
    expect(h.jobService.listEvents(job.id).at(-1)?.message).toBe('Worker stopped responding (attempt 1 of 2)');

    expect(await h.queue.reserve('worker-b', LEASE_MS)).toBeNull();
    h.clock.advance(10_000);
    expect((await h.queue.reserve('worker-b', LEASE_MS))?.message.jobId).toBe(job.id);
  });

  it('fails a job once its delivery attempts are used up', async () => {
    const { job } = await startJob();
    h.clock.advance(LEASE_MS);
    await reconciliation.reconcile(h.clock.now());

    h.clock.advance(10_000);
    const redelivery = await h.queue.reserve('worker-b', LEASE_MS);
    expect(redelivery?.deliveries).toBe(2);
    expect(h.jobService.markRunning(job.id)?.attempts).toBe(2);
    h.clock.advance(LEASE_MS);

    const summary = await reconciliation.reconcile(h.clock.now());

    expect(summary.abandoned).toBe(1);
    const failed = h.jobRepo.getById(job.id);
    expect(failed?.status).toBe('failed');
    expect(failed?.errorDetail).toBe('Worker stopped responding on 2 of 2 attempts');
    expect(await h.queue.has(job.id)).toBe(false);
  });

  it('releases a task whose worker died before starting the job', async () => {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    await h.queue.reserve('worker-a', LEASE_MS);
    h.clock.advance(LEASE_MS);

    const summary = await reconciliation.reconcile(h.clock.now());

    expect(summary.requeued).toBe(1);
    expect(h.jobRepo.getById(job.id)?.status).toBe('pending');
    expect((await h.queue.reserve('worker-b', LEASE_MS))?.message.jobId).toBe(job.id);
  });

  it('drops expired leases of jobs that are no longer active', async () => {
    const { job } = await startJob();
    await h.jobService.reportOutcome(job.id, { status: 'failed', errorDetail: 'boom' });
    h.clock.advance(LEASE_MS);

    const summary = await reconciliation.reconcile(h.clock.now());

    expect(summary.staleTasksRemoved).toBe(1);
    expect(await h.queue.has(job.id)).toBe(false);
    expect(h.jobRepo.getById(job.id)?.status).toBe('failed');
  });

  it('re-dispatches pending jobs that have no task after the grace period', async () => {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    await h.queue.remove(job.id);

    h.clock.advance(30_000);
    expect((await reconciliation.reconcile(h.clock.now())).redispatched).toBe(0);

    h.clock.advance(1);
    expect((await reconciliation.reconcile(h.clock.now())).redispatched).toBe(1);
    expect(await h.queue.has(job.id)).toBe(true);

    h.clock.advance(1);
    expect((await reconciliation.reconcile(h.clock.now())).redispatched).toBe(0);
  });

  it('fails pending jobs whose event log is gone', async () => {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    await h.queue.remove(job.id);
    await h.store.deleteJob(job.id);
    h.clock.advance(30_001);

    const summary = await reconciliation.reconcile(h.clock.now());

    expect(summary.missingInput).toBe(1);
    expect(h.jobRepo.getById(job.id)?.errorDetail).toBe('Event log artifact is missing');
  });

  it('computes exponential backoff', () => {
    expect(reconciliation.backoffFor(1)).toBe(10_000);
    expect(reconciliation.backoffFor(2)).toBe(20_000);
    expect(reconciliation.backoffFor(3)).toBe(40_000);
  });
});
