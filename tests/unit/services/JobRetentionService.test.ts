import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { utimes } from 'node:fs/promises';
import path from 'node:path';
import type { Harness } from '../../support/harness.js';
import { createHarness, csvLog } from '../../support/harness.js';
import { JobRetentionService } from '../../../src/services/JobRetentionService.js';
import { StorageError } from '../../../src/domain/errors.js';

describe('JobRetentionService', () => {
  let h: Harness;
  let retention: JobRetentionService;

  beforeEach(async () => {
    h = await createHarness({ retentionMs: 1000 });
    retention = new JobRetentionService(h.jobRepo, h.jobService, h.store, h.retentionMs);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await h.close();
  });

  it('removes a finished job once its retention has passed', async () => {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    h.jobService.markRunning(job.id);
    const outputPath = await h.store.put(job.id, 'result.json', '{}');
    await h.jobService.reportOutcome(job.id, { status: 'succeeded', outputPath });

    h.clock.advance(2000);
    expect(() => h.jobService.getJob(job.id)).toThrow('not found');

    const summary = await retention.sweep(h.clock.now());

    expect(summary).toEqual({ expired: 1, failed: 0, orphansRemoved: 0 });
    expect(h.jobRepo.getById(job.id)).toBeNull();
    expect(h.eventRepo.listByJob(job.id)).toEqual([]);
    expect(await h.store.exists(outputPath)).toBe(false);
    expect(await h.store.listJobEntries()).toEqual([]);
  });

  it('leaves jobs inside their retention window alone', async () => {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    h.clock.advance(999);

    expect(await retention.sweep(h.clock.now())).toEqual({ expired: 0, failed: 0, orphansRemoved: 0 });
    expect(h.jobRepo.getById(job.id)?.status).toBe('pending');
  });

  it('expires jobs that never finished and drops their queued task', async () => {
    const job = await h.jobService.submit({ eventLog: csvLog() });
    h.clock.advance(1000);

    await retention.sweep(h.clock.now());

    expect(h.jobRepo.getById(job.id)).toBeNull();
    expect(await h.queue.has(job.id)).toBe(false);
  });

  it('continues after a job it cannot clean up and retries it next cycle', async () => {
    const first = await h.jobService.submit({ eventLog: csvLog() });
    const second = await h.jobService.submit({ eventLog: csvLog() });
    h.clock.advance(1000);

    const deleteJob = h.store.deleteJob.bind(h.store);
    vi.spyOn(h.store, 'deleteJob').mockImplementation(async (jobId: string) => {
      if (jobId === first.id) {
        throw new StorageError('Failed to delete job artifacts', { jobId });
      }
      await deleteJob(jobId);
    });

    expect(await retention.sweep(h.clock.now())).toEqual({ expired: 1, failed: 1, orphansRemoved: 0 });
    expect(h.jobRepo.getById(second.id)).toBeNull();

    // Marked expired, so already invisible to clients
    expect(h.jobRepo.getById(first.id)?.status).toBe('expired');

    vi.restoreAllMocks();
    expect(await retention.sweep(h.clock.now())).toEqual({ expired: 1, failed: 0, orphansRemoved: 0 });
    expect(h.jobRepo.getById(first.id)).toBeNull();
  });

  it('removes artifact directories without a record once they are old enough', async () => {
    const stale = await h.store.put('orphan-1', 'event_log.csv', 'x');
    await h.store.put('orphan-2', 'event_log.csv', 'y');

    const old = new Date(h.clock.now().getTime() - 5000);
    await utimes(path.join(h.storagePath, 'orphan-1'), old, old);
    const fresh = new Date(h.clock.now().getTime() + 5000);
    await utimes(path.join(h.storagePath, 'orphan-2'), fresh, fresh);

    expect(await retention.sweep(h.clock.now())).toEqual({ expired: 0, failed: 0, orphansRemoved: 1 });
    expect(await h.store.exists(stale)).toBe(false);
    expect((await h.store.listJobEntries()).map((entry) => entry.jobId)).toEqual(['orphan-2']);
  });
});
