import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { JobEventRepository } from '../../../src/infra/repositories/JobEventRepository.js';
import { createJob } from '../../../src/domain/entities/Job.js';
import { DatabaseError } from '../../../src/domain/errors.js';

const submittedAt = new Date('2026-03-01T10:00:00.000Z');
const HOUR = 60 * 60 * 1000;

function pendingJob(id: string, offsetMs = 0) {
  return createJob({
    id,
    submittedAt: new Date(submittedAt.getTime() + offsetMs),
    retentionMs: HOUR,
    inputLogPath: `${id}/event_log.csv`,
  });
}

describe('JobRepository', () => {
  let db: DatabaseAdapter;
  let repo: JobRepository;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    repo = new JobRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('round-trips a job record', () => {
    const job = { ...pendingJob('job-1'), callbackUrl: 'https://example.test/hook', inputConfigPath: 'job-1/configuration.yaml' };
    repo.create(job);

    expect(repo.getById('job-1')).toEqual(job);
    expect(repo.getById('missing')).toBeNull();
  });

  it('applies a transition only from the expected status', () => {
    repo.create(pendingJob('job-1'));
    const startedAt = new Date('2026-03-01T10:05:00.000Z');

    expect(repo.transition({ jobId: 'job-1', from: ['running'], to: 'succeeded', set: { outputPath: 'job-1/r.json' } })).toBe(false);
    expect(
      repo.transition({ jobId: 'job-1', from: ['pending'], to: 'running', set: { startedAt, incrementAttempts: true } })
    ).toBe(true);

    const job = repo.getById('job-1');
    expect(job?.status).toBe('running');
    expect(job?.startedAt).toEqual(startedAt);
    expect(job?.attempts).toBe(1);
  });

  it('lets exactly one of two competing outcome reports win', () => {
    repo.create(pendingJob('job-1'));
    repo.transition({ jobId: 'job-1', from: ['pending'], to: 'running' });

    const first = repo.transition({
      jobId: 'job-1',
      from: ['running'],
      to: 'succeeded',
      set: { outputPath: 'job-1/result.json' },
    });
    const second = repo.transition({
      jobId: 'job-1',
      from: ['running'],
      to: 'failed',
      set: { errorDetail: 'late failure' },
    });

    expect([first, second]).toEqual([true, false]);
    const job = repo.getById('job-1');
    expect(job?.status).toBe('succeeded');
    expect(job?.outputPath).toBe('job-1/result.json');
    expect(job?.errorDetail).toBeNull();
  });

  it('enforces that only succeeded jobs carry an output', () => {
    repo.create(pendingJob('job-1'));

    expect(() =>
      repo.transition({ jobId: 'job-1', from: ['pending'], to: 'failed', set: { outputPath: 'job-1/x' } })
    ).toThrow(DatabaseError);
    expect(repo.getById('job-1')?.status).toBe('pending');
  });

  it('treats an empty source list as a no-op', () => {
    repo.create(pendingJob('job-1'));

    expect(repo.transition({ jobId: 'job-1', from: [], to: 'expired' })).toBe(false);
  });

  it('lists visible jobs newest first with status filter and limit', () => {
    repo.create(pendingJob('job-a', 0));
    repo.create(pendingJob('job-b', 1000));
    repo.create(pendingJob('job-c', 2000));
    repo.transition({ jobId: 'job-b', from: ['pending'], to: 'running' });
    repo.transition({ jobId: 'job-c', from: ['pending'], to: 'expired' });

    const now = new Date(submittedAt.getTime() + 5000);
    expect(repo.list({ now }).map((job) => job.id)).toEqual(['job-b', 'job-a']);
    expect(repo.list({ now, status: 'pending' }).map((job) => job.id)).toEqual(['job-a']);
    expect(repo.list({ now, limit: 1 }).map((job) => job.id)).toEqual(['job-b']);
    expect(repo.list({ now: new Date(submittedAt.getTime() + HOUR + 500) }).map((job) => job.id)).toEqual([
      'job-b',
    ]);
  });

  it('finds expired, stale pending and long-running jobs', () => {
    repo.create(pendingJob('job-a', 0));
    repo.create(pendingJob('job-b', 10_000));
    repo.transition({
      jobId: 'job-b',
      from: ['pending'],
      to: 'running',
      set: { startedAt: new Date(submittedAt.getTime() + 20_000) },
    });

    expect(repo.listExpired(new Date(submittedAt.getTime() + HOUR)).map((job) => job.id)).toEqual(['job-a']);
    expect(repo.listStalePending(new Date(submittedAt.getTime() + 1)).map((job) => job.id)).toEqual(['job-a']);
    expect(repo.listStalePending(submittedAt)).toEqual([]);
    expect(
      repo.listRunningStartedBefore(new Date(submittedAt.getTime() + 20_001)).map((job) => job.id)
    ).toEqual(['job-b']);
    expect(repo.listRunningStartedBefore(new Date(submittedAt.getTime() + 20_000))).toEqual([]);
  });

  it('counts and deletes records together with their history', () => {
    const events = new JobEventRepository(db);
    repo.create(pendingJob('job-a'));
    repo.create(pendingJob('job-b'));
    events.record({ id: 'e1', jobId: 'job-a', status: 'pending', createdAt: submittedAt });
    events.record({ id: 'e2', jobId: 'job-b', status: 'pending', createdAt: submittedAt });

    expect(repo.countAll()).toBe(2);
    expect(repo.delete('job-a')).toBe(true);
    expect(repo.delete('job-a')).toBe(false);
    expect(repo.listIds()).toEqual(['job-b']);
    expect(events.listByJob('job-a')).toEqual([]);
    expect(events.listByJob('job-b')).toHaveLength(1);
  });
});

describe('JobEventRepository', () => {
  let db: DatabaseAdapter;
  let events: JobEventRepository;

  beforeEach(() => {
    db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
    events = new JobEventRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('returns history in insertion order per job', () => {
    events.record({ id: 'e1', jobId: 'job-1', status: 'pending', message: 'Discovery submitted', createdAt: submittedAt });
    events.record({ id: 'e2', jobId: 'job-1', status: 'running', createdAt: submittedAt });
    events.record({ id: 'e3', jobId: 'job-2', status: 'pending', createdAt: submittedAt });

    expect(events.listByJob('job-1')).toEqual([
      { id: 'e1', jobId: 'job-1', status: 'pending', message: 'Discovery submitted', createdAt: submittedAt },
      { id: 'e2', jobId: 'job-1', status: 'running', message: null, createdAt: submittedAt },
    ]);

    expect(events.listByJob('job-2')).toHaveLength(1);
  });
});
