import { describe, expect, it } from 'vitest';
import {
  canTransition,
  createJob,
  isActive,
  isJobStatus,
  isVisible,
  sourcesOf,
} from '../../../src/domain/entities/Job.js';

const submittedAt = new Date('2026-03-01T10:00:00.000Z');

describe('Job entity', () => {
  it('creates a pending job that expires one retention window after submission', () => {
    const job = createJob({
      id: 'job-1',
      submittedAt,
      retentionMs: 60_000,
      inputLogPath: 'job-1/event_log.csv',
    });

    expect(job.status).toBe('pending');
    expect(job.expiresAt.toISOString()).toBe('2026-03-01T10:01:00.000Z');
    expect(job.inputConfigPath).toBeNull();
    expect(job.callbackUrl).toBeNull();
    expect(job.outputPath).toBeNull();
    expect(job.errorDetail).toBeNull();
    expect(job.attempts).toBe(0);
  });

  it('allows only the lifecycle transitions', () => {
    expect(canTransition('pending', 'running')).toBe(true);
    expect(canTransition('running', 'succeeded')).toBe(true);
    expect(canTransition('running', 'pending')).toBe(true);
    expect(canTransition('succeeded', 'expired')).toBe(true);

    expect(canTransition('pending', 'succeeded')).toBe(false);
    expect(canTransition('succeeded', 'failed')).toBe(false);
    expect(canTransition('failed', 'running')).toBe(false);
    expect(canTransition('expired', 'pending')).toBe(false);
  });

  it('lists the statuses a transition may start from', () => {
    expect(sourcesOf('expired')).toEqual(['pending', 'running', 'succeeded', 'failed']);
    expect(sourcesOf('failed')).toEqual(['pending', 'running']);
    expect(sourcesOf('succeeded')).toEqual(['running']);
  });

  it('classifies active statuses', () => {
    expect(isActive('pending')).toBe(true);
    expect(isActive('running')).toBe(true);
    expect(isActive('failed')).toBe(false);
    expect(isActive('succeeded')).toBe(false);
    expect(isActive('expired')).toBe(false);
  });

  it('hides jobs past their expiry time even before they are swept', () => {
    const job = createJob({ id: 'job-1', submittedAt, retentionMs: 1000, inputLogPath: 'job-1/event_log.csv' });

    expect(isVisible(job, new Date('2026-03-01T10:00:00.999Z'))).toBe(true);
    expect(isVisible(job, new Date('2026-03-01T10:00:01.000Z'))).toBe(false);
    expect(isVisible({ ...job, status: 'expired' }, submittedAt)).toBe(false);
  });

  it('recognizes status names', () => {
    expect(isJobStatus('running')).toBe(true);
    expect(isJobStatus('RUNNING')).toBe(false);
    expect(isJobStatus('deleted')).toBe(false);
  });
});
