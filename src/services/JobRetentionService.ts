import { logger } from '../infra/logger.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';
import type { ArtifactStore } from '../infra/storage/ArtifactStore.js';
import { describeError } from '../domain/errors.js';
import type { JobService } from './JobService.js';

export interface SweepSummary {
  expired: number;
  failed: number;
  orphansRemoved: number;
}

/**
 * JobRetentionService - the expiry sweeper.
 * Each job is cleaned independently; one failure never aborts the cycle.
 */
export class JobRetentionService {
  constructor(
    private jobRepo: JobRepository,
    private jobService: JobService,
    private store: ArtifactStore,
    private retentionMs: number
  ) {}

  async sweep(now: Date): Promise<SweepSummary> {
    const jobs = this.jobRepo.listExpired(now);
    let expired = 0;
    let failed = 0;

    for (const job of jobs) {
      try {
        this.jobService.expire(job.id);
        // A record removed between the query and here counts as cleaned
        await this.jobService.purge(job.id);
        expired += 1;
        logger.info('Expired discovery removed', {
          jobId: job.id,
          status: job.status,
          expiresAt: job.expiresAt.toISOString(),
        });
      } catch (error) {
        failed += 1;
        logger.error('Failed to remove expired discovery', {
          jobId: job.id,
          error: describeError(error),
        });
      }
    }

    const orphansRemoved = await this.removeOrphanedArtifacts(now);

    if (expired > 0 || failed > 0 || orphansRemoved > 0) {
      logger.info('Expiry sweep finished', { expired, failed, orphansRemoved });
    } else {
      logger.debug('No expired discoveries to clean up', { now: now.toISOString() });
    }

    return { expired, failed, orphansRemoved };
  }

  /**
   * Artifact directories without a record, untouched for a whole retention window.
   * They are left behind by a crash between artifact deletion and record deletion
   * or by a submission that never got its record.
   */
  private async removeOrphanedArtifacts(now: Date): Promise<number> {
    const cutoff = now.getTime() - this.retentionMs;
    let removed = 0;

    try {
      const entries = await this.store.listJobEntries();
      const known = new Set(this.jobRepo.listIds());

      for (const entry of entries) {
        if (known.has(entry.jobId) || entry.modifiedAt.getTime() > cutoff) {
          continue;
        }
        try {
          await this.store.deleteJob(entry.jobId);
          removed += 1;
          logger.info('Orphaned artifacts removed', { jobId: entry.jobId });
        } catch (error) {
          logger.error('Failed to remove orphaned artifacts', {
            jobId: entry.jobId,
            error: describeError(error),
          });
        }
      }
    } catch (error) {
      logger.error('Orphaned artifact scan failed', { error: describeError(error) });
    }

    return removed;
  }
}
