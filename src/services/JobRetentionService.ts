import { isTerminal } from '../domain/entities/Job.js';
import { InvalidTransitionError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';

const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * JobRetentionService - explicit purge of finished jobs.
 * Queued and running jobs are never removed; artifacts and events go with their job.
 */
export class JobRetentionService {
  constructor(private jobRepo: JobRepository) {}

  deleteJob(jobId: string): void {
    const job = this.jobRepo.get(jobId);
    if (!isTerminal(job.status) || !this.jobRepo.deleteTerminal(jobId)) {
      throw new InvalidTransitionError(`Job ${jobId} is ${job.status}; cancel it before deleting`, {
        jobId,
        status: job.status,
      });
    }
    logger.info('Job deleted', { jobId });
  }

  clearFinished(): number {
    return this.purge(null);
  }

  /**
   * Removes finished jobs created more than `days` days ago. `days` of 0 removes nothing.
   */
  cleanupOlderThan(days: number): number {
    if (days <= 0) {
      return 0;
    }
    return this.purge(new Date(Date.now() - days * DAY_MS));
  }

  private purge(cutoff: Date | null): number {
    try {
      const deleted = this.jobRepo.deleteTerminalOlderThan(cutoff);
      if (deleted === 0) {
        logger.info('No finished jobs to purge', { cutoff: cutoff?.toISOString() ?? null });
      } else {
        logger.info('Purged finished jobs', { count: deleted, cutoff: cutoff?.toISOString() ?? null });
      }
      return deleted;
    } catch (error) {
      logger.error('Failed to purge finished jobs', { error });
      throw error;
    }
  }
}
