import type { Job } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';
import type { JobEventRepository } from '../infra/repositories/JobEventRepository.js';
import type {
  JobListFilter,
  JobRepository,
  StoredArtifact,
} from '../infra/repositories/JobRepository.js';
import { logger } from '../infra/logger.js';
import type { JobChange, JobEventBus } from './JobEventBus.js';

export type JobChangeListener = (jobs: Job[]) => void;

const DEFAULT_WATCH_INTERVAL_MS = 1000;

/**
 * Read-only projections over the job store, shared by one-shot commands and the live view.
 * Each returned job is a row read in a single statement, so it is never half-written.
 */
export class JobQueryService {
  constructor(
    private jobRepo: JobRepository,
    private eventRepo: JobEventRepository,
    private bus: JobEventBus
  ) {}

  list(filter: JobListFilter = {}): Job[] {
    return this.jobRepo.list(filter);
  }

  count(filter: Omit<JobListFilter, 'limit'> = {}): number {
    return this.jobRepo.count(filter);
  }

  get(jobId: string): Job {
    return this.jobRepo.get(jobId);
  }

  events(jobId: string): JobEvent[] {
    this.jobRepo.get(jobId);
    return this.eventRepo.listByJob(jobId);
  }

  artifacts(jobId: string): StoredArtifact[] {
    this.jobRepo.get(jobId);
    return this.jobRepo.getArtifacts(jobId);
  }

  /**
   * Calls the listener with job snapshots that changed since the previous call.
   * Changes made in this process arrive immediately through the event bus; changes made by
   * other processes are picked up by polling the store's revision counter.
   */
  watch(listener: JobChangeListener, options: { intervalMs?: number } = {}): () => void {
    const seen = new Map<string, number>();
    let lastRevision = this.jobRepo.currentRevision();

    const deliver = (jobs: Job[]) => {
      const fresh = jobs.filter((job) => job.revision > (seen.get(job.id) ?? -1));
      if (fresh.length === 0) return;
      for (const job of fresh) {
        seen.set(job.id, job.revision);
      }
      listener(fresh);
    };

    const unsubscribe = this.bus.subscribe((change: JobChange) => {
      deliver([change.job]);
    });

    const timer = setInterval(() => {
      try {
        const changed = this.jobRepo.listChangedSince(lastRevision);
        const last = changed.at(-1);
        if (last) {
          lastRevision = last.revision;
        }
        deliver(changed);
      } catch (error) {
        logger.warn('Job watch poll failed', { error });
      }
    }, options.intervalMs ?? DEFAULT_WATCH_INTERVAL_MS);

    return () => {
      clearInterval(timer);
      unsubscribe();
    };
  }
}
