/**
 * JobEvent entity - immutable record of one persisted job status transition
 */
import type { JobStatus } from './Job.js';

export interface JobEvent {
  id: string;
  jobId: string;
  status: JobStatus;
  attemptCount: number;
  message: string | null;
  createdAt: Date;
}

/**
 * Factory function to create a new JobEvent
 */
export function createJobEvent(params: {
  id: string;
  jobId: string;
  status: JobStatus;
  attemptCount: number;
  message?: string | null;
  createdAt?: Date;
}): JobEvent {
  return {
    id: params.id,
    jobId: params.jobId,
    status: params.status,
    attemptCount: params.attemptCount,
    message: params.message ?? null,
    createdAt: params.createdAt ?? new Date(),
  };
}
