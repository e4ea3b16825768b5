import type { Job } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';

export function mapJobToOutput(job: Job) {
  return {
    id: job.id,
    kind: job.kind,
    status: job.status,
    prompt: job.prompt,
    inputReference: job.inputReference,
    model: job.parameters.model,
    aspectRatio: job.parameters.aspectRatio,
    size: job.parameters.size,
    attemptCount: job.attemptCount,
    createdAt: job.createdAt.toISOString(),
    updatedAt: job.updatedAt.toISOString(),
    outputReferences: job.outputReferences,
    error: job.errorSummary,
  };
}

export function mapEventToOutput(event: JobEvent) {
  return {
    status: event.status,
    attemptCount: event.attemptCount,
    message: event.message,
    createdAt: event.createdAt.toISOString(),
  };
}
