/**
 * Job entity - one tracked image generation or edit request and its lifecycle record
 */
import { randomUUID } from 'node:crypto';
import type { GenerationParams } from './GenerationParams.js';

export type JobKind = 'generate' | 'edit';
export type JobStatus = 'queued' | 'running' | 'completed' | 'failed';

/**
 * transient_exhausted: every allowed attempt failed with a retryable error
 * permanent: the backend rejected the request outright
 * unknown: unrecognized failure, failed closed without retrying
 * cancelled: user requested cancellation
 */
export type FailureKind = 'transient_exhausted' | 'permanent' | 'unknown' | 'cancelled';

export interface ErrorSummary {
  kind: FailureKind;
  reason: string;
  message: string;
}

export interface OutputReference {
  index: number;
  mimeType: string;
  uri: string;
  byteLength: number;
}

export interface Job {
  id: string;
  kind: JobKind;
  prompt: string;
  inputReference: string | null;
  parameters: GenerationParams;
  status: JobStatus;
  attemptCount: number;
  createdAt: Date;
  updatedAt: Date;
  outputReferences: OutputReference[];
  errorSummary: ErrorSummary | null;
  revision: number;
}

export const JOB_ID_PREFIX = 'bn_';

export const JOB_STATUSES: readonly JobStatus[] = ['queued', 'running', 'completed', 'failed'];

const jobTransitions: Record<JobStatus, JobStatus[]> = {
  queued: ['running', 'failed'],
  running: ['running', 'completed', 'failed'],
  completed: [],
  failed: [],
};

export function generateJobId(): string {
  return `${JOB_ID_PREFIX}${randomUUID().replace(/-/g, '').slice(0, 8)}`;
}

/**
 * Factory function to create a new queued Job
 */
export function createJob(params: {
  id: string;
  kind: JobKind;
  prompt: string;
  parameters: GenerationParams;
  inputReference?: string | null;
}): Job {
  const now = new Date();
  return {
    id: params.id,
    kind: params.kind,
    prompt: params.prompt,
    inputReference: params.inputReference ?? null,
    parameters: { ...params.parameters },
    status: 'queued',
    attemptCount: 0,
    createdAt: now,
    updatedAt: now,
    outputReferences: [],
    errorSummary: null,
    revision: 0,
  };
}

export function isTerminal(status: JobStatus): boolean {
  return status === 'completed' || status === 'failed';
}

export function isTransitionAllowed(from: JobStatus, to: JobStatus): boolean {
  return jobTransitions[from].includes(to);
}

export function isJobStatus(value: string): value is JobStatus {
  const known: readonly string[] = JOB_STATUSES;
  return known.includes(value);
}

export function artifactUri(jobId: string, index: number): string {
  return `artifact://${jobId}/${index}`;
}

export function promptPreview(prompt: string, maxLength: number): string {
  if (prompt.length <= maxLength) {
    return prompt;
  }
  return `${prompt.slice(0, Math.max(0, maxLength - 3))}...`;
}
