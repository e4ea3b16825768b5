import { vi } from 'vitest';
import { DatabaseAdapter } from '../../src/infra/DatabaseAdapter.js';
import { JobEventRepository } from '../../src/infra/repositories/JobEventRepository.js';
import { JobRepository } from '../../src/infra/repositories/JobRepository.js';
import { GenerationError } from '../../src/domain/errors.js';
import { createJob } from '../../src/domain/entities/Job.js';
import type { Job, JobKind } from '../../src/domain/entities/Job.js';
import type { GenerationParams } from '../../src/domain/entities/GenerationParams.js';
import type {
  GeneratedArtifact,
  GenerationClient,
} from '../../src/infra/gemini/GenerationClient.js';

export const defaultParams: GenerationParams = {
  model: 'gemini-3-pro-image-preview',
  aspectRatio: '1:1',
  size: '1K',
};

export function createTestStore() {
  const db = new DatabaseAdapter({ SQLITE_DB_PATH: ':memory:' });
  const eventRepo = new JobEventRepository(db);
  const jobRepo = new JobRepository(db, eventRepo);
  return { db, eventRepo, jobRepo };
}

export function insertJob(
  jobRepo: JobRepository,
  overrides: { id?: string; kind?: JobKind; prompt?: string; inputReference?: string | null } = {}
): Job {
  const kind = overrides.kind ?? 'generate';
  const job = createJob({
    id: overrides.id ?? `bn_${Math.random().toString(16).slice(2, 10).padEnd(8, '0')}`,
    kind,
    prompt: overrides.prompt ?? 'p',
    parameters: defaultParams,
    inputReference:
      overrides.inputReference ?? (kind === 'edit' ? '/tmp/source.png' : null),
  });
  jobRepo.create(job);
  return jobRepo.get(job.id);
}

export function image(content = 'png-bytes', mimeType = 'image/png'): GeneratedArtifact {
  return { mimeType, data: Buffer.from(content) };
}

export function transientError(message = 'Service unavailable'): GenerationError {
  return new GenerationError(message, 'transient', 'server_error', { status: 503 });
}

export function permanentError(message = 'Invalid prompt'): GenerationError {
  return new GenerationError(message, 'permanent', 'invalid_request', { status: 400 });
}

export function createStubClient() {
  const generate = vi.fn<GenerationClient['generate']>();
  const client: GenerationClient = { generate };
  return { client, generate };
}

export function deferred<T>() {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function pause(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const ANSI_PATTERN = /\x1b\[[0-9;]*[A-Za-z]/g;

export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}
