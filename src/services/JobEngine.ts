import { isTerminal, createJob, generateJobId } from '../domain/entities/Job.js';
import type { ErrorSummary, FailureKind, Job, JobKind, JobStatus } from '../domain/entities/Job.js';
import { generationParamsSchema, supportsSize } from '../domain/entities/GenerationParams.js';
import {
  AppError,
  DuplicateIdError,
  GenerationError,
  StaleTransitionError,
  ValidationError,
} from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { JobRepository, TransitionFields } from '../infra/repositories/JobRepository.js';
import type { GeneratedArtifact, GenerationClient } from '../infra/gemini/GenerationClient.js';
import type { JobEventBus } from './JobEventBus.js';
import { WorkerPool } from './WorkerPool.js';

export interface RetryPolicy {
  /** Upper bound on generation calls per job, across restarts */
  maxAttempts: number;
  attemptTimeoutMs: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface JobEngineOptions extends RetryPolicy {
  concurrency: number;
}

/** Resolves after `ms`, or as soon as the signal aborts */
export type Sleep = (ms: number, signal: AbortSignal) => Promise<void>;

export interface SubmitRequest {
  kind: JobKind;
  prompt: string;
  parameters: unknown;
  inputReference?: string | null;
}

/** The record a dispatcher saw; the claim succeeds only if the store still holds it */
export type ClaimSnapshot = Pick<Job, 'status' | 'attemptCount'>;

export interface CancelResult {
  job: Job;
  cancelled: boolean;
}

type Drive = {
  promise: Promise<Job>;
  controller: AbortController;
};

type AttemptOutcome =
  | { ok: true; artifacts: GeneratedArtifact[] }
  | { ok: false; error: GenerationError };

const MAX_ID_ATTEMPTS = 5;
const DEFAULT_WAIT_POLL_MS = 500;
const RESUMABLE_STATUSES: JobStatus[] = ['running', 'queued'];

export const abortableSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve) => {
    if (signal.aborted || ms <= 0) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal.addEventListener('abort', done, { once: true });
  });

/**
 * Delay before the retry that follows attempt `attempt` (1-based)
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'baseDelayMs' | 'maxDelayMs' | 'jitterMs'>,
  random: () => number = Math.random
): number {
  const exponential = policy.baseDelayMs * 2 ** Math.max(0, attempt - 1);
  const capped = Math.min(exponential, policy.maxDelayMs);
  return capped + Math.floor(random() * policy.jitterMs);
}

function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new GenerationError(message || 'Unexpected error', 'unknown', 'unexpected_error');
}

function failureKind(error: GenerationError): FailureKind {
  if (error.classification === 'transient') return 'transient_exhausted';
  return error.classification;
}

/**
 * Job Engine - drives each job through queued -> running -> completed | failed.
 *
 * Every step is a conditional store transition committed before the next one starts; the store,
 * not this object, is the source of truth. In-memory state is limited to the drives running in
 * this process and is rebuilt from the store by `recover`.
 */
export class JobEngine {
  private readonly pool: WorkerPool;
  private readonly inFlight = new Map<string, Drive>();
  private stopped = false;

  constructor(
    private readonly jobRepo: JobRepository,
    private readonly client: GenerationClient,
    private readonly bus: JobEventBus,
    private readonly options: JobEngineOptions,
    private readonly sleep: Sleep = abortableSleep
  ) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.pool = new WorkerPool(options.concurrency);
  }

  /**
   * Validates and persists a new queued job, then schedules its drive.
   * Returns the queued record as committed.
   */
  submit(request: SubmitRequest): Job {
    if (this.stopped) {
      throw new AppError('Job engine is shut down', 'ENGINE_STOPPED', 1);
    }

    const prompt = request.prompt.trim();
    if (prompt.length === 0) {
      throw new ValidationError('Prompt cannot be empty');
    }

    const parsed = generationParamsSchema.safeParse(request.parameters);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues[0]?.message ?? 'Invalid generation parameters', {
        issues: parsed.error.issues,
      });
    }
    const parameters = parsed.data;
    if (!supportsSize(parameters.model, parameters.size)) {
      throw new ValidationError(`Size ${parameters.size} is not supported by ${parameters.model}`);
    }

    const inputReference = request.inputReference ?? null;
    if (request.kind === 'edit' && !inputReference) {
      throw new ValidationError('Edit jobs require a source image');
    }
    if (request.kind === 'generate' && inputReference) {
      throw new ValidationError('Generate jobs do not take a source image');
    }

    const job = this.createWithFreshId({ kind: request.kind, prompt, parameters, inputReference });
    logger.info('Job submitted', { jobId: job.id, kind: job.kind, model: parameters.model });
    this.notify(job, 'created');
    this.schedule(job.id, { status: 'queued', attemptCount: 0 });
    return job;
  }

  /**
   * Runs the job's lifecycle to a terminal state. Idempotent: a terminal job is returned as
   * stored without calling the generation client, and a drive already running here is shared.
   *
   * The claim is a compare-and-swap against `snapshot` (by default the record read now). When
   * another driver has moved the job since, the claim is lost and the client is never called.
   */
  async drive(jobId: string, snapshot?: ClaimSnapshot): Promise<Job> {
    const existing = this.inFlight.get(jobId);
    if (existing) {
      return existing.promise;
    }

    const current = this.jobRepo.get(jobId);
    if (isTerminal(current.status)) {
      logger.debug('Drive skipped for terminal job', { jobId, status: current.status });
      return current;
    }
    if (this.stopped) {
      throw new AppError('Job engine is shut down', 'ENGINE_STOPPED', 1, { jobId });
    }

    const expected: ClaimSnapshot = snapshot ?? {
      status: current.status,
      attemptCount: current.attemptCount,
    };
    const controller = new AbortController();
    const promise = this.pool
      .run(jobId, () => this.runLifecycle(jobId, expected, controller.signal))
      .finally(() => {
        this.inFlight.delete(jobId);
      });
    this.inFlight.set(jobId, { promise, controller });

    const { active, queued, max } = this.pool.getStats();
    if (queued > 0) {
      logger.debug('Job waiting for a worker', { jobId, active, queued, max });
    }
    return promise;
  }

  /**
   * Resolves with the stored record once the job is terminal.
   * Follows this process's drive when there is one, otherwise polls the store.
   */
  async waitFor(
    jobId: string,
    options: { pollIntervalMs?: number; signal?: AbortSignal } = {}
  ): Promise<Job> {
    const pollSignal = options.signal ?? new AbortController().signal;

    for (;;) {
      const drive = this.inFlight.get(jobId);
      if (drive) {
        await drive.promise;
      }

      const job = this.jobRepo.get(jobId);
      if (isTerminal(job.status) || pollSignal.aborted) {
        return job;
      }
      if (!this.inFlight.has(jobId)) {
        await this.sleep(options.pollIntervalMs ?? DEFAULT_WAIT_POLL_MS, pollSignal);
      }
    }
  }

  /**
   * Marks a queued or running job failed with kind `cancelled`.
   * A generation call already in flight finishes; its outcome is discarded as stale.
   */
  cancel(jobId: string): CancelResult {
    for (;;) {
      const job = this.jobRepo.get(jobId);
      if (isTerminal(job.status)) {
        return { job, cancelled: false };
      }

      const errorSummary: ErrorSummary = {
        kind: 'cancelled',
        reason: 'cancelled',
        message: 'Cancelled by user',
      };
      try {
        const cancelled = this.jobRepo.transition(
          jobId,
          job.status,
          'failed',
          { errorSummary },
          { expectedAttemptCount: job.attemptCount }
        );
        logger.info('Job cancelled', { jobId, from: job.status, attemptCount: job.attemptCount });
        this.notify(cancelled, 'status');
        this.inFlight.get(jobId)?.controller.abort();
        return { job: cancelled, cancelled: true };
      } catch (error) {
        if (!(error instanceof StaleTransitionError)) {
          throw error;
        }
        logger.debug('Cancel raced with a transition, re-reading job', { jobId });
      }
    }
  }

  /**
   * Resumes queued or running jobs whose last transition is older than `staleAfterMs`
   * (left behind by a process that stopped). Returns the jobs as found; their drives are
   * scheduled and can be awaited with `waitFor`.
   */
  recover(options: { staleAfterMs: number }): Job[] {
    const cutoff = new Date(Date.now() - options.staleAfterMs);
    const stale = this.jobRepo
      .listStale(cutoff, RESUMABLE_STATUSES)
      .filter((job) => !this.inFlight.has(job.id));

    if (stale.length > 0) {
      logger.info('Resuming interrupted jobs', {
        count: stale.length,
        cutoff: cutoff.toISOString(),
      });
    }
    for (const job of stale) {
      this.schedule(job.id, { status: job.status, attemptCount: job.attemptCount });
    }
    return stale;
  }

  /**
   * Stops accepting work and waits for drives in progress. Nothing is cancelled.
   */
  async shutdown(): Promise<void> {
    this.stopped = true;
    const drives = [...this.inFlight.values()].map((drive) => drive.promise);
    if (drives.length > 0) {
      logger.info('Waiting for in-flight jobs', { count: drives.length });
    }
    await Promise.allSettled(drives);
  }

  private schedule(jobId: string, snapshot?: ClaimSnapshot): void {
    this.drive(jobId, snapshot).catch((error: unknown) => {
      logger.error('Job drive failed', { jobId, error });
    });
  }

  private createWithFreshId(params: {
    kind: JobKind;
    prompt: string;
    parameters: Job['parameters'];
    inputReference: string | null;
  }): Job {
    for (let attempt = 1; ; attempt++) {
      const job = createJob({ id: generateJobId(), ...params });
      try {
        this.jobRepo.create(job);
        return this.jobRepo.get(job.id);
      } catch (error) {
        if (!(error instanceof DuplicateIdError) || attempt >= MAX_ID_ATTEMPTS) {
          throw error;
        }
        logger.debug('Job id collision, generating a new id', { jobId: job.id, attempt });
      }
    }
  }

  private async runLifecycle(
    jobId: string,
    snapshot: ClaimSnapshot,
    signal: AbortSignal
  ): Promise<Job> {
    let job: Job | null = this.claim(jobId, snapshot, signal);

    while (job && job.status === 'running') {
      const attempt = job.attemptCount;
      const outcome = await this.invoke(job);

      if (outcome.ok) {
        const count = outcome.artifacts.length;
        job = this.commit(jobId, 'running', 'completed', attempt, {
          artifacts: outcome.artifacts,
          message: `Completed with ${count} image${count === 1 ? '' : 's'}`,
        });
        break;
      }

      const { error } = outcome;
      if (error.classification !== 'transient' || attempt >= this.options.maxAttempts) {
        const exhausted = error.classification === 'transient';
        job = this.commit(jobId, 'running', 'failed', attempt, {
          errorSummary: {
            kind: failureKind(error),
            reason: error.reason,
            message: exhausted ? `${error.message} (after ${attempt} attempts)` : error.message,
          },
        });
        break;
      }

      const delayMs = computeBackoffDelay(attempt, this.options);
      logger.info('Transient generation failure, retrying', {
        jobId,
        attempt,
        maxAttempts: this.options.maxAttempts,
        reason: error.reason,
        delayMs,
      });
      await this.sleep(delayMs, signal);
      if (signal.aborted) {
        break;
      }

      job = this.commit(jobId, 'running', 'running', attempt, {
        attemptCount: attempt + 1,
        message: `Retrying after ${error.reason} (attempt ${attempt + 1} of ${this.options.maxAttempts})`,
      });
    }

    return this.jobRepo.get(jobId);
  }

  /**
   * Takes ownership of the next attempt: queued -> running(1), or running(n) -> running(n + 1)
   * for a job resumed after its previous driver stopped. Both are conditional on the snapshot;
   * a lost claim returns null.
   */
  private claim(jobId: string, snapshot: ClaimSnapshot, signal: AbortSignal): Job | null {
    if (isTerminal(snapshot.status) || signal.aborted) {
      return null;
    }

    const attempt = snapshot.attemptCount;
    if (snapshot.status === 'queued') {
      return this.commit(
        jobId,
        'queued',
        'running',
        attempt,
        { attemptCount: attempt + 1, message: `Attempt ${attempt + 1} started` },
        'Claim lost to another driver'
      );
    }

    if (attempt >= this.options.maxAttempts) {
      return this.commit(
        jobId,
        'running',
        'failed',
        attempt,
        {
          errorSummary: {
            kind: 'transient_exhausted',
            reason: 'interrupted',
            message: `Interrupted after ${attempt} of ${this.options.maxAttempts} attempts`,
          },
        },
        'Claim lost to another driver'
      );
    }

    logger.info('Resuming interrupted job', { jobId, attemptCount: attempt });
    return this.commit(
      jobId,
      'running',
      'running',
      attempt,
      {
        attemptCount: attempt + 1,
        message: `Resumed (attempt ${attempt + 1} of ${this.options.maxAttempts})`,
      },
      'Claim lost to another driver'
    );
  }

  private async invoke(job: Job): Promise<AttemptOutcome> {
    const controller = new AbortController();
    const timeoutMs = this.options.attemptTimeoutMs;
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        controller.abort();
        reject(new GenerationError(`Attempt timed out after ${timeoutMs}ms`, 'transient', 'timeout'));
      }, timeoutMs);
    });

    logger.debug('Generation attempt started', { jobId: job.id, attempt: job.attemptCount });
    try {
      const artifacts = await Promise.race([
        this.client.generate({
          kind: job.kind,
          prompt: job.prompt,
          parameters: job.parameters,
          inputReference: job.inputReference,
          signal: controller.signal,
        }),
        timeout,
      ]);
      if (artifacts.length === 0) {
        return {
          ok: false,
          error: new GenerationError('No images in response', 'permanent', 'no_images'),
        };
      }
      return { ok: true, artifacts };
    } catch (error) {
      return { ok: false, error: toGenerationError(error) };
    } finally {
      clearTimeout(timer);
    }
  }

  /**
   * Conditional transition; a lost race is logged and reported as null, never applied
   */
  private commit(
    jobId: string,
    from: JobStatus,
    to: JobStatus,
    expectedAttemptCount: number,
    fields: TransitionFields,
    staleMessage = 'Discarding stale job outcome'
  ): Job | null {
    try {
      const job = this.jobRepo.transition(jobId, from, to, fields, { expectedAttemptCount });
      logger.info('Job transition', {
        jobId,
        from,
        to,
        attemptCount: job.attemptCount,
        ...(job.errorSummary ? { kind: job.errorSummary.kind, reason: job.errorSummary.reason } : {}),
      });
      this.notify(job, 'status');
      return job;
    } catch (error) {
      if (error instanceof StaleTransitionError) {
        logger.warn(staleMessage, {
          jobId,
          from,
          to,
          expected: error.expected,
          actual: error.actual,
        });
        return null;
      }
      throw error;
    }
  }

  private notify(job: Job, change: 'created' | 'status'): void {
    try {
      this.bus.publish(job, change);
    } catch (error) {
      logger.warn('Job change listener failed', { jobId: job.id, error });
    }
  }
}
