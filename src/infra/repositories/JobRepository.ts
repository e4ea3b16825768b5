import { z } from 'zod';
import type { DatabaseAdapter } from '../DatabaseAdapter.js';
import type { JobEventRepository } from './JobEventRepository.js';
import type {
  ErrorSummary,
  Job,
  JobKind,
  JobStatus,
  OutputReference,
} from '../../domain/entities/Job.js';
import { artifactUri, isTransitionAllowed } from '../../domain/entities/Job.js';
import { generationParamsSchema } from '../../domain/entities/GenerationParams.js';
import {
  DatabaseError,
  DuplicateIdError,
  InvalidTransitionError,
  NotFoundError,
  StaleTransitionError,
} from '../../domain/errors.js';
import { logger } from '../logger.js';

type JobRow = {
  id: string;
  kind: JobKind;
  prompt: string;
  input_reference: string | null;
  parameters: string;
  status: JobStatus;
  attempt_count: number;
  created_at: string;
  updated_at: string;
  output_references: string;
  error_summary: string | null;
  revision: number;
};

type ArtifactRow = {
  position: number;
  mime_type: string;
  data: Buffer;
};

const outputReferencesSchema = z.array(
  z.object({
    index: z.number().int(),
    mimeType: z.string(),
    uri: z.string(),
    byteLength: z.number().int(),
  })
);

const errorSummarySchema = z.object({
  kind: z.enum(['transient_exhausted', 'permanent', 'unknown', 'cancelled']),
  reason: z.string(),
  message: z.string(),
});

export interface ArtifactInput {
  mimeType: string;
  data: Buffer;
}

export interface StoredArtifact {
  index: number;
  mimeType: string;
  data: Buffer;
}

export interface TransitionFields {
  /** New attempt count; defaults to the persisted value and may never decrease */
  attemptCount?: number;
  /** Produced images, required for and only accepted on `completed` */
  artifacts?: ArtifactInput[];
  /** Required for and only accepted on `failed` */
  errorSummary?: ErrorSummary;
  /** Free-text note stored on the job event */
  message?: string;
}

export interface TransitionGuard {
  /** Also require the persisted attempt count to match (distinguishes Running -> Running drivers) */
  expectedAttemptCount?: number;
}

export interface JobListFilter {
  status?: JobStatus;
  kind?: JobKind;
  idPrefix?: string;
  limit?: number;
}

const DEFAULT_LIST_LIMIT = 20;
const MAX_LIST_LIMIT = 500;
const TERMINAL_STATUSES_SQL = "('completed', 'failed')";
const CURRENT_REVISION_SQL = '(SELECT value FROM job_revision WHERE id = 1)';

/**
 * Job Store - the single source of truth for job state.
 * After `create`, `transition` is the only write path; it is a compare-and-swap on
 * (id, expected status[, expected attempt count]) executed in one IMMEDIATE transaction.
 */
export class JobRepository {
  constructor(
    private db: DatabaseAdapter,
    private eventRepo: JobEventRepository
  ) {}

  create(job: Job): string {
    if (job.status !== 'queued' || job.attemptCount !== 0) {
      throw new InvalidTransitionError('New jobs must start queued with no attempts', {
        jobId: job.id,
        status: job.status,
      });
    }

    const sql = `
      INSERT INTO jobs (
        id, kind, prompt, input_reference, parameters, status, attempt_count,
        created_at, updated_at, output_references, error_summary, revision
      ) VALUES (?, ?, ?, ?, ?, 'queued', 0, ?, ?, '[]', NULL, ${CURRENT_REVISION_SQL})
    `;

    try {
      this.db.transaction(() => {
        this.bumpRevision();
        this.db.execute(sql, [
          job.id,
          job.kind,
          job.prompt,
          job.inputReference,
          JSON.stringify(job.parameters),
          job.createdAt.toISOString(),
          job.updatedAt.toISOString(),
        ]);
        this.eventRepo.record({
          jobId: job.id,
          status: 'queued',
          attemptCount: 0,
          message: 'Job created',
          createdAt: job.createdAt,
        });
      });
    } catch (error) {
      if (error instanceof DatabaseError && error.sqliteCode === 'SQLITE_CONSTRAINT_PRIMARYKEY') {
        throw new DuplicateIdError(job.id);
      }
      throw error;
    }

    logger.debug('Job created', { jobId: job.id, kind: job.kind });
    return job.id;
  }

  /**
   * Atomically moves a job from `expectedStatus` to `nextStatus`.
   * Throws NotFoundError when the id is unknown, StaleTransitionError when the persisted
   * state no longer matches the expectation, InvalidTransitionError when the move is outside
   * the state machine or would break a record invariant. A failed call writes nothing.
   */
  transition(
    jobId: string,
    expectedStatus: JobStatus,
    nextStatus: JobStatus,
    fields: TransitionFields = {},
    guard: TransitionGuard = {}
  ): Job {
    return this.db.transaction(() => {
      const current = this.db.queryOne<JobRow>('SELECT * FROM jobs WHERE id = ?', [jobId]);
      if (!current) {
        throw new NotFoundError('Job', jobId);
      }

      const expectedLabel =
        guard.expectedAttemptCount === undefined
          ? expectedStatus
          : `${expectedStatus}#${guard.expectedAttemptCount}`;
      if (
        current.status !== expectedStatus ||
        (guard.expectedAttemptCount !== undefined &&
          current.attempt_count !== guard.expectedAttemptCount)
      ) {
        throw new StaleTransitionError(
          jobId,
          expectedLabel,
          `${current.status}#${current.attempt_count}`
        );
      }

      const attemptCount = fields.attemptCount ?? current.attempt_count;
      const artifacts = fields.artifacts ?? [];
      this.assertTransition(current, nextStatus, attemptCount, artifacts, fields.errorSummary);

      const outputReferences: OutputReference[] = artifacts.map((artifact, index) => ({
        index,
        mimeType: artifact.mimeType,
        uri: artifactUri(jobId, index),
        byteLength: artifact.data.byteLength,
      }));
      const updatedAt = this.nextTimestamp(current.updated_at);
      this.bumpRevision();

      const sql = `
        UPDATE jobs
        SET status = ?, attempt_count = ?, updated_at = ?, output_references = ?,
            error_summary = ?, revision = ${CURRENT_REVISION_SQL}
        WHERE id = ? AND status = ? AND attempt_count = ?
      `;
      const changes = this.db.execute(sql, [
        nextStatus,
        attemptCount,
        updatedAt.toISOString(),
        JSON.stringify(outputReferences),
        fields.errorSummary ? JSON.stringify(fields.errorSummary) : null,
        jobId,
        expectedStatus,
        current.attempt_count,
      ]);
      if (changes !== 1) {
        throw new StaleTransitionError(jobId, expectedLabel, 'concurrent update');
      }

      artifacts.forEach((artifact, index) => {
        this.db.execute(
          'INSERT INTO job_artifacts (job_id, position, mime_type, data) VALUES (?, ?, ?, ?)',
          [jobId, index, artifact.mimeType, artifact.data]
        );
      });

      this.eventRepo.record({
        jobId,
        status: nextStatus,
        attemptCount,
        message: fields.message ?? fields.errorSummary?.message ?? null,
        createdAt: updatedAt,
      });

      logger.debug('Job transition persisted', {
        jobId,
        from: expectedStatus,
        to: nextStatus,
        attemptCount,
      });

      return this.get(jobId);
    });
  }

  get(jobId: string): Job {
    const job = this.find(jobId);
    if (!job) {
      throw new NotFoundError('Job', jobId);
    }
    return job;
  }

  find(jobId: string): Job | null {
    const row = this.db.queryOne<JobRow>('SELECT * FROM jobs WHERE id = ?', [jobId]);
    return row ? this.mapRowToJob(row) : null;
  }

  list(filter: JobListFilter = {}): Job[] {
    const { where, values } = this.buildFilter(filter);
    const limit = Math.min(Math.max(filter.limit ?? DEFAULT_LIST_LIMIT, 1), MAX_LIST_LIMIT);

    const sql = `
      SELECT * FROM jobs
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT ?
    `;

    const rows = this.db.query<JobRow>(sql, [...values, limit]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  count(filter: Omit<JobListFilter, 'limit'> = {}): number {
    const { where, values } = this.buildFilter(filter);
    const row = this.db.queryOne<{ total: number }>(
      `SELECT COUNT(*) AS total FROM jobs ${where}`,
      values
    );
    return row?.total ?? 0;
  }

  /**
   * Jobs written after the given revision, oldest change first
   */
  listChangedSince(revision: number): Job[] {
    const rows = this.db.query<JobRow>(
      'SELECT * FROM jobs WHERE revision > ? ORDER BY revision ASC',
      [revision]
    );
    return rows.map((row) => this.mapRowToJob(row));
  }

  currentRevision(): number {
    const row = this.db.queryOne<{ value: number }>(`SELECT ${CURRENT_REVISION_SQL} AS value`);
    return row?.value ?? 0;
  }

  /**
   * Non-terminal jobs whose last persisted transition is older than the cutoff
   */
  listStale(cutoff: Date, statuses: JobStatus[]): Job[] {
    if (statuses.length === 0) return [];
    const placeholders = statuses.map(() => '?').join(', ');
    const sql = `
      SELECT * FROM jobs
      WHERE status IN (${placeholders}) AND updated_at <= ?
      ORDER BY created_at ASC, id ASC
    `;
    const rows = this.db.query<JobRow>(sql, [...statuses, cutoff.toISOString()]);
    return rows.map((row) => this.mapRowToJob(row));
  }

  getArtifacts(jobId: string): StoredArtifact[] {
    const rows = this.db.query<ArtifactRow>(
      'SELECT position, mime_type, data FROM job_artifacts WHERE job_id = ? ORDER BY position ASC',
      [jobId]
    );
    return rows.map((row) => ({ index: row.position, mimeType: row.mime_type, data: row.data }));
  }

  /**
   * Administrative purge of one job; returns false when it is missing or not terminal.
   * Artifacts and events cascade.
   */
  deleteTerminal(jobId: string): boolean {
    const deleted = this.db.execute(
      `DELETE FROM jobs WHERE id = ? AND status IN ${TERMINAL_STATUSES_SQL}`,
      [jobId]
    );
    return deleted === 1;
  }

  /**
   * Removes every terminal job created before the cutoff (all of them when it is null)
   */
  deleteTerminalOlderThan(cutoff: Date | null): number {
    const sql = cutoff
      ? `DELETE FROM jobs WHERE status IN ${TERMINAL_STATUSES_SQL} AND created_at < ?`
      : `DELETE FROM jobs WHERE status IN ${TERMINAL_STATUSES_SQL}`;
    const deleted = this.db.execute(sql, cutoff ? [cutoff.toISOString()] : []);
    logger.debug('Terminal jobs purged', { cutoff: cutoff?.toISOString() ?? null, deleted });
    return deleted;
  }

  private assertTransition(
    current: JobRow,
    nextStatus: JobStatus,
    attemptCount: number,
    artifacts: ArtifactInput[],
    errorSummary: ErrorSummary | undefined
  ): void {
    const details = { jobId: current.id, from: current.status, to: nextStatus };

    if (!isTransitionAllowed(current.status, nextStatus)) {
      throw new InvalidTransitionError(
        `Invalid job status transition: ${current.status} -> ${nextStatus}`,
        details
      );
    }
    if (attemptCount < current.attempt_count) {
      throw new InvalidTransitionError('Attempt count cannot decrease', {
        ...details,
        attemptCount,
        current: current.attempt_count,
      });
    }
    if (current.status === 'queued' && nextStatus === 'failed' && errorSummary?.kind !== 'cancelled') {
      throw new InvalidTransitionError('A queued job can only fail by cancellation', details);
    }
    if (current.status === 'running' && nextStatus === 'running' && attemptCount <= current.attempt_count) {
      throw new InvalidTransitionError('A retry must increment the attempt count', {
        ...details,
        attemptCount,
      });
    }
    if ((nextStatus === 'completed') !== (artifacts.length > 0)) {
      throw new InvalidTransitionError(
        'Output references are required for, and only allowed on, completed jobs',
        details
      );
    }
    if ((nextStatus === 'failed') !== (errorSummary !== undefined)) {
      throw new InvalidTransitionError(
        'An error summary is required for, and only allowed on, failed jobs',
        details
      );
    }
  }

  private bumpRevision(): void {
    this.db.execute('UPDATE job_revision SET value = value + 1 WHERE id = 1');
  }

  /**
   * updated_at strictly advances on every persisted transition
   */
  private nextTimestamp(previous: string): Date {
    const now = Date.now();
    const floor = new Date(previous).getTime() + 1;
    return new Date(Math.max(now, floor));
  }

  private buildFilter(filter: Omit<JobListFilter, 'limit'>): { where: string; values: unknown[] } {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.status) {
      conditions.push('status = ?');
      values.push(filter.status);
    }

    if (filter.kind) {
      conditions.push('kind = ?');
      values.push(filter.kind);
    }

    if (filter.idPrefix) {
      conditions.push('substr(id, 1, ?) = ?');
      values.push(filter.idPrefix.length, filter.idPrefix);
    }

    return {
      where: conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '',
      values,
    };
  }

  private mapRowToJob(row: JobRow): Job {
    return {
      id: row.id,
      kind: row.kind,
      prompt: row.prompt,
      inputReference: row.input_reference,
      parameters: generationParamsSchema.parse(JSON.parse(row.parameters)),
      status: row.status,
      attemptCount: row.attempt_count,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      outputReferences: outputReferencesSchema.parse(JSON.parse(row.output_references)),
      errorSummary: row.error_summary
        ? errorSummarySchema.parse(JSON.parse(row.error_summary))
        : null,
      revision: row.revision,
    };
  }
}
