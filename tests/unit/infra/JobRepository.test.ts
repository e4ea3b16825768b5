import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createJob } from '../../../src/domain/entities/Job.js';
import {
  DuplicateIdError,
  InvalidTransitionError,
  NotFoundError,
  StaleTransitionError,
} from '../../../src/domain/errors.js';
import type { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import type { JobEventRepository } from '../../../src/infra/repositories/JobEventRepository.js';
import type { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { createTestStore, defaultParams, image, insertJob } from '../helpers.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

const cancelledSummary = { kind: 'cancelled' as const, reason: 'cancelled', message: 'Cancelled' };

describe('JobRepository', () => {
  let db: DatabaseAdapter;
  let jobRepo: JobRepository;
  let eventRepo: JobEventRepository;

  beforeEach(() => {
    ({ db, jobRepo, eventRepo } = createTestStore());
  });

  afterEach(() => {
    db.close();
  });

  describe('create', () => {
    it('stores a queued job and returns its id', () => {
      const job = createJob({
        id: 'bn_aaaaaaaa',
        kind: 'edit',
        prompt: 'make it blue',
        parameters: defaultParams,
        inputReference: '/images/source.png',
      });

      expect(jobRepo.create(job)).toBe('bn_aaaaaaaa');

      const stored = jobRepo.get('bn_aaaaaaaa');
      expect(stored.status).toBe('queued');
      expect(stored.kind).toBe('edit');
      expect(stored.inputReference).toBe('/images/source.png');
      expect(stored.parameters).toEqual(defaultParams);
      expect(stored.revision).toBe(1);
    });

    it('rejects a colliding id', () => {
      insertJob(jobRepo, { id: 'bn_bbbbbbbb' });
      expect(() => insertJob(jobRepo, { id: 'bn_bbbbbbbb' })).toThrow(DuplicateIdError);
    });

    it('records a creation event', () => {
      const job = insertJob(jobRepo);
      const events = eventRepo.listByJob(job.id);
      expect(events).toHaveLength(1);
      expect(events[0]?.status).toBe('queued');
      expect(events[0]?.message).toBe('Job created');
    });
  });

  describe('get', () => {
    it('throws NotFoundError for an unknown id', () => {
      expect(() => jobRepo.get('bn_missing0')).toThrow(NotFoundError);
    });
  });

  describe('transition', () => {
    it('moves through the lifecycle and stores artifacts with the completion', () => {
      const job = insertJob(jobRepo, { id: 'bn_cccccccc' });

      const running = jobRepo.transition(job.id, 'queued', 'running', { attemptCount: 1 });
      expect(running.status).toBe('running');
      expect(running.attemptCount).toBe(1);
      expect(running.updatedAt.getTime()).toBeGreaterThan(job.updatedAt.getTime());

      const completed = jobRepo.transition(
        job.id,
        'running',
        'completed',
        { artifacts: [image('first'), image('second', 'image/jpeg')] },
        { expectedAttemptCount: 1 }
      );
      expect(completed.status).toBe('completed');
      expect(completed.attemptCount).toBe(1);
      expect(completed.outputReferences).toEqual([
        { index: 0, mimeType: 'image/png', uri: 'artifact://bn_cccccccc/0', byteLength: 5 },
        { index: 1, mimeType: 'image/jpeg', uri: 'artifact://bn_cccccccc/1', byteLength: 6 },
      ]);

      const artifacts = jobRepo.getArtifacts(job.id);
      expect(artifacts.map((artifact) => artifact.data.toString())).toEqual(['first', 'second']);
      expect(eventRepo.listByJob(job.id).map((event) => event.status)).toEqual([
        'queued',
        'running',
        'completed',
      ]);
    });

    it('reports a stale expected status without changing the record', () => {
      const job = insertJob(jobRepo);
      jobRepo.transition(job.id, 'queued', 'running', { attemptCount: 1 });
      const before = jobRepo.get(job.id);

      expect(() => jobRepo.transition(job.id, 'queued', 'running', { attemptCount: 1 })).toThrow(
        StaleTransitionError
      );
      expect(() =>
        jobRepo.transition(job.id, 'running', 'failed', { errorSummary: cancelledSummary }, {
          expectedAttemptCount: 2,
        })
      ).toThrow(StaleTransitionError);

      expect(jobRepo.get(job.id)).toEqual(before);
      expect(eventRepo.listByJob(job.id)).toHaveLength(2);
    });

    it('throws NotFoundError for an unknown id', () => {
      expect(() => jobRepo.transition('bn_missing0', 'queued', 'running')).toThrow(NotFoundError);
    });

    it('accepts no transition out of a terminal state', () => {
      const job = insertJob(jobRepo);
      jobRepo.transition(job.id, 'queued', 'failed', { errorSummary: cancelledSummary });

      expect(() => jobRepo.transition(job.id, 'failed', 'running', { attemptCount: 1 })).toThrow(
        InvalidTransitionError
      );
    });

    it('requires artifacts to complete and an error summary to fail', () => {
      const job = insertJob(jobRepo);
      jobRepo.transition(job.id, 'queued', 'running', { attemptCount: 1 });

      expect(() => jobRepo.transition(job.id, 'running', 'completed', {})).toThrow(
        'Output references are required for, and only allowed on, completed jobs'
      );
      expect(() => jobRepo.transition(job.id, 'running', 'failed', {})).toThrow(
        'An error summary is required for, and only allowed on, failed jobs'
      );
      expect(jobRepo.get(job.id).status).toBe('running');
    });

    it('only lets a queued job fail by cancellation', () => {
      const job = insertJob(jobRepo);
      expect(() =>
        jobRepo.transition(job.id, 'queued', 'failed', {
          errorSummary: { kind: 'permanent', reason: 'invalid_request', message: 'bad' },
        })
      ).toThrow('A queued job can only fail by cancellation');

      const failed = jobRepo.transition(job.id, 'queued', 'failed', {
        errorSummary: cancelledSummary,
      });
      expect(failed.attemptCount).toBe(0);
      expect(failed.errorSummary).toEqual(cancelledSummary);
    });

    it('never lets the attempt count go backwards or stand still on a retry', () => {
      const job = insertJob(jobRepo);
      jobRepo.transition(job.id, 'queued', 'running', { attemptCount: 2 });

      expect(() => jobRepo.transition(job.id, 'running', 'running', { attemptCount: 1 })).toThrow(
        'Attempt count cannot decrease'
      );
      expect(() => jobRepo.transition(job.id, 'running', 'running', { attemptCount: 2 })).toThrow(
        'A retry must increment the attempt count'
      );
      expect(jobRepo.transition(job.id, 'running', 'running', { attemptCount: 3 }).attemptCount).toBe(
        3
      );
    });
  });

  describe('list', () => {
    it('returns newest first and filters by status and id prefix', () => {
      const first = insertJob(jobRepo, { id: 'bn_a0000001' });
      const second = insertJob(jobRepo, { id: 'bn_a0000002' });
      const third = insertJob(jobRepo, { id: 'bn_b0000003' });
      jobRepo.transition(second.id, 'queued', 'running', { attemptCount: 1 });

      expect(jobRepo.list().map((job) => job.id)).toEqual([third.id, second.id, first.id]);
      expect(jobRepo.list({ status: 'queued' }).map((job) => job.id)).toEqual([third.id, first.id]);
      expect(jobRepo.list({ idPrefix: 'bn_a' }).map((job) => job.id)).toEqual([
        second.id,
        first.id,
      ]);
      expect(jobRepo.list({ limit: 1 }).map((job) => job.id)).toEqual([third.id]);
      expect(jobRepo.count({ status: 'running' })).toBe(1);
    });

    it('matches the id prefix literally and case-sensitively', () => {
      insertJob(jobRepo, { id: 'bn_a0000001' });

      expect(jobRepo.list({ idPrefix: 'bn_%' })).toEqual([]);
      expect(jobRepo.list({ idPrefix: 'b_' })).toEqual([]);
      expect(jobRepo.list({ idPrefix: 'BN_' })).toEqual([]);
      expect(jobRepo.count({ idPrefix: 'bn_a' })).toBe(1);
    });
  });

  describe('revisions', () => {
    it('returns jobs changed after a revision in commit order', () => {
      const first = insertJob(jobRepo);
      const second = insertJob(jobRepo);
      const checkpoint = jobRepo.currentRevision();

      jobRepo.transition(first.id, 'queued', 'running', { attemptCount: 1 });

      const changed = jobRepo.listChangedSince(checkpoint);
      expect(changed.map((job) => job.id)).toEqual([first.id]);
      expect(changed[0]?.revision).toBe(checkpoint + 1);
      expect(jobRepo.listChangedSince(0).map((job) => job.id)).toEqual([second.id, first.id]);
    });

    it('never reuses a revision after the newest job is purged', () => {
      const older = insertJob(jobRepo, { id: 'bn_a0000001' });
      const newest = insertJob(jobRepo, { id: 'bn_b0000002' });
      const failed = jobRepo.transition(newest.id, 'queued', 'failed', {
        errorSummary: cancelledSummary,
      });
      const checkpoint = jobRepo.currentRevision();
      expect(checkpoint).toBe(failed.revision);

      jobRepo.deleteTerminal(newest.id);
      const running = jobRepo.transition(older.id, 'queued', 'running', { attemptCount: 1 });

      expect(running.revision).toBe(checkpoint + 1);
      expect(jobRepo.currentRevision()).toBe(checkpoint + 1);
      expect(jobRepo.listChangedSince(checkpoint).map((job) => job.id)).toEqual([older.id]);
    });
  });

  describe('listStale', () => {
    it('returns non-terminal jobs last updated before the cutoff', () => {
      const running = insertJob(jobRepo);
      jobRepo.transition(running.id, 'queued', 'running', { attemptCount: 1 });
      const done = insertJob(jobRepo);
      jobRepo.transition(done.id, 'queued', 'failed', { errorSummary: cancelledSummary });

      const future = new Date(Date.now() + 60_000);
      expect(jobRepo.listStale(future, ['running', 'queued']).map((job) => job.id)).toEqual([
        running.id,
      ]);
      expect(jobRepo.listStale(new Date(0), ['running', 'queued'])).toEqual([]);
    });
  });

  describe('purge', () => {
    it('removes a finished job with its artifacts and events, and nothing else', () => {
      const done = insertJob(jobRepo);
      jobRepo.transition(done.id, 'queued', 'running', { attemptCount: 1 });
      jobRepo.transition(done.id, 'running', 'completed', { artifacts: [image()] });
      const active = insertJob(jobRepo);

      expect(jobRepo.deleteTerminal(done.id)).toBe(true);
      expect(jobRepo.deleteTerminal(active.id)).toBe(false);

      expect(jobRepo.find(done.id)).toBeNull();
      expect(jobRepo.getArtifacts(done.id)).toEqual([]);
      expect(eventRepo.listByJob(done.id)).toEqual([]);
      expect(jobRepo.get(active.id).status).toBe('queued');
    });

    it('removes finished jobs created before a cutoff', () => {
      const done = insertJob(jobRepo);
      jobRepo.transition(done.id, 'queued', 'failed', { errorSummary: cancelledSummary });
      const active = insertJob(jobRepo);

      expect(jobRepo.deleteTerminalOlderThan(new Date(0))).toBe(0);
      expect(jobRepo.deleteTerminalOlderThan(null)).toBe(1);
      expect(jobRepo.list().map((job) => job.id)).toEqual([active.id]);
    });

    it('clears a history larger than the bound-parameter limit in one statement', () => {
      for (let index = 0; index < 1200; index++) {
        const job = insertJob(jobRepo, { id: `bn_${String(index).padStart(8, '0')}` });
        jobRepo.transition(job.id, 'queued', 'failed', { errorSummary: cancelledSummary });
      }

      expect(jobRepo.deleteTerminalOlderThan(null)).toBe(1200);
      expect(jobRepo.count()).toBe(0);
    });
  });
});
