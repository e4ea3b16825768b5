import { existsSync, mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createProgram, reportError } from '../../../src/cli/program.js';
import type { CliContext, CliIO } from '../../../src/cli/context.js';
import type { GeneratedArtifact } from '../../../src/infra/gemini/GenerationClient.js';
import type { DatabaseAdapter } from '../../../src/infra/DatabaseAdapter.js';
import { AppConfigRepository } from '../../../src/infra/repositories/AppConfigRepository.js';
import type { JobRepository } from '../../../src/infra/repositories/JobRepository.js';
import { ArtifactExportService } from '../../../src/services/ArtifactExportService.js';
import { JobEngine } from '../../../src/services/JobEngine.js';
import { JobEventBus } from '../../../src/services/JobEventBus.js';
import { JobQueryService } from '../../../src/services/JobQueryService.js';
import { JobRetentionService } from '../../../src/services/JobRetentionService.js';
import { SettingsService } from '../../../src/services/SettingsService.js';
import {
  createStubClient,
  createTestStore,
  deferred,
  image,
  insertJob,
  pause,
  permanentError,
  stripAnsi,
} from '../helpers.js';

vi.mock('../../../src/infra/logger.js', () => ({
  logger: {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  },
}));

describe('banana CLI', () => {
  let db: DatabaseAdapter;
  let jobRepo: JobRepository;
  let stub: ReturnType<typeof createStubClient>;
  let ctx: CliContext;
  let stdout: string[];
  let stderr: string[];
  let interrupt: (() => void) | null;
  let outputDir: string;

  async function run(...args: string[]): Promise<number> {
    const program = createProgram(ctx, '1.2.3');
    try {
      await program.parseAsync(['node', 'banana', ...args]);
      return 0;
    } catch (error) {
      return reportError(ctx.io, error);
    }
  }

  function out(): string[] {
    return stdout.map(stripAnsi);
  }

  function err(): string[] {
    return stderr.map(stripAnsi);
  }

  beforeEach(() => {
    const store = createTestStore();
    db = store.db;
    jobRepo = store.jobRepo;
    stub = createStubClient();
    stdout = [];
    stderr = [];
    interrupt = null;
    outputDir = mkdtempSync(path.join(tmpdir(), 'banana-cli-'));

    const io: CliIO = {
      stdout: (text) => {
        stdout.push(text);
      },
      stderr: (text) => {
        stderr.push(text);
      },
      interactive: false,
      onInterrupt: (handler) => {
        interrupt = handler;
        return () => {
          interrupt = null;
        };
      },
    };

    const bus = new JobEventBus();
    const settings = new SettingsService({}, new AppConfigRepository(db));
    settings.set('output.directory', outputDir);

    ctx = {
      env: { SQLITE_DB_PATH: ':memory:', JOB_RETENTION_DAYS: 0 },
      engine: new JobEngine(jobRepo, stub.client, bus, {
        maxAttempts: 3,
        concurrency: 2,
        attemptTimeoutMs: 5_000,
        baseDelayMs: 0,
        maxDelayMs: 0,
        jitterMs: 0,
      }),
      queries: new JobQueryService(jobRepo, store.eventRepo, bus),
      retention: new JobRetentionService(jobRepo),
      settings,
      exporter: new ArtifactExportService(jobRepo),
      io,
      staleAfterMs: 60_000,
    };
  });

  afterEach(async () => {
    await ctx.engine.shutdown();
    db.close();
    rmSync(outputDir, { recursive: true, force: true });
  });

  describe('generate', () => {
    it('prints the completed job and the exported files as JSON', async () => {
      stub.generate.mockResolvedValue([image()]);

      const code = await run('generate', 'a cat', '-a', '16:9', '--format', 'json');

      expect(code).toBe(0);
      expect(stdout).toHaveLength(1);
      const printed = JSON.parse(stdout[0] ?? '');
      expect(printed).toMatchObject({
        kind: 'generate',
        status: 'completed',
        prompt: 'a cat',
        aspectRatio: '16:9',
        size: '1K',
        attemptCount: 1,
        error: null,
      });
      expect(printed.files).toEqual([path.join(outputDir, `${printed.id}_0.png`)]);
      expect(existsSync(printed.files[0])).toBe(true);
    });

    it('prints only file paths in quiet mode', async () => {
      stub.generate.mockResolvedValue([image(), image('two')]);

      const code = await run('g', 'a cat', '-f', 'quiet');

      expect(code).toBe(0);
      const [job] = ctx.queries.list();
      expect(stdout).toEqual([
        path.join(outputDir, `${job?.id}_0.png`),
        path.join(outputDir, `${job?.id}_1.png`),
      ]);
    });

    it('skips the export with --no-download', async () => {
      stub.generate.mockResolvedValue([image()]);

      const code = await run('generate', 'a cat', '--no-download', '-f', 'quiet');

      expect(code).toBe(0);
      expect(stdout).toEqual([]);
      expect(ctx.queries.list()[0]?.status).toBe('completed');
    });

    it('exits 1 with the error summary when the job fails', async () => {
      stub.generate.mockRejectedValue(permanentError('Invalid prompt'));

      const code = await run('generate', 'a cat');

      expect(code).toBe(1);
      expect(err()).toHaveLength(1);
      expect(err()[0]).toMatch(/^Error: Job bn_[0-9a-f]{8} failed: Invalid prompt$/);
    });

    it('exits 2 on invalid parameters without creating a job', async () => {
      const code = await run('generate', 'a cat', '-a', '7:3');

      expect(code).toBe(2);
      expect(err()[0]).toMatch(/^Error: Invalid aspect ratio\. Valid values: 1:1, /);
      expect(ctx.queries.count()).toBe(0);
      expect(stub.generate).not.toHaveBeenCalled();
    });

    it('cancels the job on Ctrl-C and exits 130', async () => {
      const call = deferred<GeneratedArtifact[]>();
      stub.generate.mockReturnValue(call.promise);

      const running = run('generate', 'a cat');
      await vi.waitFor(() => expect(stub.generate).toHaveBeenCalledTimes(1));
      interrupt?.();

      expect(await running).toBe(130);
      expect(stderr).toEqual([]);
      const [job] = ctx.queries.list();
      expect(job?.status).toBe('failed');
      expect(job?.errorSummary?.kind).toBe('cancelled');

      call.resolve([image()]);
    });
  });

  describe('edit', () => {
    it('rejects a missing source image', async () => {
      const missing = path.join(outputDir, 'missing.png');

      const code = await run('edit', missing, 'make it blue');

      expect(code).toBe(2);
      expect(err()).toEqual([`Error: Image not found: ${missing}`]);
    });
  });

  describe('jobs', () => {
    it('lists ids newest first in quiet mode', async () => {
      insertJob(jobRepo, { id: 'bn_aaaa0001' });
      insertJob(jobRepo, { id: 'bn_bbbb0002' });

      expect(await run('jobs', '-f', 'quiet')).toBe(0);
      expect(stdout).toEqual(['bn_bbbb0002', 'bn_aaaa0001']);
    });

    it('rejects an unknown status filter', async () => {
      const code = await run('jobs', '--status', 'bogus');

      expect(code).toBe(2);
      expect(err()).toEqual([
        "Error: Unknown status 'bogus'. Use one of: queued, running, completed, failed",
      ]);
    });

    it('shows the status of one job', async () => {
      insertJob(jobRepo, { id: 'bn_aaaa0001' });

      expect(await run('jobs', 'show', 'bn_aaaa0001', '-f', 'quiet')).toBe(0);
      expect(stdout).toEqual(['queued']);
    });

    it('reports an unknown job id', async () => {
      expect(await run('jobs', 'show', 'bn_missing1')).toBe(1);
      expect(err()).toEqual(['Error: Job with id bn_missing1 not found']);
    });

    it('cancels a queued job', async () => {
      insertJob(jobRepo, { id: 'bn_aaaa0001' });

      expect(await run('jobs', 'cancel', 'bn_aaaa0001')).toBe(0);
      expect(out()).toEqual(['✓ Cancelled bn_aaaa0001']);
      expect(jobRepo.get('bn_aaaa0001').errorSummary?.kind).toBe('cancelled');
    });

    it('refuses to delete a running job', async () => {
      insertJob(jobRepo, { id: 'bn_aaaa0001' });
      jobRepo.transition('bn_aaaa0001', 'queued', 'running', { attemptCount: 1 });

      expect(await run('jobs', 'delete', 'bn_aaaa0001')).toBe(1);
      expect(jobRepo.find('bn_aaaa0001')?.status).toBe('running');
    });

    it('asks for --force before clearing', async () => {
      insertJob(jobRepo, { id: 'bn_aaaa0001' });
      ctx.engine.cancel('bn_aaaa0001');

      expect(await run('jobs', 'clear')).toBe(0);
      expect(err()).toEqual([
        'Warning: This deletes all finished jobs. Use --force to confirm.',
      ]);
      expect(ctx.queries.count()).toBe(1);

      expect(await run('jobs', 'clear', '--force')).toBe(0);
      expect(out()).toEqual(['✓ Deleted 1 job(s)']);
      expect(ctx.queries.count()).toBe(0);
    });

    it('requires a retention age to prune', async () => {
      expect(await run('jobs', 'prune')).toBe(2);
      expect(err()).toEqual(['Error: Pass --older-than <days> or set JOB_RETENTION_DAYS']);
    });

    it('resumes interrupted jobs and reports how they ended', async () => {
      insertJob(jobRepo, { id: 'bn_aaaa0001' });
      jobRepo.transition('bn_aaaa0001', 'queued', 'running', { attemptCount: 1 });
      stub.generate.mockResolvedValue([image()]);
      await pause(5);

      expect(await run('jobs', 'resume', '--stale-after', '0')).toBe(0);
      expect(out()).toEqual(['Resuming 1 job(s)...', 'bn_aaaa0001 completed']);
      expect(jobRepo.get('bn_aaaa0001').attemptCount).toBe(2);
    });
  });

  describe('config', () => {
    it('stores and reads back a setting', async () => {
      expect(await run('config', 'set', 'defaults.size', '2K')).toBe(0);
      expect(await run('config', 'get', 'defaults.size')).toBe(0);

      expect(out()).toEqual(['✓ Set defaults.size = 2K', '2K']);
    });

    it('masks the API key', async () => {
      await run('config', 'set', 'api.key', 'test-secret');
      stdout = [];

      expect(await run('config', 'get', 'api.key')).toBe(0);
      expect(stdout).toEqual(['****']);
    });

    it('exits 2 for an unknown key', async () => {
      expect(await run('config', 'get', 'nope')).toBe(2);
      expect(err()).toEqual(["Error: Unknown config key 'nope'"]);
    });

    it('prints the database path', async () => {
      expect(await run('config', 'path')).toBe(0);
      expect(stdout).toEqual([':memory:']);
    });
  });

  describe('root command', () => {
    it('draws the job table once when output is not a terminal', async () => {
      expect(await run()).toBe(0);

      expect(stdout).toHaveLength(1);
      const lines = stripAnsi(stdout[0] ?? '').split('\n');
      expect(lines[0]).toBe('banana jobs');
      expect(lines[3]).toBe('No jobs yet. Start one with: banana generate "<prompt>"');
    });

    it('resumes abandoned jobs when the live view starts', async () => {
      ctx.io.interactive = true;
      ctx.staleAfterMs = 0;
      insertJob(jobRepo, { id: 'bn_aaaa0001' });
      jobRepo.transition('bn_aaaa0001', 'queued', 'running', { attemptCount: 1 });
      stub.generate.mockResolvedValue([image()]);
      await pause(5);

      const viewing = run();
      await vi.waitFor(() =>
        expect(stripAnsi(stdout.at(-1) ?? '')).toContain('bn_aaaa0001  completed')
      );
      interrupt?.();

      expect(await viewing).toBe(130);
      expect(jobRepo.get('bn_aaaa0001').attemptCount).toBe(2);
      expect(stub.generate).toHaveBeenCalledTimes(1);
    });

    it('prints the version', async () => {
      expect(await run('--version')).toBe(0);
      expect(stdout).toEqual(['1.2.3']);
    });

    it('fails on unexpected arguments', async () => {
      expect(await run('frobnicate')).toBe(1);
      expect(stdout).toEqual([]);
      expect(stderr).toHaveLength(1);
    });
  });
});
