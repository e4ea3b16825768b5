#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { z } from 'zod';
import { validateEnv } from './infra/env.js';
import { createLogger, setLogger } from './infra/logger.js';
import { DatabaseAdapter } from './infra/DatabaseAdapter.js';
import { AppConfigRepository } from './infra/repositories/AppConfigRepository.js';
import { JobEventRepository } from './infra/repositories/JobEventRepository.js';
import { JobRepository } from './infra/repositories/JobRepository.js';
import { GeminiImageClient } from './infra/gemini/GeminiImageClient.js';
import { ArtifactExportService } from './services/ArtifactExportService.js';
import { JobEngine } from './services/JobEngine.js';
import { JobEventBus } from './services/JobEventBus.js';
import { JobQueryService } from './services/JobQueryService.js';
import { JobRetentionService } from './services/JobRetentionService.js';
import { SettingsService } from './services/SettingsService.js';
import { createProgram, reportError } from './cli/program.js';
import type { CliIO } from './cli/context.js';

const INTERRUPTED_EXIT_CODE = 130;

function readVersion(): string {
  const packageJson = readFileSync(new URL('../package.json', import.meta.url), 'utf-8');
  return z.object({ version: z.string() }).parse(JSON.parse(packageJson)).version;
}

// Load environment variables
dotenv.config();

// Validate environment (fail-fast)
const env = validateEnv();

setLogger(createLogger(env));

// Infrastructure
const db = new DatabaseAdapter(env);
const jobEventRepo = new JobEventRepository(db);
const jobRepo = new JobRepository(db, jobEventRepo);
const configRepo = new AppConfigRepository(db);

// Settings are read once: every job submitted by this process gets the same snapshot
const settingsService = new SettingsService(env, configRepo);
const settings = settingsService.resolve();

const client = new GeminiImageClient({ apiKey: settings.apiKey, baseUrl: settings.baseUrl });
const bus = new JobEventBus();
const engine = new JobEngine(jobRepo, client, bus, {
  maxAttempts: env.JOB_MAX_ATTEMPTS,
  concurrency: env.JOB_CONCURRENCY,
  attemptTimeoutMs: env.JOB_ATTEMPT_TIMEOUT_MS,
  baseDelayMs: env.JOB_RETRY_BASE_DELAY_MS,
  maxDelayMs: env.JOB_RETRY_MAX_DELAY_MS,
  jitterMs: Math.min(250, env.JOB_RETRY_BASE_DELAY_MS),
});

const io: CliIO = {
  stdout: (text) => {
    process.stdout.write(`${text}\n`);
  },
  stderr: (text) => {
    process.stderr.write(`${text}\n`);
  },
  interactive: Boolean(process.stdout.isTTY),
  onInterrupt: (handler) => {
    process.on('SIGINT', handler);
    return () => {
      process.off('SIGINT', handler);
    };
  },
};

const program = createProgram(
  {
    env,
    engine,
    queries: new JobQueryService(jobRepo, jobEventRepo, bus),
    retention: new JobRetentionService(jobRepo),
    settings: settingsService,
    exporter: new ArtifactExportService(jobRepo),
    io,
    // a live driver commits a transition at least once per attempt plus backoff
    staleAfterMs: env.JOB_ATTEMPT_TIMEOUT_MS + env.JOB_RETRY_MAX_DELAY_MS + 10_000,
  },
  readVersion()
);

let exitCode = 0;
try {
  await program.parseAsync(process.argv);
} catch (error) {
  exitCode = reportError(io, error);
}

// After Ctrl-C the cancelled job is already persisted; do not wait for its request
if (exitCode !== INTERRUPTED_EXIT_CODE) {
  await engine.shutdown();
}
db.close();
process.exit(exitCode);
