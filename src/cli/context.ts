import type { Env } from '../infra/env.js';
import type { ArtifactExportService } from '../services/ArtifactExportService.js';
import type { JobEngine } from '../services/JobEngine.js';
import type { JobQueryService } from '../services/JobQueryService.js';
import type { JobRetentionService } from '../services/JobRetentionService.js';
import type { SettingsService } from '../services/SettingsService.js';

export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  /** Spinners and the live view redraw only on an interactive terminal */
  interactive: boolean;
  /** Registers a Ctrl-C handler; returns the function that removes it */
  onInterrupt(handler: () => void): () => void;
}

/**
 * Everything a command needs, wired once by the entry point
 */
export interface CliContext {
  env: Pick<Env, 'SQLITE_DB_PATH' | 'JOB_RETENTION_DAYS'>;
  engine: JobEngine;
  queries: JobQueryService;
  retention: JobRetentionService;
  settings: SettingsService;
  exporter: ArtifactExportService;
  io: CliIO;
  /** Default age after which a queued or running job counts as abandoned */
  staleAfterMs: number;
}

export function printJson(io: CliIO, value: unknown): void {
  io.stdout(JSON.stringify(value, null, 2));
}

/**
 * Resolves with the handler's result on the first Ctrl-C until disposed
 */
export function onceInterrupted<T>(
  io: CliIO,
  handler: () => T
): { promise: Promise<T>; dispose: () => void } {
  let dispose = () => {};
  const promise = new Promise<T>((resolve, reject) => {
    dispose = io.onInterrupt(() => {
      try {
        resolve(handler());
      } catch (error) {
        reject(error);
      }
    });
  });
  return { promise, dispose };
}
