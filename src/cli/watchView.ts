import pc from 'picocolors';
import { JOB_STATUSES, type Job, type JobStatus } from '../domain/entities/Job.js';
import { AppError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import { onceInterrupted, type CliContext } from './context.js';
import { colorStatus, formatJobTable } from './format.js';

const CLEAR_SCREEN = '\x1b[2J\x1b[H';
const DEFAULT_LIMIT = 20;
const REFRESH_MS = 1000;

export type StatusCounts = Record<JobStatus, number>;

export function renderWatchScreen(jobs: Job[], counts: StatusCounts, now: Date): string[] {
  const summary = JOB_STATUSES.map((status) => `${colorStatus(status).trimEnd()} ${counts[status]}`);
  const lines = [pc.bold('banana jobs'), summary.join('  '), ''];

  if (jobs.length === 0) {
    lines.push(pc.dim('No jobs yet. Start one with: banana generate "<prompt>"'));
  } else {
    lines.push(...formatJobTable(jobs, now));
  }

  lines.push('', pc.dim(`Updated ${now.toLocaleTimeString()} - Ctrl-C to quit`));
  return lines;
}

function newestFirst(a: Job, b: Job): number {
  const byCreated = b.createdAt.getTime() - a.createdAt.getTime();
  if (byCreated !== 0) return byCreated;
  return a.id < b.id ? 1 : a.id > b.id ? -1 : 0;
}

function readCounts(ctx: CliContext): StatusCounts {
  const counts: StatusCounts = { queued: 0, running: 0, completed: 0, failed: 0 };
  for (const status of JOB_STATUSES) {
    counts[status] = ctx.queries.count({ status });
  }
  return counts;
}

/**
 * Continuously refreshing job table. Rows start from one read and are then updated from the
 * snapshots `queries.watch` delivers; the ticker only re-renders ages and the clock.
 *
 * On an interactive terminal this is the long-lived process, so it first resumes jobs
 * abandoned by processes that stopped.
 */
export async function runWatchView(
  ctx: CliContext,
  options: { limit?: number; intervalMs?: number } = {}
): Promise<void> {
  const limit = options.limit ?? DEFAULT_LIMIT;
  const rows = new Map<string, Job>();
  let counts = readCounts(ctx);

  const render = () => {
    const jobs = [...rows.values()].sort(newestFirst).slice(0, limit);
    const lines = renderWatchScreen(jobs, counts, new Date());
    ctx.io.stdout(ctx.io.interactive ? `${CLEAR_SCREEN}${lines.join('\n')}` : lines.join('\n'));
  };

  if (!ctx.io.interactive) {
    ctx.queries.list({ limit }).forEach((job) => rows.set(job.id, job));
    render();
    return;
  }

  const stopWatching = ctx.queries.watch(
    (changed) => {
      for (const job of changed) {
        rows.set(job.id, job);
      }
      for (const stale of [...rows.values()].sort(newestFirst).slice(limit)) {
        rows.delete(stale.id);
      }
      counts = readCounts(ctx);
      render();
    },
    { intervalMs: options.intervalMs ?? REFRESH_MS }
  );
  ctx.queries.list({ limit }).forEach((job) => {
    if (!rows.has(job.id)) rows.set(job.id, job);
  });
  counts = readCounts(ctx);
  render();

  const resumed = ctx.engine.recover({ staleAfterMs: ctx.staleAfterMs });
  if (resumed.length > 0) {
    logger.info('Live view resumed interrupted jobs', { count: resumed.length });
  }

  const ticker = setInterval(render, REFRESH_MS);
  const interruption = onceInterrupted(ctx.io, () => undefined);
  try {
    await interruption.promise;
  } finally {
    interruption.dispose();
    clearInterval(ticker);
    stopWatching();
  }
  // resumed jobs stay running in the store and are picked up by the next start
  throw new AppError('Interrupted', 'INTERRUPTED', 130);
}
