import { Command } from 'commander';
import pc from 'picocolors';
import { ValidationError } from '../../domain/errors.js';
import { printJson, type CliContext } from '../context.js';
import { formatJobDetail, formatJobTable } from '../format.js';
import { mapEventToOutput, mapJobToOutput } from '../jobMapper.js';
import {
  formatSchema,
  listOptionsSchema,
  parseNonNegativeInt,
  parseOptions,
  parsePositiveInt,
  parseStatus,
} from '../options.js';
import { runWatchView } from '../watchView.js';

function listJobs(ctx: CliContext, rawOptions: unknown): void {
  const options = parseOptions(listOptionsSchema, rawOptions);
  const filter = {
    status: options.status === undefined ? undefined : parseStatus(options.status),
    idPrefix: options.prefix,
  };
  const jobs = ctx.queries.list({ ...filter, limit: options.limit });

  if (options.format === 'json') {
    printJson(ctx.io, jobs.map(mapJobToOutput));
    return;
  }
  if (options.format === 'quiet') {
    jobs.forEach((job) => ctx.io.stdout(job.id));
    return;
  }

  if (jobs.length === 0) {
    ctx.io.stdout(pc.dim('No jobs found'));
    return;
  }
  formatJobTable(jobs).forEach((line) => ctx.io.stdout(line));
  const total = ctx.queries.count(filter);
  ctx.io.stdout(pc.dim(`Showing ${jobs.length} of ${total} job(s)`));
}

function showJob(ctx: CliContext, jobId: string, rawFormat: unknown): void {
  const format = parseOptions(formatSchema, rawFormat);
  const job = ctx.queries.get(jobId);
  const events = ctx.queries.events(jobId);

  if (format === 'json') {
    printJson(ctx.io, { ...mapJobToOutput(job), events: events.map(mapEventToOutput) });
    return;
  }
  if (format === 'quiet') {
    ctx.io.stdout(job.status);
    return;
  }
  formatJobDetail(job, events).forEach((line) => ctx.io.stdout(line));
}

async function resumeJobs(ctx: CliContext, staleAfterSeconds: number | undefined): Promise<void> {
  const staleAfterMs =
    staleAfterSeconds === undefined ? ctx.staleAfterMs : staleAfterSeconds * 1000;
  const resumed = ctx.engine.recover({ staleAfterMs });
  if (resumed.length === 0) {
    ctx.io.stdout(pc.dim('No interrupted jobs to resume'));
    return;
  }

  ctx.io.stdout(`Resuming ${resumed.length} job(s)...`);
  const finished = await Promise.all(resumed.map((job) => ctx.engine.waitFor(job.id)));
  for (const job of finished) {
    const status = job.status === 'completed' ? pc.green(job.status) : pc.red(job.status);
    const detail = job.errorSummary ? ` ${pc.dim(job.errorSummary.message)}` : '';
    ctx.io.stdout(`${job.id} ${status}${detail}`);
  }
}

export function createJobsCommand(ctx: CliContext): Command {
  const jobs = new Command('jobs')
    .alias('j')
    .description('List and manage jobs')
    .option('-l, --limit <n>', 'Maximum number of jobs to show', parsePositiveInt, 20)
    .option('-s, --status <status>', 'Filter by status (queued, running, completed, failed)')
    .option('-p, --prefix <prefix>', 'Filter by job id prefix')
    .option('-f, --format <format>', 'Output format (text, json, quiet)', 'text')
    .action((options: unknown) => {
      listJobs(ctx, options);
    });

  jobs
    .command('show')
    .description('Show job details and history')
    .argument('<id>', 'Job id')
    .option('-f, --format <format>', 'Output format (text, json, quiet)', 'text')
    .action((jobId: string, options: { format?: unknown }) => {
      showJob(ctx, jobId, options.format);
    });

  jobs
    .command('cancel')
    .description('Cancel a queued or running job')
    .argument('<id>', 'Job id')
    .action((jobId: string) => {
      const { job, cancelled } = ctx.engine.cancel(jobId);
      if (cancelled) {
        ctx.io.stdout(`${pc.green('✓')} Cancelled ${job.id}`);
      } else {
        ctx.io.stdout(`${pc.yellow('!')} Job ${job.id} is already ${job.status}`);
      }
    });

  jobs
    .command('download')
    .description('Save a completed job\'s images')
    .argument('<id>', 'Job id')
    .option('-o, --output <dir>', 'Output directory')
    .action(async (jobId: string, options: { output?: unknown }) => {
      const directory =
        typeof options.output === 'string' ? options.output : ctx.settings.resolve().outputDirectory;
      const files = await ctx.exporter.exportJob(jobId, directory);
      files.forEach((file) => ctx.io.stdout(file));
    });

  jobs
    .command('delete')
    .description('Delete a finished job and its images')
    .argument('<id>', 'Job id')
    .action((jobId: string) => {
      ctx.retention.deleteJob(jobId);
      ctx.io.stdout(`${pc.green('✓')} Deleted ${jobId}`);
    });

  jobs
    .command('clear')
    .description('Delete every finished job')
    .option('--force', 'Confirm deletion')
    .action((options: { force?: unknown }) => {
      if (options.force !== true) {
        ctx.io.stderr(
          `${pc.yellow(pc.bold('Warning'))}: This deletes all finished jobs. Use --force to confirm.`
        );
        return;
      }
      const deleted = ctx.retention.clearFinished();
      ctx.io.stdout(`${pc.green('✓')} Deleted ${deleted} job(s)`);
    });

  jobs
    .command('prune')
    .description('Delete finished jobs older than a number of days')
    .option('--older-than <days>', 'Age in days (defaults to JOB_RETENTION_DAYS)', parseNonNegativeInt)
    .action((options: { olderThan?: unknown }) => {
      const days =
        typeof options.olderThan === 'number' ? options.olderThan : ctx.env.JOB_RETENTION_DAYS;
      if (days <= 0) {
        throw new ValidationError('Pass --older-than <days> or set JOB_RETENTION_DAYS');
      }
      const deleted = ctx.retention.cleanupOlderThan(days);
      ctx.io.stdout(`${pc.green('✓')} Deleted ${deleted} job(s) older than ${days} day(s)`);
    });

  jobs
    .command('resume')
    .description('Resume jobs left queued or running by a process that stopped')
    .option('--stale-after <seconds>', 'Only resume jobs idle for at least this long', parseNonNegativeInt)
    .action(async (options: { staleAfter?: unknown }) => {
      await resumeJobs(
        ctx,
        typeof options.staleAfter === 'number' ? options.staleAfter : undefined
      );
    });

  jobs
    .command('watch')
    .description('Live view of recent jobs')
    .action(async () => {
      await runWatchView(ctx);
    });

  return jobs;
}
