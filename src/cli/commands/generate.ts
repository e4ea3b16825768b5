import { existsSync } from 'node:fs';
import path from 'node:path';
import { Command } from 'commander';
import ora from 'ora';
import pc from 'picocolors';
import { ASPECT_RATIOS, IMAGE_MODELS } from '../../domain/entities/GenerationParams.js';
import { promptPreview, type Job, type JobKind } from '../../domain/entities/Job.js';
import { AppError, ValidationError } from '../../domain/errors.js';
import { onceInterrupted, printJson, type CliContext } from '../context.js';
import { mapJobToOutput } from '../jobMapper.js';
import { parseOptions, submitOptionsSchema } from '../options.js';

function addSubmitOptions(command: Command): Command {
  return command
    .option('-a, --aspect-ratio <ratio>', `Aspect ratio (${ASPECT_RATIOS.join(', ')})`)
    .option('-s, --size <size>', 'Image size (1K, 2K, 4K - 4K only for Gemini 3 Pro)')
    .option('-m, --model <model>', `Model to use (${IMAGE_MODELS.join(', ')})`)
    .option('-o, --output <dir>', 'Output directory for downloaded images')
    .option('--no-download', "Don't download images automatically")
    .option('-f, --format <format>', 'Output format (text, json, quiet)', 'text');
}

/**
 * Submits one job, follows it to a terminal state and exports its images.
 * Ctrl-C cancels the job before exiting.
 */
export async function runSubmission(
  ctx: CliContext,
  request: { kind: JobKind; prompt: string; inputReference: string | null },
  rawOptions: unknown
): Promise<Job> {
  const options = parseOptions(submitOptionsSchema, rawOptions);
  const settings = ctx.settings.resolve();
  const verb = request.kind === 'edit' ? 'Editing' : 'Generating';

  const submitted = ctx.engine.submit({
    kind: request.kind,
    prompt: request.prompt,
    inputReference: request.inputReference,
    parameters: {
      model: options.model ?? settings.model,
      aspectRatio: options.aspectRatio ?? settings.aspectRatio,
      size: options.size ?? settings.size,
    },
  });

  const spinner =
    options.format === 'text' && ctx.io.interactive
      ? ora({ spinner: 'dots', color: 'yellow' }).start(
          `${verb} image: ${promptPreview(submitted.prompt, 40)}`
        )
      : null;

  const interruption = onceInterrupted(ctx.io, () => ctx.engine.cancel(submitted.id).job);
  let outcome: { job: Job; interrupted: boolean };
  try {
    outcome = await Promise.race([
      ctx.engine.waitFor(submitted.id).then((job) => ({ job, interrupted: false })),
      interruption.promise.then((job) => ({ job, interrupted: true })),
    ]);
  } catch (error) {
    spinner?.fail(`${verb} failed`);
    throw error;
  } finally {
    interruption.dispose();
  }

  const { job } = outcome;
  if (outcome.interrupted) {
    spinner?.warn(`Cancelled ${job.id}`);
    if (options.format === 'json') printJson(ctx.io, mapJobToOutput(job));
    throw new AppError('Interrupted', 'INTERRUPTED', 130, { jobId: job.id });
  }

  if (job.status !== 'completed') {
    spinner?.fail(`${verb} failed`);
    if (options.format === 'json') printJson(ctx.io, mapJobToOutput(job));
    throw new AppError(
      `Job ${job.id} failed: ${job.errorSummary?.message ?? 'unknown error'}`,
      'JOB_FAILED',
      1,
      { jobId: job.id, error: job.errorSummary }
    );
  }

  const count = job.outputReferences.length;
  const download = options.download && settings.autoDownload;
  const files = download
    ? await ctx.exporter.exportJob(job.id, options.output ?? settings.outputDirectory)
    : [];
  spinner?.succeed(
    `${request.kind === 'edit' ? 'Edited' : 'Generated'} ${count} image(s)${download ? '' : ' (not downloaded)'}`
  );

  if (options.format === 'json') {
    printJson(ctx.io, { ...mapJobToOutput(job), files });
  } else if (options.format === 'quiet') {
    files.forEach((file) => ctx.io.stdout(file));
  } else {
    ctx.io.stdout('');
    ctx.io.stdout(`${pc.cyan(pc.bold('Job ID'))}: ${job.id}`);
    ctx.io.stdout(`${pc.cyan(pc.bold('Prompt'))}: ${job.prompt}`);
    ctx.io.stdout(`${pc.cyan(pc.bold('Model'))}: ${job.parameters.model}`);
    ctx.io.stdout(`${pc.cyan(pc.bold('Aspect Ratio'))}: ${job.parameters.aspectRatio}`);
    ctx.io.stdout(`${pc.cyan(pc.bold('Status'))}: ${pc.green('completed')}`);
    if (files.length > 0) {
      ctx.io.stdout('');
      ctx.io.stdout(`${pc.cyan(pc.bold('Generated Images'))}:`);
      files.forEach((file) => ctx.io.stdout(`  ${file}`));
    } else {
      ctx.io.stdout(pc.dim(`Download later with: banana jobs download ${job.id}`));
    }
  }

  return job;
}

export function createGenerateCommand(ctx: CliContext): Command {
  return addSubmitOptions(
    new Command('generate')
      .alias('g')
      .description('Generate an image from a text prompt')
      .argument('<prompt>', 'The prompt describing the image to generate')
  ).action(async (prompt: string, options: unknown) => {
    await runSubmission(ctx, { kind: 'generate', prompt, inputReference: null }, options);
  });
}

export function createEditCommand(ctx: CliContext): Command {
  return addSubmitOptions(
    new Command('edit')
      .alias('e')
      .description('Edit an existing image with a text prompt')
      .argument('<image>', 'Path to the source image')
      .argument('<prompt>', 'How to change the image')
  ).action(async (image: string, prompt: string, options: unknown) => {
    const inputReference = path.resolve(image);
    if (!existsSync(inputReference)) {
      throw new ValidationError(`Image not found: ${image}`, { path: inputReference });
    }
    await runSubmission(ctx, { kind: 'edit', prompt, inputReference }, options);
  });
}
