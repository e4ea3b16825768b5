import { Command, CommanderError } from 'commander';
import pc from 'picocolors';
import { isAppError } from '../domain/errors.js';
import { logger } from '../infra/logger.js';
import type { CliContext, CliIO } from './context.js';
import { createConfigCommand } from './commands/config.js';
import { createEditCommand, createGenerateCommand } from './commands/generate.js';
import { createJobsCommand } from './commands/jobs.js';
import { runWatchView } from './watchView.js';

function applyRecursively(command: Command, io: CliIO): void {
  command.exitOverride();
  command.configureOutput({
    writeOut: (text) => io.stdout(text.trimEnd()),
    writeErr: (text) => io.stderr(text.trimEnd()),
    outputError: (text, write) => write(pc.red(text)),
  });
  command.commands.forEach((child) => applyRecursively(child, io));
}

/**
 * Root command. Subcommands are built from the shared context; `banana` alone opens the live view.
 */
export function createProgram(ctx: CliContext, version: string): Command {
  const program = new Command('banana')
    .description('Generate and edit images with Gemini, keeping a durable local job history')
    .version(version, '-v, --version')
    .allowExcessArguments(false)
    .action(async () => {
      await runWatchView(ctx);
    });

  program.addCommand(createGenerateCommand(ctx));
  program.addCommand(createEditCommand(ctx));
  program.addCommand(createJobsCommand(ctx));
  program.addCommand(createConfigCommand(ctx));

  applyRecursively(program, ctx.io);
  return program;
}

/**
 * Prints a failure and returns the process exit code for it
 */
export function reportError(io: CliIO, error: unknown): number {
  if (error instanceof CommanderError) {
    // commander has already written its own message
    return error.exitCode;
  }
  if (isAppError(error)) {
    if (error.exitCode !== 130) {
      io.stderr(`${pc.red(pc.bold('Error'))}: ${error.message}`);
    }
    logger.debug('Command failed', { code: error.code, details: error.details });
    return error.exitCode;
  }

  logger.error('Unexpected error', { error });
  io.stderr(
    `${pc.red(pc.bold('Error'))}: ${error instanceof Error ? error.message : String(error)}`
  );
  return 1;
}
