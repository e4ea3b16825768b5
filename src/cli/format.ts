import pc from 'picocolors';
import { promptPreview, type Job, type JobStatus } from '../domain/entities/Job.js';
import type { JobEvent } from '../domain/entities/JobEvent.js';

const STATUS_WIDTH = 10;

export function colorStatus(status: JobStatus): string {
  const label = status.padEnd(STATUS_WIDTH);
  switch (status) {
    case 'queued':
      return pc.dim(label);
    case 'running':
      return pc.yellow(label);
    case 'completed':
      return pc.green(label);
    case 'failed':
      return pc.red(label);
  }
}

export function formatAge(date: Date, now: Date = new Date()): string {
  const seconds = Math.max(0, Math.floor((now.getTime() - date.getTime()) / 1000));
  if (seconds < 60) return `${seconds}s ago`;
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) return `${minutes}m ago`;
  const hours = Math.floor(minutes / 60);
  if (hours < 24) return `${hours}h ago`;
  return `${Math.floor(hours / 24)}d ago`;
}

export function formatJobRow(job: Job, now: Date = new Date()): string {
  return [
    job.id.padEnd(12),
    colorStatus(job.status),
    job.kind.padEnd(9),
    String(job.attemptCount).padEnd(6),
    formatAge(job.createdAt, now).padEnd(9),
    promptPreview(job.prompt, 40),
  ].join(' ');
}

export function formatJobTable(jobs: Job[], now: Date = new Date()): string[] {
  const header = pc.bold(
    [
      'ID'.padEnd(12),
      'STATUS'.padEnd(STATUS_WIDTH),
      'KIND'.padEnd(9),
      'TRIES'.padEnd(6),
      'CREATED'.padEnd(9),
      'PROMPT',
    ].join(' ')
  );
  return [header, ...jobs.map((job) => formatJobRow(job, now))];
}

function field(label: string, value: string): string {
  return `${pc.cyan(pc.bold(label))}: ${value}`;
}

export function formatJobDetail(job: Job, events: JobEvent[]): string[] {
  const lines = [
    field('Job ID', job.id),
    field('Kind', job.kind),
    field('Status', colorStatus(job.status).trimEnd()),
    field('Prompt', job.prompt),
  ];
  if (job.inputReference) {
    lines.push(field('Source', job.inputReference));
  }
  lines.push(
    field('Model', job.parameters.model),
    field('Aspect Ratio', job.parameters.aspectRatio),
    field('Size', job.parameters.size),
    field('Attempts', String(job.attemptCount)),
    field('Created', job.createdAt.toISOString()),
    field('Updated', job.updatedAt.toISOString())
  );

  if (job.errorSummary) {
    const { kind, reason, message } = job.errorSummary;
    lines.push(field('Error', `${message} ${pc.dim(`(${kind}: ${reason})`)}`));
  }

  if (job.outputReferences.length > 0) {
    lines.push('', `${pc.cyan(pc.bold('Images'))}:`);
    for (const output of job.outputReferences) {
      lines.push(`  ${output.uri} ${pc.dim(`${output.mimeType}, ${output.byteLength} bytes`)}`);
    }
  }

  if (events.length > 0) {
    lines.push('', `${pc.cyan(pc.bold('History'))}:`);
    for (const event of events) {
      const note = event.message ? ` ${event.message}` : '';
      lines.push(
        `  ${pc.dim(event.createdAt.toISOString())} ${event.status} #${event.attemptCount}${note}`
      );
    }
  }

  return lines;
}
