import { InvalidOptionArgumentError } from 'commander';
import { z } from 'zod';
import { ValidationError } from '../domain/errors.js';
import { isJobStatus, type JobStatus } from '../domain/entities/Job.js';

export const OUTPUT_FORMATS = ['text', 'json', 'quiet'] as const;
export type OutputFormat = (typeof OUTPUT_FORMATS)[number];

export const formatSchema = z.enum(OUTPUT_FORMATS, {
  errorMap: () => ({ message: `Format must be one of: ${OUTPUT_FORMATS.join(', ')}` }),
});

export const submitOptionsSchema = z.object({
  aspectRatio: z.string().optional(),
  size: z.string().optional(),
  model: z.string().optional(),
  output: z.string().optional(),
  download: z.boolean().default(true),
  format: formatSchema.default('text'),
});

export type SubmitOptions = z.infer<typeof submitOptionsSchema>;

export const listOptionsSchema = z.object({
  limit: z.number().int().positive().default(20),
  status: z.string().optional(),
  prefix: z.string().optional(),
  format: formatSchema.default('text'),
});

/**
 * Validates the options object commander hands to an action
 */
export function parseOptions<T extends z.ZodTypeAny>(schema: T, options: unknown): z.infer<T> {
  const result = schema.safeParse(options);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? 'Invalid options', {
      issues: result.error.issues,
    });
  }
  return result.data;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed <= 0 || String(parsed) !== value.trim()) {
    throw new InvalidOptionArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function parseNonNegativeInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isFinite(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidOptionArgumentError('Must be a non-negative integer.');
  }
  return parsed;
}

export function parseStatus(value: string): JobStatus {
  const normalized = value.trim().toLowerCase();
  if (!isJobStatus(normalized)) {
    throw new ValidationError(
      `Unknown status '${value}'. Use one of: queued, running, completed, failed`
    );
  }
  return normalized;
}
