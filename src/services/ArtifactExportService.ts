import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { NotFoundError, ValidationError } from '../domain/errors.js';
import { extensionForMimeType } from '../infra/gemini/sourceImage.js';
import { logger } from '../infra/logger.js';
import type { JobRepository } from '../infra/repositories/JobRepository.js';

export function artifactFileName(jobId: string, index: number, mimeType: string): string {
  return `${jobId}_${index}.${extensionForMimeType(mimeType)}`;
}

/**
 * Writes a completed job's stored images to disk. The engine itself never writes files.
 */
export class ArtifactExportService {
  constructor(private jobRepo: JobRepository) {}

  async exportJob(jobId: string, outputDirectory: string): Promise<string[]> {
    const job = this.jobRepo.get(jobId);
    if (job.status !== 'completed') {
      throw new ValidationError(`Job ${jobId} is ${job.status}; only completed jobs have images`, {
        jobId,
        status: job.status,
      });
    }

    const artifacts = this.jobRepo.getArtifacts(jobId);
    if (artifacts.length === 0) {
      throw new NotFoundError('Artifacts for job', jobId);
    }

    const directory = path.resolve(outputDirectory);
    await mkdir(directory, { recursive: true });

    const paths: string[] = [];
    for (const artifact of artifacts) {
      const filePath = path.join(directory, artifactFileName(jobId, artifact.index, artifact.mimeType));
      await writeFile(filePath, artifact.data);
      paths.push(filePath);
    }

    logger.info('Job images exported', { jobId, count: paths.length, directory });
    return paths;
  }
}
