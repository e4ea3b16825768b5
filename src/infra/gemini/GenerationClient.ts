import type { JobKind } from '../../domain/entities/Job.js';
import type { GenerationParams } from '../../domain/entities/GenerationParams.js';

export interface GenerationRequest {
  kind: JobKind;
  prompt: string;
  parameters: GenerationParams;
  /** Source image path, edit requests only */
  inputReference: string | null;
  signal?: AbortSignal;
}

export interface GeneratedArtifact {
  mimeType: string;
  data: Buffer;
}

/**
 * Generation backend boundary.
 * One call is one attempt: implementations never retry and never touch the job store.
 * Failures are thrown as GenerationError with a transient/permanent/unknown classification.
 */
export interface GenerationClient {
  generate(request: GenerationRequest): Promise<GeneratedArtifact[]>;
}
