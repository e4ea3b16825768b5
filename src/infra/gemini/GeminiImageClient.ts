import { FinishReason, GoogleGenAI } from '@google/genai';
import type { GenerateContentResponse, Part } from '@google/genai';
import { GenerationError } from '../../domain/errors.js';
import { logger } from '../logger.js';
import { classifyGeminiError } from './classifyGeminiError.js';
import { loadSourceImage } from './sourceImage.js';
import type { GeneratedArtifact, GenerationClient, GenerationRequest } from './GenerationClient.js';

export interface GeminiClientOptions {
  apiKey: string | null;
  baseUrl?: string | null;
}

const ACCEPTED_FINISH_REASONS: ReadonlySet<string> = new Set([
  FinishReason.STOP,
  FinishReason.MAX_TOKENS,
]);

/**
 * Gemini image generation over the @google/genai SDK.
 * Text parts in the response are logged and ignored; every inline image part becomes an artifact.
 */
export class GeminiImageClient implements GenerationClient {
  private client: GoogleGenAI | null;

  constructor(options: GeminiClientOptions) {
    this.client = options.apiKey
      ? new GoogleGenAI({
          apiKey: options.apiKey,
          ...(options.baseUrl ? { httpOptions: { baseUrl: options.baseUrl } } : {}),
        })
      : null;
  }

  async generate(request: GenerationRequest): Promise<GeneratedArtifact[]> {
    if (!this.client) {
      throw new GenerationError(
        'Gemini API key is not configured. Set GEMINI_API_KEY or run: banana config set api.key <key>',
        'permanent',
        'missing_api_key'
      );
    }

    const parts: Part[] = [];
    if (request.kind === 'edit') {
      if (!request.inputReference) {
        throw new GenerationError('Edit request has no source image', 'permanent', 'invalid_request');
      }
      const source = await loadSourceImage(request.inputReference);
      parts.push({ inlineData: { mimeType: source.mimeType, data: source.base64 } });
    }
    parts.push({ text: request.prompt });

    logger.debug('Gemini request', {
      model: request.parameters.model,
      kind: request.kind,
      aspectRatio: request.parameters.aspectRatio,
      size: request.parameters.size,
      promptLength: request.prompt.length,
    });

    let response: GenerateContentResponse;
    try {
      response = await this.client.models.generateContent({
        model: request.parameters.model,
        contents: [{ role: 'user', parts }],
        config: {
          responseModalities: ['TEXT', 'IMAGE'],
          imageConfig: {
            aspectRatio: request.parameters.aspectRatio,
            imageSize: request.parameters.size,
          },
          abortSignal: request.signal,
        },
      });
    } catch (error) {
      const classified = classifyGeminiError(error);
      logger.debug('Gemini request failed', {
        classification: classified.classification,
        reason: classified.reason,
        message: classified.message,
      });
      throw classified;
    }

    return this.extractArtifacts(response);
  }

  private extractArtifacts(response: GenerateContentResponse): GeneratedArtifact[] {
    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new GenerationError(
        response.promptFeedback?.blockReasonMessage ?? `Prompt blocked: ${blockReason}`,
        'permanent',
        'prompt_blocked',
        { blockReason }
      );
    }

    const artifacts: GeneratedArtifact[] = [];
    for (const candidate of response.candidates ?? []) {
      if (candidate.finishReason && !ACCEPTED_FINISH_REASONS.has(candidate.finishReason)) {
        throw new GenerationError(
          candidate.finishMessage ?? 'Image generation was refused by the API',
          'permanent',
          'generation_refused',
          { finishReason: candidate.finishReason }
        );
      }

      for (const part of candidate.content?.parts ?? []) {
        if (part.inlineData?.data) {
          artifacts.push({
            mimeType: part.inlineData.mimeType ?? 'image/png',
            data: Buffer.from(part.inlineData.data, 'base64'),
          });
        } else if (part.text) {
          logger.debug('Gemini response text', { length: part.text.length });
        }
      }
    }

    if (artifacts.length === 0) {
      throw new GenerationError('No images in response', 'permanent', 'no_images');
    }
    return artifacts;
  }
}
