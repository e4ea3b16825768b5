import { z } from 'zod';

export const ASPECT_RATIOS = [
  '1:1',
  '2:3',
  '3:2',
  '3:4',
  '4:3',
  '4:5',
  '5:4',
  '9:16',
  '16:9',
  '21:9',
] as const;

export const IMAGE_SIZES = ['1K', '2K', '4K'] as const;

export const IMAGE_MODELS = [
  'gemini-3-pro-image-preview',
  'gemini-2.5-flash-image',
  'imagen-4.0-generate-001',
] as const;

export const DEFAULT_MODEL = IMAGE_MODELS[0];
export const DEFAULT_ASPECT_RATIO = '1:1';
export const DEFAULT_SIZE = '1K';

export type AspectRatio = (typeof ASPECT_RATIOS)[number];
export type ImageSize = (typeof IMAGE_SIZES)[number];
export type ImageModel = (typeof IMAGE_MODELS)[number];

export const aspectRatioSchema = z.enum(ASPECT_RATIOS, {
  errorMap: () => ({ message: `Invalid aspect ratio. Valid values: ${ASPECT_RATIOS.join(', ')}` }),
});

export const imageSizeSchema = z.enum(IMAGE_SIZES, {
  errorMap: () => ({ message: `Invalid size. Valid values: ${IMAGE_SIZES.join(', ')}` }),
});

export const modelSchema = z.enum(IMAGE_MODELS, {
  errorMap: () => ({ message: `Unknown model. Available models: ${IMAGE_MODELS.join(', ')}` }),
});

export const generationParamsSchema = z.object({
  model: modelSchema,
  aspectRatio: aspectRatioSchema,
  size: imageSizeSchema,
});

/**
 * Immutable parameter snapshot taken when a job is submitted.
 * Later settings changes never reach a job that already exists.
 */
export type GenerationParams = Readonly<z.infer<typeof generationParamsSchema>>;

/**
 * 4K output is only offered by the Gemini 3 Pro image model
 */
export function supportsSize(model: string, size: ImageSize): boolean {
  return size !== '4K' || model === 'gemini-3-pro-image-preview';
}
