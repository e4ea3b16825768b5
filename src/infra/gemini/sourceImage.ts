import { readFile, stat } from 'node:fs/promises';
import path from 'node:path';
import { GenerationError } from '../../domain/errors.js';

export const MAX_SOURCE_IMAGE_BYTES = 20 * 1024 * 1024;

const MIME_BY_EXTENSION: Record<string, string> = {
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.webp': 'image/webp',
  '.gif': 'image/gif',
};

const EXTENSION_BY_MIME: Record<string, string> = {
  'image/png': 'png',
  'image/jpeg': 'jpg',
  'image/webp': 'webp',
};

export function mimeTypeForPath(filePath: string): string {
  return MIME_BY_EXTENSION[path.extname(filePath).toLowerCase()] ?? 'image/png';
}

export function extensionForMimeType(mimeType: string): string {
  return EXTENSION_BY_MIME[mimeType] ?? 'png';
}

export interface SourceImage {
  mimeType: string;
  base64: string;
}

/**
 * Reads an edit source image as inline data
 */
export async function loadSourceImage(filePath: string): Promise<SourceImage> {
  let size: number;
  try {
    const info = await stat(filePath);
    if (!info.isFile()) {
      throw new Error('not a regular file');
    }
    size = info.size;
  } catch (error) {
    throw new GenerationError(
      `Cannot read source image ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'permanent',
      'source_unreadable',
      { path: filePath }
    );
  }

  if (size > MAX_SOURCE_IMAGE_BYTES) {
    throw new GenerationError(
      `Source image ${filePath} is larger than 20MB`,
      'permanent',
      'source_too_large',
      { path: filePath, size }
    );
  }

  try {
    const data = await readFile(filePath);
    return { mimeType: mimeTypeForPath(filePath), base64: data.toString('base64') };
  } catch (error) {
    throw new GenerationError(
      `Cannot read source image ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      'permanent',
      'source_unreadable',
      { path: filePath }
    );
  }
}
