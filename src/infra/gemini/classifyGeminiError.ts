import { ApiError } from '@google/genai';
import { GenerationError } from '../../domain/errors.js';

const TRANSIENT_STATUSES = new Set([408, 500, 502, 503, 504]);
const NETWORK_ERROR_CODES = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'ENOTFOUND',
  'EPIPE',
  'UND_ERR_SOCKET',
  'UND_ERR_CONNECT_TIMEOUT',
]);
const QUOTA_EXHAUSTED_PATTERN = /billing|per day|daily|limit: 0/i;

function errorCode(error: Error): string | null {
  if ('code' in error && typeof error.code === 'string') {
    return error.code;
  }
  if (error.cause instanceof Error) {
    return errorCode(error.cause);
  }
  return null;
}

function classifyStatus(status: number, message: string): GenerationError {
  const details = { status };

  if (status === 429) {
    return QUOTA_EXHAUSTED_PATTERN.test(message)
      ? new GenerationError(message, 'permanent', 'quota_exhausted', details)
      : new GenerationError(message, 'transient', 'rate_limited', details);
  }
  if (TRANSIENT_STATUSES.has(status)) {
    return new GenerationError(
      message,
      'transient',
      status === 408 ? 'timeout' : 'server_error',
      details
    );
  }
  if (status === 400) {
    return new GenerationError(message, 'permanent', 'invalid_request', details);
  }
  if (status === 401 || status === 403) {
    return new GenerationError(message, 'permanent', 'unauthorized', details);
  }
  if (status === 404) {
    return new GenerationError(message, 'permanent', 'unsupported_model', details);
  }
  if (status >= 400 && status < 500) {
    return new GenerationError(message, 'permanent', 'client_error', details);
  }
  return new GenerationError(message, 'unknown', 'unexpected_status', details);
}

/**
 * Maps whatever the SDK or the network layer threw onto a classified GenerationError
 */
export function classifyGeminiError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  if (error instanceof ApiError) {
    return classifyStatus(error.status, error.message);
  }

  if (error instanceof Error) {
    if (error.name === 'AbortError' || error.name === 'TimeoutError') {
      return new GenerationError(error.message || 'Request aborted', 'transient', 'timeout');
    }

    const code = errorCode(error);
    if (code !== null && NETWORK_ERROR_CODES.has(code)) {
      return new GenerationError(error.message, 'transient', 'network', { code });
    }
    if (error instanceof TypeError && error.message === 'fetch failed') {
      return new GenerationError(error.message, 'transient', 'network');
    }

    return new GenerationError(error.message, 'unknown', 'unexpected_error', {
      name: error.name,
    });
  }

  return new GenerationError(String(error), 'unknown', 'unexpected_error');
}
