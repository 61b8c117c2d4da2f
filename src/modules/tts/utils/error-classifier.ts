/**
 * Synthesis Error Classifier
 * Classifies errors from the speech engine and converts them to SynthesisError
 */

import { SynthesisError, TimeoutError } from '@/shared/errors';
import { TTSErrorType, ClassifiedSynthesisError } from '../types';

/**
 * Numeric HTTP status carried by SDK errors as `statusCode` or `code`
 */
function extractStatusCode(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  if ('code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return undefined;
}

/**
 * Message of an Error or of a plain error object from the SDK
 */
function extractMessage(error: unknown): string {
  if (typeof error === 'string') {
    return error;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return typeof error.message === 'string' ? error.message : '';
  }
  return '';
}

/**
 * Classify a speech engine error for reporting and retry guidance
 */
export function classifySynthesisError(error: unknown): ClassifiedSynthesisError {
  if (!error) {
    return {
      type: TTSErrorType.TRANSIENT,
      message: 'Unknown error',
      retryable: true,
    };
  }

  if (error instanceof TimeoutError) {
    return {
      type: TTSErrorType.TIMEOUT,
      message: 'Request timeout',
      retryable: true,
    };
  }

  const message = extractMessage(error) || 'Unknown error';
  const statusCode = extractStatusCode(error);

  if (statusCode !== undefined) {
    if (statusCode === 401 || statusCode === 403) {
      return {
        type: TTSErrorType.AUTH,
        message: 'Authentication failed',
        statusCode,
        retryable: false,
      };
    }

    if (statusCode === 429) {
      return {
        type: TTSErrorType.RATE_LIMIT,
        message: 'Rate limit exceeded',
        statusCode,
        retryable: true,
      };
    }

    if (statusCode >= 400 && statusCode < 500) {
      return {
        type: TTSErrorType.FATAL,
        message: `Client error: ${message}`,
        statusCode,
        retryable: false,
      };
    }

    if (statusCode >= 500 && statusCode < 600) {
      return {
        type: TTSErrorType.TRANSIENT,
        message: `Server error: ${message}`,
        statusCode,
        retryable: true,
      };
    }
  }

  const lowerMessage = message.toLowerCase();

  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return {
      type: TTSErrorType.TIMEOUT,
      message: 'Request timeout',
      retryable: true,
    };
  }

  if (
    lowerMessage.includes('connection') ||
    lowerMessage.includes('connect') ||
    lowerMessage.includes('network') ||
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('enotfound')
  ) {
    return {
      type: TTSErrorType.CONNECTION,
      message: 'Connection error',
      retryable: true,
    };
  }

  if (
    lowerMessage.includes('synthesis') ||
    lowerMessage.includes('voice') ||
    lowerMessage.includes('audio')
  ) {
    return {
      type: TTSErrorType.SYNTHESIS,
      message: `Synthesis error: ${message}`,
      retryable: true,
    };
  }

  return {
    type: TTSErrorType.TRANSIENT,
    message,
    retryable: true,
  };
}

/**
 * Wrap any engine failure in a SynthesisError; existing ones pass through
 */
export function toSynthesisError(error: unknown): SynthesisError {
  if (error instanceof SynthesisError) {
    return error;
  }

  const classified = classifySynthesisError(error);
  return new SynthesisError(classified.message, {
    retryable: classified.retryable,
    cause: error,
  });
}
