/**
 * OpenAI Error Classifier
 * Classifies chat-completion errors and converts them to GenerationError.
 * SDK errors carry an HTTP `status`; everything else is matched on its message.
 */

import { GenerationError, TimeoutError, errorMessage } from '@/shared/errors';
import { ClassifiedError, OpenAIErrorType } from '../types';

function extractStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) {
    return undefined;
  }
  if ('status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

/**
 * Classify LLM error for reporting and retry guidance
 * @returns Classified error; `retryable` tells the client whether resending can help
 */
export function classifyLLMError(error: unknown): ClassifiedError {
  if (error instanceof TimeoutError) {
    return {
      type: OpenAIErrorType.TIMEOUT,
      message: 'LLM request timed out',
      retryable: true,
    };
  }

  const statusCode = extractStatus(error);

  if (statusCode === 401 || statusCode === 403) {
    return {
      type: OpenAIErrorType.AUTH,
      message: 'Authentication failed with LLM provider',
      statusCode,
      retryable: false,
    };
  }

  if (statusCode === 429) {
    return {
      type: OpenAIErrorType.RATE_LIMIT,
      message: 'LLM rate limit exceeded',
      statusCode,
      retryable: true,
    };
  }

  if (statusCode !== undefined && statusCode >= 500) {
    return {
      type: OpenAIErrorType.SERVER,
      message: 'LLM provider server error',
      statusCode,
      retryable: true,
    };
  }

  if (statusCode !== undefined && statusCode >= 400) {
    return {
      type: OpenAIErrorType.INVALID_REQUEST,
      message: 'LLM provider rejected the request',
      statusCode,
      retryable: false,
    };
  }

  const lowerMessage = errorMessage(error).toLowerCase();

  // Authentication errors
  if (
    lowerMessage.includes('unauthorized') ||
    lowerMessage.includes('invalid api key') ||
    lowerMessage.includes('authentication')
  ) {
    return {
      type: OpenAIErrorType.AUTH,
      message: 'Authentication failed with LLM provider',
      retryable: false,
    };
  }

  // Rate limit errors
  if (lowerMessage.includes('rate limit') || lowerMessage.includes('too many requests')) {
    return {
      type: OpenAIErrorType.RATE_LIMIT,
      message: 'LLM rate limit exceeded',
      retryable: true,
    };
  }

  if (lowerMessage.includes('timeout') || lowerMessage.includes('timed out')) {
    return {
      type: OpenAIErrorType.TIMEOUT,
      message: 'LLM request timed out',
      retryable: true,
    };
  }

  // Network errors
  if (
    lowerMessage.includes('econnrefused') ||
    lowerMessage.includes('enotfound') ||
    lowerMessage.includes('network') ||
    lowerMessage.includes('connection error')
  ) {
    return {
      type: OpenAIErrorType.NETWORK,
      message: 'Network error connecting to LLM provider',
      retryable: true,
    };
  }

  // Fatal errors (context length, invalid request)
  if (
    lowerMessage.includes('maximum context length') ||
    lowerMessage.includes('invalid request') ||
    lowerMessage.includes('model not found')
  ) {
    return {
      type: OpenAIErrorType.INVALID_REQUEST,
      message: 'LLM provider rejected the request',
      retryable: false,
    };
  }

  // Default to retryable unknown
  return {
    type: OpenAIErrorType.UNKNOWN,
    message: 'LLM generation failed',
    retryable: true,
  };
}

/**
 * Wrap any provider failure in a GenerationError; existing ones pass through
 */
export function toGenerationError(error: unknown): GenerationError {
  if (error instanceof GenerationError) {
    return error;
  }

  const classified = classifyLLMError(error);
  return new GenerationError(classified.message, {
    retryable: classified.retryable,
    cause: error,
  });
}
