/**
 * Application Error Taxonomy
 * Every failure that reaches a client or crosses a module boundary is one of these
 */

export enum ErrorCode {
  INVALID_PAYLOAD = 'INVALID_PAYLOAD',
  GENERATION_ERROR = 'GENERATION_ERROR',
  SYNTHESIS_ERROR = 'SYNTHESIS_ERROR',
  UNSUPPORTED_VOICE = 'UNSUPPORTED_VOICE',
  SESSION_ERROR = 'SESSION_ERROR',
  QUEUE_FULL = 'QUEUE_FULL',
  TIMEOUT = 'TIMEOUT',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

export interface AppErrorOptions {
  retryable?: boolean;
  cause?: unknown;
}

export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;
  readonly retryable: boolean;

  constructor(message: string, options: AppErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.retryable = options.retryable ?? false;
  }
}

/**
 * Malformed or empty client payload; the session continues
 */
export class InvalidInputError extends AppError {
  readonly code = ErrorCode.INVALID_PAYLOAD;
}

/**
 * LLM provider failure (timeout, rate limit, malformed response)
 */
export class GenerationError extends AppError {
  readonly code = ErrorCode.GENERATION_ERROR;
}

/**
 * Speech synthesis provider failure
 */
export class SynthesisError extends AppError {
  readonly code = ErrorCode.SYNTHESIS_ERROR;
}

/**
 * Voice or language that has no configured synthesis voice
 */
export class UnsupportedVoiceError extends AppError {
  readonly code = ErrorCode.UNSUPPORTED_VOICE;

  constructor(
    readonly voice: string | undefined,
    readonly language: string
  ) {
    super(`No synthesis voice for voice=${voice ?? '(default)'} language=${language}`);
  }
}

export class NotFoundError extends AppError {
  readonly code = ErrorCode.SESSION_ERROR;

  constructor(readonly connectionId: string) {
    super(`Session not found: ${connectionId}`);
  }
}

export class DuplicateSessionError extends AppError {
  readonly code = ErrorCode.SESSION_ERROR;

  constructor(readonly connectionId: string) {
    super(`Session already registered: ${connectionId}`);
  }
}

export class SessionClosedError extends AppError {
  readonly code = ErrorCode.SESSION_ERROR;

  constructor(readonly sessionId: string) {
    super(`Session is closed: ${sessionId}`);
  }
}

export class QueueOverflowError extends AppError {
  readonly code = ErrorCode.QUEUE_FULL;

  constructor(
    readonly sessionId: string,
    readonly maxQueueSize: number
  ) {
    super(`Request queue full for session ${sessionId} (max: ${maxQueueSize})`, {
      retryable: true,
    });
  }
}

/**
 * An external call exceeded its configured timeout
 */
export class TimeoutError extends AppError {
  readonly code = ErrorCode.TIMEOUT;

  constructor(
    readonly operation: string,
    readonly timeoutMs: number
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`, { retryable: true });
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/**
 * Message text for logs, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
