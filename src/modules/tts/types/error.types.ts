/**
 * TTS Error Types
 */

export enum TTSErrorType {
  CONNECTION = 'connection',
  SYNTHESIS = 'synthesis',
  TIMEOUT = 'timeout',
  RATE_LIMIT = 'rate_limit',
  AUTH = 'auth',
  FATAL = 'fatal',
  TRANSIENT = 'transient',
}

export interface ClassifiedSynthesisError {
  type: TTSErrorType;
  message: string;
  statusCode?: number;
  retryable: boolean;
}
