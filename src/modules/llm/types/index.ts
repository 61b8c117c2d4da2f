/**
 * LLM Module Type Definitions
 * All types used across the LLM module
 */

export type TurnRole = 'user' | 'assistant';

/**
 * Single message in a session's conversation history.
 * Turns are frozen once created; insertion order is transcript order.
 */
export interface Turn {
  readonly role: TurnRole;
  readonly content: string;
  readonly timestamp: number;
}

/**
 * Message in the transcript sent to the provider
 */
export interface TranscriptMessage {
  role: 'system' | TurnRole;
  content: string;
}

/**
 * Who the assistant is. Built once from configuration and passed in.
 */
export interface CharacterConfig {
  name: string;
  persona: string;
  language: string;
}

/**
 * Generation parameters handed to the provider with every call
 */
export interface GenerationParams {
  model: string;
  maxTokens: number;
  temperature: number;
}

/**
 * External LLM capability: ordered transcript in, reply text out
 */
export interface ChatCompletionProvider {
  readonly name: string;
  complete(messages: readonly TranscriptMessage[], params: GenerationParams): Promise<string>;
}

/**
 * Transcript after budget trimming
 */
export interface Transcript {
  messages: TranscriptMessage[];
  droppedTurns: number;
  totalChars: number;
}

/**
 * Generation coordinator metrics
 */
export interface GenerationMetrics {
  totalRequests: number;
  totalSuccesses: number;
  totalFailures: number;
  droppedTurns: number;
  averageResponseTimeMs: number;
}

/**
 * OpenAI error types for classification
 */
export enum OpenAIErrorType {
  NETWORK = 'network',
  AUTH = 'auth',
  RATE_LIMIT = 'rate_limit',
  TIMEOUT = 'timeout',
  INVALID_REQUEST = 'invalid',
  SERVER = 'server',
  UNKNOWN = 'unknown',
}

/**
 * Classified error with metadata
 */
export interface ClassifiedError {
  type: OpenAIErrorType;
  retryable: boolean;
  message: string;
  statusCode?: number;
}
