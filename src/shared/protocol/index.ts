/**
 * WebSocket Message Protocol
 * JSON text frames exchanged between client and server, plus their validation.
 */

import { ErrorCode, InvalidInputError, isAppError } from '../errors';

export const MESSAGE_TYPES = {
  TEXT_INPUT: 'text_input',
  EMOTION_UPDATE: 'emotion_update',
  RESPONSE: 'response',
  EMOTION_INTERACTION: 'emotion_interaction',
  CONNECTION_ACK: 'connection_ack',
  ERROR: 'error',
} as const;

// ============================================================================
// Client -> Server
// ============================================================================

export interface TextInputMessage {
  type: typeof MESSAGE_TYPES.TEXT_INPUT;
  content: string;
}

export interface EmotionUpdateMessage {
  type: typeof MESSAGE_TYPES.EMOTION_UPDATE;
  emotion: string;
  confidence?: number;
}

export type ClientMessage = TextInputMessage | EmotionUpdateMessage;

// ============================================================================
// Server -> Client
// ============================================================================

/**
 * Reported in place of audio when synthesis failed after the text succeeded
 */
export interface AudioErrorPayload {
  code: ErrorCode;
  message: string;
}

export interface ResponseMessage {
  type: typeof MESSAGE_TYPES.RESPONSE;
  text: string;
  audio: string; // base64, empty when audioError is set
  audioError?: AudioErrorPayload;
}

export interface EmotionInteractionMessage {
  type: typeof MESSAGE_TYPES.EMOTION_INTERACTION;
  emotion: string;
  text: string;
  audio: string;
  audioError?: AudioErrorPayload;
}

export interface ConnectionAckMessage {
  type: typeof MESSAGE_TYPES.CONNECTION_ACK;
  sessionId: string;
}

export interface ErrorMessage {
  type: typeof MESSAGE_TYPES.ERROR;
  code: ErrorCode;
  message: string;
  requestType: string;
  retryable?: boolean;
}

export type ServerMessage =
  | ResponseMessage
  | EmotionInteractionMessage
  | ConnectionAckMessage
  | ErrorMessage;

// ============================================================================
// Decoding & validation
// ============================================================================

/**
 * Parse a raw frame. Binary frames are accepted when they hold UTF-8 JSON.
 * @throws InvalidInputError
 */
export function decodeFrame(raw: Buffer | string): unknown {
  const text = typeof raw === 'string' ? raw : raw.toString('utf8');
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new InvalidInputError('Message is not valid JSON', { cause: error });
  }
}

/**
 * The `type` field of a decoded frame, or "unknown"
 */
export function messageTypeOf(payload: unknown): string {
  if (
    typeof payload === 'object' &&
    payload !== null &&
    'type' in payload &&
    typeof payload.type === 'string'
  ) {
    return payload.type;
  }
  return 'unknown';
}

/**
 * Narrow a decoded frame to a client message
 * @throws InvalidInputError naming the offending field
 */
export function validateClientMessage(payload: unknown): ClientMessage {
  if (typeof payload !== 'object' || payload === null || Array.isArray(payload)) {
    throw new InvalidInputError('Message must be a JSON object');
  }
  if (!('type' in payload) || typeof payload.type !== 'string') {
    throw new InvalidInputError('Message requires a string "type"');
  }

  switch (payload.type) {
    case MESSAGE_TYPES.TEXT_INPUT: {
      if (!('content' in payload) || typeof payload.content !== 'string') {
        throw new InvalidInputError('text_input requires a string "content"');
      }
      return { type: MESSAGE_TYPES.TEXT_INPUT, content: payload.content };
    }

    case MESSAGE_TYPES.EMOTION_UPDATE: {
      if (!('emotion' in payload) || typeof payload.emotion !== 'string') {
        throw new InvalidInputError('emotion_update requires a string "emotion"');
      }
      if (!('confidence' in payload) || payload.confidence === undefined) {
        return { type: MESSAGE_TYPES.EMOTION_UPDATE, emotion: payload.emotion };
      }
      const { confidence } = payload;
      if (
        typeof confidence !== 'number' ||
        !Number.isFinite(confidence) ||
        confidence < 0 ||
        confidence > 1
      ) {
        throw new InvalidInputError('emotion_update "confidence" must be a number between 0 and 1');
      }
      return { type: MESSAGE_TYPES.EMOTION_UPDATE, emotion: payload.emotion, confidence };
    }

    default:
      throw new InvalidInputError(`Unknown message type: ${payload.type}`);
  }
}

/**
 * Error frame for a failed request. Unknown errors are reported as internal
 * without their message.
 */
export function toErrorMessage(error: unknown, requestType: string): ErrorMessage {
  if (isAppError(error)) {
    return {
      type: MESSAGE_TYPES.ERROR,
      code: error.code,
      message: error.message,
      requestType,
      retryable: error.retryable,
    };
  }

  return {
    type: MESSAGE_TYPES.ERROR,
    code: ErrorCode.INTERNAL_ERROR,
    message: 'An internal error occurred',
    requestType,
    retryable: false,
  };
}
