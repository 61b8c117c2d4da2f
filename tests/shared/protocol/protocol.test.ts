/**
 * Message Protocol Tests
 */

import { describe, it, expect } from 'vitest';
import {
  decodeFrame,
  messageTypeOf,
  toErrorMessage,
  validateClientMessage,
} from '@/shared/protocol';
import { ErrorCode, InvalidInputError, QueueOverflowError } from '@/shared/errors';

describe('decodeFrame', () => {
  it('should parse text and binary JSON frames', () => {
    expect(decodeFrame('{"type":"text_input"}')).toEqual({ type: 'text_input' });
    expect(decodeFrame(Buffer.from('[1,2]'))).toEqual([1, 2]);
  });

  it('should reject malformed JSON', () => {
    expect(() => decodeFrame('{not json')).toThrow(
      new InvalidInputError('Message is not valid JSON')
    );
  });
});

describe('messageTypeOf', () => {
  it('should return the type field or "unknown"', () => {
    expect(messageTypeOf({ type: 'emotion_update' })).toBe('emotion_update');
    expect(messageTypeOf({ type: 7 })).toBe('unknown');
    expect(messageTypeOf('text_input')).toBe('unknown');
    expect(messageTypeOf(null)).toBe('unknown');
  });
});

describe('validateClientMessage', () => {
  it('should accept a text input', () => {
    expect(validateClientMessage({ type: 'text_input', content: 'Hello', extra: true })).toEqual({
      type: 'text_input',
      content: 'Hello',
    });
  });

  it('should accept an emotion update with and without confidence', () => {
    expect(validateClientMessage({ type: 'emotion_update', emotion: 'sad' })).toEqual({
      type: 'emotion_update',
      emotion: 'sad',
    });
    expect(
      validateClientMessage({ type: 'emotion_update', emotion: 'sad', confidence: 0.8 })
    ).toEqual({ type: 'emotion_update', emotion: 'sad', confidence: 0.8 });
  });

  it.each([
    [[], 'Message must be a JSON object'],
    [null, 'Message must be a JSON object'],
    [{ content: 'Hello' }, 'Message requires a string "type"'],
    [{ type: 'text_input' }, 'text_input requires a string "content"'],
    [{ type: 'text_input', content: 42 }, 'text_input requires a string "content"'],
    [{ type: 'emotion_update' }, 'emotion_update requires a string "emotion"'],
    [
      { type: 'emotion_update', emotion: 'sad', confidence: 1.5 },
      'emotion_update "confidence" must be a number between 0 and 1',
    ],
    [
      { type: 'emotion_update', emotion: 'sad', confidence: '0.5' },
      'emotion_update "confidence" must be a number between 0 and 1',
    ],
    [{ type: 'audio_chunk' }, 'Unknown message type: audio_chunk'],
  ])('should reject %j', (payload, message) => {
    expect(() => validateClientMessage(payload)).toThrow(new InvalidInputError(message));
  });
});

describe('toErrorMessage', () => {
  it('should carry the code, message and retry hint of application errors', () => {
    expect(toErrorMessage(new QueueOverflowError('s1', 10), 'text_input')).toEqual({
      type: 'error',
      code: ErrorCode.QUEUE_FULL,
      message: 'Request queue full for session s1 (max: 10)',
      requestType: 'text_input',
      retryable: true,
    });
  });

  it('should hide the details of unexpected errors', () => {
    expect(toErrorMessage(new Error('database password leaked'), 'emotion_update')).toEqual({
      type: 'error',
      code: ErrorCode.INTERNAL_ERROR,
      message: 'An internal error occurred',
      requestType: 'emotion_update',
      retryable: false,
    });
  });
});
