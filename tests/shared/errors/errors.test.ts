/**
 * Application Error Tests
 */

import { describe, it, expect } from 'vitest';
import {
  ErrorCode,
  GenerationError,
  InvalidInputError,
  NotFoundError,
  SynthesisError,
  TimeoutError,
  UnsupportedVoiceError,
  errorMessage,
  isAppError,
} from '@/shared/errors';

describe('AppError', () => {
  it('should carry its code, name and retry hint', () => {
    const error = new GenerationError('LLM rate limit exceeded', { retryable: true });

    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(ErrorCode.GENERATION_ERROR);
    expect(error.name).toBe('GenerationError');
    expect(error.retryable).toBe(true);
  });

  it('should default to not retryable', () => {
    expect(new InvalidInputError('bad').retryable).toBe(false);
  });

  it('should keep the cause', () => {
    const cause = new Error('socket hang up');

    expect(new SynthesisError('Connection error', { cause }).cause).toBe(cause);
  });

  it('should describe unsupported voices', () => {
    expect(new UnsupportedVoiceError(undefined, 'fr').message).toBe(
      'No synthesis voice for voice=(default) language=fr'
    );
    expect(new UnsupportedVoiceError('v1', 'en').message).toBe(
      'No synthesis voice for voice=v1 language=en'
    );
  });

  it('should mark timeouts retryable', () => {
    const error = new TimeoutError('Speech synthesis', 15000);

    expect(error.message).toBe('Speech synthesis timed out after 15000ms');
    expect(error.code).toBe(ErrorCode.TIMEOUT);
    expect(error.retryable).toBe(true);
  });

  it('should use the session error code for registry failures', () => {
    expect(new NotFoundError('c1').code).toBe(ErrorCode.SESSION_ERROR);
  });
});

describe('isAppError', () => {
  it('should only accept application errors', () => {
    expect(isAppError(new InvalidInputError('bad'))).toBe(true);
    expect(isAppError(new Error('plain'))).toBe(false);
    expect(isAppError('string')).toBe(false);
  });
});

describe('errorMessage', () => {
  it('should read the message of anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain text')).toBe('plain text');
    expect(errorMessage(42)).toBe('42');
  });
});
