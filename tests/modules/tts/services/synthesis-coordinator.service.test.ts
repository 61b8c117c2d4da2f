/**
 * Synthesis Coordinator Tests
 * Cache integration, single-flight deduplication, voice resolution and timeouts
 */

import { describe, it, expect } from 'vitest';
import { LruAudioCache } from '@/modules/cache';
import { SynthesisCoordinator } from '@/modules/tts';
import { InvalidInputError, SynthesisError, UnsupportedVoiceError } from '@/shared/errors';
import { createDeferred, flushPromises } from '../../../utils/deferred';
import { TEST_TTS_CONFIG, createFakeSynthesizer } from '../../../utils/fakes';

const EN = { language: 'en' };

function setup(capacity = 10, requestTimeout = 0) {
  const fake = createFakeSynthesizer();
  const cache = new LruAudioCache({ capacity });
  const coordinator = new SynthesisCoordinator(fake.synthesizer, cache, {
    ...TEST_TTS_CONFIG,
    requestTimeout,
  });
  return { ...fake, cache, coordinator };
}

describe('SynthesisCoordinator', () => {
  describe('caching', () => {
    it('should call the engine once and serve repeats from the cache', async () => {
      const { coordinator, synthesize } = setup();

      const first = await coordinator.synthesize('Hello', EN);
      const second = await coordinator.synthesize('Hello', EN);

      expect(first.toString()).toBe('audio:Hello');
      expect(second.toString()).toBe('audio:Hello');
      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(coordinator.getMetrics()).toMatchObject({
        requests: 2,
        cacheHits: 1,
        cacheMisses: 1,
        engineCalls: 1,
      });
    });

    it('should share one entry between texts that normalize the same', async () => {
      const { coordinator, synthesize } = setup();

      await coordinator.synthesize('Hello   world', EN);
      await coordinator.synthesize(' Hello world \n', EN);

      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(synthesize).toHaveBeenCalledWith({
        text: 'Hello world',
        voiceId: 'voice-en',
        language: 'en',
      });
    });

    it('should hand each caller its own copy of the cached bytes', async () => {
      const { coordinator, synthesize } = setup();

      const first = await coordinator.synthesize('Hello', EN);
      first.fill(0);
      const second = await coordinator.synthesize('Hello', EN);

      expect(second.toString()).toBe('audio:Hello');
      expect(synthesize).toHaveBeenCalledTimes(1);
    });

    it('should call the engine again for a key that was evicted', async () => {
      const { coordinator, synthesize } = setup(1);

      await coordinator.synthesize('first', EN);
      await coordinator.synthesize('second', EN);
      await coordinator.synthesize('first', EN);

      expect(synthesize).toHaveBeenCalledTimes(3);
      expect(coordinator.getCacheStats().evictions).toBe(2);
    });

    it('should key by voice as well as text', async () => {
      const { coordinator, synthesize } = setup();

      await coordinator.synthesize('Hello', EN);
      await coordinator.synthesize('Hello', { language: 'en', voice: 'voice-zh' });

      expect(synthesize).toHaveBeenCalledTimes(2);
    });
  });

  describe('single-flight', () => {
    it('should make one engine call for concurrent identical requests', async () => {
      const { coordinator, synthesize } = setup();
      const engine = createDeferred<Buffer>();
      synthesize.mockImplementationOnce(() => engine.promise);

      const first = coordinator.synthesize('Hello', EN);
      const second = coordinator.synthesize('Hello', EN);
      await flushPromises();

      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(coordinator.getMetrics().inFlight).toBe(1);

      engine.resolve(Buffer.from('shared-bytes'));
      const [a, b] = await Promise.all([first, second]);

      expect(a.toString()).toBe('shared-bytes');
      expect(b.equals(a)).toBe(true);
      expect(b).not.toBe(a);
      a.fill(0);
      expect(b.toString()).toBe('shared-bytes');
      expect(coordinator.getMetrics()).toMatchObject({ joinedFlights: 1, engineCalls: 1, inFlight: 0 });
    });

    it('should not join flights for different keys', async () => {
      const { coordinator, synthesize } = setup();

      await Promise.all([
        coordinator.synthesize('Hello', EN),
        coordinator.synthesize('Goodbye', EN),
      ]);

      expect(synthesize).toHaveBeenCalledTimes(2);
      expect(coordinator.getMetrics().joinedFlights).toBe(0);
    });

    it('should reject every waiter on failure and cache nothing', async () => {
      const { coordinator, synthesize, cache } = setup();
      const engine = createDeferred<Buffer>();
      synthesize.mockImplementationOnce(() => engine.promise);

      const settled = Promise.allSettled([
        coordinator.synthesize('Hello', EN),
        coordinator.synthesize('Hello', EN),
      ]);
      await flushPromises();
      engine.reject(new Error('Network error'));
      const results = await settled;

      for (const result of results) {
        expect(result.status).toBe('rejected');
        if (result.status === 'rejected') {
          expect(result.reason).toBeInstanceOf(SynthesisError);
          expect(result.reason.message).toBe('Connection error');
          expect(result.reason.retryable).toBe(true);
        }
      }
      expect(synthesize).toHaveBeenCalledTimes(1);
      expect(await cache.size()).toBe(0);
      expect(coordinator.getMetrics()).toMatchObject({ failures: 1, inFlight: 0 });
    });

    it('should start a fresh call after a failed flight', async () => {
      const { coordinator, synthesize } = setup();
      synthesize.mockRejectedValueOnce(new Error('boom'));

      await expect(coordinator.synthesize('Hello', EN)).rejects.toBeInstanceOf(SynthesisError);
      const audio = await coordinator.synthesize('Hello', EN);

      expect(audio.toString()).toBe('audio:Hello');
      expect(synthesize).toHaveBeenCalledTimes(2);
    });
  });

  describe('input validation', () => {
    it('should reject empty text without calling the engine', async () => {
      const { coordinator, synthesize } = setup();

      await expect(coordinator.synthesize('  \u{1F600}  ', EN)).rejects.toBeInstanceOf(
        InvalidInputError
      );
      expect(synthesize).not.toHaveBeenCalled();
    });

    it('should reject text over the length limit instead of cutting it', async () => {
      const { coordinator, synthesize } = setup();
      const prefix = 'x'.repeat(200);

      await expect(coordinator.synthesize(`${prefix} first ending`, EN)).rejects.toThrow(
        new InvalidInputError('Text exceeds the 200 character synthesis limit')
      );
      expect(synthesize).not.toHaveBeenCalled();
    });

    it('should accept text at exactly the length limit', async () => {
      const { coordinator, synthesize } = setup();
      const text = 'y'.repeat(200);

      const audio = await coordinator.synthesize(text, EN);

      expect(audio.toString()).toBe(`audio:${text}`);
      expect(synthesize).toHaveBeenCalledWith({ text, voiceId: 'voice-en', language: 'en' });
    });

    it('should reject an unknown language', async () => {
      const { coordinator, synthesize } = setup();

      await expect(coordinator.synthesize('Bonjour', { language: 'fr' })).rejects.toBeInstanceOf(
        UnsupportedVoiceError
      );
      expect(synthesize).not.toHaveBeenCalled();
    });

    it('should reject a voice that is not configured', async () => {
      const { coordinator } = setup();

      await expect(
        coordinator.synthesize('Hello', { language: 'en', voice: 'voice-unknown' })
      ).rejects.toBeInstanceOf(UnsupportedVoiceError);
    });

    it('should reject empty audio from the engine', async () => {
      const { coordinator, synthesize } = setup();
      synthesize.mockResolvedValueOnce(Buffer.alloc(0));

      await expect(coordinator.synthesize('Hello', EN)).rejects.toThrow(
        'Synthesis error: Synthesis engine returned empty audio'
      );
    });
  });

  describe('resolveVoice', () => {
    it('should fall back to the primary language subtag', () => {
      const { coordinator } = setup();

      expect(coordinator.resolveVoice({ language: 'en-US' })).toEqual({
        voiceId: 'voice-en',
        language: 'en',
      });
    });

    it('should prefer an exact regional match', () => {
      const { coordinator } = setup();

      expect(coordinator.resolveVoice({ language: 'zh-TW' })).toEqual({
        voiceId: 'voice-zh',
        language: 'zh-tw',
      });
    });
  });

  describe('timeout', () => {
    it('should fail as a retryable synthesis error when the engine is too slow', async () => {
      const { coordinator, synthesize } = setup(10, 20);
      synthesize.mockImplementationOnce(() => new Promise<Buffer>(() => undefined));

      const error = await coordinator.synthesize('Hello', EN).catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(SynthesisError);
      expect(error).toMatchObject({ message: 'Request timeout', retryable: true });
      expect(coordinator.getMetrics().inFlight).toBe(0);
    });
  });
});
