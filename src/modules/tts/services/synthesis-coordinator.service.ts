/**
 * Synthesis Coordinator
 * Wraps the speech engine with the shared audio cache and single-flight
 * deduplication: for any cache key at most one engine call is outstanding,
 * and concurrent callers for that key join it.
 */

import { logger, withTimeout } from '@/shared/utils';
import { InvalidInputError, UnsupportedVoiceError } from '@/shared/errors';
import type { AudioCache, AudioCacheStats } from '@/modules/cache';
import { TtsConfig, validateTtsConfig } from '../config';
import { SpeechSynthesizer, SynthesisMetrics, SynthesisRequest, VoiceConfig } from '../types';
import { buildCacheKey, normalizeSynthesisText, toSynthesisError } from '../utils';

export class SynthesisCoordinator {
  private readonly inFlight = new Map<string, Promise<Buffer>>();
  private readonly supportedVoices: ReadonlySet<string>;

  // Metrics
  private requests = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private joinedFlights = 0;
  private engineCalls = 0;
  private failures = 0;

  constructor(
    private readonly synthesizer: SpeechSynthesizer,
    private readonly cache: AudioCache,
    private readonly config: Readonly<TtsConfig>
  ) {
    validateTtsConfig(config);
    this.supportedVoices = new Set(Object.values(config.voiceMap));

    logger.info('Synthesis coordinator initialized', {
      engine: synthesizer.name,
      languages: Object.keys(config.voiceMap),
      cacheCapacity: cache.capacity,
    });
  }

  /**
   * Synthesize text to audio bytes.
   *
   * Everything up to registering the flight runs synchronously, so the
   * decision to start or join a flight cannot interleave with another caller.
   *
   * Each caller gets its own copy of the bytes; cached entries stay untouched.
   *
   * @throws InvalidInputError when the text is empty after normalization or
   *   longer than the engine limit
   * @throws UnsupportedVoiceError when no voice matches the voice/language
   * @throws SynthesisError when the engine fails or times out
   */
  async synthesize(text: string, voiceConfig: VoiceConfig): Promise<Buffer> {
    this.requests++;

    const normalized = normalizeSynthesisText(text);
    if (!normalized) {
      throw new InvalidInputError('Cannot synthesize empty text');
    }
    if (normalized.length > this.config.maxTextLength) {
      throw new InvalidInputError(
        `Text exceeds the ${this.config.maxTextLength} character synthesis limit`
      );
    }

    const { voiceId, language } = this.resolveVoice(voiceConfig);
    const key = buildCacheKey(normalized, voiceId, language);

    const existing = this.inFlight.get(key);
    if (existing) {
      this.joinedFlights++;
      logger.debug('Joining in-flight synthesis', { language, voiceId });
      return Buffer.from(await existing);
    }

    const flight = this.runFlight(key, { text: normalized, voiceId, language });
    this.inFlight.set(key, flight);

    // Reactions run after this synchronous block, so the marker is always set first
    const release = (): void => {
      if (this.inFlight.get(key) === flight) {
        this.inFlight.delete(key);
      }
    };
    void flight.then(release, release);

    return Buffer.from(await flight);
  }

  /**
   * Map a voice config onto a configured voice id.
   * Languages match exactly first, then by primary subtag ("en-US" -> "en").
   */
  resolveVoice(voiceConfig: VoiceConfig): { voiceId: string; language: string } {
    const requested = voiceConfig.language.trim().toLowerCase();
    const primary = requested.split(/[-_]/)[0] ?? requested;
    const language = requested in this.config.voiceMap ? requested : primary;
    const mappedVoice = this.config.voiceMap[language];

    if (mappedVoice === undefined) {
      throw new UnsupportedVoiceError(voiceConfig.voice, voiceConfig.language);
    }

    if (voiceConfig.voice !== undefined) {
      if (!this.supportedVoices.has(voiceConfig.voice)) {
        throw new UnsupportedVoiceError(voiceConfig.voice, voiceConfig.language);
      }
      return { voiceId: voiceConfig.voice, language };
    }

    return { voiceId: mappedVoice, language };
  }

  getMetrics(): SynthesisMetrics {
    return {
      requests: this.requests,
      cacheHits: this.cacheHits,
      cacheMisses: this.cacheMisses,
      joinedFlights: this.joinedFlights,
      engineCalls: this.engineCalls,
      failures: this.failures,
      inFlight: this.inFlight.size,
    };
  }

  getCacheStats(): AudioCacheStats {
    return this.cache.getStats();
  }

  /**
   * Cache lookup then engine call; failures are never cached
   */
  private async runFlight(key: string, request: SynthesisRequest): Promise<Buffer> {
    try {
      const cached = await this.cache.get(key);
      if (cached) {
        this.cacheHits++;
        return cached.audio;
      }

      this.cacheMisses++;
      this.engineCalls++;
      const startTime = Date.now();

      const audio = await withTimeout(
        this.synthesizer.synthesize(request),
        this.config.requestTimeout,
        'Speech synthesis'
      );
      if (audio.byteLength === 0) {
        throw new Error('Synthesis engine returned empty audio');
      }

      const entry = await this.cache.put(key, audio);

      logger.info('Speech synthesized', {
        engine: this.synthesizer.name,
        language: request.language,
        textLength: request.text.length,
        bytes: entry.size,
        durationMs: Date.now() - startTime,
      });

      return entry.audio;
    } catch (error) {
      this.failures++;
      const synthesisError = toSynthesisError(error);
      logger.error('Speech synthesis failed', {
        engine: this.synthesizer.name,
        language: request.language,
        retryable: synthesisError.retryable,
        error: synthesisError.message,
      });
      throw synthesisError;
    }
  }
}
