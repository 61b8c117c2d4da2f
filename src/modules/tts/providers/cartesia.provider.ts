/**
 * Cartesia Speech Synthesizer
 * One-shot synthesis over the Cartesia bytes endpoint
 */

import { CartesiaClient } from '@cartesia/cartesia-js';
import { logger } from '@/shared/utils';
import { CartesiaConfig } from '../config';
import { SpeechSynthesizer, SynthesisRequest } from '../types';
import { toAudioBuffer } from '../utils';

/** Minimal interface for the part of the Cartesia client we call */
interface CartesiaBytesClient {
  tts: {
    bytes(_request: Record<string, unknown>): Promise<unknown>;
  };
}

function hasBytesEndpoint(client: unknown): client is CartesiaBytesClient {
  if (typeof client !== 'object' || client === null || !('tts' in client)) {
    return false;
  }
  const { tts } = client;
  return (
    typeof tts === 'object' && tts !== null && 'bytes' in tts && typeof tts.bytes === 'function'
  );
}

export class CartesiaSynthesizer implements SpeechSynthesizer {
  readonly name = 'cartesia';
  private readonly client: CartesiaBytesClient;

  /**
   * @param client - injected client for tests; defaults to a real CartesiaClient
   */
  constructor(
    private readonly config: Readonly<CartesiaConfig>,
    client?: unknown
  ) {
    if (!config.apiKey && client === undefined) {
      throw new Error('CARTESIA_API_KEY is required for the Cartesia synthesizer');
    }

    const candidate: unknown = client ?? new CartesiaClient({ apiKey: config.apiKey });
    if (!hasBytesEndpoint(candidate)) {
      throw new Error('Cartesia client does not expose tts.bytes');
    }
    this.client = candidate;

    logger.info('Cartesia synthesizer initialized', { model: config.model });
  }

  async synthesize(request: SynthesisRequest): Promise<Buffer> {
    const startTime = Date.now();

    // SDK expects camelCase; it converts to the snake_case wire format
    const response = await this.client.tts.bytes({
      modelId: this.config.model,
      transcript: request.text,
      voice: {
        mode: 'id',
        id: request.voiceId,
      },
      language: request.language,
      outputFormat: {
        container: this.config.outputFormat.container,
        sampleRate: this.config.outputFormat.sampleRate,
        bitRate: this.config.outputFormat.bitRate,
      },
    });

    const audio = await toAudioBuffer(response);
    if (audio.byteLength === 0) {
      throw new Error('Cartesia returned empty audio');
    }

    logger.debug('Cartesia synthesis complete', {
      voiceId: request.voiceId,
      language: request.language,
      textLength: request.text.length,
      bytes: audio.byteLength,
      durationMs: Date.now() - startTime,
    });

    return audio;
  }
}
