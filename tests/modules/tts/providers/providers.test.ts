/**
 * Speech Synthesizer Provider Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { Readable } from 'stream';
import { CartesiaSynthesizer, MockSynthesizer, buildSilentWav } from '@/modules/tts';
import type { CartesiaConfig } from '@/modules/tts';
import { toAudioBuffer } from '@/modules/tts/utils/audio-buffer';

const TEST_CARTESIA_CONFIG: CartesiaConfig = {
  apiKey: 'test-key',
  model: 'sonic-test',
  outputFormat: { container: 'mp3', sampleRate: 44100, bitRate: 128000 },
};

describe('MockSynthesizer', () => {
  it('should build a WAV header describing 16 kHz mono PCM', () => {
    const wav = buildSilentWav(1000);

    expect(wav.toString('ascii', 0, 4)).toBe('RIFF');
    expect(wav.toString('ascii', 8, 12)).toBe('WAVE');
    expect(wav.readUInt16LE(22)).toBe(1);
    expect(wav.readUInt32LE(24)).toBe(16000);
    expect(wav.readUInt32LE(40)).toBe(32000);
    expect(wav.byteLength).toBe(44 + 32000);
  });

  it('should scale duration with text length', async () => {
    const synthesizer = new MockSynthesizer();

    const audio = await synthesizer.synthesize({ text: 'Hello', voiceId: 'v', language: 'en' });

    // 5 chars * 60 ms = 300 ms = 4800 samples
    expect(audio.byteLength).toBe(44 + 4800 * 2);
  });

  it('should cap the clip at ten seconds', async () => {
    const synthesizer = new MockSynthesizer();

    const audio = await synthesizer.synthesize({
      text: 'x'.repeat(1000),
      voiceId: 'v',
      language: 'en',
    });

    expect(audio.byteLength).toBe(44 + 160000 * 2);
  });
});

describe('CartesiaSynthesizer', () => {
  function createClient(result: unknown) {
    const bytes = vi.fn(async (_request: Record<string, unknown>) => result);
    return { client: { tts: { bytes } }, bytes };
  }

  it('should send the resolved voice, language and output format', async () => {
    const { client, bytes } = createClient(new Uint8Array([1, 2, 3]));
    const synthesizer = new CartesiaSynthesizer(TEST_CARTESIA_CONFIG, client);

    const audio = await synthesizer.synthesize({
      text: 'Hello',
      voiceId: 'voice-en',
      language: 'en',
    });

    expect(Array.from(audio)).toEqual([1, 2, 3]);
    expect(bytes).toHaveBeenCalledWith({
      modelId: 'sonic-test',
      transcript: 'Hello',
      voice: { mode: 'id', id: 'voice-en' },
      language: 'en',
      outputFormat: { container: 'mp3', sampleRate: 44100, bitRate: 128000 },
    });
  });

  it('should reject empty audio', async () => {
    const { client } = createClient(Buffer.alloc(0));
    const synthesizer = new CartesiaSynthesizer(TEST_CARTESIA_CONFIG, client);

    await expect(
      synthesizer.synthesize({ text: 'Hello', voiceId: 'voice-en', language: 'en' })
    ).rejects.toThrow('Cartesia returned empty audio');
  });

  it('should require an API key when no client is injected', () => {
    expect(() => new CartesiaSynthesizer({ ...TEST_CARTESIA_CONFIG, apiKey: '' })).toThrow(
      'CARTESIA_API_KEY is required for the Cartesia synthesizer'
    );
  });

  it('should reject a client without a bytes endpoint', () => {
    expect(() => new CartesiaSynthesizer(TEST_CARTESIA_CONFIG, { tts: {} })).toThrow(
      'Cartesia client does not expose tts.bytes'
    );
  });
});

describe('toAudioBuffer', () => {
  it('should return Buffers unchanged', async () => {
    const input = Buffer.from('abc');

    expect(await toAudioBuffer(input)).toBe(input);
  });

  it('should convert an ArrayBuffer', async () => {
    const result = await toAudioBuffer(new Uint8Array([7, 8]).buffer);

    expect(Array.from(result)).toEqual([7, 8]);
  });

  it('should concatenate a readable stream', async () => {
    const stream = Readable.from([Buffer.from('ab'), Buffer.from('cd')]);

    const result = await toAudioBuffer(stream);

    expect(result.toString()).toBe('abcd');
  });

  it('should read a fetch-like binary response', async () => {
    const response = { arrayBuffer: async () => new Uint8Array([9]).buffer };

    const result = await toAudioBuffer(response);

    expect(Array.from(result)).toEqual([9]);
  });

  it('should reject anything else', async () => {
    await expect(toAudioBuffer(42)).rejects.toThrow(
      'Unsupported audio response from synthesis engine'
    );
  });
});
