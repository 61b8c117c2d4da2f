/**
 * Offline Speech Synthesizer
 * Used when no Cartesia key is configured: returns a silent 16 kHz mono
 * PCM WAV whose length scales with the text, so clients can exercise playback.
 */

import { SpeechSynthesizer, SynthesisRequest } from '../types';

const SAMPLE_RATE = 16000;
const BYTES_PER_SAMPLE = 2;
const MS_PER_CHARACTER = 60;
const MAX_DURATION_MS = 10000;

export function buildSilentWav(durationMs: number): Buffer {
  const samples = Math.round((SAMPLE_RATE * durationMs) / 1000);
  const dataSize = samples * BYTES_PER_SAMPLE;
  const header = Buffer.alloc(44);

  header.write('RIFF', 0, 'ascii');
  header.writeUInt32LE(36 + dataSize, 4);
  header.write('WAVE', 8, 'ascii');
  header.write('fmt ', 12, 'ascii');
  header.writeUInt32LE(16, 16); // PCM chunk size
  header.writeUInt16LE(1, 20); // PCM format
  header.writeUInt16LE(1, 22); // mono
  header.writeUInt32LE(SAMPLE_RATE, 24);
  header.writeUInt32LE(SAMPLE_RATE * BYTES_PER_SAMPLE, 28); // byte rate
  header.writeUInt16LE(BYTES_PER_SAMPLE, 32); // block align
  header.writeUInt16LE(BYTES_PER_SAMPLE * 8, 34); // bits per sample
  header.write('data', 36, 'ascii');
  header.writeUInt32LE(dataSize, 40);

  return Buffer.concat([header, Buffer.alloc(dataSize)]);
}

export class MockSynthesizer implements SpeechSynthesizer {
  readonly name = 'mock';

  async synthesize(request: SynthesisRequest): Promise<Buffer> {
    const durationMs = Math.min(request.text.length * MS_PER_CHARACTER, MAX_DURATION_MS);
    return buildSilentWav(durationMs);
  }
}
