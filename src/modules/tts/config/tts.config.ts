/**
 * Synthesis Coordinator Configuration
 */

import { parseIntEnv, parseRecordEnv } from '@/shared/utils/env';

export interface TtsConfig {
  /** Language code -> voice id. Its values are the set of supported voices. */
  voiceMap: Readonly<Record<string, string>>;
  requestTimeout: number; // ms, 0 disables
  maxTextLength: number; // longer normalized text is rejected
}

const DEFAULT_VOICE_MAP: Readonly<Record<string, string>> = {
  en: 'c961b81c-a935-4c17-bfb3-ba2239de8c2f',
};

export const ttsConfig: Readonly<TtsConfig> = Object.freeze({
  voiceMap: Object.freeze(parseRecordEnv('TTS_VOICE_MAP', process.env.TTS_VOICE_MAP, DEFAULT_VOICE_MAP)),
  requestTimeout: parseIntEnv(process.env.TTS_REQUEST_TIMEOUT, 15000),
  maxTextLength: parseIntEnv(process.env.TTS_MAX_TEXT_LENGTH, 5000),
});

export function validateTtsConfig(config: TtsConfig): void {
  if (Object.keys(config.voiceMap).length === 0) {
    throw new Error('TTS_VOICE_MAP must map at least one language to a voice');
  }
  if (config.requestTimeout < 0) {
    throw new Error('TTS_REQUEST_TIMEOUT must be >= 0');
  }
  if (config.maxTextLength < 1) {
    throw new Error('TTS_MAX_TEXT_LENGTH must be >= 1');
  }
}
