/**
 * TTS Module Exports
 * Public API: the synthesis coordinator, engine providers and their config
 */

export { SynthesisCoordinator } from './services';
export { CartesiaSynthesizer, MockSynthesizer, buildSilentWav } from './providers';
export { cartesiaConfig, ttsConfig, validateTtsConfig } from './config';
export type { CartesiaConfig, TtsConfig } from './config';
export { classifySynthesisError, normalizeSynthesisText, buildCacheKey } from './utils';
export type {
  VoiceConfig,
  SynthesisRequest,
  SpeechSynthesizer,
  SynthesisMetrics,
  ClassifiedSynthesisError,
} from './types';
export { TTSErrorType } from './types';
