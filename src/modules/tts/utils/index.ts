/**
 * TTS Utilities
 */

export { classifySynthesisError, toSynthesisError } from './error-classifier';
export { normalizeSynthesisText, buildCacheKey } from './text-normalizer';
export { toAudioBuffer } from './audio-buffer';
