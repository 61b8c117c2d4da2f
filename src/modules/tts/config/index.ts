export { cartesiaConfig } from './cartesia.config';
export type { CartesiaConfig } from './cartesia.config';
export { ttsConfig, validateTtsConfig } from './tts.config';
export type { TtsConfig } from './tts.config';
