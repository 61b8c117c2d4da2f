/**
 * LLM Module Exports
 */

export { GenerationCoordinator } from './services';
export { OpenAICompletionProvider, EchoCompletionProvider } from './providers';
export {
  openaiConfig,
  generationConfig,
  characterConfig,
  buildPreamble,
  validateGenerationConfig,
} from './config';
export type { OpenAIConfig, GenerationConfig } from './config';
export { classifyLLMError, buildTranscript } from './utils';
export { OpenAIErrorType } from './types';
export type {
  Turn,
  TurnRole,
  TranscriptMessage,
  CharacterConfig,
  GenerationParams,
  ChatCompletionProvider,
  GenerationMetrics,
  ClassifiedError,
} from './types';
