export { openaiConfig, generationConfig, validateGenerationConfig } from './openai.config';
export type { OpenAIConfig, GenerationConfig } from './openai.config';
export {
  characterConfig,
  defaultPersona,
  buildPreamble,
  languageDisplayName,
  DEFAULT_CHARACTER_NAME,
  DEFAULT_CHARACTER_LANGUAGE,
} from './prompts.config';
