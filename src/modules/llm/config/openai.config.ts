/**
 * OpenAI-compatible API Configuration
 * Model, temperature, timeout, and API settings. The base URL defaults to
 * OpenRouter; any chat-completions compatible endpoint works.
 */

import { parseFloatEnv, parseIntEnv } from '@/shared/utils/env';

export interface OpenAIConfig {
  apiKey: string;
  baseURL: string;
  timeout: number; // ms, 0 leaves the SDK default
}

export interface GenerationConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  requestTimeout: number; // ms, 0 disables
  maxTranscriptChars: number; // sum of message contents, preamble included
}

const requestTimeout = parseIntEnv(process.env.LLM_REQUEST_TIMEOUT, 30000); // 30s

export const openaiConfig: Readonly<OpenAIConfig> = Object.freeze({
  apiKey: process.env.LLM_API_KEY || process.env.OPENAI_API_KEY || '',
  baseURL: process.env.LLM_BASE_URL || 'https://openrouter.ai/api/v1',
  timeout: requestTimeout,
});

export const generationConfig: Readonly<GenerationConfig> = Object.freeze({
  model: process.env.LLM_MODEL || 'deepseek/deepseek-chat-v3-0324:free',
  temperature: parseFloatEnv(process.env.LLM_TEMPERATURE, 0.7),
  maxTokens: parseIntEnv(process.env.LLM_MAX_TOKENS, 1000),
  requestTimeout,
  maxTranscriptChars: parseIntEnv(process.env.LLM_MAX_TRANSCRIPT_CHARS, 12000),
});

/**
 * Validate configuration
 */
export function validateGenerationConfig(config: GenerationConfig): void {
  if (!config.model) {
    throw new Error('LLM_MODEL must not be empty');
  }
  if (config.temperature < 0 || config.temperature > 2) {
    throw new Error('LLM_TEMPERATURE must be between 0 and 2');
  }
  if (config.maxTokens < 1 || config.maxTokens > 4096) {
    throw new Error('LLM_MAX_TOKENS must be between 1 and 4096');
  }
  if (config.requestTimeout < 0) {
    throw new Error('LLM_REQUEST_TIMEOUT must be >= 0');
  }
  if (config.maxTranscriptChars < 1) {
    throw new Error('LLM_MAX_TRANSCRIPT_CHARS must be >= 1');
  }
}
