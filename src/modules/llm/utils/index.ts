/**
 * LLM Utilities
 * Export barrel for LLM utility functions
 */

export { classifyLLMError, toGenerationError } from './error-classifier';
export { buildTranscript, transcriptSize } from './transcript';
