export { emotionConfig, validateEmotionConfig } from './emotion.config';
export { emotionPrompts, buildEmotionPrompt } from './prompts.config';
