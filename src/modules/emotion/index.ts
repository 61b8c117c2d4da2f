/**
 * Emotion Module Exports
 */

export { InteractionTriggerService, interactionTrigger } from './services';
export {
  emotionConfig,
  validateEmotionConfig,
  emotionPrompts,
  buildEmotionPrompt,
} from './config';
export { normalizeEmotionLabel } from './utils';
export type {
  EmotionPolicy,
  EmotionCooldownRecord,
  EmotionState,
  TriggerDecision,
  InteractionTriggerStats,
} from './types';
