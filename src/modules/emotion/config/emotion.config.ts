/**
 * Emotion Interaction Policy Configuration
 */

import { parseFloatEnv, parseIntEnv, parseListEnv } from '@/shared/utils/env';
import { EmotionPolicy } from '../types';

export const emotionConfig: Readonly<EmotionPolicy> = Object.freeze({
  triggers: Object.freeze(parseListEnv(process.env.EMOTION_TRIGGERS, ['sad', 'angry'])),
  cooldownMs: parseIntEnv(process.env.EMOTION_COOLDOWN_MS, 30000), // 30s
  minConfidence: parseFloatEnv(process.env.EMOTION_MIN_CONFIDENCE, 0),
});

export function validateEmotionConfig(config: EmotionPolicy): void {
  if (config.cooldownMs < 0) {
    throw new Error('EMOTION_COOLDOWN_MS must be >= 0');
  }
  if (config.minConfidence < 0 || config.minConfidence > 1) {
    throw new Error('EMOTION_MIN_CONFIDENCE must be between 0 and 1');
  }
}
