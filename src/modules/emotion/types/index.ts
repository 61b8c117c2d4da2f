/**
 * Emotion Module Types
 */

/**
 * When an emotion update may start a spontaneous interaction
 */
export interface EmotionPolicy {
  /** Lowercased labels that can fire */
  triggers: readonly string[];
  cooldownMs: number;
  /** Readings below this confidence never fire; readings without one always pass */
  minConfidence: number;
}

/**
 * Last trigger time per emotion kind, owned by one session
 */
export type EmotionCooldownRecord = Map<string, number>;

/**
 * Latest reading from the emotion sensor
 */
export interface EmotionState {
  current: string | null;
  confidence?: number;
  updatedAt: number | null;
}

export type TriggerDecision = 'fired' | 'not_interesting' | 'low_confidence' | 'cooldown';

export interface InteractionTriggerStats {
  evaluated: number;
  fired: number;
  suppressedByCooldown: number;
}
