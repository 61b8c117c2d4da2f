/**
 * Interaction Trigger
 * Decides whether an emotion reading starts a spontaneous interaction.
 *
 * The cooldown check and the timestamp write happen in one synchronous step,
 * so two updates delivered back to back cannot both pass the check.
 */

import { logger } from '@/shared/utils';
import {
  EmotionCooldownRecord,
  EmotionPolicy,
  InteractionTriggerStats,
  TriggerDecision,
} from '../types';
import { normalizeEmotionLabel } from '../utils';

export class InteractionTriggerService {
  private evaluated = 0;
  private fired = 0;
  private suppressedByCooldown = 0;

  /**
   * Evaluate a reading and, when it fires, record `now` as the kind's last trigger
   */
  evaluate(
    emotion: string,
    confidence: number | undefined,
    cooldownRecord: EmotionCooldownRecord,
    policy: Readonly<EmotionPolicy>,
    now: number = Date.now()
  ): TriggerDecision {
    this.evaluated++;
    const kind = normalizeEmotionLabel(emotion);

    if (!policy.triggers.includes(kind)) {
      return 'not_interesting';
    }

    if (confidence !== undefined && confidence < policy.minConfidence) {
      return 'low_confidence';
    }

    const lastTriggerTime = cooldownRecord.get(kind);
    if (lastTriggerTime !== undefined && now - lastTriggerTime < policy.cooldownMs) {
      this.suppressedByCooldown++;
      logger.debug('Emotion trigger suppressed by cooldown', {
        emotion: kind,
        elapsedMs: now - lastTriggerTime,
        cooldownMs: policy.cooldownMs,
      });
      return 'cooldown';
    }

    cooldownRecord.set(kind, now);
    this.fired++;
    return 'fired';
  }

  shouldTrigger(
    emotion: string,
    cooldownRecord: EmotionCooldownRecord,
    policy: Readonly<EmotionPolicy>,
    now: number = Date.now(),
    confidence?: number
  ): boolean {
    return this.evaluate(emotion, confidence, cooldownRecord, policy, now) === 'fired';
  }

  getStats(): InteractionTriggerStats {
    return {
      evaluated: this.evaluated,
      fired: this.fired,
      suppressedByCooldown: this.suppressedByCooldown,
    };
  }
}

// Export singleton instance
export const interactionTrigger = new InteractionTriggerService();
