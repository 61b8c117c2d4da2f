/**
 * Conversation Module Types
 */

import type { ServerMessage } from '@/shared/protocol';
import type { CharacterConfig, Turn } from '@/modules/llm';
import type { VoiceConfig } from '@/modules/tts';
import type { EmotionCooldownRecord, EmotionPolicy, TriggerDecision } from '@/modules/emotion';

// ============================================================================
// Session State
// ============================================================================

export enum SessionState {
  CONNECTED = 'connected', // Idle, awaiting the next event
  PROCESSING = 'processing', // Pipeline job in flight
  CLOSED = 'closed', // Terminal
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Outbound side of one client connection
 */
export interface SessionTransport {
  /** @returns false when the message could not be delivered */
  send(message: ServerMessage): boolean;
  close(code: number, reason: string): void;
}

export interface ReplyGenerator {
  generate(history: readonly Turn[], character: Readonly<CharacterConfig>): Promise<string>;
}

export interface ReplySynthesizer {
  synthesize(text: string, voice: VoiceConfig): Promise<Buffer>;
}

export interface EmotionTrigger {
  evaluate(
    emotion: string,
    confidence: number | undefined,
    cooldownRecord: EmotionCooldownRecord,
    policy: Readonly<EmotionPolicy>,
    now?: number
  ): TriggerDecision;
}

/**
 * Everything a session needs besides its transport. Shared by all sessions.
 */
export interface SessionDependencies {
  generator: ReplyGenerator;
  synthesizer: ReplySynthesizer;
  trigger: EmotionTrigger;
  character: Readonly<CharacterConfig>;
  voice: Readonly<VoiceConfig>;
  emotionPolicy: Readonly<EmotionPolicy>;
}

// ============================================================================
// Pipeline Jobs
// ============================================================================

export interface TextJob {
  kind: 'text';
  content: string;
  acceptedAt: number;
}

export interface EmotionJob {
  kind: 'emotion';
  emotion: string;
  acceptedAt: number;
}

export type PipelineJob = TextJob | EmotionJob;

// ============================================================================
// Configuration & Stats
// ============================================================================

export interface SessionConfig {
  maxHistoryTurns: number; // 0 = unlimited
  maxQueueSize: number; // pending jobs, 0 = unlimited
  idleTimeout: number; // ms before an idle session is closed
  maxSessionDuration: number; // ms
  cleanupInterval: number; // ms, 0 disables the sweep
}

export interface SessionSnapshot {
  id: string;
  state: SessionState;
  createdAt: number;
  lastActivity: number;
  historyLength: number;
  pendingJobs: number;
  emotion: string | null;
}

export interface RegistryStats {
  total: number;
  connected: number;
  processing: number;
  peak: number;
  avgAgeMs: number;
}
