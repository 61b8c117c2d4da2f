/**
 * Conversation Session
 * Per-connection state machine and serialized reply pipeline.
 *
 * States: connected -> processing -> connected ... -> closed (terminal).
 * Text inputs and fired emotion interactions share one FIFO job queue, so
 * replies go out in the order their inputs were accepted and no two jobs of
 * one session overlap. Only the session mutates its history and emotion state.
 */

import { logger } from '@/shared/utils';
import {
  AppError,
  ErrorCode,
  InvalidInputError,
  QueueOverflowError,
  SessionClosedError,
  errorMessage,
  isAppError,
} from '@/shared/errors';
import {
  AudioErrorPayload,
  MESSAGE_TYPES,
  ServerMessage,
  toErrorMessage,
} from '@/shared/protocol';
import type { Turn, TurnRole } from '@/modules/llm';
import { buildEmotionPrompt, normalizeEmotionLabel } from '@/modules/emotion';
import type { EmotionCooldownRecord, EmotionState, TriggerDecision } from '@/modules/emotion';
import {
  EmotionJob,
  PipelineJob,
  SessionConfig,
  SessionDependencies,
  SessionSnapshot,
  SessionState,
  SessionTransport,
  TextJob,
} from '../types';

interface SynthesizedAudio {
  audio: string;
  audioError?: AudioErrorPayload;
}

function createTurn(role: TurnRole, content: string): Turn {
  return Object.freeze({ role, content, timestamp: Date.now() });
}

export class ConversationSession {
  readonly createdAt: number;
  private state: SessionState = SessionState.CONNECTED;
  private lastActivity: number;

  private readonly history: Turn[] = [];
  private readonly emotion: EmotionState = { current: null, updatedAt: null };
  private readonly cooldowns: EmotionCooldownRecord = new Map();

  private readonly queue: PipelineJob[] = [];
  private draining = false;
  private drainPromise: Promise<void> | null = null;

  constructor(
    readonly id: string,
    private readonly transport: SessionTransport,
    private readonly deps: SessionDependencies,
    private readonly config: Readonly<SessionConfig>
  ) {
    this.createdAt = Date.now();
    this.lastActivity = this.createdAt;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  /**
   * Accept a user message. It runs immediately when the session is idle,
   * otherwise after every job accepted before it.
   *
   * @throws SessionClosedError, InvalidInputError, QueueOverflowError
   */
  onTextInput(text: string): void {
    this.assertOpen();

    const content = text.trim();
    if (!content) {
      throw new InvalidInputError('text_input content must not be empty');
    }

    this.touch();
    this.enqueue({ kind: 'text', content, acceptedAt: Date.now() });
  }

  /**
   * Record the latest emotion reading and start an interaction when the
   * trigger fires. The reading is stored even while a job is in flight.
   *
   * @throws SessionClosedError, InvalidInputError, QueueOverflowError
   */
  onEmotionUpdate(label: string, confidence?: number): TriggerDecision {
    this.assertOpen();

    const emotion = normalizeEmotionLabel(label);
    if (!emotion) {
      throw new InvalidInputError('emotion_update emotion must not be empty');
    }

    const now = Date.now();
    this.emotion.current = emotion;
    this.emotion.confidence = confidence;
    this.emotion.updatedAt = now;
    this.touch();

    const decision = this.deps.trigger.evaluate(
      emotion,
      confidence,
      this.cooldowns,
      this.deps.emotionPolicy,
      now
    );

    logger.debug('Emotion updated', { sessionId: this.id, emotion, confidence, decision });

    if (decision === 'fired') {
      this.enqueue({ kind: 'emotion', emotion, acceptedAt: now });
    }

    return decision;
  }

  /**
   * Move to closed from any state. Queued jobs are dropped; a job already in
   * flight finishes but its result is discarded. Idempotent.
   */
  close(reason = 'session closed'): void {
    if (this.isClosed()) {
      return;
    }

    const droppedJobs = this.queue.length;
    this.state = SessionState.CLOSED;
    this.queue.length = 0;

    try {
      this.transport.close(1000, reason);
    } catch (error) {
      logger.warn('Error closing session transport', {
        sessionId: this.id,
        error: errorMessage(error),
      });
    }

    logger.info('Session closed', {
      sessionId: this.id,
      reason,
      droppedJobs,
      historyLength: this.history.length,
      durationMs: Date.now() - this.createdAt,
    });
  }

  // ==========================================================================
  // Accessors
  // ==========================================================================

  getState(): SessionState {
    return this.state;
  }

  isClosed(): boolean {
    return this.state === SessionState.CLOSED;
  }

  getLastActivity(): number {
    return this.lastActivity;
  }

  getHistory(): readonly Turn[] {
    return [...this.history];
  }

  getEmotionState(): Readonly<EmotionState> {
    return { ...this.emotion };
  }

  getPendingJobCount(): number {
    return this.queue.length;
  }

  /**
   * Resolves once the job queue has drained
   */
  whenIdle(): Promise<void> {
    return this.drainPromise ?? Promise.resolve();
  }

  toSnapshot(): SessionSnapshot {
    return {
      id: this.id,
      state: this.state,
      createdAt: this.createdAt,
      lastActivity: this.lastActivity,
      historyLength: this.history.length,
      pendingJobs: this.queue.length,
      emotion: this.emotion.current,
    };
  }

  // ==========================================================================
  // Pipeline
  // ==========================================================================

  private enqueue(job: PipelineJob): void {
    const { maxQueueSize } = this.config;
    if (maxQueueSize > 0 && this.queue.length >= maxQueueSize) {
      logger.warn('Queue overflow - rejecting job', {
        sessionId: this.id,
        kind: job.kind,
        queueSize: this.queue.length,
        maxQueueSize,
      });
      throw new QueueOverflowError(this.id, maxQueueSize);
    }

    this.queue.push(job);

    if (!this.draining) {
      this.draining = true;
      this.drainPromise = this.drain();
    }
  }

  private async drain(): Promise<void> {
    this.state = SessionState.PROCESSING;

    try {
      let job = this.queue.shift();
      while (job && !this.isClosed()) {
        await this.runJob(job);
        job = this.queue.shift();
      }
    } finally {
      this.draining = false;
      if (!this.isClosed()) {
        this.state = SessionState.CONNECTED;
      }
    }
  }

  /**
   * A failing job is reported and never stops the queue
   */
  private async runJob(job: PipelineJob): Promise<void> {
    const requestType =
      job.kind === 'text' ? MESSAGE_TYPES.TEXT_INPUT : MESSAGE_TYPES.EMOTION_UPDATE;

    try {
      if (job.kind === 'text') {
        await this.runTextJob(job);
      } else {
        await this.runEmotionJob(job);
      }
    } catch (error) {
      logger.error('Pipeline job failed', {
        sessionId: this.id,
        kind: job.kind,
        code: isAppError(error) ? error.code : ErrorCode.INTERNAL_ERROR,
        error: errorMessage(error),
      });
      this.emit(toErrorMessage(error, requestType));
    }
  }

  private async runTextJob(job: TextJob): Promise<void> {
    this.appendTurn(createTurn('user', job.content));

    const text = await this.deps.generator.generate(this.getHistory(), this.deps.character);
    if (this.isClosed()) {
      return;
    }

    const { audio, audioError } = await this.synthesizeReply(text);
    if (this.isClosed()) {
      return;
    }

    this.appendTurn(createTurn('assistant', text));
    this.emit({
      type: MESSAGE_TYPES.RESPONSE,
      text,
      audio,
      ...(audioError ? { audioError } : {}),
    });

    logger.debug('Text job completed', {
      sessionId: this.id,
      queuedMs: Date.now() - job.acceptedAt,
    });
  }

  /**
   * The synthetic prompt is sent to the LLM but never stored in history
   */
  private async runEmotionJob(job: EmotionJob): Promise<void> {
    const prompt = createTurn('user', buildEmotionPrompt(job.emotion));

    const text = await this.deps.generator.generate(
      [...this.history, prompt],
      this.deps.character
    );
    if (this.isClosed()) {
      return;
    }

    const { audio, audioError } = await this.synthesizeReply(text);
    if (this.isClosed()) {
      return;
    }

    this.appendTurn(createTurn('assistant', text));
    this.emit({
      type: MESSAGE_TYPES.EMOTION_INTERACTION,
      emotion: job.emotion,
      text,
      audio,
      ...(audioError ? { audioError } : {}),
    });

    logger.info('Emotion interaction sent', { sessionId: this.id, emotion: job.emotion });
  }

  /**
   * Audio failure after a successful reply degrades to text only
   */
  private async synthesizeReply(text: string): Promise<SynthesizedAudio> {
    try {
      const audio = await this.deps.synthesizer.synthesize(text, this.deps.voice);
      return { audio: audio.toString('base64') };
    } catch (error) {
      const code = error instanceof AppError ? error.code : ErrorCode.INTERNAL_ERROR;
      logger.warn('Synthesis failed, sending text without audio', {
        sessionId: this.id,
        code,
        error: errorMessage(error),
      });
      return { audio: '', audioError: { code, message: errorMessage(error) } };
    }
  }

  private appendTurn(turn: Turn): void {
    this.history.push(turn);

    const { maxHistoryTurns } = this.config;
    if (maxHistoryTurns > 0 && this.history.length > maxHistoryTurns) {
      this.history.splice(0, this.history.length - maxHistoryTurns);
    }
  }

  private emit(message: ServerMessage): void {
    if (this.isClosed()) {
      logger.debug('Discarding message for closed session', {
        sessionId: this.id,
        type: message.type,
      });
      return;
    }

    this.touch();
    if (!this.transport.send(message)) {
      logger.warn('Message not delivered', { sessionId: this.id, type: message.type });
    }
  }

  private touch(): void {
    this.lastActivity = Date.now();
  }

  private assertOpen(): void {
    if (this.isClosed()) {
      throw new SessionClosedError(this.id);
    }
  }
}
