/**
 * Generation Coordinator
 * Builds the transcript (preamble + trimmed history), calls the chat provider
 * under a timeout and converts every failure into a GenerationError.
 *
 * Stateless across calls: history is owned by the session and passed in.
 * Nothing is retried here; the retryable flag goes back to the client.
 */

import { logger, withTimeout } from '@/shared/utils';
import { GenerationConfig, buildPreamble, validateGenerationConfig } from '../config';
import { CharacterConfig, ChatCompletionProvider, GenerationMetrics, Turn } from '../types';
import { buildTranscript, toGenerationError } from '../utils';

export class GenerationCoordinator {
  // Metrics
  private totalRequests = 0;
  private totalSuccesses = 0;
  private totalFailures = 0;
  private droppedTurns = 0;
  private totalResponseTimeMs = 0;

  constructor(
    private readonly provider: ChatCompletionProvider,
    private readonly config: Readonly<GenerationConfig>
  ) {
    validateGenerationConfig(config);

    logger.info('Generation coordinator initialized', {
      provider: provider.name,
      model: config.model,
      temperature: config.temperature,
      maxTranscriptChars: config.maxTranscriptChars,
    });
  }

  /**
   * Generate the assistant reply for a history ending in the prompt to answer
   * @throws GenerationError on provider failure, timeout, empty reply or an
   *   over-budget latest turn
   */
  async generate(history: readonly Turn[], character: Readonly<CharacterConfig>): Promise<string> {
    this.totalRequests++;
    const startTime = Date.now();

    try {
      const transcript = buildTranscript(
        buildPreamble(character),
        history,
        this.config.maxTranscriptChars
      );

      if (transcript.droppedTurns > 0) {
        this.droppedTurns += transcript.droppedTurns;
        logger.debug('Transcript trimmed to budget', {
          droppedTurns: transcript.droppedTurns,
          totalChars: transcript.totalChars,
          maxChars: this.config.maxTranscriptChars,
        });
      }

      const reply = await withTimeout(
        this.provider.complete(transcript.messages, {
          model: this.config.model,
          maxTokens: this.config.maxTokens,
          temperature: this.config.temperature,
        }),
        this.config.requestTimeout,
        'LLM generation'
      );

      const text = reply.trim();
      if (!text) {
        throw new Error('LLM returned empty response');
      }

      const duration = Date.now() - startTime;
      this.totalSuccesses++;
      this.totalResponseTimeMs += duration;

      logger.info('LLM response generated', {
        provider: this.provider.name,
        durationMs: duration,
        messageCount: transcript.messages.length,
        responseLength: text.length,
      });

      return text;
    } catch (error) {
      this.totalFailures++;
      const generationError = toGenerationError(error);
      logger.error('LLM generation failed', {
        provider: this.provider.name,
        retryable: generationError.retryable,
        error: generationError.message,
        cause: error instanceof Error && error !== generationError ? error.message : undefined,
      });
      throw generationError;
    }
  }

  getMetrics(): GenerationMetrics {
    return {
      totalRequests: this.totalRequests,
      totalSuccesses: this.totalSuccesses,
      totalFailures: this.totalFailures,
      droppedTurns: this.droppedTurns,
      averageResponseTimeMs:
        this.totalSuccesses > 0 ? Math.round(this.totalResponseTimeMs / this.totalSuccesses) : 0,
    };
  }
}
