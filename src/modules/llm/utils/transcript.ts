/**
 * Transcript assembly with FIFO budget trimming
 *
 * Size is measured in characters across every message content, preamble
 * included. Oldest turns go first; the preamble is never dropped. Trimmed
 * context is lost for that call only, the session keeps its full history.
 */

import { GenerationError } from '@/shared/errors';
import { Transcript, Turn } from '../types';

export function transcriptSize(messages: ReadonlyArray<{ content: string }>): number {
  let total = 0;
  for (const message of messages) {
    total += message.content.length;
  }
  return total;
}

export function buildTranscript(
  preamble: string,
  history: readonly Turn[],
  maxChars: number
): Transcript {
  if (history.length === 0) {
    throw new GenerationError('Cannot generate a reply without any turns');
  }

  let totalChars = preamble.length + transcriptSize(history);
  let firstKept = 0;

  while (totalChars > maxChars && firstKept < history.length) {
    totalChars -= history[firstKept].content.length;
    firstKept++;
  }

  if (firstKept === history.length) {
    throw new GenerationError(
      `Transcript budget of ${maxChars} characters cannot fit the latest turn`
    );
  }

  const kept = history.slice(firstKept);
  return {
    messages: [
      { role: 'system', content: preamble },
      ...kept.map((turn) => ({ role: turn.role, content: turn.content })),
    ],
    droppedTurns: firstKept,
    totalChars,
  };
}
