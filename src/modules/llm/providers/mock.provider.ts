/**
 * Offline chat provider used when no LLM key is configured
 */

import { ChatCompletionProvider, TranscriptMessage } from '../types';

export class EchoCompletionProvider implements ChatCompletionProvider {
  readonly name = 'mock';

  async complete(messages: readonly TranscriptMessage[]): Promise<string> {
    for (let i = messages.length - 1; i >= 0; i--) {
      const message = messages[i];
      if (message.role === 'user') {
        return `You said: ${message.content}`;
      }
    }
    return 'Hello! How can I help you today?';
  }
}
