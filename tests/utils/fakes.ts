/**
 * Provider fakes shared by the module and server tests
 */

import { vi } from 'vitest';
import type { SpeechSynthesizer, SynthesisRequest, TtsConfig } from '@/modules/tts';
import type {
  ChatCompletionProvider,
  GenerationConfig,
  GenerationParams,
  TranscriptMessage,
} from '@/modules/llm';
import type { ServerMessage } from '@/shared/protocol';
import type { SessionTransport } from '@/modules/conversation';

export const TEST_TTS_CONFIG: TtsConfig = {
  voiceMap: { en: 'voice-en', 'zh-tw': 'voice-zh' },
  requestTimeout: 0,
  maxTextLength: 200,
};

export const TEST_GENERATION_CONFIG: GenerationConfig = {
  model: 'test-model',
  temperature: 0.7,
  maxTokens: 100,
  requestTimeout: 0,
  maxTranscriptChars: 10000,
};

export function createFakeSynthesizer(
  implementation: (request: SynthesisRequest) => Promise<Buffer> = async (request) =>
    Buffer.from(`audio:${request.text}`)
) {
  const synthesize = vi.fn(implementation);
  const synthesizer: SpeechSynthesizer = { name: 'fake-tts', synthesize };
  return { synthesizer, synthesize };
}

export function createFakeChatProvider(
  implementation: (
    messages: readonly TranscriptMessage[],
    params: GenerationParams
  ) => Promise<string> = async (messages) => `reply to ${messages[messages.length - 1].content}`
) {
  const complete = vi.fn(implementation);
  const provider: ChatCompletionProvider = { name: 'fake-llm', complete };
  return { provider, complete };
}

/**
 * Transport that records what a session sends
 */
export class RecordingTransport implements SessionTransport {
  readonly sent: ServerMessage[] = [];
  closedWith: { code: number; reason: string } | null = null;

  send(message: ServerMessage): boolean {
    if (this.closedWith) {
      return false;
    }
    this.sent.push(message);
    return true;
  }

  close(code: number, reason: string): void {
    this.closedWith = { code, reason };
  }
}
