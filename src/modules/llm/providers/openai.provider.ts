/**
 * OpenAI-compatible chat completions provider
 * Non-streaming: the whole reply is needed before synthesis starts.
 */

import OpenAI from 'openai';
import { OpenAIConfig } from '../config';
import { ChatCompletionProvider, GenerationParams, TranscriptMessage } from '../types';

function toMessageParam(message: TranscriptMessage): OpenAI.ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

export class OpenAICompletionProvider implements ChatCompletionProvider {
  readonly name = 'openai';
  private readonly client: OpenAI;

  constructor(config: Readonly<OpenAIConfig>, client?: OpenAI) {
    if (client) {
      this.client = client;
      return;
    }

    if (!config.apiKey) {
      throw new Error('LLM_API_KEY (or OPENAI_API_KEY) is required for the OpenAI provider');
    }

    // Retries are a client decision; the SDK must not repeat calls on its own
    this.client = new OpenAI({
      apiKey: config.apiKey,
      baseURL: config.baseURL,
      timeout: config.timeout > 0 ? config.timeout : undefined,
      maxRetries: 0,
    });
  }

  async complete(
    messages: readonly TranscriptMessage[],
    params: GenerationParams
  ): Promise<string> {
    const completion = await this.client.chat.completions.create({
      model: params.model,
      messages: messages.map(toMessageParam),
      temperature: params.temperature,
      max_tokens: params.maxTokens,
      stream: false,
    });

    return completion.choices[0]?.message?.content ?? '';
  }
}
