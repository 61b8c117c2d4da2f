export { OpenAICompletionProvider } from './openai.provider';
export { EchoCompletionProvider } from './mock.provider';
