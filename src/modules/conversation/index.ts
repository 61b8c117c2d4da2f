/**
 * Conversation Module - Public API
 */

export { ConversationSession, SessionRegistry } from './services';
export { sessionConfig, validateSessionConfig, DEFAULT_SESSION_CONFIG } from './config';
export { SessionState } from './types';
export type {
  SessionTransport,
  SessionDependencies,
  SessionConfig,
  SessionSnapshot,
  RegistryStats,
  ReplyGenerator,
  ReplySynthesizer,
  EmotionTrigger,
  PipelineJob,
} from './types';
