export { ConversationSession } from './conversation-session';
export { SessionRegistry } from './session-registry';
