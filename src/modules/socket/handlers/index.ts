/**
 * Socket Handlers
 * Centralized exports for all socket event handlers
 */

export { handleWebSocketMessage } from './message.handler';
export { sendError, handleConnectionError } from './error.handler';
