/**
 * Centralized Error Handling for WebSocket Events
 */

import { WebSocket } from 'ws';
import { logger } from '@/shared/utils';
import { ErrorCode, errorMessage } from '@/shared/errors';
import { toErrorMessage } from '@/shared/protocol';
import { WebSocketUtils } from '../utils';

/**
 * Send error event to client
 * @param requestType - type of the failed request (e.g. "text_input")
 */
export function sendError(
  ws: WebSocket,
  error: unknown,
  requestType: string,
  sessionId?: string
): void {
  const message = toErrorMessage(error, requestType);
  WebSocketUtils.sendMessage(ws, message, 'error');

  const meta = {
    sessionId,
    code: message.code,
    message: message.message,
    requestType,
  };

  // Client mistakes are expected traffic
  if (message.code === ErrorCode.INVALID_PAYLOAD) {
    logger.warn('Invalid payload received', meta);
  } else if (message.code === ErrorCode.INTERNAL_ERROR) {
    logger.error('Internal error', { ...meta, error: errorMessage(error) });
  } else {
    logger.error('Error sent to client', meta);
  }
}

/**
 * Handle connection errors
 */
export function handleConnectionError(ws: WebSocket, error: Error, sessionId?: string): void {
  logger.error('Connection error', {
    sessionId,
    error: error.message,
    stack: error.stack,
  });

  WebSocketUtils.safeClose(ws, 'errored', 1011, 'Connection error');
}
