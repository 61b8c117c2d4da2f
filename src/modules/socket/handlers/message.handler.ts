/**
 * WebSocket Message Handler
 * Decodes JSON frames and dispatches them to the connection's session
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { logger } from '@/shared/utils';
import {
  MESSAGE_TYPES,
  decodeFrame,
  messageTypeOf,
  validateClientMessage,
} from '@/shared/protocol';
import type { SessionRegistry } from '@/modules/conversation';
import { WebSocketUtils } from '../utils';
import { sendError } from './error.handler';

export function handleWebSocketMessage(
  ws: WebSocket,
  data: RawData,
  connectionId: string,
  registry: SessionRegistry
): void {
  // Guard: Check readyState before processing
  if (ws.readyState !== WebSocket.OPEN) {
    logger.warn('WebSocket not open, skipping message', {
      connectionId,
      readyState: ws.readyState,
    });
    return;
  }

  let requestType = 'unknown';

  try {
    const payload = decodeFrame(WebSocketUtils.toText(data));
    requestType = messageTypeOf(payload);
    const message = validateClientMessage(payload);
    const session = registry.lookup(connectionId);

    switch (message.type) {
      case MESSAGE_TYPES.TEXT_INPUT:
        session.onTextInput(message.content);
        break;

      case MESSAGE_TYPES.EMOTION_UPDATE:
        session.onEmotionUpdate(message.emotion, message.confidence);
        break;
    }
  } catch (error) {
    sendError(ws, error, requestType, connectionId);
  }
}
