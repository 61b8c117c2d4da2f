/**
 * Session transport over a ws connection
 */

import { WebSocket } from 'ws';
import type { ServerMessage } from '@/shared/protocol';
import type { SessionTransport } from '@/modules/conversation';
import { WebSocketUtils } from '../utils';

export class WebSocketTransport implements SessionTransport {
  constructor(
    private readonly ws: WebSocket,
    private readonly connectionId: string
  ) {}

  send(message: ServerMessage): boolean {
    return WebSocketUtils.sendMessage(this.ws, message, `session ${this.connectionId}`);
  }

  close(code: number, reason: string): void {
    WebSocketUtils.safeClose(this.ws, `session ${this.connectionId}`, code, reason);
  }
}
