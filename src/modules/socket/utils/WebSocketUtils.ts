/**
 * WebSocket utility functions for safe operations
 */

import { WebSocket } from 'ws';
import type { RawData } from 'ws';
import { logger } from '@/shared/utils';
import type { ServerMessage } from '@/shared/protocol';

export class WebSocketUtils {
  /**
   * Safely close a WebSocket connection with error handling.
   * Sockets already closing or closed are left alone.
   */
  static safeClose(
    ws: WebSocket | undefined,
    label: string,
    code = 1000,
    reason?: string
  ): void {
    if (!ws) return;
    if (ws.readyState === WebSocket.CLOSING || ws.readyState === WebSocket.CLOSED) return;

    try {
      ws.close(code, reason);
    } catch (error) {
      logger.warn(`Error closing ${label} WebSocket`, { error });
    }
  }

  /**
   * Check if WebSocket is in a state where it can send messages
   */
  static canSend(ws: WebSocket | undefined): ws is WebSocket {
    return ws !== undefined && ws.readyState === WebSocket.OPEN;
  }

  /**
   * Safely send data over WebSocket with error handling
   */
  static safeSend(ws: WebSocket | undefined, data: string | Buffer, label: string): boolean {
    if (!this.canSend(ws)) {
      logger.warn(`Cannot send to ${label} WebSocket - not open`);
      return false;
    }

    try {
      ws.send(data);
      return true;
    } catch (error) {
      logger.error(`Error sending to ${label} WebSocket`, { error });
      return false;
    }
  }

  /**
   * Serialize a protocol message to a JSON text frame and send it
   */
  static sendMessage(ws: WebSocket | undefined, message: ServerMessage, label: string): boolean {
    return this.safeSend(ws, JSON.stringify(message), label);
  }

  /**
   * Frame payload as text; fragmented frames arrive as a Buffer list
   */
  static toText(data: RawData): string {
    if (Buffer.isBuffer(data)) {
      return data.toString('utf8');
    }
    if (Array.isArray(data)) {
      return Buffer.concat(data).toString('utf8');
    }
    return Buffer.from(data).toString('utf8');
  }
}
