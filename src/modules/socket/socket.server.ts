/**
 * Native WebSocket Server Initialization
 * One session per connection; JSON text frames in both directions
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { IncomingMessage, Server as HTTPServer } from 'http';
import { logger, generateId } from '@/shared/utils';
import { errorMessage } from '@/shared/errors';
import { MESSAGE_TYPES } from '@/shared/protocol';
import { websocketShutdownConfig, websocketConfig } from '@/shared/config';
import type { SessionRegistry } from '@/modules/conversation';
import type { SocketStats } from './types';
import { WebSocketTransport } from './services';
import { WebSocketUtils } from './utils';
import { handleWebSocketMessage, handleConnectionError } from './handlers';

/**
 * Initialize WebSocket server
 */
export function initializeSocketServer(
  httpServer: HTTPServer,
  registry: SessionRegistry
): WebSocketServer {
  logger.info('Initializing native WebSocket server', { path: websocketConfig.path });

  const wss = new WebSocketServer({
    server: httpServer,
    path: websocketConfig.path,
    maxPayload: websocketConfig.maxPayload,
    perMessageDeflate: websocketConfig.perMessageDeflate,
    clientTracking: websocketConfig.clientTracking,
  });

  wss.on('connection', (ws: WebSocket, request: IncomingMessage) => {
    handleConnection(ws, request, registry);
  });

  wss.on('error', (error: Error) => {
    logger.error('WebSocket server error', error);
  });

  logger.info('WebSocket server initialized successfully');

  return wss;
}

/**
 * Handle new WebSocket connection
 */
function handleConnection(
  ws: WebSocket,
  request: IncomingMessage,
  registry: SessionRegistry
): void {
  const clientIP = request.socket.remoteAddress || 'unknown';
  const userAgent = request.headers['user-agent'] || 'unknown';

  // The connection id doubles as the session id
  const connectionId = generateId();

  logger.info('Client connected', {
    connectionId,
    clientIP,
    userAgent,
  });

  try {
    registry.register(connectionId, new WebSocketTransport(ws, connectionId));
  } catch (error) {
    logger.error('Failed to register session', { connectionId, error: errorMessage(error) });
    WebSocketUtils.safeClose(ws, 'unregistered', 1011, 'Session error');
    return;
  }

  // Handle incoming messages
  ws.on('message', (data) => {
    handleWebSocketMessage(ws, data, connectionId, registry);
  });

  // Handle connection close
  ws.on('close', (code: number, reason: Buffer) => {
    logger.info('Client disconnected', {
      connectionId,
      code,
      reason: reason.toString(),
    });
    registry.unregister(connectionId, 'client disconnected');
  });

  // Handle errors
  ws.on('error', (error: Error) => {
    handleConnectionError(ws, error, connectionId);
  });

  // Send connection acknowledgment
  WebSocketUtils.sendMessage(
    ws,
    { type: MESSAGE_TYPES.CONNECTION_ACK, sessionId: connectionId },
    'connection ack'
  );

  logger.debug('Connection handlers registered', { connectionId });
}

/**
 * Get socket server statistics
 * Exposed for health checks and monitoring
 */
export function getSocketStats(wss: WebSocketServer, registry: SessionRegistry): SocketStats {
  return {
    totalConnections: wss.clients.size,
    sessionStats: registry.getStats(),
  };
}

/**
 * Graceful shutdown for WebSocket server
 * Closes every session, waits for the sockets to close, then stops the server.
 */
export async function shutdownSocketServer(
  wss: WebSocketServer,
  registry: SessionRegistry
): Promise<void> {
  logger.info('Shutting down WebSocket server');

  const closed = Promise.all(
    Array.from(wss.clients, (ws) =>
      ws.readyState === WebSocket.CLOSED
        ? Promise.resolve()
        : new Promise<void>((resolve) => {
            ws.once('close', () => resolve());
          })
    )
  );

  // Closes each session's transport
  registry.shutdown();

  let forceTimer: NodeJS.Timeout | undefined;
  const forced = new Promise<'timeout'>((resolve) => {
    forceTimer = setTimeout(() => resolve('timeout'), websocketShutdownConfig.shutdownTimeout);
  });

  const outcome = await Promise.race([closed.then(() => 'closed' as const), forced]);
  clearTimeout(forceTimer);

  if (outcome === 'timeout') {
    logger.warn('WebSocket server force closed after timeout');
    for (const ws of wss.clients) {
      ws.terminate();
    }
  }

  await new Promise<void>((resolve) => {
    wss.close(() => resolve());
  });

  logger.info('WebSocket server closed');
}
