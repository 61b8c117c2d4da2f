/**
 * WebSocket Configuration
 */

export const websocketConfig = {
  path: process.env.WS_PATH || '/ws',

  // Inbound frames are small JSON events
  maxPayload: 64 * 1024,

  perMessageDeflate: false,

  clientTracking: true,
} as const;

/**
 * WebSocket server shutdown configuration
 */
export const websocketShutdownConfig = {
  // Timeout for graceful shutdown (milliseconds)
  shutdownTimeout: 5000,
} as const;
