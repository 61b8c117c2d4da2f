/**
 * Socket Module - Public API
 *
 * Only export what other modules should use.
 */

// Server initialization and stats
export { initializeSocketServer, shutdownSocketServer, getSocketStats } from './socket.server';

export type { SocketStats } from './types';
