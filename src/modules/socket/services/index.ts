/**
 * Socket Services
 */

export { WebSocketTransport } from './socket-transport';
