export { WebSocketUtils } from './WebSocketUtils';
