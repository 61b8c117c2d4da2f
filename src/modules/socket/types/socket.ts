/**
 * WebSocket-related type definitions
 */

import type { RegistryStats } from '@/modules/conversation';

export interface SocketStats {
  totalConnections: number;
  sessionStats: RegistryStats;
}
