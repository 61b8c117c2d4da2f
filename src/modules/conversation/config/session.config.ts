/**
 * Session Configuration
 * History and queue bounds, plus the idle-expiry policy of the registry
 */

import { parseIntEnv } from '@/shared/utils/env';
import { SessionConfig } from '../types';

export const DEFAULT_SESSION_CONFIG: Readonly<SessionConfig> = Object.freeze({
  maxHistoryTurns: 20,
  maxQueueSize: 10,
  idleTimeout: 30 * 60 * 1000, // 30 minutes
  maxSessionDuration: 2 * 60 * 60 * 1000, // 2 hours
  cleanupInterval: 5 * 60 * 1000, // 5 minutes
});

export const sessionConfig: Readonly<SessionConfig> = Object.freeze({
  maxHistoryTurns: parseIntEnv(
    process.env.SESSION_MAX_HISTORY_TURNS,
    DEFAULT_SESSION_CONFIG.maxHistoryTurns
  ),
  maxQueueSize: parseIntEnv(process.env.SESSION_MAX_QUEUE_SIZE, DEFAULT_SESSION_CONFIG.maxQueueSize),
  idleTimeout: parseIntEnv(process.env.SESSION_IDLE_TIMEOUT_MS, DEFAULT_SESSION_CONFIG.idleTimeout),
  maxSessionDuration: parseIntEnv(
    process.env.SESSION_MAX_DURATION_MS,
    DEFAULT_SESSION_CONFIG.maxSessionDuration
  ),
  cleanupInterval: parseIntEnv(
    process.env.SESSION_CLEANUP_INTERVAL_MS,
    DEFAULT_SESSION_CONFIG.cleanupInterval
  ),
});

export function validateSessionConfig(config: SessionConfig): void {
  if (config.maxHistoryTurns < 0) {
    throw new Error('SESSION_MAX_HISTORY_TURNS must be >= 0');
  }
  if (config.maxQueueSize < 0) {
    throw new Error('SESSION_MAX_QUEUE_SIZE must be >= 0');
  }
  if (config.idleTimeout < 1 || config.maxSessionDuration < 1) {
    throw new Error('Session timeouts must be positive');
  }
  if (config.cleanupInterval < 0) {
    throw new Error('SESSION_CLEANUP_INTERVAL_MS must be >= 0');
  }
}
