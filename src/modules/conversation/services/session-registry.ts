/**
 * Session Registry
 * Owns every live session, keyed by connection id, and closes sessions that
 * stay idle or outlive the maximum duration.
 */

import { logger } from '@/shared/utils';
import { isTest } from '@/shared/config';
import { DuplicateSessionError, NotFoundError } from '@/shared/errors';
import { validateSessionConfig } from '../config';
import {
  RegistryStats,
  SessionConfig,
  SessionDependencies,
  SessionState,
  SessionTransport,
} from '../types';
import { ConversationSession } from './conversation-session';

export class SessionRegistry {
  private readonly sessions = new Map<string, ConversationSession>();
  private cleanupIntervalId?: NodeJS.Timeout;
  private peakSessions = 0;

  constructor(
    private readonly deps: SessionDependencies,
    private readonly config: Readonly<SessionConfig>
  ) {
    validateSessionConfig(config);

    // Tests drive expiry through cleanupExpiredSessions()
    if (!isTest && config.cleanupInterval > 0) {
      this.startCleanupInterval();
    }
  }

  /**
   * Create the session for a new connection
   * @throws DuplicateSessionError when the id is already registered
   */
  register(connectionId: string, transport: SessionTransport): ConversationSession {
    if (this.sessions.has(connectionId)) {
      throw new DuplicateSessionError(connectionId);
    }

    const session = new ConversationSession(connectionId, transport, this.deps, this.config);
    this.sessions.set(connectionId, session);
    this.peakSessions = Math.max(this.peakSessions, this.sessions.size);

    logger.info('Session registered', {
      sessionId: connectionId,
      activeSessions: this.sessions.size,
    });

    return session;
  }

  /**
   * @throws NotFoundError
   */
  lookup(connectionId: string): ConversationSession {
    const session = this.sessions.get(connectionId);
    if (!session) {
      throw new NotFoundError(connectionId);
    }
    return session;
  }

  has(connectionId: string): boolean {
    return this.sessions.has(connectionId);
  }

  /**
   * Remove and close a session. Unknown ids are ignored.
   * @returns true when a session was removed
   */
  unregister(connectionId: string, reason = 'connection closed'): boolean {
    const session = this.sessions.get(connectionId);
    if (!session) {
      return false;
    }

    this.sessions.delete(connectionId);
    session.close(reason);

    logger.info('Session unregistered', {
      sessionId: connectionId,
      reason,
      activeSessions: this.sessions.size,
    });

    return true;
  }

  getSessionCount(): number {
    return this.sessions.size;
  }

  getStats(now: number = Date.now()): RegistryStats {
    const stats: RegistryStats = {
      total: this.sessions.size,
      connected: 0,
      processing: 0,
      peak: this.peakSessions,
      avgAgeMs: 0,
    };

    if (this.sessions.size === 0) {
      return stats;
    }

    let totalAge = 0;
    for (const session of this.sessions.values()) {
      switch (session.getState()) {
        case SessionState.CONNECTED:
          stats.connected++;
          break;
        case SessionState.PROCESSING:
          stats.processing++;
          break;
        case SessionState.CLOSED:
          break;
      }
      totalAge += now - session.createdAt;
    }

    stats.avgAgeMs = Math.floor(totalAge / this.sessions.size);
    return stats;
  }

  /**
   * Close sessions idle longer than the idle timeout or older than the
   * maximum duration. Sessions with a job in flight are never idle.
   */
  cleanupExpiredSessions(now: number = Date.now()): number {
    const expired: Array<{ id: string; reason: string }> = [];

    for (const [id, session] of this.sessions.entries()) {
      if (now - session.createdAt > this.config.maxSessionDuration) {
        expired.push({ id, reason: 'max session duration reached' });
      } else if (
        session.getState() !== SessionState.PROCESSING &&
        now - session.getLastActivity() > this.config.idleTimeout
      ) {
        expired.push({ id, reason: 'idle timeout' });
      }
    }

    for (const { id, reason } of expired) {
      this.unregister(id, reason);
    }

    if (expired.length > 0) {
      logger.info('Cleaned up expired sessions', { count: expired.length });
    }

    return expired.length;
  }

  /**
   * Stop the sweep and close every session (graceful shutdown)
   */
  shutdown(reason = 'server shutting down'): void {
    this.stopCleanupInterval();

    const count = this.sessions.size;
    for (const id of Array.from(this.sessions.keys())) {
      this.unregister(id, reason);
    }

    logger.info('Session registry shut down', { closedSessions: count });
  }

  private startCleanupInterval(): void {
    this.cleanupIntervalId = setInterval(() => {
      this.cleanupExpiredSessions();
    }, this.config.cleanupInterval);
    this.cleanupIntervalId.unref();

    logger.debug('Session cleanup interval started', {
      interval: this.config.cleanupInterval,
    });
  }

  private stopCleanupInterval(): void {
    if (this.cleanupIntervalId) {
      clearInterval(this.cleanupIntervalId);
      this.cleanupIntervalId = undefined;
      logger.debug('Session cleanup interval stopped');
    }
  }
}
