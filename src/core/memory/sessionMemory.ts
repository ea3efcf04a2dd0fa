import type { Session } from '../@types';
import { sessionNotFound } from '../shared/errors/training-errors';
import { logger, toErrorMessage } from '../shared/logger';
import { systemClock, type Clock } from '../shared/runtime';

export type SessionEvictionListener = (session: Session) => void;

export interface SessionMemoryStore {
  save(session: Session): Session;
  getSession(sessionId: string): Session | undefined;
  mustGetSession(sessionId: string): Session;
  listByUser(userId: string): Session[];
  onEvict(listener: SessionEvictionListener): void;
}

export interface SessionMemoryOptions {
  maxSessions?: number;
  /** Sessions with no turn for this long are dropped, finished or not. */
  idleTtlMs?: number;
  clock?: Clock;
}

const DEFAULT_MAX_SESSIONS = 5_000;
const DEFAULT_IDLE_TTL_MS = 2 * 60 * 60 * 1_000;

/**
 * Live sessions, keyed by id. Finished sessions stay readable until evicted.
 * Over capacity, scored sessions go first, then the oldest ones.
 */
export class SessionMemory implements SessionMemoryStore {
  private readonly sessions = new Map<string, Session>();
  private readonly listeners: SessionEvictionListener[] = [];
  private readonly maxSessions: number;
  private readonly idleTtlMs: number;
  private readonly clock: Clock;

  public constructor(options: SessionMemoryOptions = {}) {
    this.maxSessions = Math.max(1, options.maxSessions ?? DEFAULT_MAX_SESSIONS);
    this.idleTtlMs = options.idleTtlMs ?? DEFAULT_IDLE_TTL_MS;
    this.clock = options.clock ?? systemClock;
  }

  public save(session: Session): Session {
    this.sessions.delete(session.id);
    this.sessions.set(session.id, session);
    this.evict(session.id);
    return session;
  }

  public getSession(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  public mustGetSession(sessionId: string): Session {
    const session = this.getSession(sessionId);

    if (!session) {
      throw sessionNotFound(sessionId);
    }

    return session;
  }

  public listByUser(userId: string): Session[] {
    return [...this.sessions.values()].filter((session) => session.userId === userId);
  }

  public onEvict(listener: SessionEvictionListener): void {
    this.listeners.push(listener);
  }

  private evict(keepId: string): void {
    const now = this.clock.now();

    for (const session of [...this.sessions.values()]) {
      if (session.id !== keepId && now - lastActivity(session) > this.idleTtlMs) {
        this.remove(session, 'idle');
      }
    }

    while (this.sessions.size > this.maxSessions) {
      const candidates = [...this.sessions.values()].filter((session) => session.id !== keepId);
      const victim = candidates.find((session) => session.scored) ?? candidates[0];

      if (!victim) {
        return;
      }

      this.remove(victim, 'capacity');
    }
  }

  private remove(session: Session, reason: 'idle' | 'capacity'): void {
    this.sessions.delete(session.id);
    logger.info('session_evicted', { sessionId: session.id, reason, scored: session.scored, state: session.state });

    for (const listener of this.listeners) {
      try {
        listener(session);
      } catch (error: unknown) {
        logger.error('session_eviction_listener_failed', { sessionId: session.id, error: toErrorMessage(error) });
      }
    }
  }
}

const lastActivity = (session: Session): number => {
  return session.turns[session.turns.length - 1]?.timestamp ?? session.startedAt;
};
