import type { ISessionStore } from './ISessionStore.js';
import type { AdvisorSession } from './sessionTypes.js';

export interface InMemorySessionStoreOptions {
  cleanupIntervalSeconds?: number;
}

/**
 * Process-local store. Sessions are copied on the way in and out, so a
 * caller holding a session never shares state with the store.
 */
export class InMemorySessionStore implements ISessionStore {
  private readonly sessions = new Map<string, AdvisorSession>();
  private cleanupTimer: ReturnType<typeof setInterval> | null;

  constructor(options: InMemorySessionStoreOptions = {}) {
    const cleanupIntervalMs = (options.cleanupIntervalSeconds ?? 60) * 1000;
    this.cleanupTimer = setInterval(() => this.evictExpired(Date.now()), cleanupIntervalMs);
    this.cleanupTimer.unref();
  }

  async get(sessionId: string): Promise<AdvisorSession | null> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      return null;
    }
    if (Date.now() >= session.expiresAt) {
      this.sessions.delete(sessionId);
      return null;
    }
    return structuredClone(session);
  }

  async set(sessionId: string, session: AdvisorSession): Promise<void> {
    this.sessions.set(sessionId, structuredClone(session));
  }

  async delete(sessionId: string): Promise<void> {
    this.sessions.delete(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  async close(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    this.sessions.clear();
  }

  private evictExpired(nowMs: number): void {
    for (const [sessionId, session] of this.sessions) {
      if (nowMs >= session.expiresAt) {
        this.sessions.delete(sessionId);
      }
    }
  }
}
