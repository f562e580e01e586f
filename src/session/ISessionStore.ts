import type { AdvisorSession } from './sessionTypes.js';

/**
 * Whole-session storage keyed by session id. Sessions go in and come out as
 * complete values; a session past its `expiresAt` reads as missing.
 */
export interface ISessionStore {
  get(sessionId: string): Promise<AdvisorSession | null>;
  set(sessionId: string, session: AdvisorSession): Promise<void>;
  delete(sessionId: string): Promise<void>;
  /** Releases timers and connections */
  close(): Promise<void>;
}
