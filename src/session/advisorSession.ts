import { createSeedLedger } from '../advisor/reviews/reviewBook.js';
import type { ISessionStore } from './ISessionStore.js';
import type { AdvisorSession } from './sessionTypes.js';

/**
 * A fresh session: no preferences, nothing shortlisted, the seed reviews.
 */
export function createAdvisorSession(now: Date, ttlSeconds: number): AdvisorSession {
  const nowMs = now.getTime();
  return {
    recommendations: [],
    comparison: [],
    reviewLedger: createSeedLedger(now),
    chatHistory: [],
    updatedAt: nowMs,
    expiresAt: nowMs + ttlSeconds * 1000,
  };
}

export async function loadOrCreateSession(
  store: ISessionStore,
  sessionId: string,
  ttlSeconds: number,
  now: Date
): Promise<AdvisorSession> {
  const existing = await store.get(sessionId);
  return existing ?? createAdvisorSession(now, ttlSeconds);
}

/**
 * Stores the session as a whole, sliding its expiry forward.
 */
export async function saveSession(
  store: ISessionStore,
  sessionId: string,
  session: AdvisorSession,
  ttlSeconds: number,
  now: Date
): Promise<AdvisorSession> {
  const nowMs = now.getTime();
  const saved = { ...session, updatedAt: nowMs, expiresAt: nowMs + ttlSeconds * 1000 };
  await store.set(sessionId, saved);
  return saved;
}

/**
 * Drops the recommendation list together with its provenance.
 */
export function clearRecommendations(session: AdvisorSession): AdvisorSession {
  const { recommendationSource: _source, recommendationConfidence: _confidence, ...rest } = session;
  return { ...rest, recommendations: [] };
}
