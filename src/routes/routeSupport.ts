import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { ExpertChat } from '../advisor/chat/expertChat.js';
import type { RecommendationService } from '../advisor/recommendationService.js';
import type { TextGenerator } from '../advisor/textGenerator.js';
import { mapError, sanitizeForLogging } from '../errors/index.js';
import { loadOrCreateSession, saveSession } from '../session/advisorSession.js';
import type { ISessionStore } from '../session/ISessionStore.js';
import type { AdvisorSession } from '../session/sessionTypes.js';

export interface AdvisorRouteOptions {
  sessionStore: ISessionStore;
  recommendationService: RecommendationService;
  expertChat: ExpertChat;
  /** Null when no upstream is configured */
  generator: TextGenerator | null;
  sessionTtlSeconds: number;
  maxMessageChars: number;
  debug?: boolean;
  now?: () => Date;
}

export const sessionParamsSchema = z.object({
  sessionId: z.string().trim().min(1).max(128),
});

/**
 * Per-request view of the session: load once, replace as a whole.
 */
export interface SessionScope {
  sessionId: string;
  now: Date;
  load(): Promise<AdvisorSession>;
  save(session: AdvisorSession): Promise<AdvisorSession>;
}

export function sessionScope(request: FastifyRequest, options: AdvisorRouteOptions): SessionScope {
  const { sessionId } = sessionParamsSchema.parse(request.params);
  const now = options.now ? options.now() : new Date();
  return {
    sessionId,
    now,
    load: () => loadOrCreateSession(options.sessionStore, sessionId, options.sessionTtlSeconds, now),
    save: (session) => saveSession(options.sessionStore, sessionId, session, options.sessionTtlSeconds, now),
  };
}

/**
 * Maps, logs and sends any error thrown by a route handler.
 */
export function replyWithError(
  fastify: FastifyInstance,
  request: FastifyRequest,
  reply: FastifyReply,
  error: unknown,
  debug = false
): FastifyReply {
  const appError = mapError(error);

  const logPayload: Record<string, unknown> = {
    msg: 'Request error',
    category: appError.category,
    code: appError.code,
    requestId: request.id,
    httpStatus: appError.httpStatus,
  };

  if (debug && appError.details) {
    logPayload.details = sanitizeForLogging(appError.details);
  }

  if (appError.category === 'VALIDATION' || appError.category === 'NOT_FOUND') {
    fastify.log.warn(logPayload);
  } else {
    fastify.log.error(logPayload);
  }

  return reply.status(appError.httpStatus).send(appError.toPayload(request.id));
}
