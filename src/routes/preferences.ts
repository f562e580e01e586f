import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { buyerPreferencesSchema, summarizePreferences } from '../advisor/preferences/buyerPreferences.js';
import { AppError } from '../errors/index.js';
import { clearRecommendations } from '../session/advisorSession.js';
import { replyWithError, sessionScope, type AdvisorRouteOptions } from './routeSupport.js';

export async function preferencesRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  fastify.put('/v1/sessions/:sessionId/preferences', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const preferences = buyerPreferencesSchema.parse(request.body);
      const session = await scope.load();

      await scope.save({ ...clearRecommendations(session), preferences });

      return reply.send({ preferences, summary: summarizePreferences(preferences) });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.get('/v1/sessions/:sessionId/preferences', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const session = await scope.load();
      if (!session.preferences) {
        throw AppError.notFound('Preferences', scope.sessionId);
      }
      return reply.send({ preferences: session.preferences, summary: summarizePreferences(session.preferences) });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });
}
