import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { replyWithError, sessionScope, type AdvisorRouteOptions } from './routeSupport.js';

export async function sessionRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  // Ends the visit: preferences, shortlist, submitted reviews and chat all go
  fastify.delete('/v1/sessions/:sessionId', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      await options.sessionStore.delete(scope.sessionId);
      return reply.status(204).send();
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });
}
