import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { replyWithError, sessionScope, type AdvisorRouteOptions } from './routeSupport.js';

export async function chatRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  const chatRequestSchema = z.object({
    message: z.string().trim().min(1, 'message is required').max(options.maxMessageChars, `message exceeds ${options.maxMessageChars} characters`),
  });

  fastify.post('/v1/sessions/:sessionId/chat', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const { message } = chatRequestSchema.parse(request.body);
      const session = await scope.load();

      const result = await options.expertChat.reply(message, session.chatHistory, session.preferences);
      await scope.save({ ...session, chatHistory: result.history });

      return reply.send({
        reply: result.reply,
        generated: result.generated,
        ...(result.errorCode ? { errorCode: result.errorCode } : {}),
        exchanges: result.history.length,
      });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.delete('/v1/sessions/:sessionId/chat', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const session = await scope.load();
      await scope.save({ ...session, chatHistory: [] });
      return reply.status(204).send();
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });
}
