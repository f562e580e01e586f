import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { candidateKey } from '../advisor/candidateTypes.js';
import { buildComparisonReport } from '../advisor/compare/buildComparisonReport.js';
import { addToComparison, findCandidate, removeFromComparison } from '../advisor/compare/comparisonSet.js';
import { AppError } from '../errors/index.js';
import { replyWithError, sessionScope, type AdvisorRouteOptions } from './routeSupport.js';

const addComparisonSchema = z.object({
  brand: z.string().trim().min(1),
  model: z.string().trim().min(1),
});

const comparisonKeyParamsSchema = z.object({
  key: z.string().min(1),
});

export async function comparisonRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  fastify.post('/v1/sessions/:sessionId/comparison', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const { brand, model } = addComparisonSchema.parse(request.body);
      const session = await scope.load();

      const candidate = findCandidate(session.recommendations, brand, model);
      if (!candidate) {
        throw AppError.notFound('Recommendation', `${brand} ${model}`);
      }

      const { comparison, added } = addToComparison(session.comparison, candidate);
      if (added) {
        await scope.save({ ...session, comparison });
      }

      return reply.send({ added, key: candidateKey(candidate), count: comparison.length });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.get('/v1/sessions/:sessionId/comparison', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const session = await scope.load();
      return reply.send(buildComparisonReport(session.comparison));
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.delete('/v1/sessions/:sessionId/comparison/:key', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const { key } = comparisonKeyParamsSchema.parse(request.params);
      const session = await scope.load();

      const comparison = removeFromComparison(session.comparison, key);
      if (comparison.length === session.comparison.length) {
        throw AppError.notFound('Comparison entry', key);
      }

      await scope.save({ ...session, comparison });
      return reply.send({ removed: key, count: comparison.length });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.delete('/v1/sessions/:sessionId/comparison', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const session = await scope.load();
      await scope.save({ ...session, comparison: [] });
      return reply.status(204).send();
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });
}
