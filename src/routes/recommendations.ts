import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import type { CandidateRecord, NormalizedRecommendations } from '../advisor/candidateTypes.js';
import type { RecommendationOutcome } from '../advisor/recommendationService.js';
import { toPriceBars, toRadarSeries, SCORE_CRITERIA } from '../advisor/score/criteriaScorer.js';
import { AppError } from '../errors/index.js';
import { clearRecommendations } from '../session/advisorSession.js';
import { replyWithError, sessionScope, type AdvisorRouteOptions } from './routeSupport.js';

const recommendationRequestSchema = z.object({
  refresh: z.boolean().default(false),
});

function recommendationBody(result: RecommendationOutcome, cached: boolean) {
  return {
    cached,
    ...(result.upstreamError ? { upstreamError: result.upstreamError } : {}),
    source: result.source,
    confidence: result.confidence,
    records: result.records,
    criteria: SCORE_CRITERIA,
    scores: toRadarSeries(result.records),
    prices: toPriceBars(result.records),
  };
}

function cachedResult(records: CandidateRecord[], source: NormalizedRecommendations['source'] | undefined, confidence: NormalizedRecommendations['confidence'] | undefined): NormalizedRecommendations | null {
  if (records.length === 0 || !source || !confidence) {
    return null;
  }
  return { records, source, confidence };
}

export async function recommendationRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  fastify.post('/v1/sessions/:sessionId/recommendations', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const { refresh } = recommendationRequestSchema.parse(request.body ?? {});
      const session = await scope.load();

      if (!session.preferences) {
        throw AppError.validation('Buyer preferences must be set before requesting recommendations');
      }

      const cached = cachedResult(session.recommendations, session.recommendationSource, session.recommendationConfidence);
      if (cached && !refresh) {
        return reply.send(recommendationBody(cached, true));
      }

      const result = await options.recommendationService.recommend(session.preferences);
      await scope.save({
        ...session,
        recommendations: result.records,
        recommendationSource: result.source,
        recommendationConfidence: result.confidence,
      });

      return reply.send(recommendationBody(result, false));
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.delete('/v1/sessions/:sessionId/recommendations', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const session = await scope.load();
      await scope.save(clearRecommendations(session));
      return reply.status(204).send();
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });
}
