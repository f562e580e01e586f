import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { categoryAverages, rankCategories, rollupReviewsByBrand, summarizeRatings } from '../advisor/aggregate/aggregation.js';
import { markHelpful, reviewsForCar, submitReview } from '../advisor/reviews/reviewBook.js';
import { reviewSubmissionSchema } from '../advisor/reviews/reviewTypes.js';
import { reviewQuerySchema, searchReviews } from '../advisor/reviews/searchReviews.js';
import { analyzeReviewSentiment } from '../advisor/reviews/sentiment.js';
import { AppError } from '../errors/index.js';
import { replyWithError, sessionScope, type AdvisorRouteOptions } from './routeSupport.js';

const analyticsQuerySchema = z
  .object({
    brand: z.string().trim().min(1).optional(),
    model: z.string().trim().min(1).optional(),
  })
  .refine((query) => (query.brand === undefined) === (query.model === undefined), {
    message: 'brand and model must be given together',
  });

const reviewIdParamsSchema = z.object({
  id: z.coerce.number().int().positive(),
});

export async function reviewRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  fastify.get('/v1/sessions/:sessionId/reviews', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const query = reviewQuerySchema.parse(request.query);
      const session = await scope.save(await scope.load());

      const reviews = searchReviews(session.reviewLedger.reviews, query, scope.now);
      return reply.send({ count: reviews.length, reviews });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.post('/v1/sessions/:sessionId/reviews', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const submission = reviewSubmissionSchema.parse(request.body);
      const session = await scope.load();

      const { ledger, review } = submitReview(session.reviewLedger, submission, scope.now);
      await scope.save({ ...session, reviewLedger: ledger });

      const sentiment = await analyzeReviewSentiment(review.review_text, options.generator);
      return reply.status(201).send({ review, sentiment });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.get('/v1/sessions/:sessionId/reviews/analytics', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const { brand, model } = analyticsQuerySchema.parse(request.query);
      const session = await scope.save(await scope.load());

      const reviews = brand !== undefined && model !== undefined
        ? reviewsForCar(session.reviewLedger, brand, model)
        : session.reviewLedger.reviews;
      const categories = categoryAverages(reviews);
      const ranked = rankCategories(categories);

      return reply.send({
        summary: summarizeRatings(reviews),
        brands: rollupReviewsByBrand(reviews),
        categories,
        topCategory: ranked[0] ?? null,
        bottomCategory: ranked.length > 0 ? ranked[ranked.length - 1] : null,
      });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });

  fastify.post('/v1/sessions/:sessionId/reviews/:id/helpful', async (request: FastifyRequest, reply: FastifyReply) => {
    try {
      const scope = sessionScope(request, options);
      const { id } = reviewIdParamsSchema.parse(request.params);
      const session = await scope.load();

      const result = markHelpful(session.reviewLedger, id);
      if (!result) {
        throw AppError.notFound('Review', id);
      }

      await scope.save({ ...session, reviewLedger: result.ledger });
      return reply.send({ review: result.review });
    } catch (error) {
      return replyWithError(fastify, request, reply, error, options.debug);
    }
  });
}
