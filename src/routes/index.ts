import type { FastifyInstance } from 'fastify';
import { chatRoutes } from './chat.js';
import { comparisonRoutes } from './comparison.js';
import { preferencesRoutes } from './preferences.js';
import { recommendationRoutes } from './recommendations.js';
import { reviewRoutes } from './reviews.js';
import { sessionRoutes } from './session.js';
import type { AdvisorRouteOptions } from './routeSupport.js';

export { healthRoutes, type HealthRouteOptions } from './health.js';
export type { AdvisorRouteOptions } from './routeSupport.js';

export async function advisorRoutes(fastify: FastifyInstance, options: AdvisorRouteOptions) {
  await fastify.register(preferencesRoutes, options);
  await fastify.register(recommendationRoutes, options);
  await fastify.register(comparisonRoutes, options);
  await fastify.register(reviewRoutes, options);
  await fastify.register(chatRoutes, options);
  await fastify.register(sessionRoutes, options);
}
