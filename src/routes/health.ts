import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';

export interface HealthRouteOptions {
  upstreamConfigured: boolean;
  sessionStoreType: 'memory' | 'redis';
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRouteOptions) {
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
      upstream: options.upstreamConfigured ? 'configured' : 'unavailable',
      sessionStore: options.sessionStoreType,
    });
  });
}
