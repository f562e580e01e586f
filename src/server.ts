import Fastify from 'fastify';
import cors from '@fastify/cors';
import { config } from './config.js';
import { ExpertChat } from './advisor/chat/expertChat.js';
import { RecommendationService } from './advisor/recommendationService.js';
import type { TextGenerator } from './advisor/textGenerator.js';
import { OpenAiClient } from './openai/OpenAiClient.js';
import { advisorRoutes, healthRoutes } from './routes/index.js';
import { createSessionStore } from './session/sessionStoreFactory.js';

export interface BuildServerOptions {
  /** Overrides the configured upstream; null forces the static path */
  generator?: TextGenerator | null;
}

function configuredGenerator(): TextGenerator | null {
  if (!config.openai.apiKey) {
    return null;
  }
  return new OpenAiClient({ apiKey: config.openai.apiKey, defaultModel: config.openai.model });
}

export async function buildServer(options: BuildServerOptions = {}) {
  const fastify = Fastify({
    logger: {
      level: config.debug ? 'debug' : 'info',
    },
    bodyLimit: config.limits.bodyLimitBytes,
  });

  // Must be registered before routes so preflight OPTIONS requests are handled
  await fastify.register(cors, {
    origin: (origin, callback) => {
      // No origin: curl, server-to-server
      if (!origin) {
        callback(null, true);
        return;
      }
      if (config.cors.origins.includes(origin)) {
        callback(null, true);
        return;
      }
      callback(new Error('Not allowed by CORS'), false);
    },
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
    credentials: false,
  });

  const { store: sessionStore, type: sessionStoreType } = await createSessionStore();
  fastify.log.info(`Session store initialized: ${sessionStoreType}`);

  fastify.addHook('onClose', async () => {
    await sessionStore.close();
    fastify.log.info('Session store closed');
  });

  const generator = options.generator !== undefined ? options.generator : configuredGenerator();
  if (!generator) {
    fastify.log.warn('OPENAI_API_KEY not set - recommendations come from the static catalog, chat is unavailable');
  }

  await fastify.register(healthRoutes, {
    upstreamConfigured: generator !== null,
    sessionStoreType,
  });

  await fastify.register(advisorRoutes, {
    sessionStore,
    generator,
    recommendationService: new RecommendationService(generator, {
      maxTokens: config.openai.recommendationMaxTokens,
    }),
    expertChat: new ExpertChat(generator, {
      maxTokens: config.openai.chatMaxTokens,
    }),
    sessionTtlSeconds: config.session.ttlSeconds,
    maxMessageChars: config.limits.maxMessageChars,
    debug: config.debug,
  });

  return fastify;
}

export async function startServer() {
  const fastify = await buildServer();

  try {
    await fastify.listen({
      port: config.port,
      host: config.host,
    });
    fastify.log.info(`Server listening on port ${config.port}`);
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
}

// Start server if this file is run directly
if (import.meta.url === `file://${process.argv[1]}`) {
  void startServer();
}
