import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
dotenvConfig();

/**
 * Schema for validating environment variables.
 * OPENAI_API_KEY is optional: without it the service runs on the static
 * fallback catalog and the expert chat reports itself unavailable.
 */
const configSchema = z.object({
  // Server
  PORT: z.string().default('3000'),
  HOST: z.string().default('0.0.0.0'),

  // OpenAI
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_MODEL: z.string().default('gpt-3.5-turbo'),
  OPENAI_TIMEOUT_MS: z.string().default('120000'),
  OPENAI_MAX_RETRIES: z.string().default('2'),
  RECOMMENDATION_MAX_TOKENS: z.string().default('2000'),
  CHAT_MAX_TOKENS: z.string().default('800'),

  // Session storage configuration
  SESSION_STORE: z.enum(['memory', 'redis']).default('memory'),
  SESSION_TTL_SECONDS: z.string().default('3600'),
  // Redis configuration (required when SESSION_STORE=redis)
  REDIS_URL: z.string().optional(),
  REDIS_PREFIX: z.string().default('advisor:sess:'),

  DEBUG: z.string().default('0'),

  // CORS configuration
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),

  // Request/body limits
  BODY_LIMIT_BYTES: z.string().default('131072'),
  MAX_MESSAGE_CHARS: z.string().default('4000'),
});

/**
 * Parse and validate environment variables.
 * Throws a descriptive error if validation fails.
 */
function parseConfig() {
  try {
    return configSchema.parse({
      PORT: process.env.PORT,
      HOST: process.env.HOST,
      OPENAI_API_KEY: process.env.OPENAI_API_KEY,
      OPENAI_MODEL: process.env.OPENAI_MODEL,
      OPENAI_TIMEOUT_MS: process.env.OPENAI_TIMEOUT_MS,
      OPENAI_MAX_RETRIES: process.env.OPENAI_MAX_RETRIES,
      RECOMMENDATION_MAX_TOKENS: process.env.RECOMMENDATION_MAX_TOKENS,
      CHAT_MAX_TOKENS: process.env.CHAT_MAX_TOKENS,
      SESSION_STORE: process.env.SESSION_STORE,
      SESSION_TTL_SECONDS: process.env.SESSION_TTL_SECONDS,
      REDIS_URL: process.env.REDIS_URL,
      REDIS_PREFIX: process.env.REDIS_PREFIX,
      DEBUG: process.env.DEBUG,
      CORS_ORIGINS: process.env.CORS_ORIGINS,
      BODY_LIMIT_BYTES: process.env.BODY_LIMIT_BYTES,
      MAX_MESSAGE_CHARS: process.env.MAX_MESSAGE_CHARS,
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      const messages = error.issues.map((err) => `  - ${err.path.join('.')}: ${err.message}`);
      throw new Error(`Configuration validation failed:\n${messages.join('\n')}`);
    }
    throw error;
  }
}

const env = parseConfig();

/**
 * Typed configuration object exported for use throughout the application.
 */
export const config = {
  port: parseInt(env.PORT, 10),
  host: env.HOST,

  openai: {
    // Empty string counts as "not configured"
    apiKey: env.OPENAI_API_KEY && env.OPENAI_API_KEY.trim().length > 0 ? env.OPENAI_API_KEY.trim() : undefined,
    model: env.OPENAI_MODEL,
    timeoutMs: parseInt(env.OPENAI_TIMEOUT_MS, 10),
    maxRetries: parseInt(env.OPENAI_MAX_RETRIES, 10),
    recommendationMaxTokens: parseInt(env.RECOMMENDATION_MAX_TOKENS, 10),
    chatMaxTokens: parseInt(env.CHAT_MAX_TOKENS, 10),
  },

  session: {
    store: env.SESSION_STORE,
    ttlSeconds: parseInt(env.SESSION_TTL_SECONDS, 10),
    redis: {
      url: env.REDIS_URL,
      prefix: env.REDIS_PREFIX,
    },
  },

  debug: env.DEBUG === '1' || env.DEBUG === 'true',

  cors: {
    origins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map(origin => origin.trim()).filter(origin => origin.length > 0)
      : ['http://localhost:5173', 'http://127.0.0.1:5173'],
  },

  limits: {
    bodyLimitBytes: parseInt(env.BODY_LIMIT_BYTES, 10),
    maxMessageChars: parseInt(env.MAX_MESSAGE_CHARS, 10),
  },
} as const;

export type Config = typeof config;
