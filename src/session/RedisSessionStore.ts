import { Redis } from 'ioredis';
import pino from 'pino';
import type { ISessionStore } from './ISessionStore.js';
import { advisorSessionSchema, type AdvisorSession } from './sessionTypes.js';

const logger = pino({ name: 'RedisSessionStore' });

export interface RedisSessionStoreOptions {
  redisUrl: string;
  prefix?: string;
}

export const DEFAULT_REDIS_PREFIX = 'advisor:sess:';

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export class RedisSessionStore implements ISessionStore {
  private readonly redis: Redis;
  private readonly prefix: string;

  constructor(options: RedisSessionStoreOptions) {
    this.redis = new Redis(options.redisUrl, {
      lazyConnect: false,
      maxRetriesPerRequest: 3,
      retryStrategy: (times: number) => {
        if (times > 3) {
          return null;
        }
        return Math.min(times * 100, 3000);
      },
    });
    this.prefix = options.prefix ?? DEFAULT_REDIS_PREFIX;

    this.redis.on('error', (err: Error) => {
      logger.error({ error: err.message }, 'Redis connection error');
    });
  }

  private getFullKey(key: string): string {
    return `${this.prefix}${key}`;
  }

  async get(key: string): Promise<AdvisorSession | null> {
    const fullKey = this.getFullKey(key);
    try {
      const raw = await this.redis.get(fullKey);
      if (!raw) {
        return null;
      }

      let session: AdvisorSession;
      try {
        session = advisorSessionSchema.parse(JSON.parse(raw));
      } catch (parseError) {
        logger.error(
          { key: fullKey, error: errorMessage(parseError) },
          'Failed to parse session, deleting poisoned entry'
        );
        await this.redis.del(fullKey);
        return null;
      }

      if (Date.now() >= session.expiresAt) {
        await this.delete(key);
        return null;
      }
      return session;
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to get session');
      throw error;
    }
  }

  /**
   * Writes the session with a key expiry matching its own `expiresAt`.
   */
  async set(key: string, state: AdvisorSession): Promise<void> {
    const fullKey = this.getFullKey(key);
    const ttlMs = Math.max(1, state.expiresAt - Date.now());
    try {
      await this.redis.set(fullKey, JSON.stringify(state), 'PX', ttlMs);
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to set session');
      throw error;
    }
  }

  async delete(key: string): Promise<void> {
    const fullKey = this.getFullKey(key);
    try {
      await this.redis.del(fullKey);
    } catch (error) {
      logger.error({ key: fullKey, error: errorMessage(error) }, 'Failed to delete session');
      throw error;
    }
  }

  async close(): Promise<void> {
    try {
      await this.redis.quit();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to disconnect from Redis');
    }
  }

  async ping(): Promise<boolean> {
    try {
      const result = await this.redis.ping();
      return result === 'PONG';
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Redis ping failed');
      return false;
    }
  }
}
