import pino from 'pino';
import { config } from '../config.js';
import type { ISessionStore } from './ISessionStore.js';
import { InMemorySessionStore } from './InMemorySessionStore.js';
import { RedisSessionStore } from './RedisSessionStore.js';

const logger = pino({ name: 'SessionStore' });

export type SessionSettings = Pick<typeof config.session, 'store' | 'redis'>;

export interface SessionStoreFactoryResult {
  store: ISessionStore;
  type: SessionSettings['store'];
}

/**
 * Builds the store named by SESSION_STORE. A Redis store must answer a ping
 * before it is handed out. The caller owns the store and closes it.
 */
export async function createSessionStore(settings: SessionSettings = config.session): Promise<SessionStoreFactoryResult> {
  if (settings.store === 'redis') {
    const redisUrl = settings.redis.url;
    if (!redisUrl) {
      throw new Error(
        'SESSION_STORE=redis requires REDIS_URL to be set. ' +
        'Example: REDIS_URL=redis://localhost:6379'
      );
    }

    const redisStore = new RedisSessionStore({ redisUrl, prefix: settings.redis.prefix });

    if (!(await redisStore.ping())) {
      await redisStore.close();
      throw new Error(
        `Failed to connect to Redis at ${redisUrl}. ` +
        'Ensure Redis is running and the URL is correct.'
      );
    }

    logger.info({ prefix: settings.redis.prefix }, 'Using Redis session store');
    return { store: redisStore, type: 'redis' };
  }

  logger.info('Using in-memory session store');
  return { store: new InMemorySessionStore(), type: 'memory' };
}
