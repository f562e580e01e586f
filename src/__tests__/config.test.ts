import { describe, it, expect, afterEach, vi, beforeEach } from 'vitest';

const CONFIG_VARS = [
  'PORT',
  'HOST',
  'OPENAI_API_KEY',
  'OPENAI_MODEL',
  'OPENAI_TIMEOUT_MS',
  'OPENAI_MAX_RETRIES',
  'RECOMMENDATION_MAX_TOKENS',
  'CHAT_MAX_TOKENS',
  'SESSION_STORE',
  'SESSION_TTL_SECONDS',
  'REDIS_URL',
  'REDIS_PREFIX',
  'DEBUG',
  'CORS_ORIGINS',
  'BODY_LIMIT_BYTES',
  'MAX_MESSAGE_CHARS',
];

async function loadConfig() {
  const { config } = await import('../config.js');
  return config;
}

describe('config', () => {
  const saved = new Map<string, string | undefined>();

  beforeEach(() => {
    vi.resetModules();
    for (const name of CONFIG_VARS) {
      saved.set(name, process.env[name]);
      delete process.env[name];
    }
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    for (const [name, value] of saved) {
      if (value === undefined) {
        delete process.env[name];
      } else {
        process.env[name] = value;
      }
    }
    vi.resetModules();
  });

  it('should apply defaults and treat an empty API key as unset', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');

    const config = await loadConfig();

    expect(config.port).toBe(3000);
    expect(config.openai.apiKey).toBeUndefined();
    expect(config.openai.model).toBe('gpt-3.5-turbo');
    expect(config.openai.timeoutMs).toBe(120000);
    expect(config.openai.recommendationMaxTokens).toBe(2000);
    expect(config.openai.chatMaxTokens).toBe(800);
    expect(config.session.store).toBe('memory');
    expect(config.session.ttlSeconds).toBe(3600);
    expect(config.session.redis.prefix).toBe('advisor:sess:');
    expect(config.debug).toBe(false);
    expect(config.limits.maxMessageChars).toBe(4000);
  });

  it('should read the API key, debug flag and CORS origins', async () => {
    vi.stubEnv('OPENAI_API_KEY', ' test-secret ');
    vi.stubEnv('DEBUG', 'true');
    vi.stubEnv('CORS_ORIGINS', 'https://advisor.example, ,http://localhost:5173');

    const config = await loadConfig();

    expect(config.openai.apiKey).toBe('test-secret');
    expect(config.debug).toBe(true);
    expect(config.cors.origins).toEqual(['https://advisor.example', 'http://localhost:5173']);
  });

  it('should reject an unknown session store', async () => {
    vi.stubEnv('SESSION_STORE', 'postgres');

    await expect(loadConfig()).rejects.toThrow('Configuration validation failed:\n  - SESSION_STORE:');
  });
});
