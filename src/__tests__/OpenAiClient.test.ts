import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockCreate = vi.hoisted(() => vi.fn());
const MockOpenAIConstructor = vi.hoisted(() => vi.fn());

vi.mock('openai', () => {
  return {
    default: class MockOpenAI {
      chat = {
        completions: {
          create: mockCreate,
        },
      };
      constructor(...args: unknown[]) {
        MockOpenAIConstructor(...args);
      }
    },
  };
});

vi.mock('../config.js', () => ({
  config: {
    openai: {
      apiKey: 'test-api-key',
      model: 'gpt-3.5-turbo',
      timeoutMs: 120000,
      maxRetries: 2,
    },
    debug: false,
  },
}));

import { OpenAiClient } from '../openai/OpenAiClient.js';

function completion(content: string | null) {
  return {
    choices: [{ message: { role: 'assistant', content }, finish_reason: 'stop' }],
  };
}

describe('OpenAiClient', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('constructor', () => {
    it('should create OpenAI client with provided API key and timeout/retry config', () => {
      new OpenAiClient({ apiKey: 'test-api-key' });

      expect(MockOpenAIConstructor).toHaveBeenCalledWith({
        apiKey: 'test-api-key',
        timeout: 120000,
        maxRetries: 2,
      });
    });
  });

  describe('toMessages', () => {
    it('should place history between the system prompt and the new prompt', () => {
      const messages = OpenAiClient.toMessages({
        systemPrompt: 'You are a car consultant.',
        prompt: 'And for highways?',
        history: [{ user: 'City car?', assistant: 'A hatchback.' }],
      });

      expect(messages).toEqual([
        { role: 'system', content: 'You are a car consultant.' },
        { role: 'user', content: 'City car?' },
        { role: 'assistant', content: 'A hatchback.' },
        { role: 'user', content: 'And for highways?' },
      ]);
    });
  });

  describe('generate', () => {
    it('should use default model gpt-3.5-turbo when not specified', async () => {
      mockCreate.mockResolvedValueOnce(completion('Hello'));
      const client = new OpenAiClient({ apiKey: 'test-api-key' });

      const text = await client.generate({ systemPrompt: 'sys', prompt: 'hi', maxTokens: 800, temperature: 0.7 });

      expect(text).toBe('Hello');
      expect(mockCreate).toHaveBeenCalledWith({
        model: 'gpt-3.5-turbo',
        messages: [
          { role: 'system', content: 'sys' },
          { role: 'user', content: 'hi' },
        ],
        max_tokens: 800,
        temperature: 0.7,
      });
    });

    it('should use the configured model', async () => {
      mockCreate.mockResolvedValueOnce(completion('ok'));
      const client = new OpenAiClient({ apiKey: 'test-api-key', defaultModel: 'gpt-4o-mini' });

      await client.generate({ systemPrompt: 'sys', prompt: 'hi' });

      expect(mockCreate.mock.calls[0][0]).toMatchObject({ model: 'gpt-4o-mini' });
    });

    it('should reject an empty completion', async () => {
      mockCreate.mockResolvedValueOnce(completion(null));
      const client = new OpenAiClient({ apiKey: 'test-api-key' });

      await expect(client.generate({ systemPrompt: 'sys', prompt: 'hi' })).rejects.toThrow(
        'OpenAI returned an empty completion'
      );
    });

    it('should rethrow SDK errors', async () => {
      const sdkError = new Error('Rate limit reached');
      sdkError.name = 'RateLimitError';
      mockCreate.mockRejectedValueOnce(sdkError);
      const client = new OpenAiClient({ apiKey: 'test-api-key' });

      await expect(client.generate({ systemPrompt: 'sys', prompt: 'hi' })).rejects.toBe(sdkError);
    });
  });
});
