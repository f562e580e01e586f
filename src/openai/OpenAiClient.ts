import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { config } from '../config.js';
import pino from 'pino';
import type { GenerateRequest, TextGenerator } from '../advisor/textGenerator.js';

const logger = pino({ name: 'OpenAiClient' });

export interface OpenAiClientOptions {
  apiKey: string;
  defaultModel?: string;
}

/**
 * Thin wrapper around the OpenAI SDK implementing TextGenerator.
 *
 * Timeout and retry are delegated to the SDK (OPENAI_TIMEOUT_MS,
 * OPENAI_MAX_RETRIES). Errors are logged and rethrown; the caller owns
 * the fallback.
 */
export class OpenAiClient implements TextGenerator {
  private readonly client: OpenAI;
  private readonly defaultModel: string;

  constructor(options: OpenAiClientOptions) {
    this.client = new OpenAI({
      apiKey: options.apiKey,
      timeout: config.openai.timeoutMs,
      maxRetries: config.openai.maxRetries,
    });
    this.defaultModel = options.defaultModel ?? 'gpt-3.5-turbo';

    if (config.debug) {
      logger.debug({
        timeoutMs: config.openai.timeoutMs,
        maxRetries: config.openai.maxRetries,
        model: this.defaultModel,
      }, 'OpenAI client initialized');
    }
  }

  /**
   * Builds the message list: system prompt, prior exchanges as
   * user/assistant pairs, then the new prompt.
   */
  static toMessages(request: GenerateRequest): ChatCompletionMessageParam[] {
    const messages: ChatCompletionMessageParam[] = [{ role: 'system', content: request.systemPrompt }];
    for (const exchange of request.history ?? []) {
      messages.push({ role: 'user', content: exchange.user });
      messages.push({ role: 'assistant', content: exchange.assistant });
    }
    messages.push({ role: 'user', content: request.prompt });
    return messages;
  }

  async generate(request: GenerateRequest): Promise<string> {
    const startTime = Date.now();

    try {
      const response = await this.client.chat.completions.create({
        model: this.defaultModel,
        messages: OpenAiClient.toMessages(request),
        max_tokens: request.maxTokens,
        temperature: request.temperature,
      });

      const content = response.choices[0]?.message?.content;

      if (config.debug) {
        logger.debug({
          elapsedMs: Date.now() - startTime,
          finishReason: response.choices[0]?.finish_reason,
        }, 'OpenAI request completed');
      }

      if (typeof content !== 'string' || content.length === 0) {
        throw new Error('OpenAI returned an empty completion');
      }

      return content;
    } catch (error) {
      // Log error details without sensitive data
      const errorInfo = error instanceof Error ? {
        name: error.name,
        message: error.message,
      } : { message: String(error) };

      logger.error({
        elapsedMs: Date.now() - startTime,
        configuredTimeoutMs: config.openai.timeoutMs,
        error: errorInfo,
      }, 'OpenAI request failed');

      throw error;
    }
  }
}
