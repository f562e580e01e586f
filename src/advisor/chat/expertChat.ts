import pino from 'pino';
import { mapError, type ErrorCode } from '../../errors/index.js';
import type { BuyerPreferences } from '../preferences/buyerPreferences.js';
import { buildExpertSystemPrompt } from '../preferences/prompts.js';
import { recentHistory, type ChatExchange, type TextGenerator } from '../textGenerator.js';

const logger = pino({ name: 'ExpertChat' });

export const CHAT_UNAVAILABLE_REPLY =
  "I'm sorry, I'm currently unavailable. Please try again later or contact support.";

/**
 * Exchanges kept in the session; older ones are dropped on append.
 */
export const MAX_STORED_EXCHANGES = 50;

export function chatFailureReply(reason: string): string {
  return `I apologize, but I encountered an error. ${reason} Please try asking your question in a different way.`;
}

export interface ChatReply {
  reply: string;
  /** False when the reply is one of the fixed fallback texts */
  generated: boolean;
  /** Set when the generator call failed */
  errorCode?: ErrorCode;
  history: ChatExchange[];
}

type ChatAnswer = Omit<ChatReply, 'history'>;

export interface ExpertChatOptions {
  maxTokens: number;
  temperature?: number;
}

/**
 * Consultant chat over the text generator. Every call yields a reply;
 * the exchange is appended to the returned history either way, keeping the
 * last {@link MAX_STORED_EXCHANGES}.
 */
export class ExpertChat {
  constructor(
    private readonly generator: TextGenerator | null,
    private readonly options: ExpertChatOptions
  ) {}

  async reply(message: string, history: ChatExchange[], preferences?: BuyerPreferences): Promise<ChatReply> {
    const answer = await this.answer(message, history, preferences);
    return {
      ...answer,
      history: [...history, { user: message, assistant: answer.reply }].slice(-MAX_STORED_EXCHANGES),
    };
  }

  private async answer(
    message: string,
    history: ChatExchange[],
    preferences?: BuyerPreferences
  ): Promise<ChatAnswer> {
    if (!this.generator) {
      return { reply: CHAT_UNAVAILABLE_REPLY, generated: false };
    }

    try {
      const reply = await this.generator.generate({
        systemPrompt: buildExpertSystemPrompt(preferences),
        prompt: message,
        history: recentHistory(history),
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature ?? 0.7,
      });
      return { reply, generated: true };
    } catch (error) {
      const appError = mapError(error);
      logger.error({ category: appError.category, code: appError.code }, 'Chat request failed');
      return { reply: chatFailureReply(appError.safeMessage), generated: false, errorCode: appError.code };
    }
  }
}
