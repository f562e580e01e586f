/**
 * Boundary to the upstream text-generation service.
 */

/**
 * One prior request/response pair in a conversation.
 */
export interface ChatExchange {
  user: string;
  assistant: string;
}

/**
 * Callers keep at most this many prior exchanges in a request.
 */
export const MAX_HISTORY_EXCHANGES = 10;

export interface GenerateRequest {
  systemPrompt: string;
  prompt: string;
  history?: ChatExchange[];
  maxTokens?: number;
  temperature?: number;
}

/**
 * Text in, text out. Implementations reject on failure; callers decide
 * what the fallback is.
 */
export interface TextGenerator {
  generate(request: GenerateRequest): Promise<string>;
}

export function recentHistory(history: ChatExchange[], limit: number = MAX_HISTORY_EXCHANGES): ChatExchange[] {
  return limit > 0 ? history.slice(-limit) : [];
}
