import pino from 'pino';
import { mapError, type ErrorCode } from '../../errors/index.js';
import { buildSentimentPrompt, SENTIMENT_SYSTEM_PROMPT } from '../preferences/prompts.js';
import type { TextGenerator } from '../textGenerator.js';

const logger = pino({ name: 'sentiment' });

export type Sentiment = 'positive' | 'neutral';

export interface SentimentResult {
  sentiment: Sentiment;
  confidence: number;
  analysis: string;
  /** Set when the generator call failed */
  errorCode?: ErrorCode;
}

const SENTIMENT_MAX_TOKENS = 300;

/**
 * Coarse sentiment of a review as judged by the generator. Positive only
 * when the reply mentions "positive"; never rejects.
 */
export async function analyzeReviewSentiment(
  reviewText: string,
  generator: TextGenerator | null
): Promise<SentimentResult> {
  if (!generator) {
    return { sentiment: 'neutral', confidence: 0.5, analysis: 'Analysis unavailable' };
  }

  try {
    const analysis = await generator.generate({
      systemPrompt: SENTIMENT_SYSTEM_PROMPT,
      prompt: buildSentimentPrompt(reviewText),
      maxTokens: SENTIMENT_MAX_TOKENS,
      temperature: 0.3,
    });
    return {
      sentiment: analysis.toLowerCase().includes('positive') ? 'positive' : 'neutral',
      confidence: 0.8,
      analysis,
    };
  } catch (error) {
    const appError = mapError(error);
    logger.warn({ category: appError.category, code: appError.code }, 'Sentiment analysis failed');
    return {
      sentiment: 'neutral',
      confidence: 0.5,
      analysis: `Analysis failed: ${appError.safeMessage}`,
      errorCode: appError.code,
    };
  }
}
