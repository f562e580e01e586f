import pino from 'pino';
import { mapError, type ErrorCode } from '../errors/index.js';
import type { NormalizedRecommendations } from './candidateTypes.js';
import { normalizeRecommendations } from './normalize/normalizeRecommendations.js';
import type { BuyerPreferences } from './preferences/buyerPreferences.js';
import { buildRecommendationPrompt, RECOMMENDATION_SYSTEM_PROMPT } from './preferences/prompts.js';
import type { TextGenerator } from './textGenerator.js';

const logger = pino({ name: 'RecommendationService' });

export interface RecommendationServiceOptions {
  maxTokens: number;
  temperature?: number;
}

const DEFAULT_TEMPERATURE = 0.7;

export interface RecommendationOutcome extends NormalizedRecommendations {
  /** Set when the generator call failed and the catalog answered instead */
  upstreamError?: ErrorCode;
}

type PayloadResult = { payload: string | null; upstreamError?: ErrorCode };

/**
 * Asks the generator for recommendations and normalizes whatever comes back.
 *
 * A missing generator or a failed call is treated as "upstream unavailable":
 * the normalizer then answers from the static catalog, capped at the buyer's
 * budget. This never rejects.
 */
export class RecommendationService {
  constructor(
    private readonly generator: TextGenerator | null,
    private readonly options: RecommendationServiceOptions
  ) {}

  async recommend(prefs: BuyerPreferences): Promise<RecommendationOutcome> {
    const { payload, upstreamError } = await this.fetchPayload(prefs);
    const normalized = normalizeRecommendations(payload, { budgetCeiling: prefs.budget_max });

    logger.info({
      source: normalized.source,
      confidence: normalized.confidence,
      count: normalized.records.length,
    }, 'Recommendations normalized');

    return upstreamError ? { ...normalized, upstreamError } : normalized;
  }

  private async fetchPayload(prefs: BuyerPreferences): Promise<PayloadResult> {
    if (!this.generator) {
      logger.warn('No text generator configured; using static catalog');
      return { payload: null };
    }

    try {
      const payload = await this.generator.generate({
        systemPrompt: RECOMMENDATION_SYSTEM_PROMPT,
        prompt: buildRecommendationPrompt(prefs),
        maxTokens: this.options.maxTokens,
        temperature: this.options.temperature ?? DEFAULT_TEMPERATURE,
      });
      return { payload };
    } catch (error) {
      const appError = mapError(error);
      logger.error({
        category: appError.category,
        code: appError.code,
      }, 'Recommendation request failed; using static catalog');
      return { payload: null, upstreamError: appError.code };
    }
  }
}
