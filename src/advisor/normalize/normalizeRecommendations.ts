import {
  CONFIDENCE_BY_SOURCE,
  MAX_RECOMMENDATIONS,
  type CandidateRecord,
  type NormalizedRecommendations,
  type RecommendationSource,
} from '../candidateTypes.js';
import { NO_RESULT, runFallbackLadder, type FallbackStrategy } from './fallbackLadder.js';
import { parseJsonCandidates } from './parseJsonCandidates.js';
import { parseTextCandidates } from './parseTextCandidates.js';
import { loadFallbackCatalog, selectFallbackCandidates } from './staticCatalog.js';

export interface NormalizeOptions {
  /** Cap on returned records; defaults to MAX_RECOMMENDATIONS */
  maxResults?: number;
  /** Budget ceiling in rupees, applied to the static catalog only */
  budgetCeiling?: number;
  /** Candidates used by the static rung; defaults to the shipped catalog */
  catalog?: CandidateRecord[];
}

interface LadderInput {
  payload: string | null;
  maxResults: number;
  budgetCeiling?: number;
  catalog: CandidateRecord[];
}

type LadderSource = Exclude<RecommendationSource, 'none'>;

// A null payload means the upstream was unavailable: only the catalog rung applies
const NORMALIZATION_LADDER: ReadonlyArray<FallbackStrategy<LadderInput, CandidateRecord[], LadderSource>> = [
  {
    name: 'json',
    attempt: ({ payload, maxResults }) =>
      payload === null ? NO_RESULT : parseJsonCandidates(payload, maxResults),
  },
  {
    name: 'text',
    attempt: ({ payload, maxResults }) =>
      payload === null ? NO_RESULT : parseTextCandidates(payload, maxResults),
  },
  {
    name: 'fallback',
    attempt: ({ catalog, budgetCeiling, maxResults }) =>
      selectFallbackCandidates(catalog, budgetCeiling, maxResults),
  },
];

/**
 * Turns an upstream payload into a validated list of candidate records.
 *
 * Rungs are tried in order: embedded JSON array, line scan for brand
 * names, static catalog filtered by budget. The line scan only runs when no
 * array parses. Pass `null` as the payload when the upstream source is
 * unavailable. Never throws; the worst case is an empty list with source
 * 'none'.
 */
export function normalizeRecommendations(
  payload: string | null,
  options: NormalizeOptions = {}
): NormalizedRecommendations {
  const maxResults = options.maxResults ?? MAX_RECOMMENDATIONS;
  const outcome = runFallbackLadder(NORMALIZATION_LADDER, {
    payload,
    maxResults,
    budgetCeiling: options.budgetCeiling,
    catalog: options.catalog ?? loadFallbackCatalog().candidates,
  });

  // A parsed array whose entries were all dropped is an empty answer, not a parse failure
  if (!outcome || outcome.result.length === 0) {
    return { records: [], source: 'none', confidence: CONFIDENCE_BY_SOURCE.none };
  }

  return {
    records: outcome.result,
    source: outcome.strategy,
    confidence: CONFIDENCE_BY_SOURCE[outcome.strategy],
  };
}
