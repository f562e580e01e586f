import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { candidateRecordSchema, type CandidateRecord } from '../candidateTypes.js';
import { extractPriceRange, hasPriceNumber, lakhsToRupees } from '../extract/textAttributes.js';
import { NO_RESULT, type StrategyOutcome } from './fallbackLadder.js';

const catalogSchema = z.object({
  version: z.number().int().positive(),
  candidates: z.array(candidateRecordSchema).min(5),
});

export type FallbackCatalog = z.infer<typeof catalogSchema>;

const CATALOG_URL = new URL('../../../data/fallbackCatalog.json', import.meta.url);

let cachedCatalog: FallbackCatalog | null = null;

/**
 * Loads and validates the hand-curated fallback catalog shipped in data/.
 * The file is read once per process.
 */
export function loadFallbackCatalog(): FallbackCatalog {
  if (!cachedCatalog) {
    const raw: unknown = JSON.parse(readFileSync(fileURLToPath(CATALOG_URL), 'utf8'));
    cachedCatalog = catalogSchema.parse(raw);
  }
  return cachedCatalog;
}

/**
 * Keeps candidates whose lower price bound fits under the ceiling (rupees).
 * A price without any number is kept rather than filtered out.
 */
export function filterByBudget(candidates: CandidateRecord[], budgetCeiling: number | undefined): CandidateRecord[] {
  if (budgetCeiling === undefined) {
    return [...candidates];
  }
  return candidates.filter((candidate) => {
    if (!hasPriceNumber(candidate.price)) {
      return true;
    }
    return lakhsToRupees(extractPriceRange(candidate.price).lower) <= budgetCeiling;
  });
}

/**
 * Tertiary normalization path: the static catalog filtered by budget.
 */
export function selectFallbackCandidates(
  candidates: CandidateRecord[],
  budgetCeiling: number | undefined,
  maxResults: number
): StrategyOutcome<CandidateRecord[]> {
  const selected = filterByBudget(candidates, budgetCeiling).slice(0, maxResults);
  return selected.length > 0 ? selected : NO_RESULT;
}
