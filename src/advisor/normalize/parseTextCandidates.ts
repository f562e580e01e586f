import type { CandidateRecord } from '../candidateTypes.js';
import { NO_RESULT, type StrategyOutcome } from './fallbackLadder.js';

/**
 * Brand tokens that mark the start of a new candidate in free text.
 * Lines naming other brands are not recognized as candidate boundaries.
 */
export const LINE_BRAND_TOKENS = ['MARUTI', 'HYUNDAI', 'TATA', 'HONDA', 'TOYOTA'] as const;

/**
 * Placeholder details for candidates recovered from free text. Only the
 * identity fields come from the payload.
 */
export const TEXT_CANDIDATE_PLACEHOLDERS = {
  price: 'Contact dealer for pricing',
  why_suitable: 'Recommended based on your preferences',
  key_features: ['Feature information pending'],
  pros: ['Professional recommendation'],
  cons: ['Please verify specifications'],
  senior_friendly_rating: 8,
  fuel_efficiency: '15-20 kmpl',
  safety_rating: 'Good',
  maintenance_cost: 'Medium',
} as const;

function mentionsKnownBrand(line: string): boolean {
  const upper = line.toUpperCase();
  return LINE_BRAND_TOKENS.some((token) => upper.includes(token));
}

function placeholderCandidate(line: string): CandidateRecord {
  return {
    model: line,
    brand: line.split(/\s+/)[0] ?? 'Unknown',
    price: TEXT_CANDIDATE_PLACEHOLDERS.price,
    why_suitable: TEXT_CANDIDATE_PLACEHOLDERS.why_suitable,
    key_features: [...TEXT_CANDIDATE_PLACEHOLDERS.key_features],
    pros: [...TEXT_CANDIDATE_PLACEHOLDERS.pros],
    cons: [...TEXT_CANDIDATE_PLACEHOLDERS.cons],
    senior_friendly_rating: TEXT_CANDIDATE_PLACEHOLDERS.senior_friendly_rating,
    fuel_efficiency: TEXT_CANDIDATE_PLACEHOLDERS.fuel_efficiency,
    safety_rating: TEXT_CANDIDATE_PLACEHOLDERS.safety_rating,
    maintenance_cost: TEXT_CANDIDATE_PLACEHOLDERS.maintenance_cost,
  };
}

/**
 * Secondary normalization path: a line scan for brand mentions.
 *
 * Every non-empty line that mentions a known brand starts a new candidate
 * (flushing the previous one); the line becomes the model and its first
 * word the brand. Output is structurally complete but lower confidence.
 */
export function parseTextCandidates(payload: string, maxResults: number): StrategyOutcome<CandidateRecord[]> {
  const records: CandidateRecord[] = [];
  let current: CandidateRecord | null = null;

  for (const rawLine of payload.split('\n')) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }

    if (mentionsKnownBrand(line)) {
      if (current) {
        records.push(current);
      }
      current = placeholderCandidate(line);
    }
  }

  if (current) {
    records.push(current);
  }

  if (records.length === 0) {
    return NO_RESULT;
  }

  return records.slice(0, maxResults);
}
