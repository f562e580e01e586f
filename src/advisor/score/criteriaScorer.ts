import { candidateKey, type CandidateRecord } from '../candidateTypes.js';
import { extractFirstInteger, priceMidpoint } from '../extract/textAttributes.js';

/**
 * Radar criteria, in vector order.
 */
export const SCORE_CRITERIA = [
  'Safety Rating',
  'Senior Friendly',
  'Fuel Efficiency',
  'Value for Money',
  'Comfort Level',
  'Ease of Use',
  'Feature Richness',
] as const;

export type ScoreCriterion = (typeof SCORE_CRITERIA)[number];

/**
 * One bounded [0, 10] score per criterion, in SCORE_CRITERIA order.
 */
export type ScoreVector = [number, number, number, number, number, number, number];

export const SCORE_MIN = 0;
export const SCORE_MAX = 10;

const DEFAULT_SENIOR_FRIENDLY = 5;
const DEFAULT_FUEL_EFFICIENCY = 15;

// Mileage domain mapped linearly onto the score range
const FUEL_EFFICIENCY_FLOOR = 5;
const FUEL_EFFICIENCY_CEILING = 25;

const COMFORT_BASE = 6;
const COMFORT_KEYWORDS = ['comfortable', 'spacious', 'luxury', 'smooth', 'refined'] as const;

const EASE_BASE = 7;

/** Safety rules, checked in order; first match wins. */
const SAFETY_RULES: ReadonlyArray<{ tokens: readonly string[]; score: number }> = [
  { tokens: ['5', 'excellent'], score: 10 },
  { tokens: ['4', 'good'], score: 8 },
  { tokens: ['3', 'average'], score: 6 },
];
const SAFETY_DEFAULT = 5;

export function clampScore(value: number): number {
  if (!Number.isFinite(value)) {
    return SCORE_MIN;
  }
  return Math.min(SCORE_MAX, Math.max(SCORE_MIN, value));
}

export function scoreSafety(safetyRating: string | undefined): number {
  const text = (safetyRating ?? '').toLowerCase();
  const rule = SAFETY_RULES.find(({ tokens }) => tokens.some((token) => text.includes(token)));
  return rule ? rule.score : SAFETY_DEFAULT;
}

export function scoreFuelEfficiency(fuelEfficiency: string | undefined): number {
  const kmpl = extractFirstInteger(fuelEfficiency, DEFAULT_FUEL_EFFICIENCY);
  const span = FUEL_EFFICIENCY_CEILING - FUEL_EFFICIENCY_FLOOR;
  return clampScore(((kmpl - FUEL_EFFICIENCY_FLOOR) / span) * SCORE_MAX);
}

export function scoreComfort(whySuitable: string): number {
  const text = whySuitable.toLowerCase();
  const hits = COMFORT_KEYWORDS.filter((keyword) => text.includes(keyword)).length;
  return clampScore(COMFORT_BASE + hits);
}

export function scoreEaseOfUse(whySuitable: string): number {
  const text = whySuitable.toLowerCase();
  let score = EASE_BASE;
  if (text.includes('automatic') || text.includes('easy')) {
    score += 2;
  }
  if (text.includes('compact') || text.includes('small')) {
    score += 1;
  }
  return clampScore(score);
}

/**
 * Maps a candidate (any field may be missing) to its radar score vector.
 * Deterministic and side-effect free.
 */
export function scoreCandidate(candidate: Partial<CandidateRecord>): ScoreVector {
  const featureCount = candidate.key_features?.length ?? 0;
  const whySuitable = candidate.why_suitable ?? '';

  return [
    clampScore(scoreSafety(candidate.safety_rating)),
    clampScore(candidate.senior_friendly_rating ?? DEFAULT_SENIOR_FRIENDLY),
    scoreFuelEfficiency(candidate.fuel_efficiency),
    clampScore(featureCount),
    scoreComfort(whySuitable),
    scoreEaseOfUse(whySuitable),
    clampScore(featureCount * 2),
  ];
}

export interface RadarSeries {
  key: string;
  label: string;
  scores: ScoreVector;
}

/**
 * Builds one radar series per candidate, labelled "Brand Model".
 */
export function toRadarSeries(candidates: CandidateRecord[]): RadarSeries[] {
  return candidates.map((candidate) => ({
    key: candidateKey(candidate),
    label: candidateKey(candidate),
    scores: scoreCandidate(candidate),
  }));
}

export type PriceTier = 'budget' | 'mid-range' | 'premium';

/**
 * Tier of a price midpoint in lakhs: up to 8 is budget, up to 20 mid-range.
 */
export function classifyPriceTier(midpointLakhs: number): PriceTier {
  if (midpointLakhs <= 8) {
    return 'budget';
  }
  if (midpointLakhs <= 20) {
    return 'mid-range';
  }
  return 'premium';
}

export interface PriceBar {
  key: string;
  brand: string;
  model: string;
  averageLakhs: number;
  tier: PriceTier;
}

export function toPriceBars(candidates: CandidateRecord[]): PriceBar[] {
  return candidates.map((candidate) => {
    const averageLakhs = priceMidpoint(candidate.price);
    return {
      key: candidateKey(candidate),
      brand: candidate.brand,
      model: candidate.model,
      averageLakhs,
      tier: classifyPriceTier(averageLakhs),
    };
  });
}
