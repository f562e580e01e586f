/**
 * Build the comparison payload for the candidates a buyer shortlisted.
 *
 * Everything here is derived data for the comparison views: the attribute
 * matrix, radar series, price bars, the feature presence matrix, and the
 * highlight picks.
 */

import { candidateKey, type CandidateRecord, type MaintenanceCost } from '../candidateTypes.js';
import { bestBy, commonFeatures, featureUnion, worstBy } from '../aggregate/aggregation.js';
import { extractPriceRange } from '../extract/textAttributes.js';
import { toPriceBars, toRadarSeries, SCORE_CRITERIA, type PriceBar, type RadarSeries } from '../score/criteriaScorer.js';

export const MATRIX_ATTRIBUTES = [
  'Model',
  'Brand',
  'Price Range',
  'Fuel Efficiency',
  'Safety Rating',
  'Maintenance Cost',
  'Senior Friendly Rating',
  'Key Features Count',
] as const;

const NOT_AVAILABLE = 'N/A';

export type MatrixRow = {
  key: string;
  values: Record<(typeof MATRIX_ATTRIBUTES)[number], string | number>;
};

export interface FeatureMatrix {
  features: string[];
  /** candidate key -> presence per feature, in `features` order */
  presence: Record<string, boolean[]>;
}

export interface ComparisonHighlight {
  key: string;
  brand: string;
  model: string;
  value: string | number;
}

export interface ComparisonReport {
  count: number;
  criteria: readonly string[];
  matrix: MatrixRow[];
  radar: RadarSeries[];
  prices: PriceBar[];
  features: FeatureMatrix;
  commonFeatures: string[];
  highlights: {
    mostSeniorFriendly?: ComparisonHighlight;
    mostFeatures?: ComparisonHighlight;
    mostAffordable?: ComparisonHighlight;
    lowestMaintenance?: ComparisonHighlight;
  };
}

function seniorRatingLabel(candidate: CandidateRecord): string {
  return candidate.senior_friendly_rating !== undefined ? `${candidate.senior_friendly_rating}/10` : NOT_AVAILABLE;
}

function matrixRow(candidate: CandidateRecord): MatrixRow {
  return {
    key: candidateKey(candidate),
    values: {
      'Model': candidate.model,
      'Brand': candidate.brand,
      'Price Range': candidate.price,
      'Fuel Efficiency': candidate.fuel_efficiency ?? NOT_AVAILABLE,
      'Safety Rating': candidate.safety_rating ?? NOT_AVAILABLE,
      'Maintenance Cost': candidate.maintenance_cost ?? NOT_AVAILABLE,
      'Senior Friendly Rating': seniorRatingLabel(candidate),
      'Key Features Count': candidate.key_features.length,
    },
  };
}

export function buildFeatureMatrix(candidates: CandidateRecord[]): FeatureMatrix {
  const features = featureUnion(candidates);
  const presence: Record<string, boolean[]> = {};
  for (const candidate of candidates) {
    const owned = new Set(candidate.key_features);
    presence[candidateKey(candidate)] = features.map((feature) => owned.has(feature));
  }
  return { features, presence };
}

function highlight(candidate: CandidateRecord | undefined, value: (c: CandidateRecord) => string | number): ComparisonHighlight | undefined {
  if (!candidate) {
    return undefined;
  }
  return {
    key: candidateKey(candidate),
    brand: candidate.brand,
    model: candidate.model,
    value: value(candidate),
  };
}

const MAINTENANCE_RANK: Record<MaintenanceCost, number> = { Low: 0, Medium: 1, High: 2 };
const UNRATED_MAINTENANCE_RANK = 3;

/**
 * Builds the comparison report. An empty shortlist yields an empty report.
 */
export function buildComparisonReport(candidates: CandidateRecord[]): ComparisonReport {
  const mostSeniorFriendly = bestBy(candidates, (c) => c.senior_friendly_rating ?? 0);
  const mostFeatures = bestBy(candidates, (c) => c.key_features.length);
  const mostAffordable = worstBy(candidates, (c) => extractPriceRange(c.price).lower);
  const lowestMaintenance = worstBy(candidates, (c) =>
    c.maintenance_cost ? MAINTENANCE_RANK[c.maintenance_cost] : UNRATED_MAINTENANCE_RANK
  );

  return {
    count: candidates.length,
    criteria: SCORE_CRITERIA,
    matrix: candidates.map(matrixRow),
    radar: toRadarSeries(candidates),
    prices: toPriceBars(candidates),
    features: buildFeatureMatrix(candidates),
    commonFeatures: commonFeatures(candidates),
    highlights: {
      mostSeniorFriendly: highlight(mostSeniorFriendly, seniorRatingLabel),
      mostFeatures: highlight(mostFeatures, (c) => c.key_features.length),
      mostAffordable: highlight(mostAffordable, (c) => c.price),
      lowestMaintenance: highlight(lowestMaintenance, (c) => c.maintenance_cost ?? NOT_AVAILABLE),
    },
  };
}
