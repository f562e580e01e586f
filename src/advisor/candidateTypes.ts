import { z } from 'zod';

/**
 * Maximum number of recommendations kept from any normalization path.
 */
export const MAX_RECOMMENDATIONS = 5;

export const MAINTENANCE_COSTS = ['Low', 'Medium', 'High'] as const;
export type MaintenanceCost = (typeof MAINTENANCE_COSTS)[number];

/**
 * Schema for candidate records coming from trusted sources
 * (the fallback catalog, session payloads).
 */
export const candidateRecordSchema = z.object({
  brand: z.string().min(1),
  model: z.string().min(1),
  price: z.string().min(1),
  why_suitable: z.string().min(1),
  fuel_efficiency: z.string().optional(),
  safety_rating: z.string().optional(),
  maintenance_cost: z.enum(MAINTENANCE_COSTS).optional(),
  key_features: z.array(z.string()).default([]),
  pros: z.array(z.string()).default([]),
  cons: z.array(z.string()).default([]),
  senior_friendly_rating: z.number().int().min(0).max(10).optional(),
});

/**
 * One recommendable car. `brand` + `model` form the display key.
 */
export type CandidateRecord = z.infer<typeof candidateRecordSchema>;

/**
 * Where a normalized recommendation list came from.
 * - json: structured array found in the upstream payload
 * - text: line scan of the payload (placeholder details, lower confidence)
 * - fallback: static catalog
 * - none: nothing usable
 */
export type RecommendationSource = 'json' | 'text' | 'fallback' | 'none';

export type RecommendationConfidence = 'high' | 'low' | 'static';

export interface NormalizedRecommendations {
  records: CandidateRecord[];
  source: RecommendationSource;
  confidence: RecommendationConfidence;
}

export const CONFIDENCE_BY_SOURCE: Record<RecommendationSource, RecommendationConfidence> = {
  json: 'high',
  text: 'low',
  fallback: 'static',
  none: 'static',
};

/**
 * Display key used to de-duplicate candidates within a comparison set.
 */
export function candidateKey(candidate: Pick<CandidateRecord, 'brand' | 'model'>): string {
  return `${candidate.brand} ${candidate.model}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim().length > 0 ? value : undefined;
}

// Models sometimes answer "5" as 5; numbers are kept as their text
function optionalText(value: unknown): string | undefined {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

function stringList(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.filter((entry): entry is string => typeof entry === 'string');
}

function maintenanceCost(value: unknown): MaintenanceCost | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  return MAINTENANCE_COSTS.find((cost) => cost.toLowerCase() === normalized);
}

function seniorFriendlyRating(value: unknown): number | undefined {
  const numValue = typeof value === 'string' ? Number(value) : value;
  if (typeof numValue !== 'number' || !Number.isFinite(numValue)) {
    return undefined;
  }
  return Math.min(10, Math.max(0, Math.round(numValue)));
}

/**
 * Converts an untrusted object (typically one element of a model-produced
 * JSON array) into a CandidateRecord.
 *
 * Returns null when any of model, brand, price or why_suitable is missing
 * or empty; such records are dropped, never repaired. Optional fields are
 * coerced to their types or left unset.
 */
export function toCandidateRecord(raw: unknown): CandidateRecord | null {
  if (!isRecord(raw)) {
    return null;
  }

  const brand = nonEmptyString(raw.brand);
  const model = nonEmptyString(raw.model);
  const price = nonEmptyString(raw.price);
  const whySuitable = nonEmptyString(raw.why_suitable);

  if (!brand || !model || !price || !whySuitable) {
    return null;
  }

  const record: CandidateRecord = {
    brand,
    model,
    price,
    why_suitable: whySuitable,
    key_features: stringList(raw.key_features),
    pros: stringList(raw.pros),
    cons: stringList(raw.cons),
  };

  const fuelEfficiency = optionalText(raw.fuel_efficiency);
  if (fuelEfficiency !== undefined) {
    record.fuel_efficiency = fuelEfficiency;
  }

  const safetyRating = optionalText(raw.safety_rating);
  if (safetyRating !== undefined) {
    record.safety_rating = safetyRating;
  }

  const cost = maintenanceCost(raw.maintenance_cost);
  if (cost) {
    record.maintenance_cost = cost;
  }

  const rating = seniorFriendlyRating(raw.senior_friendly_rating);
  if (rating !== undefined) {
    record.senior_friendly_rating = rating;
  }

  return record;
}
