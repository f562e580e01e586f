/**
 * Aggregates over candidate and review collections.
 *
 * All functions are pure and total: empty input yields an empty or neutral
 * aggregate, never an exception.
 */

import type { CandidateRecord } from '../candidateTypes.js';
import { REVIEW_CATEGORIES, type CategoryRatings, type ReviewCategory, type ReviewRecord } from '../reviews/reviewTypes.js';

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Average per category over the reviews that rate it.
 * A category no review rates has no entry.
 */
export function categoryAverages(reviews: ReviewRecord[]): CategoryRatings {
  const averages: CategoryRatings = {};
  for (const category of REVIEW_CATEGORIES) {
    const ratings: number[] = [];
    for (const review of reviews) {
      const rating = review.category_ratings[category];
      if (rating !== undefined) {
        ratings.push(rating);
      }
    }
    if (ratings.length > 0) {
      averages[category] = mean(ratings);
    }
  }
  return averages;
}

export interface RatingSummary {
  overall: number;
  totalReviews: number;
  categories: CategoryRatings;
  seniorRecommendedCount: number;
  verifiedCount: number;
}

/**
 * Overall and per-category averages. Null for an empty collection.
 */
export function summarizeRatings(reviews: ReviewRecord[]): RatingSummary | null {
  if (reviews.length === 0) {
    return null;
  }
  return {
    overall: mean(reviews.map((review) => review.rating)),
    totalReviews: reviews.length,
    categories: categoryAverages(reviews),
    seniorRecommendedCount: reviews.filter((review) => review.senior_recommended).length,
    verifiedCount: reviews.filter((review) => review.verified).length,
  };
}

/**
 * First element with the largest selected value; ties keep input order.
 */
export function bestBy<T>(items: readonly T[], selector: (item: T) => number): T | undefined {
  let best: T | undefined;
  let bestValue = -Infinity;
  for (const item of items) {
    const value = selector(item);
    if (best === undefined || value > bestValue) {
      best = item;
      bestValue = value;
    }
  }
  return best;
}

/**
 * First element with the smallest selected value; ties keep input order.
 */
export function worstBy<T>(items: readonly T[], selector: (item: T) => number): T | undefined {
  return bestBy(items, (item) => -selector(item));
}

/**
 * Features present in every candidate, in the first candidate's order.
 * Empty when the collection is empty or any candidate lists no features.
 */
export function commonFeatures(candidates: Pick<CandidateRecord, 'key_features'>[]): string[] {
  if (candidates.length === 0) {
    return [];
  }
  const [first, ...rest] = candidates;
  const shared = new Set(first.key_features);
  for (const candidate of rest) {
    const features = new Set(candidate.key_features);
    for (const feature of shared) {
      if (!features.has(feature)) {
        shared.delete(feature);
      }
    }
  }
  return [...shared];
}

/**
 * Every feature any candidate lists, sorted.
 */
export function featureUnion(candidates: Pick<CandidateRecord, 'key_features'>[]): string[] {
  const all = new Set<string>();
  for (const candidate of candidates) {
    for (const feature of candidate.key_features) {
      all.add(feature);
    }
  }
  return [...all].sort();
}

export interface Rollup {
  key: string;
  count: number;
  mean: number;
}

/**
 * Group-by with count and mean, groups in first-seen order.
 */
export function rollupBy<T>(
  items: readonly T[],
  keyOf: (item: T) => string,
  valueOf: (item: T) => number
): Rollup[] {
  const groups = new Map<string, number[]>();
  for (const item of items) {
    const key = keyOf(item);
    const values = groups.get(key);
    if (values) {
      values.push(valueOf(item));
    } else {
      groups.set(key, [valueOf(item)]);
    }
  }
  return [...groups].map(([key, values]) => ({ key, count: values.length, mean: mean(values) }));
}

export function rollupReviewsByBrand(reviews: ReviewRecord[]): Rollup[] {
  return rollupBy(reviews, (review) => review.car_brand, (review) => review.rating);
}

export interface RankedCategory {
  category: ReviewCategory;
  average: number;
}

/**
 * Rated categories, highest average first (stable for ties).
 */
export function rankCategories(averages: CategoryRatings): RankedCategory[] {
  const ranked: RankedCategory[] = [];
  for (const category of REVIEW_CATEGORIES) {
    const average = averages[category];
    if (average !== undefined) {
      ranked.push({ category, average });
    }
  }
  return ranked.sort((a, b) => b.average - a.average);
}
