import { z } from 'zod';
import { RATING_MAX, RATING_MIN, type ReviewRecord } from './reviewTypes.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const REVIEW_SORT_ORDERS = ['newest', 'oldest', 'highest', 'lowest', 'helpful'] as const;
export const REVIEW_SEARCH_SCOPES = ['text', 'pros_cons', 'all'] as const;

// Query-string flags arrive as strings
const flag = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

export const reviewQuerySchema = z.object({
  brand: z.string().trim().min(1).optional(),
  model: z.string().trim().min(1).optional(),
  q: z.string().trim().optional(),
  searchIn: z.enum(REVIEW_SEARCH_SCOPES).default('all'),
  minRating: z.coerce.number().min(RATING_MIN).max(RATING_MAX).default(RATING_MIN),
  maxRating: z.coerce.number().min(RATING_MIN).max(RATING_MAX).default(RATING_MAX),
  maxAgeDays: z.coerce.number().int().positive().optional(),
  verifiedOnly: flag.default(false),
  seniorRecommendedOnly: flag.default(false),
  sortBy: z.enum(REVIEW_SORT_ORDERS).default('newest'),
  limit: z.coerce.number().int().positive().max(100).optional(),
});

export type ReviewQuery = z.output<typeof reviewQuerySchema>;
export type ReviewQueryInput = z.input<typeof reviewQuerySchema>;

function containsAny(values: string[], needle: string): boolean {
  return values.some((value) => value.toLowerCase().includes(needle));
}

function matchesText(review: ReviewRecord, needle: string, scope: ReviewQuery['searchIn']): boolean {
  const inText = review.review_text.toLowerCase().includes(needle);
  const inProsCons = containsAny(review.pros, needle) || containsAny(review.cons, needle);
  switch (scope) {
    case 'text':
      return inText;
    case 'pros_cons':
      return inProsCons;
    case 'all':
      return (
        inText ||
        inProsCons ||
        review.car_brand.toLowerCase().includes(needle) ||
        review.car_model.toLowerCase().includes(needle)
      );
  }
}

const COMPARATORS: Record<ReviewQuery['sortBy'], (a: ReviewRecord, b: ReviewRecord) => number> = {
  newest: (a, b) => Date.parse(b.date) - Date.parse(a.date),
  oldest: (a, b) => Date.parse(a.date) - Date.parse(b.date),
  highest: (a, b) => b.rating - a.rating,
  lowest: (a, b) => a.rating - b.rating,
  helpful: (a, b) => b.helpful_votes - a.helpful_votes,
};

/**
 * Filters and sorts reviews. `now` anchors the age filter.
 */
export function searchReviews(reviews: ReviewRecord[], queryInput: ReviewQueryInput, now: Date): ReviewRecord[] {
  const query = reviewQuerySchema.parse(queryInput);
  const needle = query.q?.toLowerCase();
  const cutoff = query.maxAgeDays !== undefined ? now.getTime() - query.maxAgeDays * DAY_MS : undefined;

  const filtered = reviews.filter((review) => {
    if (query.brand && review.car_brand !== query.brand) return false;
    if (query.model && review.car_model !== query.model) return false;
    if (needle && !matchesText(review, needle, query.searchIn)) return false;
    if (review.rating < query.minRating || review.rating > query.maxRating) return false;
    if (cutoff !== undefined && Date.parse(review.date) < cutoff) return false;
    if (query.verifiedOnly && !review.verified) return false;
    if (query.seniorRecommendedOnly && !review.senior_recommended) return false;
    return true;
  });

  const sorted = filtered.sort(COMPARATORS[query.sortBy]);
  return query.limit !== undefined ? sorted.slice(0, query.limit) : sorted;
}
