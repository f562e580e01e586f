import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import {
  categoryRatingsSchema,
  ratingSchema,
  reviewSubmissionSchema,
  type ReviewLedger,
  type ReviewRecord,
  type ReviewSubmission,
} from './reviewTypes.js';

export const ANONYMOUS_REVIEWER = 'Anonymous Senior Buyer';

const DAY_MS = 24 * 60 * 60 * 1000;

const seedFileSchema = z.object({
  version: z.number().int().positive(),
  reviews: z.array(z.object({
    car_brand: z.string().min(1),
    car_model: z.string().min(1),
    reviewer_name: z.string().min(1),
    rating: ratingSchema,
    review_text: z.string().min(1),
    pros: z.array(z.string()),
    cons: z.array(z.string()),
    category_ratings: categoryRatingsSchema,
    daysAgo: z.number().int().nonnegative(),
    verified: z.boolean(),
    helpful_votes: z.number().int().nonnegative(),
    senior_recommended: z.boolean(),
  })),
});

export type SeedReview = z.infer<typeof seedFileSchema>['reviews'][number];

const SEED_URL = new URL('../../../data/seedReviews.json', import.meta.url);

let cachedSeeds: SeedReview[] | null = null;

export function loadSeedReviews(): SeedReview[] {
  if (!cachedSeeds) {
    const raw: unknown = JSON.parse(readFileSync(fileURLToPath(SEED_URL), 'utf8'));
    cachedSeeds = seedFileSchema.parse(raw).reviews;
  }
  return cachedSeeds;
}

/**
 * Builds the starting ledger: seed reviews take ids 1..n, dated relative to `now`.
 */
export function createSeedLedger(now: Date, seeds: SeedReview[] = loadSeedReviews()): ReviewLedger {
  const reviews = seeds.map(({ daysAgo, ...seed }, index): ReviewRecord => ({
    ...seed,
    id: index + 1,
    date: new Date(now.getTime() - daysAgo * DAY_MS).toISOString(),
  }));
  return { reviews, nextId: reviews.length + 1 };
}

function splitLines(text: string | undefined): string[] {
  if (!text) {
    return [];
  }
  return text.split('\n').map((line) => line.trim()).filter((line) => line.length > 0);
}

export interface SubmitReviewResult {
  ledger: ReviewLedger;
  review: ReviewRecord;
}

/**
 * Appends a user review. Throws ZodError for an invalid submission.
 */
export function submitReview(ledger: ReviewLedger, submission: ReviewSubmission, now: Date): SubmitReviewResult {
  const input = reviewSubmissionSchema.parse(submission);

  const review: ReviewRecord = {
    id: ledger.nextId,
    car_brand: input.car_brand,
    car_model: input.car_model,
    reviewer_name: input.reviewer_name || ANONYMOUS_REVIEWER,
    rating: input.rating,
    review_text: input.review_text,
    pros: splitLines(input.pros_text),
    cons: splitLines(input.cons_text),
    category_ratings: input.category_ratings,
    helpful_votes: 0,
    verified: false,
    date: now.toISOString(),
    senior_recommended: input.senior_recommended,
  };

  return {
    ledger: { reviews: [...ledger.reviews, review], nextId: ledger.nextId + 1 },
    review,
  };
}

/**
 * Adds one helpful vote. Returns null when no review has the id.
 */
export function markHelpful(ledger: ReviewLedger, id: number): SubmitReviewResult | null {
  const target = ledger.reviews.find((review) => review.id === id);
  if (!target) {
    return null;
  }
  const review = { ...target, helpful_votes: target.helpful_votes + 1 };
  return {
    ledger: {
      ...ledger,
      reviews: ledger.reviews.map((existing) => (existing.id === id ? review : existing)),
    },
    review,
  };
}

/**
 * All reviews, newest first.
 */
export function listReviews(ledger: ReviewLedger): ReviewRecord[] {
  return [...ledger.reviews].sort((a, b) => Date.parse(b.date) - Date.parse(a.date));
}

export function reviewsForCar(ledger: ReviewLedger, brand: string, model: string): ReviewRecord[] {
  const wantedBrand = brand.toLowerCase();
  const wantedModel = model.toLowerCase();
  return listReviews(ledger).filter(
    (review) => review.car_brand.toLowerCase() === wantedBrand && review.car_model.toLowerCase() === wantedModel
  );
}
