import { z } from 'zod';

/**
 * Closed set of rating categories a review may score.
 */
export const REVIEW_CATEGORIES = [
  'Overall Experience',
  'Comfort & Interior',
  'Performance & Driving',
  'Fuel Efficiency',
  'Safety Features',
  'Ease of Use',
  'Value for Money',
  'Service & Maintenance',
] as const;

export type ReviewCategory = (typeof REVIEW_CATEGORIES)[number];

export const RATING_MIN = 1;
export const RATING_MAX = 5;

export const ratingSchema = z.number().min(RATING_MIN).max(RATING_MAX);

/**
 * Partial map; unrated categories are absent, never zero.
 */
export const categoryRatingsSchema = z.record(z.enum(REVIEW_CATEGORIES), ratingSchema);

export type CategoryRatings = Partial<Record<ReviewCategory, number>>;

export const reviewRecordSchema = z.object({
  id: z.number().int().positive(),
  car_brand: z.string().min(1),
  car_model: z.string().min(1),
  reviewer_name: z.string().min(1),
  rating: ratingSchema,
  review_text: z.string(),
  pros: z.array(z.string()),
  cons: z.array(z.string()),
  category_ratings: categoryRatingsSchema,
  helpful_votes: z.number().int().nonnegative(),
  verified: z.boolean(),
  /** ISO-8601 timestamp set at creation */
  date: z.string().datetime(),
  senior_recommended: z.boolean(),
});

export type ReviewRecord = z.infer<typeof reviewRecordSchema>;

/**
 * Reviews plus the next id to hand out. Append-only.
 */
export const reviewLedgerSchema = z.object({
  reviews: z.array(reviewRecordSchema),
  nextId: z.number().int().positive(),
});

export type ReviewLedger = z.infer<typeof reviewLedgerSchema>;

export const reviewSubmissionSchema = z.object({
  car_brand: z.string().trim().min(1, 'car_brand is required'),
  car_model: z.string().trim().min(1, 'car_model is required'),
  reviewer_name: z.string().trim().optional(),
  rating: ratingSchema,
  review_text: z.string().trim().min(1, 'review_text is required'),
  /** One entry per line */
  pros_text: z.string().optional(),
  /** One entry per line */
  cons_text: z.string().optional(),
  category_ratings: categoryRatingsSchema.default({}),
  senior_recommended: z.boolean().default(true),
});

export type ReviewSubmission = z.input<typeof reviewSubmissionSchema>;
