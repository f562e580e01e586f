import { z } from 'zod';
import { candidateRecordSchema } from '../advisor/candidateTypes.js';
import { buyerPreferencesSchema } from '../advisor/preferences/buyerPreferences.js';
import { reviewLedgerSchema } from '../advisor/reviews/reviewTypes.js';

const chatExchangeSchema = z.object({
  user: z.string(),
  assistant: z.string(),
});

/**
 * Everything one buyer's visit accumulates. Plain JSON so any store can
 * hold it; timestamps are epoch milliseconds.
 */
export const advisorSessionSchema = z.object({
  preferences: buyerPreferencesSchema.optional(),
  recommendations: z.array(candidateRecordSchema),
  recommendationSource: z.enum(['json', 'text', 'fallback', 'none']).optional(),
  recommendationConfidence: z.enum(['high', 'low', 'static']).optional(),
  /** Shortlisted candidates, unique by brand + model */
  comparison: z.array(candidateRecordSchema),
  reviewLedger: reviewLedgerSchema,
  chatHistory: z.array(chatExchangeSchema),
  updatedAt: z.number(),
  expiresAt: z.number(),
});

export type AdvisorSession = z.infer<typeof advisorSessionSchema>;
