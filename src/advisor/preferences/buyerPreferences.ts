import { z } from 'zod';

export const BUDGET_FLOOR = 300_000;
export const BUDGET_CEILING = 5_000_000;

export const PRIMARY_USES = [
  'Daily commuting',
  'Weekend drives',
  'Long distance travel',
  'Family outings',
  'Occasional use',
  'Multiple purposes',
] as const;

export const FAMILY_SIZES = ['1 person', '2 people', '3-4 people', '5-7 people', 'Varies'] as const;

export const DRIVING_EXPERIENCE = [
  'New driver',
  'Experienced city driver',
  'Experienced highway driver',
  'Very experienced',
  'Prefer easy-to-drive cars',
  'Comfortable with any car',
] as const;

export const FUEL_PREFERENCES = ['Petrol', 'Diesel', 'CNG', 'Electric', 'Hybrid', 'No preference'] as const;

export const IMPORTANT_FEATURES = [
  'Advanced safety features',
  'Air conditioning',
  'Good music system',
  'Comfortable seating',
  'Easy parking (sensors, camera)',
  'Fuel efficiency',
  'Low maintenance cost',
  'Modern technology',
  'Large storage space',
  'Good ground clearance',
] as const;

export const PHYSICAL_CONSIDERATIONS = [
  'Easy entry/exit',
  'Light steering',
  'Good visibility',
  'Adjustable seat',
  'Automatic transmission',
] as const;

/**
 * Questionnaire answers. Budget bounds are in rupees.
 */
export const buyerPreferencesSchema = z
  .object({
    budget_min: z.number().int().min(BUDGET_FLOOR).max(BUDGET_CEILING),
    budget_max: z.number().int().min(BUDGET_FLOOR).max(BUDGET_CEILING),
    primary_use: z.enum(PRIMARY_USES),
    family_size: z.enum(FAMILY_SIZES),
    driving_experience: z.enum(DRIVING_EXPERIENCE),
    fuel_preference: z.enum(FUEL_PREFERENCES),
    important_features: z.array(z.enum(IMPORTANT_FEATURES)).min(1, 'Select at least one important feature'),
    physical_considerations: z.array(z.enum(PHYSICAL_CONSIDERATIONS)).default([]),
    brand_preference: z.array(z.string().trim().min(1)).default([]),
    additional_requirements: z.string().trim().max(2000).optional(),
  })
  .refine((prefs) => prefs.budget_min <= prefs.budget_max, {
    message: 'budget_min must not exceed budget_max',
    path: ['budget_min'],
  });

export type BuyerPreferences = z.output<typeof buyerPreferencesSchema>;
export type BuyerPreferencesInput = z.input<typeof buyerPreferencesSchema>;

const rupeeFormatter = new Intl.NumberFormat('en-IN');

export function formatRupees(amount: number): string {
  return `₹${rupeeFormatter.format(amount)}`;
}

/**
 * One-line summary of the answers, e.g.
 * "Budget: ₹3,00,000 - ₹10,00,000 | Primary use: Daily commuting | ..."
 */
export function summarizePreferences(prefs: BuyerPreferences): string {
  const parts = [
    `Budget: ${formatRupees(prefs.budget_min)} - ${formatRupees(prefs.budget_max)}`,
    `Primary use: ${prefs.primary_use}`,
    `Family size: ${prefs.family_size}`,
    `Fuel preference: ${prefs.fuel_preference}`,
  ];

  if (prefs.important_features.length > 0) {
    let features = prefs.important_features.slice(0, 3).join(', ');
    if (prefs.important_features.length > 3) {
      features += ` (and ${prefs.important_features.length - 3} more)`;
    }
    parts.push(`Key features: ${features}`);
  }

  return parts.join(' | ');
}
