/**
 * Numeric attribute extraction from loosely formatted text.
 *
 * Every quantity the advisor reads out of free text (price bounds, mileage,
 * rating digits) goes through this module so defaulting stays consistent.
 * None of these functions throw: each failure path resolves to a documented
 * default.
 */

/**
 * Lower/upper price bounds in lakhs of rupees.
 */
export interface PriceRange {
  lower: number;
  upper: number;
}

/**
 * Range used when a price string carries no recognizable number.
 * Midpoint is 10 lakhs.
 */
export const DEFAULT_PRICE_RANGE: Readonly<PriceRange> = Object.freeze({ lower: 10, upper: 10 });

/** Rupees per lakh. */
export const RUPEES_PER_LAKH = 100_000;

/** Lakhs per crore. */
const LAKHS_PER_CRORE = 100;

const CURRENCY_MARKERS = /₹|\bINR\b|\bRs\.?/gi;

// A decimal number optionally followed by a crore ("1.2Cr", "2 crore") or lakh ("6L", "9 lakh") marker
const PRICE_NUMBER = /(\d+(?:\.\d+)?)\s*(?:(cr(?:ores?)?)\b|(l(?:akhs?|acs?)?)\b)?/gi;

type PriceUnit = 'crore' | 'lakh';

interface PriceToken {
  amount: number;
  unit?: PriceUnit;
}

/**
 * Returns the first maximal run of digits in `text` as an integer.
 * Falls back to `fallback` when there is no digit run or `text` is not a string.
 *
 * @example extractFirstInteger('15-20 kmpl', 15) // 15
 * @example extractFirstInteger('n/a', 15) // 15
 */
export function extractFirstInteger(text: unknown, fallback: number): number {
  if (typeof text !== 'string') {
    return fallback;
  }

  const match = /\d+/.exec(text);
  if (!match) {
    return fallback;
  }

  const value = parseInt(match[0], 10);
  return Number.isFinite(value) ? value : fallback;
}

function roundLakhs(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Parses a price range string into lower/upper bounds in lakhs.
 *
 * Currency markers are stripped and numbers are read in order. A number
 * without a unit takes the unit of the next number that has one, so a single
 * trailing "Cr" covers both bounds; with no unit anywhere it is lakhs. Crore
 * amounts are scaled by 100. The first two numbers are the bounds; a single
 * number is used for both. Anything without a number yields
 * {@link DEFAULT_PRICE_RANGE}.
 *
 * @example extractPriceRange('₹6L - ₹9L') // { lower: 6, upper: 9 }
 * @example extractPriceRange('₹1.2Cr - ₹2Cr') // { lower: 120, upper: 200 }
 * @example extractPriceRange('₹1.2 - 1.5 Cr') // { lower: 120, upper: 150 }
 * @example extractPriceRange('₹80L - ₹1.2Cr') // { lower: 80, upper: 120 }
 */
export function extractPriceRange(text: unknown): PriceRange {
  if (typeof text !== 'string') {
    return { ...DEFAULT_PRICE_RANGE };
  }

  const tokens = priceTokens(text.replace(CURRENCY_MARKERS, ' '));
  if (tokens.length === 0) {
    return { ...DEFAULT_PRICE_RANGE };
  }

  const values = tokens.slice(0, 2).map((token, index) => {
    const unit = token.unit ?? tokens.slice(index + 1).find((next) => next.unit !== undefined)?.unit;
    return roundLakhs(unit === 'crore' ? token.amount * LAKHS_PER_CRORE : token.amount);
  });

  const [lower, upper = lower] = values;
  return { lower, upper };
}

function priceTokens(text: string): PriceToken[] {
  const tokens: PriceToken[] = [];
  for (const match of text.matchAll(PRICE_NUMBER)) {
    const amount = parseFloat(match[1]);
    if (!Number.isFinite(amount)) {
      continue;
    }
    if (match[2]) {
      tokens.push({ amount, unit: 'crore' });
    } else if (match[3]) {
      tokens.push({ amount, unit: 'lakh' });
    } else {
      tokens.push({ amount });
    }
  }
  return tokens;
}

/**
 * Returns true when the text contains at least one price number, i.e. when
 * {@link extractPriceRange} would not fall back to the default range.
 */
export function hasPriceNumber(text: unknown): boolean {
  return typeof text === 'string' && /\d/.test(text.replace(CURRENCY_MARKERS, ' '));
}

/**
 * Representative magnitude of a price string: the midpoint of its bounds, in lakhs.
 *
 * @example priceMidpoint('₹6L - ₹9L') // 7.5
 */
export function priceMidpoint(text: unknown): number {
  const { lower, upper } = extractPriceRange(text);
  return (lower + upper) / 2;
}

export function lakhsToRupees(lakhs: number): number {
  return Math.round(lakhs * RUPEES_PER_LAKH);
}
