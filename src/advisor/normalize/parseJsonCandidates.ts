import { toCandidateRecord, type CandidateRecord } from '../candidateTypes.js';
import { NO_RESULT, type StrategyOutcome } from './fallbackLadder.js';

/**
 * Locates the outermost `[...]` span in a payload that may wrap the JSON
 * array in prose or code fences. Returns null when no bracket pair exists.
 */
export function findJsonArraySpan(payload: string): string | null {
  const start = payload.indexOf('[');
  const end = payload.lastIndexOf(']');
  if (start === -1 || end === -1 || end < start) {
    return null;
  }
  return payload.slice(start, end + 1);
}

/**
 * Primary normalization path: parse an embedded JSON array of candidate objects.
 *
 * Objects failing the validity contract are dropped; the survivors keep
 * their input order and are truncated to `maxResults`. Once the span parses
 * as an array its validated list is final, even when empty. Returns
 * NO_RESULT only when there is no array or it does not parse.
 */
export function parseJsonCandidates(payload: string, maxResults: number): StrategyOutcome<CandidateRecord[]> {
  const span = findJsonArraySpan(payload);
  if (span === null) {
    return NO_RESULT;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(span);
  } catch (error) {
    if (error instanceof SyntaxError) {
      return NO_RESULT;
    }
    throw error;
  }

  if (!Array.isArray(parsed)) {
    return NO_RESULT;
  }

  const records: CandidateRecord[] = [];
  for (const entry of parsed) {
    const record = toCandidateRecord(entry);
    if (record) {
      records.push(record);
    }
  }

  return records.slice(0, maxResults);
}
