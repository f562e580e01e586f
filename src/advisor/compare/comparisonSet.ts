import { candidateKey, type CandidateRecord } from '../candidateTypes.js';

/**
 * Comparison set operations. Each returns a new array; records are never
 * mutated.
 */

export interface AddToComparisonResult {
  comparison: CandidateRecord[];
  added: boolean;
}

export function addToComparison(comparison: CandidateRecord[], candidate: CandidateRecord): AddToComparisonResult {
  const key = candidateKey(candidate);
  if (comparison.some((existing) => candidateKey(existing) === key)) {
    return { comparison, added: false };
  }
  return { comparison: [...comparison, candidate], added: true };
}

export function removeFromComparison(comparison: CandidateRecord[], key: string): CandidateRecord[] {
  return comparison.filter((candidate) => candidateKey(candidate) !== key);
}

export function findCandidate(candidates: CandidateRecord[], brand: string, model: string): CandidateRecord | undefined {
  const wanted = candidateKey({ brand, model }).toLowerCase();
  return candidates.find((candidate) => candidateKey(candidate).toLowerCase() === wanted);
}
