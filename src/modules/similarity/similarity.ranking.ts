import type {
  ScoredResult,
  Vector,
} from './interfaces/similarity-search/similarity-search.interface';
import type { SimilarityMetric, SortDirection } from './metrics/similarity-metric';

export interface Candidate {
  id: string;
  vector: Vector;
}

export interface ScoredCandidates {
  scored: ScoredResult[];
  /** Ids whose stored vector length differs from the query's. */
  mismatched: string[];
}

/**
 * Scores candidates against the query, keeping their input order.
 */
export function scoreCandidates(
  query: Vector,
  candidates: Iterable<Candidate>,
  metric: SimilarityMetric,
): ScoredCandidates {
  const scored: ScoredResult[] = [];
  const mismatched: string[] = [];

  for (const candidate of candidates) {
    if (candidate.vector.length !== query.length) {
      mismatched.push(candidate.id);
      continue;
    }
    scored.push({ id: candidate.id, score: metric.score(query, candidate.vector) });
  }

  return { scored, mismatched };
}

/**
 * Best `topK` results for the given direction. NaN scores sort last; equal
 * scores are ordered by id ascending.
 */
export function rankResults(
  results: ScoredResult[],
  direction: SortDirection,
  topK: number,
): ScoredResult[] {
  if (topK < 1) return [];

  const sign = direction === 'desc' ? -1 : 1;
  return [...results]
    .sort((a, b) => {
      const aNaN = Number.isNaN(a.score);
      const bNaN = Number.isNaN(b.score);
      if (aNaN || bNaN) {
        if (aNaN && bNaN) return compareIds(a.id, b.id);
        return aNaN ? 1 : -1;
      }
      if (a.score !== b.score) return sign * (a.score - b.score);
      return compareIds(a.id, b.id);
    })
    .slice(0, topK);
}

function compareIds(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}
