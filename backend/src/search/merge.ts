import type { SearchResult } from '../types.js';
import { compareResults } from './rank.js';

function beats(candidate: SearchResult, current: SearchResult): boolean {
  if (candidate.similarity === null) return false;
  if (current.similarity === null) return true;
  return candidate.similarity > current.similarity;
}

/**
 * Combine result lists from several strategies into one ranked list.
 * A file keeps its best score; among unscored duplicates the first
 * occurrence wins. The limit applies after merging.
 */
export function mergeResults(sequences: SearchResult[][], limit: number): SearchResult[] {
  const byFile = new Map<number, SearchResult>();

  for (const sequence of sequences) {
    for (const result of sequence) {
      const current = byFile.get(result.file_id);
      if (!current || beats(result, current)) {
        byFile.set(result.file_id, result);
      }
    }
  }

  return [...byFile.values()].sort(compareResults).slice(0, Math.max(0, limit));
}
