import { ToolExecutionError, errorMessage } from '../errors.js';
import type { VectorIndex, VectorMatch, VectorSearchOptions, VectorSpace } from '../services/qdrant.js';
import type { SearchResult } from '../types.js';

/** One way of finding catalog files. Each call takes fresh criteria. */
export interface RetrievalStrategy<C> {
  readonly name: string;
  search(criteria: C): Promise<SearchResult[]>;
}

export async function searchIndex(
  index: VectorIndex,
  space: VectorSpace,
  vector: number[],
  options: VectorSearchOptions
): Promise<VectorMatch[]> {
  try {
    return await index.search(space, vector, options);
  } catch (err) {
    throw new ToolExecutionError(`vector index search failed: ${errorMessage(err)}`, { cause: err });
  }
}
