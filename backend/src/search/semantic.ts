import { InvalidArgsError } from '../errors.js';
import type { CatalogStore } from '../services/catalog.js';
import type { VectorIndex } from '../services/qdrant.js';
import type { ThumbnailResolver } from '../services/storage.js';
import { TEXT_EMBEDDING_DIM, type SearchResult } from '../types.js';
import { compareResults, toSearchResult } from './rank.js';
import { searchIndex, type RetrievalStrategy } from './strategy.js';

export interface SemanticCriteria {
  vector: number[];
  limit: number;
}

/** Nearest neighbours in the 384-d metadata space. */
export class SemanticSearch implements RetrievalStrategy<SemanticCriteria> {
  readonly name = 'semantic';

  constructor(
    private readonly catalog: CatalogStore,
    private readonly index: VectorIndex,
    private readonly thumbnails: ThumbnailResolver
  ) {}

  async search({ vector, limit }: SemanticCriteria): Promise<SearchResult[]> {
    if (vector.length !== TEXT_EMBEDDING_DIM) {
      throw new InvalidArgsError(`query vector must have ${TEXT_EMBEDDING_DIM} dimensions, got ${vector.length}`);
    }

    const matches = await searchIndex(this.index, 'text', vector, { limit });
    if (matches.length === 0) return [];

    // Files whose embedding was withdrawn or that failed scanning are dropped
    const hits = this.catalog.getHits(
      matches.map((match) => match.file_id),
      { textEmbeddedOnly: true }
    );

    const results: SearchResult[] = [];
    for (const match of matches) {
      const hit = hits.get(match.file_id);
      if (hit) results.push(toSearchResult(hit, match.score, this.thumbnails));
    }
    return results.sort(compareResults).slice(0, limit);
  }
}
