import type { CatalogStore } from '../services/catalog.js';
import type { ThumbnailResolver } from '../services/storage.js';
import type { SearchResult } from '../types.js';
import { toSearchResult } from './rank.js';
import type { RetrievalStrategy } from './strategy.js';

export interface KeywordCriteria {
  query: string;
  limit: number;
}

/** Literal substring search; needs neither embeddings nor the vector index. */
export class KeywordSearch implements RetrievalStrategy<KeywordCriteria> {
  readonly name = 'keyword';

  constructor(
    private readonly catalog: CatalogStore,
    private readonly thumbnails: ThumbnailResolver
  ) {}

  async search({ query, limit }: KeywordCriteria): Promise<SearchResult[]> {
    return this.catalog
      .keywordSearch(query, limit)
      .map((hit) => toSearchResult(hit, null, this.thumbnails));
  }
}
