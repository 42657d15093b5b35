import type { CatalogStore, FilterCriteria } from '../services/catalog.js';
import type { ThumbnailResolver } from '../services/storage.js';
import type { SearchResult } from '../types.js';
import { toSearchResult } from './rank.js';
import type { RetrievalStrategy } from './strategy.js';

export type StructuredFilterCriteria = FilterCriteria & { limit: number };

export class FilterSearch implements RetrievalStrategy<StructuredFilterCriteria> {
  readonly name = 'filter';

  constructor(
    private readonly catalog: CatalogStore,
    private readonly thumbnails: ThumbnailResolver
  ) {}

  async search({ limit, ...criteria }: StructuredFilterCriteria): Promise<SearchResult[]> {
    return this.catalog
      .filterSearch(criteria, limit)
      .map((hit) => toSearchResult(hit, null, this.thumbnails));
  }
}
