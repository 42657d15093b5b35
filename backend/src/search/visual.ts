import { InvalidArgsError } from '../errors.js';
import type { CatalogStore } from '../services/catalog.js';
import type { VectorIndex } from '../services/qdrant.js';
import type { ThumbnailResolver } from '../services/storage.js';
import { VISUAL_EMBEDDING_DIM, VISUAL_KINDS, type SearchResult, type VisualKind } from '../types.js';
import { mergeResults } from './merge.js';
import { toSearchResult } from './rank.js';
import { searchIndex, type RetrievalStrategy } from './strategy.js';

export interface VisualCriteria {
  vector: number[];
  limit: number;
}

/**
 * Nearest neighbours in the 512-d visual space, searched per kind
 * (image, video, blend) and ranked globally before truncation.
 */
export class VisualSearch implements RetrievalStrategy<VisualCriteria> {
  readonly name = 'visual';

  constructor(
    private readonly catalog: CatalogStore,
    private readonly index: VectorIndex,
    private readonly thumbnails: ThumbnailResolver
  ) {}

  async search({ vector, limit }: VisualCriteria): Promise<SearchResult[]> {
    if (vector.length !== VISUAL_EMBEDDING_DIM) {
      throw new InvalidArgsError(`visual vector must have ${VISUAL_EMBEDDING_DIM} dimensions, got ${vector.length}`);
    }

    const perKind = await Promise.all(VISUAL_KINDS.map((kind) => this.searchKind(kind, vector, limit)));
    return mergeResults(perKind, limit);
  }

  private async searchKind(kind: VisualKind, vector: number[], limit: number): Promise<SearchResult[]> {
    const matches = await searchIndex(this.index, 'visual', vector, { limit, kind });
    const hits = this.catalog.getHits(matches.map((match) => match.file_id));

    const results: SearchResult[] = [];
    for (const match of matches) {
      const hit = hits.get(match.file_id);
      if (hit && hit.file_type === kind) {
        results.push(toSearchResult(hit, match.score, this.thumbnails));
      }
    }
    return results;
  }
}
