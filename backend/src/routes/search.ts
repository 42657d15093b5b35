import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { errorMessage } from '../errors.js';
import { KeywordSearch } from '../search/keyword.js';
import { mergeResults } from '../search/merge.js';
import { SemanticSearch } from '../search/semantic.js';
import type { CatalogStore } from '../services/catalog.js';
import type { EmbeddingProvider } from '../services/embeddings.js';
import type { VectorIndex } from '../services/qdrant.js';
import type { ThumbnailResolver } from '../services/storage.js';
import type { SearchResult } from '../types.js';

type SearchQuery = {
  q?: string;
  limit?: string;
  semantic?: string;
};

export interface SearchRouteDeps {
  catalog: CatalogStore;
  index: VectorIndex;
  embeddings: EmbeddingProvider;
  thumbnails: ThumbnailResolver;
}

/** Direct hybrid search without the reasoning loop: semantic plus keyword, merged. */
export function searchRoutes(deps: SearchRouteDeps) {
  const keyword = new KeywordSearch(deps.catalog, deps.thumbnails);
  const semantic = new SemanticSearch(deps.catalog, deps.index, deps.thumbnails);

  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.get('/api/search', async (req: FastifyRequest<{ Querystring: SearchQuery }>, reply: FastifyReply) => {
      const query = (req.query.q ?? '').trim();
      if (!query) {
        return reply.send({
          query,
          keyword_results: [],
          semantic_results: [],
          results: [],
        });
      }

      const limit = parseLimit(req.query.limit);
      const semanticEnabled = req.query.semantic !== '0';
      const keywordResults = await keyword.search({ query, limit });

      if (!semanticEnabled) {
        return reply.send({
          query,
          keyword_results: keywordResults,
          semantic_results: [],
          results: keywordResults,
        });
      }

      let semanticResults: SearchResult[] = [];
      let warning: string | undefined;
      try {
        const vector = await deps.embeddings.embedText(query);
        semanticResults = await semantic.search({ vector, limit });
      } catch (err) {
        warning = `semantic search unavailable: ${errorMessage(err)}`;
        req.log.warn({ err }, '[search] semantic search failed, returning keyword matches only');
      }

      return reply.send({
        query,
        keyword_results: keywordResults,
        semantic_results: semanticResults,
        results: mergeResults([semanticResults, keywordResults], limit),
        ...(warning ? { warning } : {}),
      });
    });
  };
}

function parseLimit(raw?: string): number {
  const parsed = Number(raw ?? 20);
  if (!Number.isFinite(parsed)) return 20;
  return Math.max(1, Math.min(Math.round(parsed), 50));
}
