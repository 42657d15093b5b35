import type { CatalogHit, SearchResult } from '../types.js';
import type { ThumbnailResolver } from '../services/storage.js';

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

/**
 * Total order shared by every strategy and the merger: scored results
 * first by similarity, then unscored ones; ties go to the more recently
 * modified file, then the lower file id.
 */
export function compareResults(a: SearchResult, b: SearchResult): number {
  if (a.similarity !== null && b.similarity === null) return -1;
  if (a.similarity === null && b.similarity !== null) return 1;
  if (a.similarity !== null && b.similarity !== null && a.similarity !== b.similarity) {
    return b.similarity - a.similarity;
  }
  if (a.modified_at !== b.modified_at) {
    return a.modified_at < b.modified_at ? 1 : -1;
  }
  return a.file_id - b.file_id;
}

export function toSearchResult(
  hit: CatalogHit,
  similarity: number | null,
  thumbnails: ThumbnailResolver
): SearchResult {
  return {
    file_id: hit.file_id,
    file_name: hit.file_name,
    file_path: hit.file_path,
    file_type: hit.file_type,
    extension: hit.extension,
    show: hit.show,
    file_size: hit.file_size,
    modified_at: hit.modified_at,
    width: hit.width,
    height: hit.height,
    thumbnail_url: thumbnails.resolve(hit.thumbnail_path),
    similarity: similarity === null ? null : clamp01(similarity),
  };
}
