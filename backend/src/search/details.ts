import { NotFoundError } from '../errors.js';
import type { CatalogStore } from '../services/catalog.js';
import type { ThumbnailResolver } from '../services/storage.js';
import type { FileDetails } from '../types.js';

/** Full record for one file, without raw vectors. */
export function getFileDetails(
  catalog: CatalogStore,
  thumbnails: ThumbnailResolver,
  fileId: number
): FileDetails {
  const entry = catalog.getEntry(fileId);
  if (!entry) {
    throw new NotFoundError(`file ${fileId} not found`);
  }

  const thumbnailPath = entry.media && 'thumbnail_path' in entry.media ? entry.media.thumbnail_path : null;
  return {
    file: entry.file,
    media: entry.media,
    has_visual_embedding: entry.has_visual_embedding,
    thumbnail_url: thumbnails.resolve(thumbnailPath),
  };
}
