import path from 'path';
import fs from 'fs';

/**
 * Maps a stored thumbnail key to a URL the client can fetch.
 */
export interface ThumbnailResolver {
  resolve(thumbnailPath: string | null | undefined): string | null;
}

const OBJECT_STORE_PREFIX = /^s3:\/\/[^/]+\//;

/**
 * Thumbnail keys may be written by the indexer as `s3://bucket/key`
 * or as a path relative to the thumbnail directory.
 */
export function thumbnailKey(thumbnailPath: string): string {
  return thumbnailPath.trim().replace(OBJECT_STORE_PREFIX, '').replace(/^\/+/, '');
}

export class LocalThumbnailResolver implements ThumbnailResolver {
  private readonly baseUrl: string;

  constructor(publicBaseUrl: string) {
    this.baseUrl = publicBaseUrl.replace(/\/+$/, '');
  }

  resolve(thumbnailPath: string | null | undefined): string | null {
    if (!thumbnailPath) return null;
    const key = thumbnailKey(thumbnailPath);
    if (!key) return null;

    const encoded = key.split('/').map(encodeURIComponent).join('/');
    return `${this.baseUrl}/api/thumbnails/${encoded}`;
  }
}

/**
 * Absolute path of a thumbnail inside `thumbnailsDir`, or null when the
 * key escapes the directory.
 */
export function resolveThumbnailFile(thumbnailsDir: string, key: string): string | null {
  const root = path.resolve(thumbnailsDir);
  const target = path.resolve(root, thumbnailKey(key));
  if (target === root || !target.startsWith(`${root}${path.sep}`)) return null;
  return target;
}

/**
 * Ensure the storage directories exist. Call on server startup.
 */
export function ensureStorageDirs(dirs: { catalogDbPath: string; thumbnailsDir: string }): void {
  fs.mkdirSync(dirs.thumbnailsDir, { recursive: true });
  if (dirs.catalogDbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(path.resolve(dirs.catalogDbPath)), { recursive: true });
  }
}
