import fs from 'fs';
import path from 'path';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { NotFoundError } from '../errors.js';
import { resolveThumbnailFile } from '../services/storage.js';

const CONTENT_TYPES: Record<string, string> = {
  '.webp': 'image/webp',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
};

export function thumbnailRoutes(thumbnailsDir: string) {
  return async function (fastify: FastifyInstance): Promise<void> {
    fastify.get('/api/thumbnails/*', async (req: FastifyRequest<{ Params: { '*': string } }>, reply: FastifyReply) => {
      const key = req.params['*'];
      const filePath = resolveThumbnailFile(thumbnailsDir, key);
      if (!filePath) {
        throw new NotFoundError('thumbnail not found');
      }

      const stat = await fs.promises.stat(filePath).catch((err: NodeJS.ErrnoException) => {
        if (err.code === 'ENOENT' || err.code === 'ENOTDIR') return null;
        throw err;
      });
      if (!stat?.isFile()) {
        throw new NotFoundError('thumbnail not found');
      }

      const contentType = CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
      return reply
        .header('Cache-Control', 'public, max-age=86400')
        .type(contentType)
        .send(fs.createReadStream(filePath));
    });
  };
}
