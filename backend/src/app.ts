import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import multipart from '@fastify/multipart';
import type { DecisionModel } from './agent/decision.js';
import type { AgentLimits } from './agent/loop.js';
import type { ToolRegistry } from './agent/registry.js';
import { CatalogAssistantError } from './errors.js';
import { chatRoutes } from './routes/chat.js';
import { conversationRoutes } from './routes/conversations.js';
import { searchRoutes } from './routes/search.js';
import { thumbnailRoutes } from './routes/thumbnails.js';
import type { CatalogStore } from './services/catalog.js';
import type { ConversationStore } from './services/conversations.js';
import type { EmbeddingProvider } from './services/embeddings.js';
import type { VectorIndex } from './services/qdrant.js';
import type { ThumbnailResolver } from './services/storage.js';

export interface AppDeps {
  catalog: CatalogStore;
  index: VectorIndex;
  embeddings: EmbeddingProvider;
  thumbnails: ThumbnailResolver;
  tools: ToolRegistry;
  model: DecisionModel;
  conversations: ConversationStore;
  limits: AgentLimits;
  thumbnailsDir: string;
  corsOrigins: string[];
}

export interface AppOptions {
  logger?: FastifyServerOptions['logger'];
  maxUploadBytes?: number;
}

const DEFAULT_MAX_UPLOAD_BYTES = 25 * 1024 * 1024;

/** JSON bodies carry the image as base64 (4 chars per 3 bytes) plus the other fields. */
export function jsonBodyLimit(maxUploadBytes: number): number {
  return Math.ceil((maxUploadBytes * 4) / 3) + 64 * 1024;
}

export async function buildApp(deps: AppDeps, options: AppOptions = {}): Promise<FastifyInstance> {
  const maxUploadBytes = options.maxUploadBytes ?? DEFAULT_MAX_UPLOAD_BYTES;
  const fastify = Fastify({ logger: options.logger ?? false, bodyLimit: jsonBodyLimit(maxUploadBytes) });

  await fastify.register(cors, {
    origin: deps.corsOrigins,
    methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
  });

  await fastify.register(multipart, {
    limits: { fileSize: maxUploadBytes, files: 1 },
  });

  fastify.setErrorHandler((err, req, reply) => {
    if (err instanceof CatalogAssistantError) {
      if (err.statusCode >= 500) req.log.error({ err }, err.message);
      return reply.status(err.statusCode).send({ error: err.message, code: err.code });
    }
    if (err.statusCode !== undefined && err.statusCode < 500) {
      return reply.status(err.statusCode).send({ error: err.message });
    }
    req.log.error({ err }, 'Unhandled route error');
    return reply.status(500).send({ error: 'internal server error' });
  });

  await fastify.register(chatRoutes(deps));
  await fastify.register(conversationRoutes(deps.conversations));
  await fastify.register(searchRoutes(deps));
  await fastify.register(thumbnailRoutes(deps.thumbnailsDir));

  fastify.get('/health', async () => ({ status: 'ok', ts: Date.now() }));

  return fastify;
}
