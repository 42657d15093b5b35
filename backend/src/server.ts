import type { FastifyInstance } from 'fastify';
import { buildApp } from './app.js';
import { createCatalogTools } from './agent/tools.js';
import { loadConfig } from './config.js';
import { CatalogStore } from './services/catalog.js';
import { SqliteConversationStore } from './services/conversations.js';
import { HttpEmbeddingProvider } from './services/embeddings.js';
import { GroqDecisionModel } from './services/groq.js';
import { buildLoggerOptions, getLogger } from './services/logger.js';
import { QdrantVectorIndex } from './services/qdrant.js';
import { openDb, type Db } from './services/sqlite.js';
import { LocalThumbnailResolver, ensureStorageDirs } from './services/storage.js';

const log = getLogger('server');

let app: FastifyInstance | null = null;
let db: Db | null = null;

async function bootstrap(): Promise<void> {
  const config = loadConfig();

  // Storage directories must exist before any routes fire.
  ensureStorageDirs(config.storage);
  db = openDb(config.storage.catalogDbPath);

  const index = new QdrantVectorIndex(config.qdrant);
  try {
    await index.ensureCollections();
  } catch (err) {
    // Keyword search and conversations still work without the vector index.
    log.warn({ err }, 'Qdrant not ready at startup; continuing with vector search degraded');
  }

  const embeddings = new HttpEmbeddingProvider(config.embeddings);
  try {
    await embeddings.initialize();
  } catch (err) {
    log.warn({ err }, 'Embedding backends not ready at startup; tools will fall back to keyword search');
  }

  const catalog = new CatalogStore(db, index);
  const thumbnails = new LocalThumbnailResolver(config.http.publicBaseUrl);

  app = await buildApp(
    {
      catalog,
      index,
      embeddings,
      thumbnails,
      tools: createCatalogTools({ catalog, index, embeddings, thumbnails }),
      model: new GroqDecisionModel(config.groq),
      conversations: new SqliteConversationStore(db),
      limits: config.agent,
      thumbnailsDir: config.storage.thumbnailsDir,
      corsOrigins: config.http.corsOrigins,
    },
    { logger: buildLoggerOptions(config.log), maxUploadBytes: config.embeddings.maxImageBytes }
  );

  await app.listen({ port: config.http.port, host: config.http.host });
  log.info(`Backend running on http://${config.http.host}:${config.http.port}`);
}

const shutdown = async (signal: string) => {
  log.info(`Received ${signal}, shutting down...`);
  await app?.close();
  db?.close();
  process.exit(0);
};

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  });
}

bootstrap().catch((err: unknown) => {
  log.fatal({ err }, 'Fatal startup error');
  process.exit(1);
});
