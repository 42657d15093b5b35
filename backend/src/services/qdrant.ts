import { QdrantClient } from '@qdrant/js-client-rest';
import { TEXT_EMBEDDING_DIM, VISUAL_EMBEDDING_DIM, type FileType, type VisualKind } from '../types.js';

export type VectorSpace = 'text' | 'visual';

export interface VectorPoint {
  file_id: number;
  kind: FileType;
  vector: number[];
}

export interface VectorMatch {
  file_id: number;
  kind: string;
  /** Cosine similarity as reported by the index, not yet clamped. */
  score: number;
}

export interface VectorSearchOptions {
  limit: number;
  kind?: VisualKind;
}

/**
 * Nearest-neighbour index over file embeddings. One point per file per
 * space, keyed by the catalog file id.
 */
export interface VectorIndex {
  ensureCollections(): Promise<void>;
  upsert(space: VectorSpace, points: VectorPoint[]): Promise<void>;
  search(space: VectorSpace, vector: number[], options: VectorSearchOptions): Promise<VectorMatch[]>;
  deleteByFileId(fileId: number): Promise<void>;
}

export interface QdrantIndexOptions {
  url: string;
  textCollection: string;
  visualCollection: string;
  timeoutMs?: number;
}

export const VECTOR_SIZES: Record<VectorSpace, number> = {
  text: TEXT_EMBEDDING_DIM,
  visual: VISUAL_EMBEDDING_DIM,
};

export class QdrantVectorIndex implements VectorIndex {
  private readonly client: QdrantClient;
  private readonly collections: Record<VectorSpace, string>;

  constructor(options: QdrantIndexOptions, client?: QdrantClient) {
    this.client = client ?? new QdrantClient({ url: options.url, timeout: options.timeoutMs ?? 5000 });
    this.collections = { text: options.textCollection, visual: options.visualCollection };
  }

  async ensureCollections(): Promise<void> {
    for (const space of ['text', 'visual'] as const) {
      const name = this.collections[space];
      const exists = await this.client.collectionExists(name);
      if (exists.exists) continue;

      await this.client.createCollection(name, {
        vectors: {
          size: VECTOR_SIZES[space],
          distance: 'Cosine',
        },
      });
      await this.client.createPayloadIndex(name, {
        field_name: 'kind',
        field_schema: 'keyword',
        wait: true,
      });
    }
  }

  async upsert(space: VectorSpace, points: VectorPoint[]): Promise<void> {
    if (points.length === 0) return;

    for (const point of points) {
      if (point.vector.length !== VECTOR_SIZES[space]) {
        throw new Error(
          `Vector size mismatch for file ${point.file_id}: expected ${VECTOR_SIZES[space]}, got ${point.vector.length}`
        );
      }
    }

    await this.client.upsert(this.collections[space], {
      wait: true,
      points: points.map((point) => ({
        id: point.file_id,
        vector: point.vector,
        payload: { file_id: point.file_id, kind: point.kind },
      })),
    });
  }

  async search(space: VectorSpace, vector: number[], options: VectorSearchOptions): Promise<VectorMatch[]> {
    const results = await this.client.search(this.collections[space], {
      vector,
      limit: options.limit,
      with_payload: true,
      with_vector: false,
      filter: options.kind
        ? { must: [{ key: 'kind', match: { value: options.kind } }] }
        : undefined,
    });

    return results
      .map((point) => {
        const payload = point.payload ?? {};
        return {
          file_id: Number(payload.file_id ?? point.id),
          kind: String(payload.kind ?? ''),
          score: Number(point.score ?? 0),
        };
      })
      .filter((match) => Number.isInteger(match.file_id));
  }

  async deleteByFileId(fileId: number): Promise<void> {
    for (const space of ['text', 'visual'] as const) {
      await this.client.delete(this.collections[space], {
        wait: true,
        points: [fileId],
      });
    }
  }
}
