import type { Decision, DecisionModel, DecisionRequest, ModelMessage } from '../src/agent/decision.js';
import type { LoopEvent, LoopState } from '../src/agent/events.js';
import type { AgentLimits } from '../src/agent/loop.js';
import { createCatalogTools } from '../src/agent/tools.js';
import { EmbeddingFailure } from '../src/errors.js';
import { CatalogStore } from '../src/services/catalog.js';
import { SqliteConversationStore } from '../src/services/conversations.js';
import type { EmbeddingProvider } from '../src/services/embeddings.js';
import type { VectorIndex, VectorMatch, VectorPoint, VectorSearchOptions, VectorSpace } from '../src/services/qdrant.js';
import { openDb, type Db } from '../src/services/sqlite.js';
import { LocalThumbnailResolver } from '../src/services/storage.js';
import {
  TEXT_EMBEDDING_DIM,
  VISUAL_EMBEDDING_DIM,
  type CatalogFileInput,
  type ToolCall,
} from '../src/types.js';

export const BASE_URL = 'http://assets.test';

export const TEST_LIMITS: AgentLimits = {
  maxIterations: 5,
  historyTurns: 10,
  toolConcurrency: 3,
  toolTimeoutMs: 1000,
  loopTimeoutMs: 5000,
  answerTimeoutMs: 1000,
};

/** Unit vector along axis `axis`. */
export function basis(dim: number, axis: number): number[] {
  const vector = new Array<number>(dim).fill(0);
  vector[axis] = 1;
  return vector;
}

/** Unit vector in the plane of axes 0 and 1 with cosine `cos` to axis 0. */
export function towardAxis0(dim: number, cos: number): number[] {
  const vector = new Array<number>(dim).fill(0);
  vector[0] = cos;
  vector[1] = Math.sqrt(Math.max(0, 1 - cos * cos));
  return vector;
}

function cosine(a: number[], b: number[]): number {
  let dot = 0;
  let na = 0;
  let nb = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    na += x * x;
    nb += y * y;
  }
  if (na === 0 || nb === 0) return 0;
  return dot / Math.sqrt(na * nb);
}

/** In-process stand-in for Qdrant with the same cosine scoring. */
export class MemoryVectorIndex implements VectorIndex {
  readonly spaces: Record<VectorSpace, Map<number, VectorPoint>> = {
    text: new Map(),
    visual: new Map(),
  };

  async ensureCollections(): Promise<void> {}

  async upsert(space: VectorSpace, points: VectorPoint[]): Promise<void> {
    for (const point of points) this.spaces[space].set(point.file_id, point);
  }

  async search(space: VectorSpace, vector: number[], options: VectorSearchOptions): Promise<VectorMatch[]> {
    return [...this.spaces[space].values()]
      .filter((point) => !options.kind || point.kind === options.kind)
      .map((point) => ({ file_id: point.file_id, kind: point.kind, score: cosine(vector, point.vector) }))
      .sort((a, b) => b.score - a.score || a.file_id - b.file_id)
      .slice(0, options.limit);
  }

  async deleteByFileId(fileId: number): Promise<void> {
    this.spaces.text.delete(fileId);
    this.spaces.visual.delete(fileId);
  }
}

/**
 * Deterministic embedder: known texts map to fixed vectors, anything
 * else to axis 2. Empty input fails like the real provider.
 */
export class FakeEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly vectors: {
      text?: Record<string, number[]>;
      visual?: Record<string, number[]>;
      image?: number[];
    } = {}
  ) {}

  async initialize(): Promise<void> {}

  async embedText(text: string): Promise<number[]> {
    this.calls.push(`text:${text}`);
    const input = text.trim();
    if (!input) throw new EmbeddingFailure('empty', 'text is empty');
    return this.vectors.text?.[input] ?? basis(TEXT_EMBEDDING_DIM, 2);
  }

  async embedTextForVisualSpace(text: string): Promise<number[]> {
    this.calls.push(`visual:${text}`);
    const input = text.trim();
    if (!input) throw new EmbeddingFailure('empty', 'text is empty');
    return this.vectors.visual?.[input] ?? basis(VISUAL_EMBEDDING_DIM, 2);
  }

  async embedImage(bytes: Buffer): Promise<number[]> {
    this.calls.push(`image:${bytes.length}`);
    if (bytes.length === 0) throw new EmbeddingFailure('empty', 'image has no bytes');
    return this.vectors.image ?? basis(VISUAL_EMBEDDING_DIM, 0);
  }
}

type DecideStep = (request: DecisionRequest, signal: AbortSignal) => Decision | Promise<Decision>;

/**
 * Decision model driven by a script. Steps run in order; the last one
 * repeats once the script is exhausted.
 */
export class ScriptedDecisionModel implements DecisionModel {
  readonly decideRequests: DecisionRequest[] = [];
  readonly answerRequests: ModelMessage[][] = [];

  constructor(
    private readonly steps: DecideStep[],
    private readonly answer: (messages: ModelMessage[], signal: AbortSignal) => AsyncIterable<string> = () =>
      chunksOf(['Here is what I found.'])
  ) {}

  async decide(request: DecisionRequest, signal: AbortSignal): Promise<Decision> {
    const step = this.steps[Math.min(this.decideRequests.length, this.steps.length - 1)];
    this.decideRequests.push(request);
    if (!step) return { kind: 'answer' };
    return step(request, signal);
  }

  streamAnswer(messages: ModelMessage[], signal: AbortSignal): AsyncIterable<string> {
    this.answerRequests.push(messages);
    return this.answer(messages, signal);
  }
}

export async function* chunksOf(chunks: string[]): AsyncGenerator<string> {
  for (const chunk of chunks) yield chunk;
}

export function callTools(...calls: Array<Omit<ToolCall, 'id'>>): DecideStep {
  return () => ({ kind: 'tools', calls: calls.map((call, index) => ({ id: `call_${index}`, ...call })) });
}

export const answerNow: DecideStep = () => ({ kind: 'answer' });

/** Resolves after `ms`, or rejects with an AbortError when `signal` fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(resolve, ms);
    signal?.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        const err = new Error('aborted');
        err.name = 'AbortError';
        reject(err);
      },
      { once: true }
    );
  });
}

export interface TestContext {
  db: Db;
  index: MemoryVectorIndex;
  catalog: CatalogStore;
  conversations: SqliteConversationStore;
  thumbnails: LocalThumbnailResolver;
  embeddings: FakeEmbeddingProvider;
  tools: ReturnType<typeof createCatalogTools>;
}

export function createTestContext(embeddings = new FakeEmbeddingProvider()): TestContext {
  const db = openDb(':memory:');
  const index = new MemoryVectorIndex();
  const catalog = new CatalogStore(db, index);
  const thumbnails = new LocalThumbnailResolver(BASE_URL);
  return {
    db,
    index,
    catalog,
    conversations: new SqliteConversationStore(db),
    thumbnails,
    embeddings,
    tools: createCatalogTools({ catalog, index, embeddings, thumbnails }),
  };
}

export function fileInput(overrides: Partial<CatalogFileInput> & Pick<CatalogFileInput, 'id' | 'file_name'>): CatalogFileInput {
  return {
    file_path: `/projects/${overrides.file_name}`,
    file_type: 'unknown',
    file_size: 1024,
    created_at: '2024-01-01T00:00:00.000Z',
    modified_at: '2024-01-01T00:00:00.000Z',
    scanned_at: '2024-01-02T00:00:00.000Z',
    ...overrides,
  };
}

/** Run a loop to completion, keeping every event and the terminal state. */
export async function drive(run: AsyncGenerator<LoopEvent, LoopState>): Promise<{ events: LoopEvent[]; state: LoopState }> {
  const events: LoopEvent[] = [];
  for (;;) {
    const next = await run.next();
    if (next.done) return { events, state: next.value };
    events.push(next.value);
  }
}

export interface SseFrame {
  event: string;
  data: Record<string, unknown>;
}

export function parseSse(body: string): SseFrame[] {
  return body
    .split('\n\n')
    .filter((block) => block.trim().length > 0)
    .map((block) => {
      const lines = block.split('\n');
      const event = lines.find((line) => line.startsWith('event: '))?.slice('event: '.length) ?? '';
      const data = lines.find((line) => line.startsWith('data: '))?.slice('data: '.length) ?? '{}';
      const parsed: unknown = JSON.parse(data);
      return { event, data: isRecord(parsed) ? parsed : {} };
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}
