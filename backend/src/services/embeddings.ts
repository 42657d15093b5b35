import sharp from 'sharp';
import { z } from 'zod';
import { EmbeddingFailure, errorMessage } from '../errors.js';
import { TEXT_EMBEDDING_DIM, VISUAL_EMBEDDING_DIM } from '../types.js';
import { getLogger } from './logger.js';

/**
 * Turns queries and images into vectors comparable with the stored
 * catalog embeddings: 384-d text space, 512-d cross-modal visual space.
 */
export interface EmbeddingProvider {
  initialize(): Promise<void>;
  embedText(text: string): Promise<number[]>;
  embedImage(bytes: Buffer): Promise<number[]>;
  embedTextForVisualSpace(text: string): Promise<number[]>;
}

export interface HttpEmbeddingOptions {
  ollamaBaseUrl: string;
  ollamaModel: string;
  clipBaseUrl: string;
  maxTextChars: number;
  maxImageBytes: number;
  timeoutMs: number;
}

type FetchLike = typeof fetch;

const EmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())).optional(),
  embedding: z.array(z.number()).optional(),
});

const CLIP_IMAGE_SIZE = 224;

/**
 * Text vectors come from Ollama's /api/embed, visual vectors from a CLIP
 * service exposing POST /embed/text and POST /embed/image.
 */
export class HttpEmbeddingProvider implements EmbeddingProvider {
  private readonly log = getLogger('embeddings');

  constructor(
    private readonly options: HttpEmbeddingOptions,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async initialize(): Promise<void> {
    await this.ping(`${this.options.ollamaBaseUrl}/api/tags`, 'ollama');
    await this.ping(`${this.options.clipBaseUrl}/health`, 'clip');
    this.log.info(
      { model: this.options.ollamaModel, clip: this.options.clipBaseUrl },
      'Embedding backends reachable'
    );
  }

  async embedText(text: string): Promise<number[]> {
    const input = this.checkText(text);
    const data = await this.postJson(`${this.options.ollamaBaseUrl}/api/embed`, {
      model: this.options.ollamaModel,
      input,
    });
    return expectDimension(data.embeddings?.[0] ?? data.embedding, TEXT_EMBEDDING_DIM);
  }

  async embedTextForVisualSpace(text: string): Promise<number[]> {
    const input = this.checkText(text);
    const data = await this.postJson(`${this.options.clipBaseUrl}/embed/text`, { texts: [input] });
    return expectDimension(data.embeddings?.[0] ?? data.embedding, VISUAL_EMBEDDING_DIM);
  }

  async embedImage(bytes: Buffer): Promise<number[]> {
    if (bytes.length === 0) {
      throw new EmbeddingFailure('empty', 'image has no bytes');
    }
    if (bytes.length > this.options.maxImageBytes) {
      throw new EmbeddingFailure(
        'oversized',
        `image is ${bytes.length} bytes, limit is ${this.options.maxImageBytes}`
      );
    }

    const prepared = await prepareImage(bytes);
    const data = await this.postJson(`${this.options.clipBaseUrl}/embed/image`, {
      images: [prepared.toString('base64')],
    });
    return expectDimension(data.embeddings?.[0] ?? data.embedding, VISUAL_EMBEDDING_DIM);
  }

  private checkText(text: string): string {
    const input = text.trim();
    if (!input) {
      throw new EmbeddingFailure('empty', 'text is empty');
    }
    if (input.length > this.options.maxTextChars) {
      throw new EmbeddingFailure(
        'oversized',
        `text is ${input.length} characters, limit is ${this.options.maxTextChars}`
      );
    }
    return input;
  }

  private async postJson(url: string, body: unknown): Promise<z.infer<typeof EmbedResponseSchema>> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.options.timeoutMs),
      });
    } catch (err) {
      throw new EmbeddingFailure('backend', `request to ${url} failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!response.ok) {
      throw new EmbeddingFailure('backend', `${url} answered ${response.status}`);
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new EmbeddingFailure('backend', `could not read response from ${url}: ${errorMessage(err)}`, { cause: err });
    }

    const parsed = EmbedResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new EmbeddingFailure('backend', `${url} returned an unexpected body`);
    }
    return parsed.data;
  }

  private async ping(url: string, backend: string): Promise<void> {
    let response: Response;
    try {
      response = await this.fetchImpl(url, { signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (err) {
      throw new EmbeddingFailure('backend', `${backend} unreachable at ${url}: ${errorMessage(err)}`, { cause: err });
    }
    if (!response.ok) {
      throw new EmbeddingFailure('backend', `${backend} health check answered ${response.status}`);
    }
  }
}

/** Decode, orient and square-crop an image to the CLIP input size as RGB JPEG. */
export async function prepareImage(bytes: Buffer): Promise<Buffer> {
  try {
    return await sharp(bytes)
      .rotate()
      .resize(CLIP_IMAGE_SIZE, CLIP_IMAGE_SIZE, { fit: 'cover' })
      .removeAlpha()
      .jpeg({ quality: 90 })
      .toBuffer();
  } catch (err) {
    throw new EmbeddingFailure('corrupt', `image could not be decoded: ${errorMessage(err)}`, { cause: err });
  }
}

function expectDimension(vector: number[] | undefined, expected: number): number[] {
  if (!vector || vector.length !== expected) {
    throw new EmbeddingFailure(
      'backend',
      `expected a ${expected}-dimension vector, got ${vector ? vector.length : 'none'}`
    );
  }
  return vector;
}
