import { describe, it, expect } from 'vitest';
import sharp from 'sharp';
import { EmbeddingFailure } from '../src/errors.js';
import { HttpEmbeddingProvider, prepareImage, type HttpEmbeddingOptions } from '../src/services/embeddings.js';
import { TEXT_EMBEDDING_DIM, VISUAL_EMBEDDING_DIM } from '../src/types.js';

const OPTIONS: HttpEmbeddingOptions = {
  ollamaBaseUrl: 'http://ollama.test',
  ollamaModel: 'all-minilm',
  clipBaseUrl: 'http://clip.test',
  maxTextChars: 40,
  maxImageBytes: 64 * 1024,
  timeoutMs: 1000,
};

interface RecordedCall {
  url: string;
  body: unknown;
}

function stubFetch(handler: (url: string, body: unknown) => Response | Promise<Response>) {
  const calls: RecordedCall[] = [];
  const fetchImpl: typeof fetch = async (input, init) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    const body: unknown = typeof init?.body === 'string' ? JSON.parse(init.body) : undefined;
    calls.push({ url, body });
    return handler(url, body);
  };
  return { fetchImpl, calls };
}

const json = (value: unknown, status = 200) =>
  new Response(JSON.stringify(value), { status, headers: { 'Content-Type': 'application/json' } });

const vector = (dim: number) => new Array<number>(dim).fill(0.5);

async function failureOf(promise: Promise<unknown>): Promise<EmbeddingFailure> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof EmbeddingFailure) return err;
    throw err;
  }
  throw new Error('expected an EmbeddingFailure');
}

describe('HttpEmbeddingProvider', () => {
  describe('embedText', () => {
    it('posts the trimmed text to the Ollama embed endpoint', async () => {
      const { fetchImpl, calls } = stubFetch(() => json({ embeddings: [vector(TEXT_EMBEDDING_DIM)] }));
      const provider = new HttpEmbeddingProvider(OPTIONS, fetchImpl);

      const result = await provider.embedText('  hero model  ');

      expect(result).toHaveLength(TEXT_EMBEDDING_DIM);
      expect(calls).toEqual([
        { url: 'http://ollama.test/api/embed', body: { model: 'all-minilm', input: 'hero model' } },
      ]);
    });

    it('fails as empty without calling the backend', async () => {
      const { fetchImpl, calls } = stubFetch(() => json({}));
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedText('   '));

      expect(failure.reason).toBe('empty');
      expect(calls).toHaveLength(0);
    });

    it('fails as oversized past the character limit', async () => {
      const { fetchImpl } = stubFetch(() => json({}));
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedText('x'.repeat(41)));

      expect(failure.reason).toBe('oversized');
      expect(failure.message).toBe('embedding failed (oversized): text is 41 characters, limit is 40');
    });

    it('rejects a vector of the wrong dimension', async () => {
      const { fetchImpl } = stubFetch(() => json({ embeddings: [vector(768)] }));
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedText('hero'));

      expect(failure.reason).toBe('backend');
      expect(failure.message).toBe('embedding failed (backend): expected a 384-dimension vector, got 768');
    });

    it('reports an error status from the backend', async () => {
      const { fetchImpl } = stubFetch(() => json({ error: 'model not loaded' }, 500));
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedText('hero'));

      expect(failure.message).toBe('embedding failed (backend): http://ollama.test/api/embed answered 500');
    });

    it('reports a body that is not JSON', async () => {
      const { fetchImpl } = stubFetch(() => new Response('<html>bad gateway</html>', { status: 200 }));
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedText('hero'));

      expect(failure.reason).toBe('backend');
      expect(failure.message.startsWith('embedding failed (backend): could not read response from http://ollama.test/api/embed:')).toBe(true);
    });

    it('reports an unreachable backend', async () => {
      const { fetchImpl } = stubFetch(() => {
        throw new TypeError('fetch failed');
      });
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedText('hero'));

      expect(failure.reason).toBe('backend');
      expect(failure.message).toBe(
        'embedding failed (backend): request to http://ollama.test/api/embed failed: fetch failed'
      );
    });
  });

  describe('embedTextForVisualSpace', () => {
    it('uses the CLIP text endpoint and accepts a single embedding', async () => {
      const { fetchImpl, calls } = stubFetch(() => json({ embedding: vector(VISUAL_EMBEDDING_DIM) }));

      const result = await new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedTextForVisualSpace('red car');

      expect(result).toHaveLength(VISUAL_EMBEDDING_DIM);
      expect(calls).toEqual([{ url: 'http://clip.test/embed/text', body: { texts: ['red car'] } }]);
    });
  });

  describe('embedImage', () => {
    it('sends a 224x224 JPEG to the CLIP image endpoint', async () => {
      const png = await sharp({
        create: { width: 64, height: 32, channels: 4, background: { r: 200, g: 40, b: 40, alpha: 0.5 } },
      })
        .png()
        .toBuffer();
      const { fetchImpl, calls } = stubFetch(() => json({ embeddings: [vector(VISUAL_EMBEDDING_DIM)] }));

      const result = await new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedImage(png);

      expect(result).toHaveLength(VISUAL_EMBEDDING_DIM);
      expect(calls[0]?.url).toBe('http://clip.test/embed/image');
      const body = calls[0]?.body;
      const encoded =
        body !== null && typeof body === 'object' && 'images' in body && Array.isArray(body.images)
          ? String(body.images[0])
          : '';
      const sent = await sharp(Buffer.from(encoded, 'base64')).metadata();
      expect([sent.format, sent.width, sent.height, sent.channels]).toEqual(['jpeg', 224, 224, 3]);
    });

    it('fails as corrupt on undecodable bytes', async () => {
      const { fetchImpl, calls } = stubFetch(() => json({}));
      const failure = await failureOf(
        new HttpEmbeddingProvider(OPTIONS, fetchImpl).embedImage(Buffer.from('definitely not an image'))
      );

      expect(failure.reason).toBe('corrupt');
      expect(calls).toHaveLength(0);
    });

    it('fails as empty or oversized before decoding', async () => {
      const { fetchImpl } = stubFetch(() => json({}));
      const provider = new HttpEmbeddingProvider(OPTIONS, fetchImpl);

      expect((await failureOf(provider.embedImage(Buffer.alloc(0)))).reason).toBe('empty');
      expect((await failureOf(provider.embedImage(Buffer.alloc(64 * 1024 + 1)))).reason).toBe('oversized');
    });
  });

  describe('initialize', () => {
    it('checks both backends', async () => {
      const { fetchImpl, calls } = stubFetch(() => json({ ok: true }));
      await new HttpEmbeddingProvider(OPTIONS, fetchImpl).initialize();

      expect(calls.map((call) => call.url)).toEqual(['http://ollama.test/api/tags', 'http://clip.test/health']);
    });

    it('fails when a backend is down', async () => {
      const { fetchImpl } = stubFetch((url) => (url.endsWith('/health') ? json({}, 503) : json({})));
      const failure = await failureOf(new HttpEmbeddingProvider(OPTIONS, fetchImpl).initialize());

      expect(failure.message).toBe('embedding failed (backend): clip health check answered 503');
    });
  });
});

describe('prepareImage', () => {
  it('square-crops wide images', async () => {
    const wide = await sharp({
      create: { width: 400, height: 100, channels: 3, background: { r: 0, g: 0, b: 255 } },
    })
      .jpeg()
      .toBuffer();
    const meta = await sharp(await prepareImage(wide)).metadata();
    expect([meta.width, meta.height]).toEqual([224, 224]);
  });
});
