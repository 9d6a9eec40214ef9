import { describe, it, expect, afterEach } from 'vitest';
import type {
  BatchEmbedContentsRequest,
  BatchEmbedContentsResponse,
  EmbedContentRequest,
  EmbedContentResponse,
} from '@google/generative-ai';
import { GeminiEmbedder, type EmbeddingModelClient } from '../../../../src/services/embedding/GeminiEmbedder.js';
import { ModelUnavailableError } from '../../../../src/lib/errors.js';
import { RecordingLogger } from '../../../helpers/pipeline-test-helper.js';

function textOf(request: EmbedContentRequest): string {
  const part = request.content.parts[0];
  return part && 'text' in part && typeof part.text === 'string' ? part.text : '';
}

/**
 * Embeds a text as [length, 1, 0]; answers with `override` when given
 */
class FakeEmbeddingClient implements EmbeddingModelClient {
  readonly batches: string[][] = [];
  readonly queries: string[] = [];

  constructor(private readonly override?: Partial<Record<'single' | 'batch', () => Promise<never>>>) {}

  async embedContent(request: EmbedContentRequest): Promise<EmbedContentResponse> {
    if (this.override?.single) {
      return this.override.single();
    }
    this.queries.push(textOf(request));
    return { embedding: { values: [textOf(request).length, 1, 0] } };
  }

  async batchEmbedContents(request: BatchEmbedContentsRequest): Promise<BatchEmbedContentsResponse> {
    if (this.override?.batch) {
      return this.override.batch();
    }
    const texts = request.requests.map(textOf);
    this.batches.push(texts);
    return { embeddings: texts.map((text) => ({ values: [text.length, 1, 0] })) };
  }
}

const created: GeminiEmbedder[] = [];

function track(embedder: GeminiEmbedder): GeminiEmbedder {
  created.push(embedder);
  return embedder;
}

function embedderWith(client: EmbeddingModelClient, batchSize = 2): GeminiEmbedder {
  return track(new GeminiEmbedder({ apiKey: 'test-secret', dimensions: 3, batchSize, client, stage: 'ingest' }));
}

describe('GeminiEmbedder Unit Tests', () => {
  afterEach(() => {
    for (const embedder of created.splice(0)) {
      embedder.dispose();
    }
  });

  it('should default to text-embedding-004 with 768 dimensions', () => {
    const embedder = track(new GeminiEmbedder({ apiKey: 'test-secret', client: new FakeEmbeddingClient() }));
    expect(embedder.modelId).toBe('text-embedding-004');
    expect(embedder.dimensions).toBe(768);
  });

  it('should split texts into sequential batches and keep their order', async () => {
    const client = new FakeEmbeddingClient();
    const vectors = (await embedderWith(client).embed(['a', 'bb', 'ccc', 'dddd', 'eeeee']))._unsafeUnwrap();

    expect(client.batches).toEqual([['a', 'bb'], ['ccc', 'dddd'], ['eeeee']]);
    expect(vectors).toHaveLength(5);
    // [3, 1, 0] normalized
    expect(vectors[2]?.[0]).toBeCloseTo(3 / Math.sqrt(10), 6);
    expect(vectors[2]?.[1]).toBeCloseTo(1 / Math.sqrt(10), 6);
  });

  it('should return an empty list without calling the model', async () => {
    const client = new FakeEmbeddingClient();
    expect((await embedderWith(client).embed([]))._unsafeUnwrap()).toEqual([]);
    expect(client.batches).toEqual([]);
  });

  it('should embed a query with embedContent', async () => {
    const client = new FakeEmbeddingClient();
    const vector = (await embedderWith(client).embedQuery('abcd'))._unsafeUnwrap();

    expect(client.queries).toEqual(['abcd']);
    expect(vector[0]).toBeCloseTo(4 / Math.sqrt(17), 6);
  });

  it('should map a rejected call to ModelUnavailableError', async () => {
    const client = new FakeEmbeddingClient({ single: () => Promise.reject(new Error('quota exceeded')) });
    const error = (await embedderWith(client).embedQuery('abcd'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ModelUnavailableError);
    expect(error.message).toBe('Query embedding failed: quota exceeded');
    expect(error.stage).toBe('ingest');
  });

  it('should name the failing batch', async () => {
    const client = new FakeEmbeddingClient({ batch: () => Promise.reject(new Error('network down')) });
    const error = (await embedderWith(client).embed(['a']))._unsafeUnwrapErr();
    expect(error.message).toBe('Embedding batch 0 failed: network down');
  });

  it('should reject vectors of the wrong width', async () => {
    const embedder = track(
      new GeminiEmbedder({
        apiKey: 'test-secret',
        dimensions: 4,
        client: new FakeEmbeddingClient(),
      })
    );
    const error = (await embedder.embedQuery('abc'))._unsafeUnwrapErr();

    expect(error.message).toBe(
      'Model text-embedding-004 returned an invalid embedding (3 dimensions, expected 4)'
    );
  });

  it('should give up on a call that never settles', async () => {
    const client = new FakeEmbeddingClient({ single: () => new Promise<never>(() => {}) });
    const embedder = track(
      new GeminiEmbedder({ apiKey: 'test-secret', dimensions: 3, client, timeoutMs: 50 })
    );

    const error = (await embedder.embedQuery('abcd'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ModelUnavailableError);
    expect(error.message).toBe('Query embedding failed: timed out after 50ms');
    expect(error.stage).toBe('audit');
  });

  it('should fail fast once the circuit has opened', async () => {
    const logger = new RecordingLogger();
    let calls = 0;
    const client = new FakeEmbeddingClient({
      single: () => {
        calls++;
        return Promise.reject(new Error('quota exceeded'));
      },
    });
    const embedder = track(new GeminiEmbedder({ apiKey: 'test-secret', dimensions: 3, client, logger }));

    await embedder.embedQuery('first');
    const error = (await embedder.embedQuery('second'))._unsafeUnwrapErr();

    expect(calls).toBe(1);
    expect(error.message).toBe('Query embedding failed: circuit open after earlier failures (Breaker is open)');
    expect(logger.messages('warn')).toEqual(['Embedding circuit opened']);
  });
});
