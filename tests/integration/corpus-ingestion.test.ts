/**
 * Offline ingestion from a saved eCFR payload and from a stubbed eCFR API
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CorpusIngestor, partReference, type IngestionProgress } from '../../src/services/ingestion/CorpusIngestor.js';
import { EcfrClient } from '../../src/services/ecfr-client.js';
import { TextChunker } from '../../src/services/chunker/TextChunker.js';
import { HashingEmbedder, hashEmbedding } from '../../src/services/embedding/HashingEmbedder.js';
import { embeddingSpaceOf, type Embedder } from '../../src/services/embedding/adapter-interface.js';
import type { VectorIndex } from '../../src/services/vector-storage.js';
import { ModelUnavailableError } from '../../src/lib/errors.js';
import { errAsync } from '../../src/lib/result-types.js';
import type { SourceLocator } from '../../src/models/regulation-document.js';
import { createTestIndex } from '../helpers/index-test-helper.js';
import { createFakeFetch, fixturePath, readFixture } from '../helpers/pipeline-test-helper.js';

const LOCATOR: SourceLocator = { title: 21, part: 11, date: '2024-02-01' };
const FIXTURE = 'ecfr/part-11-excerpt.xml';
const QUERY = 'time-stamped audit trails of operator entries';

/**
 * Embedder that fails every call
 */
class UnavailableEmbedder extends HashingEmbedder {
  override embed(): ReturnType<Embedder['embed']> {
    return errAsync(new ModelUnavailableError('embedding service down', undefined, 'ingest'));
  }
}

describe('CorpusIngestor Integration Tests', () => {
  const embedder = new HashingEmbedder();
  let index: VectorIndex;
  let progress: IngestionProgress[];

  function ingestorWith(client: EcfrClient, target: Embedder = embedder): CorpusIngestor {
    return new CorpusIngestor({
      client,
      chunker: TextChunker.create({ windowSize: 200, overlap: 20 })._unsafeUnwrap(),
      embedder: target,
      index,
      batchSize: 4,
      onProgress: (event) => progress.push(event),
    });
  }

  beforeEach(() => {
    index = createTestIndex(embeddingSpaceOf(embedder));
    progress = [];
  });

  afterEach(() => {
    index.close();
  });

  describe('from a saved file', () => {
    const source = { kind: 'file', path: fixturePath(FIXTURE), locator: { title: 21, part: 11 } } as const;

    it('should chunk, embed and store the part', async () => {
      const report = (await ingestorWith(new EcfrClient()).ingest(source))._unsafeUnwrap();

      expect(report.corpusId).toBe('title-21-part-11');
      expect(report.source).toBe(fixturePath(FIXTURE));
      expect(report.sections).toBe(3);
      expect(report.chunks).toBeGreaterThan(1);
      expect(report.inserted).toBe(report.chunks);
      expect(report.skipped).toBe(0);
      expect(report.removed).toBe(0);
      expect(report.modelId).toBe('hashing-ngram-v1');
      expect(index.stats()._unsafeUnwrap().lastIngestion).toEqual(report);
    });

    it('should attribute chunks to their sections', async () => {
      await ingestorWith(new EcfrClient()).ingest(source);

      const sourceIds = new Set(
        index
          .query(new Float32Array(embedder.dimensions), 100)
          ._unsafeUnwrap()
          .map(({ chunk }) => chunk.sourceId)
      );
      expect(sourceIds.has(partReference(LOCATOR))).toBe(true);
      expect(sourceIds.has('§ 11.10')).toBe(true);
    });

    it('should be idempotent on an unchanged corpus', async () => {
      const ingestor = ingestorWith(new EcfrClient());
      const first = (await ingestor.ingest(source))._unsafeUnwrap();
      const before = index.query(hashEmbedding(QUERY), 5)._unsafeUnwrap();

      const second = (await ingestor.ingest(source))._unsafeUnwrap();
      const after = index.query(hashEmbedding(QUERY), 5)._unsafeUnwrap();

      expect(second.inserted).toBe(0);
      expect(second.skipped).toBe(first.chunks);
      expect(second.removed).toBe(0);
      expect(index.size()._unsafeUnwrap()).toBe(first.chunks);
      expect(after).toEqual(before);
    });

    it('should report progress for every step', async () => {
      const report = (await ingestorWith(new EcfrClient()).ingest(source))._unsafeUnwrap();

      expect(progress[0]).toEqual({ step: 'fetch', source: fixturePath(FIXTURE) });
      expect(progress[1]).toEqual({ step: 'chunk', sections: 3 });
      expect(progress.at(-2)).toEqual({ step: 'embed', embedded: report.chunks, total: report.chunks });
      expect(progress.at(-1)).toEqual({ step: 'store', entries: report.chunks });
    });

    it('should leave the index untouched when embedding fails', async () => {
      const error = (
        await ingestorWith(new EcfrClient(), new UnavailableEmbedder()).ingest(source)
      )._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(ModelUnavailableError);
      expect(error.message).toBe('embedding service down');
      expect(index.size()._unsafeUnwrap()).toBe(0);
    });
  });

  describe('from the eCFR API', () => {
    it('should fetch the configured part', async () => {
      const fake = createFakeFetch(() => new Response(readFixture(FIXTURE), { status: 200 }));
      const client = new EcfrClient({ baseUrl: 'https://ecfr.example.test', fetchFn: fake.fetchFn });

      const report = (await ingestorWith(client).ingest({ kind: 'remote', locator: LOCATOR }))._unsafeUnwrap();

      expect(fake.urls).toEqual([
        'https://ecfr.example.test/api/versioner/v1/full/2024-02-01/title-21.xml?part=11',
      ]);
      expect(report.source).toBe(fake.urls[0]);
      expect(report.inserted).toBe(report.chunks);
    });

    it('should drop entries of text that disappeared from the part', async () => {
      const full = readFixture(FIXTURE);
      const amended = full.replace(/<DIV6 N="C" TYPE="SUBPART">[\s\S]*?<\/DIV6>/, '');
      const payloads = [full, amended];
      const fake = createFakeFetch(() => new Response(payloads.shift() ?? amended, { status: 200 }));
      const ingestor = ingestorWith(new EcfrClient({ baseUrl: 'https://ecfr.example.test', fetchFn: fake.fetchFn }));

      (await ingestor.ingest({ kind: 'remote', locator: LOCATOR }))._unsafeUnwrap();
      const second = (await ingestor.ingest({ kind: 'remote', locator: LOCATOR }))._unsafeUnwrap();

      expect(amended).not.toBe(full);
      expect(second.sections).toBe(2);
      expect(second.removed).toBeGreaterThan(0);
      expect(second.inserted + second.skipped).toBe(second.chunks);
      expect(index.size()._unsafeUnwrap()).toBe(second.chunks);
    });

    it('should fail without touching the index when the API is down', async () => {
      const fake = createFakeFetch(() => new Response('', { status: 503, statusText: 'Service Unavailable' }));
      const client = new EcfrClient({ baseUrl: 'https://ecfr.example.test', fetchFn: fake.fetchFn });

      const error = (await ingestorWith(client).ingest({ kind: 'remote', locator: LOCATOR }))._unsafeUnwrapErr();

      expect(error.message).toBe('Failed to fetch eCFR data: HTTP 503 Service Unavailable');
      expect(error.stage).toBe('ingest');
      expect(index.size()._unsafeUnwrap()).toBe(0);
    });
  });
});
