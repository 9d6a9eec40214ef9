/**
 * Corpus Ingestor
 *
 * Offline half of the pipeline: regulatory source -> plain text -> chunks ->
 * embeddings -> vector index. Re-running on an unchanged corpus inserts
 * nothing, since chunk ids are derived from chunk text.
 */

import { ResultAsync, okAsync, errAsync } from '../../lib/result-types.js';
import type { AuditError } from '../../lib/errors.js';
import { IndexUnavailableError } from '../../lib/errors.js';
import { EMBEDDING_CONFIG } from '../../constants/pipeline-constants.js';
import type { EmbeddingVector, VectorIndexEntry } from '../../models/embedding-vector.js';
import type { IngestionReport } from '../../models/ingestion-report.js';
import type { RegulationChunk } from '../../models/regulation-chunk.js';
import type { RegulationDocument, SourceLocator } from '../../models/regulation-document.js';
import { silentLogger, type PipelineLogger } from '../../cli/utils/logger.js';
import type { EcfrClient } from '../ecfr-client.js';
import { TextChunker, createSectionResolver } from '../chunker/TextChunker.js';
import type { Embedder } from '../embedding/adapter-interface.js';
import type { VectorIndex } from '../vector-storage.js';

/**
 * Where the regulation text is read from
 */
export type CorpusSource =
  | { kind: 'remote'; locator: SourceLocator }
  | { kind: 'file'; path: string; locator: Pick<SourceLocator, 'title' | 'part'> };

/**
 * Progress notification for long ingestion steps
 */
export type IngestionProgress =
  | { step: 'fetch'; source: string }
  | { step: 'chunk'; sections: number }
  | { step: 'embed'; embedded: number; total: number }
  | { step: 'store'; entries: number };

export interface CorpusIngestorDeps {
  client: EcfrClient;
  chunker: TextChunker;
  embedder: Embedder;
  index: VectorIndex;

  /** Chunks per embed() call */
  batchSize?: number;

  logger?: PipelineLogger;
  onProgress?: (progress: IngestionProgress) => void;
}

export class CorpusIngestor {
  private readonly batchSize: number;
  private readonly logger: PipelineLogger;
  private readonly onProgress: (progress: IngestionProgress) => void;

  constructor(private readonly deps: CorpusIngestorDeps) {
    this.batchSize = Math.max(1, deps.batchSize ?? EMBEDDING_CONFIG.DEFAULT_BATCH_SIZE);
    this.logger = deps.logger ?? silentLogger;
    this.onProgress = deps.onProgress ?? (() => undefined);
  }

  /**
   * Ingest one regulatory part into the index
   */
  ingest(source: CorpusSource): ResultAsync<IngestionReport, AuditError> {
    const startTime = Date.now();
    const origin = this.describeSource(source);
    this.onProgress({ step: 'fetch', source: origin });
    this.logger.info('Ingestion started', { source: origin });

    return this.load(source).andThen((document) => {
      const chunks = this.deps.chunker.chunk(
        document.text,
        createSectionResolver(document.sections, partReference(source.locator))
      );
      this.onProgress({ step: 'chunk', sections: document.sections.length });
      this.logger.info('Regulation chunked', {
        corpus_id: document.corpusId,
        characters: document.text.length,
        sections: document.sections.length,
        chunks: chunks.length,
        window_size: this.deps.chunker.windowSize,
        overlap: this.deps.chunker.overlap,
      });

      return this.embedChunks(chunks).andThen((vectors) =>
        this.store(document, chunks, vectors, origin, startTime)
      );
    });
  }

  private load(source: CorpusSource): ResultAsync<RegulationDocument, AuditError> {
    return source.kind === 'remote'
      ? this.deps.client.fetchRegulationText(source.locator)
      : this.deps.client.readRegulationFile(source.path, source.locator);
  }

  /**
   * Embed chunk texts batch by batch, preserving order
   */
  private embedChunks(chunks: readonly RegulationChunk[]): ResultAsync<EmbeddingVector[], AuditError> {
    let pending: ResultAsync<EmbeddingVector[], AuditError> = okAsync([]);

    for (let start = 0; start < chunks.length; start += this.batchSize) {
      const batch = chunks.slice(start, start + this.batchSize).map((chunk) => chunk.text);
      pending = pending.andThen((vectors) =>
        this.deps.embedder.embed(batch).map((batchVectors) => {
          const embedded = vectors.concat(batchVectors);
          this.onProgress({ step: 'embed', embedded: embedded.length, total: chunks.length });
          return embedded;
        })
      );
    }

    return pending;
  }

  private store(
    document: RegulationDocument,
    chunks: readonly RegulationChunk[],
    vectors: readonly EmbeddingVector[],
    origin: string,
    startTime: number
  ): ResultAsync<IngestionReport, AuditError> {
    const entries: VectorIndexEntry[] = [];
    for (const [i, chunk] of chunks.entries()) {
      const vector = vectors[i];
      if (!vector) {
        return errAsync(
          new IndexUnavailableError(
            `Embedder returned ${vectors.length} vectors for ${chunks.length} chunks`,
            undefined,
            'ingest'
          )
        );
      }
      entries.push({ chunk, vector });
    }

    this.onProgress({ step: 'store', entries: entries.length });

    const { index, embedder } = this.deps;
    const stored = index.replaceSource(document.corpusId, entries).andThen((counts) => {
      const report: IngestionReport = {
        corpusId: document.corpusId,
        source: origin,
        sections: document.sections.length,
        chunks: chunks.length,
        inserted: counts.inserted,
        skipped: counts.skipped,
        removed: counts.removed,
        modelId: embedder.modelId,
        durationMs: Date.now() - startTime,
        completedAt: new Date().toISOString(),
      };
      return index.recordIngestion(report).map(() => report);
    });

    if (stored.isErr()) {
      return errAsync(stored.error);
    }

    this.logger.info('Ingestion completed', { ...stored.value });
    return okAsync(stored.value);
  }

  private describeSource(source: CorpusSource): string {
    return source.kind === 'remote' ? this.deps.client.buildUrl(source.locator) : source.path;
  }
}

/**
 * Reference recorded for text before the first section, e.g. "21 CFR Part 11"
 */
export function partReference(locator: Pick<SourceLocator, 'title' | 'part'>): string {
  return `${locator.title} CFR Part ${locator.part}`;
}
