/**
 * Pipeline Factory
 *
 * Builds the ingestion and audit object graphs from a resolved
 * configuration. Strategies (embedder, language model) are chosen here.
 */

import path from 'path';
import { Result, ok, err } from '../../lib/result-types.js';
import type { AuditError, ErrorStage } from '../../lib/errors.js';
import { requireApiKey } from '../../lib/env-config.js';
import { STORAGE_CONFIG } from '../../constants/pipeline-constants.js';
import type { PipelineConfig } from '../../models/pipeline-config.js';
import type { PipelineLogger } from '../../cli/utils/logger.js';
import { EcfrClient } from '../ecfr-client.js';
import { TextChunker } from '../chunker/TextChunker.js';
import { createEmbedder } from '../embedding/embedder-factory.js';
import { embeddingSpaceOf, type Embedder } from '../embedding/adapter-interface.js';
import { VectorIndex } from '../vector-storage.js';
import { CorpusIngestor, type IngestionProgress } from '../ingestion/CorpusIngestor.js';
import { Retriever } from '../retrieval/Retriever.js';
import { AuditGenerator } from '../generation/AuditGenerator.js';
import { GeminiLanguageModel, type LanguageModel } from '../generation/language-model.js';
import { AuditPipeline } from './AuditPipeline.js';

export function indexPath(config: PipelineConfig): string {
  return path.join(config.dataDir, STORAGE_CONFIG.INDEX_FILE);
}

export function sourcesDir(config: PipelineConfig): string {
  return path.join(config.dataDir, STORAGE_CONFIG.SOURCES_DIR);
}

/**
 * Open the configured index bound to the embedder's space
 */
export function openIndexFor(
  config: PipelineConfig,
  embedder: Embedder,
  stage: ErrorStage,
  reset = false
): Result<VectorIndex, AuditError> {
  return VectorIndex.open(indexPath(config), { space: embeddingSpaceOf(embedder), stage, reset });
}

export interface IngestionContext {
  ingestor: CorpusIngestor;
  index: VectorIndex;
  dispose(): void;
}

export interface IngestionOptions {
  reset?: boolean;
  logger?: PipelineLogger;
  onProgress?: (progress: IngestionProgress) => void;
}

export function buildIngestion(
  config: PipelineConfig,
  options: IngestionOptions = {}
): Result<IngestionContext, AuditError> {
  const chunker = TextChunker.create(config.chunking);
  if (chunker.isErr()) {
    return err(chunker.error);
  }

  const embedder = createEmbedder(config, 'ingest', options.logger);
  if (embedder.isErr()) {
    return err(embedder.error);
  }

  const index = openIndexFor(config, embedder.value, 'ingest', options.reset);
  if (index.isErr()) {
    embedder.value.dispose();
    return err(index.error);
  }

  return ok({
    index: index.value,
    ingestor: new CorpusIngestor({
      client: new EcfrClient({
        baseUrl: config.source.baseUrl,
        timeoutMs: config.source.timeoutMs,
        cacheDir: sourcesDir(config),
        logger: options.logger,
      }),
      chunker: chunker.value,
      embedder: embedder.value,
      index: index.value,
      batchSize: config.embedding.batchSize,
      logger: options.logger,
      onProgress: options.onProgress,
    }),
    dispose: () => {
      embedder.value.dispose();
      index.value.close();
    },
  });
}

export interface AuditContext {
  pipeline: AuditPipeline;
  retriever: Retriever;
  dispose(): void;
}

export interface AuditOptions {
  logger?: PipelineLogger;

  /** Language model override; defaults to Gemini */
  model?: LanguageModel;
}

export function buildAudit(config: PipelineConfig, options: AuditOptions = {}): Result<AuditContext, AuditError> {
  const embedder = createEmbedder(config, 'audit', options.logger);
  if (embedder.isErr()) {
    return err(embedder.error);
  }

  let model: LanguageModel;
  if (options.model) {
    model = options.model;
  } else {
    const apiKey = requireApiKey(config);
    if (apiKey.isErr()) {
      return err(apiKey.error);
    }
    model = new GeminiLanguageModel({ apiKey: apiKey.value, model: config.generation.model });
  }

  const index = openIndexFor(config, embedder.value, 'audit');
  if (index.isErr()) {
    embedder.value.dispose();
    return err(index.error);
  }

  const retriever = new Retriever({ embedder: embedder.value, index: index.value, logger: options.logger });
  const generator = new AuditGenerator(model, {
    timeoutMs: config.generation.timeoutMs,
    logger: options.logger,
  });

  return ok({
    retriever,
    pipeline: new AuditPipeline({ retriever, generator, topK: config.topK, logger: options.logger }),
    dispose: () => {
      generator.dispose();
      embedder.value.dispose();
      index.value.close();
    },
  });
}

export interface SearchContext {
  retriever: Retriever;
  dispose(): void;
}

/**
 * Retrieval only; needs no language model
 */
export function buildSearch(config: PipelineConfig, logger?: PipelineLogger): Result<SearchContext, AuditError> {
  return createEmbedder(config, 'audit', logger).andThen((embedder) =>
    openIndexFor(config, embedder, 'audit')
      .map((index) => ({
        retriever: new Retriever({ embedder, index, logger }),
        dispose: () => {
          embedder.dispose();
          index.close();
        },
      }))
      .mapErr((error) => {
        embedder.dispose();
        return error;
      })
  );
}
