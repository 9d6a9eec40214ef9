/**
 * Gemini Embedder
 *
 * Hosted embedder backed by the Google Generative AI embedding models
 * (default text-embedding-004). Chunk texts are sent through
 * batchEmbedContents in batches, queries through embedContent; both use the
 * same model and no task type, so they share one embedding space.
 *
 * Every call runs through an opossum circuit breaker with a timeout, so a
 * stalled request surfaces as ModelUnavailableError instead of hanging.
 */

import CircuitBreaker from 'opossum';
import { GoogleGenerativeAI } from '@google/generative-ai';
import type {
  BatchEmbedContentsRequest,
  BatchEmbedContentsResponse,
  EmbedContentRequest,
  EmbedContentResponse,
} from '@google/generative-ai';
import { ResultAsync, okAsync, errAsync, tryAsync, asError, describeError, errorCode } from '../../lib/result-types.js';
import { ModelUnavailableError } from '../../lib/errors.js';
import type { ErrorStage } from '../../lib/errors.js';
import { isValidEmbedding, normalizeVector } from '../../lib/embedding-utils.js';
import { BREAKER_ERROR_CODES, EMBEDDING_CONFIG } from '../../constants/pipeline-constants.js';
import type { EmbeddingVector } from '../../models/embedding-vector.js';
import { silentLogger, type PipelineLogger } from '../../cli/utils/logger.js';
import type { Embedder } from './adapter-interface.js';

/**
 * The embedding calls used from a GenerativeModel
 */
export interface EmbeddingModelClient {
  embedContent(request: EmbedContentRequest): Promise<EmbedContentResponse>;
  batchEmbedContents(request: BatchEmbedContentsRequest): Promise<BatchEmbedContentsResponse>;
}

export interface GeminiEmbedderOptions {
  apiKey: string;

  /** Embedding model name, default text-embedding-004 */
  model?: string;

  /** Vector width the model returns */
  dimensions?: number;

  /** Texts per batchEmbedContents call */
  batchSize?: number;

  /** Per-request timeout in milliseconds */
  timeoutMs?: number;

  /** Stage failures are attributed to */
  stage?: ErrorStage;

  logger?: PipelineLogger;

  /** Client override (defaults to a GoogleGenerativeAI model) */
  client?: EmbeddingModelClient;
}

export class GeminiEmbedder implements Embedder {
  readonly modelId: string;
  readonly dimensions: number;

  private readonly client: EmbeddingModelClient;
  private readonly batchSize: number;
  private readonly timeoutMs: number;
  private readonly stage: ErrorStage;
  private readonly logger: PipelineLogger;
  private readonly queryBreaker: CircuitBreaker<[EmbedContentRequest], EmbedContentResponse>;
  private readonly batchBreaker: CircuitBreaker<[BatchEmbedContentsRequest], BatchEmbedContentsResponse>;

  constructor(options: GeminiEmbedderOptions) {
    this.modelId = options.model ?? EMBEDDING_CONFIG.DEFAULT_GEMINI_MODEL;
    this.dimensions = options.dimensions ?? EMBEDDING_CONFIG.GEMINI_DIMENSIONS;
    this.batchSize = Math.min(
      options.batchSize ?? EMBEDDING_CONFIG.DEFAULT_BATCH_SIZE,
      EMBEDDING_CONFIG.MAX_BATCH_SIZE
    );
    this.timeoutMs = options.timeoutMs ?? EMBEDDING_CONFIG.DEFAULT_TIMEOUT_MS;
    this.stage = options.stage ?? 'audit';
    this.logger = options.logger ?? silentLogger;
    this.client =
      options.client ??
      new GoogleGenerativeAI(options.apiKey).getGenerativeModel(
        { model: this.modelId },
        { timeout: this.timeoutMs }
      );

    const breakerOptions = {
      timeout: this.timeoutMs,
      errorThresholdPercentage: EMBEDDING_CONFIG.ERROR_THRESHOLD_PERCENTAGE,
      resetTimeout: EMBEDDING_CONFIG.RESET_TIMEOUT_MS,
    };
    this.queryBreaker = new CircuitBreaker((request: EmbedContentRequest) => this.client.embedContent(request), {
      ...breakerOptions,
      name: 'query-embedding',
    });
    this.batchBreaker = new CircuitBreaker(
      (request: BatchEmbedContentsRequest) => this.client.batchEmbedContents(request),
      { ...breakerOptions, name: 'batch-embedding' }
    );

    for (const breaker of [this.queryBreaker, this.batchBreaker]) {
      breaker.on('open', () => {
        this.logger.warn('Embedding circuit opened', { model: this.modelId, breaker: breaker.name });
      });
    }
  }

  embed(texts: readonly string[]): ResultAsync<EmbeddingVector[], ModelUnavailableError> {
    const batches: string[][] = [];
    for (let i = 0; i < texts.length; i += this.batchSize) {
      batches.push(texts.slice(i, i + this.batchSize));
    }

    // Batches run one after another
    return batches.reduce<ResultAsync<EmbeddingVector[], ModelUnavailableError>>(
      (acc, batch, index) =>
        acc.andThen((vectors) =>
          this.embedBatch(batch, index).map((batchVectors) => vectors.concat(batchVectors))
        ),
      okAsync([])
    );
  }

  embedQuery(text: string): ResultAsync<EmbeddingVector, ModelUnavailableError> {
    return tryAsync(
      () => this.queryBreaker.fire(toRequest(text)),
      (error) => this.toModelError('Query embedding failed', error)
    ).andThen((response) => this.toVector(response.embedding.values));
  }

  /**
   * Stop the breakers' timers
   */
  dispose(): void {
    this.queryBreaker.shutdown();
    this.batchBreaker.shutdown();
  }

  private embedBatch(batch: string[], index: number): ResultAsync<EmbeddingVector[], ModelUnavailableError> {
    const startTime = Date.now();
    return tryAsync(
      () => this.batchBreaker.fire({ requests: batch.map(toRequest) }),
      (error) => this.toModelError(`Embedding batch ${index} failed`, error)
    ).andThen((response) => {
      if (response.embeddings.length !== batch.length) {
        return errAsync(
          new ModelUnavailableError(
            `Embedding batch ${index} returned ${response.embeddings.length} vectors for ${batch.length} texts`,
            undefined,
            this.stage
          )
        );
      }

      this.logger.debug('Embedded batch', {
        batch: index,
        texts: batch.length,
        duration_ms: Date.now() - startTime,
      });

      return ResultAsync.combine(response.embeddings.map((embedding) => this.toVector(embedding.values)));
    });
  }

  private toVector(values: number[]): ResultAsync<EmbeddingVector, ModelUnavailableError> {
    if (!isValidEmbedding(values, this.dimensions)) {
      return errAsync(
        new ModelUnavailableError(
          `Model ${this.modelId} returned an invalid embedding (${values.length} dimensions, expected ${this.dimensions})`,
          undefined,
          this.stage
        )
      );
    }
    return okAsync(normalizeVector(values));
  }

  private toModelError(prefix: string, error: unknown): ModelUnavailableError {
    const code = errorCode(error);
    let detail: string;
    if (code === BREAKER_ERROR_CODES.TIMEOUT) {
      detail = `timed out after ${this.timeoutMs}ms`;
    } else if (code === BREAKER_ERROR_CODES.OPEN) {
      detail = `circuit open after earlier failures (${describeError(error)})`;
    } else {
      detail = describeError(error);
    }
    return new ModelUnavailableError(`${prefix}: ${detail}`, asError(error), this.stage);
  }
}

function toRequest(text: string): EmbedContentRequest {
  return { content: { role: 'user', parts: [{ text }] } };
}
