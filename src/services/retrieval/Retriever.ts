/**
 * Retriever
 *
 * Online retrieval step: embeds the protocol text with the same embedder the
 * index was built with and returns the k most similar regulation chunks.
 * Read-only with respect to the index. Embedding failures come back as the
 * embedder reported them; index failures as IndexUnavailableError.
 */

import { ResultAsync, errAsync, okAsync } from '../../lib/result-types.js';
import type { IndexUnavailableError, ModelUnavailableError } from '../../lib/errors.js';
import { RETRIEVAL_CONFIG } from '../../constants/pipeline-constants.js';
import type { ScoredChunk } from '../../models/regulation-chunk.js';
import { silentLogger, type PipelineLogger } from '../../cli/utils/logger.js';
import type { Embedder } from '../embedding/adapter-interface.js';
import type { VectorIndex } from '../vector-storage.js';

export type RetrievalError = IndexUnavailableError | ModelUnavailableError;

export interface RetrieverDeps {
  embedder: Embedder;
  index: VectorIndex;
  logger?: PipelineLogger;
}

export class Retriever {
  private readonly logger: PipelineLogger;

  constructor(private readonly deps: RetrieverDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Chunk texts most similar to the protocol, in descending similarity
   */
  retrieve(
    protocolText: string,
    k: number = RETRIEVAL_CONFIG.DEFAULT_TOP_K
  ): ResultAsync<string[], RetrievalError> {
    return this.retrieveScored(protocolText, k).map((scored) => scored.map(({ chunk }) => chunk.text));
  }

  /**
   * Scored chunks most similar to the protocol, in descending similarity
   */
  retrieveScored(
    protocolText: string,
    k: number = RETRIEVAL_CONFIG.DEFAULT_TOP_K
  ): ResultAsync<ScoredChunk[], RetrievalError> {
    const startTime = Date.now();
    const { embedder, index } = this.deps;

    return embedder
      .embedQuery(protocolText)
      .andThen((vector): ResultAsync<ScoredChunk[], RetrievalError> => {
        const result = index.query(vector, k);
        if (result.isErr()) {
          return errAsync(result.error);
        }

        const scored = result.value;
        this.logger.info('Regulations retrieved', {
          k,
          returned: scored.length,
          top_similarity: scored[0]?.similarity,
          sources: scored.map(({ chunk }) => chunk.sourceId),
          duration_ms: Date.now() - startTime,
        });
        return okAsync(scored);
      });
  }
}
