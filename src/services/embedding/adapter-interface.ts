/**
 * Embedder Interface
 *
 * Strategy interface for turning text into dense vectors. Chunks and queries
 * go through the same embedder so that both land in one embedding space.
 */

import type { ResultAsync } from '../../lib/result-types.js';
import type { ModelUnavailableError } from '../../lib/errors.js';
import type { EmbeddingSpace, EmbeddingVector } from '../../models/embedding-vector.js';

/**
 * Core embedder interface
 *
 * Every vector is L2-normalized and has exactly `dimensions` components.
 * Output order matches input order.
 */
export interface Embedder extends EmbeddingSpace {
	/**
	 * Embed a batch of chunk texts
	 */
	embed(texts: readonly string[]): ResultAsync<EmbeddingVector[], ModelUnavailableError>;

	/**
	 * Embed a single query text
	 */
	embedQuery(text: string): ResultAsync<EmbeddingVector, ModelUnavailableError>;

	/**
	 * Release timers or connections held by the embedder
	 */
	dispose(): void;
}

/**
 * Embedding space an embedder writes into
 */
export function embeddingSpaceOf(embedder: Embedder): EmbeddingSpace {
	return { modelId: embedder.modelId, dimensions: embedder.dimensions };
}
