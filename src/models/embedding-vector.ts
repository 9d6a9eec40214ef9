/**
 * Embedding Vector Model
 *
 * Dense vectors produced by an Embedder and the index entries that pair them
 * with their chunks.
 */

import type { RegulationChunk } from './regulation-chunk.js';

/**
 * Fixed-length dense vector, L2-normalized by every embedder
 */
export type EmbeddingVector = Float32Array;

/**
 * Chunk/vector pair persisted in the vector index
 */
export interface VectorIndexEntry {
	chunk: RegulationChunk;
	vector: EmbeddingVector;
}

/**
 * Embedding space an index was built in
 */
export interface EmbeddingSpace {
	/** Model identifier, e.g. "text-embedding-004" */
	modelId: string;

	/** Vector dimensions for validation */
	dimensions: number;
}
