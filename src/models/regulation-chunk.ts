/**
 * Regulation Chunk Model
 *
 * A contiguous span of regulatory text produced by the chunker. Chunks are
 * immutable once created and owned by the vector index for its lifetime.
 */

export interface RegulationChunk {
	/** Content-derived identifier (SHA-256 of the normalized text) */
	readonly id: string;

	/** Section reference of the section containing the first character */
	readonly sourceId: string;

	/** Chunk text, verbatim from the source document */
	readonly text: string;

	/** Character offset within the source document */
	readonly offset: number;

	/** Length in characters */
	readonly length: number;
}

/**
 * A chunk returned by a similarity query
 */
export interface ScoredChunk {
	chunk: RegulationChunk;

	/** Cosine similarity to the query vector, in [-1, 1] */
	similarity: number;
}
