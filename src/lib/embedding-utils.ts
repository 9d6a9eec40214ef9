/**
 * Embedding Utilities
 *
 * Provides utilities for encoding vector embeddings for storage, normalizing
 * them and computing cosine similarity.
 */

import type { EmbeddingVector } from '../models/embedding-vector.js';

/**
 * Encode a vector as a Buffer for storage in a SQLite BLOB
 *
 * The Buffer shares memory with the vector; no copy is made.
 *
 * @example
 * ```typescript
 * const buffer = encodeEmbedding(new Float32Array(768));
 * // buffer.length === 3072 (768 floats × 4 bytes)
 * ```
 */
export function encodeEmbedding(vector: EmbeddingVector): Buffer {
	return Buffer.from(vector.buffer, vector.byteOffset, vector.byteLength);
}

/**
 * Euclidean (L2) norm of a vector
 */
export function vectorNorm(vector: ArrayLike<number>): number {
	let sumSquares = 0;
	for (let i = 0; i < vector.length; i++) {
		const value = vector[i] ?? 0;
		sumSquares += value * value;
	}
	return Math.sqrt(sumSquares);
}

/**
 * Scale a vector to unit length
 *
 * A zero vector is returned unchanged (as a Float32Array).
 */
export function normalizeVector(vector: ArrayLike<number>): EmbeddingVector {
	const result = Float32Array.from(vector);
	const norm = vectorNorm(result);
	if (norm > 0) {
		for (let i = 0; i < result.length; i++) {
			result[i] = (result[i] ?? 0) / norm;
		}
	}
	return result;
}

/**
 * Compute cosine similarity between two vectors
 *
 * Range: [-1, 1]. For normalized embeddings this equals the dot product.
 *
 * @throws Error if vectors have different dimensions
 */
export function cosineSimilarity(
	a: Float32Array | number[],
	b: Float32Array | number[]
): number {
	if (a.length !== b.length) {
		throw new Error(
			`Vectors must have the same dimensions (got ${a.length} and ${b.length})`
		);
	}

	let dotProduct = 0;
	let magnitudeA = 0;
	let magnitudeB = 0;

	for (let i = 0; i < a.length; i++) {
		const aVal = a[i] ?? 0;
		const bVal = b[i] ?? 0;
		dotProduct += aVal * bVal;
		magnitudeA += aVal * aVal;
		magnitudeB += bVal * bVal;
	}

	const magnitude = Math.sqrt(magnitudeA) * Math.sqrt(magnitudeB);

	// Zero vectors have no direction
	if (magnitude === 0) {
		return 0;
	}

	return dotProduct / magnitude;
}

/**
 * Validate that an embedding has the expected dimensions and finite values
 */
export function isValidEmbedding(vector: ArrayLike<number>, dimensions: number): boolean {
	if (vector.length !== dimensions) {
		return false;
	}

	for (let i = 0; i < vector.length; i++) {
		const val = vector[i];
		if (val === undefined || !isFinite(val)) {
			return false;
		}
	}

	return true;
}
