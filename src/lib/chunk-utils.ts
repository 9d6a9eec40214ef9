/**
 * Chunk Utilities
 *
 * Provides utilities for generating stable content-based chunk identifiers
 * using SHA-256 hashing of normalized text.
 */

import { createHash } from 'crypto';

/**
 * Normalize text for consistent hashing
 * Collapses runs of whitespace and trims both ends
 *
 * @param text - Raw chunk text
 * @returns Normalized text
 */
export function normalizeChunkText(text: string): string {
	return text.replace(/\s+/g, ' ').trim();
}

/**
 * Generate a stable chunk ID from text using SHA-256 hash
 *
 * The ID is deterministic: identical normalized text produces the same ID,
 * which is what makes repeated ingestion of an unchanged corpus a no-op.
 *
 * @param text - Chunk text to hash
 * @returns SHA-256 hash (64 hex characters)
 *
 * @example
 * ```typescript
 * const id1 = generateChunkId('Closed systems shall\n employ procedures');
 * const id2 = generateChunkId('Closed systems shall employ procedures');
 * // id1 === id2 (normalized whitespace)
 * ```
 */
export function generateChunkId(text: string): string {
	const hash = createHash('sha256');
	hash.update(normalizeChunkText(text), 'utf8');
	return hash.digest('hex');
}
