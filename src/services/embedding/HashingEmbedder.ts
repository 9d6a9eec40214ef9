/**
 * Hashing Embedder
 *
 * Offline, deterministic embedder built on character n-gram feature hashing.
 * Uses FNV-1a to map n-grams of the lower-cased, whitespace-collapsed text
 * into a fixed number of dense dimensions, then L2-normalizes the counts.
 */

import { ResultAsync, okAsync } from '../../lib/result-types.js';
import type { ModelUnavailableError } from '../../lib/errors.js';
import { normalizeVector } from '../../lib/embedding-utils.js';
import { EMBEDDING_CONFIG } from '../../constants/pipeline-constants.js';
import type { EmbeddingVector } from '../../models/embedding-vector.js';
import type { Embedder } from './adapter-interface.js';

/**
 * Configuration for n-gram generation
 */
export interface NgramConfig {
  /** Minimum n-gram size */
  minGram: number;
  /** Maximum n-gram size */
  maxGram: number;
  /** Number of dense dimensions n-grams are folded into */
  dimensions: number;
}

export const DEFAULT_NGRAM_CONFIG: NgramConfig = {
  minGram: 3,
  maxGram: 5,
  dimensions: EMBEDDING_CONFIG.HASHING_DIMENSIONS,
};

/**
 * FNV-1a hash constants (32-bit)
 */
const FNV_OFFSET_BASIS = 2166136261;
const FNV_PRIME = 16777619;

/**
 * FNV-1a hash function
 * @returns 32-bit unsigned hash value
 */
export function fnv1aHash(str: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < str.length; i++) {
    hash ^= str.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Generate character n-grams from text
 *
 * Text shorter than `minGram` yields itself as the only n-gram.
 */
export function generateNgrams(text: string, config: NgramConfig): string[] {
  const normalized = text.toLowerCase().replace(/\s+/g, ' ').trim();
  if (normalized.length === 0) {
    return [];
  }
  if (normalized.length < config.minGram) {
    return [normalized];
  }

  const ngrams: string[] = [];
  for (let n = config.minGram; n <= config.maxGram; n++) {
    for (let i = 0; i <= normalized.length - n; i++) {
      ngrams.push(normalized.substring(i, i + n));
    }
  }
  return ngrams;
}

/**
 * Hash text into a normalized dense vector
 *
 * Blank text produces the zero vector.
 */
export function hashEmbedding(text: string, config: NgramConfig = DEFAULT_NGRAM_CONFIG): EmbeddingVector {
  const counts = new Float32Array(config.dimensions);
  for (const ngram of generateNgrams(text, config)) {
    const index = fnv1aHash(ngram) % config.dimensions;
    counts[index] = (counts[index] ?? 0) + 1;
  }
  return normalizeVector(counts);
}

export class HashingEmbedder implements Embedder {
  readonly modelId: string = EMBEDDING_CONFIG.HASHING_MODEL_ID;
  readonly dimensions: number;

  private readonly config: NgramConfig;

  constructor(config: Partial<NgramConfig> = {}) {
    this.config = { ...DEFAULT_NGRAM_CONFIG, ...config };
    this.dimensions = this.config.dimensions;
    // Non-default settings form a different embedding space
    if (config.minGram !== undefined || config.maxGram !== undefined || config.dimensions !== undefined) {
      this.modelId = `${EMBEDDING_CONFIG.HASHING_MODEL_ID}:${this.config.minGram}-${this.config.maxGram}x${this.config.dimensions}`;
    }
  }

  embed(texts: readonly string[]): ResultAsync<EmbeddingVector[], ModelUnavailableError> {
    return okAsync(texts.map((text) => hashEmbedding(text, this.config)));
  }

  embedQuery(text: string): ResultAsync<EmbeddingVector, ModelUnavailableError> {
    return okAsync(hashEmbedding(text, this.config));
  }

  dispose(): void {
    // Nothing held
  }
}
