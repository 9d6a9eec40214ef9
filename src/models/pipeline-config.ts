/**
 * Pipeline Configuration Model
 */

import type { SourceLocator } from './regulation-document.js';

export type EmbedderKind = 'gemini' | 'hashing';

export interface ChunkingConfig {
	/** Chunk width in characters */
	windowSize: number;

	/** Characters shared between consecutive chunks */
	overlap: number;
}

export interface EmbeddingConfig {
	kind: EmbedderKind;

	/** Model identifier passed to the embedding backend */
	model: string;

	/** Vector width the model produces */
	dimensions: number;

	/** Texts per embedding request */
	batchSize: number;

	/** Per-request timeout for hosted embedding calls, in milliseconds */
	timeoutMs: number;
}

export interface GenerationConfig {
	model: string;

	/** Inference timeout in milliseconds */
	timeoutMs: number;
}

export interface SourceConfig extends SourceLocator {
	baseUrl: string;

	/** Fetch timeout in milliseconds */
	timeoutMs: number;
}

/**
 * Fully resolved configuration
 */
export interface PipelineConfig {
	/** Directory holding the index, cached sources and logs */
	dataDir: string;

	chunking: ChunkingConfig;

	/** Chunks retrieved per query */
	topK: number;

	embedding: EmbeddingConfig;
	generation: GenerationConfig;
	source: SourceConfig;

	/** Google AI Studio key, required by the Gemini embedder and model */
	googleApiKey?: string;
}
