/**
 * Pipeline configuration constants
 *
 * Defaults for chunking, retrieval, embedding, generation and the
 * regulatory source. Every value here can be overridden through the
 * environment (see lib/env-config.ts) or CLI flags.
 */

/**
 * Chunking Configuration
 */
export const CHUNK_CONFIG = {
  /** Chunk width in characters */
  DEFAULT_WINDOW_SIZE: 800,

  /** Characters shared between consecutive chunks */
  DEFAULT_OVERLAP: 80,

  /** Natural breakpoints, most preferred first */
  BREAKPOINTS: ['\n\n', '\n', '. ', '; ', ' '] as readonly string[],
} as const;

/**
 * Retrieval Configuration
 */
export const RETRIEVAL_CONFIG = {
  /** Chunks retrieved per query */
  DEFAULT_TOP_K: 5,

  /** Upper bound accepted from configuration */
  MAX_TOP_K: 50,
} as const;

/**
 * Embedding Configuration
 */
export const EMBEDDING_CONFIG = {
  /** Hosted embedding model */
  DEFAULT_GEMINI_MODEL: 'text-embedding-004',

  /** Output width of text-embedding-004 */
  GEMINI_DIMENSIONS: 768,

  /** Identifier of the offline n-gram hashing embedder */
  HASHING_MODEL_ID: 'hashing-ngram-v1',

  /** Output width of the hashing embedder */
  HASHING_DIMENSIONS: 384,

  /** Texts sent per embedding request */
  DEFAULT_BATCH_SIZE: 32,

  /** Hosted API limit for batchEmbedContents */
  MAX_BATCH_SIZE: 100,

  /** Per-request timeout for hosted embedding calls (30 seconds) */
  DEFAULT_TIMEOUT_MS: 30000,

  /** Open the breaker after this failure rate in the rolling window */
  ERROR_THRESHOLD_PERCENTAGE: 50,

  /** Try a half-open call after this long */
  RESET_TIMEOUT_MS: 60000,
} as const;

/**
 * Generation Configuration
 */
export const GENERATION_CONFIG = {
  DEFAULT_MODEL: 'gemini-1.5-flash',

  /** Inference timeout (1 minute) */
  DEFAULT_TIMEOUT_MS: 60000,

  /** Open the breaker after this failure rate in the rolling window */
  ERROR_THRESHOLD_PERCENTAGE: 50,

  /** Try a half-open call after this long */
  RESET_TIMEOUT_MS: 30000,
} as const;

/**
 * Error codes opossum rejects with
 */
export const BREAKER_ERROR_CODES = {
  OPEN: 'EOPENBREAKER',
  TIMEOUT: 'ETIMEDOUT',
} as const;

/**
 * Regulatory Source Configuration
 */
export const SOURCE_CONFIG = {
  DEFAULT_BASE_URL: 'https://www.ecfr.gov',

  /** eCFR point-in-time snapshot */
  DEFAULT_DATE: '2024-02-01',

  /** Title 21 (Food and Drugs) */
  DEFAULT_TITLE: 21,

  /** Part 11 (Electronic Records; Electronic Signatures) */
  DEFAULT_PART: 11,

  /** Fetch timeout (30 seconds) */
  DEFAULT_TIMEOUT_MS: 30000,
} as const;

/**
 * Storage layout under the data directory
 */
export const STORAGE_CONFIG = {
  DEFAULT_DATA_DIR: '.regaudit',
  INDEX_FILE: 'index.db',
  SOURCES_DIR: 'sources',
  LOGS_DIR: 'logs',
} as const;
