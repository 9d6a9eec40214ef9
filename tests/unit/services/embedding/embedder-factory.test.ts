import { describe, it, expect } from 'vitest';
import { createEmbedder } from '../../../../src/services/embedding/embedder-factory.js';
import { GeminiEmbedder } from '../../../../src/services/embedding/GeminiEmbedder.js';
import { HashingEmbedder } from '../../../../src/services/embedding/HashingEmbedder.js';
import { ConfigurationManager } from '../../../../src/lib/env-config.js';
import { ConfigError } from '../../../../src/lib/errors.js';
import type { PipelineConfig } from '../../../../src/models/pipeline-config.js';

function configFor(env: Record<string, string>): PipelineConfig {
  return new ConfigurationManager(undefined, env).resolve()._unsafeUnwrap();
}

describe('createEmbedder', () => {
  it('should select the hashing embedder without an API key', () => {
    const embedder = createEmbedder(configFor({ REGAUDIT_EMBEDDER: 'hashing' }), 'ingest')._unsafeUnwrap();

    expect(embedder).toBeInstanceOf(HashingEmbedder);
    expect(embedder.modelId).toBe('hashing-ngram-v1');
    expect(embedder.dimensions).toBe(384);
  });

  it('should require GOOGLE_API_KEY for the Gemini embedder', () => {
    const error = createEmbedder(configFor({}), 'audit')._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error.message).toBe('GOOGLE_API_KEY is not set. Add it to your environment or .env file.');
  });

  it('should build the Gemini embedder from the configured model and width', () => {
    const embedder = createEmbedder(
      configFor({
        GOOGLE_API_KEY: 'test-secret',
        REGAUDIT_EMBEDDING_MODEL: 'gemini-embedding-001',
        REGAUDIT_EMBEDDING_DIMENSIONS: '3072',
      }),
      'audit'
    )._unsafeUnwrap();

    try {
      expect(embedder).toBeInstanceOf(GeminiEmbedder);
      expect(embedder.modelId).toBe('gemini-embedding-001');
      expect(embedder.dimensions).toBe(3072);
    } finally {
      embedder.dispose();
    }
  });

  it('should default the Gemini embedder to text-embedding-004 at 768 dimensions', () => {
    const embedder = createEmbedder(configFor({ GOOGLE_API_KEY: 'test-secret' }), 'audit')._unsafeUnwrap();

    try {
      expect(embedder.modelId).toBe('text-embedding-004');
      expect(embedder.dimensions).toBe(768);
    } finally {
      embedder.dispose();
    }
  });
});
