import { describe, it, expect } from 'vitest';
import { generateChunkId, normalizeChunkText } from '../../../src/lib/chunk-utils.js';

describe('chunk-utils', () => {
  describe('normalizeChunkText', () => {
    it('should collapse whitespace runs and trim', () => {
      expect(normalizeChunkText('  Closed systems\n\n shall\temploy  ')).toBe('Closed systems shall employ');
    });
  });

  describe('generateChunkId', () => {
    it('should produce a 64 character hex id', () => {
      const id = generateChunkId('Closed systems shall employ procedures');
      expect(id).toMatch(/^[a-f0-9]{64}$/);
    });

    it('should ignore whitespace differences', () => {
      expect(generateChunkId('Closed systems shall\n employ procedures')).toBe(
        generateChunkId('Closed systems shall employ procedures')
      );
    });

    it('should differ for different text', () => {
      expect(generateChunkId('§ 11.10')).not.toBe(generateChunkId('§ 11.50'));
    });

    it('should match the SHA-256 of the empty string for blank text', () => {
      expect(generateChunkId('   ')).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
    });
  });
});
