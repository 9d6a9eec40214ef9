/**
 * TextChunker - splits regulatory text into overlapping windows
 *
 * Window i spans [start, end). The first window starts at 0 and every next
 * window starts `overlap` characters before the previous end, so the input
 * is recovered by concatenating the first chunk with every later chunk
 * minus its first `overlap` characters.
 */

import { Result, ok, err } from '../../lib/result-types.js';
import { InvalidInputError } from '../../lib/errors.js';
import { generateChunkId } from '../../lib/chunk-utils.js';
import { CHUNK_CONFIG } from '../../constants/pipeline-constants.js';
import type { RegulationChunk } from '../../models/regulation-chunk.js';
import type { RegulationSection } from '../../models/regulation-document.js';

/**
 * TextChunker configuration
 */
export interface TextChunkerOptions {
  /** Maximum chunk width in characters */
  windowSize?: number;

  /** Characters shared between consecutive chunks */
  overlap?: number;
}

/**
 * Maps a chunk's offset to the reference recorded as its sourceId
 */
export type SectionResolver = (offset: number) => string;

/**
 * Resolver returning the last section starting at or before the offset
 *
 * @param sections - Sections ordered by offset
 * @param fallback - Reference for text before the first section
 */
export function createSectionResolver(
  sections: readonly RegulationSection[],
  fallback: string
): SectionResolver {
  return (offset: number): string => {
    let current = fallback;
    for (const section of sections) {
      if (section.offset > offset) {
        break;
      }
      current = section.id;
    }
    return current;
  };
}

export class TextChunker {
  private constructor(
    readonly windowSize: number,
    readonly overlap: number
  ) {}

  /**
   * Create a chunker, validating `0 <= overlap < windowSize`
   */
  static create(options: TextChunkerOptions = {}): Result<TextChunker, InvalidInputError> {
    const windowSize = options.windowSize ?? CHUNK_CONFIG.DEFAULT_WINDOW_SIZE;
    const overlap = options.overlap ?? CHUNK_CONFIG.DEFAULT_OVERLAP;

    if (!Number.isInteger(windowSize) || windowSize < 1) {
      return err(new InvalidInputError(`windowSize must be a positive integer (got ${windowSize})`, 'ingest'));
    }
    if (!Number.isInteger(overlap) || overlap < 0 || overlap >= windowSize) {
      return err(
        new InvalidInputError(
          `overlap must be an integer in [0, windowSize) (got ${overlap} with windowSize ${windowSize})`,
          'ingest'
        )
      );
    }

    return ok(new TextChunker(windowSize, overlap));
  }

  /**
   * Chunk text eagerly
   */
  chunk(text: string, resolveSection?: SectionResolver): RegulationChunk[] {
    return Array.from(this.chunks(text, resolveSection));
  }

  /**
   * Lazily yield chunks in document order
   *
   * Empty text yields nothing; text no longer than the window yields one chunk.
   */
  *chunks(text: string, resolveSection: SectionResolver = () => ''): Generator<RegulationChunk> {
    if (text.length === 0) {
      return;
    }

    let start = 0;
    for (;;) {
      const hardEnd = start + this.windowSize;
      if (hardEnd >= text.length) {
        yield this.makeChunk(text, start, text.length, resolveSection);
        return;
      }

      const minEnd = start + Math.max(this.overlap, Math.floor(this.windowSize / 2));
      const end = findBreakpoint(text, minEnd, hardEnd) ?? this.hardCut(text, start, hardEnd);
      yield this.makeChunk(text, start, end, resolveSection);

      // end > start + overlap, so the next window always advances
      start = end - this.overlap;
    }
  }

  /**
   * Cut at hardEnd, one character earlier when that would split a surrogate pair
   */
  private hardCut(text: string, start: number, hardEnd: number): number {
    if (isHighSurrogate(text.charCodeAt(hardEnd - 1)) && hardEnd - 1 > start + this.overlap) {
      return hardEnd - 1;
    }
    return hardEnd;
  }

  private makeChunk(
    text: string,
    start: number,
    end: number,
    resolveSection: SectionResolver
  ): RegulationChunk {
    const chunkText = text.slice(start, end);
    return Object.freeze({
      id: generateChunkId(chunkText),
      sourceId: resolveSection(start),
      text: chunkText,
      offset: start,
      length: end - start,
    });
  }
}

/**
 * End position just after the last preferred separator in (minEnd, hardEnd]
 *
 * Separators are tried in order of preference; the first kind found wins.
 */
function findBreakpoint(text: string, minEnd: number, hardEnd: number): number | undefined {
  for (const separator of CHUNK_CONFIG.BREAKPOINTS) {
    const index = text.lastIndexOf(separator, hardEnd - separator.length);
    if (index >= minEnd && index + separator.length <= hardEnd) {
      return index + separator.length;
    }
  }
  return undefined;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}
