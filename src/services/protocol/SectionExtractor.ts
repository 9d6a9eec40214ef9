/**
 * Protocol Section Extractor
 *
 * Splits clinical-trial protocol text into heading/content sections and
 * picks the sections relevant to electronic records and signatures, so an
 * audit can focus on them instead of the whole protocol.
 */

import { z } from 'zod';
import { Result } from '../../lib/result-types.js';
import type { ConfigError } from '../../lib/errors.js';
import { compilePattern, loadDataFile } from '../../lib/data-files.js';

export interface ProtocolSection {
  heading: string;
  content: string;
}

export const PREAMBLE_HEADING = 'PREAMBLE';

/** Characters of section content searched for keywords */
const KEYWORD_PREVIEW_CHARS = 500;
const MAX_HEADING_LENGTH = 120;
const MIN_UPPERCASE_RATIO = 0.3;

const NUMBERED_HEADING = /^(?:\d+\.?\d*\.?\d*\.?\s+)?[A-Z]/;
const UPPERCASE_CHAR = /\p{Lu}/gu;

const KeywordFileSchema = z.object({
  keywords: z.array(z.string().min(1)).min(1),
});

/**
 * Whether a line reads as a section heading, e.g. "10.1 DATA MANAGEMENT"
 */
export function isHeading(line: string): boolean {
  const stripped = line.trim();
  if (stripped.length === 0 || stripped.length >= MAX_HEADING_LENGTH || stripped.endsWith('.')) {
    return false;
  }
  if (!NUMBERED_HEADING.test(stripped)) {
    return false;
  }
  const uppercase = stripped.match(UPPERCASE_CHAR)?.length ?? 0;
  return uppercase > stripped.length * MIN_UPPERCASE_RATIO;
}

/**
 * Fix common text-extraction artifacts
 *
 * Collapses runs of 4+ newlines to 3, joins words hyphenated across a line
 * break and turns form feeds into newlines.
 */
export function cleanText(text: string): string {
  return text
    .replace(/\n{4,}/g, '\n\n\n')
    .replace(/([\p{L}\p{N}_])-\n([\p{L}\p{N}_])/gu, '$1$2')
    .replace(/\f/g, '\n')
    .trim();
}

export class SectionExtractor {
  private constructor(private readonly pattern: RegExp) {}

  /**
   * Create an extractor using the keyword list in data/protocol-section-keywords.json
   */
  static fromDataFile(): Result<SectionExtractor, ConfigError> {
    return loadDataFile('protocol-section-keywords.json', KeywordFileSchema).andThen((file) =>
      SectionExtractor.withKeywords(file.keywords)
    );
  }

  /**
   * Create an extractor from keyword regular expressions
   */
  static withKeywords(keywords: readonly string[]): Result<SectionExtractor, ConfigError> {
    return compilePattern(`(${keywords.join('|')})`, 'i', 'section keyword list').map(
      (pattern) => new SectionExtractor(pattern)
    );
  }

  /**
   * Split text into sections at heading lines
   *
   * Lines before the first heading belong to PREAMBLE. A heading followed
   * directly by another heading has no lines and yields no section.
   */
  extract(text: string): ProtocolSection[] {
    const sections: ProtocolSection[] = [];
    let heading = PREAMBLE_HEADING;
    let lines: string[] = [];

    for (const line of text.split('\n')) {
      if (isHeading(line)) {
        if (lines.length > 0) {
          sections.push({ heading, content: lines.join('\n') });
        }
        heading = line.trim();
        lines = [];
      } else {
        lines.push(line);
      }
    }

    if (lines.length > 0) {
      sections.push({ heading, content: lines.join('\n') });
    }
    return sections;
  }

  /**
   * Sections whose heading or opening content mentions a regulatory keyword
   */
  filterRegulatory(sections: readonly ProtocolSection[]): ProtocolSection[] {
    return sections.filter((section) => {
      const combined = `${section.heading} ${section.content.slice(0, KEYWORD_PREVIEW_CHARS)}`;
      return this.pattern.test(combined);
    });
  }
}
