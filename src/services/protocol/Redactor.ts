/**
 * Protocol Redactor
 *
 * Derives non-compliant variants of compliant protocols by replacing
 * identifying details (protocol ids, dates, signatories, contacts) with
 * `[REDACTED_<TYPE>]` placeholders. Used to build evaluation material.
 */

import { z } from 'zod';
import { Result, ok, err } from '../../lib/result-types.js';
import { InvalidInputError } from '../../lib/errors.js';
import type { ConfigError } from '../../lib/errors.js';
import { compilePattern, loadDataFile } from '../../lib/data-files.js';

const RedactionFileSchema = z.object({
  maxPerType: z.number().int().positive(),
  patterns: z
    .array(
      z.object({
        type: z.string().regex(/^[A-Z_]+$/),
        pattern: z.string().min(1),
      })
    )
    .min(1),
});

export interface RedactionRule {
  type: string;
  regex: RegExp;
}

export interface RedactionResult {
  text: string;
  total: number;
  /** Replacements per type, in first-seen order */
  byType: Record<string, number>;
}

export function placeholder(type: string): string {
  return `[REDACTED_${type}]`;
}

export class Redactor {
  constructor(
    private readonly rules: readonly RedactionRule[],
    /** Upper bound on replacements per type */
    private readonly maxPerType: number = Number.POSITIVE_INFINITY
  ) {}

  /**
   * Create a redactor from data/redaction-patterns.json
   */
  static fromDataFile(): Result<Redactor, ConfigError> {
    return loadDataFile('redaction-patterns.json', RedactionFileSchema).andThen((file) =>
      Redactor.fromPatterns(file.patterns, file.maxPerType)
    );
  }

  /**
   * Create a redactor from pattern sources, matched case-insensitively
   */
  static fromPatterns(
    patterns: ReadonlyArray<{ type: string; pattern: string }>,
    maxPerType?: number
  ): Result<Redactor, ConfigError> {
    const rules: RedactionRule[] = [];
    for (const { type, pattern } of patterns) {
      const regex = compilePattern(pattern, 'gi', `redaction rule ${type}`);
      if (regex.isErr()) {
        return err(regex.error);
      }
      rules.push({ type, regex: regex.value });
    }
    return ok(new Redactor(rules, maxPerType));
  }

  /**
   * Redaction types this redactor knows, deduplicated
   */
  get types(): string[] {
    return [...new Set(this.rules.map((rule) => rule.type))];
  }

  /**
   * Replace matches of every rule (or only the given types)
   *
   * Rules apply in order, each to the output of the previous one.
   */
  redact(text: string, types?: readonly string[]): Result<RedactionResult, InvalidInputError> {
    if (types) {
      const known = new Set(this.types);
      const unknown = types.filter((type) => !known.has(type));
      if (unknown.length > 0) {
        return err(
          new InvalidInputError(
            `Unknown redaction type(s): ${unknown.join(', ')}. Known types: ${this.types.join(', ')}`
          )
        );
      }
    }

    const selected = types ? this.rules.filter((rule) => types.includes(rule.type)) : this.rules;
    const byType: Record<string, number> = {};
    let total = 0;
    let redacted = text;

    for (const { type, regex } of selected) {
      const flags = regex.flags.includes('g') ? regex.flags : `${regex.flags}g`;
      redacted = redacted.replace(new RegExp(regex.source, flags), (match) => {
        const count = byType[type] ?? 0;
        if (count >= this.maxPerType) {
          return match;
        }
        byType[type] = count + 1;
        total++;
        return placeholder(type);
      });
    }

    return ok({ text: redacted, total, byType });
  }
}
