/**
 * Pipeline test helper
 * In-process stand-ins for the language model, the eCFR API and the log
 */

import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import type { LanguageModel } from '../../src/services/generation/language-model.js';
import type { PipelineLogger } from '../../src/cli/utils/logger.js';

export function fixturePath(relative: string): string {
  return fileURLToPath(new URL(`../fixtures/${relative}`, import.meta.url));
}

export function readFixture(relative: string): string {
  return readFileSync(fixturePath(relative), 'utf-8');
}

/**
 * Language model answering from a script; an Error entry is thrown instead
 * of returned. The last entry repeats once the script runs out.
 */
export class ScriptedLanguageModel implements LanguageModel {
  readonly modelId = 'fake-model';
  readonly prompts: string[] = [];

  constructor(private readonly script: Array<string | Error>) {}

  async generate(prompt: string): Promise<string> {
    const step = this.script[Math.min(this.prompts.length, this.script.length - 1)];
    this.prompts.push(prompt);
    if (step === undefined) {
      throw new Error('ScriptedLanguageModel has an empty script');
    }
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

/**
 * Language model whose calls never settle
 */
export class HangingLanguageModel implements LanguageModel {
  readonly modelId = 'fake-model';
  calls = 0;

  generate(): Promise<string> {
    this.calls++;
    return new Promise<string>(() => undefined);
  }
}

export interface RecordedEntry {
  level: 'debug' | 'info' | 'warn' | 'error';
  message: string;
  context?: Record<string, unknown>;
  error?: unknown;
}

export class RecordingLogger implements PipelineLogger {
  readonly entries: RecordedEntry[] = [];

  debug(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'debug', message, context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'info', message, context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'warn', message, context });
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    this.entries.push({ level: 'error', message, error, context });
  }

  messages(level: RecordedEntry['level']): string[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.message);
  }
}

export interface FakeFetch {
  fetchFn: typeof fetch;
  /** Requested URLs, in call order */
  urls: string[];
}

/**
 * fetch stand-in answering every request through `respond`
 */
export function createFakeFetch(respond: (url: string) => Response | Promise<Response>): FakeFetch {
  const urls: string[] = [];
  const fetchFn: typeof fetch = async (input) => {
    const url = typeof input === 'string' ? input : input instanceof URL ? input.href : input.url;
    urls.push(url);
    return respond(url);
  };
  return { fetchFn, urls };
}
