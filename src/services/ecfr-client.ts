/**
 * eCFR Client
 *
 * Retrieves a regulatory part from the eCFR versioner API and extracts its
 * plain text. Failures are returned, never retried: the caller decides
 * whether to retry, fall back to a cached copy or abort.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { ResultAsync, okAsync, errAsync, tryAsync, asError, describeError } from '../lib/result-types.js';
import { ParseError, SourceUnavailableError } from '../lib/errors.js';
import { EcfrXmlParser } from './parser/EcfrXmlParser.js';
import { SOURCE_CONFIG } from '../constants/pipeline-constants.js';
import { corpusIdFor } from '../models/regulation-document.js';
import type { RegulationDocument, SourceLocator } from '../models/regulation-document.js';
import { silentLogger, type PipelineLogger } from '../cli/utils/logger.js';

export interface EcfrClientOptions {
  /** API origin, default https://www.ecfr.gov */
  baseUrl?: string;

  /** Request timeout in milliseconds */
  timeoutMs?: number;

  /** Directory fetched payloads are saved to; no caching when omitted */
  cacheDir?: string;

  logger?: PipelineLogger;

  /** Fetch implementation (defaults to the global fetch) */
  fetchFn?: typeof fetch;
}

export class EcfrClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly cacheDir?: string;
  private readonly logger: PipelineLogger;
  private readonly fetchFn: typeof fetch;
  private readonly parser = new EcfrXmlParser();

  constructor(options: EcfrClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? SOURCE_CONFIG.DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs ?? SOURCE_CONFIG.DEFAULT_TIMEOUT_MS;
    this.cacheDir = options.cacheDir;
    this.logger = options.logger ?? silentLogger;
    this.fetchFn = options.fetchFn ?? fetch;
  }

  /**
   * Versioner URL for a part, e.g.
   * https://www.ecfr.gov/api/versioner/v1/full/2024-02-01/title-21.xml?part=11
   */
  buildUrl(locator: SourceLocator): string {
    return `${this.baseUrl}/api/versioner/v1/full/${locator.date}/title-${locator.title}.xml?part=${locator.part}`;
  }

  /**
   * Fetch a regulatory part and extract its text
   */
  fetchRegulationText(
    locator: SourceLocator
  ): ResultAsync<RegulationDocument, SourceUnavailableError | ParseError> {
    const corpusId = corpusIdFor(locator);

    return this.fetchXml(locator)
      .andThen((xml) =>
        this.saveToCache(locator, xml).map(() => xml)
      )
      .andThen((xml) => this.parser.parse(xml, corpusId));
  }

  /**
   * Parse a locally stored copy of the XML (e.g. a previously cached payload)
   */
  readRegulationFile(
    filePath: string,
    locator: Pick<SourceLocator, 'title' | 'part'>
  ): ResultAsync<RegulationDocument, SourceUnavailableError | ParseError> {
    return tryAsync(
      () => fs.readFile(filePath, 'utf-8'),
      (error) =>
        new SourceUnavailableError(
          `Cannot read regulatory source file ${filePath}: ${describeError(error)}`,
          asError(error)
        )
    ).andThen((xml) => this.parser.parse(xml, corpusIdFor(locator)));
  }

  /**
   * Path a payload for the locator is cached under
   */
  cachePath(locator: SourceLocator): string | undefined {
    if (!this.cacheDir) {
      return undefined;
    }
    return path.join(this.cacheDir, `title-${locator.title}-part-${locator.part}-${locator.date}.xml`);
  }

  private fetchXml(locator: SourceLocator): ResultAsync<string, SourceUnavailableError> {
    const url = this.buildUrl(locator);
    const startTime = Date.now();
    this.logger.debug('Fetching regulatory source', { url });

    return tryAsync(
      () =>
        this.fetchFn(url, {
          headers: { Accept: 'application/xml' },
          signal: AbortSignal.timeout(this.timeoutMs),
        }),
      (error) => this.toSourceError(url, error)
    ).andThen((response) => {
      if (!response.ok) {
        return errAsync(
          new SourceUnavailableError(
            `Failed to fetch eCFR data: HTTP ${response.status} ${response.statusText}`.trim(),
            undefined,
            response.status
          )
        );
      }

      return tryAsync(
        () => response.text(),
        (error) => this.toSourceError(url, error)
      ).map((xml) => {
        this.logger.info('Fetched regulatory source', {
          url,
          bytes: xml.length,
          duration_ms: Date.now() - startTime,
        });
        return xml;
      });
    });
  }

  /**
   * Save the payload to the cache; a failed write is logged and ignored
   */
  private saveToCache(locator: SourceLocator, xml: string): ResultAsync<void, never> {
    const target = this.cachePath(locator);
    if (!target) {
      return okAsync(undefined);
    }

    return tryAsync(
      async () => {
        await fs.mkdir(path.dirname(target), { recursive: true });
        await fs.writeFile(target, xml, 'utf-8');
        this.logger.debug('Cached regulatory source', { path: target });
      },
      (error) => error
    ).orElse((error) => {
      this.logger.warn('Failed to cache regulatory source', { path: target, error: describeError(error) });
      return okAsync<void, never>(undefined);
    });
  }

  private toSourceError(url: string, error: unknown): SourceUnavailableError {
    const cause = asError(error);
    if (cause?.name === 'TimeoutError' || cause?.name === 'AbortError') {
      return new SourceUnavailableError(
        `Timed out after ${this.timeoutMs}ms fetching ${url}`,
        cause
      );
    }
    return new SourceUnavailableError(`Failed to fetch ${url}: ${describeError(error)}`, cause);
  }
}
