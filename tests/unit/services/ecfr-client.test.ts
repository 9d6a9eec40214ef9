import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { EcfrClient } from '../../../src/services/ecfr-client.js';
import { ParseError, SourceUnavailableError } from '../../../src/lib/errors.js';
import type { SourceLocator } from '../../../src/models/regulation-document.js';
import { RecordingLogger, createFakeFetch, fixturePath, readFixture } from '../../helpers/pipeline-test-helper.js';

const BASE_URL = 'https://ecfr.example.test';
const LOCATOR: SourceLocator = { title: 21, part: 11, date: '2024-02-01' };
const URL_FOR_LOCATOR = `${BASE_URL}/api/versioner/v1/full/2024-02-01/title-21.xml?part=11`;

describe('EcfrClient Unit Tests', () => {
  let cacheDir: string;

  beforeEach(() => {
    cacheDir = mkdtempSync(path.join(tmpdir(), 'regaudit-sources-'));
  });

  afterEach(() => {
    rmSync(cacheDir, { recursive: true, force: true });
  });

  describe('buildUrl', () => {
    it('should address the versioner full-text endpoint', () => {
      const client = new EcfrClient({ baseUrl: `${BASE_URL}/` });
      expect(client.buildUrl(LOCATOR)).toBe(URL_FOR_LOCATOR);
    });
  });

  describe('fetchRegulationText', () => {
    it('should fetch, cache and parse the part', async () => {
      const xml = readFixture('ecfr/part-11-excerpt.xml');
      const fake = createFakeFetch(() => new Response(xml, { status: 200 }));
      const client = new EcfrClient({ baseUrl: BASE_URL, cacheDir, fetchFn: fake.fetchFn });

      const document = (await client.fetchRegulationText(LOCATOR))._unsafeUnwrap();

      expect(fake.urls).toEqual([URL_FOR_LOCATOR]);
      expect(document.corpusId).toBe('title-21-part-11');
      expect(document.sections).toHaveLength(3);
      expect(client.cachePath(LOCATOR)).toBe(path.join(cacheDir, 'title-21-part-11-2024-02-01.xml'));
      expect(readFileSync(path.join(cacheDir, 'title-21-part-11-2024-02-01.xml'), 'utf-8')).toBe(xml);
    });

    it('should keep the fetched part when the cache cannot be written', async () => {
      const blocked = path.join(cacheDir, 'not-a-directory');
      writeFileSync(blocked, 'occupied');
      const logger = new RecordingLogger();
      const fake = createFakeFetch(() => new Response(readFixture('ecfr/part-11-excerpt.xml'), { status: 200 }));
      const client = new EcfrClient({ baseUrl: BASE_URL, cacheDir: blocked, fetchFn: fake.fetchFn, logger });

      const document = (await client.fetchRegulationText(LOCATOR))._unsafeUnwrap();

      expect(document.sections).toHaveLength(3);
      expect(logger.messages('warn')).toEqual(['Failed to cache regulatory source']);
      expect(logger.entries.find((entry) => entry.level === 'warn')?.context?.path).toBe(
        path.join(blocked, 'title-21-part-11-2024-02-01.xml')
      );
    });

    it('should report an HTTP failure with its status', async () => {
      const fake = createFakeFetch(
        () => new Response('unavailable', { status: 503, statusText: 'Service Unavailable' })
      );
      const client = new EcfrClient({ baseUrl: BASE_URL, fetchFn: fake.fetchFn });

      const error = (await client.fetchRegulationText(LOCATOR))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(SourceUnavailableError);
      expect(error.message).toBe('Failed to fetch eCFR data: HTTP 503 Service Unavailable');
      expect(error instanceof SourceUnavailableError ? error.status : undefined).toBe(503);
      expect(error.retryable).toBe(true);
      expect(error.stage).toBe('ingest');
    });

    it('should report a timeout', async () => {
      const fake = createFakeFetch(() => {
        throw Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' });
      });
      const client = new EcfrClient({ baseUrl: BASE_URL, timeoutMs: 1000, fetchFn: fake.fetchFn });

      const error = (await client.fetchRegulationText(LOCATOR))._unsafeUnwrapErr();
      expect(error.message).toBe(`Timed out after 1000ms fetching ${URL_FOR_LOCATOR}`);
    });

    it('should report a network failure', async () => {
      const fake = createFakeFetch(() => {
        throw new Error('getaddrinfo ENOTFOUND ecfr.example.test');
      });
      const client = new EcfrClient({ baseUrl: BASE_URL, fetchFn: fake.fetchFn });

      const error = (await client.fetchRegulationText(LOCATOR))._unsafeUnwrapErr();
      expect(error.message).toBe(`Failed to fetch ${URL_FOR_LOCATOR}: getaddrinfo ENOTFOUND ecfr.example.test`);
    });

    it('should report a payload that is not eCFR XML', async () => {
      const fake = createFakeFetch(() => new Response('<html><body>', { status: 200 }));
      const client = new EcfrClient({ baseUrl: BASE_URL, fetchFn: fake.fetchFn });

      const error = (await client.fetchRegulationText(LOCATOR))._unsafeUnwrapErr();
      expect(error).toBeInstanceOf(ParseError);
    });
  });

  describe('readRegulationFile', () => {
    it('should parse a saved copy', async () => {
      const client = new EcfrClient();
      const document = (
        await client.readRegulationFile(fixturePath('ecfr/part-11-excerpt.xml'), { title: 21, part: 11 })
      )._unsafeUnwrap();

      expect(document.corpusId).toBe('title-21-part-11');
    });

    it('should report a missing file', async () => {
      const missing = path.join(cacheDir, 'missing.xml');
      const error = (await new EcfrClient().readRegulationFile(missing, { title: 21, part: 11 }))._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(SourceUnavailableError);
      expect(error.message.startsWith(`Cannot read regulatory source file ${missing}:`)).toBe(true);
    });
  });
});
