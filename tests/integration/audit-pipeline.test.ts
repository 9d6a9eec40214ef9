/**
 * End-to-end audit runs over an in-memory index, the hashing embedder and a
 * scripted language model
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { AuditPipeline } from '../../src/services/pipeline/AuditPipeline.js';
import { Retriever } from '../../src/services/retrieval/Retriever.js';
import { AuditGenerator } from '../../src/services/generation/AuditGenerator.js';
import { HashingEmbedder, hashEmbedding } from '../../src/services/embedding/HashingEmbedder.js';
import { embeddingSpaceOf } from '../../src/services/embedding/adapter-interface.js';
import type { VectorIndex } from '../../src/services/vector-storage.js';
import { IndexUnavailableError, InvalidInputError, ModelUnavailableError } from '../../src/lib/errors.js';
import type { LanguageModel } from '../../src/services/generation/language-model.js';
import { TEST_SPACE, createTestChunk, createTestIndex } from '../helpers/index-test-helper.js';
import { RecordingLogger, ScriptedLanguageModel } from '../helpers/pipeline-test-helper.js';

const CLOSED_SYSTEMS =
  'Closed systems shall employ procedures to ensure the authenticity of electronic records.';
const SPREADSHEET_PROTOCOL = 'We store all signatures in a shared spreadsheet with no access control.';
const NARRATIVE =
  'Red Zone: signatures kept in a shared spreadsheet without access control cannot assure authenticity ' +
  'of electronic records (21 CFR 11.10).';

describe('AuditPipeline Integration Tests', () => {
  const embedder = new HashingEmbedder();
  let index: VectorIndex;
  let generator: AuditGenerator | undefined;
  let logger: RecordingLogger;

  function pipelineWith(model: LanguageModel, target: VectorIndex = index): AuditPipeline {
    generator = new AuditGenerator(model, { logger });
    return new AuditPipeline({
      retriever: new Retriever({ embedder, index: target, logger }),
      generator,
      topK: 5,
      logger,
    });
  }

  beforeEach(() => {
    index = createTestIndex(embeddingSpaceOf(embedder));
    logger = new RecordingLogger();
  });

  afterEach(() => {
    generator?.dispose();
    generator = undefined;
    index.close();
  });

  describe('with a single closed-systems section', () => {
    beforeEach(() => {
      index
        .add([{ chunk: createTestChunk(CLOSED_SYSTEMS), vector: hashEmbedding(CLOSED_SYSTEMS) }])
        ._unsafeUnwrap();
    });

    it('should ground the audit on the retrieved section and return the narrative unmodified', async () => {
      const model = new ScriptedLanguageModel([NARRATIVE]);
      const audit = (await pipelineWith(model).run(SPREADSHEET_PROTOCOL))._unsafeUnwrap();

      expect(audit).toEqual({
        stage: 'audited',
        protocolText: SPREADSHEET_PROTOCOL,
        retrievedRegulations: [CLOSED_SYSTEMS],
        auditResults: NARRATIVE,
        complianceScore: null,
        warnings: [],
      });
      expect(model.prompts[0]).toContain(`REGULATORY CONTEXT (21 CFR Part 11):\n${CLOSED_SYSTEMS}\n\n`);
    });

    it('should keep the scored sources of a traced run', async () => {
      const traced = (
        await pipelineWith(new ScriptedLanguageModel([NARRATIVE])).runTraced(SPREADSHEET_PROTOCOL)
      )._unsafeUnwrap();

      expect(traced.sources).toHaveLength(1);
      expect(traced.sources[0]?.chunk.sourceId).toBe('§ 11.10');
      expect(traced.sources[0]?.similarity).toBeGreaterThan(0);
      expect(logger.messages('info')).toEqual(['Audit started', 'Regulations retrieved', 'Audit generated']);
    });

    it('should fail with ModelUnavailableError when the model call fails', async () => {
      const error = (
        await pipelineWith(new ScriptedLanguageModel([new Error('503 Service Unavailable')])).run(
          SPREADSHEET_PROTOCOL
        )
      )._unsafeUnwrapErr();

      expect(error).toBeInstanceOf(ModelUnavailableError);
      expect(error.message).toBe('Language model fake-model failed: 503 Service Unavailable');
      expect(error.stage).toBe('audit');
    });
  });

  it('should reject empty protocol text before retrieval', async () => {
    const model = new ScriptedLanguageModel([NARRATIVE]);
    const error = (await pipelineWith(model).run('   \n\t'))._unsafeUnwrapErr();

    expect(error).toBeInstanceOf(InvalidInputError);
    expect(error.message).toBe('Protocol text is empty');
    expect(logger.entries).toEqual([]);
    expect(model.prompts).toEqual([]);
  });

  it('should audit without context when the index is empty', async () => {
    const model = new ScriptedLanguageModel(['No regulations were available.']);
    const audit = (await pipelineWith(model).run(SPREADSHEET_PROTOCOL))._unsafeUnwrap();

    expect(audit.retrievedRegulations).toEqual([]);
    expect(audit.warnings).toEqual(['empty_context']);
    expect(audit.auditResults).toBe('No regulations were available.');
    expect(audit.complianceScore).toBeNull();
  });

  it('should fail with IndexUnavailableError when the index belongs to another space', async () => {
    const foreign = createTestIndex(TEST_SPACE);
    const model = new ScriptedLanguageModel([NARRATIVE]);

    const error = (await pipelineWith(model, foreign).run(SPREADSHEET_PROTOCOL))._unsafeUnwrapErr();
    foreign.close();

    expect(error).toBeInstanceOf(IndexUnavailableError);
    expect(error.message).toBe('Vector dimension mismatch: expected 3, got 384');
    expect(model.prompts).toEqual([]);
  });
});
