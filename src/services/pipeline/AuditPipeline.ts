/**
 * Audit Pipeline
 *
 * Orchestrates one audit end to end: pending -> retrieved -> audited. A
 * failure in either step aborts the run and is returned as is; there is no
 * partial recovery.
 */

import { ResultAsync, errAsync } from '../../lib/result-types.js';
import { InvalidInputError } from '../../lib/errors.js';
import type { AuditError } from '../../lib/errors.js';
import { RETRIEVAL_CONFIG } from '../../constants/pipeline-constants.js';
import {
  createAuditRequest,
  withAuditResults,
  withRetrievedRegulations,
  type CompletedAudit,
} from '../../models/audit-request.js';
import type { ScoredChunk } from '../../models/regulation-chunk.js';
import { silentLogger, type PipelineLogger } from '../../cli/utils/logger.js';
import type { Retriever } from '../retrieval/Retriever.js';
import type { AuditGenerator } from '../generation/AuditGenerator.js';

export interface AuditPipelineDeps {
  retriever: Retriever;
  generator: AuditGenerator;

  /** Chunks retrieved per audit */
  topK?: number;

  logger?: PipelineLogger;
}

/**
 * A completed audit with the scored chunks it was grounded on
 */
export interface TracedAudit {
  audit: CompletedAudit;
  sources: ScoredChunk[];
}

export class AuditPipeline {
  private readonly topK: number;
  private readonly logger: PipelineLogger;

  constructor(private readonly deps: AuditPipelineDeps) {
    this.topK = deps.topK ?? RETRIEVAL_CONFIG.DEFAULT_TOP_K;
    this.logger = deps.logger ?? silentLogger;
  }

  /**
   * Audit a protocol text
   */
  run(protocolText: string): ResultAsync<CompletedAudit, AuditError> {
    return this.runTraced(protocolText).map(({ audit }) => audit);
  }

  /**
   * Audit a protocol text, keeping the retrieved chunks for traceability
   */
  runTraced(protocolText: string): ResultAsync<TracedAudit, AuditError> {
    if (protocolText.trim().length === 0) {
      return errAsync(new InvalidInputError('Protocol text is empty'));
    }

    const pending = createAuditRequest(protocolText);
    this.logger.info('Audit started', { protocol_chars: protocolText.length, k: this.topK });

    return this.deps.retriever
      .retrieveScored(pending.protocolText, this.topK)
      .andThen((sources) => {
        const retrieved = withRetrievedRegulations(
          pending,
          sources.map(({ chunk }) => chunk.text)
        );

        return this.deps.generator
          .generate(retrieved.protocolText, retrieved.retrievedRegulations)
          .map(({ auditResults, warnings }) => ({
            audit: withAuditResults(retrieved, auditResults, warnings),
            sources,
          }));
      });
  }
}
