/**
 * Audit Generator
 *
 * Generation step: renders the auditor prompt and invokes the language model
 * through an opossum circuit breaker. A timeout, a rejected call or an open
 * circuit all surface as ModelUnavailableError. The model output is returned
 * unmodified.
 */

import CircuitBreaker from 'opossum';
import { ResultAsync, tryAsync, asError, describeError, errorCode } from '../../lib/result-types.js';
import { ModelUnavailableError } from '../../lib/errors.js';
import { BREAKER_ERROR_CODES, GENERATION_CONFIG } from '../../constants/pipeline-constants.js';
import type { AuditWarning } from '../../models/audit-request.js';
import { silentLogger, type PipelineLogger } from '../../cli/utils/logger.js';
import { buildAuditPrompt } from './prompts.js';
import type { LanguageModel } from './language-model.js';

export interface AuditGeneratorOptions {
  /** Inference timeout in milliseconds */
  timeoutMs?: number;

  /** Failure percentage that opens the circuit */
  errorThresholdPercentage?: number;

  /** Time before a half-open retry, in milliseconds */
  resetTimeoutMs?: number;

  logger?: PipelineLogger;
}

export interface GeneratedAudit {
  auditResults: string;
  warnings: AuditWarning[];
}

export class AuditGenerator {
  private readonly breaker: CircuitBreaker<[string], string>;
  private readonly logger: PipelineLogger;
  private readonly timeoutMs: number;

  constructor(
    private readonly model: LanguageModel,
    options: AuditGeneratorOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.timeoutMs = options.timeoutMs ?? GENERATION_CONFIG.DEFAULT_TIMEOUT_MS;

    this.breaker = new CircuitBreaker((prompt: string) => this.model.generate(prompt), {
      timeout: this.timeoutMs,
      errorThresholdPercentage:
        options.errorThresholdPercentage ?? GENERATION_CONFIG.ERROR_THRESHOLD_PERCENTAGE,
      resetTimeout: options.resetTimeoutMs ?? GENERATION_CONFIG.RESET_TIMEOUT_MS,
      name: 'audit-generation',
    });

    this.breaker.on('open', () => {
      this.logger.warn('Generation circuit opened', { model: this.model.modelId });
    });
  }

  /**
   * Produce the audit narrative for a protocol
   */
  audit(protocolText: string, retrievedRegulations: readonly string[]): ResultAsync<string, ModelUnavailableError> {
    return this.generate(protocolText, retrievedRegulations).map(({ auditResults }) => auditResults);
  }

  /**
   * Produce the audit narrative together with any warnings raised on the way
   */
  generate(
    protocolText: string,
    retrievedRegulations: readonly string[]
  ): ResultAsync<GeneratedAudit, ModelUnavailableError> {
    const warnings: AuditWarning[] = [];
    if (retrievedRegulations.length === 0) {
      warnings.push('empty_context');
      this.logger.warn('Generating audit without regulatory context', { model: this.model.modelId });
    }

    const prompt = buildAuditPrompt(protocolText, retrievedRegulations);
    const startTime = Date.now();

    return tryAsync(
      () => this.breaker.fire(prompt),
      (error) => this.toModelError(error)
    ).map((auditResults) => {
      this.logger.info('Audit generated', {
        model: this.model.modelId,
        regulations: retrievedRegulations.length,
        prompt_chars: prompt.length,
        response_chars: auditResults.length,
        duration_ms: Date.now() - startTime,
      });
      return { auditResults, warnings };
    });
  }

  /**
   * Stop the breaker's timers
   */
  dispose(): void {
    this.breaker.shutdown();
  }

  private toModelError(error: unknown): ModelUnavailableError {
    const cause = asError(error);
    const code = errorCode(error);
    let message: string;
    if (code === BREAKER_ERROR_CODES.OPEN) {
      message = `Language model ${this.model.modelId} is unavailable (circuit open): ${describeError(error)}`;
    } else if (code === BREAKER_ERROR_CODES.TIMEOUT) {
      message = `Language model ${this.model.modelId} timed out after ${this.timeoutMs}ms`;
    } else {
      message = `Language model ${this.model.modelId} failed: ${describeError(error)}`;
    }

    this.logger.error('Audit generation failed', error, { model: this.model.modelId });
    return new ModelUnavailableError(message, cause, 'audit');
  }
}
