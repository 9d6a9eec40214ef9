/**
 * Shared command plumbing: global flags, configuration, logging and the
 * rendering of pipeline failures.
 */

import type { Command } from 'commander';
import { InvalidArgumentError } from 'commander';
import { ConfigurationManager, type ConfigOverrides } from '../../lib/env-config.js';
import { isAuditError, type AuditError } from '../../lib/errors.js';
import { Result } from '../../lib/result-types.js';
import type { ConfigError } from '../../lib/errors.js';
import type { PipelineConfig } from '../../models/pipeline-config.js';
import { Logger } from './logger.js';
import { OutputFormatter, OutputFormat } from './output.js';

/**
 * Options registered on the root program
 */
export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
}

export interface CommandContext {
  config: PipelineConfig;
  logger: Logger;
  output: OutputFormatter;
  globals: GlobalOptions;
}

/**
 * Formatter honouring --json, --quiet and a command's own --format
 */
export function createFormatter(command: Command, format?: string): OutputFormatter {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const json = globals.json === true || format === OutputFormat.JSON;
  return new OutputFormatter(json ? OutputFormat.JSON : OutputFormat.HUMAN, globals.quiet === true);
}

/**
 * Resolve configuration and open the log for a command
 *
 * On failure the error has already been rendered and the exit code set.
 */
export function createContext(
  command: Command,
  overrides: ConfigOverrides = {},
  format?: string
): Result<CommandContext, ConfigError> {
  const globals = command.optsWithGlobals<GlobalOptions>();
  const output = createFormatter(command, format);

  return new ConfigurationManager()
    .load(overrides)
    .map((config) => ({
      config,
      output,
      globals,
      logger: new Logger(config.dataDir, globals.verbose === true),
    }))
    .mapErr((error) => {
      output.error(failureHeadline(error), error, remediationHint(error));
      process.exitCode = 1;
      return error;
    });
}

/**
 * Headline distinguishing ingestion from audit failures
 */
export function failureHeadline(error: AuditError): string {
  switch (error.stage) {
    case 'ingest':
      return 'Corpus refresh failed';
    case 'audit':
      return 'Audit generation failed';
    case 'config':
      return 'Invalid configuration';
  }
}

/**
 * What the user can do about a failure
 */
export function remediationHint(error: AuditError): string {
  switch (error.code) {
    case 'SOURCE_UNAVAILABLE':
      return 'Check network access to the eCFR API and retry later, or ingest a saved copy with --from-file.';
    case 'PARSE_ERROR':
      return 'The source is not readable eCFR XML. Check --date, --title and --part, or the file passed to --from-file.';
    case 'INDEX_UNAVAILABLE':
      return 'Run "regaudit ingest" first (with --reset after changing the embedder), then retry.';
    case 'MODEL_UNAVAILABLE':
      return 'Check GOOGLE_API_KEY, model quota and network access, then retry.';
    case 'INVALID_INPUT':
      return 'Provide non-empty protocol text or a readable file.';
    case 'CONFIG_ERROR':
      return 'Fix the REGAUDIT_* settings in your environment or .env file.';
    default:
      return 'See the log file for details.';
  }
}

/**
 * Render a failure, log it and set exit code 1
 */
export function reportFailure(context: CommandContext, error: unknown): void {
  if (isAuditError(error)) {
    context.output.error(failureHeadline(error), error, remediationHint(error));
    context.logger.error(failureHeadline(error), error, { code: error.code, stage: error.stage });
  } else {
    context.output.error('Unexpected error', error);
    context.logger.error('Unexpected error', error);
  }
  if (!context.output.isJson()) {
    context.output.text(`  Log: ${context.logger.filePath}`);
  }
  process.exitCode = 1;
}

/**
 * Commander parser for positive integer options
 */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Commander parser for non-negative integer options
 */
export function parseNonNegativeInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return parsed;
}

/**
 * Commander parser for the human|json format option
 */
export function parseFormat(value: string): OutputFormat {
  if (value === 'human') {
    return OutputFormat.HUMAN;
  }
  if (value === 'json') {
    return OutputFormat.JSON;
  }
  throw new InvalidArgumentError('Expected "human" or "json".');
}
