/**
 * Audit Command
 *
 * Audits protocol text against the indexed regulation and renders the
 * narrative together with the regulations it was grounded on.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import chalk from 'chalk';
import ora from 'ora';
import { InvalidInputError } from '../../lib/errors.js';
import { ResultAsync, errAsync, okAsync, tryAsync, describeError } from '../../lib/result-types.js';
import { buildAudit } from '../../services/pipeline/pipeline-factory.js';
import type { TracedAudit } from '../../services/pipeline/AuditPipeline.js';
import { SectionExtractor, cleanText } from '../../services/protocol/SectionExtractor.js';
import { OutputFormat, type OutputFormatter } from '../utils/output.js';
import {
  createContext,
  parseFormat,
  parsePositiveInt,
  reportFailure,
  type CommandContext,
} from '../utils/command-context.js';

interface AuditCommandOptions {
  file?: string;
  sections?: boolean;
  k?: number;
  format?: string;
}

/** Characters of each retrieved regulation shown in human output */
const PREVIEW_CHARS = 160;

export function createAuditCommand(): Command {
  return new Command('audit')
    .description('Audit protocol text against the indexed regulation')
    .argument('[text]', 'Protocol text (or use --file)')
    .option('-f, --file <path>', 'Read protocol text from a file')
    .option('--sections', 'Audit only the regulatory-relevant sections of the protocol')
    .option('-k, --k <n>', 'Number of regulation chunks to retrieve', parsePositiveInt)
    .option('--format <type>', 'Output format (human|json)', parseFormat, OutputFormat.HUMAN)
    .action(async (text: string | undefined, options: AuditCommandOptions, command: Command) => {
      const context = createContext(command, { topK: options.k }, options.format);
      if (context.isErr()) {
        return;
      }
      await executeAudit(context.value, text, options);
    });
}

async function executeAudit(
  context: CommandContext,
  text: string | undefined,
  options: AuditCommandOptions
): Promise<void> {
  const { config, logger, output } = context;
  const startTime = Date.now();

  const protocol = await readProtocol(text, options.file).andThen((raw) =>
    options.sections ? selectRegulatorySections(raw, output) : okAsync(raw)
  );
  if (protocol.isErr()) {
    reportFailure(context, protocol.error);
    return;
  }

  const built = buildAudit(config, { logger });
  if (built.isErr()) {
    reportFailure(context, built.error);
    return;
  }

  const spinner = ora({
    text: `Auditing against ${config.source.title} CFR Part ${config.source.part}...`,
    isSilent: output.isJson() || output.isQuiet(),
  }).start();

  try {
    const result = await built.value.pipeline.runTraced(protocol.value);
    if (result.isErr()) {
      spinner.fail('Audit generation failed');
      reportFailure(context, result.error);
      return;
    }

    spinner.succeed('Audit complete');
    renderAudit(output, result.value);
  } finally {
    built.value.dispose();
    logger.logCommand('audit', { file: options.file, sections: options.sections, k: config.topK }, startTime);
  }
}

/**
 * Protocol text from the argument or the --file option
 */
export function readProtocol(text: string | undefined, file: string | undefined): ResultAsync<string, InvalidInputError> {
  if (text !== undefined && file !== undefined) {
    return errAsync(new InvalidInputError('Pass protocol text or --file, not both'));
  }
  if (file !== undefined) {
    return tryAsync(
      () => readFile(file, 'utf-8'),
      (error) => new InvalidInputError(`Cannot read protocol file ${file}: ${describeError(error)}`)
    );
  }
  if (text === undefined) {
    return errAsync(new InvalidInputError('No protocol text given. Pass it as an argument or use --file.'));
  }
  return okAsync(text);
}

function selectRegulatorySections(
  raw: string,
  output: OutputFormatter
): ResultAsync<string, InvalidInputError> {
  const extractor = SectionExtractor.fromDataFile();
  if (extractor.isErr()) {
    return errAsync(new InvalidInputError(extractor.error.message));
  }

  const cleaned = cleanText(raw);
  const sections = extractor.value.extract(cleaned);
  const regulatory = extractor.value.filterRegulatory(sections);
  if (regulatory.length === 0) {
    output.warning('No regulatory sections found; auditing the whole protocol', {
      sections: sections.length,
    });
    return okAsync(cleaned);
  }

  output.info(`Auditing ${regulatory.length} of ${sections.length} sections`);
  return okAsync(regulatory.map((section) => `${section.heading}\n${section.content}`).join('\n\n'));
}

function renderAudit(output: OutputFormatter, traced: TracedAudit): void {
  const { audit, sources } = traced;

  if (output.isJson()) {
    output.json({
      status: 'success',
      auditResults: audit.auditResults,
      complianceScore: audit.complianceScore,
      warnings: audit.warnings,
      retrievedRegulations: sources.map(({ chunk, similarity }) => ({
        sourceId: chunk.sourceId,
        similarity,
        text: chunk.text,
      })),
    });
    return;
  }

  output.heading('Audit Report');
  output.text(audit.auditResults);

  output.heading(`Retrieved Regulations (${sources.length})`);
  sources.forEach(({ chunk, similarity }, i) => {
    output.text(
      `${chalk.bold(`${i + 1}. ${chunk.sourceId}`)} ${chalk.gray(`(similarity: ${similarity.toFixed(3)})`)}`
    );
    output.text(chalk.dim(`   ${preview(chunk.text)}`));
  });

  for (const warning of audit.warnings) {
    if (warning === 'empty_context') {
      output.warning('No regulations were retrieved; the narrative is not grounded in the corpus');
    }
  }
}

export function preview(text: string, limit: number = PREVIEW_CHARS): string {
  const flat = text.replace(/\s+/g, ' ').trim();
  return flat.length <= limit ? flat : `${flat.slice(0, limit - 1)}…`;
}
