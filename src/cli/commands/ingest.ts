/**
 * Ingest Command
 *
 * Fetches a regulatory part (or reads a saved copy), chunks and embeds it
 * and refreshes the local vector index.
 */

import { Command } from 'commander';
import ora from 'ora';
import { buildIngestion } from '../../services/pipeline/pipeline-factory.js';
import type { CorpusSource, IngestionProgress } from '../../services/ingestion/CorpusIngestor.js';
import {
  createContext,
  parseNonNegativeInt,
  parsePositiveInt,
  reportFailure,
  type CommandContext,
} from '../utils/command-context.js';

interface IngestCommandOptions {
  date?: string;
  title?: number;
  part?: number;
  fromFile?: string;
  windowSize?: number;
  overlap?: number;
  reset?: boolean;
}

export function createIngestCommand(): Command {
  return new Command('ingest')
    .description('Fetch the regulation and (re)build the local vector index')
    .option('--date <yyyy-mm-dd>', 'eCFR point-in-time date')
    .option('--title <n>', 'CFR title', parsePositiveInt)
    .option('--part <n>', 'CFR part', parsePositiveInt)
    .option('--from-file <xml>', 'Read eCFR XML from a file instead of the API')
    .option('--window-size <n>', 'Chunk width in characters', parsePositiveInt)
    .option('--overlap <n>', 'Characters shared between consecutive chunks', parseNonNegativeInt)
    .option('--reset', 'Drop the existing index (required after changing the embedder)')
    .action(async (options: IngestCommandOptions, command: Command) => {
      const context = createContext(command, {
        date: options.date,
        title: options.title,
        part: options.part,
        windowSize: options.windowSize,
        overlap: options.overlap,
      });
      if (context.isErr()) {
        return;
      }
      await executeIngest(context.value, options);
    });
}

async function executeIngest(context: CommandContext, options: IngestCommandOptions): Promise<void> {
  const { config, logger, output } = context;
  const startTime = Date.now();
  const spinner = ora({
    text: 'Opening index...',
    isSilent: output.isJson() || output.isQuiet(),
  }).start();

  const built = buildIngestion(config, {
    reset: options.reset === true,
    logger,
    onProgress: (progress) => {
      spinner.text = describeProgress(progress);
    },
  });
  if (built.isErr()) {
    spinner.fail('Corpus refresh failed');
    reportFailure(context, built.error);
    return;
  }

  const { title, part, date } = config.source;
  const source: CorpusSource = options.fromFile
    ? { kind: 'file', path: options.fromFile, locator: { title, part } }
    : { kind: 'remote', locator: { title, part, date } };

  try {
    const result = await built.value.ingestor.ingest(source);
    if (result.isErr()) {
      spinner.fail('Corpus refresh failed');
      reportFailure(context, result.error);
      return;
    }

    const report = result.value;
    spinner.succeed(`Ingested ${report.corpusId}`);
    logger.logIngestion(report.corpusId, { ...report });
    output.success('Corpus ingested', {
      corpus_id: report.corpusId,
      source: report.source,
      sections: report.sections,
      chunks: report.chunks,
      inserted: report.inserted,
      unchanged: report.skipped,
      removed: report.removed,
      model: report.modelId,
      duration_ms: report.durationMs,
    });
  } finally {
    built.value.dispose();
    logger.logCommand('ingest', { ...options }, startTime);
  }
}

export function describeProgress(progress: IngestionProgress): string {
  switch (progress.step) {
    case 'fetch':
      return `Reading ${progress.source}...`;
    case 'chunk':
      return `Chunking ${progress.sections} sections...`;
    case 'embed':
      return `Embedding chunks ${progress.embedded}/${progress.total}...`;
    case 'store':
      return `Storing ${progress.entries} entries...`;
  }
}
