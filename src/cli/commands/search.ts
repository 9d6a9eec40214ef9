/**
 * Search Command
 *
 * Retrieval only: shows the regulation chunks closest to a query without
 * calling the language model.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { buildSearch } from '../../services/pipeline/pipeline-factory.js';
import { preview } from './audit.js';
import { OutputFormat } from '../utils/output.js';
import {
  createContext,
  parseFormat,
  parsePositiveInt,
  reportFailure,
} from '../utils/command-context.js';

interface SearchCommandOptions {
  k?: number;
  format?: string;
}

export function createSearchCommand(): Command {
  return new Command('search')
    .description('Search the indexed regulation without generating an audit')
    .argument('<query>', 'Search query')
    .option('-k, --k <n>', 'Maximum number of results', parsePositiveInt)
    .option('--format <type>', 'Output format (human|json)', parseFormat, OutputFormat.HUMAN)
    .action(async (query: string, options: SearchCommandOptions, command: Command) => {
      const context = createContext(command, { topK: options.k }, options.format);
      if (context.isErr()) {
        return;
      }
      const { config, logger, output } = context.value;
      const startTime = Date.now();

      const built = buildSearch(config, logger);
      if (built.isErr()) {
        reportFailure(context.value, built.error);
        return;
      }

      try {
        const result = await built.value.retriever.retrieveScored(query, config.topK);
        if (result.isErr()) {
          reportFailure(context.value, result.error);
          return;
        }

        const results = result.value;
        if (output.isJson()) {
          output.json({
            query,
            results: results.map(({ chunk, similarity }) => ({
              sourceId: chunk.sourceId,
              similarity,
              offset: chunk.offset,
              text: chunk.text,
            })),
          });
          return;
        }

        output.text(chalk.cyan(`\nSearch: "${query}"`));
        output.text(chalk.gray(`Found ${results.length} results in ${Date.now() - startTime}ms\n`));
        if (results.length === 0) {
          output.text(chalk.yellow('No results found. Run "regaudit ingest" to build the index.'));
        }
        results.forEach(({ chunk, similarity }, i) => {
          output.text(
            chalk.bold.white(`${i + 1}. ${chunk.sourceId}`) + chalk.gray(` (similarity: ${similarity.toFixed(3)})`)
          );
          output.text(chalk.dim(`   ${preview(chunk.text)}\n`));
        });
      } finally {
        built.value.dispose();
        logger.logCommand('search', { query, k: config.topK }, startTime);
      }
    });
}
