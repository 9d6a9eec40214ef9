/**
 * Status Command
 *
 * Reports the index location, size, embedding space and last ingestion.
 */

import { Command, type OptionValues } from 'commander';
import { existsSync } from 'fs';
import { VectorIndex } from '../../services/vector-storage.js';
import { indexPath } from '../../services/pipeline/pipeline-factory.js';
import { createContext, reportFailure } from '../utils/command-context.js';

export function createStatusCommand(): Command {
  return new Command('status')
    .description('Show index size, embedding model and last ingestion')
    .action((_options: OptionValues, command: Command) => {
      const context = createContext(command);
      if (context.isErr()) {
        return;
      }
      const { config, output } = context.value;
      const location = indexPath(config);

      if (!existsSync(location)) {
        output.warning('No index found', {
          path: location,
          next_step: 'Run "regaudit ingest" to build it',
        });
        return;
      }

      const stats = VectorIndex.open(location).andThen((index) => {
        const result = index.stats();
        index.close();
        return result;
      });
      if (stats.isErr()) {
        reportFailure(context.value, stats.error);
        return;
      }

      const { size, corpora, space, lastIngestion } = stats.value;
      if (output.isJson()) {
        output.json({ status: 'success', ...stats.value, configuredEmbedder: config.embedding.model });
        return;
      }

      output.success('Index ready', {
        path: location,
        entries: size,
        model: space ? `${space.modelId} (${space.dimensions} dimensions)` : 'none recorded',
        configured_embedder: config.embedding.model,
      });

      const rows = Object.entries(corpora).map(([corpusId, count]): Array<string | number> => [corpusId, count]);
      if (rows.length > 0) {
        output.table(['corpus', 'entries'], rows);
      }

      if (lastIngestion) {
        output.info('Last ingestion', {
          corpus_id: lastIngestion.corpusId,
          source: lastIngestion.source,
          completed_at: lastIngestion.completedAt,
          chunks: lastIngestion.chunks,
          inserted: lastIngestion.inserted,
          removed: lastIngestion.removed,
        });
      }

      if (space && space.modelId !== config.embedding.model) {
        output.warning('The configured embedder differs from the index; audits will fail until "ingest --reset"');
      }
    });
}
