/**
 * Sections Command
 *
 * Splits a protocol text file into sections and lists the ones relevant to
 * electronic records and signatures.
 */

import { Command } from 'commander';
import { readFile } from 'fs/promises';
import chalk from 'chalk';
import { tryAsync, describeError } from '../../lib/result-types.js';
import { InvalidInputError } from '../../lib/errors.js';
import { SectionExtractor, cleanText } from '../../services/protocol/SectionExtractor.js';
import { createFormatter } from '../utils/command-context.js';

interface SectionsCommandOptions {
  all?: boolean;
  content?: boolean;
}

export function createSectionsCommand(): Command {
  return new Command('sections')
    .description('List the regulatory-relevant sections of a protocol text file')
    .argument('<file>', 'Protocol text file')
    .option('-a, --all', 'List every section, not only the regulatory ones')
    .option('-c, --content', 'Print section content')
    .action(async (file: string, options: SectionsCommandOptions, command: Command) => {
      const output = createFormatter(command);

      const loaded = await tryAsync(
        () => readFile(file, 'utf-8'),
        (error) => new InvalidInputError(`Cannot read protocol file ${file}: ${describeError(error)}`)
      );
      const prepared = loaded.andThen((text) =>
        SectionExtractor.fromDataFile().map((extractor) => ({ text, extractor }))
      );
      if (prepared.isErr()) {
        output.error('Section extraction failed', prepared.error);
        process.exitCode = 1;
        return;
      }

      const { text, extractor } = prepared.value;
      const sections = extractor.extract(cleanText(text));
      const regulatory = extractor.filterRegulatory(sections);

      if (output.isJson()) {
        output.json({
          file,
          allSectionsCount: sections.length,
          regulatorySectionsCount: regulatory.length,
          regulatorySections: regulatory,
          ...(options.all ? { sections } : {}),
        });
        return;
      }

      output.info(`Extracted ${regulatory.length} of ${sections.length} sections`, { file });
      const relevant = new Set(regulatory);
      for (const section of options.all ? sections : regulatory) {
        const marker = relevant.has(section) ? chalk.green('●') : chalk.dim('○');
        output.text(`${marker} ${chalk.bold(section.heading)}`);
        if (options.content) {
          output.text(chalk.dim('-'.repeat(60)));
          output.text(section.content.trim());
          output.text('');
        }
      }
    });
}
