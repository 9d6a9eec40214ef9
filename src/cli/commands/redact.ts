/**
 * Redact Command
 *
 * Writes a non-compliant variant of a protocol by redacting identifying
 * details (protocol ids, dates, signatories, contacts).
 */

import { Command } from 'commander';
import { readFile, writeFile } from 'fs/promises';
import { tryAsync, describeError } from '../../lib/result-types.js';
import { InvalidInputError } from '../../lib/errors.js';
import { Redactor } from '../../services/protocol/Redactor.js';
import { createFormatter } from '../utils/command-context.js';

interface RedactCommandOptions {
  types?: string[];
  output?: string;
}

export function createRedactCommand(): Command {
  return new Command('redact')
    .description('Redact identifying details from a protocol text file')
    .argument('<file>', 'Protocol text file')
    .option('-t, --types <types...>', 'Redaction types to apply (default: all)')
    .option('-o, --output <path>', 'Write the redacted text to a file instead of stdout')
    .action(async (file: string, options: RedactCommandOptions, command: Command) => {
      const output = createFormatter(command);
      const fail = (error: unknown): void => {
        output.error('Redaction failed', error);
        process.exitCode = 1;
      };

      const redactor = Redactor.fromDataFile();
      if (redactor.isErr()) {
        fail(redactor.error);
        return;
      }

      const loaded = await tryAsync(
        () => readFile(file, 'utf-8'),
        (error) => new InvalidInputError(`Cannot read protocol file ${file}: ${describeError(error)}`)
      );
      if (loaded.isErr()) {
        fail(loaded.error);
        return;
      }

      const types = options.types?.map((type) => type.toUpperCase());
      const redacted = redactor.value.redact(loaded.value, types);
      if (redacted.isErr()) {
        fail(redacted.error);
        return;
      }

      const { text, total, byType } = redacted.value;
      if (options.output) {
        const target = options.output;
        const written = await tryAsync(
          () => writeFile(target, text, 'utf-8'),
          (error) => new InvalidInputError(`Cannot write ${target}: ${describeError(error)}`)
        );
        if (written.isErr()) {
          fail(written.error);
          return;
        }
        output.success(`Redacted ${total} value(s)`, { output: target, ...byType });
        return;
      }

      if (output.isJson()) {
        output.json({ file, total, byType, text });
        return;
      }
      output.text(text);
    });
}
