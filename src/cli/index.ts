#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { OutputFormatter } from './utils/output.js';
import { createIngestCommand } from './commands/ingest.js';
import { createAuditCommand } from './commands/audit.js';
import { createSearchCommand } from './commands/search.js';
import { createStatusCommand } from './commands/status.js';
import { createSectionsCommand } from './commands/sections.js';
import { createRedactCommand } from './commands/redact.js';

const program = new Command();
const output = new OutputFormatter();

program
  .name('regaudit')
  .description('Audit clinical-trial protocols against 21 CFR Part 11 with retrieval-augmented generation')
  .version('0.1.0')
  .option('--json', 'Output results in JSON format')
  .option('-v, --verbose', 'Echo log entries to the console')
  .option('-q, --quiet', 'Suppress non-error output');

// Error handling
program.exitOverride();

process.on('SIGINT', () => {
  console.log('\nOperation cancelled.');
  process.exit(130);
});

process.on('SIGTERM', () => {
  process.exit(143);
});

// Register commands
program.addCommand(createIngestCommand());
program.addCommand(createAuditCommand());
program.addCommand(createSearchCommand());
program.addCommand(createStatusCommand());
program.addCommand(createSectionsCommand());
program.addCommand(createRedactCommand());

// Parse arguments
try {
  await program.parseAsync(process.argv);
} catch (error: unknown) {
  if (error instanceof CommanderError) {
    // Commander has already printed usage, help or version
    process.exitCode = error.exitCode;
  } else {
    output.error('Unexpected error', error);
    process.exitCode = 1;
  }
}
