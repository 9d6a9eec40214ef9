/**
 * Output formatting utilities for CLI
 */

import chalk from 'chalk';

/**
 * Output format types
 */
export enum OutputFormat {
  HUMAN = 'human',
  JSON = 'json'
}

export type Details = Record<string, unknown>;

/**
 * Symbols for terminal output
 */
const symbols = {
  success: '✓',
  error: '✗',
  warning: '⚠',
  info: 'ℹ',
  arrow: '→'
};

/**
 * Output formatter class
 */
export class OutputFormatter {
  private readonly format: OutputFormat;
  private readonly quiet: boolean;

  constructor(format: OutputFormat = OutputFormat.HUMAN, quiet: boolean = false) {
    this.format = format;
    this.quiet = quiet;
  }

  /**
   * Outputs success message
   */
  success(message: string, data?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'success', message, ...data });
    } else if (!this.quiet) {
      console.log(`${chalk.green(symbols.success)} ${message}`);
      if (data) {
        this.details(data);
      }
    }
  }

  /**
   * Outputs error message; never suppressed by quiet mode
   */
  error(message: string, error?: unknown, hint?: string): void {
    if (this.format === OutputFormat.JSON) {
      this.json({
        status: 'error',
        message,
        error: describe(error),
        hint
      });
    } else {
      console.error(`${chalk.red(symbols.error)} ${chalk.red(message)}`);
      const detail = describe(error);
      if (detail) {
        console.error(`  ${chalk.dim(detail.message)}`);
      }
      if (hint) {
        console.error(`  ${chalk.yellow(symbols.arrow)} ${hint}`);
      }
    }
  }

  /**
   * Outputs warning message
   */
  warning(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'warning', message, ...details });
    } else {
      console.warn(`${chalk.yellow(symbols.warning)} ${chalk.yellow(message)}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs info message
   */
  info(message: string, details?: Details): void {
    if (this.format === OutputFormat.JSON) {
      this.json({ status: 'info', message, ...details });
    } else if (!this.quiet) {
      console.log(`${chalk.blue(symbols.info)} ${message}`);
      if (details) {
        this.details(details);
      }
    }
  }

  /**
   * Outputs a heading line (human format only)
   */
  heading(title: string): void {
    if (this.format === OutputFormat.HUMAN) {
      console.log(chalk.bold.cyan(`\n${title}`));
    }
  }

  /**
   * Outputs a block of plain text (human format only)
   */
  text(body: string): void {
    if (this.format === OutputFormat.HUMAN) {
      console.log(body);
    }
  }

  /**
   * Outputs a table
   */
  table(headers: string[], rows: Array<Array<string | number>>): void {
    if (this.format === OutputFormat.JSON) {
      const data = rows.map(row => {
        const obj: Record<string, string | number | undefined> = {};
        headers.forEach((header, i) => {
          obj[header] = row[i];
        });
        return obj;
      });
      this.json({ type: 'table', headers, data });
    } else {
      // Calculate column widths
      const widths = headers.map((h, i) => {
        const values = [h, ...rows.map(r => String(r[i] ?? ''))];
        return Math.max(...values.map(v => v.length));
      });

      const headerRow = headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(' │ ');
      console.log(chalk.bold(headerRow));

      const separator = widths.map(w => '─'.repeat(w)).join('─┼─');
      console.log(chalk.dim(separator));

      for (const row of rows) {
        const rowStr = row.map((cell, i) =>
          String(cell).padEnd(widths[i] ?? 0)
        ).join(' │ ');
        console.log(rowStr);
      }
    }
  }

  /**
   * Outputs raw JSON
   */
  json(data: unknown): void {
    console.log(JSON.stringify(data, null, 2));
  }

  /**
   * Outputs details (key-value pairs)
   */
  private details(data: Details): void {
    for (const [key, value] of Object.entries(data)) {
      if (value === undefined) continue;
      console.log(`  ${chalk.dim(formatKey(key) + ':')} ${String(value)}`);
    }
  }

  isJson(): boolean {
    return this.format === OutputFormat.JSON;
  }

  isQuiet(): boolean {
    return this.quiet;
  }
}

/**
 * "duration_ms" -> "Duration Ms", "chunkCount" -> "Chunk Count"
 */
export function formatKey(key: string): string {
  return key
    .replace(/([a-z])([A-Z])/g, '$1 $2')
    .replace(/_/g, ' ')
    .replace(/\b\w/g, l => l.toUpperCase());
}

function describe(error: unknown): { name: string; message: string; code?: string } | undefined {
  if (error === undefined) {
    return undefined;
  }
  if (error instanceof Error) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
    return { name: error.name, message: error.message, code };
  }
  return { name: 'Error', message: String(error) };
}
