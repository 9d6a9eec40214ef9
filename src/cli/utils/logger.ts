import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { STORAGE_CONFIG } from '../../constants/pipeline-constants.js';

/**
 * Log levels
 */
export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR'
}

/**
 * Log entry structure
 */
export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
}

/**
 * Logging surface the pipeline services depend on
 */
export interface PipelineLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: unknown, context?: Record<string, unknown>): void;
}

/**
 * Logger that drops every entry
 */
export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

/**
 * JSON Lines logger for regaudit
 */
export class Logger implements PipelineLogger {
  private readonly logDir: string;
  private readonly logFile: string;
  private readonly enableConsole: boolean;

  constructor(dataDir: string, enableConsole: boolean = false) {
    this.logDir = join(dataDir, STORAGE_CONFIG.LOGS_DIR);
    this.enableConsole = enableConsole;

    if (!existsSync(this.logDir)) {
      mkdirSync(this.logDir, { recursive: true });
    }

    // One file per day
    const timestamp = new Date().toISOString().split('T')[0];
    this.logFile = join(this.logDir, `regaudit-${timestamp}.jsonl`);
  }

  /**
   * Path of the file entries are appended to
   */
  get filePath(): string {
    return this.logFile;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, context);
  }

  error(message: string, error?: unknown, context?: Record<string, unknown>): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level: LogLevel.ERROR,
      message,
      context
    };

    if (error !== undefined) {
      entry.error = error instanceof Error
        ? { name: error.name, message: error.message, stack: error.stack }
        : { name: 'Error', message: String(error) };
    }

    this.writeLog(entry);
  }

  private log(level: LogLevel, message: string, context?: Record<string, unknown>): void {
    this.writeLog({
      timestamp: new Date().toISOString(),
      level,
      message,
      context
    });
  }

  /**
   * Writes log entry to file
   */
  private writeLog(entry: LogEntry): void {
    try {
      appendFileSync(this.logFile, JSON.stringify(entry) + '\n');
    } catch (error) {
      console.error('Failed to write log:', error);
    }

    if (this.enableConsole) {
      this.writeToConsole(entry);
    }
  }

  private writeToConsole(entry: LogEntry): void {
    const message = `[${entry.timestamp}] [${entry.level}] ${entry.message}`;

    switch (entry.level) {
      case LogLevel.DEBUG:
        console.debug(message, entry.context || '');
        break;
      case LogLevel.INFO:
        console.info(message, entry.context || '');
        break;
      case LogLevel.WARN:
        console.warn(message, entry.context || '');
        break;
      case LogLevel.ERROR:
        console.error(message, entry.error || entry.context || '');
        break;
    }
  }

  /**
   * Logs command execution
   */
  logCommand(command: string, args: Record<string, unknown>, startTime: number): void {
    this.info(`Command executed: ${command}`, {
      command,
      args,
      duration_ms: Date.now() - startTime
    });
  }

  /**
   * Logs a finished corpus ingestion
   */
  logIngestion(corpusId: string, details: Record<string, unknown>): void {
    this.info('Corpus ingested', { corpus_id: corpusId, ...details });
  }
}
