/**
 * Logger Service for Crate Tagger
 *
 * Structured logging with daily log files, log levels, error categorization
 * and integration with PipelineError classes. Only per-level and per-category
 * counts stay in memory, for the run summary.
 *
 * Default log directory: %APPDATA%/crate-tagger/logs/ (or ~/.config/crate-tagger/logs/)
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { PipelineError, ErrorCategory } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO';

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** File being processed when the log was created (if applicable) */
  filePath: string | null;
  /** Processing step where the log was created (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Optional context attached to a log call */
export interface LogContext {
  category?: ErrorCategory;
  filePath?: string;
  step?: string;
  cause?: string;
}

/** Destination for console echo; defaults to process stdout/stderr */
export interface ConsoleSink {
  out(line: string): void;
  err(line: string): void;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to <appdata>/crate-tagger/logs/ */
  logDir?: string;
  /** Minimum log level to keep (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Echo entries to the console: 'all', 'problems' (WARN+ERROR) or 'none'. Defaults to 'none' */
  echo?: 'all' | 'problems' | 'none';
  /** Console destination (for testing) */
  consoleSink?: ConsoleSink;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

/** Counts of log entries for the run summary */
export interface LogSummary {
  errorCount: number;
  warnCount: number;
  infoCount: number;
  errorsByCategory: Record<string, number>;
  /** Log file path (if file logging is enabled) */
  logFilePath: string | null;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'crate-tagger';
const LOG_DIR_NAME = 'logs';
const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
};

const processConsole: ConsoleSink = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the per-user application directory.
 * On Windows: %APPDATA%/crate-tagger/, elsewhere ~/.config/crate-tagger/
 */
export function getAppDataDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

export function getDefaultLogDir(): string {
  return path.join(getAppDataDir(), LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object.
 * Format: YYYY-MM-DD.log
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single line.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | filePath: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [`[${entry.timestamp}]`, entry.level];

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.filePath) {
    parts.push(`| filePath: ${entry.filePath}`);
  }
  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }
  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/** Compact console rendering: "WARN  message (file.mp3)" */
export function formatConsoleLine(entry: LogEntry): string {
  const level = entry.level.padEnd(5);
  const file = entry.filePath ? ` (${path.basename(entry.filePath)})` : '';
  return `${level} ${entry.message}${file}`;
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    filePath: options?.filePath ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  return createLogEntry(
    level,
    error.message,
    {
      category: error.category,
      filePath: error.filePath ?? undefined,
      step: error.step,
      cause: error.cause?.message,
    },
    getCurrentDate,
  );
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for Crate Tagger.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ echo: 'all' });
 * await logger.initialize();
 * logger.info('Scanning 12 file(s)');
 * logger.logPipelineError(new WriteError('disk full', { filePath: '/music/song.mp3' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private readonly writeToFile: boolean;
  private readonly maxFileSize: number;
  private readonly echo: 'all' | 'problems' | 'none';
  private readonly consoleSink: ConsoleSink;
  private readonly getCurrentDate: () => Date;

  private readonly counts: Record<LogLevel, number> = { ERROR: 0, WARN: 0, INFO: 0 };
  private readonly errorsByCategory: Record<string, number> = {};
  private initialized = false;
  private fileLoggingDisabled = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.echo = options?.echo ?? 'none';
    this.consoleSink = options?.consoleSink ?? processConsole;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging
   * is switched off and the logger keeps echoing and counting.
   */
  async initialize(): Promise<void> {
    if (!this.writeToFile) {
      this.initialized = true;
      return;
    }

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
    } catch (error: unknown) {
      this.fileLoggingDisabled = true;
      const message = error instanceof Error ? error.message : String(error);
      this.addEntry(
        createLogEntry(
          'WARN',
          `Failed to create log directory "${this.logDir}": ${message}. File logging disabled.`,
          undefined,
          this.getCurrentDate,
        ),
      );
    }
    this.initialized = true;
  }

  getLogFilePath(): string {
    return path.join(this.logDir, getLogFileName(this.getCurrentDate()));
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  /**
   * Logs a PipelineError with its category, file, step and cause.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    this.counts[entry.level]++;
    if (entry.level === 'ERROR' && entry.category) {
      this.errorsByCategory[entry.category] = (this.errorsByCategory[entry.category] ?? 0) + 1;
    }
    this.echoEntry(entry);
    if (this.writeToFile && this.initialized && !this.fileLoggingDisabled) {
      this.writeEntryToFile(entry);
    }
  }

  private echoEntry(entry: LogEntry): void {
    if (this.echo === 'none') return;
    if (entry.level === 'INFO') {
      if (this.echo === 'all') this.consoleSink.out(formatConsoleLine(entry));
      return;
    }
    this.consoleSink.err(formatConsoleLine(entry));
  }

  /**
   * Appends an entry to today's log file, rotating when it exceeds maxFileSize.
   * A failing log write must not take down the run, so it turns file logging off
   * and reports once on the console.
   */
  private writeEntryToFile(entry: LogEntry): void {
    const logFilePath = this.getLogFilePath();
    try {
      if (fs.existsSync(logFilePath) && fs.statSync(logFilePath).size >= this.maxFileSize) {
        this.rotateLogFile(logFilePath);
      }
      fs.appendFileSync(logFilePath, formatLogEntry(entry) + '\n', 'utf-8');
    } catch (error: unknown) {
      this.fileLoggingDisabled = true;
      const message = error instanceof Error ? error.message : String(error);
      this.consoleSink.err(`WARN  Log file "${logFilePath}" unwritable (${message}); file logging disabled`);
    }
  }

  /**
   * Renames a full log file with a numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  // ─── Summary ───────────────────────────────────────────────────────

  getSummary(): LogSummary {
    return {
      errorCount: this.counts.ERROR,
      warnCount: this.counts.WARN,
      infoCount: this.counts.INFO,
      errorsByCategory: { ...this.errorsByCategory },
      logFilePath: this.writeToFile && !this.fileLoggingDisabled ? this.getLogFilePath() : null,
    };
  }
}
