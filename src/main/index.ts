#!/usr/bin/env node
/**
 * Crate Tagger - Command-Line Entry Point
 *
 * crate-tagger <folder> [-o out.csv] [-r] [--delay s] [--min-art px] [--no-art]
 *              [--threshold n] [--placeholder file] [--config file] [--no-cache] [--verbose]
 *
 * Exit codes: 0 when the run completes (including "no audio files"),
 * 1 on bad arguments or a fatal error.
 */

import * as fs from 'fs';
import * as path from 'path';
import { parseArgs } from 'util';
import * as dotenv from 'dotenv';
import type { FixerSettings, ProgressUpdate } from '../shared/types';
import { scanDirectoryForAudioFiles } from './utils/fileScanner';
import { loadPlaceholderHash } from './services/artReconciler';
import { BatchProcessor, BatchSummary } from './services/batchProcessor';
import { CatalogCache, MemoryCatalogCache, PersistentCatalogCache } from './services/catalogCache';
import { DiscogsClient } from './services/catalogClient';
import { FatalError, errorMessage, isPipelineError } from './services/errors';
import { ConsoleSink, LogSummary, Logger } from './services/logger';
import { assertCredentials, loadSettings } from './services/settingsManager';

// ─── Arguments ───────────────────────────────────────────────────────────────

export const USAGE = `Usage: crate-tagger <folder> [options]

Fills in Year and Label tags from Discogs and replaces missing, small or
placeholder cover art. Writes one CSV row per file.

Options:
  -o, --out <file>        Output CSV path (default: catalog_results.csv)
  -r, --recursive         Scan subfolders
      --delay <seconds>   Delay between Discogs requests (default: 0.6)
      --min-art <px>      Minimum art size, largest side (default: 500)
      --no-art            Never modify or insert album art
      --threshold <n>     Match confidence threshold 0-1 (default: 0.6)
      --placeholder <f>   Image always treated as missing art (default: placeholder.jpg)
      --config <file>     JSON settings file
      --no-cache          Do not keep catalog details between runs
  -v, --verbose           Print every log line
  -h, --help              Show this help

Credentials: DISCOGS_TOKEN, or DISCOGS_KEY and DISCOGS_SECRET (environment or .env).`;

export interface CliArguments {
  help: boolean;
  folder: string | null;
  configPath: string | undefined;
  overrides: Partial<FixerSettings>;
}

function parseNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value)) {
    throw new FatalError(`--${flag} expects a number, got "${raw}"`, { step: 'arguments' });
  }
  return value;
}

/**
 * Parses argv (without node and script) into settings overrides.
 * Unknown flags and malformed numbers throw FatalError.
 */
export function parseCliArguments(argv: string[]): CliArguments {
  let parsed: ReturnType<typeof parseCli>;
  try {
    parsed = parseCli(argv);
  } catch (error: unknown) {
    throw new FatalError(errorMessage(error), { step: 'arguments' });
  }

  const { values, positionals } = parsed;
  if (positionals.length > 1) {
    throw new FatalError(`Expected one folder, got ${positionals.length}`, { step: 'arguments' });
  }

  const delaySeconds = parseNumber('delay', values.delay);
  const minArt = parseNumber('min-art', values['min-art']);
  const overrides: Partial<FixerSettings> = {
    outputPath: values.out,
    recursive: values.recursive,
    requestDelayMs: delaySeconds !== undefined ? Math.round(delaySeconds * 1000) : undefined,
    minArtSize: minArt !== undefined ? Math.round(minArt) : undefined,
    noArt: values['no-art'],
    confidenceThreshold: parseNumber('threshold', values.threshold),
    placeholderPath: values.placeholder,
    useCache: values['no-cache'] ? false : undefined,
    verbose: values.verbose,
  };

  return {
    help: values.help ?? false,
    folder: positionals[0] ?? null,
    configPath: values.config,
    overrides,
  };
}

function parseCli(argv: string[]) {
  return parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      out: { type: 'string', short: 'o' },
      recursive: { type: 'boolean', short: 'r' },
      delay: { type: 'string' },
      'min-art': { type: 'string' },
      'no-art': { type: 'boolean' },
      threshold: { type: 'string' },
      placeholder: { type: 'string' },
      config: { type: 'string' },
      'no-cache': { type: 'boolean' },
      verbose: { type: 'boolean', short: 'v' },
      help: { type: 'boolean', short: 'h' },
    },
  });
}

// ─── Output ──────────────────────────────────────────────────────────────────

export function formatProgress(update: ProgressUpdate): string {
  const round = update.retryRound > 0 ? ` (retry round ${update.retryRound})` : '';
  const name = update.currentFile ? path.basename(update.currentFile) : '';
  return `[${update.processedFiles}/${update.totalFiles}]${round} ${name}`;
}

export function formatSummary(summary: BatchSummary): string[] {
  const lines = [
    `Done. Wrote ${summary.rowsWritten} row(s) to: ${summary.outputPath}`,
    `  tags updated: ${summary.tagsUpdated}, unchanged: ${summary.tagsUnchanged}, ` +
      `unsupported: ${summary.tagsUnsupported}, write failures: ${summary.tagWriteFailures}`,
    `  art downloaded: ${summary.artDownloaded}, no match: ${summary.noMatch}, ` +
      `errors: ${summary.failed}, permanent failures: ${summary.permanentFailures}`,
  ];
  if (summary.permanentFailures > 0) {
    lines.push(`  ${summary.permanentFailures} file(s) still failing after retries; re-run to process them.`);
  }
  return lines;
}

/** Warning and error counts of the run, errors broken down by category */
export function formatLogSummary(summary: LogSummary): string[] {
  const categories = Object.entries(summary.errorsByCategory)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([category, count]) => `${category}: ${count}`);
  const byCategory = categories.length > 0 ? ` (${categories.join(', ')})` : '';
  const lines = [`  log: ${summary.warnCount} warning(s), ${summary.errorCount} error(s)${byCategory}`];
  if (summary.logFilePath) {
    lines.push(`  log file: ${summary.logFilePath}`);
  }
  return lines;
}

function openCache(settings: FixerSettings, logger: Logger): { cache: CatalogCache; close: () => void } {
  if (!settings.useCache) {
    return { cache: new MemoryCatalogCache(), close: () => undefined };
  }

  const persistent = new PersistentCatalogCache({ dbPath: settings.cachePath ?? undefined });
  try {
    persistent.initialize();
  } catch (error: unknown) {
    logger.warn(`Catalog cache unavailable (${errorMessage(error)}); caching in memory for this run`, {
      filePath: persistent.getPath(),
    });
    return { cache: new MemoryCatalogCache(), close: () => undefined };
  }
  return { cache: persistent, close: () => persistent.close() };
}

// ─── Main ────────────────────────────────────────────────────────────────────

export interface MainOptions {
  env?: NodeJS.ProcessEnv;
  console?: ConsoleSink;
  /** Load .env from the working directory. Defaults to true */
  loadDotenv?: boolean;
}

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const out: ConsoleSink = options.console ?? {
    out: (line) => process.stdout.write(line + '\n'),
    err: (line) => process.stderr.write(line + '\n'),
  };

  if (options.loadDotenv ?? true) {
    dotenv.config();
  }

  let args: CliArguments;
  try {
    args = parseCliArguments(argv);
  } catch (error: unknown) {
    out.err(`Error: ${errorMessage(error)}`);
    out.err(USAGE);
    return 1;
  }

  if (args.help) {
    out.out(USAGE);
    return 0;
  }
  if (args.folder === null) {
    out.err('Error: missing <folder>');
    out.err(USAGE);
    return 1;
  }

  let logger: Logger | null = null;
  let closeCache: () => void = () => undefined;
  try {
    const settings = await loadSettings({
      configPath: args.configPath,
      env: options.env ?? process.env,
      overrides: { ...args.overrides, root: args.folder },
    });

    logger = new Logger({
      logDir: settings.logDir ?? undefined,
      echo: settings.verbose ? 'all' : 'problems',
      consoleSink: out,
    });
    await logger.initialize();

    const root = path.resolve(settings.root);
    if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
      throw new FatalError(`Folder "${root}" not found or not a directory`, { filePath: root });
    }

    assertCredentials(settings);

    const activeLogger = logger;
    const files = scanDirectoryForAudioFiles(root, {
      recursive: settings.recursive,
      onUnreadable: (dirPath, error) =>
        activeLogger.warn(`Skipping unreadable folder: ${errorMessage(error)}`, { filePath: dirPath }),
    });
    if (files.length === 0) {
      out.out('No audio files found.');
      return 0;
    }
    out.out(`Scanning ${files.length} file(s)...`);

    let placeholderHash: string | null = null;
    try {
      placeholderHash = await loadPlaceholderHash(settings.placeholderPath);
    } catch (error: unknown) {
      logger.warn(`Could not read placeholder image: ${errorMessage(error)}`, {
        filePath: settings.placeholderPath ?? undefined,
      });
    }
    if (placeholderHash === null) {
      logger.info('Placeholder image not found; placeholder matching disabled');
    }

    const { cache, close } = openCache(settings, logger);
    closeCache = close;

    const processor = new BatchProcessor(settings, {
      catalog: new DiscogsClient(settings, { cache }),
      placeholderHash,
      logger,
      onProgress: settings.verbose ? undefined : (update) => out.out(formatProgress(update)),
    });

    const summary = await processor.process(files);
    for (const line of [...formatSummary(summary), ...formatLogSummary(logger.getSummary())]) {
      out.out(line);
    }
    return 0;
  } catch (error: unknown) {
    if (isPipelineError(error)) {
      logger?.logPipelineError(error);
      if (!logger) out.err(`Error: ${error.toUserMessage()}`);
      return 1;
    }
    throw error;
  } finally {
    closeCache();
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`Unexpected error: ${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
      process.exitCode = 1;
    },
  );
}
