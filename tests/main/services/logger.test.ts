/**
 * Tests for the Logger service: formatting helpers, level filtering,
 * console echo, file output and rotation.
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  ConsoleSink,
  LogEntry,
  Logger,
  createLogEntryFromError,
  formatConsoleLine,
  formatLogEntry,
  getAppDataDir,
  getLogFileName,
  shouldLog,
} from '../../../src/main/services/logger';
import { RateLimitedError, WriteError } from '../../../src/main/services/errors';
import { createTempDir, removeTempDir } from '../../helpers/fixtures';

// ─── Helpers ─────────────────────────────────────────────────────────────────

function createSink(): ConsoleSink & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return {
    outLines,
    errLines,
    out: (line) => outLines.push(line),
    err: (line) => errLines.push(line),
  };
}

const FIXED_DATE = new Date(2024, 0, 15, 12, 0, 0);

function entry(overrides: Partial<LogEntry> = {}): LogEntry {
  return {
    timestamp: '2024-01-15T10:00:00.000Z',
    level: 'ERROR',
    message: 'boom',
    category: null,
    filePath: null,
    step: null,
    cause: null,
    ...overrides,
  };
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('Logger helpers', () => {
  it('names log files by local date', () => {
    expect(getLogFileName(new Date(2024, 0, 5))).toBe('2024-01-05.log');
  });

  it('places app data under crate-tagger', () => {
    expect(path.basename(getAppDataDir())).toBe('crate-tagger');
  });

  it('formats a full entry on one line', () => {
    const line = formatLogEntry(
      entry({ category: 'WriteError', filePath: '/music/a.mp3', step: 'writing', cause: 'EACCES' }),
    );
    expect(line).toBe(
      '[2024-01-15T10:00:00.000Z] ERROR [WriteError] boom | filePath: /music/a.mp3 | step: writing | cause: EACCES',
    );
  });

  it('omits empty context', () => {
    expect(formatLogEntry(entry({ level: 'INFO', message: 'hello' }))).toBe('[2024-01-15T10:00:00.000Z] INFO hello');
  });

  it('formats compact console lines with the file name', () => {
    expect(formatConsoleLine(entry({ level: 'WARN', message: 'no art', filePath: '/music/song.mp3' }))).toBe(
      'WARN  no art (song.mp3)',
    );
  });

  it('compares levels', () => {
    expect(shouldLog('ERROR', 'INFO')).toBe(true);
    expect(shouldLog('INFO', 'WARN')).toBe(false);
    expect(shouldLog('WARN', 'WARN')).toBe(true);
  });

  it('builds entries from pipeline errors', () => {
    const error = new WriteError('cannot write', { filePath: '/music/a.mp3', cause: new Error('EACCES') });
    const result = createLogEntryFromError(error, 'WARN', () => FIXED_DATE);

    expect(result.level).toBe('WARN');
    expect(result.category).toBe('WriteError');
    expect(result.filePath).toBe('/music/a.mp3');
    expect(result.step).toBe('writing');
    expect(result.cause).toBe('EACCES');
    expect(result.timestamp).toBe(FIXED_DATE.toISOString());
  });
});

describe('Logger', () => {
  describe('summary', () => {
    it('counts entries by level and errors by category', () => {
      const logger = new Logger({ writeToFile: false });

      logger.info('a');
      logger.warn('b');
      logger.logPipelineError(new RateLimitedError('429'));
      logger.logPipelineError(new RateLimitedError('429 again'));
      logger.logPipelineError(new WriteError('disk full'), 'WARN');
      logger.error('plain');

      expect(logger.getSummary()).toEqual({
        errorCount: 3,
        warnCount: 2,
        infoCount: 1,
        errorsByCategory: { RateLimitedError: 2 },
        logFilePath: null,
      });
    });

    it('does not count entries below the minimum level', () => {
      const logger = new Logger({ writeToFile: false, minLevel: 'WARN' });

      logger.info('ignored');
      logger.warn('kept');

      expect(logger.getSummary().infoCount).toBe(0);
      expect(logger.getSummary().warnCount).toBe(1);
    });

    it('returns a copy of the category counts', () => {
      const logger = new Logger({ writeToFile: false });
      logger.logPipelineError(new WriteError('disk full'));

      logger.getSummary().errorsByCategory.WriteError = 99;

      expect(logger.getSummary().errorsByCategory).toEqual({ WriteError: 1 });
    });
  });

  describe('console echo', () => {
    it('echoes only problems by default for the CLI', () => {
      const sink = createSink();
      const logger = new Logger({ writeToFile: false, echo: 'problems', consoleSink: sink });

      logger.info('quiet');
      logger.warn('careful', { filePath: '/music/song.mp3' });
      logger.error('broken');

      expect(sink.outLines).toEqual([]);
      expect(sink.errLines).toEqual(['WARN  careful (song.mp3)', 'ERROR broken']);
    });

    it('echoes INFO to stdout in verbose mode', () => {
      const sink = createSink();
      const logger = new Logger({ writeToFile: false, echo: 'all', consoleSink: sink });

      logger.info('hello');

      expect(sink.outLines).toEqual(['INFO  hello']);
    });

    it('stays silent with echo none', () => {
      const sink = createSink();
      const logger = new Logger({ writeToFile: false, consoleSink: sink });

      logger.error('boom');

      expect(sink.errLines).toEqual([]);
    });
  });

  describe('file output', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = createTempDir();
    });

    afterEach(() => {
      removeTempDir(tempDir);
    });

    it('appends formatted entries to the daily file', async () => {
      const logDir = path.join(tempDir, 'logs');
      const logger = new Logger({ logDir, getCurrentDate: () => FIXED_DATE });
      await logger.initialize();

      logger.info('first');
      logger.logPipelineError(new WriteError('disk full', { filePath: '/music/a.mp3' }));

      const logFile = path.join(logDir, '2024-01-15.log');
      const lines = fs.readFileSync(logFile, 'utf-8').trimEnd().split('\n');
      expect(lines).toEqual([
        `[${FIXED_DATE.toISOString()}] INFO first`,
        `[${FIXED_DATE.toISOString()}] ERROR [WriteError] disk full | filePath: /music/a.mp3 | step: writing`,
      ]);
      expect(logger.getSummary().logFilePath).toBe(logFile);
    });

    it('rotates a full log file', async () => {
      const logger = new Logger({ logDir: tempDir, maxFileSize: 10, getCurrentDate: () => FIXED_DATE });
      await logger.initialize();

      logger.info('first entry');
      logger.info('second entry');

      expect(fs.readFileSync(path.join(tempDir, '2024-01-15.1.log'), 'utf-8')).toContain('first entry');
      expect(fs.readFileSync(path.join(tempDir, '2024-01-15.log'), 'utf-8')).toContain('second entry');
    });

    it('turns file logging off when the log directory cannot be created', async () => {
      const blocker = path.join(tempDir, 'not-a-dir');
      fs.writeFileSync(blocker, '');
      const logger = new Logger({ logDir: path.join(blocker, 'logs') });
      await logger.initialize();

      logger.info('still counted');

      expect(logger.getSummary()).toMatchObject({ warnCount: 1, infoCount: 1, logFilePath: null });
    });
  });
});
