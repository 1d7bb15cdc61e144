/**
 * Batch Processing Service
 *
 * Orchestrates one run over a folder's files:
 *   read tags → extract identity → build queries → search + rank until a
 *   confident match → fetch detail → reconcile tags → reconcile art → audit row
 *
 * Key design decisions:
 * - Files are processed one at a time; the only shared resource is the catalog
 *   client's rate-limited request channel
 * - Rate-limited and transient failures go through the RetryQueue (3 rounds,
 *   linear backoff); other per-file errors are recorded and never retried
 * - Every file gets exactly one audit row, appended as soon as it is final
 * - A FatalError aborts the run, but only after the CSV has been rewritten
 *   with every row produced so far
 * - All collaborators are injected so the whole pipeline runs in tests
 *   without audio files or network
 */

import * as path from 'path';
import {
  AuditRow,
  CatalogRecord,
  FixerSettings,
  Identity,
  MatchResult,
  ProgressUpdate,
} from '../../shared/types';
import { readTags as readTagsFromFile, TagReader, TagSnapshot } from './audioReader';
import { AuditRecorder, buildAuditRow } from './auditRecorder';
import { ArtPolicy, reconcileArt } from './artReconciler';
import type { CatalogService } from './catalogClient';
import { NO_MATCH, selectBestCandidate } from './candidateRanker';
import { DownloadError, FileReadError, PipelineError, UnsupportedFormatError, WriteError } from './errors';
import { extractIdentity, isEmptyIdentity, parseFilename } from './identityExtractor';
import { Logger } from './logger';
import { buildQueries } from './queryBuilder';
import { RetryQueue, RetryRunSummary } from './retryQueue';
import { reconcileTags } from './tagReconciler';
import { FileTagWriter, TagWriter } from './tagWriter';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Collaborators of the batch processor */
export interface BatchProcessorOptions {
  /** Catalog search, detail and image access */
  catalog: CatalogService;
  /** Tag reader. Defaults to music-metadata */
  readTags?: TagReader;
  /** Tag/art writer. Defaults to FileTagWriter */
  writer?: TagWriter;
  /** MD5 of the placeholder image; null disables placeholder matching */
  placeholderHash?: string | null;
  /** Logger instance for structured logging */
  logger?: Logger;
  /** Custom sleep for retry backoff (for testing) */
  sleep?: (ms: number) => Promise<void>;
  /** Callback for progress updates */
  onProgress?: (update: ProgressUpdate) => void;
}

/** Outcome of a run */
export interface BatchSummary {
  totalFiles: number;
  rowsWritten: number;
  tagsUpdated: number;
  tagsUnchanged: number;
  tagsUnsupported: number;
  tagWriteFailures: number;
  artDownloaded: number;
  noMatch: number;
  /** Files finalized with a non-retryable error */
  failed: number;
  /** Files still failing after the last retry round */
  permanentFailures: number;
  retryRoundsRun: number;
  outputPath: string;
  rows: AuditRow[];
}

/** Audit notes with a fixed meaning */
export const NOTES = {
  noMatch: 'no_confident_match',
  unparseable: 'unparseable_filename',
  permanentFailure: 'permanent_failure',
  error: 'error',
} as const;

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function formatConfidence(confidence: number): string {
  return confidence.toFixed(3);
}

function joinNotes(...notes: Array<string | null | undefined>): string {
  return notes.filter((note): note is string => Boolean(note)).join('; ');
}

function identityColumns(identity: Identity): Pick<AuditRow, 'artist' | 'title' | 'mix'> {
  return { artist: identity.artist, title: identity.title, mix: identity.mix ?? '' };
}

// ─── BatchProcessor Class ────────────────────────────────────────────────────

/**
 * Runs the tagging pipeline over a list of files.
 *
 * Usage:
 * ```typescript
 * const processor = new BatchProcessor(settings, { catalog: new DiscogsClient(settings), logger });
 * const summary = await processor.process(files);
 * ```
 */
export class BatchProcessor {
  private readonly settings: FixerSettings;
  private readonly catalog: CatalogService;
  private readonly readTags: TagReader;
  private readonly writer: TagWriter;
  private readonly artPolicy: ArtPolicy;
  private readonly logger: Logger | null;
  private readonly sleep: ((ms: number) => Promise<void>) | undefined;
  private readonly onProgress: ((update: ProgressUpdate) => void) | null;

  /** Identity per file, kept for failure rows */
  private readonly identities = new Map<string, Identity>();

  constructor(settings: FixerSettings, options: BatchProcessorOptions) {
    this.settings = settings;
    this.catalog = options.catalog;
    this.readTags = options.readTags ?? readTagsFromFile;
    this.writer = options.writer ?? new FileTagWriter();
    this.logger = options.logger ?? null;
    this.sleep = options.sleep;
    this.onProgress = options.onProgress ?? null;
    this.artPolicy = {
      noArt: settings.noArt,
      minArtSize: settings.minArtSize,
      placeholderHash: options.placeholderHash ?? null,
    };
  }

  /**
   * Processes every file, then the retry rounds, and writes the audit CSV.
   * Rethrows FatalError after the rows produced so far are on disk.
   */
  async process(filePaths: string[]): Promise<BatchSummary> {
    const totalFiles = filePaths.length;
    const recorder = new AuditRecorder(this.settings.outputPath, filePaths);
    await recorder.open();

    let processedFiles = 0;
    let retryRound = 0;
    const queue = new RetryQueue<string>({
      backoffMs: this.settings.retryBackoffMs,
      sleep: this.sleep,
      onRoundStart: (round, queued) => {
        retryRound = round;
        this.logger?.warn(`Retry round ${round}: ${queued} file(s) after ${queue.backoffFor(round)}ms backoff`, {
          step: 'retry',
        });
      },
    });
    for (const filePath of filePaths) {
      queue.enqueue(filePath, filePath);
    }

    const finish = async (row: AuditRow): Promise<void> => {
      await recorder.record(row);
      processedFiles++;
      this.onProgress?.({
        totalFiles,
        processedFiles,
        queuedForRetry: queue.queuedCount,
        currentFile: row.file,
        retryRound,
      });
    };

    let retrySummary: RetryRunSummary;
    try {
      retrySummary = await queue.run({
        attempt: async (filePath, round) => {
          this.logger?.info(
            round === 0
              ? `[${filePaths.indexOf(filePath) + 1}/${totalFiles}] ${path.basename(filePath)}`
              : `[retry ${round}] ${path.basename(filePath)}`,
            { filePath },
          );
          try {
            await finish(await this.processFile(filePath));
          } catch (error: unknown) {
            if (error instanceof PipelineError && error.category !== 'FatalError') {
              this.logger?.logPipelineError(error, 'WARN');
            }
            throw error;
          }
        },
        onFailure: (filePath, error) => finish(this.failureRow(filePath, error)),
        onExhausted: (filePath, error, attempts) => {
          this.logger?.error(`Giving up after ${attempts} attempts: ${error.message}`, {
            category: error.category,
            filePath,
            step: 'retry',
          });
          return finish(this.exhaustedRow(filePath, error, attempts));
        },
      });
    } finally {
      await recorder.finalize();
    }

    const summary = this.summarize(recorder, totalFiles, retrySummary);
    this.logger?.info(
      `Done: ${summary.rowsWritten} row(s) → ${summary.outputPath} ` +
        `(updated ${summary.tagsUpdated}, unchanged ${summary.tagsUnchanged}, no match ${summary.noMatch}, ` +
        `failed ${summary.failed + summary.permanentFailures})`,
    );
    return summary;
  }

  /**
   * Runs the pipeline for a single file and returns its final row.
   * Throws catalog errors (rate limit, transient, fatal, API) to the caller.
   */
  async processFile(filePath: string): Promise<AuditRow> {
    const snapshot = await this.readTags(filePath);
    const readNote = snapshot.readError ? `read_error: ${snapshot.readError}` : null;
    if (snapshot.readError) {
      this.logger?.logPipelineError(
        new FileReadError(`Tags unreadable, using filename: ${snapshot.readError}`, { filePath }),
        'WARN',
      );
    }

    const identity = extractIdentity(snapshot, path.basename(filePath));
    this.identities.set(filePath, identity);

    if (isEmptyIdentity(identity)) {
      return buildAuditRow({
        file: filePath,
        tag_status: 'unchanged',
        art_status: 'skipped',
        notes: joinNotes(NOTES.unparseable, readNote),
      });
    }

    const match = await this.findMatch(identity);
    if (!match.matched || match.candidate === null) {
      this.logger?.info(`No confident match (best ${formatConfidence(match.confidence)})`, { filePath });
      return buildAuditRow({
        file: filePath,
        ...identityColumns(identity),
        match_confidence: match.candidate ? formatConfidence(match.confidence) : '',
        tag_status: 'unchanged',
        art_status: 'skipped',
        notes: joinNotes(NOTES.noMatch, readNote),
      });
    }

    const candidate = match.candidate;
    const record = await this.catalog.fetchDetail(candidate);

    const matchColumns = { discogs_url: candidate.url, match_confidence: formatConfidence(candidate.score) };
    return this.reconcile(snapshot, identity, record, matchColumns, readNote);
  }

  /**
   * Issues each query variation in order until one yields a confident match.
   * Returns the best result seen when none does.
   */
  async findMatch(identity: Identity): Promise<MatchResult> {
    let best: MatchResult = NO_MATCH;

    for (const query of buildQueries(identity)) {
      const hits = await this.catalog.search(query);
      const result = selectBestCandidate(identity, hits, this.settings);
      if (result.matched) return result;
      if (result.candidate && (best.candidate === null || result.confidence > best.confidence)) {
        best = result;
      }
    }

    return best;
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async reconcile(
    snapshot: TagSnapshot,
    identity: Identity,
    record: CatalogRecord,
    matchColumns: Pick<AuditRow, 'discogs_url' | 'match_confidence'>,
    readNote: string | null,
  ): Promise<AuditRow> {
    const { filePath, format } = snapshot;

    const tags = await reconcileTags(filePath, format, snapshot.fields, record, this.writer);
    if (tags.status === 'unsupported_format') {
      this.logger?.logPipelineError(
        new UnsupportedFormatError(`No tag writer for ${format ?? 'unknown'} files`, { filePath }),
        'INFO',
      );
    } else if (tags.status.startsWith('write_failed')) {
      this.logger?.logPipelineError(new WriteError(`Tag write failed: ${tags.status}`, { filePath }));
    }

    const art = await reconcileArt(
      filePath,
      format,
      snapshot.art,
      record.artworkUrl,
      this.artPolicy,
      this.writer,
      (url) => this.catalog.fetchImage(url),
    );
    if (art.status === 'download_failed') {
      this.logger?.logPipelineError(
        new DownloadError(`Art download_failed: ${art.note ?? ''}`, { filePath }),
        'WARN',
      );
    } else if (art.status === 'write_failed') {
      this.logger?.logPipelineError(
        new WriteError(`Art write_failed: ${art.note ?? ''}`, { filePath, step: 'art' }),
        'WARN',
      );
    }

    return buildAuditRow({
      file: filePath,
      ...identityColumns(identity),
      year: tags.writeYear ?? '',
      label: tags.writeLabel ?? '',
      ...matchColumns,
      tag_status: tags.status,
      art_status: art.status,
      art_source_url: art.sourceUrl ?? '',
      notes: joinNotes(readNote, art.note),
    });
  }

  private identityFor(filePath: string): Identity {
    return this.identities.get(filePath) ?? parseFilename(path.basename(filePath));
  }

  private failureRow(filePath: string, error: PipelineError): AuditRow {
    this.logger?.logPipelineError(error);
    return buildAuditRow({
      file: filePath,
      ...identityColumns(this.identityFor(filePath)),
      tag_status: 'unchanged',
      art_status: 'skipped',
      notes: `${NOTES.error}: ${error.toUserMessage()}`,
    });
  }

  private exhaustedRow(filePath: string, error: PipelineError, attempts: number): AuditRow {
    return buildAuditRow({
      file: filePath,
      ...identityColumns(this.identityFor(filePath)),
      tag_status: 'unchanged',
      art_status: 'skipped',
      notes: `${NOTES.permanentFailure}: ${error.toUserMessage()} (${attempts} attempts)`,
    });
  }

  private summarize(recorder: AuditRecorder, totalFiles: number, retry: RetryRunSummary): BatchSummary {
    const rows = recorder.rows;
    const countTag = (predicate: (status: string) => boolean): number =>
      rows.filter((row) => predicate(row.tag_status)).length;

    return {
      totalFiles,
      rowsWritten: rows.length,
      tagsUpdated: countTag((s) => s === 'updated'),
      tagsUnchanged: countTag((s) => s === 'unchanged'),
      tagsUnsupported: countTag((s) => s === 'unsupported_format'),
      tagWriteFailures: countTag((s) => s.startsWith('write_failed')),
      artDownloaded: rows.filter((row) => row.art_status === 'downloaded').length,
      noMatch: rows.filter((row) => row.notes.startsWith(NOTES.noMatch) || row.notes.startsWith(NOTES.unparseable))
        .length,
      failed: retry.failed,
      permanentFailures: retry.exhausted,
      retryRoundsRun: retry.roundsRun,
      outputPath: recorder.getOutputPath(),
      rows,
    };
  }
}
