/**
 * Audit Recorder
 *
 * Writes one CSV row per input file. Rows are appended to disk the moment a
 * file is finalized, so an interrupted run keeps every row produced so far.
 * finalize() rewrites the file in traversal order once the run is over, since
 * retried files finish after files that came later in the folder; the
 * rewrite goes through a temporary file that replaces the CSV in one rename.
 */

import * as fs from 'fs';
import * as path from 'path';
import { stringify } from 'csv-stringify/sync';
import { AUDIT_COLUMNS, AuditRow } from '../../shared/types';

const EMPTY_ROW: AuditRow = {
  file: '',
  artist: '',
  title: '',
  mix: '',
  year: '',
  label: '',
  discogs_url: '',
  match_confidence: '',
  tag_status: '',
  art_status: '',
  art_source_url: '',
  notes: '',
};

/** Builds a complete, frozen row; missing columns are empty */
export function buildAuditRow(values: Partial<AuditRow> & { file: string }): AuditRow {
  return Object.freeze({ ...EMPTY_ROW, ...values });
}

export function formatHeader(): string {
  return stringify([[...AUDIT_COLUMNS]]);
}

export function formatRow(row: AuditRow): string {
  return stringify([AUDIT_COLUMNS.map((column) => row[column])]);
}

export class AuditRecorder {
  private readonly outputPath: string;
  private readonly order: Map<string, number>;
  private readonly recorded = new Map<string, AuditRow>();
  private opened = false;

  /**
   * @param outputPath - CSV destination (overwritten)
   * @param traversalOrder - Input files in the order rows must finally appear
   */
  constructor(outputPath: string, traversalOrder: readonly string[] = []) {
    this.outputPath = path.resolve(outputPath);
    this.order = new Map(traversalOrder.map((file, index) => [file, index]));
  }

  getOutputPath(): string {
    return this.outputPath;
  }

  /** Creates the CSV with its header row */
  async open(): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.outputPath), { recursive: true });
    await fs.promises.writeFile(this.outputPath, formatHeader(), 'utf-8');
    this.opened = true;
  }

  has(file: string): boolean {
    return this.recorded.has(file);
  }

  /**
   * Records the final row for a file and appends it to the CSV.
   * A second row for the same file is rejected.
   */
  async record(row: AuditRow): Promise<void> {
    if (!this.opened) {
      throw new Error('AuditRecorder is not open. Call open() first.');
    }
    if (this.recorded.has(row.file)) {
      throw new Error(`Audit row already recorded for ${row.file}`);
    }

    const frozen = Object.isFrozen(row) ? row : Object.freeze({ ...row });
    this.recorded.set(row.file, frozen);
    await fs.promises.appendFile(this.outputPath, formatRow(frozen), 'utf-8');
  }

  /** Rows in traversal order; files not in the traversal list come last */
  get rows(): AuditRow[] {
    const position = (file: string): number => this.order.get(file) ?? Number.MAX_SAFE_INTEGER;
    return [...this.recorded.values()]
      .map((row, index) => ({ row, index }))
      .sort((a, b) => position(a.row.file) - position(b.row.file) || a.index - b.index)
      .map(({ row }) => row);
  }

  get count(): number {
    return this.recorded.size;
  }

  /** Path of the sorted copy written by finalize() before it replaces the CSV */
  getPendingPath(): string {
    return `${this.outputPath}.tmp`;
  }

  /**
   * Rewrites the CSV with every row in traversal order. The sorted copy is
   * written beside the CSV and renamed over it, so the appended rows stay on
   * disk until the replacement is complete.
   */
  async finalize(): Promise<void> {
    if (!this.opened) return;
    const content = formatHeader() + this.rows.map(formatRow).join('');
    const pendingPath = this.getPendingPath();
    await fs.promises.writeFile(pendingPath, content, 'utf-8');
    await fs.promises.rename(pendingPath, this.outputPath);
  }
}
