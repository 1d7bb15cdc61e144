/**
 * Catalog Detail Cache
 *
 * Detail records keyed by "type:id" (e.g. "master:1234"), so re-runs and
 * retry rounds never fetch the same record twice.
 *
 * Two implementations share the CatalogCache interface:
 * - MemoryCatalogCache: per-run Map
 * - PersistentCatalogCache: SQLite via better-sqlite3, kept across runs at
 *   %APPDATA%/crate-tagger/cache.db (or ~/.config/crate-tagger/cache.db)
 *
 * Cache expiration: never; delete the database file to start over.
 */

import * as fs from 'fs';
import * as path from 'path';
import Database from 'better-sqlite3';
import { CandidateType, CatalogRecord } from '../../shared/types';
import { getAppDataDir } from './logger';

/** Current schema version; bump when changing table structure */
const SCHEMA_VERSION = 1;

const CACHE_FILE_NAME = 'cache.db';

// ─── Interface ───────────────────────────────────────────────────────────────

export interface CatalogCache {
  has(key: string): boolean;
  get(key: string): CatalogRecord | undefined;
  set(key: string, record: CatalogRecord): void;
  clear(): void;
  readonly size: number;
}

export function catalogCacheKey(type: CandidateType, id: string): string {
  return `${type}:${id}`;
}

export function getDefaultCachePath(): string {
  return path.join(getAppDataDir(), CACHE_FILE_NAME);
}

/**
 * Validates a parsed JSON value as a CatalogRecord.
 */
export function isCatalogRecord(value: unknown): value is CatalogRecord {
  if (value === null || typeof value !== 'object') return false;
  if (!('year' in value) || !('labels' in value) || !('artworkUrl' in value)) return false;
  const { year, labels, artworkUrl } = value;
  return (
    (year === null || typeof year === 'string') &&
    Array.isArray(labels) &&
    labels.every((label) => typeof label === 'string') &&
    (artworkUrl === null || typeof artworkUrl === 'string')
  );
}

// ─── In-memory Cache ─────────────────────────────────────────────────────────

export class MemoryCatalogCache implements CatalogCache {
  private cache: Map<string, CatalogRecord> = new Map();

  has(key: string): boolean {
    return this.cache.has(key);
  }

  get(key: string): CatalogRecord | undefined {
    return this.cache.get(key);
  }

  set(key: string, record: CatalogRecord): void {
    this.cache.set(key, record);
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// ─── Persistent Cache ────────────────────────────────────────────────────────

/** Options for PersistentCatalogCache */
export interface PersistentCacheOptions {
  /** Path to the SQLite database file. Defaults to <appdata>/crate-tagger/cache.db */
  dbPath?: string;
  /** Whether to use an in-memory database (for testing) */
  inMemory?: boolean;
}

/**
 * SQLite-backed detail cache.
 *
 * Rows that fail to parse are treated as misses and overwritten on the next set().
 */
export class PersistentCatalogCache implements CatalogCache {
  private db: Database.Database | null = null;
  private readonly dbPath: string;
  private readonly inMemory: boolean;

  constructor(options: PersistentCacheOptions = {}) {
    this.inMemory = options.inMemory ?? false;
    this.dbPath = this.inMemory ? ':memory:' : (options.dbPath ?? getDefaultCachePath());
  }

  /**
   * Opens the database and creates tables if they don't exist.
   * Must be called before any cache operations.
   */
  initialize(): void {
    if (!this.inMemory) {
      fs.mkdirSync(path.dirname(this.dbPath), { recursive: true });
    }

    const db = new Database(this.dbPath);
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS schema_version (
        version INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS catalog_records (
        cache_key TEXT PRIMARY KEY,
        record_json TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT (datetime('now'))
      );
    `);

    const versionRow: unknown = db.prepare('SELECT version FROM schema_version LIMIT 1').get();
    if (versionRow === undefined) {
      db.prepare('INSERT INTO schema_version (version) VALUES (?)').run(SCHEMA_VERSION);
    }

    this.db = db;
  }

  isOpen(): boolean {
    return this.db !== null;
  }

  getPath(): string {
    return this.dbPath;
  }

  has(key: string): boolean {
    return this.get(key) !== undefined;
  }

  get(key: string): CatalogRecord | undefined {
    const row: unknown = this.database.prepare('SELECT record_json FROM catalog_records WHERE cache_key = ?').get(key);
    if (row === null || typeof row !== 'object' || !('record_json' in row) || typeof row.record_json !== 'string') {
      return undefined;
    }

    try {
      const parsed: unknown = JSON.parse(row.record_json);
      return isCatalogRecord(parsed) ? parsed : undefined;
    } catch {
      return undefined;
    }
  }

  set(key: string, record: CatalogRecord): void {
    this.database
      .prepare('INSERT OR REPLACE INTO catalog_records (cache_key, record_json) VALUES (?, ?)')
      .run(key, JSON.stringify(record));
  }

  clear(): void {
    this.database.exec('DELETE FROM catalog_records');
  }

  get size(): number {
    const row: unknown = this.database.prepare('SELECT COUNT(*) AS count FROM catalog_records').get();
    if (row !== null && typeof row === 'object' && 'count' in row && typeof row.count === 'number') {
      return row.count;
    }
    return 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private get database(): Database.Database {
    if (!this.db) {
      throw new Error('PersistentCatalogCache is not initialized. Call initialize() first.');
    }
    return this.db;
  }
}
