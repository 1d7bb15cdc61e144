/**
 * Shared type definitions for Crate Tagger.
 * These interfaces flow between the catalog, reconciliation and audit layers.
 */

/** Audio formats recognised by the scanner */
export type AudioFormat = 'mp3' | 'flac' | 'm4a' | 'wav' | 'aiff' | 'ogg' | 'opus' | 'wma';

/** Supported audio file extensions (with dot prefix), mapped to their format */
export const EXTENSION_FORMATS: Readonly<Record<string, AudioFormat>> = {
  '.mp3': 'mp3',
  '.flac': 'flac',
  '.m4a': 'm4a',
  '.mp4': 'm4a',
  '.aac': 'm4a',
  '.alac': 'm4a',
  '.wav': 'wav',
  '.aif': 'aiff',
  '.aiff': 'aiff',
  '.ogg': 'ogg',
  '.oga': 'ogg',
  '.opus': 'opus',
  '.wma': 'wma',
};

/** Supported audio file extensions (with dot prefix) */
export const SUPPORTED_EXTENSIONS: readonly string[] = Object.keys(EXTENSION_FORMATS);

// ─── Identity & Matching ─────────────────────────────────────────────────────

/** Where an Identity was recovered from */
export type IdentitySource = 'tags' | 'filename';

/** Normalized (artist, title, mix) triple used to query the catalog */
export interface Identity {
  readonly artist: string;
  readonly title: string;
  readonly mix: string | null;
  readonly source: IdentitySource;
}

/** Which variation of the identity a query carries */
export type QueryVariant = 'artist_title_mix' | 'artist_title' | 'title_only';

/** One search call to issue against the catalog */
export interface CatalogQuery {
  variant: QueryVariant;
  /** Human-readable query string (also used for logging) */
  text: string;
  artist: string | null;
  title: string;
  mix: string | null;
}

/** Catalog entry types that can be matched */
export type CandidateType = 'master' | 'release';

/** One raw search hit as returned by the catalog */
export interface SearchHit {
  id: string;
  type: CandidateType;
  /** Combined display title, usually "Artist - Title" */
  title: string;
  /** Year exactly as the catalog reported it */
  year: string | null;
  /** Public page URL */
  url: string;
  /** API URL of the detail record */
  resourceUrl: string;
}

/** A scored search hit */
export interface Candidate {
  id: string;
  type: CandidateType;
  artist: string;
  title: string;
  year: number | null;
  /** Combined confidence in [0, 1], rounded to three decimals for reporting */
  score: number;
  /** Unrounded confidence; ranking and the threshold use this */
  rawScore: number;
  url: string;
  resourceUrl: string;
}

/** Outcome of ranking one result set */
export interface MatchResult {
  candidate: Candidate | null;
  confidence: number;
  matched: boolean;
}

/** Detail record fetched for a matched candidate */
export interface CatalogRecord {
  /** Raw year value (may be malformed, e.g. "2025//2025") */
  year: string | null;
  /** Label names in catalog order */
  labels: string[];
  artworkUrl: string | null;
}

// ─── Reconciliation ──────────────────────────────────────────────────────────

/** Tag outcome; write failures carry their reason as `write_failed: <reason>` */
export type TagStatus = 'updated' | 'unchanged' | 'unsupported_format' | `write_failed: ${string}`;

/** Art outcome */
export type ArtStatus =
  | 'downloaded'
  | 'kept_existing'
  | 'no_image_available'
  | 'write_failed'
  | 'download_failed'
  | 'skipped';

/** Why art handling was skipped */
export type ArtSkipReason = 'art_disabled' | 'format_unsupported' | 'no_art_library';

// ─── Audit ───────────────────────────────────────────────────────────────────

/** CSV column order of the audit file */
export const AUDIT_COLUMNS = [
  'file',
  'artist',
  'title',
  'mix',
  'year',
  'label',
  'discogs_url',
  'match_confidence',
  'tag_status',
  'art_status',
  'art_source_url',
  'notes',
] as const;

/** One final outcome row per input file */
export type AuditRow = Readonly<Record<(typeof AUDIT_COLUMNS)[number], string>>;

/** Progress update emitted while a batch runs */
export interface ProgressUpdate {
  totalFiles: number;
  processedFiles: number;
  queuedForRetry: number;
  currentFile: string | null;
  retryRound: number;
}

// ─── Settings ────────────────────────────────────────────────────────────────

/** Run configuration, passed explicitly to every component */
export interface FixerSettings {
  /** Folder to scan */
  root: string;
  /** Whether to scan subfolders */
  recursive: boolean;
  /** Audit CSV path */
  outputPath: string;
  /** Minimum delay between catalog requests, in milliseconds */
  requestDelayMs: number;
  /** Minimum acceptable art size (largest side, pixels) */
  minArtSize: number;
  /** Never touch embedded art */
  noArt: boolean;
  /** Confidence a candidate needs to be accepted */
  confidenceThreshold: number;
  /** Image treated as missing art; null disables placeholder matching */
  placeholderPath: string | null;
  /** Base backoff before each retry round (multiplied by the round number) */
  retryBackoffMs: number;
  /** Weight of the artist/title similarity in the confidence score */
  similarityWeight: number;
  /** Bonus for master entries */
  masterBonus: number;
  /** Bonus for entries carrying a parseable year */
  yearBonus: number;
  /** Cache catalog detail records in SQLite across runs */
  useCache: boolean;
  /** SQLite cache location (null = platform default) */
  cachePath: string | null;
  /** Log directory (null = platform default) */
  logDir: string | null;
  /** Echo INFO entries to the console */
  verbose: boolean;
  /** Catalog personal access token */
  discogsToken: string;
  /** Catalog consumer key */
  discogsKey: string;
  /** Catalog consumer secret */
  discogsSecret: string;
}

/** Retry waves after the main pass */
export const MAX_RETRY_ROUNDS = 3;

/** Default run configuration */
export const DEFAULT_SETTINGS: FixerSettings = {
  root: '.',
  recursive: false,
  outputPath: 'catalog_results.csv',
  requestDelayMs: 600,
  minArtSize: 500,
  noArt: false,
  confidenceThreshold: 0.6,
  placeholderPath: 'placeholder.jpg',
  retryBackoffMs: 2000,
  similarityWeight: 0.7,
  masterBonus: 0.2,
  yearBonus: 0.1,
  useCache: true,
  cachePath: null,
  logDir: null,
  verbose: false,
  discogsToken: '',
  discogsKey: '',
  discogsSecret: '',
};
