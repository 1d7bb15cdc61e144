/**
 * Discogs Catalog Client
 *
 * Searches the Discogs database and fetches master/release details and
 * cover images. Every request (search, detail and image) waits for a slot
 * on one shared FIFO rate limiter, so at most one request is in flight and
 * consecutive requests are at least `requestDelayMs` apart.
 *
 * Failures are classified for the retry queue:
 * - 429 → RateLimitedError
 * - 5xx, timeouts, network failures → TransientError
 * - 400 / 401 / 403 → FatalError (bad credentials or malformed request)
 * - other 4xx → APIError (this file only)
 * - image download failures → DownloadError
 */

import axios from 'axios';
import {
  Candidate,
  CandidateType,
  CatalogQuery,
  CatalogRecord,
  FixerSettings,
  SearchHit,
} from '../../shared/types';
import { FifoRateLimiter } from '../utils/rateLimiter';
import { detectImageMimeType } from '../utils/imageInfo';
import { CatalogCache, MemoryCatalogCache, catalogCacheKey } from './catalogCache';
import {
  APIError,
  DownloadError,
  FatalError,
  PipelineError,
  RateLimitedError,
  TransientError,
  errorMessage,
} from './errors';
import type { ImageData } from './tagWriter';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** The catalog capabilities the batch processor relies on */
export interface CatalogService {
  search(query: CatalogQuery): Promise<SearchHit[]>;
  fetchDetail(candidate: Candidate): Promise<CatalogRecord>;
  fetchImage(url: string): Promise<ImageData>;
}

/** Settings the client reads */
export type CatalogClientSettings = Pick<
  FixerSettings,
  'requestDelayMs' | 'minArtSize' | 'discogsToken' | 'discogsKey' | 'discogsSecret'
>;

export interface CatalogClientOptions {
  /** Discogs API base URL (for testing) */
  apiBaseUrl?: string;
  /** Public site URL used to build result links */
  siteBaseUrl?: string;
  userAgent?: string;
  /** HTTP timeout in ms. Defaults to 20s */
  timeoutMs?: number;
  /** Detail cache. Defaults to a per-run in-memory cache */
  cache?: CatalogCache;
  /** Shared limiter. Defaults to one built from requestDelayMs */
  rateLimiter?: FifoRateLimiter;
}

/** Search hit as returned by /database/search */
interface DiscogsSearchResult {
  id: number;
  type: string;
  title?: string;
  year?: string | number;
  uri?: string;
  resource_url?: string;
}

interface DiscogsSearchResponse {
  results?: DiscogsSearchResult[];
}

export interface DiscogsImage {
  type?: string;
  uri?: string;
  resource_url?: string;
  width?: number;
  height?: number;
}

/** Shared subset of /masters/{id} and /releases/{id} */
export interface DiscogsDetail {
  id?: number;
  year?: number;
  released?: string;
  labels?: Array<{ name?: string }>;
  images?: DiscogsImage[];
  main_release_url?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const DISCOGS_API_URL = 'https://api.discogs.com';
const DISCOGS_SITE_URL = 'https://www.discogs.com';
const DEFAULT_USER_AGENT = 'CrateTagger/1.0 +https://www.npmjs.com/package/crate-tagger';
const DEFAULT_TIMEOUT = 20_000;
const SEARCH_PAGE_SIZE = 10;

/** Primary images outrank any secondary image */
const PRIMARY_IMAGE_BONUS = 1_000_000_000;

// ─── Axios Error Detection ───────────────────────────────────────────────────

/** Type guard for axios-like errors (works with both real and mocked axios) */
interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  code?: string;
  response?: {
    status: number;
    headers?: Record<string, unknown>;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return (
    error instanceof Error &&
    'isAxiosError' in error &&
    error.isAxiosError === true
  );
}

function parseRetryAfter(headers: Record<string, unknown> | undefined): number | undefined {
  const raw = headers?.['retry-after'];
  const seconds = typeof raw === 'string' || typeof raw === 'number' ? Number(raw) : NaN;
  return Number.isFinite(seconds) ? seconds : undefined;
}

/**
 * Maps a failed catalog request onto the error taxonomy.
 */
export function classifyRequestError(error: unknown, what: string): PipelineError {
  const cause = error instanceof Error ? error : new Error(String(error));

  if (!isAxiosLikeError(error)) {
    return new APIError(`${what} failed: ${cause.message}`, { cause });
  }

  const status = error.response?.status;
  if (status === undefined) {
    return new TransientError(`${what} failed: ${error.message}`, { cause });
  }
  if (status === 429) {
    return new RateLimitedError(`Rate limited (429) on ${what}`, {
      cause,
      retryAfterSeconds: parseRetryAfter(error.response?.headers),
    });
  }
  if (status >= 500) {
    return new TransientError(`${what} failed with HTTP ${status}`, { cause });
  }
  if (status === 400 || status === 401 || status === 403) {
    return new FatalError(`Catalog rejected ${what} (HTTP ${status}); check credentials`, { cause });
  }
  return new APIError(`${what} failed with HTTP ${status}`, { cause, statusCode: status });
}

// ─── Mapping ─────────────────────────────────────────────────────────────────

export function buildAuthHeader(settings: CatalogClientSettings): string | null {
  if (settings.discogsToken) {
    return `Discogs token=${settings.discogsToken}`;
  }
  if (settings.discogsKey && settings.discogsSecret) {
    return `Discogs key=${settings.discogsKey}, secret=${settings.discogsSecret}`;
  }
  return null;
}

/**
 * Search parameters per query variant.
 */
export function buildSearchParams(query: CatalogQuery): Record<string, string> {
  const params: Record<string, string> = { per_page: String(SEARCH_PAGE_SIZE) };

  switch (query.variant) {
    case 'artist_title_mix':
      params.artist = query.artist ?? '';
      params.track = query.title;
      params.q = query.mix ?? '';
      break;
    case 'artist_title':
      params.artist = query.artist ?? '';
      params.track = query.title;
      break;
    case 'title_only':
      params.q = query.title;
      break;
  }

  return params;
}

function isCandidateType(type: string): type is CandidateType {
  return type === 'master' || type === 'release';
}

/**
 * Keeps master and release hits and maps them to SearchHits.
 */
export function mapSearchResults(
  results: readonly DiscogsSearchResult[],
  apiBaseUrl: string = DISCOGS_API_URL,
  siteBaseUrl: string = DISCOGS_SITE_URL,
): SearchHit[] {
  const hits: SearchHit[] = [];

  for (const result of results) {
    if (!isCandidateType(result.type)) continue;

    const id = String(result.id);
    const uri = result.uri ?? `/${result.type}/${id}`;
    hits.push({
      id,
      type: result.type,
      title: result.title ?? '',
      year: result.year !== undefined && result.year !== '' ? String(result.year) : null,
      url: uri.startsWith('http') ? uri : `${siteBaseUrl}${uri.startsWith('/') ? '' : '/'}${uri}`,
      resourceUrl: result.resource_url ?? `${apiBaseUrl}/${result.type}s/${id}`,
    });
  }

  return hits;
}

/**
 * Prefers the primary image, then the largest area; returns the first whose
 * larger side reaches `minSize`, otherwise the best-ranked one.
 */
export function chooseBestImage(images: readonly DiscogsImage[] | undefined, minSize: number): string | null {
  const scored: Array<{ rank: number; side: number; uri: string }> = [];

  for (const image of images ?? []) {
    const uri = image.uri || image.resource_url;
    if (!uri) continue;
    const width = image.width ?? 0;
    const height = image.height ?? 0;
    const bonus = image.type === 'primary' ? PRIMARY_IMAGE_BONUS : 0;
    scored.push({ rank: width * height + bonus, side: Math.max(width, height), uri });
  }

  if (scored.length === 0) return null;
  scored.sort((a, b) => b.rank - a.rank);

  const bigEnough = scored.find((image) => image.side >= minSize);
  return (bigEnough ?? scored[0]).uri;
}

export function extractYear(detail: DiscogsDetail): string | null {
  if (typeof detail.year === 'number' && detail.year !== 0) {
    return String(detail.year);
  }
  return detail.released ? detail.released : null;
}

export function extractLabels(detail: DiscogsDetail): string[] {
  return (detail.labels ?? [])
    .map((label) => label.name)
    .filter((name): name is string => typeof name === 'string');
}

// ─── Client ──────────────────────────────────────────────────────────────────

export class DiscogsClient implements CatalogService {
  private readonly settings: CatalogClientSettings;
  private readonly apiBaseUrl: string;
  private readonly siteBaseUrl: string;
  private readonly userAgent: string;
  private readonly timeoutMs: number;
  private readonly cache: CatalogCache;
  private readonly rateLimiter: FifoRateLimiter;

  constructor(settings: CatalogClientSettings, options: CatalogClientOptions = {}) {
    this.settings = settings;
    this.apiBaseUrl = options.apiBaseUrl ?? DISCOGS_API_URL;
    this.siteBaseUrl = options.siteBaseUrl ?? DISCOGS_SITE_URL;
    this.userAgent = options.userAgent ?? DEFAULT_USER_AGENT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.cache = options.cache ?? new MemoryCatalogCache();
    this.rateLimiter = options.rateLimiter ?? new FifoRateLimiter(settings.requestDelayMs);
  }

  async search(query: CatalogQuery): Promise<SearchHit[]> {
    const data = await this.getJson<DiscogsSearchResponse>(
      `${this.apiBaseUrl}/database/search`,
      `search "${query.text}"`,
      buildSearchParams(query),
    );
    return mapSearchResults(data.results ?? [], this.apiBaseUrl, this.siteBaseUrl);
  }

  /**
   * Fetches the candidate's detail record. A master without labels borrows
   * labels (and, if needed, year and images) from its main release.
   */
  async fetchDetail(candidate: Candidate): Promise<CatalogRecord> {
    const key = catalogCacheKey(candidate.type, candidate.id);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const what = `${candidate.type} ${candidate.id}`;
    const detail = await this.getJson<DiscogsDetail>(
      candidate.resourceUrl || `${this.apiBaseUrl}/${candidate.type}s/${candidate.id}`,
      what,
    );

    let year = extractYear(detail);
    let labels = extractLabels(detail);
    let images = detail.images ?? [];

    if (candidate.type === 'master' && labels.length === 0 && detail.main_release_url) {
      const main = await this.getJson<DiscogsDetail>(detail.main_release_url, `main release of ${what}`);
      labels = extractLabels(main);
      year = year ?? extractYear(main);
      if (images.length === 0) images = main.images ?? [];
    }

    const record: CatalogRecord = {
      year,
      labels,
      artworkUrl: chooseBestImage(images, this.settings.minArtSize),
    };
    this.cache.set(key, record);
    return record;
  }

  async fetchImage(url: string): Promise<ImageData> {
    await this.rateLimiter.waitForSlot();

    try {
      const response = await axios.get<ArrayBuffer>(url, {
        responseType: 'arraybuffer',
        headers: this.headers(),
        timeout: this.timeoutMs,
      });
      const data = Buffer.from(response.data);
      if (data.length === 0) {
        throw new Error('empty response body');
      }
      const header: unknown = response.headers?.['content-type'];
      const contentType = typeof header === 'string' ? header.split(';')[0].trim() : '';
      return { data, mimeType: detectImageMimeType(data, contentType || 'image/jpeg') };
    } catch (error: unknown) {
      throw new DownloadError(`Image download failed (${url}): ${errorMessage(error)}`, {
        cause: error instanceof Error ? error : undefined,
      });
    }
  }

  private headers(): Record<string, string> {
    const headers: Record<string, string> = {
      'User-Agent': this.userAgent,
      Accept: 'application/json',
    };
    const auth = buildAuthHeader(this.settings);
    if (auth) headers.Authorization = auth;
    return headers;
  }

  private async getJson<T>(url: string, what: string, params?: Record<string, string>): Promise<T> {
    await this.rateLimiter.waitForSlot();

    try {
      const response = await axios.get<T>(url, {
        params,
        headers: this.headers(),
        timeout: this.timeoutMs,
      });
      return response.data;
    } catch (error: unknown) {
      throw classifyRequestError(error, what);
    }
  }
}
