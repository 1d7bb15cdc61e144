/**
 * Settings Manager Service for Crate Tagger
 *
 * Builds the run configuration from, lowest to highest precedence:
 * defaults → JSON config file → environment (DISCOGS_TOKEN / DISCOGS_KEY /
 * DISCOGS_SECRET, with .env loaded by the CLI) → command-line flags.
 *
 * Every source goes through validateSettings, so the result is always a
 * complete FixerSettings with values clamped to their valid ranges.
 */

import * as fs from 'fs';
import { FixerSettings, DEFAULT_SETTINGS } from '../../shared/types';
import { FatalError, errorMessage } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Sources merged by loadSettings */
export interface SettingsSources {
  /** JSON config file (--config). Unreadable or invalid JSON is fatal */
  configPath?: string;
  /** Environment to read credentials from. Defaults to process.env */
  env?: NodeJS.ProcessEnv;
  /** Command-line overrides; undefined values are ignored */
  overrides?: Partial<FixerSettings>;
}

type RawSettings = Record<string, unknown>;

// ─── Helper Functions ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is RawSettings {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Clamps a numeric value to [min, max]. Non-numbers fall back to `fallback`.
 */
export function clampNumber(value: unknown, min: number, max: number, fallback: number): number {
  if (typeof value !== 'number' || Number.isNaN(value)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, value));
}

function trimmedOrNull(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Validates and sanitizes a partial settings object, merging with defaults.
 * Returns a complete, valid FixerSettings object.
 */
export function validateSettings(partial: unknown): FixerSettings {
  if (!isRecord(partial)) {
    return { ...DEFAULT_SETTINGS };
  }

  const raw = partial;
  const validated: FixerSettings = { ...DEFAULT_SETTINGS };

  validated.root = trimmedOrNull(raw.root) ?? DEFAULT_SETTINGS.root;
  validated.outputPath = trimmedOrNull(raw.outputPath) ?? DEFAULT_SETTINGS.outputPath;

  if (typeof raw.recursive === 'boolean') validated.recursive = raw.recursive;
  if (typeof raw.noArt === 'boolean') validated.noArt = raw.noArt;
  if (typeof raw.useCache === 'boolean') validated.useCache = raw.useCache;
  if (typeof raw.verbose === 'boolean') validated.verbose = raw.verbose;

  validated.requestDelayMs = Math.round(clampNumber(raw.requestDelayMs, 0, 60_000, DEFAULT_SETTINGS.requestDelayMs));
  validated.minArtSize = Math.round(clampNumber(raw.minArtSize, 1, 10_000, DEFAULT_SETTINGS.minArtSize));
  validated.retryBackoffMs = Math.round(clampNumber(raw.retryBackoffMs, 0, 300_000, DEFAULT_SETTINGS.retryBackoffMs));

  validated.confidenceThreshold = clampNumber(raw.confidenceThreshold, 0, 1, DEFAULT_SETTINGS.confidenceThreshold);
  validated.similarityWeight = clampNumber(raw.similarityWeight, 0, 1, DEFAULT_SETTINGS.similarityWeight);
  validated.masterBonus = clampNumber(raw.masterBonus, 0, 1, DEFAULT_SETTINGS.masterBonus);
  validated.yearBonus = clampNumber(raw.yearBonus, 0, 1, DEFAULT_SETTINGS.yearBonus);

  // placeholderPath: explicit null or '' disables placeholder matching
  if (raw.placeholderPath === null || typeof raw.placeholderPath === 'string') {
    validated.placeholderPath = trimmedOrNull(raw.placeholderPath);
  }
  if (raw.cachePath === null || typeof raw.cachePath === 'string') {
    validated.cachePath = trimmedOrNull(raw.cachePath);
  }
  if (raw.logDir === null || typeof raw.logDir === 'string') {
    validated.logDir = trimmedOrNull(raw.logDir);
  }

  if (typeof raw.discogsToken === 'string') validated.discogsToken = raw.discogsToken.trim();
  if (typeof raw.discogsKey === 'string') validated.discogsKey = raw.discogsKey.trim();
  if (typeof raw.discogsSecret === 'string') validated.discogsSecret = raw.discogsSecret.trim();

  return validated;
}

/**
 * Deserializes a JSON string to a raw settings object.
 * Returns null if the JSON is invalid or not an object.
 */
export function deserializeSettings(json: string): RawSettings | null {
  try {
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * Reads a JSON config file. A file the user named explicitly must be usable,
 * so any failure is a FatalError.
 */
export async function loadSettingsFile(configPath: string): Promise<RawSettings> {
  let content: string;
  try {
    content = await fs.promises.readFile(configPath, 'utf-8');
  } catch (error: unknown) {
    throw new FatalError(`Cannot read config file "${configPath}": ${errorMessage(error)}`, {
      filePath: configPath,
    });
  }

  const parsed = deserializeSettings(content);
  if (!parsed) {
    throw new FatalError(`Config file "${configPath}" is not a JSON object`, { filePath: configPath });
  }
  return parsed;
}

/**
 * Picks catalog credentials out of the environment.
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv): Partial<FixerSettings> {
  const fromEnv: Partial<FixerSettings> = {};
  if (env.DISCOGS_TOKEN) fromEnv.discogsToken = env.DISCOGS_TOKEN;
  if (env.DISCOGS_KEY) fromEnv.discogsKey = env.DISCOGS_KEY;
  if (env.DISCOGS_SECRET) fromEnv.discogsSecret = env.DISCOGS_SECRET;
  return fromEnv;
}

/** Drops undefined values so they don't shadow lower-precedence sources. */
function definedOnly(values: object): RawSettings {
  const result: RawSettings = {};
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) result[key] = value;
  }
  return result;
}

/**
 * Merges every settings source in precedence order and validates the result.
 */
export async function loadSettings(sources: SettingsSources = {}): Promise<FixerSettings> {
  const fromFile = sources.configPath ? await loadSettingsFile(sources.configPath) : {};
  const fromEnv = settingsFromEnv(sources.env ?? process.env);
  const overrides = definedOnly(sources.overrides ?? {});

  return validateSettings({ ...DEFAULT_SETTINGS, ...fromFile, ...fromEnv, ...overrides });
}

/**
 * A personal token, or a consumer key + secret pair.
 */
export function hasCredentials(settings: FixerSettings): boolean {
  if (settings.discogsToken.length > 0) return true;
  return settings.discogsKey.length > 0 && settings.discogsSecret.length > 0;
}

/**
 * Throws before any file is touched when no catalog credentials are configured.
 */
export function assertCredentials(settings: FixerSettings): void {
  if (!hasCredentials(settings)) {
    throw new FatalError(
      'No catalog credentials: set DISCOGS_TOKEN (or DISCOGS_KEY and DISCOGS_SECRET) in the environment, .env or config file',
    );
  }
}
