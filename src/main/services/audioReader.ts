/**
 * Audio Reader Service
 *
 * Reads existing tags and embedded artwork using the music-metadata library.
 * Native tag ids are upper-cased (TYER, TXXX:LABEL, DATE, ©DAY, WM/YEAR, ...)
 * so the per-format field table can look them up directly.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';
import { AudioFormat } from '../../shared/types';
import { detectFormat } from '../utils/fileScanner';
import { detectImageMimeType, getImageDimensions, md5Hex } from '../utils/imageInfo';
import { errorMessage } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** First embedded picture of a file */
export interface EmbeddedArt {
  mimeType: string;
  width: number;
  height: number;
  /** MD5 of the picture bytes */
  hash: string;
  size: number;
}

/** Everything the reconcilers need to know about a file's current tags */
export interface TagSnapshot {
  filePath: string;
  format: AudioFormat | null;
  artist: string | null;
  title: string | null;
  /** Upper-cased native tag id → first string value */
  fields: Record<string, string>;
  art: EmbeddedArt | null;
  /** Why the tags could not be read; the snapshot is then empty */
  readError: string | null;
}

/** Reads a file's tags; injectable so the batch processor can be tested without audio files */
export type TagReader = (filePath: string) => Promise<TagSnapshot>;

/** ID3v1 ids (title, year, ...) would shadow the v2 frames we care about */
const IGNORED_TAG_TYPES = new Set(['ID3v1']);

// ─── Helpers ─────────────────────────────────────────────────────────────────

export function emptySnapshot(filePath: string, readError: string | null = null): TagSnapshot {
  return {
    filePath,
    format: detectFormat(filePath),
    artist: null,
    title: null,
    fields: {},
    art: null,
    readError,
  };
}

function tagValueToString(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  return null;
}

/**
 * Flattens music-metadata native tags into upper-cased id → first value.
 */
export function collectFields(native: mm.IAudioMetadata['native']): Record<string, string> {
  const fields: Record<string, string> = {};

  for (const [tagType, tags] of Object.entries(native)) {
    if (IGNORED_TAG_TYPES.has(tagType)) continue;

    for (const tag of tags) {
      const id = tag.id.toUpperCase();
      if (id in fields) continue;
      const value = tagValueToString(tag.value);
      if (value !== null) {
        fields[id] = value;
      }
    }
  }

  return fields;
}

/**
 * Describes the front cover (or the first picture when none is marked front).
 */
export function describeArt(pictures: mm.IPicture[] | undefined): EmbeddedArt | null {
  if (!pictures || pictures.length === 0) return null;

  const picture = pictures.find((p) => p.type === 'Cover (front)') ?? pictures[0];
  const data = Buffer.from(picture.data);
  const mimeType = detectImageMimeType(data, picture.format);
  const { width, height } = getImageDimensions(data, mimeType);

  return { mimeType, width, height, hash: md5Hex(data), size: data.length };
}

// ─── Reader ──────────────────────────────────────────────────────────────────

/**
 * Reads a file's current tags and artwork.
 *
 * Unreadable files do not throw: the snapshot comes back empty with
 * `readError` set, and the identity is then taken from the filename.
 */
export async function readTags(filePath: string): Promise<TagSnapshot> {
  if (!fs.existsSync(filePath)) {
    return emptySnapshot(filePath, `File not found: ${filePath}`);
  }

  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, { duration: false, skipCovers: false });
  } catch (error: unknown) {
    return emptySnapshot(filePath, `Failed to parse "${path.basename(filePath)}": ${errorMessage(error)}`);
  }

  const common = metadata.common;
  return {
    filePath,
    format: detectFormat(filePath),
    artist: common.artist ?? null,
    title: common.title ?? null,
    fields: collectFields(metadata.native),
    art: describeArt(common.picture),
    readError: null,
  };
}
