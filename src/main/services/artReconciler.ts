/**
 * Art Reconciler
 *
 * Replaces embedded cover art when it is missing, smaller than the minimum
 * size, or byte-identical to the configured placeholder image. The
 * placeholder check wins over dimensions.
 */

import * as fs from 'fs';
import { ArtSkipReason, ArtStatus, AudioFormat } from '../../shared/types';
import { largestSide, md5Hex } from '../utils/imageInfo';
import type { EmbeddedArt } from './audioReader';
import { errorMessage, isFatalError } from './errors';
import { ImageData, TagWriter, getTagMapping } from './tagWriter';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export type ArtReplaceReason = 'missing' | 'undersized' | 'placeholder';

/** Downloads an image; rejects with DownloadError on failure */
export type ImageFetcher = (url: string) => Promise<ImageData>;

export interface ArtPolicy {
  noArt: boolean;
  minArtSize: number;
  /** MD5 of the placeholder image, null when placeholder matching is off */
  placeholderHash: string | null;
}

export interface ArtOutcome {
  status: ArtStatus;
  /** URL the replacement came (or would have come) from */
  sourceUrl: string | null;
  /** Audit note, e.g. "art: no art library available" */
  note: string | null;
}

/** Audit notes for skipped art */
export const ART_SKIP_NOTES: Readonly<Record<ArtSkipReason, string>> = {
  art_disabled: 'art: disabled',
  format_unsupported: 'art: format unsupported',
  no_art_library: 'art: no art library available',
};

export function skippedArt(reason: ArtSkipReason): ArtOutcome {
  return { status: 'skipped', sourceUrl: null, note: ART_SKIP_NOTES[reason] };
}

/**
 * MD5 of the placeholder image, or null when the file does not exist.
 */
export async function loadPlaceholderHash(filePath: string | null): Promise<string | null> {
  if (!filePath || !fs.existsSync(filePath)) return null;
  return md5Hex(await fs.promises.readFile(filePath));
}

// ─── Decisions ───────────────────────────────────────────────────────────────

/**
 * Why the current art must be replaced, or null to keep it.
 */
export function replacementReason(
  art: EmbeddedArt | null,
  minArtSize: number,
  placeholderHash: string | null,
): ArtReplaceReason | null {
  if (art === null) return 'missing';
  if (placeholderHash !== null && art.hash === placeholderHash) return 'placeholder';
  if (largestSide(art) < minArtSize) return 'undersized';
  return null;
}

/**
 * Why art handling is skipped for this file, or null if it can proceed.
 */
export function artSkipReason(format: AudioFormat | null, policy: ArtPolicy, writer: TagWriter): ArtSkipReason | null {
  if (policy.noArt) return 'art_disabled';
  if (getTagMapping(format)?.artCapability !== true) return 'format_unsupported';
  if (!writer.supportsArt(format)) return 'no_art_library';
  return null;
}

// ─── Reconciliation ──────────────────────────────────────────────────────────

/**
 * Decides on and carries out the art replacement for one file.
 * Only fetches when a replacement is warranted and a URL is known.
 */
export async function reconcileArt(
  filePath: string,
  format: AudioFormat | null,
  art: EmbeddedArt | null,
  artworkUrl: string | null,
  policy: ArtPolicy,
  writer: TagWriter,
  fetchImage: ImageFetcher,
): Promise<ArtOutcome> {
  const skip = artSkipReason(format, policy, writer);
  if (skip !== null || format === null) {
    return skippedArt(skip ?? 'format_unsupported');
  }

  const reason = replacementReason(art, policy.minArtSize, policy.placeholderHash);
  if (reason === null) {
    return { status: 'kept_existing', sourceUrl: null, note: null };
  }

  if (!artworkUrl) {
    return { status: 'no_image_available', sourceUrl: null, note: `art: ${reason}` };
  }

  let image: ImageData;
  try {
    image = await fetchImage(artworkUrl);
  } catch (error: unknown) {
    if (isFatalError(error)) throw error;
    return { status: 'download_failed', sourceUrl: artworkUrl, note: `art: ${errorMessage(error)}` };
  }

  const result = await writer.embedArt(filePath, format, image);
  if (!result.success) {
    return { status: 'write_failed', sourceUrl: artworkUrl, note: `art: ${result.error ?? 'unknown error'}` };
  }

  return { status: 'downloaded', sourceUrl: artworkUrl, note: `art: replaced ${reason}` };
}
