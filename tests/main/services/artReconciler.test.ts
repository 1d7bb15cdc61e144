/**
 * Tests for art replacement decisions and their outcomes.
 */

import * as fs from 'fs';
import * as path from 'path';
import { describe, it, expect, vi } from 'vitest';
import {
  ArtPolicy,
  artSkipReason,
  loadPlaceholderHash,
  reconcileArt,
  replacementReason,
} from '../../../src/main/services/artReconciler';
import type { EmbeddedArt } from '../../../src/main/services/audioReader';
import { DownloadError, FatalError } from '../../../src/main/services/errors';
import { FileTagWriter, ImageData } from '../../../src/main/services/tagWriter';
import { md5Hex } from '../../../src/main/utils/imageInfo';
import { createFakeWriter } from '../../helpers/fakes';
import { createTempDir, removeTempDir } from '../../helpers/fixtures';

// ─── Fixtures ────────────────────────────────────────────────────────────────

const POLICY: ArtPolicy = { noArt: false, minArtSize: 500, placeholderHash: 'placeholder-hash' };
const ART_URL = 'https://img.discogs.com/cover.jpg';
const IMAGE: ImageData = { data: Buffer.from('jpeg bytes'), mimeType: 'image/jpeg' };

function art(side: number, hash = 'some-hash'): EmbeddedArt {
  return { mimeType: 'image/jpeg', width: side, height: side, hash, size: 1000 };
}

function fetcher() {
  return vi.fn((_url: string) => Promise.resolve(IMAGE));
}

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('replacementReason', () => {
  it('replaces missing art', () => {
    expect(replacementReason(null, 500, null)).toBe('missing');
  });

  it('replaces the placeholder even when it is large', () => {
    expect(replacementReason(art(1200, 'placeholder-hash'), 500, 'placeholder-hash')).toBe('placeholder');
  });

  it('replaces art below the minimum size', () => {
    expect(replacementReason(art(300), 500, null)).toBe('undersized');
  });

  it('keeps art at or above the minimum size', () => {
    expect(replacementReason(art(500), 500, null)).toBeNull();
    expect(replacementReason({ ...art(100), width: 800 }, 500, null)).toBeNull();
  });
});

describe('artSkipReason', () => {
  const writer = new FileTagWriter();

  it('honours --no-art first', () => {
    expect(artSkipReason('mp3', { ...POLICY, noArt: true }, writer)).toBe('art_disabled');
  });

  it('skips formats that cannot hold art', () => {
    expect(artSkipReason('wav', POLICY, writer)).toBe('format_unsupported');
    expect(artSkipReason(null, POLICY, writer)).toBe('format_unsupported');
  });

  it('skips formats without an art writer', () => {
    expect(artSkipReason('m4a', POLICY, writer)).toBe('no_art_library');
  });

  it('proceeds for writable formats', () => {
    expect(artSkipReason('mp3', POLICY, writer)).toBeNull();
  });
});

describe('reconcileArt', () => {
  it('downloads and embeds missing art', async () => {
    const writer = createFakeWriter();
    const fetchImage = fetcher();

    const outcome = await reconcileArt('/music/a.mp3', 'mp3', null, ART_URL, POLICY, writer, fetchImage);

    expect(outcome).toEqual({ status: 'downloaded', sourceUrl: ART_URL, note: 'art: replaced missing' });
    expect(fetchImage).toHaveBeenCalledWith(ART_URL);
    expect(writer.embedArt).toHaveBeenCalledWith('/music/a.mp3', 'mp3', IMAGE);
  });

  it('keeps good existing art without fetching', async () => {
    const fetchImage = fetcher();

    const outcome = await reconcileArt('/music/a.mp3', 'mp3', art(600), ART_URL, POLICY, createFakeWriter(), fetchImage);

    expect(outcome).toEqual({ status: 'kept_existing', sourceUrl: null, note: null });
    expect(fetchImage).not.toHaveBeenCalled();
  });

  it('reports no image when the record has no artwork', async () => {
    const outcome = await reconcileArt('/music/a.flac', 'flac', art(200), null, POLICY, createFakeWriter(), fetcher());

    expect(outcome).toEqual({ status: 'no_image_available', sourceUrl: null, note: 'art: undersized' });
  });

  it('reports download failures', async () => {
    const fetchImage = vi.fn((_url: string): Promise<ImageData> => Promise.reject(new DownloadError('timeout')));

    const outcome = await reconcileArt('/music/a.mp3', 'mp3', null, ART_URL, POLICY, createFakeWriter(), fetchImage);

    expect(outcome).toEqual({ status: 'download_failed', sourceUrl: ART_URL, note: 'art: timeout' });
  });

  it('rethrows fatal errors from the fetcher', async () => {
    const fetchImage = vi.fn((_url: string): Promise<ImageData> => Promise.reject(new FatalError('HTTP 401')));

    await expect(
      reconcileArt('/music/a.mp3', 'mp3', null, ART_URL, POLICY, createFakeWriter(), fetchImage),
    ).rejects.toBeInstanceOf(FatalError);
  });

  it('reports embed failures', async () => {
    const writer = createFakeWriter({ artError: 'disk full' });

    const outcome = await reconcileArt('/music/a.mp3', 'mp3', null, ART_URL, POLICY, writer, fetcher());

    expect(outcome).toEqual({ status: 'write_failed', sourceUrl: ART_URL, note: 'art: disk full' });
  });

  it('never fetches with art disabled', async () => {
    const fetchImage = fetcher();

    const outcome = await reconcileArt(
      '/music/a.mp3',
      'mp3',
      null,
      ART_URL,
      { ...POLICY, noArt: true },
      createFakeWriter(),
      fetchImage,
    );

    expect(outcome).toEqual({ status: 'skipped', sourceUrl: null, note: 'art: disabled' });
    expect(fetchImage).not.toHaveBeenCalled();
  });

  it('skips formats the writer cannot embed into', async () => {
    const outcome = await reconcileArt(
      '/music/a.m4a',
      'm4a',
      null,
      ART_URL,
      POLICY,
      createFakeWriter({ artFormats: ['mp3'] }),
      fetcher(),
    );

    expect(outcome).toEqual({ status: 'skipped', sourceUrl: null, note: 'art: no art library available' });
  });
});

describe('loadPlaceholderHash', () => {
  it('hashes an existing placeholder and ignores a missing one', async () => {
    const tempDir = createTempDir();
    try {
      const placeholder = path.join(tempDir, 'placeholder.jpg');
      fs.writeFileSync(placeholder, 'placeholder bytes');

      await expect(loadPlaceholderHash(placeholder)).resolves.toBe(md5Hex(Buffer.from('placeholder bytes')));
      await expect(loadPlaceholderHash(path.join(tempDir, 'missing.jpg'))).resolves.toBeNull();
      await expect(loadPlaceholderHash(null)).resolves.toBeNull();
    } finally {
      removeTempDir(tempDir);
    }
  });
});
