/**
 * In-process stand-ins for the writer and the catalog.
 */

import { vi } from 'vitest';
import type { AudioFormat, Candidate, CatalogQuery, CatalogRecord, SearchHit } from '../../src/shared/types';
import type { CatalogService } from '../../src/main/services/catalogClient';
import type { ImageData, TagWriter, WriteTagsResult, YearLabelValues } from '../../src/main/services/tagWriter';

export interface FakeWriterOptions {
  tagFormats?: AudioFormat[];
  artFormats?: AudioFormat[];
  tagError?: string;
  artError?: string;
}

export function createFakeWriter(options: FakeWriterOptions = {}) {
  const tagFormats = new Set<AudioFormat>(options.tagFormats ?? ['mp3', 'flac']);
  const artFormats = new Set<AudioFormat>(options.artFormats ?? ['mp3', 'flac']);
  const result = (filePath: string, error: string | undefined): WriteTagsResult =>
    error ? { success: false, filePath, error } : { success: true, filePath, error: null };

  const writer = {
    supportsTags: vi.fn((format: AudioFormat | null) => format !== null && tagFormats.has(format)),
    supportsArt: vi.fn((format: AudioFormat | null) => format !== null && artFormats.has(format)),
    writeYearLabel: vi.fn((filePath: string, _format: AudioFormat, _values: YearLabelValues) =>
      Promise.resolve(result(filePath, options.tagError)),
    ),
    embedArt: vi.fn((filePath: string, _format: AudioFormat, _image: ImageData) =>
      Promise.resolve(result(filePath, options.artError)),
    ),
  } satisfies TagWriter;
  return writer;
}

export function searchHit(overrides: Partial<SearchHit> = {}): SearchHit {
  return {
    id: '1',
    type: 'master',
    title: 'Daft Punk - One More Time',
    year: '2000',
    url: 'https://www.discogs.com/master/1',
    resourceUrl: 'https://api.discogs.com/masters/1',
    ...overrides,
  };
}

/**
 * Catalog fake: answers searches from a title → hits table and details from
 * an id → record table. `failures` queues errors thrown by the next calls.
 */
export function createFakeCatalog(
  hitsByArtistTitle: Record<string, SearchHit[]>,
  recordsById: Record<string, CatalogRecord>,
) {
  const failures: Error[] = [];
  const catalog = {
    failures,
    search: vi.fn((query: CatalogQuery): Promise<SearchHit[]> => {
      const failure = failures.shift();
      if (failure) return Promise.reject(failure);
      return Promise.resolve(hitsByArtistTitle[query.text] ?? []);
    }),
    fetchDetail: vi.fn((candidate: Candidate): Promise<CatalogRecord> => {
      const record = recordsById[candidate.id];
      return record ? Promise.resolve(record) : Promise.reject(new Error(`no record ${candidate.id}`));
    }),
    fetchImage: vi.fn(
      (_url: string): Promise<ImageData> => Promise.resolve({ data: Buffer.from('image'), mimeType: 'image/jpeg' }),
    ),
  } satisfies CatalogService & { failures: Error[] };
  return catalog;
}
