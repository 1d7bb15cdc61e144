/**
 * Tests for the Discogs client: request shaping, result mapping, detail
 * resolution with caching, image download and error classification.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import axios from 'axios';
import {
  DiscogsClient,
  buildAuthHeader,
  buildSearchParams,
  chooseBestImage,
  classifyRequestError,
  extractYear,
  mapSearchResults,
} from '../../../src/main/services/catalogClient';
import { MemoryCatalogCache } from '../../../src/main/services/catalogCache';
import {
  APIError,
  DownloadError,
  FatalError,
  RateLimitedError,
  TransientError,
} from '../../../src/main/services/errors';
import { FifoRateLimiter } from '../../../src/main/utils/rateLimiter';
import type { Candidate, CatalogQuery } from '../../../src/shared/types';
import { pngHeader } from '../../helpers/fixtures';

// ─── Mocks ───────────────────────────────────────────────────────────────────

vi.mock('axios', () => ({ default: { get: vi.fn() } }));

/** Get the mocked axios.get function */
function getMockedAxiosGet(): ReturnType<typeof vi.mocked<typeof axios.get>> {
  return vi.mocked(axios.get);
}

function axiosError(message: string, status?: number, headers: Record<string, unknown> = {}): Error {
  return Object.assign(new Error(message), {
    isAxiosError: true,
    response: status === undefined ? undefined : { status, headers },
  });
}

// ─── Fixtures ────────────────────────────────────────────────────────────────

const SETTINGS = {
  requestDelayMs: 0,
  minArtSize: 500,
  discogsToken: 'test-token',
  discogsKey: '',
  discogsSecret: '',
};

const QUERY: CatalogQuery = {
  variant: 'artist_title',
  text: 'Daft Punk - One More Time',
  artist: 'Daft Punk',
  title: 'One More Time',
  mix: null,
};

const MASTER: Candidate = {
  id: '1',
  type: 'master',
  artist: 'Daft Punk',
  title: 'One More Time',
  year: 2000,
  score: 1,
  rawScore: 1,
  url: 'https://www.discogs.com/master/1',
  resourceUrl: 'https://api.discogs.com/masters/1',
};

function createClient(cache = new MemoryCatalogCache()): DiscogsClient {
  return new DiscogsClient(SETTINGS, { cache, rateLimiter: new FifoRateLimiter(0) });
}

// ─── Pure helpers ────────────────────────────────────────────────────────────

describe('buildAuthHeader', () => {
  it('prefers a personal token', () => {
    expect(buildAuthHeader({ ...SETTINGS, discogsKey: 'test-key', discogsSecret: 'test-secret' })).toBe(
      'Discogs token=test-token',
    );
  });

  it('falls back to a key pair', () => {
    expect(buildAuthHeader({ ...SETTINGS, discogsToken: '', discogsKey: 'test-key', discogsSecret: 'test-secret' })).toBe(
      'Discogs key=test-key, secret=test-secret',
    );
  });

  it('returns null without credentials', () => {
    expect(buildAuthHeader({ ...SETTINGS, discogsToken: '' })).toBeNull();
  });
});

describe('buildSearchParams', () => {
  it('maps each query variant', () => {
    expect(buildSearchParams(QUERY)).toEqual({ per_page: '10', artist: 'Daft Punk', track: 'One More Time' });
    expect(buildSearchParams({ ...QUERY, variant: 'artist_title_mix', mix: 'Radio Edit' })).toEqual({
      per_page: '10',
      artist: 'Daft Punk',
      track: 'One More Time',
      q: 'Radio Edit',
    });
    expect(buildSearchParams({ ...QUERY, variant: 'title_only', artist: null })).toEqual({
      per_page: '10',
      q: 'One More Time',
    });
  });
});

describe('mapSearchResults', () => {
  it('keeps masters and releases and builds URLs', () => {
    const hits = mapSearchResults([
      { id: 1, type: 'master', title: 'Daft Punk - One More Time', year: '2000', uri: '/master/1-One-More-Time' },
      { id: 9, type: 'artist', title: 'Daft Punk' },
      { id: 2, type: 'release', title: 'Daft Punk - One More Time', year: 0 },
    ]);

    expect(hits).toEqual([
      {
        id: '1',
        type: 'master',
        title: 'Daft Punk - One More Time',
        year: '2000',
        url: 'https://www.discogs.com/master/1-One-More-Time',
        resourceUrl: 'https://api.discogs.com/masters/1',
      },
      {
        id: '2',
        type: 'release',
        title: 'Daft Punk - One More Time',
        year: '0',
        url: 'https://www.discogs.com/release/2',
        resourceUrl: 'https://api.discogs.com/releases/2',
      },
    ]);
  });
});

describe('chooseBestImage', () => {
  it('prefers a primary image that is big enough', () => {
    expect(
      chooseBestImage(
        [
          { type: 'secondary', uri: 'https://img/secondary.jpg', width: 1200, height: 1200 },
          { type: 'primary', uri: 'https://img/primary.jpg', width: 600, height: 600 },
        ],
        500,
      ),
    ).toBe('https://img/primary.jpg');
  });

  it('takes a big secondary image over a small primary one', () => {
    expect(
      chooseBestImage(
        [
          { type: 'primary', uri: 'https://img/small.jpg', width: 300, height: 300 },
          { type: 'secondary', uri: 'https://img/big.jpg', width: 1000, height: 1000 },
        ],
        500,
      ),
    ).toBe('https://img/big.jpg');
  });

  it('falls back to the best image when none is big enough', () => {
    expect(
      chooseBestImage(
        [
          { type: 'secondary', uri: 'https://img/a.jpg', width: 200, height: 200 },
          { type: 'primary', uri: 'https://img/b.jpg', width: 100, height: 100 },
        ],
        500,
      ),
    ).toBe('https://img/b.jpg');
  });

  it('returns null without usable images', () => {
    expect(chooseBestImage(undefined, 500)).toBeNull();
    expect(chooseBestImage([{ type: 'primary', width: 600, height: 600 }], 500)).toBeNull();
  });
});

describe('extractYear', () => {
  it('uses the year, then the release date', () => {
    expect(extractYear({ year: 1997 })).toBe('1997');
    expect(extractYear({ year: 0, released: '1997-01-20' })).toBe('1997-01-20');
    expect(extractYear({})).toBeNull();
  });
});

describe('classifyRequestError', () => {
  it('maps responses onto the error taxonomy', () => {
    const limited = classifyRequestError(axiosError('429', 429, { 'retry-after': '30' }), 'search');
    expect(limited).toBeInstanceOf(RateLimitedError);
    expect(limited instanceof RateLimitedError && limited.retryAfterSeconds).toBe(30);

    expect(classifyRequestError(axiosError('503', 503), 'search')).toBeInstanceOf(TransientError);
    expect(classifyRequestError(axiosError('timeout of 20000ms exceeded'), 'search')).toBeInstanceOf(TransientError);
    expect(classifyRequestError(axiosError('401', 401), 'search')).toBeInstanceOf(FatalError);
    expect(classifyRequestError(axiosError('400', 400), 'search')).toBeInstanceOf(FatalError);

    const notFound = classifyRequestError(axiosError('404', 404), 'master 1');
    expect(notFound).toBeInstanceOf(APIError);
    expect(notFound.message).toBe('master 1 failed with HTTP 404');
  });

  it('maps unknown failures to API errors', () => {
    expect(classifyRequestError(new Error('weird'), 'search')).toBeInstanceOf(APIError);
  });
});

// ─── Client ──────────────────────────────────────────────────────────────────

describe('DiscogsClient', () => {
  beforeEach(() => {
    getMockedAxiosGet().mockReset();
  });

  describe('search', () => {
    it('sends authenticated search requests and maps the results', async () => {
      getMockedAxiosGet().mockResolvedValueOnce({
        data: { results: [{ id: 1, type: 'master', title: 'Daft Punk - One More Time', year: '2000' }] },
      });

      const hits = await createClient().search(QUERY);

      expect(hits.map((hit) => hit.id)).toEqual(['1']);
      expect(getMockedAxiosGet()).toHaveBeenCalledWith('https://api.discogs.com/database/search', {
        params: { per_page: '10', artist: 'Daft Punk', track: 'One More Time' },
        headers: {
          'User-Agent': 'CrateTagger/1.0 +https://www.npmjs.com/package/crate-tagger',
          Accept: 'application/json',
          Authorization: 'Discogs token=test-token',
        },
        timeout: 20000,
      });
    });

    it('returns no hits for an empty response', async () => {
      getMockedAxiosGet().mockResolvedValueOnce({ data: {} });
      await expect(createClient().search(QUERY)).resolves.toEqual([]);
    });

    it('raises classified errors', async () => {
      getMockedAxiosGet().mockRejectedValueOnce(axiosError('Too Many Requests', 429));
      await expect(createClient().search(QUERY)).rejects.toBeInstanceOf(RateLimitedError);
    });
  });

  describe('fetchDetail', () => {
    it('borrows labels from the main release of a master and caches the record', async () => {
      getMockedAxiosGet()
        .mockResolvedValueOnce({
          data: {
            id: 1,
            year: 2000,
            images: [{ type: 'primary', uri: 'https://img/cover.jpg', width: 600, height: 600 }],
            main_release_url: 'https://api.discogs.com/releases/2',
          },
        })
        .mockResolvedValueOnce({ data: { year: 2001, labels: [{ name: 'Virgin' }, { name: 'EMI' }] } });
      const client = createClient();

      const record = await client.fetchDetail(MASTER);
      const again = await client.fetchDetail(MASTER);

      expect(record).toEqual({ year: '2000', labels: ['Virgin', 'EMI'], artworkUrl: 'https://img/cover.jpg' });
      expect(again).toEqual(record);
      expect(getMockedAxiosGet()).toHaveBeenCalledTimes(2);
      expect(getMockedAxiosGet().mock.calls[1][0]).toBe('https://api.discogs.com/releases/2');
    });

    it('uses a release record directly', async () => {
      getMockedAxiosGet().mockResolvedValueOnce({
        data: { year: 0, released: '1999-05-01', labels: [{ name: 'Warp' }] },
      });

      const record = await createClient().fetchDetail({
        ...MASTER,
        id: '7',
        type: 'release',
        resourceUrl: 'https://api.discogs.com/releases/7',
      });

      expect(record).toEqual({ year: '1999-05-01', labels: ['Warp'], artworkUrl: null });
      expect(getMockedAxiosGet()).toHaveBeenCalledTimes(1);
    });

    it('serves cached records without a request', async () => {
      const cache = new MemoryCatalogCache();
      cache.set('master:1', { year: '2000', labels: ['Virgin'], artworkUrl: null });

      await createClient(cache).fetchDetail(MASTER);

      expect(getMockedAxiosGet()).not.toHaveBeenCalled();
    });
  });

  describe('fetchImage', () => {
    it('downloads bytes and sniffs the type', async () => {
      const png = pngHeader(600, 600);
      getMockedAxiosGet().mockResolvedValueOnce({ data: png, headers: { 'content-type': 'image/jpeg; charset=binary' } });

      const image = await createClient().fetchImage('https://img/cover.png');

      expect(image.mimeType).toBe('image/png');
      expect(image.data.equals(png)).toBe(true);
    });

    it('uses the content type when the bytes are not recognised', async () => {
      getMockedAxiosGet().mockResolvedValueOnce({ data: Buffer.from('webp?'), headers: { 'content-type': 'image/webp' } });

      const image = await createClient().fetchImage('https://img/cover.webp');

      expect(image.mimeType).toBe('image/webp');
    });

    it('wraps failures in DownloadError', async () => {
      getMockedAxiosGet().mockRejectedValueOnce(axiosError('Not Found', 404));
      await expect(createClient().fetchImage('https://img/missing.jpg')).rejects.toBeInstanceOf(DownloadError);
    });

    it('rejects empty bodies', async () => {
      getMockedAxiosGet().mockResolvedValueOnce({ data: Buffer.alloc(0), headers: {} });
      await expect(createClient().fetchImage('https://img/empty.jpg')).rejects.toThrow('empty response body');
    });
  });
});
