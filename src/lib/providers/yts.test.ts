/**
 * YTS Provider Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

const mockFetch = vi.fn();
vi.mock('undici', () => ({
  fetch: (...args: unknown[]) => mockFetch(...args),
}));

import { YtsProvider } from './yts';
import { ProviderError, UnsupportedSearchError } from './errors';
import { PROVIDER_DEFAULTS } from '../config';

const HASH_1080 = 'c4f3b2a1d0e9f8a7b6c5d4e3f2a1b0c9d8e7f6a5';
const HASH_720 = '0a1b2c3d4e5f60718293a4b5c6d7e8f901234567';

function jsonResponse(payload: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: vi.fn().mockResolvedValue(JSON.stringify(payload)),
  };
}

function movie(id: number, title: string, year: number, torrents: unknown[]) {
  return { id, title, year, torrents };
}

function torrent(hash: string, quality: string, type: string, seeds = 50) {
  return {
    url: `https://yts.example/torrent/download/${hash}`,
    hash,
    quality,
    type,
    seeds,
    peers: 5,
    size: quality === '1080p' ? '1.9 GB' : '950.3 MB',
    size_bytes: quality === '1080p' ? 2040109466 : 996461854,
  };
}

function okPayload(movies: unknown[]) {
  return {
    status: 'ok',
    status_message: 'Query was successful',
    data: { movie_count: movies.length, movies },
  };
}

describe('YtsProvider', () => {
  beforeEach(() => {
    mockFetch.mockReset();
  });

  describe('searchMovie', () => {
    it('queries list_movies with title, year and limit', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(okPayload([])));

      await new YtsProvider().searchMovie('The Matrix', 1999);

      expect(mockFetch).toHaveBeenCalledWith(
        'https://yts.mx/api/v2/list_movies.json?query_term=The+Matrix&year=1999&limit=10',
        expect.objectContaining({
          method: 'GET',
          headers: { 'User-Agent': PROVIDER_DEFAULTS.userAgent },
        })
      );
    });

    it('omits the year when it is unknown', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(okPayload([])));

      await new YtsProvider().searchMovie('Heat', 0);

      expect(mockFetch.mock.calls[0][0]).toBe('https://yts.mx/api/v2/list_movies.json?query_term=Heat&limit=10');
    });

    it('maps every torrent of every movie to a result', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(
          okPayload([
            movie(1, 'Heat', 1995, [torrent(HASH_1080, '1080p', 'bluray', 80), torrent(HASH_720, '720p', 'web', 20)]),
          ])
        )
      );

      const results = await new YtsProvider().searchMovie('Heat', 1995);

      expect(results).toHaveLength(2);
      expect(results[0]).toEqual({
        title: 'Heat (1995) - 1080p',
        hash: HASH_1080.toUpperCase(),
        magnetUrl: expect.stringMatching(
          /^magnet:\?xt=urn:btih:C4F3B2A1D0E9F8A7B6C5D4E3F2A1B0C9D8E7F6A5&dn=Heat\+\(1995\)\+%5B1080p%5D\+%5BYTS\.MX%5D&tr=/
        ),
        quality: '1080p',
        type: 'bluray',
        seeds: 80,
        peers: 5,
        size: '1.9 GB',
        sizeBytes: 2040109466,
        source: 'YTS',
      });
      expect(results[1].title).toBe('Heat (1995) - 720p');
      expect(results[1].quality).toBe('720p');
      expect(results[1].type).toBe('web');
    });

    it('appends the public trackers to built magnet links', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(okPayload([movie(1, 'Heat', 1995, [torrent(HASH_1080, '1080p', 'bluray')])]))
      );

      const [result] = await new YtsProvider().searchMovie('Heat', 1995);

      expect(result.magnetUrl).toContain('&tr=udp%3A%2F%2Ftracker.opentrackr.org%3A1337%2Fannounce');
      expect(result.magnetUrl.split('&tr=')).toHaveLength(11);
    });

    it('classifies 2160p releases and unmarked types', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(okPayload([movie(1, 'Dune', 2021, [torrent(HASH_1080, '2160p', 'x265')])]))
      );

      const [result] = await new YtsProvider().searchMovie('Dune', 2021);

      expect(result.quality).toBe('2160p');
      expect(result.type).toBe('web');
    });

    it('skips torrents without a hash', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(okPayload([movie(1, 'Heat', 1995, [torrent('', '1080p', 'bluray'), torrent(HASH_720, '720p', 'web')])]))
      );

      const results = await new YtsProvider().searchMovie('Heat', 1995);

      expect(results.map((r) => r.hash)).toEqual([HASH_720.toUpperCase()]);
    });

    it('reads missing counts as zero', async () => {
      const { seeds: _seeds, peers: _peers, ...withoutCounts } = torrent(HASH_1080, '1080p', 'bluray');
      mockFetch.mockResolvedValueOnce(jsonResponse(okPayload([movie(1, 'Heat', 1995, [withoutCounts])])));

      const [result] = await new YtsProvider().searchMovie('Heat', 1995);

      expect(result.seeds).toBe(0);
      expect(result.peers).toBe(0);
    });

    it('skips malformed torrent entries and keeps the valid ones', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse(
          okPayload([
            movie(1, 'Heat', 1995, [
              null,
              { ...torrent(HASH_1080, '1080p', 'bluray'), hash: null, quality: null },
              { ...torrent(HASH_720, '720p', 'web'), size: null, size_bytes: 'unknown' },
            ]),
          ])
        )
      );

      const results = await new YtsProvider().searchMovie('Heat', 1995);

      expect(results).toHaveLength(1);
      expect(results[0]).toMatchObject({
        hash: HASH_720.toUpperCase(),
        size: '',
        sizeBytes: 0,
      });
    });

    it('caps results at 20', async () => {
      const movies = Array.from({ length: 8 }, (_, i) =>
        movie(i + 1, `Movie ${i + 1}`, 2000 + i, [
          torrent(HASH_1080, '1080p', 'bluray'),
          torrent(HASH_720, '720p', 'web'),
          torrent(HASH_720, '480p', 'web'),
        ])
      );
      mockFetch.mockResolvedValueOnce(jsonResponse(okPayload(movies)));

      const results = await new YtsProvider().searchMovie('Movie', 0);

      expect(results).toHaveLength(20);
      expect(results[19].title).toBe('Movie 7 (2006) - 720p');
    });

    it('returns an empty array when no movies match', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ status: 'ok', status_message: 'Query was successful', data: { movie_count: 0 } })
      );

      await expect(new YtsProvider().searchMovie('Nothing', 2020)).resolves.toEqual([]);
    });

    it('tolerates movies without torrents', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(okPayload([{ id: 3, title: 'Empty', year: 2001, torrents: null }])));

      await expect(new YtsProvider().searchMovie('Empty', 2001)).resolves.toEqual([]);
    });

    it('rejects when the API reports an error status', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ status: 'error', status_message: 'Invalid query' }));

      await expect(new YtsProvider().searchMovie('Heat', 1995)).rejects.toThrow('YTS error: Invalid query');
    });

    it('rejects with a ProviderError on malformed JSON', async () => {
      mockFetch.mockResolvedValueOnce({ ok: true, status: 200, text: vi.fn().mockResolvedValue('<html>') });

      const error = await new YtsProvider().searchMovie('Heat', 1995).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ provider: 'YTS' });
      expect(String(error)).toMatch(/^ProviderError: YTS decode failed: /);
    });

    it('rejects with a ProviderError when the request fails', async () => {
      mockFetch.mockRejectedValueOnce(new Error('getaddrinfo ENOTFOUND yts.mx'));

      await expect(new YtsProvider().searchMovie('Heat', 1995)).rejects.toThrow(
        'YTS request failed: Request failed: getaddrinfo ENOTFOUND yts.mx'
      );
    });

    it('uses a custom API root', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse(okPayload([])));

      await new YtsProvider({ baseUrl: 'https://yts.example/api/v2' }).searchMovie('Heat', 1995);

      expect(mockFetch.mock.calls[0][0]).toBe(
        'https://yts.example/api/v2/list_movies.json?query_term=Heat&year=1995&limit=10'
      );
    });
  });

  describe('searchSeries', () => {
    it('rejects as unsupported without a request', async () => {
      const error = await new YtsProvider().searchSeries('Show', 1, 1).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(UnsupportedSearchError);
      expect(error).toMatchObject({ message: 'YTS does not support series' });
      expect(mockFetch).not.toHaveBeenCalled();
    });
  });
});
