/**
 * YTS Provider
 *
 * Movie-only provider backed by the YTS JSON API (list_movies.json).
 * The API reports hashes directly, so no detail page is fetched.
 */

import { detectQuality, detectType } from '../classifier';
import { MAX_PROVIDER_RESULTS, PROVIDER_DEFAULTS } from '../config';
import { fetchText, type FetchOptions } from '../http';
import { createLogger } from '../logger';
import { buildMagnetUri } from '../magnet';
import { ProviderError, UnsupportedSearchError } from './errors';
import { decodeJsonObject, isJsonRecord, readCount, readRecords, readString, type JsonRecord } from './json';
import type { ProviderOptions, TorrentProvider, TorrentResult } from './types';

const logger = createLogger('YTS');

const PROVIDER_NAME = 'YTS';

/** Movies requested per search */
const MOVIE_LIMIT = 10;

interface YtsTorrent {
  hash: string;
  quality: string;
  type: string;
  seeds: number;
  peers: number;
  size: string;
  sizeBytes: number;
}

interface YtsMovie {
  title: string;
  year: number;
  torrents: YtsTorrent[];
}

function toYtsTorrent(row: JsonRecord): YtsTorrent {
  return {
    hash: readString(row.hash),
    quality: readString(row.quality),
    type: readString(row.type),
    seeds: readCount(row.seeds),
    peers: readCount(row.peers),
    size: readString(row.size),
    sizeBytes: readCount(row.size_bytes),
  };
}

function toYtsMovie(row: JsonRecord): YtsMovie {
  return {
    title: readString(row.title),
    year: readCount(row.year),
    torrents: readRecords(row.torrents).map(toYtsTorrent),
  };
}

export class YtsProvider implements TorrentProvider {
  readonly name = PROVIDER_NAME;

  private readonly baseUrl: string;
  private readonly fetchOptions: FetchOptions;

  constructor(options: ProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? PROVIDER_DEFAULTS.baseUrls.yts;
    this.fetchOptions = {
      userAgent: options.userAgent ?? PROVIDER_DEFAULTS.userAgent,
      timeoutMs: options.timeoutMs ?? PROVIDER_DEFAULTS.timeoutMs,
    };
  }

  async searchMovie(title: string, year: number): Promise<TorrentResult[]> {
    const params = new URLSearchParams({ query_term: title });
    if (year > 0) {
      params.set('year', String(year));
    }
    params.set('limit', String(MOVIE_LIMIT));

    const response = await this.request(`${this.baseUrl}/list_movies.json?${params.toString()}`);
    if (response.status !== 'ok') {
      throw new ProviderError(`YTS error: ${readString(response.status_message)}`, PROVIDER_NAME);
    }

    const data: JsonRecord = isJsonRecord(response.data) ? response.data : {};
    const movies = readRecords(data.movies).map(toYtsMovie);
    const results = movies.flatMap((movie) => this.toResults(movie));
    logger.debug('Movie search complete', { title, year, movies: movies.length, results: results.length });

    return results.slice(0, MAX_PROVIDER_RESULTS);
  }

  async searchSeries(_title: string, _season: number, _episode: number): Promise<TorrentResult[]> {
    throw new UnsupportedSearchError(PROVIDER_NAME, 'series');
  }

  private toResults(movie: YtsMovie): TorrentResult[] {
    return movie.torrents
      .filter((torrent) => Boolean(torrent.hash))
      .map((torrent): TorrentResult => {
        const hash = torrent.hash.toUpperCase();
        const displayName = `${movie.title} (${movie.year}) [${torrent.quality}] [YTS.MX]`;
        return {
          title: `${movie.title} (${movie.year}) - ${torrent.quality}`,
          hash,
          magnetUrl: buildMagnetUri(hash, displayName),
          quality: detectQuality(torrent.quality),
          type: detectType(torrent.type),
          seeds: torrent.seeds,
          peers: torrent.peers,
          size: torrent.size,
          sizeBytes: torrent.sizeBytes,
          source: PROVIDER_NAME,
        };
      });
  }

  private async request(url: string): Promise<JsonRecord> {
    let body: string;
    try {
      body = (await fetchText(url, this.fetchOptions)).body;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`YTS request failed: ${cause.message}`, PROVIDER_NAME, cause);
    }

    return decodeJsonObject(body, PROVIDER_NAME);
  }
}
