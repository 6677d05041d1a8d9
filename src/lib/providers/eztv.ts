/**
 * EZTV Provider
 *
 * Series-only provider backed by the EZTV JSON API (get-torrents).
 * Besides title searches it can look a show up by IMDB ID and pull the
 * whole torrent catalogue of a show, page by page.
 */

import { detectQuality, formatSize, parseSeasonEpisode, type Quality } from '../classifier';
import { MAX_PROVIDER_RESULTS, PROVIDER_DEFAULTS } from '../config';
import { fetchText, type FetchOptions } from '../http';
import { createLogger } from '../logger';
import { ProviderError, UnsupportedSearchError } from './errors';
import { decodeJsonObject, readCount, readRecords, readString, type JsonRecord } from './json';
import { formatEpisodeCode } from './query';
import type { ProviderOptions, TorrentProvider, TorrentResult } from './types';

const logger = createLogger('EZTV');

const PROVIDER_NAME = 'EZTV';

/** Torrents requested per page */
const PAGE_LIMIT = 100;

/** Pages fetched at most by fetchSeriesTorrents */
const MAX_CATALOGUE_PAGES = 5;

/**
 * A get-torrents row with missing or mistyped fields read as '' or 0
 */
interface EztvTorrent {
  hash: string;
  filename: string;
  title: string;
  season: number;
  episode: number;
  seeds: number;
  peers: number;
  sizeBytes: number;
  magnetUrl: string;
}

function toEztvTorrent(row: JsonRecord): EztvTorrent {
  return {
    hash: readString(row.hash),
    filename: readString(row.filename),
    title: readString(row.title),
    season: readCount(row.season),
    episode: readCount(row.episode),
    seeds: readCount(row.seeds),
    peers: readCount(row.peers),
    sizeBytes: readCount(row.size_bytes),
    magnetUrl: readString(row.magnet_url),
  };
}

/**
 * A catalogue entry with the episode it belongs to.
 * Season packs carry episode 0.
 */
export interface EztvSeriesResult {
  title: string;
  hash: string;
  magnetUrl: string;
  quality: Quality;
  season: number;
  episode: number;
  seeds: number;
  peers: number;
  size: string;
  sizeBytes: number;
}

function stripImdbPrefix(imdbId: string): string {
  return imdbId.replace(/^tt/, '');
}

export class EztvProvider implements TorrentProvider {
  readonly name = PROVIDER_NAME;

  private readonly baseUrl: string;
  private readonly fetchOptions: FetchOptions;

  constructor(options: ProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? PROVIDER_DEFAULTS.baseUrls.eztv;
    this.fetchOptions = {
      userAgent: options.userAgent ?? PROVIDER_DEFAULTS.userAgent,
      timeoutMs: options.timeoutMs ?? PROVIDER_DEFAULTS.timeoutMs,
    };
  }

  async searchMovie(_title: string, _year: number): Promise<TorrentResult[]> {
    throw new UnsupportedSearchError(PROVIDER_NAME, 'movies');
  }

  /**
   * Search the latest torrents for an episode of a show, matched by title
   */
  async searchSeries(title: string, season: number, episode: number): Promise<TorrentResult[]> {
    const torrents = await this.getTorrents(new URLSearchParams({ limit: String(PAGE_LIMIT) }));

    const code = formatEpisodeCode(season, episode);
    const titleLower = title.toLowerCase();

    const matches = torrents.filter(
      (torrent) =>
        torrent.title.toLowerCase().includes(titleLower) &&
        torrent.filename.toUpperCase().includes(code)
    );

    return this.toResults(matches);
  }

  /**
   * Search an episode by the show's IMDB ID.
   * With season or episode <= 0 every torrent of the show is returned.
   */
  async searchByImdb(imdbId: string, season: number, episode: number): Promise<TorrentResult[]> {
    let torrents = await this.getTorrents(
      new URLSearchParams({ imdb_id: stripImdbPrefix(imdbId), limit: String(PAGE_LIMIT) })
    );

    if (season > 0 && episode > 0) {
      const code = formatEpisodeCode(season, episode);
      torrents = torrents.filter((torrent) => torrent.filename.toUpperCase().includes(code));
    }

    return this.toResults(torrents);
  }

  /**
   * Fetch the torrent catalogue of a show, tagged with season and episode
   */
  async fetchSeriesTorrents(imdbId: string): Promise<EztvSeriesResult[]> {
    const results: EztvSeriesResult[] = [];

    for (let page = 1; page <= MAX_CATALOGUE_PAGES; page++) {
      const torrents = await this.getTorrents(
        new URLSearchParams({
          imdb_id: stripImdbPrefix(imdbId),
          limit: String(PAGE_LIMIT),
          page: String(page),
        })
      );

      if (torrents.length === 0) {
        break;
      }

      for (const torrent of torrents) {
        results.push(this.toSeriesResult(torrent));
      }

      if (torrents.length < PAGE_LIMIT) {
        break;
      }
    }

    logger.debug('Catalogue fetched', { imdbId, torrents: results.length });
    return results;
  }

  private toResults(torrents: EztvTorrent[]): TorrentResult[] {
    return torrents
      .filter((torrent) => Boolean(torrent.hash))
      .slice(0, MAX_PROVIDER_RESULTS)
      .map((torrent): TorrentResult => ({
        title: torrent.title,
        hash: torrent.hash.toUpperCase(),
        magnetUrl: torrent.magnetUrl,
        quality: detectQuality(torrent.filename),
        type: 'hdtv',
        seeds: torrent.seeds,
        peers: torrent.peers,
        size: formatSize(torrent.sizeBytes),
        sizeBytes: torrent.sizeBytes,
        source: PROVIDER_NAME,
      }));
  }

  private toSeriesResult(torrent: EztvTorrent): EztvSeriesResult {
    const parsed = parseSeasonEpisode(torrent.filename);
    return {
      title: torrent.title,
      hash: torrent.hash.toUpperCase(),
      magnetUrl: torrent.magnetUrl,
      quality: detectQuality(torrent.filename),
      season: parsed.season || torrent.season,
      episode: parsed.episode || torrent.episode,
      seeds: torrent.seeds,
      peers: torrent.peers,
      size: formatSize(torrent.sizeBytes),
      sizeBytes: torrent.sizeBytes,
    };
  }

  private async getTorrents(params: URLSearchParams): Promise<EztvTorrent[]> {
    const url = `${this.baseUrl}/get-torrents?${params.toString()}`;

    let body: string;
    try {
      body = (await fetchText(url, this.fetchOptions)).body;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`EZTV request failed: ${cause.message}`, PROVIDER_NAME, cause);
    }

    const response = decodeJsonObject(body, PROVIDER_NAME);
    return readRecords(response.torrents).map(toEztvTorrent);
  }
}
