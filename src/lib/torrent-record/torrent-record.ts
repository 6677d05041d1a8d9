/**
 * Torrent Records
 *
 * Maps provider search results to the shapes stored by the catalogue:
 * movie torrents, episode torrents and season packs.
 */

import type { Quality, ReleaseType } from '../classifier';
import type { TorrentResult } from '../providers';

export interface MovieTorrent {
  movieId: number;
  /** Magnet URI */
  url: string;
  hash: string;
  quality: Quality;
  type: ReleaseType;
  seeds: number;
  peers: number;
  size: string;
  sizeBytes: number;
  /** UTC, formatted as YYYY-MM-DD HH:mm:ss */
  dateUploaded: string;
  /** Seconds since the Unix epoch */
  dateUploadedUnix: number;
}

export interface EpisodeTorrent {
  episodeId: number;
  hash: string;
  quality: Quality;
  seeds: number;
  peers: number;
  size: string;
  sizeBytes: number;
  /** Provider that found the release */
  releaseGroup: string;
}

export interface SeasonPack {
  seriesId: number;
  season: number;
  hash: string;
  quality: Quality;
  seeds: number;
  peers: number;
  size: string;
  sizeBytes: number;
  source: string;
}

/**
 * Format a date as "YYYY-MM-DD HH:mm:ss" in UTC
 */
export function formatUploadDate(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function toMovieTorrent(
  result: TorrentResult,
  movieId: number,
  uploadedAt: Date = new Date()
): MovieTorrent {
  return {
    movieId,
    url: result.magnetUrl,
    hash: result.hash,
    quality: result.quality,
    type: result.type,
    seeds: result.seeds,
    peers: result.peers,
    size: result.size,
    sizeBytes: result.sizeBytes,
    dateUploaded: formatUploadDate(uploadedAt),
    dateUploadedUnix: Math.floor(uploadedAt.getTime() / 1000),
  };
}

export function toEpisodeTorrent(result: TorrentResult, episodeId: number): EpisodeTorrent {
  return {
    episodeId,
    hash: result.hash,
    quality: result.quality,
    seeds: result.seeds,
    peers: result.peers,
    size: result.size,
    sizeBytes: result.sizeBytes,
    releaseGroup: result.source,
  };
}

export function toSeasonPack(result: TorrentResult, seriesId: number, season: number): SeasonPack {
  return {
    seriesId,
    season,
    hash: result.hash,
    quality: result.quality,
    seeds: result.seeds,
    peers: result.peers,
    size: result.size,
    sizeBytes: result.sizeBytes,
    source: result.source,
  };
}

/**
 * Bare magnet URI for a stored record, without name or trackers
 */
export function torrentMagnetUrl(record: { hash: string }): string {
  return `magnet:?xt=urn:btih:${record.hash}`;
}
