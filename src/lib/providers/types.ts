/**
 * Torrent Provider Types
 */

import type { Quality, ReleaseType } from '../classifier';

/**
 * A torrent found by a provider search.
 * Produced fresh per call; never returned with an empty hash.
 */
export interface TorrentResult {
  /** Display title as published by the site */
  title: string;
  /** Upper-cased hex info-hash */
  hash: string;
  magnetUrl: string;
  quality: Quality;
  type: ReleaseType;
  seeds: number;
  peers: number;
  /** Human-readable size, e.g. "1.4 GB" */
  size: string;
  sizeBytes: number;
  /** Name of the provider that produced the result */
  source: string;
}

/**
 * A search backend for one indexing site.
 *
 * Searches reject with a ProviderError when the site cannot be queried;
 * an empty array means the site had no usable results.
 */
export interface TorrentProvider {
  readonly name: string;
  searchMovie(title: string, year: number): Promise<TorrentResult[]>;
  searchSeries(title: string, season: number, episode: number): Promise<TorrentResult[]>;
}

/**
 * Construction options shared by the bundled providers
 */
export interface ProviderOptions {
  /** Site or API root, without trailing slash */
  baseUrl?: string;
  userAgent?: string;
  timeoutMs?: number;
}
