/**
 * 1337x Provider
 *
 * Scrapes the 1337x category search listing and resolves each row's
 * magnet link from its detail page.
 *
 * The listing is scanned with four independent patterns (title anchor,
 * seeds, leeches, size) whose matches are paired by index. A row missing
 * a cell shifts later values instead of failing the search; missing
 * values fall back to 0 or an empty string.
 */

import { detectQuality, detectType, parseSize } from '../classifier';
import { MAX_PROVIDER_RESULTS, PROVIDER_DEFAULTS } from '../config';
import { fetchText, type FetchOptions } from '../http';
import { createLogger } from '../logger';
import { resolveMagnetLink } from '../magnet';
import { ProviderError } from './errors';
import { buildMovieQuery, buildSeriesQuery } from './query';
import type { ProviderOptions, TorrentProvider, TorrentResult } from './types';

const logger = createLogger('L337x');

const PROVIDER_NAME = '1337x';

export type L337xCategory = 'Movies' | 'TV';

const LISTING_PATTERNS = {
  link: /<a href="(\/torrent\/[^"]+)">([^<]+)<\/a>/g,
  seeds: /<td class="coll-2 seeds">(\d+)<\/td>/g,
  leeches: /<td class="coll-3 leeches">(\d+)<\/td>/g,
  size: /<td class="coll-4 size[^"]*">([^<]+)</g,
} as const;

/**
 * A listing row before its magnet link has been resolved
 */
export interface ListingCandidate {
  /** Detail page path relative to the site root */
  path: string;
  title: string;
  seeds: number;
  peers: number;
  size: string;
}

function captures(html: string, pattern: RegExp): string[][] {
  return Array.from(html.matchAll(pattern), (match) => match.slice(1));
}

function toCount(value: string | undefined): number {
  const count = value === undefined ? NaN : parseInt(value, 10);
  return Number.isNaN(count) ? 0 : count;
}

/**
 * Extract listing rows from a 1337x search page, in page order
 */
export function extractListingCandidates(html: string): ListingCandidate[] {
  const links = captures(html, LISTING_PATTERNS.link);
  const seeds = captures(html, LISTING_PATTERNS.seeds);
  const leeches = captures(html, LISTING_PATTERNS.leeches);
  const sizes = captures(html, LISTING_PATTERNS.size);

  return links.map(([path, title], i) => ({
    path,
    title,
    seeds: toCount(seeds[i]?.[0]),
    peers: toCount(leeches[i]?.[0]),
    size: sizes[i]?.[0]?.trim() ?? '',
  }));
}

// Sub-delimiters allowed unescaped inside a path segment
const PATH_SEGMENT_SAFE = /%(24|26|2B|2C|3A|3B|3D|40)/g;

/**
 * Escape a value for use as one URL path segment.
 * Only unreserved characters and $&+,:;=@ are left as is.
 */
export function escapePathSegment(value: string): string {
  return encodeURIComponent(value)
    .replace(PATH_SEGMENT_SAFE, (_, hex: string) => String.fromCharCode(parseInt(hex, 16)))
    .replace(/[!'()*]/g, (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`);
}

/**
 * Listing URL for a query and category
 */
export function buildSearchUrl(baseUrl: string, query: string, category: L337xCategory): string {
  return `${baseUrl}/category-search/${escapePathSegment(query)}/${category}/1/`;
}

export class L337xProvider implements TorrentProvider {
  readonly name = PROVIDER_NAME;

  private readonly baseUrl: string;
  private readonly fetchOptions: FetchOptions;

  constructor(options: ProviderOptions = {}) {
    this.baseUrl = options.baseUrl ?? PROVIDER_DEFAULTS.baseUrls.l337x;
    this.fetchOptions = {
      userAgent: options.userAgent ?? PROVIDER_DEFAULTS.userAgent,
      timeoutMs: options.timeoutMs ?? PROVIDER_DEFAULTS.timeoutMs,
    };
  }

  searchMovie(title: string, year: number): Promise<TorrentResult[]> {
    return this.search(buildMovieQuery(title, year), 'Movies');
  }

  searchSeries(title: string, season: number, episode: number): Promise<TorrentResult[]> {
    return this.search(buildSeriesQuery(title, season, episode), 'TV');
  }

  private async search(query: string, category: L337xCategory): Promise<TorrentResult[]> {
    const url = buildSearchUrl(this.baseUrl, query, category);

    let html: string;
    try {
      const page = await fetchText(url, this.fetchOptions);
      if (!page.ok) {
        logger.warn('Listing returned an error status', { url, status: page.status });
      }
      html = page.body;
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProviderError(`1337x request failed: ${cause.message}`, PROVIDER_NAME, cause);
    }

    const candidates = extractListingCandidates(html);
    logger.debug('Listing parsed', { query, category, candidates: candidates.length });

    return this.resolveCandidates(candidates);
  }

  /**
   * Resolve candidates one at a time, in page order, until the cap is reached
   */
  private async resolveCandidates(candidates: ListingCandidate[]): Promise<TorrentResult[]> {
    const results: TorrentResult[] = [];

    for (const candidate of candidates) {
      const { hash, magnetUrl } = await resolveMagnetLink(this.baseUrl + candidate.path, this.fetchOptions);
      if (!hash) {
        continue;
      }

      results.push({
        title: candidate.title,
        hash,
        magnetUrl,
        quality: detectQuality(candidate.title),
        type: detectType(candidate.title),
        seeds: candidate.seeds,
        peers: candidate.peers,
        size: candidate.size,
        sizeBytes: parseSize(candidate.size),
        source: PROVIDER_NAME,
      });

      if (results.length >= MAX_PROVIDER_RESULTS) {
        break;
      }
    }

    return results;
  }
}
