/**
 * Torrent Providers Module
 *
 * Search providers for torrent indexing sites and the registry that
 * queries them together.
 */

export { L337xProvider, extractListingCandidates, buildSearchUrl, escapePathSegment } from './l337x';
export { YtsProvider } from './yts';
export { EztvProvider } from './eztv';
export { ProviderRegistry, createDefaultRegistry } from './registry';
export { ProviderError, UnsupportedSearchError } from './errors';
export { buildMovieQuery, buildSeriesQuery, formatEpisodeCode } from './query';

export type { TorrentProvider, TorrentResult, ProviderOptions } from './types';
export type { ListingCandidate, L337xCategory } from './l337x';
export type { EztvSeriesResult } from './eztv';
export type { AggregatedSearch, ProviderFailure } from './registry';
