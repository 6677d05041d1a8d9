/**
 * Magnet Resolver
 *
 * Fetches a torrent detail page and pulls out its magnet link.
 * Every failure collapses to EMPTY_MAGNET; callers drop such candidates.
 */

import { fetchText, type FetchOptions } from '../http';
import { createLogger } from '../logger';
import { MAGNET_HREF_PATTERN } from './magnet';

const logger = createLogger('MagnetResolver');

export interface ResolvedMagnet {
  /** Upper-cased hex info-hash, empty when unresolved */
  hash: string;
  /** Magnet URI exactly as found on the page, trackers included */
  magnetUrl: string;
}

export const EMPTY_MAGNET: Readonly<ResolvedMagnet> = Object.freeze({ hash: '', magnetUrl: '' });

/**
 * Find the first magnet link in a detail page
 */
export function extractMagnetLink(html: string): ResolvedMagnet {
  const match = html.match(MAGNET_HREF_PATTERN);
  if (!match) {
    return { ...EMPTY_MAGNET };
  }
  return {
    hash: match[2].toUpperCase(),
    magnetUrl: match[1],
  };
}

/**
 * Resolve the info-hash and magnet URI of a torrent detail page.
 *
 * Never throws.
 */
export async function resolveMagnetLink(
  detailUrl: string,
  options: FetchOptions = {}
): Promise<ResolvedMagnet> {
  try {
    const page = await fetchText(detailUrl, options);
    const resolved = extractMagnetLink(page.body);
    if (!resolved.hash) {
      logger.debug('No magnet link on detail page', { detailUrl, status: page.status });
    }
    return resolved;
  } catch (error) {
    logger.debug('Detail page fetch failed', { detailUrl, error: error instanceof Error ? error.message : String(error) });
    return { ...EMPTY_MAGNET };
  }
}
