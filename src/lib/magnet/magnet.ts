/**
 * Magnet URI helpers
 *
 * Builds magnet URIs for providers that only report an info-hash and
 * matches magnet links on detail pages.
 * https://www.bittorrent.org/beps/bep_0009.html
 */

/**
 * Public trackers appended to magnet URIs built from a bare hash
 */
export const PUBLIC_TRACKERS: readonly string[] = [
  'udp://tracker.opentrackr.org:1337/announce',
  'udp://tracker.torrent.eu.org:451/announce',
  'udp://tracker.dler.org:6969/announce',
  'udp://open.stealth.si:80/announce',
  'udp://open.demonii.com:1337/announce',
  'https://tracker.moeblog.cn:443/announce',
  'udp://open.dstud.io:6969/announce',
  'udp://tracker.srv00.com:6969/announce',
  'https://tracker.zhuqiy.com:443/announce',
  'https://tracker.pmman.tech:443/announce',
];

const MAGNET_PREFIX = 'magnet:?xt=urn:btih:';

/**
 * First magnet anchor in an HTML document.
 * Group 1 is the full URI, group 2 the hex info-hash.
 */
export const MAGNET_HREF_PATTERN = /href="(magnet:\?xt=urn:btih:([a-fA-F0-9]+)[^"]*)"/;

/**
 * Encode a value the way HTML form encoding does (spaces as '+')
 */
function queryEscape(value: string): string {
  return encodeURIComponent(value).replace(/%20/g, '+');
}

/**
 * Build a magnet URI from an info-hash, display name and tracker list
 */
export function buildMagnetUri(
  hash: string,
  name: string,
  trackers: readonly string[] = PUBLIC_TRACKERS
): string {
  const trackerParams = trackers.map((tracker) => `&tr=${queryEscape(tracker)}`).join('');
  return `${MAGNET_PREFIX}${hash}&dn=${queryEscape(name)}${trackerParams}`;
}
