/**
 * Release Name Classifiers
 *
 * Pure functions that map free-text torrent titles and size strings
 * to a quality tier, a release type or a byte count.
 */

export const QUALITIES = ['2160p', '1080p', '720p', '480p', 'unknown'] as const;
export type Quality = typeof QUALITIES[number];

export const RELEASE_TYPES = ['bluray', 'webrip', 'web', 'hdtv', 'dvdrip'] as const;
export type ReleaseType = typeof RELEASE_TYPES[number];

interface Marker<T> {
  needles: readonly string[];
  value: T;
}

// First matching marker wins
const QUALITY_MARKERS: readonly Marker<Quality>[] = [
  { needles: ['2160p', '4k'], value: '2160p' },
  { needles: ['1080p'], value: '1080p' },
  { needles: ['720p'], value: '720p' },
  { needles: ['480p'], value: '480p' },
];

const TYPE_MARKERS: readonly Marker<ReleaseType>[] = [
  { needles: ['bluray', 'blu-ray'], value: 'bluray' },
  { needles: ['webrip', 'web-rip'], value: 'webrip' },
  { needles: ['webdl', 'web-dl'], value: 'web' },
  { needles: ['hdtv'], value: 'hdtv' },
  { needles: ['dvdrip'], value: 'dvdrip' },
];

function classify<T>(text: string, markers: readonly Marker<T>[], fallback: T): T {
  const lower = text.toLowerCase();
  const marker = markers.find(({ needles }) => needles.some((needle) => lower.includes(needle)));
  return marker ? marker.value : fallback;
}

/**
 * Detect the resolution tier of a release from its title
 */
export function detectQuality(title: string): Quality {
  return classify(title, QUALITY_MARKERS, 'unknown');
}

/**
 * Detect the release type of a title.
 *
 * Titles without any marker are treated as web releases.
 */
export function detectType(title: string): ReleaseType {
  return classify(title, TYPE_MARKERS, 'web');
}

const SIZE_PATTERN = /([\d.]+)\s*(TB|GB|MB|KB)/;

const UNIT_MULTIPLIERS: Record<string, number> = {
  TB: 1024 ** 4,
  GB: 1024 ** 3,
  MB: 1024 ** 2,
  KB: 1024,
};

/**
 * Convert a human-readable size such as "1.4 GB" or "700,5 MB" to bytes.
 *
 * Uses binary multipliers. Returns 0 when no number and unit are found.
 */
export function parseSize(size: string): number {
  const normalized = size.trim().toUpperCase().replace(/,/g, '.');
  const match = normalized.match(SIZE_PATTERN);
  if (!match) {
    return 0;
  }

  const value = Number(match[1]);
  const multiplier = UNIT_MULTIPLIERS[match[2]];
  if (!Number.isFinite(value) || multiplier === undefined) {
    return 0;
  }

  return Math.trunc(value * multiplier);
}

/**
 * Format a byte count with one decimal and a binary prefix, e.g. "1.5 GB"
 */
export function formatSize(bytes: number): string {
  const unit = 1024;
  if (bytes < unit) {
    return `${bytes} B`;
  }

  let div = unit;
  let exp = 0;
  for (let n = Math.floor(bytes / unit); n >= unit; n = Math.floor(n / unit)) {
    div *= unit;
    exp++;
  }

  return `${(bytes / div).toFixed(1)} ${'KMGTPE'[exp]}B`;
}

export interface SeasonEpisode {
  season: number;
  episode: number;
}

const SEASON_EPISODE_PATTERN = /[Ss](\d{1,2})[Ee](\d{1,2})/;

/**
 * Extract season and episode numbers from a release name.
 *
 * Returns zeros when the name carries no SxxEyy marker.
 */
export function parseSeasonEpisode(name: string): SeasonEpisode {
  const match = name.match(SEASON_EPISODE_PATTERN);
  if (!match) {
    return { season: 0, episode: 0 };
  }
  return {
    season: parseInt(match[1], 10),
    episode: parseInt(match[2], 10),
  };
}
