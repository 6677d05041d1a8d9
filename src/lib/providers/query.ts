/**
 * Search query builders
 */

function pad2(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Episode code such as "S02E05"
 */
export function formatEpisodeCode(season: number, episode: number): string {
  return `S${pad2(season)}E${pad2(episode)}`;
}

/**
 * "{title} {year}", or the bare title when the year is unknown (<= 0)
 */
export function buildMovieQuery(title: string, year: number): string {
  return year > 0 ? `${title} ${year}` : title;
}

/**
 * "{title} SxxEyy"
 */
export function buildSeriesQuery(title: string, season: number, episode: number): string {
  return `${title} ${formatEpisodeCode(season, episode)}`;
}
