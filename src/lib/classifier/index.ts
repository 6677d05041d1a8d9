/**
 * Classifier Module
 *
 * Quality, release type and size heuristics for torrent titles.
 */

export {
  detectQuality,
  detectType,
  parseSize,
  formatSize,
  parseSeasonEpisode,
  QUALITIES,
  RELEASE_TYPES,
} from './classifier';

export type { Quality, ReleaseType, SeasonEpisode } from './classifier';
