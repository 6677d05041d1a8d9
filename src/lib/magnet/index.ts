/**
 * Magnet URI Module
 *
 * Magnet URI construction and detail-page resolution.
 */

export {
  buildMagnetUri,
  PUBLIC_TRACKERS,
  MAGNET_HREF_PATTERN,
} from './magnet';

export { resolveMagnetLink, extractMagnetLink, EMPTY_MAGNET } from './resolver';

export type { ResolvedMagnet } from './resolver';
