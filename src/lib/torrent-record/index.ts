/**
 * Torrent Record Module
 */

export {
  toMovieTorrent,
  toEpisodeTorrent,
  toSeasonPack,
  torrentMagnetUrl,
  formatUploadDate,
} from './torrent-record';
export type { MovieTorrent, EpisodeTorrent, SeasonPack } from './torrent-record';
