export const GENIE_PATHS = {
  TOP200: '/chart/top200',
  NEWEST: '/newest/song',
  ALBUM: '/detail/albumInfo',
  SONG: '/detail/songInfo'
} as const;

/** A row of the Top 200 or of the newest songs list. */
export interface ChartEntry {
  id: string;
  title: string;
  artist: string;
  albumId: string;
}

export interface AlbumInfo {
  releaseDate: Date;
  agency: string | null;
}

export interface Requirements {
  /** Genre tagged as 가요 (Korean-language pop, OSTs excluded) */
  isKorean: boolean;
  /** Marked as a title track of its album */
  isTitle: boolean;
}

export interface SongStats {
  plays: number;
  listeners: number;
}

export interface Credits {
  lyrics: string[];
  composition: string[];
  arrangement: string[];
}

export interface SongSnapshot {
  stats: SongStats;
  credits: Credits;
  /** Server time of the response */
  fetchedAt: Date;
}

export interface SongInfo {
  id: string;
  title: string;
  artist: string;
  releaseDate: Date;
  agency: string | null;
}

export { parseChartPage } from './chart';
export { parseAlbumInfo, parseRequirements } from './album';
export { parseSongStats, parseCredits, parseSongPage } from './song';
export { GenieClient } from './genie';
export type { default as GenieSource } from './scraper.interface';
