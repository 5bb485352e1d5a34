import { AlbumInfo, ChartEntry, Requirements, SongInfo, SongSnapshot } from ".";

interface GenieSource {
    /**
     * Retrieves the real-time Top 200 for the current hour.
     *
     * Walks the chart pages in order and returns the rows as they are ranked.
     *
     * @throws Error if a chart page cannot be fetched after retries
     */
    getTop200(): Promise<ChartEntry[]>;

    /**
     * Retrieves the list of recently released k-pop songs.
     */
    getNewest(): Promise<ChartEntry[]>;

    /**
     * Fetches an album page. When `songId` is given the requirements for
     * that track are read from the same page.
     */
    getAlbum(albumId: string, songId?: string): Promise<{ info: AlbumInfo, requirements: Requirements | null }>;

    /**
     * Fetches the current total play and listener counts of a song,
     * together with its songwriting credits and the server time.
     */
    getSongSnapshot(songId: string): Promise<SongSnapshot>;

    /**
     * Resolves the metadata needed to add a song by ID alone.
     */
    getSongInfo(songId: string): Promise<SongInfo>;
}

export default GenieSource;
