import type { AlbumInfo, ChartEntry, GenieSource, Requirements, SongInfo, SongSnapshot } from '../../src/scraper';

export interface FakeAlbum {
    info: AlbumInfo;
    requirements: Requirements;
}

/**
 * In-memory Genie: charts, album pages and song pages are whatever the test
 * puts in. Missing pages fail like an HTTP error would.
 */
export class FakeGenie implements GenieSource {
    top200: ChartEntry[] = [];
    newest: ChartEntry[] = [];
    albums = new Map<string, FakeAlbum>();
    snapshots = new Map<string, SongSnapshot>();
    songs = new Map<string, SongInfo>();

    getTop200 = jest.fn(async (): Promise<ChartEntry[]> => this.top200);

    getNewest = jest.fn(async (): Promise<ChartEntry[]> => this.newest);

    getAlbum = jest.fn(async (albumId: string, songId?: string) => {
        const album = this.albums.get(albumId);
        if (!album) throw new Error(`HTTP 404 for album ${albumId}`);
        return { info: album.info, requirements: songId ? album.requirements : null };
    });

    getSongSnapshot = jest.fn(async (songId: string): Promise<SongSnapshot> => {
        const snapshot = this.snapshots.get(songId);
        if (!snapshot) throw new Error('HTTP 503');
        return snapshot;
    });

    getSongInfo = jest.fn(async (songId: string): Promise<SongInfo> => {
        const info = this.songs.get(songId);
        if (!info) throw new Error(`HTTP 404 for song ${songId}`);
        return info;
    });
}

export function chartEntry(id: string): ChartEntry {
    return { id, title: `Song ${id}`, artist: 'Test Artist', albumId: `a${id}` };
}

export function songInfo(id: string, releaseDate: Date = new Date(Date.UTC(2024, 2, 1, 9))): SongInfo {
    return { id, title: `Song ${id}`, artist: 'Test Artist', releaseDate, agency: 'Test Agency' };
}

export function album(isKorean: boolean, isTitle: boolean): FakeAlbum {
    return {
        info: { releaseDate: new Date(Date.UTC(2024, 2, 1, 9)), agency: 'Test Agency' },
        requirements: { isKorean, isTitle }
    };
}
