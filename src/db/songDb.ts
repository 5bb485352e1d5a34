import Bluebird from 'bluebird';
import { z } from 'zod';
import type { ChartEntry, GenieSource, SongInfo } from '../scraper';
import { GenieClient } from '../scraper/genie';
import logger from '../util/logger';
import { errorMessage } from '../util/errors';
import { fetchQueue } from '../util/queues';
import { assignFetchMinute } from '../util/schedule';
import { meanOverLastDays } from '../util/series';
import { SongRecord, Song } from './song';
import { SongRow, SqliteDatabase, createDatabase, databaseFile, openDatabase } from './database';

export const DEFAULT_DB_FILE = 'kstreams.sqlite';
export const DEFAULT_QUOTA = 3540;
export const DEFAULT_PRUNE_WINDOW_DAYS = 10;

export interface SongDbOptions {
    source?: GenieSource;
    /** Name of the SQLite file inside the database directory */
    fileName?: string;
    quota?: number;
    pruneWindowDays?: number;
    /** Album pages inspected in parallel during `update()` */
    updateConcurrency?: number;
    now?: () => Date;
}

export interface UpdateOptions {
    /** Add every song of the newest songs list instead of screening the Top 200 */
    fetchNewest?: boolean;
}

export interface UpdateResult {
    added: string[];
    resumed: string[];
    blacklisted: string[];
    pruned: string[];
    /** Charts that could not be read (`newest`, `top200`) */
    failedCharts: string[];
}

export interface FetchResult {
    /** Tracked songs scheduled for the minute */
    due: number;
    /** Songs fetched and stored successfully */
    fetched: number;
}

const CreditsSchema = z.object({
    lyrics: z.array(z.string()),
    composition: z.array(z.string()),
    arrangement: z.array(z.string())
});

function toRecord(row: SongRow): SongRecord {
    return {
        title: row.title,
        artist: row.artist,
        agency: row.agency,
        releaseDate: row.release_date,
        isTracking: row.is_tracking === 1,
        credits: row.credits ? CreditsSchema.parse(JSON.parse(row.credits)) : null,
        fetchMinute: row.fetch_minute,
        addedAt: row.added_at
    };
}

/**
 * A database of streaming statistics.
 *
 * Songs are reached by iterating over the instance or through `get()` with
 * their Genie song ID. Every tracked song is fetched once an hour, at its own
 * fetch minute, through `fetch()`; `update()` discovers new songs from the
 * hourly Top 200 (or the newest songs list). Both must be driven from outside,
 * by cron or by the `serve` command.
 *
 * Song metadata and the blacklist live in memory until `save()`. Statistics
 * are written as soon as they are fetched.
 *
 * At most `quota` songs are tracked at once. When an update would exceed it
 * the worst performers stop being tracked (see `prune()`).
 */
export class SongDB implements Iterable<Song> {
    readonly path: string;
    readonly quota: number;
    readonly pruneWindowDays: number;

    private readonly db: SqliteDatabase;
    private readonly source: GenieSource;
    private readonly updateConcurrency: number;
    private readonly now: () => Date;

    private songs = new Map<string, SongRecord>();
    private blacklist: string[] = [];
    private cache = new Map<string, Song>();

    /**
     * @param dirPath - directory holding the database; use `initDb()` to create one
     * @throws Error when no database exists there
     */
    constructor(dirPath: string, options: SongDbOptions = {}) {
        this.path = dirPath;
        this.quota = options.quota ?? DEFAULT_QUOTA;
        this.pruneWindowDays = options.pruneWindowDays ?? DEFAULT_PRUNE_WINDOW_DAYS;
        this.updateConcurrency = options.updateConcurrency ?? 2;
        this.now = options.now ?? (() => new Date());
        this.db = openDatabase(databaseFile(dirPath, options.fileName ?? DEFAULT_DB_FILE));
        this.source = options.source ?? new GenieClient({ now: this.now });
        this.load();
    }

    // --- Collection interface ---

    get size(): number {
        return this.songs.size;
    }

    has(songId: string): boolean {
        return this.songs.has(songId);
    }

    get(songId: string): Song {
        const cached = this.cache.get(songId);
        if (cached) return cached;

        const record = this.songs.get(songId);
        if (!record) {
            throw new Error(`Song ${songId} is not in the database`);
        }

        const song = new Song(songId, record, { db: this.db, source: this.source });
        this.cache.set(songId, song);
        return song;
    }

    ids(): string[] {
        return [...this.songs.keys()];
    }

    *[Symbol.iterator](): Iterator<Song> {
        for (const songId of this.ids()) {
            yield this.get(songId);
        }
    }

    get blacklisted(): readonly string[] {
        return this.blacklist;
    }

    isBlacklisted(songId: string): boolean {
        return this.blacklist.includes(songId);
    }

    // --- Tracking ---

    isTracking(songId: string): boolean {
        return this.has(songId) && this.get(songId).isTracking;
    }

    countTracking(): number {
        let count = 0;
        for (const song of this) {
            if (song.isTracking) count++;
        }
        return count;
    }

    setTracking(songId: string, value: boolean): void {
        this.get(songId).isTracking = value;
        logger.info(`Tracking ${value ? 'enabled' : 'disabled'} (${this.get(songId).title})`);
    }

    /**
     * Stops tracking the `n` tracked songs with the lowest average hourly
     * plays over the last `pruneWindowDays` days. Songs without any hourly
     * data go first. Pruned songs stay in the database; a later `update()`
     * resumes them when they chart again.
     *
     * @returns IDs of the pruned songs
     */
    prune(n: number): string[] {
        if (n <= 0) return [];

        const ranked = [...this]
            .filter(song => song.isTracking)
            .map(song => ({
                song,
                performance: meanOverLastDays(song.getPlays(), this.pruneWindowDays) ?? Number.NEGATIVE_INFINITY
            }))
            .sort((a, b) => a.performance === b.performance ? 0 : (a.performance < b.performance ? -1 : 1));

        const pruned = ranked.slice(0, n).map(({ song }) => {
            song.isTracking = false;
            return song.id;
        });

        logger.info(`Disabled tracking of ${pruned.length} songs`);
        return pruned;
    }

    // --- Adding songs ---

    /**
     * Fetches metadata from Genie and adds the song.
     */
    async addFromSongId(songId: string): Promise<Song> {
        const info = await this.source.getSongInfo(songId);
        return this.addFromSongInfo(info);
    }

    /**
     * Adds a song with the metadata provided. Tracking starts immediately;
     * statistics already stored for the ID are kept.
     */
    addFromSongInfo(info: SongInfo): Song {
        this.songs.set(info.id, {
            title: info.title,
            artist: info.artist,
            agency: info.agency,
            releaseDate: info.releaseDate.toISOString(),
            isTracking: true,
            credits: null,
            fetchMinute: assignFetchMinute(info.id),
            addedAt: this.now().toISOString()
        });
        this.cache.delete(info.id);

        logger.info(`Added to database (${info.title} by ${info.artist})`);
        return this.get(info.id);
    }

    // --- Blacklist ---

    blacklistSong(songId: string): void {
        if (!this.isBlacklisted(songId)) {
            this.blacklist.push(songId);
        }
    }

    unblacklistSong(songId: string): boolean {
        const index = this.blacklist.indexOf(songId);
        if (index === -1) return false;
        this.blacklist.splice(index, 1);
        return true;
    }

    // --- Persistence ---

    /**
     * Loads song metadata and the blacklist, discarding unsaved changes.
     */
    load(): void {
        const rows = this.db.prepare<[], SongRow>('SELECT * FROM songs ORDER BY position').all();
        const blacklistRows = this.db
            .prepare<[], { song_id: string }>('SELECT song_id FROM blacklist ORDER BY position')
            .all();

        this.songs = new Map(rows.map(row => [row.id, toRecord(row)]));
        this.blacklist = blacklistRows.map(row => row.song_id);
        this.cache.clear();

        logger.info('Song metadata DB and blacklist loaded');
    }

    /**
     * Writes song metadata and the blacklist in one transaction.
     */
    save(): void {
        const insertSong = this.db.prepare<SongRow>(`
            INSERT INTO songs (id, position, title, artist, agency, release_date, is_tracking, credits, fetch_minute, added_at)
            VALUES (@id, @position, @title, @artist, @agency, @release_date, @is_tracking, @credits, @fetch_minute, @added_at)
        `);
        const insertBlacklisted = this.db.prepare<[string]>('INSERT INTO blacklist (song_id) VALUES (?)');

        const write = this.db.transaction(() => {
            this.db.prepare('DELETE FROM songs').run();
            let position = 0;
            for (const [id, record] of this.songs) {
                const row: SongRow = {
                    id,
                    position: position++,
                    title: record.title,
                    artist: record.artist,
                    agency: record.agency,
                    release_date: record.releaseDate,
                    is_tracking: record.isTracking ? 1 : 0,
                    credits: record.credits ? JSON.stringify(record.credits) : null,
                    fetch_minute: record.fetchMinute,
                    added_at: record.addedAt
                };
                insertSong.run(row);
            }

            this.db.prepare('DELETE FROM blacklist').run();
            for (const songId of this.blacklist) {
                insertBlacklisted.run(songId);
            }
        });
        write();

        logger.info('Changes to the DB in memory saved on disk');
    }

    close(): void {
        this.db.close();
    }

    // --- Genie ---

    /**
     * Asks Genie for new songs.
     *
     * Default mode reads the real-time Top 200: known but untracked songs are
     * resumed, unknown songs are screened on their album page and added when
     * they are tagged 가요 and marked as title track, otherwise blacklisted.
     *
     * With `fetchNewest` every unknown song of the newest songs list is added
     * without screening, and the Top 200 is read only to resume pruned songs.
     */
    async update({ fetchNewest = false }: UpdateOptions = {}): Promise<UpdateResult> {
        let tracking = this.countTracking();
        const resumed: string[] = [];
        const blacklisted: string[] = [];
        const toAdd: SongInfo[] = [];
        const queued = new Set<string>();
        const failedCharts: string[] = [];

        if (fetchNewest) {
            try {
                const newest = await this.source.getNewest();
                const candidates = newest.filter(entry => {
                    if (this.has(entry.id) || queued.has(entry.id)) {
                        logger.debug(`Skipped: already tracking (${entry.title} by ${entry.artist})`);
                        return false;
                    }
                    queued.add(entry.id);
                    return true;
                });

                const infos = await Bluebird.map(candidates, entry => this.inspectAlbum(entry, false), {
                    concurrency: this.updateConcurrency
                });

                for (const result of infos) {
                    if (!result) continue;
                    tracking++;
                    toAdd.push(result.info);
                    logger.debug(`Song will be added to DB (${result.info.title} by ${result.info.artist})`);
                }
            } catch (e: unknown) {
                failedCharts.push('newest');
                logger.warn(`Request to genie.co.kr for newest songs failed: ${errorMessage(e)}`);
            }
        }

        try {
            const top200 = await this.source.getTop200();
            const toInspect: ChartEntry[] = [];

            for (const entry of top200) {
                if (this.isBlacklisted(entry.id)) {
                    logger.debug(`Skipped: blacklisted (${entry.title} by ${entry.artist})`);
                    continue;
                }

                if (this.has(entry.id)) {
                    if (this.isTracking(entry.id)) {
                        logger.debug(`Skipped: already tracking (${entry.title} by ${entry.artist})`);
                    } else if (!resumed.includes(entry.id)) {
                        tracking++;
                        resumed.push(entry.id);
                        logger.debug(`Tracking will be resumed (${entry.title} by ${entry.artist})`);
                    }
                    continue;
                }

                if (fetchNewest || queued.has(entry.id)) continue;

                queued.add(entry.id);
                toInspect.push(entry);
            }

            const inspected = await Bluebird.map(toInspect, entry => this.inspectAlbum(entry, true), {
                concurrency: this.updateConcurrency
            });

            for (const result of inspected) {
                if (!result) continue;
                const { info, eligible } = result;

                if (eligible) {
                    tracking++;
                    toAdd.push(info);
                    logger.debug(`Song will be added to DB (${info.title} by ${info.artist})`);
                } else {
                    this.blacklistSong(info.id);
                    blacklisted.push(info.id);
                    logger.debug(`Blacklisted (${info.title} by ${info.artist})`);
                }
            }
        } catch (e: unknown) {
            failedCharts.push('top200');
            logger.warn(`Request to genie.co.kr for top 200 failed: ${errorMessage(e)}`);
        }

        // make space before anything new starts being tracked
        const pruned = tracking > this.quota ? this.prune(tracking - this.quota) : [];

        for (const songId of resumed) {
            this.get(songId).isTracking = true;
        }
        logger.info(`${resumed.length} songs: tracking resumed`);

        for (const info of toAdd) {
            this.addFromSongInfo(info);
        }
        logger.info(`${toAdd.length} songs: added to the database`);

        return { added: toAdd.map(info => info.id), resumed, blacklisted, pruned, failedCharts };
    }

    private async inspectAlbum(entry: ChartEntry, screen: boolean): Promise<{ info: SongInfo, eligible: boolean } | null> {
        try {
            const { info, requirements } = await this.source.getAlbum(entry.albumId, screen ? entry.id : undefined);
            logger.debug(`Album info fetched (${entry.title} by ${entry.artist})`);

            return {
                info: {
                    id: entry.id,
                    title: entry.title,
                    artist: entry.artist,
                    releaseDate: info.releaseDate,
                    agency: info.agency
                },
                eligible: !screen || (requirements !== null && requirements.isKorean && requirements.isTitle)
            };
        } catch (e: unknown) {
            logger.warn(`Request to genie.co.kr for album ID ${entry.albumId} failed. Song ID ${entry.id} will not be added: ${errorMessage(e)}`);
            return null;
        }
    }

    /**
     * Fetches every tracked song whose fetch minute is `minute`
     * (defaults to the current UTC minute).
     *
     * @returns how many songs were due and how many of them were fetched
     */
    async fetch(minute: number = this.now().getUTCMinutes()): Promise<FetchResult> {
        const due = [...this].filter(song => song.isTracking && song.fetchMinute === minute);
        logger.info(`${due.length} songs will be fetched for minute ${minute}`);

        const results = await fetchQueue.addAll(due.map(song => () => song.fetch()));
        return { due: due.length, fetched: results.filter(ok => ok).length };
    }
}

/**
 * Creates a new database in `dirPath` (created when missing), replacing any
 * database already there, and opens it.
 */
export function initDb(dirPath: string, options: SongDbOptions = {}): SongDB {
    createDatabase(databaseFile(dirPath, options.fileName ?? DEFAULT_DB_FILE)).close();
    return new SongDB(dirPath, options);
}
