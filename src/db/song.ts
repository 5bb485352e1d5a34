import type { Credits, GenieSource } from '../scraper';
import logger from '../util/logger';
import { errorMessage } from '../util/errors';
import { assignFetchMinute } from '../util/schedule';
import { HourlySeries, hourlyGains } from '../util/series';
import { SqliteDatabase, StatsRow } from './database';

/** In-memory metadata of a song, persisted by `SongDB.save()`. */
export interface SongRecord {
    title: string;
    artist: string;
    agency: string | null;
    /** ISO-8601 instant */
    releaseDate: string;
    isTracking: boolean;
    /** null until the first successful fetch */
    credits: Credits | null;
    fetchMinute: number | null;
    /** ISO-8601 instant */
    addedAt: string;
}

export interface StatsSample {
    at: number;
    plays: number;
    listeners: number;
}

interface SongContext {
    db: SqliteDatabase;
    source: GenieSource;
}

/**
 * A single song of a database.
 *
 * Instances are handed out by the parent `SongDB`; metadata changes made here
 * are written by `SongDB.save()`, statistics are written as they are fetched.
 */
export class Song {
    constructor(
        readonly id: string,
        private readonly record: SongRecord,
        private readonly context: SongContext
    ) { }

    get title(): string {
        return this.record.title;
    }

    get artist(): string {
        return this.record.artist;
    }

    get agency(): string | null {
        return this.record.agency;
    }

    get releaseDate(): Date {
        return new Date(this.record.releaseDate);
    }

    get addedAt(): Date {
        return new Date(this.record.addedAt);
    }

    get isTracking(): boolean {
        return this.record.isTracking;
    }

    set isTracking(value: boolean) {
        this.record.isTracking = value;
    }

    get credits(): Credits | null {
        return this.record.credits;
    }

    set credits(value: Credits | null) {
        this.record.credits = value;
    }

    /** Minute of every hour (1..59) at which the song is fetched. */
    get fetchMinute(): number {
        if (this.record.fetchMinute === null) {
            this.record.fetchMinute = assignFetchMinute(this.id);
        }
        return this.record.fetchMinute;
    }

    /**
     * Fetches and stores the current total play and listener counts.
     * Request and storage failures are logged; the method then resolves to `false`.
     */
    async fetch(): Promise<boolean> {
        const snapshot = await this.context.source.getSongSnapshot(this.id).catch((e: unknown) => {
            logger.error(`Request to genie.co.kr for song ID ${this.id} failed: ${errorMessage(e)}`);
            return null;
        });
        if (!snapshot) return false;

        try {
            this.appendSample({
                at: snapshot.fetchedAt.getTime(),
                plays: snapshot.stats.plays,
                listeners: snapshot.stats.listeners
            });
        } catch (e: unknown) {
            logger.error(`Could not store statistics of ${this.title} (song ID ${this.id}): ${errorMessage(e)}`);
            return false;
        }

        if (!this.credits) {
            this.credits = snapshot.credits;
        }

        logger.info(`Fetching completed: ${this.title} by ${this.artist}`);
        return true;
    }

    appendSample(sample: StatsSample): void {
        this.context.db
            .prepare<[string, number, number, number]>('INSERT OR IGNORE INTO stats (song_id, fetched_at, plays, listeners) VALUES (?, ?, ?, ?)')
            .run(this.id, sample.at, sample.plays, sample.listeners);
    }

    /** Raw readings, oldest first. */
    getSamples(): StatsSample[] {
        const rows = this.context.db
            .prepare<[string], StatsRow>('SELECT fetched_at, plays, listeners FROM stats WHERE song_id = ? ORDER BY fetched_at')
            .all(this.id);

        return rows.map(row => ({ at: row.fetched_at, plays: row.plays, listeners: row.listeners }));
    }

    /**
     * Hourly plays, labelled in KST. A point `2018-09-18 11:00 → 3017` means
     * 3017 plays between 11:00 and 11:59 that day.
     */
    getPlays(): HourlySeries {
        return hourlyGains(this.title, this.getSamples().map(s => ({ at: s.at, value: s.plays })));
    }

    /**
     * Hourly first-time listeners, labelled in KST.
     */
    getListeners(): HourlySeries {
        return hourlyGains(this.title, this.getSamples().map(s => ({ at: s.at, value: s.listeners })));
    }
}
