import Database from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import logger from '../util/logger';

export type SqliteDatabase = Database.Database;

export const SCHEMA_VERSION = 1;

export interface SongRow {
    id: string;
    /** Insertion order, rewritten on every save */
    position: number;
    title: string;
    artist: string;
    agency: string | null;
    release_date: string;
    is_tracking: number;
    credits: string | null;
    fetch_minute: number | null;
    added_at: string;
}

export interface StatsRow {
    fetched_at: number;
    plays: number;
    listeners: number;
}

export function databaseFile(dir: string, fileName: string): string {
    return path.join(dir, fileName);
}

/**
 * Opens an existing database file. Throws when it is missing or was not
 * created by `createDatabase`.
 */
export function openDatabase(filePath: string): SqliteDatabase {
    if (!fs.existsSync(filePath)) {
        throw new Error(`Database not found at ${filePath}. Run "kstreams init" first.`);
    }

    const db = new Database(filePath, { fileMustExist: true });
    const version = db.pragma('user_version', { simple: true });
    if (version !== SCHEMA_VERSION) {
        db.close();
        throw new Error(`Unsupported database schema version ${String(version)} in ${filePath}`);
    }

    return db;
}

/**
 * Creates a fresh database file, replacing any existing one.
 */
export function createDatabase(filePath: string): SqliteDatabase {
    const dir = path.dirname(filePath);
    if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
    }

    for (const suffix of ['', '-wal', '-shm']) {
        if (fs.existsSync(filePath + suffix)) {
            fs.rmSync(filePath + suffix);
        }
    }

    const db = new Database(filePath);
    db.pragma('journal_mode = WAL');

    db.exec(`
        CREATE TABLE songs (
            id TEXT PRIMARY KEY,
            position INTEGER NOT NULL,
            title TEXT NOT NULL,
            artist TEXT NOT NULL,
            agency TEXT,
            release_date TEXT NOT NULL,
            is_tracking INTEGER NOT NULL DEFAULT 1,
            credits TEXT,
            fetch_minute INTEGER,
            added_at TEXT NOT NULL
        );

        CREATE TABLE blacklist (
            position INTEGER PRIMARY KEY AUTOINCREMENT,
            song_id TEXT NOT NULL UNIQUE
        );

        CREATE TABLE stats (
            song_id TEXT NOT NULL,
            fetched_at INTEGER NOT NULL,
            plays INTEGER NOT NULL,
            listeners INTEGER NOT NULL,
            PRIMARY KEY (song_id, fetched_at)
        );
    `);
    db.pragma(`user_version = ${SCHEMA_VERSION}`);

    logger.info(`Initialized database at ${filePath}`);
    return db;
}
