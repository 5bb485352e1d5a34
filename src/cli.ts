#!/usr/bin/env node
import 'dotenv/config';
import { Command, InvalidArgumentError } from 'commander';
import { stringify } from 'csv-stringify/sync';
import config from './util/config';
import logger from './util/logger';
import { errorMessage } from './util/errors';
import { runWithJob } from './util/context';
import { HourlySeries } from './util/series';
import { startHealthServer, updateComponentStatus } from './api/health';
import { SongDB } from './db/songDb';
import { createSongDb, openSongDb, startScheduledMonitoring } from './index';

interface GlobalOptions {
    db?: string;
    verbose: number;
}

function increaseVerbosity(_value: string, previous: number): number {
    return previous + 1;
}

function parseMinute(value: string): number {
    const minute = Number(value);
    if (!Number.isInteger(minute) || minute < 0 || minute > 59) {
        throw new InvalidArgumentError('Minute must be an integer between 0 and 59.');
    }
    return minute;
}

function parsePort(value: string): number {
    const port = Number(value);
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
    }
    return port;
}

export function formatSeries(series: HourlySeries, format: 'csv' | 'json'): string {
    if (format === 'json') {
        return JSON.stringify(series, null, 2);
    }

    return stringify(
        series.points.map(point => [point.period, point.value ?? '']),
        { header: true, columns: ['period', series.name] }
    );
}

export function buildProgram(): Command {
    const program = new Command();

    program
        .name('kstreams')
        .description('Create and maintain a database of k-pop streaming statistics from Genie Music')
        .version('0.2.0')
        .option('-d, --db <dir>', 'database directory (defaults to DATA_DIR / config.yaml)')
        .option('-v, --verbose', 'log more (repeat for debug output)', increaseVerbosity, 0);

    program.hook('preAction', () => {
        const { verbose } = program.opts<GlobalOptions>();
        if (verbose >= 2) {
            logger.level = 'debug';
        } else if (verbose === 1) {
            logger.level = 'info';
        }
    });

    const dbDir = (): string => program.opts<GlobalOptions>().db ?? config.database.dir;

    // Opens the database, runs the action inside a job context, closes afterwards.
    const withDb = async (job: string, action: (db: SongDB) => Promise<void> | void): Promise<void> => {
        const db = openSongDb(dbDir());
        try {
            await runWithJob({ id: job }, () => action(db));
        } finally {
            db.close();
        }
    };

    program
        .command('init')
        .description('Create a new, empty database (replaces an existing one)')
        .action(() => {
            createSongDb(dbDir()).close();
        });

    program
        .command('update')
        .description('Add new songs from the real-time Top 200 and resume pruned ones')
        .option('-n, --newest', 'add the songs of the newest songs list instead of screening the Top 200')
        .action(async (options: { newest?: boolean }) => {
            await withDb('update', async (db) => {
                const result = await db.update({ fetchNewest: options.newest ?? config.update.fetchNewest });
                db.save();
                logger.info(`Update complete: ${result.added.length} added, ${result.resumed.length} resumed, ` +
                    `${result.blacklisted.length} blacklisted, ${result.pruned.length} pruned`);
                if (result.failedCharts.length > 0) {
                    logger.error(`Could not read: ${result.failedCharts.join(', ')}`);
                    process.exitCode = 1;
                }
            });
        });

    program
        .command('fetch')
        .description('Fetch the statistics of the songs scheduled for a minute')
        .option('-m, --minute <minute>', 'minute of the hour (defaults to the current one)', parseMinute)
        .action(async (options: { minute?: number }) => {
            await withDb('fetch', async (db) => {
                const { due, fetched } = await db.fetch(options.minute);
                db.save();
                logger.info(`${fetched} of ${due} songs fetched`);
                if (due > 0 && fetched === 0) {
                    process.exitCode = 1;
                }
            });
        });

    program
        .command('add')
        .description('Add songs by Genie song ID, bypassing the update requirements')
        .argument('<songIds...>', 'Genie song IDs')
        .action(async (songIds: string[]) => {
            await withDb('add', async (db) => {
                for (const songId of songIds) {
                    try {
                        await db.addFromSongId(songId);
                    } catch (e: unknown) {
                        logger.error(`Could not add song ${songId}: ${errorMessage(e)}`);
                        process.exitCode = 1;
                    }
                }
                db.save();
            });
        });

    program
        .command('track')
        .description('Resume tracking a song')
        .argument('<songId>', 'Genie song ID')
        .action(async (songId: string) => {
            await withDb('track', (db) => {
                db.setTracking(songId, true);
                db.save();
            });
        });

    program
        .command('untrack')
        .description('Stop tracking a song (its data is kept)')
        .argument('<songId>', 'Genie song ID')
        .action(async (songId: string) => {
            await withDb('untrack', (db) => {
                db.setTracking(songId, false);
                db.save();
            });
        });

    program
        .command('blacklist')
        .description('Never consider a song during updates')
        .argument('<songId>', 'Genie song ID')
        .action(async (songId: string) => {
            await withDb('blacklist', (db) => {
                db.blacklistSong(songId);
                db.save();
            });
        });

    program
        .command('unblacklist')
        .description('Let updates consider a blacklisted song again')
        .argument('<songId>', 'Genie song ID')
        .action(async (songId: string) => {
            await withDb('unblacklist', (db) => {
                if (!db.unblacklistSong(songId)) {
                    logger.warn(`Song ${songId} is not blacklisted`);
                }
                db.save();
            });
        });

    program
        .command('list')
        .description('List the songs in the database')
        .option('-t, --tracking', 'only songs currently tracked')
        .action(async (options: { tracking?: boolean }) => {
            await withDb('list', (db) => {
                for (const song of db) {
                    if (options.tracking && !song.isTracking) continue;
                    const state = song.isTracking ? 'tracking' : 'paused';
                    console.log(`${song.id}\t:${song.fetchMinute.toString().padStart(2, '0')}\t${state}\t${song.artist} - ${song.title}`);
                }
            });
        });

    program
        .command('stats')
        .description('Print the hourly plays (or listeners) of a song, in KST')
        .argument('<songId>', 'Genie song ID')
        .option('-l, --listeners', 'hourly new listeners instead of plays')
        .option('-f, --format <format>', 'csv or json', 'csv')
        .action(async (songId: string, options: { listeners?: boolean, format: string }) => {
            if (options.format !== 'csv' && options.format !== 'json') {
                throw new InvalidArgumentError(`Unknown format: ${options.format}`);
            }
            const format = options.format;

            await withDb('stats', (db) => {
                const song = db.get(songId);
                const series = options.listeners ? song.getListeners() : song.getPlays();
                process.stdout.write(formatSeries(series, format) + (format === 'json' ? '\n' : ''));
            });
        });

    program
        .command('serve')
        .description('Run the scheduler: update at minute 0, fetch every other minute')
        .option('-p, --port <port>', 'health check port', parsePort, config.health.port)
        .action((options: { port: number }) => {
            const db = openSongDb(dbDir());
            updateComponentStatus('database', 'ok');

            const server = startHealthServer(options.port);
            const stop = startScheduledMonitoring(db);

            const shutdown = async (signal: string) => {
                logger.info(`Received ${signal}, waiting for the running tick before shutting down...`);
                await stop();
                db.save();
                db.close();
                server.close();
            };
            const onSignal = (signal: string) => () => {
                shutdown(signal).catch((e: unknown) => {
                    logger.error(`Shutdown failed: ${errorMessage(e)}`);
                    process.exitCode = 1;
                });
            };
            process.once('SIGINT', onSignal('SIGINT'));
            process.once('SIGTERM', onSignal('SIGTERM'));

            logger.info('Application started successfully. Tracking streams...');
        });

    return program;
}

if (require.main === module) {
    buildProgram().parseAsync(process.argv).catch((e: unknown) => {
        logger.error(errorMessage(e));
        process.exitCode = 1;
    });
}
