import config from './util/config';
import logger from './util/logger';
import { errorMessage } from './util/errors';
import { runWithJob, tickJob } from './util/context';
import { msUntilNextMinute, tickKindFor } from './util/schedule';
import { SongDB, SongDbOptions, initDb } from './db/songDb';
import { setAppStatus, updateComponentStatus } from './api/health';

export { SongDB, initDb } from './db/songDb';
export type { SongDbOptions, UpdateOptions, UpdateResult, FetchResult } from './db/songDb';
export { Song } from './db/song';
export type { HourlySeries, HourlyPoint } from './util/series';
export type { Credits, SongInfo, ChartEntry, GenieSource } from './scraper';
export { GenieClient } from './scraper';

/**
 * SongDB options as configured through config.yaml and the environment.
 */
export function configuredOptions(): SongDbOptions {
    return {
        fileName: config.database.file,
        quota: config.tracking.quota,
        pruneWindowDays: config.tracking.pruneWindowDays,
        updateConcurrency: config.update.concurrency
    };
}

export function openSongDb(dir: string = config.database.dir): SongDB {
    return new SongDB(dir, configuredOptions());
}

export function createSongDb(dir: string = config.database.dir): SongDB {
    return initDb(dir, configuredOptions());
}

/**
 * One scheduler tick: the chart update at minute 0, the fetch of the songs
 * scheduled for the minute otherwise. Changes are saved at the end.
 * Never rejects; failures are logged and reported to the health endpoint.
 */
export async function runTick(db: SongDB, at: Date, fetchNewest: boolean = config.update.fetchNewest): Promise<void> {
    const minute = at.getUTCMinutes();
    const kind = tickKindFor(minute);

    await runWithJob(tickJob(kind, at), async () => {
        setAppStatus('running');
        try {
            if (kind === 'update') {
                const result = await db.update({ fetchNewest });
                const hasError = result.failedCharts.length > 0;
                const summary = `Update: ${result.added.length} added, ${result.resumed.length} resumed, ${result.pruned.length} pruned`;
                updateComponentStatus('genie', hasError ? 'error' : 'ok',
                    hasError ? `${summary}; could not read ${result.failedCharts.join(', ')}` : summary);
            } else {
                const { due, fetched } = await db.fetch(minute);
                const hasError = due > 0 && fetched === 0;
                updateComponentStatus('genie', hasError ? 'error' : 'ok', `Minute ${minute}: ${fetched}/${due} songs fetched`);
            }

            db.save();
            updateComponentStatus('database', 'ok');
            setAppStatus('idle');
        } catch (e: unknown) {
            logger.error(`Tick failed: ${errorMessage(e)}`);
            updateComponentStatus('database', 'error', errorMessage(e));
            setAppStatus('error');
        }
    });
}

/**
 * Runs `runTick` at every minute boundary until the returned stop function
 * is called. A tick still running when the next minute arrives makes that
 * minute be skipped. The stop function resolves once the running tick, if
 * any, has finished.
 */
export function startScheduledMonitoring(db: SongDB, clock: () => Date = () => new Date()): () => Promise<void> {
    let timer: NodeJS.Timeout | null = null;
    let current: Promise<void> | null = null;
    let stopped = false;

    const scheduleNextRun = () => {
        if (stopped) return;
        // small margin: timers may fire a few ms before the boundary
        const delay = msUntilNextMinute(clock()) + 100;

        timer = setTimeout(() => {
            const at = clock();
            scheduleNextRun();

            if (current) {
                logger.warn(`Previous tick still running, skipping minute ${at.getUTCMinutes()}`);
                return;
            }

            current = runTick(db, at).finally(() => {
                current = null;
            });
        }, delay);
    };

    scheduleNextRun();
    logger.info('Scheduler started: chart update at minute 0, song fetches at minutes 1-59');

    return async () => {
        stopped = true;
        if (timer) clearTimeout(timer);
        if (current) await current;
    };
}
