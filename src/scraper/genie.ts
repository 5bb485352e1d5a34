import { AlbumInfo, ChartEntry, GENIE_PATHS, Requirements, SongInfo, SongSnapshot } from ".";
import GenieSource from './scraper.interface';
import { parseChartPage } from './chart';
import { parseAlbumInfo, parseRequirements } from './album';
import { parseCredits, parseSongPage, parseSongStats } from './song';
import logger from '../util/logger';
import config from '../util/config';
import { genieHttp, RateLimitedAxios } from '../util/queues';
import { retryOperation } from '../util/retry';
import { parseHttpDate } from '../util/time';

export interface GenieClientOptions {
    http: RateLimitedAxios;
    releaseHourUtc: number;
    top200Pages: number;
    newestPages: number;
    retries: number;
    retryDelayMs: number;
    now: () => Date;
}

interface FetchedPage {
    html: string;
    serverDate: Date | null;
}

export class GenieClient implements GenieSource {
    private readonly options: GenieClientOptions;

    constructor(options: Partial<GenieClientOptions> = {}) {
        this.options = {
            http: genieHttp,
            releaseHourUtc: config.scraper.releaseHourUtc,
            top200Pages: config.scraper.top200Pages,
            newestPages: config.scraper.newestPages,
            retries: 3,
            retryDelayMs: 2000,
            now: () => new Date(),
            ...options
        };
    }

    private async fetchPage(path: string, params: Record<string, string | number>, label: string): Promise<FetchedPage> {
        return await retryOperation(async () => {
            const response = await this.options.http.get<string>(path, { params });
            const dateHeader = response.headers['date'];

            if (typeof response.data !== 'string') {
                throw new Error(`Unexpected response body for ${label}`);
            }

            return {
                html: response.data,
                serverDate: parseHttpDate(typeof dateHeader === 'string' ? dateHeader : undefined)
            };
        }, `fetch ${label}`, this.options.retries, this.options.retryDelayMs);
    }

    private async fetchChart(path: string, pages: number, params: Record<string, string>, name: string): Promise<ChartEntry[]> {
        const entries: ChartEntry[] = [];

        for (let page = 1; page <= pages; page++) {
            const { html } = await this.fetchPage(path, { ...params, pg: page }, `${name} page ${page}`);
            const rows = parseChartPage(html);
            entries.push(...rows);
            logger.debug(`${name} page ${page} parsed (${rows.length} songs)`);
        }

        logger.debug(`Scraping of ${name} completed (${entries.length} songs)`);
        return entries;
    }

    async getTop200(): Promise<ChartEntry[]> {
        return this.fetchChart(GENIE_PATHS.TOP200, this.options.top200Pages, { ditc: 'D', rtm: 'Y' }, 'top 200');
    }

    async getNewest(): Promise<ChartEntry[]> {
        return this.fetchChart(GENIE_PATHS.NEWEST, this.options.newestPages, { GenreCode: 'KPOP' }, 'newest songs');
    }

    async getAlbum(albumId: string, songId?: string): Promise<{ info: AlbumInfo, requirements: Requirements | null }> {
        const { html } = await this.fetchPage(GENIE_PATHS.ALBUM, { axnm: albumId }, `album ${albumId}`);

        const info = parseAlbumInfo(html, {
            now: this.options.now(),
            releaseHourUtc: this.options.releaseHourUtc
        });
        const requirements = songId ? parseRequirements(html, songId) : null;

        return { info, requirements };
    }

    async getSongSnapshot(songId: string): Promise<SongSnapshot> {
        const { html, serverDate } = await this.fetchPage(GENIE_PATHS.SONG, { xgnm: songId }, `song ${songId}`);

        return {
            stats: parseSongStats(html),
            credits: parseCredits(html),
            fetchedAt: serverDate ?? this.options.now()
        };
    }

    async getSongInfo(songId: string): Promise<SongInfo> {
        const { html } = await this.fetchPage(GENIE_PATHS.SONG, { xgnm: songId }, `song ${songId}`);
        const page = parseSongPage(html);
        const { info } = await this.getAlbum(page.albumId);

        return {
            id: songId,
            title: page.title,
            artist: page.artist,
            releaseDate: info.releaseDate,
            agency: info.agency
        };
    }
}
