import * as cheerio from 'cheerio';
import { ChartEntry } from ".";
import logger from '../util/logger';
import { textWithoutSpans } from './markup';

const ALBUM_ONCLICK = /fnViewAlbumLayer\('([^']+)'\)/;

/**
 * Reads the rows of a Genie chart table (Top 200 and newest songs share the layout).
 */
export function parseChartPage(html: string): ChartEntry[] {
    const $ = cheerio.load(html);
    const entries: ChartEntry[] = [];

    $('tbody tr[songid]').each((_, element) => {
        const row = $(element);
        const id = row.attr('songid');
        const onclick = row.find('.albumtitle').attr('onclick') ?? '';
        const albumMatch = onclick.match(ALBUM_ONCLICK);

        if (!id || !albumMatch) {
            logger.debug(`Skipping chart row without song or album ID (${id ?? 'no id'})`);
            return;
        }

        entries.push({
            id,
            title: textWithoutSpans(row.find('.title').first()),
            artist: row.find('.artist').first().text().trim(),
            albumId: albumMatch[1]
        });
    });

    return entries;
}
