import * as cheerio from 'cheerio';
import { Credits, SongStats } from ".";
import { infoValue, textWithoutSpans } from './markup';

export interface SongPage {
    title: string;
    artist: string;
    albumId: string;
}

function extractCounter($: cheerio.CheerioAPI, label: string): number {
    const counter = $(`img[alt="${label}"]`).first().parent().prevAll('p').first();
    if (counter.length === 0) {
        throw new Error(`Could not find counter "${label}" on song page`);
    }

    const digits = counter.text().trim().replace(/,/g, '');
    if (!/^\d+$/.test(digits)) {
        throw new Error(`Unexpected value for "${label}": ${counter.text().trim()}`);
    }

    return parseInt(digits, 10);
}

export function parseSongStats(html: string): SongStats {
    const $ = cheerio.load(html);
    return {
        plays: extractCounter($, '전체 재생수'),
        listeners: extractCounter($, '전체 청취자수')
    };
}

function splitNames(value: string | null): string[] {
    if (!value) return [];
    return value.split(',').map(name => name.trim()).filter(name => name.length > 0);
}

export function parseCredits(html: string): Credits {
    const $ = cheerio.load(html);
    return {
        lyrics: splitNames(infoValue($, '작사가')),
        composition: splitNames(infoValue($, '작곡가')),
        arrangement: splitNames(infoValue($, '편곡자'))
    };
}

/**
 * Title, artist and album of a song, read from its detail page.
 */
export function parseSongPage(html: string): SongPage {
    const $ = cheerio.load(html);

    const title = textWithoutSpans($('.name').first());
    if (!title) {
        throw new Error('Could not find song title');
    }

    const artist = $('[onclick*="artistInfo"]').first().text().trim();
    if (!artist) {
        throw new Error(`Could not find artist of "${title}"`);
    }

    const albumOnclick = $('[onclick*="albumInfo"]').first().attr('onclick') ?? '';
    const albumMatch = albumOnclick.match(/'(\d+)'/);
    if (!albumMatch) {
        throw new Error(`Could not find album ID of "${title}"`);
    }

    return { title, artist, albumId: albumMatch[1] };
}
