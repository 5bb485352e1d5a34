import * as cheerio from 'cheerio';
import { AlbumInfo, Requirements } from ".";
import { infoValue } from './markup';
import { HOUR_MS, parseGenieDate } from '../util/time';

export interface ReleaseDateOptions {
    now: Date;
    /** Hour (UTC) at which releases are assumed to go live */
    releaseHourUtc: number;
}

/**
 * Release instant of an album.
 *
 * Genie only prints the day, so the release is placed at `releaseHourUtc` on
 * that day. When that would lie in the future the top of the previous hour is
 * used instead (keeping the release day).
 */
export function resolveReleaseDate(day: Date, { now, releaseHourUtc }: ReleaseDateOptions): Date {
    const release = new Date(day.getTime());
    release.setUTCHours(releaseHourUtc, 0, 0, 0);

    if (release.getTime() > now.getTime()) {
        release.setUTCHours(now.getUTCHours(), 0, 0, 0);
        return new Date(release.getTime() - HOUR_MS);
    }

    return release;
}

export function parseAlbumInfo(html: string, options: ReleaseDateOptions): AlbumInfo {
    const $ = cheerio.load(html);

    const releaseText = infoValue($, '발매일');
    if (!releaseText) {
        throw new Error('Could not find release date on album page');
    }

    const day = parseGenieDate(releaseText);
    if (!day) {
        throw new Error(`Could not parse release date: ${releaseText}`);
    }

    const agency = infoValue($, '기획사');

    return {
        releaseDate: resolveReleaseDate(day, options),
        agency: agency ? agency : null
    };
}

export function parseRequirements(html: string, songId: string): Requirements {
    const $ = cheerio.load(html);

    const genre = infoValue($, '장르/스타일') ?? '';
    const track = $(`[songid="${songId}"]`).first();

    return {
        isKorean: genre.includes('가요'),
        isTitle: track.find('.icon-title').length > 0
    };
}
