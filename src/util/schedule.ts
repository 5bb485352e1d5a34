/** Minute of the hour reserved for the chart update. */
export const UPDATE_MINUTE = 0;

const FNV_OFFSET = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * Assigns the minute (1..59) at which a song is fetched every hour.
 *
 * The minute is a pure function of the song ID, so a song keeps its slot
 * across processes, and IDs spread evenly over the hour. Minute 0 is never
 * handed out: it belongs to the chart update.
 */
export function assignFetchMinute(songId: string): number {
    let hash = FNV_OFFSET;
    for (let i = 0; i < songId.length; i++) {
        hash ^= songId.charCodeAt(i);
        hash = Math.imul(hash, FNV_PRIME) >>> 0;
    }
    return (hash % 59) + 1;
}

export type TickKind = 'update' | 'fetch';

/**
 * What the scheduler does at a given minute of the hour.
 */
export function tickKindFor(minute: number): TickKind {
    return minute === UPDATE_MINUTE ? 'update' : 'fetch';
}

/**
 * Milliseconds until the next whole minute after `now`.
 */
export function msUntilNextMinute(now: Date = new Date()): number {
    const ms = now.getTime();
    return 60000 - (ms % 60000);
}
