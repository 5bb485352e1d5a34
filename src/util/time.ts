export const HOUR_MS = 60 * 60 * 1000;
export const DAY_MS = 24 * HOUR_MS;

// Korea has not observed daylight saving since 1988.
export const KST_OFFSET_MS = 9 * HOUR_MS;

export function floorHour(ms: number): number {
    return Math.floor(ms / HOUR_MS) * HOUR_MS;
}

export function ceilHour(ms: number): number {
    return Math.ceil(ms / HOUR_MS) * HOUR_MS;
}

/**
 * Formats an instant as a KST hour period label, e.g. `2018-09-18 11:00`.
 */
export function formatKstPeriod(ms: number): string {
    const kst = new Date(floorHour(ms) + KST_OFFSET_MS);
    const yyyy = kst.getUTCFullYear();
    const mm = (kst.getUTCMonth() + 1).toString().padStart(2, '0');
    const dd = kst.getUTCDate().toString().padStart(2, '0');
    const hh = kst.getUTCHours().toString().padStart(2, '0');
    return `${yyyy}-${mm}-${dd} ${hh}:00`;
}

/**
 * Parses an HTTP `Date` header. Returns null when absent or unparseable.
 */
export function parseHttpDate(header: string | undefined | null): Date | null {
    if (!header) return null;
    const parsed = Date.parse(header);
    return Number.isNaN(parsed) ? null : new Date(parsed);
}

/**
 * Parses the dates Genie prints on album pages: `2018.06.15`, `2018-06-15` or `2018/06/15`.
 * Returns the UTC midnight of that day.
 */
export function parseGenieDate(text: string): Date | null {
    const match = text.match(/(\d{4})[.\-/](\d{1,2})[.\-/](\d{1,2})/);
    if (!match) return null;

    const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
        return null;
    }
    return date;
}
