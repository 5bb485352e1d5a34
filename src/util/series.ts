import { DAY_MS, HOUR_MS, ceilHour, formatKstPeriod } from './time';

export interface Sample {
    /** Epoch milliseconds */
    at: number;
    value: number;
}

export interface HourlyPoint {
    /** KST label of the hour, e.g. `2018-09-18 11:00` */
    period: string;
    /** Epoch milliseconds of the start of the hour */
    start: number;
    value: number | null;
}

export interface HourlySeries {
    name: string;
    points: HourlyPoint[];
}

function normalize(samples: Sample[]): Sample[] {
    const sorted = [...samples].sort((a, b) => a.at - b.at);
    const unique: Sample[] = [];
    for (const sample of sorted) {
        if (unique.length > 0 && unique[unique.length - 1].at === sample.at) continue;
        unique.push(sample);
    }
    return unique;
}

/**
 * Resamples cumulative counter readings onto whole hours.
 *
 * Each hour from the first whole hour after the first reading up to the last
 * reading gets the linearly interpolated counter value, truncated. An hour
 * whose next reading is more than an hour away is `null`.
 */
export function interpolateHourly(samples: Sample[]): Array<{ start: number; value: number | null }> {
    const data = normalize(samples);
    if (data.length === 0) return [];

    const first = ceilHour(data[0].at);
    const last = data[data.length - 1].at;
    const grid: Array<{ start: number; value: number | null }> = [];

    let cursor = 0;
    for (let hour = first; hour <= last; hour += HOUR_MS) {
        // advance to the first reading at or after this hour
        while (data[cursor].at < hour) cursor++;
        const next = data[cursor];

        if (next.at - hour > HOUR_MS) {
            grid.push({ start: hour, value: null });
            continue;
        }

        if (next.at === hour || cursor === 0) {
            grid.push({ start: hour, value: Math.trunc(next.value) });
            continue;
        }

        const prev = data[cursor - 1];
        const ratio = (hour - prev.at) / (next.at - prev.at);
        const value = prev.value + (next.value - prev.value) * ratio;
        grid.push({ start: hour, value: Math.trunc(value) });
    }

    return grid;
}

/**
 * Turns cumulative readings into per-hour gains labelled in KST.
 *
 * The value of an hour is the counter growth from its start to the start of
 * the next hour; the last grid hour has no successor and is left out.
 */
export function hourlyGains(name: string, samples: Sample[]): HourlySeries {
    const grid = interpolateHourly(samples);
    const points: HourlyPoint[] = [];

    for (let i = 0; i < grid.length - 1; i++) {
        const current = grid[i].value;
        const following = grid[i + 1].value;
        points.push({
            period: formatKstPeriod(grid[i].start),
            start: grid[i].start,
            value: current === null || following === null ? null : following - current,
        });
    }

    return { name, points };
}

/**
 * Average of the non-null values in the last `days` days of the series,
 * counted back from its last period. `null` when nothing qualifies.
 */
export function meanOverLastDays(series: HourlySeries, days: number): number | null {
    if (series.points.length === 0) return null;

    const lastStart = series.points[series.points.length - 1].start;
    const cutoff = lastStart + HOUR_MS - days * DAY_MS;

    let sum = 0;
    let count = 0;
    for (const point of series.points) {
        if (point.start < cutoff || point.value === null) continue;
        sum += point.value;
        count++;
    }

    return count === 0 ? null : sum / count;
}
