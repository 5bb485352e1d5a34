import { AsyncLocalStorage } from 'async_hooks';
import type { TickKind } from './schedule';

/** What log lines are written on behalf of: a scheduler tick or a CLI command. */
export interface Job {
    id: string;
    /** Minute of the hour a tick serves; absent for CLI commands */
    minute?: number;
}

const jobs = new AsyncLocalStorage<Job>();

export function currentJob(): Job | undefined {
    return jobs.getStore();
}

export function getJobId(): string | undefined {
    return jobs.getStore()?.id;
}

export function runWithJob<T>(job: Job, callback: () => T): T {
    return jobs.run(job, callback);
}

/**
 * Job for a scheduler tick, e.g. `update-0300` or `fetch-0317` (UTC clock).
 */
export function tickJob(kind: TickKind, at: Date): Job {
    const hh = at.getUTCHours().toString().padStart(2, '0');
    const minute = at.getUTCMinutes();
    return { id: `${kind}-${hh}${minute.toString().padStart(2, '0')}`, minute };
}

/** Fields merged into every log line written inside a job. */
export function jobLogFields(): { job?: string; minute?: number } {
    const job = currentJob();
    if (!job) return {};
    return job.minute === undefined ? { job: job.id } : { job: job.id, minute: job.minute };
}
