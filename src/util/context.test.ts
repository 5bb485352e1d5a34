import { getJobId, jobLogFields, runWithJob, tickJob } from './context';

describe('Job context', () => {
    it('should expose the job inside the callback only', async () => {
        expect(getJobId()).toBeUndefined();

        const seen = await runWithJob({ id: 'fetch-0317', minute: 17 }, async () => {
            await Promise.resolve();
            return getJobId();
        });

        expect(seen).toBe('fetch-0317');
        expect(getJobId()).toBeUndefined();
    });

    it('should name ticks by kind and UTC time', () => {
        expect(tickJob('update', new Date(Date.UTC(2024, 0, 1, 3, 0)))).toEqual({ id: 'update-0300', minute: 0 });
        expect(tickJob('fetch', new Date(Date.UTC(2024, 0, 1, 23, 7)))).toEqual({ id: 'fetch-2307', minute: 7 });
    });

    describe('jobLogFields', () => {
        it('should be empty outside a job', () => {
            expect(jobLogFields()).toEqual({});
        });

        it('should carry the job and the minute of a tick', () => {
            const fields = runWithJob(tickJob('fetch', new Date(Date.UTC(2024, 0, 1, 12, 17))), () => jobLogFields());
            expect(fields).toEqual({ job: 'fetch-1217', minute: 17 });
        });

        it('should leave the minute out for CLI commands', () => {
            expect(runWithJob({ id: 'cli-fetch' }, () => jobLogFields())).toEqual({ job: 'cli-fetch' });
        });
    });
});
