import { UPDATE_MINUTE, assignFetchMinute, msUntilNextMinute, tickKindFor } from './schedule';

describe('Scheduler Logic', () => {

    describe('assignFetchMinute', () => {
        it('should always hand out a minute between 1 and 59', () => {
            for (let i = 0; i < 2000; i++) {
                const minute = assignFetchMinute(String(89000000 + i));
                expect(minute).toBeGreaterThanOrEqual(1);
                expect(minute).toBeLessThanOrEqual(59);
            }
        });

        it('should never hand out the update minute', () => {
            const minutes = new Set<number>();
            for (let i = 0; i < 5900; i++) {
                minutes.add(assignFetchMinute(String(i)));
            }
            expect(minutes.has(UPDATE_MINUTE)).toBe(false);
        });

        it('should spread song IDs over every fetch minute', () => {
            const minutes = new Set<number>();
            for (let i = 0; i < 5900; i++) {
                minutes.add(assignFetchMinute(String(i)));
            }
            expect(minutes.size).toBe(59);
        });

        it('should be stable for the same song ID', () => {
            expect(assignFetchMinute('89145340')).toBe(assignFetchMinute('89145340'));
        });
    });

    describe('tickKindFor', () => {
        it('should run the update at minute 0', () => {
            expect(tickKindFor(0)).toBe('update');
        });

        it('should fetch at every other minute', () => {
            expect(tickKindFor(1)).toBe('fetch');
            expect(tickKindFor(30)).toBe('fetch');
            expect(tickKindFor(59)).toBe('fetch');
        });
    });

    describe('msUntilNextMinute', () => {
        it('should count down to the next minute boundary', () => {
            const now = new Date(Date.UTC(2024, 0, 1, 10, 15, 30, 250));
            expect(msUntilNextMinute(now)).toBe(29750);
        });

        it('should wait a full minute when called on a boundary', () => {
            const now = new Date(Date.UTC(2024, 0, 1, 10, 15, 0, 0));
            expect(msUntilNextMinute(now)).toBe(60000);
        });
    });
});
