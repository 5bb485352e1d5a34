import http from 'http';
import net from 'net';
import {
    STALE_AFTER_MS,
    getHealthState,
    handleHealthRequest,
    resetHealthState,
    setAppStatus,
    updateComponentStatus
} from './health';

jest.mock('../util/logger', () => ({
    __esModule: true,
    default: {
        info: jest.fn(),
        error: jest.fn()
    }
}));

function request(url: string) {
    const req = new http.IncomingMessage(new net.Socket());
    req.url = url;
    const res = new http.ServerResponse(req);
    const writeHead = jest.spyOn(res, 'writeHead');
    const end = jest.spyOn(res, 'end').mockImplementation(() => res);

    handleHealthRequest(req, res);

    return { writeHead, end };
}

describe('Health Check', () => {
    beforeEach(() => {
        jest.clearAllMocks();
        resetHealthState();
    });

    it('should report ok right after startup', () => {
        const state = getHealthState();

        expect(state.status).toBe('ok');
        expect(state.appStatus).toBe('idle');
        expect(state.lastRunTime).toBeNull();
        expect(state.isStale).toBe(false);
        expect(state.components.genie.status).toBe('disabled');
        expect(state.components.database.status).toBe('disabled');
    });

    it('should become stale when no tick finishes in time', () => {
        const state = getHealthState(Date.now() + STALE_AFTER_MS + 1000);

        expect(state.isStale).toBe(true);
        expect(state.status).toBe('error');
    });

    it('should count staleness from the last finished tick', () => {
        setAppStatus('running');
        setAppStatus('idle');
        const { lastRunTime } = getHealthState();

        expect(lastRunTime).not.toBeNull();
        expect(getHealthState((lastRunTime ?? 0) + STALE_AFTER_MS).isStale).toBe(false);
        expect(getHealthState((lastRunTime ?? 0) + STALE_AFTER_MS + 1).isStale).toBe(true);
    });

    it('should report component errors', () => {
        updateComponentStatus('database', 'error', 'SQLITE_BUSY: database is locked');
        const state = getHealthState();

        expect(state.status).toBe('error');
        expect(state.components.database).toEqual(expect.objectContaining({
            status: 'error',
            message: 'SQLITE_BUSY: database is locked'
        }));
    });

    it('should keep running ticks out of lastRunTime', () => {
        setAppStatus('running');
        expect(getHealthState().appStatus).toBe('running');
        expect(getHealthState().lastRunTime).toBeNull();
    });

    describe('HTTP handler', () => {
        it('should answer 200 with the state on /health', () => {
            const { writeHead, end } = request('/health');

            expect(writeHead).toHaveBeenCalledWith(200, { 'Content-Type': 'application/json' });
            const body = JSON.parse(String(end.mock.calls[0][0]));
            expect(body.status).toBe('ok');
            expect(body.components.genie.status).toBe('disabled');
        });

        it('should answer 500 while a component is failing', () => {
            updateComponentStatus('genie', 'error', 'HTTP 503');

            const { writeHead } = request('/health?verbose=1');

            expect(writeHead).toHaveBeenCalledWith(500, { 'Content-Type': 'application/json' });
        });

        it('should answer 404 elsewhere', () => {
            const { writeHead, end } = request('/');

            expect(writeHead).toHaveBeenCalledWith(404, { 'Content-Type': 'text/plain' });
            expect(end).toHaveBeenCalledWith('Not Found');
        });
    });
});
