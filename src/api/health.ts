import http from 'http';
import logger from '../util/logger';

export type AppStatus = 'idle' | 'running' | 'error';
export type ComponentStatus = 'ok' | 'error' | 'disabled';

interface ComponentHealth {
    status: ComponentStatus;
    lastCheck: string | null;
    message?: string;
}

export interface HealthState {
    status: 'ok' | 'error';
    appStatus: AppStatus;
    lastRunStr: string | null;
    lastRunTime: number | null;
    uptimeSeconds: number;
    components: Record<string, ComponentHealth>;
    isStale: boolean;
}

/** Ticks run every minute; five missed minutes means the scheduler is stuck or dead. */
export const STALE_AFTER_MS = 5 * 60 * 1000;

let currentAppStatus: AppStatus = 'idle';
let lastRunTime: number | null = null;
let startTime = Date.now();

let components: Record<string, ComponentHealth> = {};

export function resetHealthState() {
    currentAppStatus = 'idle';
    lastRunTime = null;
    startTime = Date.now();
    components = {
        genie: { status: 'disabled', lastCheck: null },
        database: { status: 'disabled', lastCheck: null }
    };
}

resetHealthState();

export function setAppStatus(status: AppStatus) {
    currentAppStatus = status;
    if (status === 'idle') {
        lastRunTime = Date.now();
    }
}

export function updateComponentStatus(name: string, status: ComponentStatus, message?: string) {
    components[name] = {
        status,
        lastCheck: new Date().toISOString(),
        message
    };
}

export function getHealthState(now: number = Date.now()): HealthState {
    // Staleness: no tick finished within the threshold, counted from the
    // last finished tick or, before the first one, from startup.
    const reference = lastRunTime ?? startTime;
    const isStale = now - reference > STALE_AFTER_MS;

    const hasComponentErrors = Object.values(components).some(c => c.status === 'error');
    const isHealthy = !isStale && !hasComponentErrors;

    return {
        status: isHealthy ? 'ok' : 'error',
        appStatus: currentAppStatus,
        lastRunStr: lastRunTime ? new Date(lastRunTime).toISOString() : null,
        lastRunTime,
        uptimeSeconds: Math.floor((now - startTime) / 1000),
        components,
        isStale
    };
}

export function handleHealthRequest(req: http.IncomingMessage, res: http.ServerResponse) {
    const url = new URL(req.url ?? '/', 'http://localhost');

    if (url.pathname === '/health') {
        const state = getHealthState();
        res.writeHead(state.status === 'ok' ? 200 : 500, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify(state, null, 2));
        return;
    }

    res.writeHead(404, { 'Content-Type': 'text/plain' });
    res.end('Not Found');
}

export function startHealthServer(port: number = 3000): http.Server {
    logger.info(`Starting health check server on port ${port}...`);

    const server = http.createServer(handleHealthRequest);
    server.on('error', (err) => {
        logger.error(`Health server error: ${err.message}`);
    });
    server.listen(port);
    return server;
}
