import PQueue from 'p-queue';
import Bottleneck from 'bottleneck';
import Axios, { AxiosRequestConfig, AxiosResponse } from 'axios';
import logger from './logger';
import config from './config';

// ============================================================================
// P-QUEUE: Job Concurrency Control
// ============================================================================

/**
 * Fetch Queue
 * Limits how many song pages are fetched in parallel during one minute.
 * The limiter below still spaces the actual requests.
 */
export const fetchQueue = new PQueue({ concurrency: 2 });

// ============================================================================
// BOTTLENECK: HTTP Rate Limiting
// ============================================================================

/**
 * Genie Rate Limiter
 * One request at a time, min `scraper.minTimeMs` (200ms default) between requests.
 */
export const genieLimiter = new Bottleneck({
    maxConcurrent: 1,
    minTime: config.scraper.minTimeMs
});

// ============================================================================
// ERROR HANDLERS - Prevent queue hangs from unhandled rejections
// ============================================================================

genieLimiter.on('error', (err) => {
    logger.error('[Genie Limiter] Unhandled error in queue:', err);
});

genieLimiter.on('failed', (err) => {
    logger.warn(`[Genie] Job failed: ${err.message}`);
    return null; // Don't retry within Bottleneck, retry logic is in retryOperation
});

// ============================================================================
// RATE-LIMITED AXIOS FACTORY
// ============================================================================

export interface RateLimitedAxios {
    get: <T = unknown>(url: string, config?: AxiosRequestConfig) => Promise<AxiosResponse<T>>;
}

/**
 * Creates a rate-limited axios instance using the provided limiter.
 * All HTTP calls through this instance will be queued through Bottleneck.
 */
export function createRateLimitedAxios(
    baseAxios: ReturnType<typeof Axios.create>,
    limiter: Bottleneck,
    serviceName: string
): RateLimitedAxios {
    return {
        get: <T = unknown>(url: string, requestConfig?: AxiosRequestConfig) => {
            logger.debug(`[${serviceName}] Scheduling GET ${url}`);
            return limiter.schedule(() => baseAxios.get<T>(url, requestConfig));
        },
    };
}

const genieAxios = Axios.create({
    baseURL: config.scraper.baseUrl,
    timeout: config.scraper.timeoutMs,
    responseType: 'text',
    headers: {
        'User-Agent': 'Mozilla/5.0 (compatible; kstreams/0.2)',
        'Accept-Language': 'ko-KR,ko;q=0.9'
    }
});

// Pre-configured for the Genie client (used in scraper/genie.ts)
export const genieHttp = createRateLimitedAxios(genieAxios, genieLimiter, 'Genie');
