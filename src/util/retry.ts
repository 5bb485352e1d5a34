import { isAxiosError } from 'axios';
import logger from './logger';

/**
 * Network failures, 5xx and 429 are worth another attempt. Any other HTTP
 * status (a removed song or album page answers 404) is final.
 */
export function isRetryable(error: unknown): boolean {
    if (!isAxiosError(error) || !error.response) return true;
    const { status } = error.response;
    return status >= 500 || status === 429;
}

export async function retryOperation<T>(operation: () => Promise<T>, name: string, retries = 3, delay = 2000): Promise<T> {
    for (let attempt = 1; attempt <= retries; attempt++) {
        try {
            return await operation();
        } catch (error) {
            if (attempt === retries || !isRetryable(error)) throw error;
            logger.warn(`Failed to ${name}, retrying in ${delay / 1000}s... (${attempt}/${retries})`);
            await new Promise(resolve => setTimeout(resolve, delay));
        }
    }
    throw new Error(`Failed to ${name} after ${retries} retries`);
}
