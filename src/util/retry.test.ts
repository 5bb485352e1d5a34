import { AxiosError, AxiosHeaders } from 'axios';
import { isRetryable, retryOperation } from './retry';
import logger from './logger';

jest.mock('./logger', () => ({
    __esModule: true,
    default: {
        warn: jest.fn()
    }
}));

function httpError(status: number): AxiosError {
    const config = { headers: new AxiosHeaders() };
    return new AxiosError(`Request failed with status code ${status}`, 'ERR_BAD_RESPONSE', config, null, {
        data: '',
        status,
        statusText: '',
        headers: {},
        config
    });
}

describe('retryOperation', () => {
    beforeEach(() => {
        jest.clearAllMocks();
    });

    it('should return the first successful result', async () => {
        const operation = jest.fn()
            .mockRejectedValueOnce(new Error('socket hang up'))
            .mockResolvedValue('<html></html>');

        await expect(retryOperation(operation, 'fetch song 1', 3, 0)).resolves.toBe('<html></html>');
        expect(operation).toHaveBeenCalledTimes(2);
        expect(logger.warn).toHaveBeenCalledWith('Failed to fetch song 1, retrying in 0s... (1/3)');
    });

    it('should give up after the last attempt', async () => {
        const operation = jest.fn().mockRejectedValue(httpError(503));

        await expect(retryOperation(operation, 'fetch song 1', 3, 0)).rejects.toThrow('Request failed with status code 503');
        expect(operation).toHaveBeenCalledTimes(3);
    });

    it('should not retry pages that do not exist', async () => {
        const operation = jest.fn().mockRejectedValue(httpError(404));

        await expect(retryOperation(operation, 'fetch album 1', 3, 0)).rejects.toThrow('Request failed with status code 404');
        expect(operation).toHaveBeenCalledTimes(1);
        expect(logger.warn).not.toHaveBeenCalled();
    });

    describe('isRetryable', () => {
        it('should retry server errors, throttling and network failures', () => {
            expect(isRetryable(httpError(500))).toBe(true);
            expect(isRetryable(httpError(429))).toBe(true);
            expect(isRetryable(new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED'))).toBe(true);
            expect(isRetryable(new Error('Unexpected response body for song 1'))).toBe(true);
        });

        it('should not retry other client errors', () => {
            expect(isRetryable(httpError(400))).toBe(false);
            expect(isRetryable(httpError(404))).toBe(false);
        });
    });
});
