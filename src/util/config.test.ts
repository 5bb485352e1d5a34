import path from 'path';

// Explicit mocks
const mockExistsSync = jest.fn();
const mockReadFileSync = jest.fn();

jest.mock('fs', () => ({
  __esModule: true,
  default: {
    existsSync: mockExistsSync,
    readFileSync: mockReadFileSync,
  },
  existsSync: mockExistsSync,
  readFileSync: mockReadFileSync,
}));

jest.mock('./logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    warn: jest.fn(),
  }
}));

const defaultEnv = {
    DATA_DIR: './data',
    DB_FILE: 'kstreams.sqlite',
    GENIE_BASE_URL: 'https://www.genie.co.kr',
    TRACKING_QUOTA: 3540,
    RELEASE_HOUR_UTC: 9,
    FETCH_NEWEST: false,
    HEALTH_PORT: 3000
};
let mockEnv = { ...defaultEnv };

jest.mock('./env', () => {
    return {
        __esModule: true,
        default: new Proxy({}, {
            get: (_target, prop) => Reflect.get(mockEnv, prop)
        })
    };
});

const mainConfigPath = path.resolve(process.cwd(), 'config', 'config.yaml');
const fallbackConfigPath = path.resolve(process.cwd(), 'config.yaml');

describe('Config Loader', () => {
    let mockExit: jest.SpyInstance;

    beforeEach(() => {
        jest.clearAllMocks();
        // Make process.exit throw so we stop execution
        mockExit = jest.spyOn(process, 'exit').mockImplementation((code?: string | number | null) => {
            throw new Error(`Process.exit called with ${code}`);
        });

        jest.resetModules();
        mockEnv = { ...defaultEnv };
        mockExistsSync.mockReturnValue(false);
    });

    afterEach(() => {
        mockExit.mockRestore();
    });

    it('should fall back to environment variables without config.yaml', () => {
        mockEnv.TRACKING_QUOTA = 100;
        mockEnv.FETCH_NEWEST = true;

        const config = require('./config').default;

        expect(config.database).toEqual({ dir: './data', file: 'kstreams.sqlite' });
        expect(config.tracking).toEqual({ quota: 100, pruneWindowDays: 10 });
        expect(config.update).toEqual({ fetchNewest: true, concurrency: 2 });
        expect(config.scraper).toEqual({
            baseUrl: 'https://www.genie.co.kr',
            minTimeMs: 200,
            timeoutMs: 30000,
            releaseHourUtc: 9,
            top200Pages: 4,
            newestPages: 1
        });
        expect(config.health).toEqual({ port: 3000 });
        expect(mockReadFileSync).not.toHaveBeenCalled();
    });

    it('should let config/config.yaml values win over the environment', () => {
        mockExistsSync.mockImplementation((p: string) => p === mainConfigPath);
        mockReadFileSync.mockReturnValue([
            'database:',
            '  dir: /srv/kstreams',
            'tracking:',
            '  quota: 500',
            'scraper:',
            '  baseUrl: https://mirror.example.com/',
            '  releaseHourUtc: 3',
        ].join('\n'));

        const config = require('./config').default;

        expect(mockReadFileSync).toHaveBeenCalledWith(mainConfigPath, 'utf8');
        expect(config.database).toEqual({ dir: '/srv/kstreams', file: 'kstreams.sqlite' });
        expect(config.tracking).toEqual({ quota: 500, pruneWindowDays: 10 });
        expect(config.scraper.baseUrl).toBe('https://mirror.example.com');
        expect(config.scraper.releaseHourUtc).toBe(3);
        expect(config.scraper.top200Pages).toBe(4);
    });

    it('should read config.yaml from the working directory as a fallback', () => {
        mockExistsSync.mockImplementation((p: string) => p === fallbackConfigPath);
        mockReadFileSync.mockReturnValue('update:\n  concurrency: 4\n');

        const config = require('./config').default;

        expect(mockReadFileSync).toHaveBeenCalledWith(fallbackConfigPath, 'utf8');
        expect(config.update).toEqual({ fetchNewest: false, concurrency: 4 });
    });

    it('should treat an empty config.yaml as no overrides', () => {
        mockExistsSync.mockImplementation((p: string) => p === mainConfigPath);
        mockReadFileSync.mockReturnValue('');

        const config = require('./config').default;

        expect(config.tracking.quota).toBe(3540);
    });

    it('should exit on invalid values', () => {
        mockExistsSync.mockImplementation((p: string) => p === mainConfigPath);
        mockReadFileSync.mockReturnValue('tracking:\n  quota: -5\n');

        expect(() => require('./config')).toThrow('Process.exit called with 1');
        expect(mockExit).toHaveBeenCalledWith(1);
    });

    it('should exit on unparseable YAML', () => {
        mockExistsSync.mockImplementation((p: string) => p === mainConfigPath);
        mockReadFileSync.mockReturnValue('database: [unclosed');

        expect(() => require('./config')).toThrow('Process.exit called with 1');
    });
});
