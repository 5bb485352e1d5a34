import { z } from 'zod';
import yaml from 'js-yaml';
import fs from 'fs';
import path from 'path';
import logger from './logger';
import env from './env';
import { errorMessage } from './errors';

// --- Zod Schemas ---

const DatabaseSchema = z.object({
  dir: z.string().min(1).optional(),
  file: z.string().min(1).optional(),
});

const TrackingSchema = z.object({
  quota: z.number().int().positive().optional(),
  pruneWindowDays: z.number().positive().default(10),
});

const UpdateSchema = z.object({
  fetchNewest: z.boolean().optional(),
  concurrency: z.number().int().min(1).max(10).default(2),
});

const ScraperSchema = z.object({
  baseUrl: z.string().url().optional(),
  minTimeMs: z.number().int().min(0).default(200),
  timeoutMs: z.number().int().positive().default(30000),
  releaseHourUtc: z.number().int().min(0).max(23).optional(),
  top200Pages: z.number().int().min(1).max(4).default(4),
  newestPages: z.number().int().min(1).default(1),
});

const ConfigFileSchema = z.object({
  database: DatabaseSchema.default({}),
  tracking: TrackingSchema.default({}),
  update: UpdateSchema.default({}),
  scraper: ScraperSchema.default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface Config {
  database: { dir: string; file: string };
  tracking: { quota: number; pruneWindowDays: number };
  update: { fetchNewest: boolean; concurrency: number };
  scraper: {
    baseUrl: string;
    minTimeMs: number;
    timeoutMs: number;
    releaseHourUtc: number;
    top200Pages: number;
    newestPages: number;
  };
  health: { port: number };
}

// --- Loader Logic ---

function readYaml(filePath: string): unknown {
  logger.info(`Loading configuration from ${filePath}`);
  try {
    const fileContents = fs.readFileSync(filePath, 'utf8');
    return yaml.load(fileContents) ?? {};
  } catch (e: unknown) {
    logger.error(`Failed to parse config.yaml: ${errorMessage(e)}`);
    process.exit(1);
  }
}

function loadConfig(): Config {
  const configPath = path.resolve(process.cwd(), 'config', 'config.yaml');
  const fallbackPath = path.resolve(process.cwd(), 'config.yaml');

  let loadedConfig: unknown = {};

  if (fs.existsSync(configPath)) {
    loadedConfig = readYaml(configPath);
  } else if (fs.existsSync(fallbackPath)) {
    loadedConfig = readYaml(fallbackPath);
  } else {
    logger.info('No config.yaml found. Using Environment Variables only.');
  }

  const result = ConfigFileSchema.safeParse(loadedConfig);
  if (!result.success) {
    logger.error('Configuration validation failed:');
    result.error.issues.forEach(err => {
      logger.error(`- ${err.path.join('.')}: ${err.message}`);
    });
    process.exit(1);
  }

  const file = result.data;

  // --- Hybrid Merge: file values win, ENV fills the gaps ---

  return {
    database: {
      dir: file.database.dir ?? env.DATA_DIR,
      file: file.database.file ?? env.DB_FILE,
    },
    tracking: {
      quota: file.tracking.quota ?? env.TRACKING_QUOTA,
      pruneWindowDays: file.tracking.pruneWindowDays,
    },
    update: {
      fetchNewest: file.update.fetchNewest ?? env.FETCH_NEWEST,
      concurrency: file.update.concurrency,
    },
    scraper: {
      baseUrl: (file.scraper.baseUrl ?? env.GENIE_BASE_URL).replace(/\/$/, ''),
      minTimeMs: file.scraper.minTimeMs,
      timeoutMs: file.scraper.timeoutMs,
      releaseHourUtc: file.scraper.releaseHourUtc ?? env.RELEASE_HOUR_UTC,
      top200Pages: file.scraper.top200Pages,
      newestPages: file.scraper.newestPages,
    },
    health: {
      port: env.HEALTH_PORT,
    },
  };
}

const config = loadConfig();
export default config;
export { loadConfig };
