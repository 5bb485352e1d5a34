import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  DATA_DIR: z.string().default('./data'),
  DB_FILE: z.string().default('kstreams.sqlite'),
  GENIE_BASE_URL: z.string().url().default('https://www.genie.co.kr'),
  TRACKING_QUOTA: z.string().default('3540').transform(Number).pipe(z.number().int().positive()),
  RELEASE_HOUR_UTC: z.string().default('9').transform(Number).pipe(z.number().int().min(0).max(23)),
  FETCH_NEWEST: z.string().default('false').transform(val => val.toLowerCase() === 'true'),
  HEALTH_PORT: z.string().default('3000').transform(Number).pipe(z.number().int().positive()),
});

export type Env = z.infer<typeof envSchema>;

function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(error => {
      console.error(`- ${error.path.join('.')}: ${error.message}`);
    });
    process.exit(1);
  }

  return result.data;
}

const env = validateEnv();
export default env;
