import { config as loadDotenv } from 'dotenv';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

// Load environment variables from .env file in the repo root
// config.ts is at: services/worker/src/lib/config.ts
const currentFile = fileURLToPath(import.meta.url);
const currentDir = dirname(currentFile);
const rootDir = resolve(currentDir, '..', '..', '..', '..');
loadDotenv({ path: resolve(rootDir, '.env') });

const ConfigSchema = z.object({
  nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
  logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Database (system of record for accessions)
  databaseUrl: z.string().url(),

  // S3 / MinIO / Spaces
  s3Endpoint: z.string().url().optional(),
  s3AccessKeyId: z.string().min(1),
  s3SecretAccessKey: z.string().min(1),
  s3Region: z.string().default('us-east-1'),
  s3ForcePathStyle: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),
  s3Bucket: z.string().min(1),
  s3PresignExpirySeconds: z.coerce.number().int().positive().default(3600),

  // Browsertrix crawling service
  crawlerBaseUrl: z.string().url(),
  crawlerUsername: z.string().min(1),
  crawlerPassword: z.string().min(1),
  crawlerOrgId: z.string().uuid(),
  crawlerRequestTimeoutSeconds: z.coerce.number().positive().default(30),
  facebookProfileId: z.string().optional(),

  // Worker scheduling
  workerPollIntervalSeconds: z.coerce.number().positive().default(5),
  workerBatchSize: z.coerce.number().int().positive().default(10),

  // Ingestion pipeline
  crawlPollIntervalSeconds: z.coerce.number().positive().default(60),
  crawlMaxWaitMinutes: z.coerce.number().positive().default(30),
  ingestionMaxAttempts: z.coerce.number().int().min(1).default(5),
  ingestionRetryBackoffSeconds: z.coerce.number().min(0).default(60),
  ingestionClaimTimeoutSeconds: z.coerce.number().positive().default(600),
});

export type Config = z.infer<typeof ConfigSchema>;

let config: Config | null = null;

export function loadConfig(): Config {
  if (config) {
    return config;
  }

  const raw = {
    nodeEnv: process.env.NODE_ENV,
    logLevel: process.env.LOG_LEVEL,
    databaseUrl: process.env.DATABASE_URL,
    s3Endpoint: process.env.S3_ENDPOINT,
    s3AccessKeyId: process.env.S3_ACCESS_KEY_ID,
    s3SecretAccessKey: process.env.S3_SECRET_ACCESS_KEY,
    s3Region: process.env.S3_REGION,
    s3ForcePathStyle: process.env.S3_FORCE_PATH_STYLE,
    s3Bucket: process.env.S3_BUCKET,
    s3PresignExpirySeconds: process.env.S3_PRESIGN_EXPIRY_SECONDS,
    crawlerBaseUrl: process.env.BROWSERTRIX_URL,
    crawlerUsername: process.env.BROWSERTRIX_USERNAME,
    crawlerPassword: process.env.BROWSERTRIX_PASSWORD,
    crawlerOrgId: process.env.BROWSERTRIX_ORG_ID,
    crawlerRequestTimeoutSeconds: process.env.BROWSERTRIX_REQUEST_TIMEOUT_SECONDS,
    facebookProfileId: process.env.BROWSERTRIX_FACEBOOK_PROFILE_ID,
    workerPollIntervalSeconds: process.env.WORKER_POLL_INTERVAL_SECONDS,
    workerBatchSize: process.env.WORKER_BATCH_SIZE,
    crawlPollIntervalSeconds: process.env.CRAWL_POLL_INTERVAL_SECONDS,
    crawlMaxWaitMinutes: process.env.CRAWL_MAX_WAIT_MINUTES,
    ingestionMaxAttempts: process.env.INGESTION_MAX_ATTEMPTS,
    ingestionRetryBackoffSeconds: process.env.INGESTION_RETRY_BACKOFF_SECONDS,
    ingestionClaimTimeoutSeconds: process.env.INGESTION_CLAIM_TIMEOUT_SECONDS,
  };

  const result = ConfigSchema.safeParse(raw);

  if (!result.success) {
    throw new Error(`Invalid configuration: ${result.error.message}`);
  }

  config = result.data;
  return config;
}

/**
 * Drop the memoised configuration so the next loadConfig() re-reads the environment
 */
export function resetConfig(): void {
  config = null;
}
