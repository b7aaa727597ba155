/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * I funnel every run setting (input roots, file patterns, output root,
 * Parquet tuning, log level) through this file so there's one place to look
 * and one place to validate. No other module reads process.env directly; the
 * container hands this object to the WarehouseService, which passes the paths
 * down to each pipeline explicitly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "4096" → 4096) at startup. If anything is missing or invalid, the
 * process exits immediately with a clear error — a half-configured ETL run
 * would otherwise overwrite tables with garbage. The result is a nested
 * `config` object exported with `as const`.
 *
 * Storage credentials are deliberately absent: the pipelines only ever see
 * local paths, and whatever mounts or syncs those paths owns the credentials.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),

  /** Root directory holding both raw datasets (song_data/ and log_data/). */
  WAREHOUSE_INPUT_DIR: z.string().min(1).default('./data'),
  /** Root directory the five table directories are written under. */
  WAREHOUSE_OUTPUT_DIR: z.string().min(1).default('./output'),

  /** Fixed-depth pattern of song metadata files, relative to the input root. */
  SONG_DATA_PATTERN: z.string().min(1).default('song_data/*/*/*/*.json'),
  /** Fixed-depth pattern of event log files, relative to the input root. */
  LOG_DATA_PATTERN: z.string().min(1).default('log_data/*/*/*.json'),

  /** Rows buffered per Parquet row group before it is flushed to disk. */
  PARQUET_ROW_GROUP_SIZE: z.coerce.number().int().min(1).default(4096),

  /** Emit a progress log line every N records read. */
  PROGRESS_INTERVAL: z.coerce.number().int().min(1).default(10_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  input: {
    rootDir: env.WAREHOUSE_INPUT_DIR,
    songPattern: env.SONG_DATA_PATTERN,
    logPattern: env.LOG_DATA_PATTERN,
  },

  output: {
    rootDir: env.WAREHOUSE_OUTPUT_DIR,
  },

  etl: {
    rowGroupSize: env.PARQUET_ROW_GROUP_SIZE,
    progressInterval: env.PROGRESS_INTERVAL,
  },
} as const;

export type AppConfig = typeof config;
