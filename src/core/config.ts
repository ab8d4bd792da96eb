/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (upstream endpoint, headers, paging, pacing, operator bounds,
 * output directory) is funnelled through this file. Other modules import
 * `config` instead of reading process.env directly.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * (e.g. "800" → 800) at startup. Anything missing or invalid exits the process
 * immediately with the tree of issues. The result is a nested `config` object
 * exported with `as const`.
 *
 * The upstream header values default to exactly what the public register's
 * own web page sends; the server checks Origin and Referer before answering.
 */
import 'dotenv/config';

import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** Single POST endpoint; the server dispatches on `slug`/`method` inside the body. */
  REGISTRY_API_URL: z.url().default('https://www.difc.com/api/handleRequest'),
  REGISTRY_ORIGIN: z.string().min(1).default('https://www.difc.com'),
  REGISTRY_REFERER: z.string().min(1).default('https://www.difc.com/business/public-register'),
  /** Public page for one company; `?companyId=<Id>` is appended. */
  REGISTRY_DETAILS_PAGE_URL: z
    .url()
    .default('https://www.difc.com/business/public-register/public-register-details'),
  REGISTRY_USER_AGENT: z.string().min(1).default('Mozilla/5.0'),

  REGISTRY_PAGE_SIZE: z.coerce.number().int().positive().default(200),
  REGISTRY_REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(800),
  REGISTRY_REQUEST_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  SCRAPE_MIN_TARGET: z.coerce.number().int().positive().default(10),
  SCRAPE_MAX_TARGET: z.coerce.number().int().positive().default(5000),
  SCRAPE_DEFAULT_TARGET: z.coerce.number().int().positive().default(200),

  RUN_RETENTION_MS: z.coerce.number().int().min(0).default(3_600_000),
  RUN_MAX_RETAINED: z.coerce.number().int().positive().default(50),

  EXPORT_OUTPUT_DIR: z.string().default('./output'),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  log: {
    level: env.LOG_LEVEL,
  },

  registry: {
    apiUrl: env.REGISTRY_API_URL,
    detailsPageUrl: env.REGISTRY_DETAILS_PAGE_URL,
    headers: {
      origin: env.REGISTRY_ORIGIN,
      referer: env.REGISTRY_REFERER,
      userAgent: env.REGISTRY_USER_AGENT,
    },
    pageSize: env.REGISTRY_PAGE_SIZE,
    requestDelayMs: env.REGISTRY_REQUEST_DELAY_MS,
    requestTimeoutMs: env.REGISTRY_REQUEST_TIMEOUT_MS,
  },

  /** Bounds the operator surfaces (CLI, HTTP) put on the target record count. */
  scrape: {
    minTarget: env.SCRAPE_MIN_TARGET,
    maxTarget: env.SCRAPE_MAX_TARGET,
    defaultTarget: env.SCRAPE_DEFAULT_TARGET,
  },

  /** How long finished HTTP runs (and their workbooks) stay downloadable. */
  runs: {
    retentionMs: env.RUN_RETENTION_MS,
    maxRetained: env.RUN_MAX_RETAINED,
  },

  export: {
    outputDir: env.EXPORT_OUTPUT_DIR,
  },
} as const;

export type AppConfig = typeof config;
