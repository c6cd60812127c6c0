import { config } from 'dotenv';
import { z } from 'zod';
import type { CrawlTarget } from '../types';
import { ConfigurationError } from '../utils/errors';

config();

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  URL_VILLAS: z.string().url(),
  URL_VILLAS_RENTS: z.string().url(),
  URL_LANDS: z.string().url(),

  MONGODB_URI: z.string().min(1).default('mongodb://localhost:27017'),
  MONGODB_DATABASE: z.string().min(1).default('listings'),
  MONGODB_COLLECTION: z.string().min(1).default('dataset'),

  REDIS_HOST: z.string().min(1).default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),

  LINK_MAX_ATTEMPTS: z.coerce.number().int().positive().default(20),
  LINK_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(10000),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RUN_MAX_ATTEMPTS: z.coerce.number().int().positive().default(10),
  RUN_RETRY_DELAY_MS: z.coerce.number().int().nonnegative().default(20000),
  CRAWL_WORKERS: z.coerce.number().int().positive().default(1),
  MAX_PAGES: z.coerce.number().int().positive().optional(),

  LOCAL_CURRENCY: z.string().min(1).default('IDR'),
  CHROMIUM_PATH: z.string().min(1).optional(),
  HEADLESS: booleanFlag.default('true'),

  CRAWL_SCHEDULE: z.string().min(1).optional(),
  RUN_ON_START: booleanFlag.default('true'),

  LOG_DIR: z.string().min(1).optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  NODE_ENV: z.string().default('development'),
});

export type Env = z.infer<typeof envSchema>;

export interface AppConfig {
  nodeEnv: string;
  targets: CrawlTarget[];
  mongodb: {
    uri: string;
    database: string;
    collection: string;
  };
  redis: {
    host: string;
    port: number;
  };
  queue: {
    name: string;
  };
  crawl: {
    linkMaxAttempts: number;
    linkRetryDelayMs: number;
    fetchTimeoutMs: number;
    workers: number;
    maxPages?: number;
  };
  run: {
    maxAttempts: number;
    retryDelayMs: number;
    schedule?: string;
    runOnStart: boolean;
  };
  browser: {
    executablePath?: string;
    headless: boolean;
  };
  currency: {
    local: string;
  };
  logging: {
    level: Env['LOG_LEVEL'];
    dir?: string;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Treat empty strings as unset so defaults apply
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== '')
  );

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid environment variables: ${issues}`);
  }

  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    targets: [
      { propertyType: 'villa-sale', url: e.URL_VILLAS },
      { propertyType: 'villa-rent', url: e.URL_VILLAS_RENTS },
      { propertyType: 'land', url: e.URL_LANDS },
    ],
    mongodb: {
      uri: e.MONGODB_URI,
      database: e.MONGODB_DATABASE,
      collection: e.MONGODB_COLLECTION,
    },
    redis: {
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
    },
    queue: {
      name: 'crawl-runs',
    },
    crawl: {
      linkMaxAttempts: e.LINK_MAX_ATTEMPTS,
      linkRetryDelayMs: e.LINK_RETRY_DELAY_MS,
      fetchTimeoutMs: e.FETCH_TIMEOUT_MS,
      workers: e.CRAWL_WORKERS,
      maxPages: e.MAX_PAGES,
    },
    run: {
      maxAttempts: e.RUN_MAX_ATTEMPTS,
      retryDelayMs: e.RUN_RETRY_DELAY_MS,
      schedule: e.CRAWL_SCHEDULE,
      runOnStart: e.RUN_ON_START,
    },
    browser: {
      executablePath: e.CHROMIUM_PATH,
      headless: e.HEADLESS,
    },
    currency: {
      local: e.LOCAL_CURRENCY,
    },
    logging: {
      level: e.LOG_LEVEL,
      dir: e.LOG_DIR,
    },
  };
}
