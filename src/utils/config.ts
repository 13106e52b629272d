import path from 'path';
import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  HEADLESS: booleanFlag.default('true'),
  DATA_DIR: z.string().min(1).default('data'),
  CRAWL_DELAY_MS: z.coerce.number().int().nonnegative().default(1500),
  CRAWL_JITTER_MS: z.coerce.number().int().nonnegative().default(1000),
  DETAIL_JITTER_MS: z.coerce.number().int().nonnegative().default(1000),
  DETAIL_RETRY_BUDGET: z.coerce.number().int().nonnegative().default(2),
  DETAIL_BACKOFF_MS: z.coerce.number().int().nonnegative().default(2000),
  DETAIL_ENRICH_LIMIT: z.coerce.number().int().nonnegative().default(20),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DETAIL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  MAX_CONCURRENT_TASKS: z.coerce.number().int().positive().default(2),
  BROWSER_EXECUTABLE_PATH: z.string().min(1).optional(),
  BROWSER_CHANNEL: z.string().min(1).optional(),
  USER_AGENT: z.string().min(1).optional(),
});

export interface BrowserConfig {
  headless: boolean;
  timeout: number;
  executablePath?: string;
  channel?: string;
  userAgent?: string;
}

export interface CrawlerConfig {
  port: number;
  dataDir: string;
  browser: BrowserConfig;
  politeness: {
    baseDelayMs: number;
    jitterMs: number;
    backoffUnitMs: number;
  };
  detail: {
    retryBudget: number;
    enrichLimit: number;
    jitterMs: number;
    timeout: number;
  };
  maxConcurrentTasks: number;
}

export function getConfig(env: NodeJS.ProcessEnv = process.env): CrawlerConfig {
  const parsed = envSchema.parse(env);

  return {
    port: parsed.PORT,
    dataDir: path.resolve(process.cwd(), parsed.DATA_DIR),
    browser: {
      headless: parsed.HEADLESS,
      timeout: parsed.NAVIGATION_TIMEOUT_MS,
      executablePath: parsed.BROWSER_EXECUTABLE_PATH,
      channel: parsed.BROWSER_CHANNEL,
      userAgent: parsed.USER_AGENT,
    },
    politeness: {
      baseDelayMs: parsed.CRAWL_DELAY_MS,
      jitterMs: parsed.CRAWL_JITTER_MS,
      backoffUnitMs: parsed.DETAIL_BACKOFF_MS,
    },
    detail: {
      retryBudget: parsed.DETAIL_RETRY_BUDGET,
      enrichLimit: parsed.DETAIL_ENRICH_LIMIT,
      jitterMs: parsed.DETAIL_JITTER_MS,
      timeout: parsed.DETAIL_TIMEOUT_MS,
    },
    maxConcurrentTasks: parsed.MAX_CONCURRENT_TASKS,
  };
}
