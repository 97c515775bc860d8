import { z } from 'zod';

const intString = z
  .string()
  .regex(/^\d+$/, 'expected a non-negative integer')
  .transform((val) => parseInt(val, 10));

const boolString = z.enum(['true', 'false']).transform((val) => val === 'true');

const listString = z.string().transform((val) =>
  val
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0),
);

// Crawler keys carry no defaults here: ConfigManager owns defaults so that a config file can
// sit between them and the environment.
export const envSchema = z.object({
  // Node Environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Logging
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_DIR: z.string().default('logs'),
  LOG_TO_FILE: boolString.default('true'),

  // Crawl
  CRAWLER_CONFIG_FILE: z.string().optional(),
  CRAWLER_PLATFORM: z.string().optional(),
  CRAWLER_TYPE: z.enum(['search', 'detail', 'creator', 'homefeed']).optional(),
  KEYWORDS: listString.optional(),
  ITEM_IDS: listString.optional(),
  CREATOR_IDS: listString.optional(),
  MAX_ITEMS_COUNT: intString.optional(),
  PAGE_DELAY_MS: intString.optional(),
  ENABLE_COMMENTS: boolString.optional(),
  ENABLE_SUB_COMMENTS: boolString.optional(),
  MAX_COMMENTS_PER_ITEM: intString.optional(),
  ITEM_CONCURRENCY: intString.optional(),
  COMMENT_CONCURRENCY: intString.optional(),
  USER_AGENT: z.string().optional(),
  OUTPUT_DIR: z.string().optional(),

  // Checkpoint
  ENABLE_CHECKPOINT: boolString.optional(),
  CHECKPOINT_ID: z.string().optional(),
  CHECKPOINT_STORAGE: z.enum(['file', 'redis']).optional(),
  CHECKPOINT_DIR: z.string().optional(),

  // Proxy
  ENABLE_PROXY: boolString.optional(),
  PROXY_PROVIDER: z.enum(['http', 'file']).optional(),
  PROXY_POOL_COUNT: intString.optional(),
  PROXY_VALIDATE: boolString.optional(),
  PROXY_PROBE_URL: z.string().url().optional(),
  PROXY_API_URL: z.string().url().optional(),
  PROXY_USER: z.string().optional(),
  PROXY_PASSWORD: z.string().optional(),
  PROXY_DIR: z.string().optional(),
  PROXY_TTL_SECONDS: intString.optional(),

  // Identity & signing
  CREDENTIALS_DIR: z.string().optional(),
  SIGN_SERVICE_URL: z.string().url().optional(),

  // Redis
  REDIS_HOST: z.string().optional(),
  REDIS_PORT: intString.optional(),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_DB: intString.optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  return envSchema.parse(source);
}

export const env = parseEnv(process.env);
