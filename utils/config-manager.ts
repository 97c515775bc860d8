/**
 * 统一配置管理器
 * 默认值 < 配置文件 < 环境变量 < CLI 覆盖，合并后由 zod 校验并深度冻结
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { DEFAULT_PLATFORM, DEFAULT_USER_AGENT, PLATFORM_API_BASE_URL, PUBLISH_TIME_TYPES, SEARCH_SORT_TYPES } from '../config/constants';
import { CRAWL_MODES } from '../core/crawler.types';
import { env as processEnv, Env } from '../core/env';
import { ScraperErrors } from '../core/errors';
import { isJsonRecord, safeJsonParse } from './safe-json';

const DEFAULT_CONFIG_FILE = 'crawler.config.json';

const positiveInt = z.number().int().min(1);
const nonNegativeInt = z.number().int().min(0);
const concurrency = z.number().int().min(1).max(16);

export const crawlerConfigSchema = z
  .object({
    platform: z.string().min(1),
    mode: z.enum(CRAWL_MODES),
    keywords: z.array(z.string().min(1)),
    itemIds: z.array(z.string().min(1)),
    creatorIds: z.array(z.string().min(1)),
    maxItemsCount: positiveInt,
    pageDelayMs: nonNegativeInt,
    enableComments: z.boolean(),
    enableSubComments: z.boolean(),
    maxCommentsPerItem: nonNegativeInt,
    itemConcurrency: concurrency,
    commentConcurrency: concurrency,
    userAgent: z.string().min(1),
    apiBaseUrl: z.string().url(),
    outputDir: z.string().min(1),

    search: z.object({
      sortType: z.nativeEnum(SEARCH_SORT_TYPES),
      publishTime: z.nativeEnum(PUBLISH_TIME_TYPES),
    }),

    homefeed: z.object({
      tagId: nonNegativeInt,
    }),

    checkpoint: z.object({
      enabled: z.boolean(),
      id: z.string().min(1).optional(),
      storage: z.enum(['file', 'redis']),
      dir: z.string().min(1),
    }),

    proxy: z.object({
      enabled: z.boolean(),
      provider: z.enum(['http', 'file']),
      poolCount: positiveInt,
      validate: z.boolean(),
      probeUrl: z.string().url(),
      apiUrl: z.string().url().optional(),
      user: z.string().optional(),
      password: z.string().optional(),
      dir: z.string().min(1),
      ttlSeconds: positiveInt,
    }),

    credentials: z.object({
      dir: z.string().min(1),
    }),

    sign: z.object({
      url: z.string().url(),
      timeoutMs: positiveInt,
    }),

    timing: z.object({
      requestTimeoutMs: positiveInt,
      maxBindAttempts: positiveInt,
      bindRetryDelayMs: nonNegativeInt,
      transportAttempts: positiveInt,
      retryDelayMs: nonNegativeInt,
      rateLimitDelayMs: nonNegativeInt,
      signAttempts: positiveInt,
      signDelayMs: nonNegativeInt,
      proxyAcquireAttempts: positiveInt,
      proxyAcquireDelayMs: nonNegativeInt,
    }),

    redis: z.object({
      host: z.string().min(1),
      port: z.number().int().min(1).max(65535),
      db: nonNegativeInt,
      password: z.string().optional(),
      keyPrefix: z.string().min(1),
    }),

    logging: z.object({
      level: z.enum(['debug', 'info', 'warn', 'error']),
      dir: z.string().min(1),
    }),
  })
  .superRefine((config, ctx) => {
    const required = {
      search: ['keywords', config.keywords],
      detail: ['itemIds', config.itemIds],
      creator: ['creatorIds', config.creatorIds],
    } as const;
    if (config.mode !== 'homefeed') {
      const [field, values] = required[config.mode];
      if (values.length === 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [field], message: `${config.mode} mode needs ${field}` });
      }
    }
    if (config.proxy.enabled && config.proxy.provider === 'http' && !config.proxy.apiUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['proxy', 'apiUrl'],
        message: 'the http proxy provider needs apiUrl',
      });
    }
  });

type ConfigShape = z.output<typeof crawlerConfigSchema>;

export type DeepReadonly<T> = T extends ReadonlyArray<infer U>
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type CrawlerConfig = DeepReadonly<ConfigShape>;

export type DeepPartial<T> = T extends ReadonlyArray<unknown>
  ? T
  : T extends object
    ? { [K in keyof T]?: DeepPartial<T[K]> }
    : T;

export type ConfigOverrides = DeepPartial<ConfigShape>;

export const DEFAULT_CONFIG: ConfigShape = {
  platform: DEFAULT_PLATFORM,
  mode: 'search',
  keywords: [],
  itemIds: [],
  creatorIds: [],
  maxItemsCount: 40,
  pageDelayMs: 1000,
  enableComments: true,
  enableSubComments: false,
  maxCommentsPerItem: 0,
  itemConcurrency: 1,
  commentConcurrency: 1,
  userAgent: DEFAULT_USER_AGENT,
  apiBaseUrl: PLATFORM_API_BASE_URL,
  outputDir: path.resolve(process.cwd(), 'output'),
  search: {
    sortType: SEARCH_SORT_TYPES.GENERAL,
    publishTime: PUBLISH_TIME_TYPES.UNLIMITED,
  },
  homefeed: {
    tagId: 0,
  },
  checkpoint: {
    enabled: true,
    storage: 'file',
    dir: path.resolve(process.cwd(), 'data', 'checkpoints'),
  },
  proxy: {
    enabled: false,
    provider: 'http',
    poolCount: 2,
    validate: true,
    probeUrl: 'https://httpbin.org/ip',
    dir: path.resolve(process.cwd(), 'data', 'proxies'),
    ttlSeconds: 600,
  },
  credentials: {
    dir: path.resolve(process.cwd(), 'data', 'credentials'),
  },
  sign: {
    url: 'http://127.0.0.1:8989/sign',
    timeoutMs: 10000,
  },
  timing: {
    requestTimeoutMs: 10000,
    maxBindAttempts: 10,
    bindRetryDelayMs: 1000,
    transportAttempts: 5,
    retryDelayMs: 1000,
    rateLimitDelayMs: 10000,
    signAttempts: 3,
    signDelayMs: 500,
    proxyAcquireAttempts: 3,
    proxyAcquireDelayMs: 1000,
  },
  redis: {
    host: '127.0.0.1',
    port: 6379,
    db: 0,
    keyPrefix: 'crawler',
  },
  // logging is read from the environment by the logger itself; the CLI may override the level
  logging: {
    level: processEnv.LOG_LEVEL,
    dir: path.resolve(process.cwd(), processEnv.LOG_DIR),
  },
};

type Layer = Record<string, unknown>;

/**
 * 合并配置对象（深度合并；数组整体替换，undefined 不覆盖）
 */
export function mergeConfig(target: Layer, source: unknown): Layer {
  const result: Layer = { ...target };
  if (!isJsonRecord(source)) return result;

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;
    const current = result[key];
    result[key] = isJsonRecord(value) && isJsonRecord(current) ? mergeConfig(current, value) : value;
  }
  return result;
}

/**
 * 环境变量映射为配置层（未设置的键为 undefined，合并时跳过）
 */
export function envLayer(env: Env): Layer {
  return {
    platform: env.CRAWLER_PLATFORM,
    mode: env.CRAWLER_TYPE,
    keywords: env.KEYWORDS,
    itemIds: env.ITEM_IDS,
    creatorIds: env.CREATOR_IDS,
    maxItemsCount: env.MAX_ITEMS_COUNT,
    pageDelayMs: env.PAGE_DELAY_MS,
    enableComments: env.ENABLE_COMMENTS,
    enableSubComments: env.ENABLE_SUB_COMMENTS,
    maxCommentsPerItem: env.MAX_COMMENTS_PER_ITEM,
    itemConcurrency: env.ITEM_CONCURRENCY,
    commentConcurrency: env.COMMENT_CONCURRENCY,
    userAgent: env.USER_AGENT,
    outputDir: env.OUTPUT_DIR,
    checkpoint: {
      enabled: env.ENABLE_CHECKPOINT,
      id: env.CHECKPOINT_ID,
      storage: env.CHECKPOINT_STORAGE,
      dir: env.CHECKPOINT_DIR,
    },
    proxy: {
      enabled: env.ENABLE_PROXY,
      provider: env.PROXY_PROVIDER,
      poolCount: env.PROXY_POOL_COUNT,
      validate: env.PROXY_VALIDATE,
      probeUrl: env.PROXY_PROBE_URL,
      apiUrl: env.PROXY_API_URL,
      user: env.PROXY_USER,
      password: env.PROXY_PASSWORD,
      dir: env.PROXY_DIR,
      ttlSeconds: env.PROXY_TTL_SECONDS,
    },
    credentials: {
      dir: env.CREDENTIALS_DIR,
    },
    sign: {
      url: env.SIGN_SERVICE_URL,
    },
    redis: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      password: env.REDIS_PASSWORD,
      db: env.REDIS_DB,
    },
  };
}

function deepFreeze(value: unknown): void {
  if (typeof value !== 'object' || value === null || Object.isFrozen(value)) return;
  Object.freeze(value);
  for (const child of Object.values(value)) deepFreeze(child);
}

export interface ConfigManagerOptions {
  /** Explicit config file; a missing explicit file is an error. */
  configFile?: string;
  env?: Env;
  overrides?: ConfigOverrides;
  cwd?: string;
}

export class ConfigManager {
  private readonly config: CrawlerConfig;
  private readonly configFilePath: string | null;

  constructor(private readonly options: ConfigManagerOptions = {}) {
    const env = options.env ?? processEnv;
    const explicit = options.configFile ?? env.CRAWLER_CONFIG_FILE;
    this.configFilePath = explicit
      ? path.resolve(options.cwd ?? process.cwd(), explicit)
      : path.resolve(options.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    this.config = this.load(env, explicit !== undefined);
  }

  /**
   * 加载配置（CLI > 环境变量 > 配置文件 > 默认值）
   */
  private load(env: Env, fileRequired: boolean): CrawlerConfig {
    let merged: Layer = { ...DEFAULT_CONFIG };
    merged = mergeConfig(merged, this.loadFromFile(fileRequired));
    merged = mergeConfig(merged, envLayer(env));
    merged = mergeConfig(merged, this.options.overrides);
    return this.validate(merged);
  }

  /**
   * 从文件加载配置
   */
  private loadFromFile(required: boolean): unknown {
    const filePath = this.configFilePath;
    if (!filePath || !fs.existsSync(filePath)) {
      if (required) {
        throw ScraperErrors.invalidConfiguration(`Config file not found: ${filePath}`, { filePath });
      }
      return {};
    }

    try {
      return safeJsonParse(fs.readFileSync(filePath, 'utf-8'));
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      throw ScraperErrors.invalidConfiguration(`Failed to load config file ${filePath}: ${reason}`, { filePath });
    }
  }

  /**
   * 验证配置
   */
  private validate(candidate: Layer): CrawlerConfig {
    const parsed = crawlerConfigSchema.safeParse(candidate);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw ScraperErrors.invalidConfiguration(`Invalid configuration: ${issues.join('; ')}`, { issues });
    }
    const config: CrawlerConfig = parsed.data;
    deepFreeze(config);
    return config;
  }

  /**
   * 获取完整配置（已冻结）
   */
  getConfig(): CrawlerConfig {
    return this.config;
  }

  getConfigFilePath(): string | null {
    return this.configFilePath;
  }
}
