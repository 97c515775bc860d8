/**
 * Crawler - builds every component from one frozen config and runs the configured mode.
 *
 * Collaborators may be injected to replace the file, HTTP and Redis defaults.
 */

import { CrawlerConfig } from '../utils/config-manager';
import { createEnhancedLogger } from '../utils/logger';
import { ApiClientOptions, CrawlerApi, PlatformApiClient } from './api-client';
import { ConcurrencyGate } from './concurrency-gate';
import { CredentialSource, FileCredentialSource } from './cookie-manager';
import { HandlerReport } from './crawler.types';
import { ScraperErrors } from './errors';
import { CheckpointStore } from './db/checkpoint';
import { FileCheckpointStore } from './db/checkpoint-repo';
import { createRedisClient } from './db/redis';
import { RedisCheckpointStore } from './db/redis-checkpoint-repo';
import { createHandler, ModeHandler } from './handlers';
import { CommentProcessor } from './processors/comment-processor';
import { ItemProcessor } from './processors/item-processor';
import { ProxyPool, ProxyProvider } from './proxy-manager';
import { FileProxyProvider, HttpProxyProvider } from './proxy-providers';
import { CredentialPool } from './session-manager';
import { HttpSignGateway, SignGateway } from './sign-gateway';
import { ContentSink, JsonLinesSink } from './storage';

const logger = createEnhancedLogger('Crawler');

export interface CrawlerComponents {
  credentialSource?: CredentialSource;
  proxyProvider?: ProxyProvider;
  signGateway?: SignGateway;
  /** null disables checkpointing regardless of config. */
  store?: CheckpointStore | null;
  sink?: ContentSink;
  /** Replaces the HTTP client entirely; pools and gateway are then unused. */
  api?: CrawlerApi;
}

export function clientOptionsFrom(config: CrawlerConfig): ApiClientOptions {
  const { timing } = config;
  return {
    apiBaseUrl: config.apiBaseUrl,
    userAgent: config.userAgent,
    requestTimeoutMs: timing.requestTimeoutMs,
    proxyEnabled: config.proxy.enabled,
    maxBindAttempts: timing.maxBindAttempts,
    bindRetryDelayMs: timing.bindRetryDelayMs,
    transportAttempts: timing.transportAttempts,
    retryDelayMs: timing.retryDelayMs,
    rateLimitDelayMs: timing.rateLimitDelayMs,
    signAttempts: timing.signAttempts,
    signDelayMs: timing.signDelayMs,
  };
}

function createProxyProvider(config: CrawlerConfig): ProxyProvider {
  const { proxy } = config;
  if (proxy.provider === 'file') {
    return new FileProxyProvider({ proxyDir: proxy.dir, ttlSeconds: proxy.ttlSeconds });
  }
  if (!proxy.apiUrl) {
    throw ScraperErrors.invalidConfiguration('proxy.apiUrl is required for the http provider');
  }
  return new HttpProxyProvider({
    apiUrl: proxy.apiUrl,
    user: proxy.user,
    password: proxy.password,
    timeoutMs: config.timing.requestTimeoutMs,
  });
}

export function createCheckpointStore(config: CrawlerConfig): CheckpointStore | null {
  const { checkpoint, redis } = config;
  if (!checkpoint.enabled) return null;
  if (checkpoint.storage === 'redis') {
    const client = createRedisClient({
      host: redis.host,
      port: redis.port,
      db: redis.db,
      password: redis.password,
    });
    return new RedisCheckpointStore(client, redis.keyPrefix);
  }
  return new FileCheckpointStore(checkpoint.dir);
}

export class Crawler {
  readonly gate: ConcurrencyGate;
  readonly credentialPool: CredentialPool;
  readonly proxyPool: ProxyPool | null;
  readonly api: CrawlerApi;
  readonly store: CheckpointStore | null;
  readonly sink: ContentSink;
  readonly handler: ModeHandler;
  private readonly ownsClient: boolean;

  constructor(
    readonly config: CrawlerConfig,
    components: CrawlerComponents = {},
  ) {
    this.gate = new ConcurrencyGate({
      itemConcurrency: config.itemConcurrency,
      commentConcurrency: config.commentConcurrency,
    });

    this.credentialPool = new CredentialPool(
      components.credentialSource ?? new FileCredentialSource(config.credentials.dir),
    );

    this.proxyPool = config.proxy.enabled
      ? new ProxyPool(components.proxyProvider ?? createProxyProvider(config), {
          poolCount: config.proxy.poolCount,
          validate: config.proxy.validate,
          probeUrl: config.proxy.probeUrl,
          probeTimeoutMs: config.timing.requestTimeoutMs,
          acquireAttempts: config.timing.proxyAcquireAttempts,
          acquireDelayMs: config.timing.proxyAcquireDelayMs,
        })
      : null;

    this.ownsClient = components.api === undefined;
    this.api =
      components.api ??
      new PlatformApiClient(
        this.credentialPool,
        this.proxyPool,
        components.signGateway ?? new HttpSignGateway({ url: config.sign.url, timeoutMs: config.sign.timeoutMs }),
        clientOptionsFrom(config),
      );

    this.store = components.store !== undefined ? components.store : createCheckpointStore(config);
    this.sink = components.sink ?? new JsonLinesSink({ outputDir: config.outputDir, mode: config.mode });

    const items = new ItemProcessor(this.api, this.gate, this.sink, this.store);
    const comments = new CommentProcessor(this.api, this.gate, this.sink, this.store, {
      enableComments: config.enableComments,
      enableSubComments: config.enableSubComments,
      maxCommentsPerItem: config.maxCommentsPerItem,
      pageDelayMs: config.pageDelayMs,
    });

    this.handler = createHandler(config.mode, {
      api: this.api,
      store: this.store,
      sink: this.sink,
      items,
      comments,
      config,
    });
  }

  /**
   * Loads credentials and runs the configured mode handler to completion.
   */
  async run(signal?: AbortSignal): Promise<HandlerReport> {
    if (this.ownsClient) {
      await this.credentialPool.load();
      logger.info(`Loaded ${this.credentialPool.activeCount()} active credentials`);
    }
    logger.info(`Starting ${this.config.mode} crawl`, {
      platform: this.config.platform,
      checkpoint: this.store ? 'enabled' : 'disabled',
      proxy: this.proxyPool ? 'enabled' : 'disabled',
    });
    return logger.trackAsync(`${this.config.mode} crawl`, () => this.handler.run(signal));
  }

  async close(): Promise<void> {
    await this.sink.close();
    if (this.store) await this.store.close();
  }
}
