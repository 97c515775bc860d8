/**
 * Core Module Exports
 * 统一导出核心模块，建立清晰的模块边界
 */

export * from './crawler.types';
export * from './models';

// Errors
export {
  ErrorClassifier,
  ErrorCode,
  type ErrorContext,
  handleError,
  hasErrorCode,
  isFatalError,
  isIdentityError,
  isTransientError,
  ScraperError,
  ScraperErrors,
} from './errors';

// Resource pools
export {
  type CredentialRecord,
  type CredentialSource,
  FileCredentialSource,
  StaticCredentialSource,
} from './cookie-manager';
export { CredentialPool } from './session-manager';
export { ProxyPool, type ProxyPoolOptions, type ProxyProbe, type ProxyProvider } from './proxy-manager';
export { FileProxyProvider, HttpProxyProvider } from './proxy-providers';

// Request client
export { type SignGateway, type SignRequest, HttpSignGateway } from './sign-gateway';
export { type ApiClientOptions, ClientState, type CrawlerApi, PlatformApiClient } from './api-client';
export { ConcurrencyGate, Semaphore } from './concurrency-gate';

// Checkpoints
export type { Checkpoint, CheckpointItem, CheckpointStore, ItemStatusPatch } from './db/checkpoint';
export { FileCheckpointStore } from './db/checkpoint-repo';
export { type CheckpointRedis, RedisCheckpointStore } from './db/redis-checkpoint-repo';
export { createRedisClient } from './db/redis';

// Records and storage
export * from './extractor';
export { type ContentSink, JsonLinesSink, MemorySink } from './storage';

// Crawl
export { CommentProcessor, type CommentProcessorOptions } from './processors/comment-processor';
export { ItemProcessor } from './processors/item-processor';
export { createHandler, type HandlerDeps, type ModeHandler } from './handlers';
export { Crawler, type CrawlerComponents, createCheckpointStore } from './crawler';
