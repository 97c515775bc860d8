import * as os from 'os';
import * as path from 'path';
import { CrawlerApi } from '../../core/api-client';
import { ConcurrencyGate } from '../../core/concurrency-gate';
import { CheckpointRedis, RedisCheckpointStore } from '../../core/db/redis-checkpoint-repo';
import { parseEnv } from '../../core/env';
import { HandlerDeps } from '../../core/handlers';
import { CommentProcessor } from '../../core/processors/comment-processor';
import { ItemProcessor } from '../../core/processors/item-processor';
import { MemorySink } from '../../core/storage';
import { ConfigManager, ConfigOverrides, CrawlerConfig } from '../../utils/config-manager';

/** In-memory stand-in for the handful of ioredis commands the checkpoint store uses. */
export class FakeRedis implements CheckpointRedis {
  readonly strings = new Map<string, string>();
  readonly hashes = new Map<string, Map<string, string>>();
  readonly sortedSets = new Map<string, Map<string, number>>();
  failing = false;
  quitCalled = false;

  async get(key: string): Promise<string | null> {
    this.check();
    return this.strings.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<unknown> {
    this.check();
    this.strings.set(key, value);
    return 'OK';
  }

  async hget(key: string, field: string): Promise<string | null> {
    this.check();
    return this.hashes.get(key)?.get(field) ?? null;
  }

  async hset(key: string, field: string, value: string): Promise<unknown> {
    this.check();
    const hash = this.hashes.get(key) ?? new Map<string, string>();
    hash.set(field, value);
    this.hashes.set(key, hash);
    return 1;
  }

  async hgetall(key: string): Promise<Record<string, string>> {
    this.check();
    return Object.fromEntries(this.hashes.get(key) ?? []);
  }

  async zadd(key: string, score: number, member: string): Promise<unknown> {
    this.check();
    const set = this.sortedSets.get(key) ?? new Map<string, number>();
    set.set(member, score);
    this.sortedSets.set(key, set);
    return 1;
  }

  async zrevrange(key: string, start: number, stop: number): Promise<string[]> {
    this.check();
    const members = [...(this.sortedSets.get(key) ?? new Map<string, number>())]
      .sort((a, b) => b[1] - a[1])
      .map(([member]) => member);
    return members.slice(start, stop + 1);
  }

  async quit(): Promise<unknown> {
    this.quitCalled = true;
    return 'OK';
  }

  private check(): void {
    if (this.failing) throw new Error('connection lost');
  }
}

/** A checkpoint store kept entirely in memory, with a clock that ticks on every read. */
export function memoryStore(): RedisCheckpointStore {
  let clock = 1_700_000_000_000;
  return new RedisCheckpointStore(new FakeRedis(), 'test', () => clock++);
}

const NO_CONFIG_DIR = path.join(os.tmpdir(), 'crawler-tests-without-config');

/** Defaults plus `overrides`, with no config file, no environment and no page delay. */
export function testConfig(overrides: ConfigOverrides): CrawlerConfig {
  return new ConfigManager({
    env: parseEnv({ NODE_ENV: 'test' }),
    cwd: NO_CONFIG_DIR,
    overrides: { pageDelayMs: 0, ...overrides },
  }).getConfig();
}

function unexpected(name: string): () => Promise<never> {
  return async () => {
    throw new Error(`unexpected ${name} call`);
  };
}

/** A CrawlerApi whose operations fail unless a test supplies them. */
export function fakeApi(overrides: Partial<CrawlerApi> = {}): CrawlerApi {
  return {
    searchPage: unexpected('searchPage'),
    itemDetail: unexpected('itemDetail'),
    commentPage: unexpected('commentPage'),
    subCommentPage: unexpected('subCommentPage'),
    profile: unexpected('profile'),
    userPostPage: unexpected('userPostPage'),
    feedPage: unexpected('feedPage'),
    ...overrides,
  };
}

export interface TestDeps extends HandlerDeps {
  sink: MemorySink;
  store: RedisCheckpointStore;
  gate: ConcurrencyGate;
}

export function createDeps(config: CrawlerConfig, api: CrawlerApi, store: RedisCheckpointStore = memoryStore()): TestDeps {
  const gate = new ConcurrencyGate({
    itemConcurrency: config.itemConcurrency,
    commentConcurrency: config.commentConcurrency,
  });
  const sink = new MemorySink();
  return {
    api,
    store,
    sink,
    gate,
    config,
    items: new ItemProcessor(api, gate, sink, store),
    comments: new CommentProcessor(api, gate, sink, store, {
      enableComments: config.enableComments,
      enableSubComments: config.enableSubComments,
      maxCommentsPerItem: config.maxCommentsPerItem,
      pageDelayMs: config.pageDelayMs,
    }),
  };
}
