import { describe, expect, it, vi } from 'vitest';
import { CrawlerApi } from '../../core/api-client';
import { clientOptionsFrom, createCheckpointStore, Crawler } from '../../core/crawler';
import { FileCheckpointStore } from '../../core/db/checkpoint-repo';
import { RedisCheckpointStore } from '../../core/db/redis-checkpoint-repo';
import { DetailHandler, HomefeedHandler } from '../../core/handlers';
import { MemorySink } from '../../core/storage';
import { FakeRedis, fakeApi, testConfig } from './fixtures';

describe('Crawler', () => {
  it('runs the configured mode on injected components', async () => {
    const config = testConfig({ mode: 'detail', itemIds: ['1', '2'], enableComments: false });
    const itemDetail = vi.fn<CrawlerApi['itemDetail']>(async (itemId) => ({ aweme_detail: { aweme_id: itemId } }));
    const redis = new FakeRedis();
    const sink = new MemorySink();
    const crawler = new Crawler(config, {
      api: fakeApi({ itemDetail }),
      store: new RedisCheckpointStore(redis, 'test'),
      sink,
    });

    const report = await crawler.run();
    await crawler.close();

    expect(crawler.handler).toBeInstanceOf(DetailHandler);
    expect(report.mode).toBe('detail');
    expect(report.counters.itemsSaved).toBe(2);
    expect(sink.contents.map((record) => record.contentId)).toEqual(['1', '2']);
    expect(redis.quitCalled).toBe(true);
  });

  it('runs without checkpoints when the store is null', async () => {
    const config = testConfig({ mode: 'homefeed', maxItemsCount: 1, enableComments: false });
    const feedPage = vi.fn<CrawlerApi['feedPage']>(async () => ({
      StatusCode: 0,
      cards: [{ type: 1, aweme: JSON.stringify({ aweme_id: 'f1' }) }],
    }));
    const crawler = new Crawler(config, { api: fakeApi({ feedPage }), store: null, sink: new MemorySink() });

    const report = await crawler.run();

    expect(crawler.handler).toBeInstanceOf(HomefeedHandler);
    expect(crawler.store).toBeNull();
    expect(report.checkpointId).toBeNull();
    expect(report.counters.itemsSaved).toBe(1);
  });

  it('builds a proxy pool only when proxies are enabled', () => {
    const direct = new Crawler(testConfig({ mode: 'homefeed' }), { store: null, sink: new MemorySink() });
    const proxied = new Crawler(
      testConfig({ mode: 'homefeed', proxy: { enabled: true, provider: 'file', dir: '/tmp/proxies' } }),
      { store: null, sink: new MemorySink() },
    );

    expect(direct.proxyPool).toBeNull();
    expect(proxied.proxyPool).not.toBeNull();
  });
});

describe('createCheckpointStore', () => {
  it('returns null when checkpointing is disabled', () => {
    expect(createCheckpointStore(testConfig({ mode: 'homefeed', checkpoint: { enabled: false } }))).toBeNull();
  });

  it('defaults to the file store', () => {
    const store = createCheckpointStore(testConfig({ mode: 'homefeed', checkpoint: { dir: '/tmp/checkpoints' } }));

    expect(store).toBeInstanceOf(FileCheckpointStore);
  });
});

describe('clientOptionsFrom', () => {
  it('maps timing and proxy settings onto the client', () => {
    const config = testConfig({
      mode: 'homefeed',
      proxy: { enabled: true, provider: 'file' },
      timing: { maxBindAttempts: 4, signAttempts: 2, retryDelayMs: 0 },
    });

    expect(clientOptionsFrom(config)).toMatchObject({
      proxyEnabled: true,
      maxBindAttempts: 4,
      signAttempts: 2,
      retryDelayMs: 0,
      transportAttempts: 5,
      requestTimeoutMs: 10000,
    });
  });
});
