import { describe, expect, it, vi } from 'vitest';
import { CrawlerApi } from '../../core/api-client';
import { RawRecord } from '../../core/api-schemas';
import {
  createHandler,
  CreatorHandler,
  DetailHandler,
  HomefeedHandler,
  SearchHandler,
} from '../../core/handlers';
import { feedItems } from '../../core/handlers/homefeed-handler';
import { ErrorCode, ScraperErrors } from '../../core/errors';
import { createDeps, fakeApi, memoryStore, testConfig } from './fixtures';

function searchResults(keyword: string, offset: number): RawRecord[] {
  return Array.from({ length: 10 }, (_, i) => ({ aweme_info: { aweme_id: `${keyword}-${offset + i}` } }));
}

function contentCard(itemId: string) {
  return { type: 1, aweme: JSON.stringify({ aweme_id: itemId }) };
}

describe('createHandler', () => {
  it('returns the handler of each mode', () => {
    const config = testConfig({ mode: 'homefeed' });
    const deps = createDeps(config, fakeApi());

    expect(createHandler('search', deps)).toBeInstanceOf(SearchHandler);
    expect(createHandler('detail', deps)).toBeInstanceOf(DetailHandler);
    expect(createHandler('creator', deps)).toBeInstanceOf(CreatorHandler);
    expect(createHandler('homefeed', deps)).toBeInstanceOf(HomefeedHandler);
  });
});

describe('SearchHandler', () => {
  const config = testConfig({ mode: 'search', keywords: ['cats', 'dogs'], maxItemsCount: 20, enableComments: false });

  it('pages each keyword up to maxItemsCount and checkpoints the search session', async () => {
    const searchPage = vi.fn<CrawlerApi['searchPage']>(async (params) => ({
      data: searchResults(params.keyword, params.offset),
      extra: { logid: `log-${params.keyword}` },
      has_more: true,
    }));
    const deps = createDeps(config, fakeApi({ searchPage }));

    const report = await new SearchHandler(deps).run();

    expect(searchPage.mock.calls.map(([params]) => [params.keyword, params.offset, params.searchId])).toEqual([
      ['cats', 0, ''],
      ['cats', 10, 'log-cats'],
      ['dogs', 0, ''],
      ['dogs', 10, 'log-dogs'],
    ]);
    expect(report.counters.pages).toBe(4);
    expect(report.counters.itemsSaved).toBe(40);
    expect(report.failures).toEqual([]);
    expect(deps.sink.contents[0]).toMatchObject({ contentId: 'cats-0', sourceKeyword: 'cats' });

    const checkpoint = await deps.store.loadById(report.checkpointId ?? '');
    expect(checkpoint?.search).toEqual({ keyword: 'dogs', page: 3, searchId: 'log-dogs' });
  });

  it('resumes a cancelled run at the saved keyword, page and search session', async () => {
    let cancelOnce = true;
    const searchPage = vi.fn<CrawlerApi['searchPage']>(async (params) => {
      if (params.keyword === 'cats' && params.offset === 10 && cancelOnce) {
        cancelOnce = false;
        throw ScraperErrors.cancelled();
      }
      return {
        data: searchResults(params.keyword, params.offset),
        extra: { logid: `log-${params.keyword}` },
        has_more: true,
      };
    });
    const deps = createDeps(config, fakeApi({ searchPage }));

    await expect(new SearchHandler(deps).run()).rejects.toMatchObject({ code: ErrorCode.CANCELLED });
    const saved = await deps.store.load(config.platform, 'search');
    expect(saved?.search).toEqual({ keyword: 'cats', page: 2, searchId: 'log-cats' });

    searchPage.mockClear();
    const report = await new SearchHandler(deps).run();

    expect(report.checkpointId).toBe(saved?.id);
    expect(searchPage.mock.calls[0][0]).toMatchObject({ keyword: 'cats', offset: 10, searchId: 'log-cats' });
    expect(searchPage).toHaveBeenCalledTimes(3);
    expect(report.counters.itemsSaved).toBe(30);
    expect(new Set(deps.sink.contents.map((record) => record.contentId)).size).toBe(40);
  });

  it('makes no requests when resuming a finished run', async () => {
    const searchPage = vi.fn<CrawlerApi['searchPage']>(async (params) => ({
      data: searchResults(params.keyword, params.offset),
      extra: { logid: 'log' },
      has_more: true,
    }));
    const deps = createDeps(config, fakeApi({ searchPage }));

    await new SearchHandler(deps).run();
    searchPage.mockClear();
    const report = await new SearchHandler(deps).run();

    expect(searchPage).not.toHaveBeenCalled();
    expect(report.counters.itemsSaved).toBe(0);
  });

  it('stops a keyword on missing data or the last page', async () => {
    const searchPage = vi.fn<CrawlerApi['searchPage']>(async (params) =>
      params.keyword === 'cats'
        ? { data: null }
        : { data: searchResults(params.keyword, params.offset), extra: { logid: 'log' }, has_more: false },
    );
    const deps = createDeps(config, fakeApi({ searchPage }));

    const report = await new SearchHandler(deps).run();

    expect(searchPage).toHaveBeenCalledTimes(2);
    expect(report.counters.pages).toBe(1);
    expect(report.counters.itemsSaved).toBe(10);
  });

  it('records a failed keyword and moves on to the next', async () => {
    const searchPage = vi.fn<CrawlerApi['searchPage']>(async (params) => {
      if (params.keyword === 'cats') throw ScraperErrors.networkError('socket hang up');
      return { data: searchResults(params.keyword, params.offset), extra: { logid: 'log' }, has_more: false };
    });
    const deps = createDeps(config, fakeApi({ searchPage }));

    const report = await new SearchHandler(deps).run();

    expect(report.counters.unitFailures).toBe(1);
    expect(report.failures).toEqual([
      { unit: 'keyword:cats', code: ErrorCode.NETWORK_ERROR, message: 'socket hang up' },
    ]);
    expect(report.counters.itemsSaved).toBe(10);
  });
});

describe('DetailHandler', () => {
  const config = testConfig({ mode: 'detail', itemIds: ['1', '2', '3'] });

  it('fetches items and their comments once across runs', async () => {
    const itemDetail = vi.fn<CrawlerApi['itemDetail']>(async (itemId) => ({ aweme_detail: { aweme_id: itemId } }));
    const commentPage = vi.fn<CrawlerApi['commentPage']>(async (itemId) => ({
      comments: [{ cid: `c-${itemId}` }],
      cursor: '20',
      has_more: false,
    }));
    const deps = createDeps(config, fakeApi({ itemDetail, commentPage }));

    const first = await new DetailHandler(deps).run();
    const second = await new DetailHandler(deps).run();

    expect(first.counters).toMatchObject({ itemsSaved: 3, commentsSaved: 3, itemsSkipped: 0 });
    expect(second.checkpointId).toBe(first.checkpointId);
    expect(second.counters).toMatchObject({ itemsSaved: 0, commentsSaved: 0, itemsSkipped: 3 });
    expect(itemDetail).toHaveBeenCalledTimes(3);
    expect(commentPage).toHaveBeenCalledTimes(3);
    expect(deps.sink.comments.map((record) => record.commentId)).toEqual(['c-1', 'c-2', 'c-3']);
  });

  it('runs without a checkpoint store', async () => {
    const itemDetail = vi.fn<CrawlerApi['itemDetail']>(async (itemId) => ({ aweme_detail: { aweme_id: itemId } }));
    const noComments = testConfig({ mode: 'detail', itemIds: ['1'], enableComments: false });
    const deps = { ...createDeps(noComments, fakeApi({ itemDetail })), store: null };

    const report = await new DetailHandler(deps).run();

    expect(report.checkpointId).toBeNull();
    expect(report.counters.itemsSaved).toBe(1);
  });
});

describe('CreatorHandler', () => {
  function postsOf(creatorId: string, from: number): RawRecord[] {
    return [{ aweme_id: `${creatorId}-${from}` }, { aweme_id: `${creatorId}-${from + 1}` }];
  }

  const profile = vi.fn<CrawlerApi['profile']>(async (creatorId) => ({
    user: { uid: creatorId, sec_uid: creatorId, nickname: `name ${creatorId}` },
  }));

  it('stores each profile and pages posts up to maxItemsCount', async () => {
    const config = testConfig({ mode: 'creator', creatorIds: ['u1', 'u2'], maxItemsCount: 4, enableComments: false });
    const userPostPage = vi.fn<CrawlerApi['userPostPage']>(async (creatorId, cursor) =>
      cursor === '0'
        ? { aweme_list: postsOf(creatorId, 1), max_cursor: '100', has_more: true }
        : { aweme_list: postsOf(creatorId, 3), max_cursor: '200', has_more: true },
    );
    const deps = createDeps(config, fakeApi({ profile, userPostPage }));

    const report = await new CreatorHandler(deps).run();

    expect(deps.sink.creators.map((record) => record.userId)).toEqual(['u1', 'u2']);
    expect(deps.sink.contents).toHaveLength(8);
    expect(report.counters.pages).toBe(4);
    expect(userPostPage.mock.calls.map(([creatorId, cursor]) => `${creatorId}@${cursor}`)).toEqual([
      'u1@0',
      'u1@100',
      'u2@0',
      'u2@100',
    ]);
    const checkpoint = await deps.store.loadById(report.checkpointId ?? '');
    expect(checkpoint?.creator).toEqual({ creatorId: 'u2', cursor: '200' });
  });

  it('keeps the cursor of a failed page and resumes from it', async () => {
    const config = testConfig({ mode: 'creator', creatorIds: ['u1'], maxItemsCount: 10, enableComments: false });
    let failOnce = true;
    const userPostPage = vi.fn<CrawlerApi['userPostPage']>(async (creatorId, cursor) => {
      if (cursor === '0') return { aweme_list: postsOf(creatorId, 1), max_cursor: '100', has_more: true };
      if (cursor === '100') {
        if (failOnce) {
          failOnce = false;
          throw ScraperErrors.networkError('socket hang up');
        }
        return { aweme_list: postsOf(creatorId, 3), max_cursor: '200', has_more: true };
      }
      return { aweme_list: [], max_cursor: '200', has_more: false };
    });
    const deps = createDeps(config, fakeApi({ profile, userPostPage }));

    const first = await new CreatorHandler(deps).run();
    expect(first.failures).toEqual([
      { unit: 'creator:u1', code: ErrorCode.NETWORK_ERROR, message: 'socket hang up' },
    ]);
    expect((await deps.store.loadById(first.checkpointId ?? ''))?.creator).toEqual({ creatorId: 'u1', cursor: '100' });

    const second = await new CreatorHandler(deps).run();

    expect(userPostPage.mock.calls.map(([, cursor]) => cursor)).toEqual(['0', '100', '100', '200']);
    expect(second.counters.itemsSaved).toBe(2);
    expect((await deps.store.loadById(second.checkpointId ?? ''))?.creator).toEqual({ creatorId: 'u1', cursor: '200' });
  });
});

describe('feedItems', () => {
  it('keeps parseable content cards only', () => {
    const items = feedItems({
      StatusCode: 0,
      cards: [contentCard('f1'), { type: 2, aweme: '{}' }, { type: 1, aweme: 'not json' }, { type: 1 }],
    });

    expect(items).toEqual([{ aweme_id: 'f1' }]);
  });
});

describe('HomefeedHandler', () => {
  it('pages by refresh index until enough items are stored', async () => {
    const config = testConfig({ mode: 'homefeed', maxItemsCount: 3, enableComments: false });
    const feedPage = vi.fn<CrawlerApi['feedPage']>(async (refreshIndex) =>
      refreshIndex === 0
        ? { StatusCode: 0, cards: [contentCard('f1'), { type: 2 }] }
        : { StatusCode: 0, cards: [contentCard('f2'), contentCard('f3'), contentCard('f4')] },
    );
    const deps = createDeps(config, fakeApi({ feedPage }));

    const report = await new HomefeedHandler(deps).run();

    expect(feedPage.mock.calls.map(([refreshIndex]) => refreshIndex)).toEqual([0, 20]);
    expect(deps.sink.contents.map((record) => record.contentId)).toEqual(['f1', 'f2', 'f3']);
    expect(report.counters.pages).toBe(2);
    const checkpoint = await deps.store.loadById(report.checkpointId ?? '');
    expect(checkpoint?.homefeed).toEqual({ refreshIndex: 40 });
  });

  it('resumes at the saved refresh index', async () => {
    const config = testConfig({ mode: 'homefeed', maxItemsCount: 1, enableComments: false });
    const feedPage = vi.fn<CrawlerApi['feedPage']>(async (refreshIndex) => ({
      StatusCode: 0,
      cards: [contentCard(`f${refreshIndex}`)],
    }));
    const deps = createDeps(config, fakeApi({ feedPage }));

    await new HomefeedHandler(deps).run();
    await new HomefeedHandler(deps).run();

    expect(feedPage.mock.calls.map(([refreshIndex]) => refreshIndex)).toEqual([0, 20]);
  });

  it('stops after three pages without content', async () => {
    const config = testConfig({ mode: 'homefeed', enableComments: false });
    const feedPage = vi.fn<CrawlerApi['feedPage']>(async () => ({ StatusCode: 0, cards: [{ type: 2 }] }));
    const deps = createDeps(config, fakeApi({ feedPage }));

    const report = await new HomefeedHandler(deps).run();

    expect(feedPage).toHaveBeenCalledTimes(3);
    expect(report.counters.pages).toBe(2);
    expect(report.counters.itemsSaved).toBe(0);
  });

  it('stops when the feed reports a non-zero status', async () => {
    const config = testConfig({ mode: 'homefeed', enableComments: false });
    const feedPage = vi.fn<CrawlerApi['feedPage']>(async () => ({ StatusCode: 2483, cards: [contentCard('f1')] }));
    const deps = createDeps(config, fakeApi({ feedPage }));

    const report = await new HomefeedHandler(deps).run();

    expect(feedPage).toHaveBeenCalledTimes(1);
    expect(report.counters.pages).toBe(0);
  });

  it('starts a new checkpoint when the requested one is missing', async () => {
    const config = testConfig({ mode: 'homefeed', maxItemsCount: 1, enableComments: false, checkpoint: { id: 'gone' } });
    const feedPage = vi.fn<CrawlerApi['feedPage']>(async () => ({ StatusCode: 0, cards: [contentCard('f1')] }));
    const deps = createDeps(config, fakeApi({ feedPage }));

    const report = await new HomefeedHandler(deps).run();

    expect(report.checkpointId).not.toBeNull();
    expect(report.checkpointId).not.toBe('gone');
  });
});
