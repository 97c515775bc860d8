import { PAGE_SIZES } from '../../config/constants';
import { sleepOrCancel, throwIfCancelled } from '../../utils/async';
import { createEnhancedLogger } from '../../utils/logger';
import { RawRecord } from '../api-schemas';
import { HandlerReport } from '../crawler.types';
import { unwrapSearchEntry } from '../extractor';
import { CrawlSession, HandlerDeps, ModeHandler } from './session';

const logger = createEnhancedLogger('SearchHandler');

/**
 * Pages through the search results of each configured keyword.
 *
 * On resume, keywords before the checkpointed one are skipped and the checkpointed keyword
 * restarts at its saved page and search session.
 */
export class SearchHandler implements ModeHandler {
  readonly mode = 'search' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async run(signal?: AbortSignal): Promise<HandlerReport> {
    const session = new CrawlSession(this.mode, this.deps.store, this.deps.config, signal);
    const checkpoint = await session.open();
    const keywords = this.deps.config.keywords;

    let start = 0;
    const resumeKeyword = checkpoint?.search?.keyword;
    if (resumeKeyword) {
      const index = keywords.indexOf(resumeKeyword);
      if (index >= 0) {
        start = index;
      } else {
        logger.warn(`Checkpointed keyword "${resumeKeyword}" is no longer configured, starting over`);
      }
    }

    for (const keyword of keywords.slice(start)) {
      throwIfCancelled(signal);
      logger.info(`Searching keyword: ${keyword}`);
      await session.runUnit(`keyword:${keyword}`, () => this.crawlKeyword(session, keyword));
    }

    logger.info('Search finished', { ...session.counters });
    return session.report();
  }

  private async crawlKeyword(session: CrawlSession, keyword: string): Promise<void> {
    const { api, items, comments, config } = this.deps;
    const saved = session.checkpoint?.search;
    const resuming = saved !== undefined && saved.keyword === keyword;
    let page = resuming ? saved.page : 1;
    let searchId = resuming ? saved.searchId : '';
    let reached = (page - 1) * PAGE_SIZES.search;
    const context = session.context({ keyword });

    while (reached < config.maxItemsCount) {
      throwIfCancelled(session.signal, { keyword, cursor: page });
      try {
        const response = await api.searchPage(
          {
            keyword,
            offset: (page - 1) * PAGE_SIZES.search,
            searchId,
            sortType: config.search.sortType,
            publishTime: config.search.publishTime,
          },
          context,
        );

        if (!response.data) {
          logger.warn(`Search returned no data for "${keyword}", the account may be restricted`);
          break;
        }
        searchId = response.extra?.logid ?? '';
        if (response.data.length === 0) {
          logger.info(`No more results for "${keyword}"`);
          break;
        }

        const entries = response.data
          .map(unwrapSearchEntry)
          .filter((entry): entry is RawRecord => entry !== null);
        const ids = await items.saveListed(entries, context, session.counters, { keyword });
        reached += ids.length;
        session.counters.pages++;

        await comments.processItems(ids, context, session.counters);
        page++;

        if (response.has_more === false) break;
        await sleepOrCancel(config.pageDelayMs, session.signal);
      } finally {
        const cursor = { keyword, page, searchId };
        await session.save((checkpoint) => {
          checkpoint.search = cursor;
        });
      }
    }
  }
}
