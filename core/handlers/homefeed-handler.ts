import { PAGE_SIZES } from '../../config/constants';
import { sleepOrCancel, throwIfCancelled } from '../../utils/async';
import { createEnhancedLogger } from '../../utils/logger';
import { isJsonRecord, safeJsonParseSafe } from '../../utils/safe-json';
import { FeedPage, RawRecord } from '../api-schemas';
import { HandlerReport } from '../crawler.types';
import { CrawlSession, HandlerDeps, ModeHandler } from './session';

const logger = createEnhancedLogger('HomefeedHandler');

const CONTENT_CARD_TYPE = 1;
const MAX_EMPTY_PAGES = 3;

/** Content cards carry their item as a JSON string; other card types are skipped. */
export function feedItems(page: FeedPage): RawRecord[] {
  const items: RawRecord[] = [];
  for (const card of page.cards ?? []) {
    if (card.type !== CONTENT_CARD_TYPE || !card.aweme) continue;
    const item = safeJsonParseSafe(card.aweme);
    if (isJsonRecord(item)) {
      items.push(item);
    } else {
      logger.warn('Skipping feed card with unreadable item');
    }
  }
  return items;
}

/**
 * Pages through the recommendation feed by refresh index until enough items are stored.
 */
export class HomefeedHandler implements ModeHandler {
  readonly mode = 'homefeed' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async run(signal?: AbortSignal): Promise<HandlerReport> {
    const session = new CrawlSession(this.mode, this.deps.store, this.deps.config, signal);
    await session.open();
    await session.runUnit('homefeed', () => this.crawlFeed(session));
    logger.info('Homefeed crawl finished', { ...session.counters });
    return session.report();
  }

  private async crawlFeed(session: CrawlSession): Promise<void> {
    const { api, items, comments, config } = this.deps;
    let refreshIndex = session.checkpoint?.homefeed?.refreshIndex ?? 0;
    let reached = 0;
    let emptyPages = 0;
    const context = session.context();

    while (reached < config.maxItemsCount) {
      throwIfCancelled(session.signal, { cursor: refreshIndex });
      try {
        const page = await api.feedPage(refreshIndex, config.homefeed.tagId, context);
        if (page.StatusCode !== 0) {
          logger.info('Feed has no more content', { statusCode: page.StatusCode, refreshIndex });
          break;
        }
        if (!page.cards || page.cards.length === 0) {
          logger.info('Feed returned no cards', { refreshIndex });
          break;
        }

        const entries = feedItems(page).slice(0, config.maxItemsCount - reached);
        emptyPages = entries.length === 0 ? emptyPages + 1 : 0;
        if (emptyPages >= MAX_EMPTY_PAGES) {
          logger.warn(`No content cards in ${emptyPages} consecutive pages, stopping`, { refreshIndex });
          break;
        }
        const ids = await items.saveListed(entries, context, session.counters);
        reached += ids.length;
        session.counters.pages++;
        await comments.processItems(ids, context, session.counters);

        refreshIndex += PAGE_SIZES.feed;
        await sleepOrCancel(config.pageDelayMs, session.signal);
      } finally {
        const position = { refreshIndex };
        await session.save((checkpoint) => {
          checkpoint.homefeed = position;
        });
      }
    }
  }
}
