import { sleepOrCancel, throwIfCancelled } from '../../utils/async';
import { createEnhancedLogger } from '../../utils/logger';
import { HandlerReport } from '../crawler.types';
import { extractCreator } from '../extractor';
import { CrawlSession, HandlerDeps, ModeHandler } from './session';

const logger = createEnhancedLogger('CreatorHandler');

/**
 * Stores each configured creator's profile and pages through their posts.
 *
 * On resume the run restarts at the checkpointed creator; the saved cursor applies to that
 * creator only.
 */
export class CreatorHandler implements ModeHandler {
  readonly mode = 'creator' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async run(signal?: AbortSignal): Promise<HandlerReport> {
    const session = new CrawlSession(this.mode, this.deps.store, this.deps.config, signal);
    const checkpoint = await session.open();
    const creators = this.deps.config.creatorIds;

    let start = 0;
    const resumeCreator = checkpoint?.creator?.creatorId;
    if (resumeCreator) {
      const index = creators.indexOf(resumeCreator);
      if (index >= 0) {
        start = index;
      } else {
        logger.warn(`Checkpointed creator ${resumeCreator} is no longer configured, starting over`);
      }
    }

    for (const creatorId of creators.slice(start)) {
      throwIfCancelled(signal);
      await session.runUnit(`creator:${creatorId}`, () => this.crawlCreator(session, creatorId));
    }

    logger.info('Creator crawl finished', { ...session.counters });
    return session.report();
  }

  private async crawlCreator(session: CrawlSession, creatorId: string): Promise<void> {
    const { api, items, comments, sink, config } = this.deps;
    const saved = session.checkpoint?.creator;
    let cursor = saved !== undefined && saved.creatorId === creatorId ? saved.cursor : '0';
    const context = session.context({ creatorId });

    await session.save((checkpoint) => {
      checkpoint.creator = { creatorId, cursor };
    });

    const profile = await api.profile(creatorId, context);
    if (profile.user) {
      await sink.storeCreator(extractCreator(profile.user));
    } else {
      logger.warn(`Profile not found for creator ${creatorId}`);
    }

    let fetched = 0;
    let hasMore = true;
    while (hasMore && fetched < config.maxItemsCount) {
      throwIfCancelled(session.signal, { creatorId, cursor });
      try {
        const page = await api.userPostPage(creatorId, cursor, context);
        const posts = page.aweme_list ?? [];
        hasMore = page.has_more ?? false;
        if (posts.length === 0) break;

        const ids = await items.saveListed(posts, context, session.counters, { creatorId });
        fetched += posts.length;
        session.counters.pages++;
        await comments.processItems(ids, context, session.counters);

        // the cursor moves only once the page is fully processed
        cursor = page.max_cursor ?? cursor;
        if (hasMore) await sleepOrCancel(config.pageDelayMs, session.signal);
      } finally {
        const position = { creatorId, cursor };
        await session.save((checkpoint) => {
          checkpoint.creator = position;
        });
      }
    }
  }
}
