import { createEnhancedLogger } from '../../utils/logger';
import { HandlerReport } from '../crawler.types';
import { CrawlSession, HandlerDeps, ModeHandler } from './session';

const logger = createEnhancedLogger('DetailHandler');

/**
 * Fetches the configured item ids one detail call each, then their comment threads.
 */
export class DetailHandler implements ModeHandler {
  readonly mode = 'detail' as const;

  constructor(private readonly deps: HandlerDeps) {}

  async run(signal?: AbortSignal): Promise<HandlerReport> {
    const { items, comments, config } = this.deps;
    const session = new CrawlSession(this.mode, this.deps.store, config, signal);
    await session.open();

    await session.runUnit('detail', async () => {
      const context = session.context();
      const processed = await items.fetchByIds([...config.itemIds], context, session.counters);
      logger.info(`Item details done: ${processed.length}/${config.itemIds.length}`);
      await comments.processItems(processed, context, session.counters);
    });

    await session.flush();
    logger.info('Detail crawl finished', { ...session.counters });
    return session.report();
  }
}
