/**
 * ItemProcessor - stores content items and records them in the checkpoint ledger.
 *
 * Two entry points:
 * - `saveListed` for items that arrive whole inside a list page (search, creator, feed);
 * - `fetchByIds` for items that need a detail call each (detail mode), fanned out through
 *   the item gate.
 */

import { createEnhancedLogger } from '../../utils/logger';
import { settleAll, throwIfCancelled } from '../../utils/async';
import { CrawlerApi } from '../api-client';
import { RawRecord } from '../api-schemas';
import { ConcurrencyGate } from '../concurrency-gate';
import { ProgressCounters, RequestContext } from '../crawler.types';
import { CheckpointStore } from '../db/checkpoint';
import { isFatalError } from '../errors';
import { contentIdOf, extractContent } from '../extractor';
import { ContentSink } from '../storage';

const logger = createEnhancedLogger('ItemProcessor');

export class ItemProcessor {
  constructor(
    private readonly api: CrawlerApi,
    private readonly gate: ConcurrencyGate,
    private readonly sink: ContentSink,
    private readonly store: CheckpointStore | null,
  ) {}

  /**
   * Stores every listed item not yet crawled in this checkpoint and returns the ids seen,
   * skipped ones included, in page order.
   */
  async saveListed(
    items: RawRecord[],
    context: RequestContext,
    counters: ProgressCounters,
    extra: Record<string, unknown> = {},
  ): Promise<string[]> {
    const checkpointId = this.checkpointIdOf(context);
    const seen = new Set<string>();

    for (const raw of items) {
      throwIfCancelled(context.signal);
      const itemId = contentIdOf(raw);
      if (!itemId || seen.has(itemId)) continue;
      seen.add(itemId);

      if (checkpointId && this.store && (await this.store.itemExistsAndDone(checkpointId, itemId))) {
        counters.itemsSkipped++;
        continue;
      }

      await this.sink.storeContent(extractContent(raw, context.keyword ?? ''));
      if (checkpointId && this.store) {
        await this.store.addItem(checkpointId, itemId, extra, true);
      }
      counters.itemsSaved++;
    }

    return [...seen];
  }

  /**
   * Fetches the detail of every id not yet crawled, at most `itemConcurrency` at a time.
   * Returns the ids whose content is stored, previously crawled ones included.
   */
  async fetchByIds(itemIds: string[], context: RequestContext, counters: ProgressCounters): Promise<string[]> {
    const checkpointId = this.checkpointIdOf(context);
    const processed: string[] = [];
    const tasks: Array<Promise<string | null>> = [];

    for (const itemId of new Set(itemIds)) {
      if (!itemId) continue;
      if (checkpointId && this.store) {
        if (await this.store.itemExistsAndDone(checkpointId, itemId)) {
          logger.debug('Item already crawled, skipping', { itemId, checkpointId });
          counters.itemsSkipped++;
          processed.push(itemId);
          continue;
        }
        await this.store.addItem(checkpointId, itemId, {}, false);
      }
      tasks.push(this.gate.runItem(() => this.fetchOne(itemId, context, counters)));
    }

    for (const itemId of await settleAll(tasks)) {
      if (itemId) processed.push(itemId);
    }
    return processed;
  }

  private async fetchOne(itemId: string, context: RequestContext, counters: ProgressCounters): Promise<string | null> {
    const checkpointId = this.checkpointIdOf(context);
    let stored = false;
    try {
      throwIfCancelled(context.signal);
      const response = await this.api.itemDetail(itemId, context);
      const detail = response.aweme_detail;
      if (!detail) {
        logger.warn('Item detail not found', { itemId });
        return null;
      }
      await this.sink.storeContent(extractContent(detail, context.keyword ?? ''));
      stored = true;
      counters.itemsSaved++;
      logger.info(`Item stored: ${itemId}`);
      return itemId;
    } catch (error: unknown) {
      if (isFatalError(error)) throw error;
      counters.itemsFailed++;
      logger.error('Item detail failed', error, { itemId, checkpointId });
      return null;
    } finally {
      if (checkpointId && this.store) {
        await this.store.updateItemStatus(checkpointId, itemId, { itemCrawled: stored });
      }
    }
  }

  private checkpointIdOf(context: RequestContext): string | null {
    return this.store ? (context.checkpointId ?? null) : null;
  }
}
