/**
 * CommentProcessor - pages through the comment thread of each item.
 *
 * The cursor of every page is written to the checkpoint before the page's comments are stored,
 * so a restarted run resumes at the first page it has not finished. A thread is marked done only
 * after its last page.
 */

import { settleAll, sleepOrCancel, throwIfCancelled } from '../../utils/async';
import { createEnhancedLogger } from '../../utils/logger';
import { CrawlerApi } from '../api-client';
import { RawRecord } from '../api-schemas';
import { ConcurrencyGate } from '../concurrency-gate';
import { ProgressCounters, RequestContext } from '../crawler.types';
import { CheckpointStore } from '../db/checkpoint';
import { isFatalError } from '../errors';
import { extractComment, replyCountOf } from '../extractor';
import { ContentSink } from '../storage';

const logger = createEnhancedLogger('CommentProcessor');

export interface CommentProcessorOptions {
  enableComments: boolean;
  enableSubComments: boolean;
  /** 0 means unlimited. */
  maxCommentsPerItem: number;
  pageDelayMs: number;
}

/**
 * True when `next` is a forward move from `current`. Numeric cursors must grow; any other
 * cursor must merely differ.
 */
export function cursorAdvanced(current: string, next: string): boolean {
  if (next === '' || next === current) return false;
  const from = Number(current);
  const to = Number(next);
  if (current !== '' && Number.isFinite(from) && Number.isFinite(to)) return to > from;
  return true;
}

export class CommentProcessor {
  private readonly inFlight = new Set<string>();

  constructor(
    private readonly api: CrawlerApi,
    private readonly gate: ConcurrencyGate,
    private readonly sink: ContentSink,
    private readonly store: CheckpointStore | null,
    private readonly options: CommentProcessorOptions,
  ) {}

  /**
   * Crawls the comments of every item whose thread is not done yet. Duplicate ids, and ids
   * whose thread another caller is already crawling, are processed once.
   */
  async processItems(itemIds: string[], context: RequestContext, counters: ProgressCounters): Promise<void> {
    if (!this.options.enableComments) {
      logger.debug('Comment crawling disabled');
      return;
    }

    const checkpointId = this.checkpointIdOf(context);
    const tasks: Array<Promise<void>> = [];

    for (const itemId of new Set(itemIds)) {
      if (!itemId || this.inFlight.has(itemId)) continue;
      if (checkpointId && this.store && (await this.store.commentsDone(checkpointId, itemId))) {
        logger.debug('Comments already crawled, skipping', { itemId });
        continue;
      }
      this.inFlight.add(itemId);
      tasks.push(
        this.gate
          .runComment(() => this.crawlThread(itemId, context, counters))
          .finally(() => this.inFlight.delete(itemId)),
      );
    }

    if (tasks.length > 0) {
      logger.info(`Crawling comments of ${tasks.length} items`);
      await settleAll(tasks);
    }
  }

  private async crawlThread(itemId: string, context: RequestContext, counters: ProgressCounters): Promise<void> {
    try {
      await this.crawlComments(itemId, context, counters);
    } catch (error: unknown) {
      if (isFatalError(error)) throw error;
      logger.error('Comment crawl failed', error, { itemId, checkpointId: context.checkpointId ?? null });
    }
  }

  private async crawlComments(itemId: string, context: RequestContext, counters: ProgressCounters): Promise<void> {
    const checkpointId = this.checkpointIdOf(context);
    const { maxCommentsPerItem, enableSubComments, pageDelayMs } = this.options;

    let cursor = checkpointId && this.store ? await this.store.getCommentCursor(checkpointId, itemId) : '';
    if (cursor) logger.debug('Resuming comments', { itemId, cursor });

    const seen = new Set<string>();
    let stored = 0;
    let hasMore = true;

    while (hasMore) {
      throwIfCancelled(context.signal, { itemId, cursor });
      const page = await this.api.commentPage(itemId, cursor, context);
      const comments = page.comments ?? [];
      const nextCursor = page.cursor ?? cursor;
      hasMore = page.has_more ?? false;

      const advanced = cursorAdvanced(cursor, nextCursor);
      if (advanced) {
        cursor = nextCursor;
        if (checkpointId && this.store) {
          await this.store.updateItemStatus(checkpointId, itemId, { commentCursor: cursor });
        }
      } else {
        // a cursor that does not move would fetch the same page forever
        hasMore = false;
      }

      if (comments.length === 0) continue;

      const fresh = comments.filter((comment) => {
        const id = String(comment.cid ?? '');
        if (!id || seen.has(id)) return false;
        seen.add(id);
        return true;
      });
      for (const comment of fresh) {
        await this.sink.storeComment(extractComment(itemId, comment));
      }
      stored += fresh.length;
      counters.commentsSaved += fresh.length;

      if (maxCommentsPerItem > 0 && stored >= maxCommentsPerItem) {
        logger.info(`Comment cap reached for ${itemId}`, { stored, cap: maxCommentsPerItem });
        break;
      }

      if (enableSubComments) {
        await this.crawlReplies(itemId, fresh, context, counters);
      }
      if (hasMore) await sleepOrCancel(pageDelayMs, context.signal);
    }

    if (checkpointId && this.store) {
      await this.store.updateItemStatus(checkpointId, itemId, { commentsCrawled: true, commentCursor: cursor });
    }
    logger.info(`Comments done for ${itemId}`, { stored });
  }

  private async crawlReplies(
    itemId: string,
    comments: RawRecord[],
    context: RequestContext,
    counters: ProgressCounters,
  ): Promise<void> {
    for (const comment of comments) {
      if (replyCountOf(comment) <= 0) continue;
      const commentId = String(comment.cid ?? '');
      let cursor = '';
      let hasMore = true;

      while (hasMore) {
        throwIfCancelled(context.signal, { itemId, commentId });
        const page = await this.api.subCommentPage(itemId, commentId, cursor, context);
        const replies = page.comments ?? [];
        const nextCursor = page.cursor ?? cursor;
        hasMore = (page.has_more ?? false) && cursorAdvanced(cursor, nextCursor);
        cursor = nextCursor;

        for (const reply of replies) {
          await this.sink.storeComment(extractComment(itemId, reply));
        }
        counters.commentsSaved += replies.length;
        if (hasMore) await sleepOrCancel(this.options.pageDelayMs, context.signal);
      }
    }
  }

  private checkpointIdOf(context: RequestContext): string | null {
    return this.store ? (context.checkpointId ?? null) : null;
  }
}
