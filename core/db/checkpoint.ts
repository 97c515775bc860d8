/**
 * Checkpoint model shared by every store backend.
 *
 * A checkpoint is a header (identity plus the cursor of its mode) and a ledger of items.
 * Backends persist the two separately so that item progress can be flushed one record at a time.
 */

import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { CRAWL_MODES, CrawlMode } from '../crawler.types';
import { ScraperErrors } from '../errors';

export interface SearchCursor {
  keyword: string;
  page: number;
  searchId: string;
}

export interface CreatorCursor {
  creatorId: string;
  cursor: string;
}

export interface FeedCursor {
  refreshIndex: number;
}

export interface CheckpointItem {
  itemId: string;
  itemCrawled: boolean;
  commentsCrawled: boolean;
  commentCursor: string;
  extra: Record<string, unknown>;
}

export interface CheckpointHeader {
  id: string;
  platform: string;
  mode: CrawlMode;
  createdAt: number;
  updatedAt: number;
  search?: SearchCursor;
  creator?: CreatorCursor;
  homefeed?: FeedCursor;
}

export interface Checkpoint extends CheckpointHeader {
  items: Record<string, CheckpointItem>;
}

export type ItemStatusPatch = Partial<Pick<CheckpointItem, 'itemCrawled' | 'commentsCrawled' | 'commentCursor'>>;

export interface CheckpointStore {
  create(platform: string, mode: CrawlMode): Promise<Checkpoint>;
  /** By id when given, otherwise the most recently created checkpoint of (platform, mode). */
  load(platform: string, mode: CrawlMode, id?: string): Promise<Checkpoint | null>;
  loadById(id: string): Promise<Checkpoint | null>;
  /** Rewrites header and cursors; items already stored keep their progress. */
  update(checkpoint: Checkpoint): Promise<void>;
  itemExistsAndDone(checkpointId: string, itemId: string): Promise<boolean>;
  commentsDone(checkpointId: string, itemId: string): Promise<boolean>;
  addItem(checkpointId: string, itemId: string, extra: Record<string, unknown>, success: boolean): Promise<void>;
  updateItemStatus(checkpointId: string, itemId: string, patch: ItemStatusPatch): Promise<void>;
  getCommentCursor(checkpointId: string, itemId: string): Promise<string>;
  getItem(checkpointId: string, itemId: string): Promise<CheckpointItem | null>;
  close(): Promise<void>;
}

const searchCursorSchema = z.object({
  keyword: z.string(),
  page: z.number().int().min(1),
  searchId: z.string(),
});

const creatorCursorSchema = z.object({
  creatorId: z.string(),
  cursor: z.string(),
});

const feedCursorSchema = z.object({
  refreshIndex: z.number().int().min(0),
});

export const checkpointHeaderSchema = z.object({
  id: z.string().min(1),
  platform: z.string().min(1),
  mode: z.enum(CRAWL_MODES),
  createdAt: z.number(),
  updatedAt: z.number(),
  search: searchCursorSchema.optional(),
  creator: creatorCursorSchema.optional(),
  homefeed: feedCursorSchema.optional(),
});

export const checkpointItemSchema = z
  .object({
    itemId: z.string().min(1),
    itemCrawled: z.boolean().default(false),
    commentsCrawled: z.boolean().default(false),
    commentCursor: z.string().default(''),
    extra: z.record(z.unknown()).default({}),
  })
  .refine((item) => !item.commentsCrawled || item.itemCrawled, {
    message: 'commentsCrawled requires itemCrawled',
  });

export function newCheckpointId(): string {
  return randomUUID();
}

export function newCheckpoint(platform: string, mode: CrawlMode, now: number = Date.now()): Checkpoint {
  return {
    id: newCheckpointId(),
    platform,
    mode,
    createdAt: now,
    updatedAt: now,
    items: {},
  };
}

export function headerOf(checkpoint: Checkpoint): CheckpointHeader {
  const { items: _items, ...header } = checkpoint;
  return header;
}

export function emptyItem(itemId: string): CheckpointItem {
  return { itemId, itemCrawled: false, commentsCrawled: false, commentCursor: '', extra: {} };
}

/**
 * Upsert used when an item has been dispatched. Comment progress survives and a
 * successful crawl is never downgraded by a later failure.
 */
export function mergeAddedItem(
  existing: CheckpointItem | undefined,
  itemId: string,
  extra: Record<string, unknown>,
  success: boolean,
): CheckpointItem {
  const base = existing ?? emptyItem(itemId);
  return {
    ...base,
    itemCrawled: base.itemCrawled || success,
    extra: { ...base.extra, ...extra },
  };
}

export function applyItemPatch(
  existing: CheckpointItem | undefined,
  itemId: string,
  patch: ItemStatusPatch,
  checkpointId: string,
): CheckpointItem {
  const base = existing ?? emptyItem(itemId);
  const next: CheckpointItem = {
    ...base,
    itemCrawled: patch.itemCrawled ?? base.itemCrawled,
    commentsCrawled: patch.commentsCrawled ?? base.commentsCrawled,
    commentCursor: patch.commentCursor ?? base.commentCursor,
  };
  if (next.commentsCrawled && !next.itemCrawled) {
    throw ScraperErrors.validationError('Comments cannot be done before the item is crawled', {
      checkpointId,
      itemId,
    });
  }
  return next;
}

export function parseHeader(value: unknown, checkpointId: string): CheckpointHeader {
  const parsed = checkpointHeaderSchema.safeParse(value);
  if (!parsed.success) {
    throw ScraperErrors.checkpointError(`Corrupt checkpoint header: ${parsed.error.message}`, { checkpointId });
  }
  return parsed.data;
}

/** Returns null for a record that does not describe a valid item. */
export function parseItem(value: unknown): CheckpointItem | null {
  const parsed = checkpointItemSchema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

/** Compact description for log lines. */
export function describeCheckpoint(checkpoint: Checkpoint | null): Record<string, unknown> {
  if (!checkpoint) return { checkpointId: null };
  const items = Object.values(checkpoint.items);
  return {
    checkpointId: checkpoint.id,
    mode: checkpoint.mode,
    search: checkpoint.search,
    creator: checkpoint.creator,
    homefeed: checkpoint.homefeed,
    items: items.length,
    itemsCrawled: items.filter((item) => item.itemCrawled).length,
  };
}
