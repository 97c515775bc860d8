import { createEnhancedLogger } from '../../utils/logger';
import { safeJsonParse, safeJsonParseSafe } from '../../utils/safe-json';
import { Semaphore } from '../concurrency-gate';
import { CrawlMode } from '../crawler.types';
import { ScraperError, ScraperErrors } from '../errors';
import {
  applyItemPatch,
  Checkpoint,
  CheckpointHeader,
  CheckpointItem,
  CheckpointStore,
  headerOf,
  ItemStatusPatch,
  mergeAddedItem,
  newCheckpoint,
  parseHeader,
  parseItem,
} from './checkpoint';

const logger = createEnhancedLogger('RedisCheckpointRepo');

/**
 * The commands the store issues. An ioredis client satisfies it as is.
 */
export interface CheckpointRedis {
  get(key: string): Promise<string | null>;
  set(key: string, value: string): Promise<unknown>;
  hget(key: string, field: string): Promise<string | null>;
  hset(key: string, field: string, value: string): Promise<unknown>;
  hgetall(key: string): Promise<Record<string, string>>;
  zadd(key: string, score: number, member: string): Promise<unknown>;
  zrevrange(key: string, start: number, stop: number): Promise<string[]>;
  quit(): Promise<unknown>;
}

/**
 * Redis-backed checkpoint store.
 *
 * Keys, under a configurable prefix:
 * - `<prefix>:checkpoint:<id>` header JSON
 * - `<prefix>:checkpoint:<id>:items` hash of item id to item JSON
 * - `<prefix>:checkpoints:<platform>:<mode>` ids scored by creation time
 */
export class RedisCheckpointStore implements CheckpointStore {
  private readonly locks = new Map<string, Semaphore>();

  constructor(
    private readonly redis: CheckpointRedis,
    private readonly prefix: string = 'crawler',
    private readonly now: () => number = Date.now,
  ) {}

  async create(platform: string, mode: CrawlMode): Promise<Checkpoint> {
    const checkpoint = newCheckpoint(platform, mode, this.now());
    await this.run(checkpoint.id, 'create', async () => {
      await this.redis.set(this.headerKey(checkpoint.id), JSON.stringify(headerOf(checkpoint)));
      await this.redis.zadd(this.indexKey(platform, mode), checkpoint.createdAt, checkpoint.id);
    });
    logger.info('Checkpoint created', { checkpointId: checkpoint.id, platform, mode });
    return checkpoint;
  }

  async load(platform: string, mode: CrawlMode, id?: string): Promise<Checkpoint | null> {
    if (id) {
      const checkpoint = await this.loadById(id);
      if (checkpoint && (checkpoint.platform !== platform || checkpoint.mode !== mode)) {
        logger.warn('Checkpoint belongs to another platform or mode', { checkpointId: id, platform, mode });
        return null;
      }
      return checkpoint;
    }

    const [latest] = await this.call('load', () => this.redis.zrevrange(this.indexKey(platform, mode), 0, 0));
    return latest ? this.loadById(latest) : null;
  }

  async loadById(id: string): Promise<Checkpoint | null> {
    const header = await this.readHeader(id);
    if (!header) return null;
    const raw = await this.call('loadById', () => this.redis.hgetall(this.itemsKey(id)));
    const items: Record<string, CheckpointItem> = {};
    for (const value of Object.values(raw)) {
      const item = parseItem(safeJsonParseSafe(value));
      if (item) items[item.itemId] = item;
    }
    return { ...header, items };
  }

  async update(checkpoint: Checkpoint): Promise<void> {
    await this.requireHeader(checkpoint.id, 'update');
    await this.run(checkpoint.id, 'update', async () => {
      const header: CheckpointHeader = { ...headerOf(checkpoint), updatedAt: this.now() };
      await this.redis.set(this.headerKey(checkpoint.id), JSON.stringify(header));

      const known = await this.redis.hgetall(this.itemsKey(checkpoint.id));
      for (const item of Object.values(checkpoint.items)) {
        if (item.itemId in known) continue;
        await this.redis.hset(this.itemsKey(checkpoint.id), item.itemId, JSON.stringify(item));
      }
    });
  }

  async itemExistsAndDone(checkpointId: string, itemId: string): Promise<boolean> {
    return (await this.getItem(checkpointId, itemId))?.itemCrawled === true;
  }

  async commentsDone(checkpointId: string, itemId: string): Promise<boolean> {
    return (await this.getItem(checkpointId, itemId))?.commentsCrawled === true;
  }

  async addItem(
    checkpointId: string,
    itemId: string,
    extra: Record<string, unknown>,
    success: boolean,
  ): Promise<void> {
    await this.requireHeader(checkpointId, 'addItem');
    await this.run(checkpointId, 'addItem', async () => {
      const existing = await this.readItem(checkpointId, itemId);
      const next = mergeAddedItem(existing ?? undefined, itemId, extra, success);
      await this.redis.hset(this.itemsKey(checkpointId), itemId, JSON.stringify(next));
    });
  }

  async updateItemStatus(checkpointId: string, itemId: string, patch: ItemStatusPatch): Promise<void> {
    await this.requireHeader(checkpointId, 'updateItemStatus');
    await this.run(checkpointId, 'updateItemStatus', async () => {
      const existing = await this.readItem(checkpointId, itemId);
      const next = applyItemPatch(existing ?? undefined, itemId, patch, checkpointId);
      await this.redis.hset(this.itemsKey(checkpointId), itemId, JSON.stringify(next));
    });
  }

  async getCommentCursor(checkpointId: string, itemId: string): Promise<string> {
    return (await this.getItem(checkpointId, itemId))?.commentCursor ?? '';
  }

  async getItem(checkpointId: string, itemId: string): Promise<CheckpointItem | null> {
    return this.call('getItem', () => this.readItem(checkpointId, itemId));
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }

  private headerKey(id: string): string {
    return `${this.prefix}:checkpoint:${id}`;
  }

  private itemsKey(id: string): string {
    return `${this.prefix}:checkpoint:${id}:items`;
  }

  private indexKey(platform: string, mode: CrawlMode): string {
    return `${this.prefix}:checkpoints:${platform}:${mode}`;
  }

  private async readHeader(id: string): Promise<CheckpointHeader | null> {
    const text = await this.call('readHeader', () => this.redis.get(this.headerKey(id)));
    if (text === null) return null;
    let value: unknown;
    try {
      value = safeJsonParse(text);
    } catch (error: unknown) {
      throw ScraperErrors.checkpointError(
        'Checkpoint header is not valid JSON',
        { checkpointId: id },
        error instanceof Error ? error : undefined,
      );
    }
    return parseHeader(value, id);
  }

  private async requireHeader(id: string, operation: string): Promise<void> {
    const header = await this.readHeader(id);
    if (!header) {
      throw ScraperErrors.checkpointError(`Checkpoint ${id} not found`, { checkpointId: id, operation });
    }
  }

  private async readItem(checkpointId: string, itemId: string): Promise<CheckpointItem | null> {
    const text = await this.redis.hget(this.itemsKey(checkpointId), itemId);
    return text === null ? null : parseItem(safeJsonParseSafe(text));
  }

  private lockOf(id: string): Semaphore {
    let lock = this.locks.get(id);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(id, lock);
    }
    return lock;
  }

  private run(id: string, operation: string, task: () => Promise<void>): Promise<void> {
    return this.lockOf(id).use(() => this.call(operation, task, id));
  }

  /** Wraps client failures as CHECKPOINT_ERROR. */
  private async call<T>(operation: string, task: () => Promise<T>, checkpointId?: string): Promise<T> {
    try {
      return await task();
    } catch (error: unknown) {
      if (error instanceof ScraperError) throw error;
      throw ScraperErrors.checkpointError(
        `Redis ${operation} failed`,
        { operation, checkpointId },
        error instanceof Error ? error : undefined,
      );
    }
  }
}
