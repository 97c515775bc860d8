import { promises as fs } from 'node:fs';
import * as path from 'node:path';
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

const logger = createEnhancedLogger('CheckpointRepo');

const HEADER_FILE = 'checkpoint.json';
const ITEMS_FILE = 'items.jsonl';
const DEFAULT_COMPACT_THRESHOLD = 1000;

interface CachedCheckpoint {
  header: CheckpointHeader;
  items: Map<string, CheckpointItem>;
  /** Records in the ledger file, superseded ones included. */
  records: number;
}

interface LedgerRead {
  items: Map<string, CheckpointItem>;
  records: number;
  skipped: number;
  /** The file does not end with a newline, so the next append would join the last line. */
  torn: boolean;
}

function toCheckpoint(cached: CachedCheckpoint): Checkpoint {
  const items: Record<string, CheckpointItem> = {};
  for (const [id, item] of cached.items) {
    items[id] = { ...item, extra: { ...item.extra } };
  }
  return { ...cached.header, items };
}

function isMissing(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * File-backed checkpoint store.
 *
 * Layout: `<baseDir>/<id>/checkpoint.json` for the header and `<baseDir>/<id>/items.jsonl`
 * as an append-only item ledger where the last record per id wins.
 *
 * The ledger is rewritten with one record per item when it is loaded with unreadable or
 * unterminated records, and whenever it holds at least `compactThreshold` records and twice as
 * many records as items.
 */
export class FileCheckpointStore implements CheckpointStore {
  private readonly cache = new Map<string, CachedCheckpoint>();
  private readonly locks = new Map<string, Semaphore>();

  constructor(
    private readonly baseDir: string,
    private readonly now: () => number = Date.now,
    private readonly compactThreshold: number = DEFAULT_COMPACT_THRESHOLD,
  ) {}

  async create(platform: string, mode: CrawlMode): Promise<Checkpoint> {
    const checkpoint = newCheckpoint(platform, mode, this.now());
    const dir = this.dirOf(checkpoint.id);
    await this.guard(checkpoint.id, 'create', async () => {
      await fs.mkdir(dir, { recursive: true });
      await this.writeHeader(headerOf(checkpoint));
      await fs.writeFile(path.join(dir, ITEMS_FILE), '', 'utf-8');
    });
    this.cache.set(checkpoint.id, { header: headerOf(checkpoint), items: new Map(), records: 0 });
    logger.info('Checkpoint created', { checkpointId: checkpoint.id, platform, mode });
    return checkpoint;
  }

  async load(platform: string, mode: CrawlMode, id?: string): Promise<Checkpoint | null> {
    if (id) {
      const checkpoint = await this.loadById(id);
      if (checkpoint && (checkpoint.platform !== platform || checkpoint.mode !== mode)) {
        logger.warn('Checkpoint belongs to another platform or mode', {
          checkpointId: id,
          expected: { platform, mode },
          actual: { platform: checkpoint.platform, mode: checkpoint.mode },
        });
        return null;
      }
      return checkpoint;
    }

    const headers = await this.listHeaders();
    const latest = headers
      .filter((header) => header.platform === platform && header.mode === mode)
      .sort((a, b) => b.createdAt - a.createdAt || b.updatedAt - a.updatedAt)[0];
    return latest ? this.loadById(latest.id) : null;
  }

  async loadById(id: string): Promise<Checkpoint | null> {
    const cached = await this.fetch(id);
    return cached ? toCheckpoint(cached) : null;
  }

  async update(checkpoint: Checkpoint): Promise<void> {
    await this.withCheckpoint(checkpoint.id, 'update', async (cached) => {
      const header: CheckpointHeader = { ...headerOf(checkpoint), updatedAt: this.now() };
      await this.writeHeader(header);
      cached.header = header;

      const missing = Object.values(checkpoint.items).filter((item) => !cached.items.has(item.itemId));
      if (missing.length > 0) {
        await this.appendItems(checkpoint.id, cached, missing.map((item) => ({ ...item })));
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
    await this.withCheckpoint(checkpointId, 'addItem', async (cached) => {
      const next = mergeAddedItem(cached.items.get(itemId), itemId, extra, success);
      await this.appendItems(checkpointId, cached, [next]);
    });
  }

  async updateItemStatus(checkpointId: string, itemId: string, patch: ItemStatusPatch): Promise<void> {
    await this.withCheckpoint(checkpointId, 'updateItemStatus', async (cached) => {
      const next = applyItemPatch(cached.items.get(itemId), itemId, patch, checkpointId);
      await this.appendItems(checkpointId, cached, [next]);
    });
  }

  async getCommentCursor(checkpointId: string, itemId: string): Promise<string> {
    return (await this.getItem(checkpointId, itemId))?.commentCursor ?? '';
  }

  async getItem(checkpointId: string, itemId: string): Promise<CheckpointItem | null> {
    const cached = await this.fetch(checkpointId);
    const item = cached?.items.get(itemId);
    return item ? { ...item, extra: { ...item.extra } } : null;
  }

  async close(): Promise<void> {
    this.cache.clear();
  }

  private dirOf(id: string): string {
    if (!/^[\w-]+$/.test(id)) {
      throw ScraperErrors.validationError(`Invalid checkpoint id: ${id}`, { checkpointId: id });
    }
    return path.join(this.baseDir, id);
  }

  private lockOf(id: string): Semaphore {
    let lock = this.locks.get(id);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(id, lock);
    }
    return lock;
  }

  /** Serializes a mutation on one checkpoint and wraps I/O failures as CHECKPOINT_ERROR. */
  private guard<T>(id: string, operation: string, task: () => Promise<T>): Promise<T> {
    return this.lockOf(id).use(async () => {
      try {
        return await task();
      } catch (error: unknown) {
        if (error instanceof ScraperError) throw error;
        throw ScraperErrors.checkpointError(
          `Checkpoint ${operation} failed`,
          { checkpointId: id, operation },
          error instanceof Error ? error : undefined,
        );
      }
    });
  }

  private async withCheckpoint(
    id: string,
    operation: string,
    task: (cached: CachedCheckpoint) => Promise<void>,
  ): Promise<void> {
    const cached = await this.fetch(id);
    if (!cached) {
      throw ScraperErrors.checkpointError(`Checkpoint ${id} not found`, { checkpointId: id, operation });
    }
    await this.guard(id, operation, () => task(cached));
  }

  private async fetch(id: string): Promise<CachedCheckpoint | null> {
    const cached = this.cache.get(id);
    if (cached) return cached;

    const dir = this.dirOf(id);
    let headerText: string;
    try {
      headerText = await fs.readFile(path.join(dir, HEADER_FILE), 'utf-8');
    } catch (error: unknown) {
      if (isMissing(error)) return null;
      throw ScraperErrors.checkpointError(
        'Failed to read checkpoint header',
        { checkpointId: id },
        error instanceof Error ? error : undefined,
      );
    }

    let header: CheckpointHeader;
    try {
      header = parseHeader(safeJsonParse(headerText), id);
    } catch (error: unknown) {
      if (error instanceof ScraperError) throw error;
      throw ScraperErrors.checkpointError(
        'Checkpoint header is not valid JSON',
        { checkpointId: id },
        error instanceof Error ? error : undefined,
      );
    }

    const ledger = await this.readItems(id);
    // mutations start only once a checkpoint is cached, and caching happens under the lock
    return this.guard(id, 'load', async () => {
      const existing = this.cache.get(id);
      if (existing) return existing;

      const loaded: CachedCheckpoint = { header, items: ledger.items, records: ledger.records };
      if (ledger.skipped > 0 || ledger.torn || this.shouldCompact(loaded)) {
        await this.rewriteItems(id, loaded);
      }
      this.cache.set(id, loaded);
      return loaded;
    });
  }

  private async readItems(id: string): Promise<LedgerRead> {
    const items = new Map<string, CheckpointItem>();
    let content: string;
    try {
      content = await fs.readFile(path.join(this.dirOf(id), ITEMS_FILE), 'utf-8');
    } catch (error: unknown) {
      if (isMissing(error)) return { items, records: 0, skipped: 0, torn: false };
      throw ScraperErrors.checkpointError(
        'Failed to read checkpoint items',
        { checkpointId: id },
        error instanceof Error ? error : undefined,
      );
    }

    let records = 0;
    let skipped = 0;
    for (const line of content.split('\n')) {
      if (line.trim().length === 0) continue;
      records++;
      const item = parseItem(safeJsonParseSafe(line));
      if (!item) {
        skipped++;
        continue;
      }
      items.set(item.itemId, item);
    }
    if (skipped > 0) {
      // a torn final line is expected after a crash mid-append
      logger.warn('Skipped unreadable checkpoint item records', { checkpointId: id, skipped });
    }
    return { items, records, skipped, torn: content.length > 0 && !content.endsWith('\n') };
  }

  private async listHeaders(): Promise<CheckpointHeader[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.baseDir);
    } catch (error: unknown) {
      if (isMissing(error)) return [];
      throw ScraperErrors.checkpointError(
        'Failed to list checkpoints',
        { dir: this.baseDir },
        error instanceof Error ? error : undefined,
      );
    }

    const headers: CheckpointHeader[] = [];
    for (const entry of entries) {
      if (!/^[\w-]+$/.test(entry)) continue;
      const cached = this.cache.get(entry);
      if (cached) {
        headers.push(cached.header);
        continue;
      }
      try {
        const text = await fs.readFile(path.join(this.baseDir, entry, HEADER_FILE), 'utf-8');
        headers.push(parseHeader(safeJsonParse(text), entry));
      } catch (error: unknown) {
        logger.warn('Ignoring unreadable checkpoint', { checkpointId: entry, error: String(error) });
      }
    }
    return headers;
  }

  private async writeHeader(header: CheckpointHeader): Promise<void> {
    const dir = this.dirOf(header.id);
    const target = path.join(dir, HEADER_FILE);
    const temp = `${target}.${process.pid}.tmp`;
    const handle = await fs.open(temp, 'w');
    try {
      await handle.writeFile(JSON.stringify(header, null, 2), 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(temp, target);
  }

  /** Appends records and applies them to the cache. Call under the checkpoint lock. */
  private async appendItems(id: string, cached: CachedCheckpoint, items: CheckpointItem[]): Promise<void> {
    const lines = items.map((item) => `${JSON.stringify(item)}\n`).join('');
    const handle = await fs.open(path.join(this.dirOf(id), ITEMS_FILE), 'a');
    try {
      await handle.appendFile(lines, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    for (const item of items) cached.items.set(item.itemId, item);
    cached.records += items.length;

    if (this.shouldCompact(cached)) await this.rewriteItems(id, cached);
  }

  private shouldCompact(cached: CachedCheckpoint): boolean {
    return cached.records >= this.compactThreshold && cached.records >= cached.items.size * 2;
  }

  /** Replaces the ledger with one record per item. Call under the checkpoint lock. */
  private async rewriteItems(id: string, cached: CachedCheckpoint): Promise<void> {
    const target = path.join(this.dirOf(id), ITEMS_FILE);
    const temp = `${target}.${process.pid}.tmp`;
    const lines = [...cached.items.values()].map((item) => `${JSON.stringify(item)}\n`).join('');
    const handle = await fs.open(temp, 'w');
    try {
      await handle.writeFile(lines, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }
    await fs.rename(temp, target);
    logger.debug('Checkpoint ledger compacted', { checkpointId: id, from: cached.records, to: cached.items.size });
    cached.records = cached.items.size;
  }
}
