import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import { createEnhancedLogger } from '../utils/logger';
import { Semaphore } from './concurrency-gate';
import { CrawlMode } from './crawler.types';
import { ScraperErrors } from './errors';
import { CommentRecord, ContentRecord, CreatorRecord } from './extractor';

const logger = createEnhancedLogger('Storage');

export type RecordKind = 'contents' | 'comments' | 'creators';

/**
 * Destination for final records. Implementations must accept concurrent calls.
 */
export interface ContentSink {
  storeContent(record: ContentRecord): Promise<void>;
  storeComment(record: CommentRecord): Promise<void>;
  storeCreator(record: CreatorRecord): Promise<void>;
  close(): Promise<void>;
}

export interface JsonLinesSinkOptions {
  outputDir: string;
  mode: CrawlMode;
  now?: () => Date;
}

function dateStamp(date: Date): string {
  return date.toISOString().split('T')[0];
}

/**
 * Appends one JSON document per line to `<outputDir>/<mode>_<kind>_<YYYY-MM-DD>.jsonl`.
 */
export class JsonLinesSink implements ContentSink {
  private readonly locks = new Map<string, Semaphore>();
  private dirReady: Promise<void> | null = null;

  constructor(private readonly options: JsonLinesSinkOptions) {}

  storeContent(record: ContentRecord): Promise<void> {
    return this.append('contents', record);
  }

  storeComment(record: CommentRecord): Promise<void> {
    return this.append('comments', record);
  }

  storeCreator(record: CreatorRecord): Promise<void> {
    return this.append('creators', record);
  }

  async close(): Promise<void> {
    this.locks.clear();
  }

  filePath(kind: RecordKind): string {
    const now = this.options.now?.() ?? new Date();
    return path.join(this.options.outputDir, `${this.options.mode}_${kind}_${dateStamp(now)}.jsonl`);
  }

  private async append(kind: RecordKind, record: ContentRecord | CommentRecord | CreatorRecord): Promise<void> {
    const file = this.filePath(kind);
    let lock = this.locks.get(file);
    if (!lock) {
      lock = new Semaphore(1);
      this.locks.set(file, lock);
    }
    await lock.use(async () => {
      try {
        await this.ensureDir();
        await fs.appendFile(file, `${JSON.stringify(record)}\n`, 'utf-8');
      } catch (error: unknown) {
        logger.error('Failed to append record', error, { file, kind });
        throw ScraperErrors.storageError(
          `Failed to write ${kind} record`,
          { file },
          error instanceof Error ? error : undefined,
        );
      }
    });
  }

  private ensureDir(): Promise<void> {
    if (!this.dirReady) {
      this.dirReady = fs.mkdir(this.options.outputDir, { recursive: true }).then(() => undefined);
      this.dirReady.catch(() => {
        this.dirReady = null;
      });
    }
    return this.dirReady;
  }
}

/**
 * Keeps records in memory. Used by tests and by embedders that consume records directly.
 */
export class MemorySink implements ContentSink {
  readonly contents: ContentRecord[] = [];
  readonly comments: CommentRecord[] = [];
  readonly creators: CreatorRecord[] = [];

  async storeContent(record: ContentRecord): Promise<void> {
    this.contents.push(record);
  }

  async storeComment(record: CommentRecord): Promise<void> {
    this.comments.push(record);
  }

  async storeCreator(record: CreatorRecord): Promise<void> {
    this.creators.push(record);
  }

  async close(): Promise<void> {}
}
