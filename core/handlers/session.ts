/**
 * Per-run state shared by the mode handlers: the checkpoint being advanced, progress counters
 * and the failure policy for crawl units.
 */

import { createEnhancedLogger } from '../../utils/logger';
import { CrawlerConfig } from '../../utils/config-manager';
import { CrawlerApi } from '../api-client';
import { createCounters, CrawlMode, HandlerReport, RequestContext, UnitFailure } from '../crawler.types';
import { Checkpoint, CheckpointStore, describeCheckpoint } from '../db/checkpoint';
import { handleError, isFatalError } from '../errors';
import { CommentProcessor } from '../processors/comment-processor';
import { ItemProcessor } from '../processors/item-processor';
import { ContentSink } from '../storage';

const logger = createEnhancedLogger('CrawlSession');

export interface HandlerDeps {
  api: CrawlerApi;
  /** null when checkpointing is disabled. */
  store: CheckpointStore | null;
  sink: ContentSink;
  items: ItemProcessor;
  comments: CommentProcessor;
  config: CrawlerConfig;
}

export interface ModeHandler {
  readonly mode: CrawlMode;
  run(signal?: AbortSignal): Promise<HandlerReport>;
}

export class CrawlSession {
  checkpoint: Checkpoint | null = null;
  readonly counters = createCounters();
  readonly failures: UnitFailure[] = [];

  constructor(
    readonly mode: CrawlMode,
    private readonly store: CheckpointStore | null,
    private readonly config: CrawlerConfig,
    readonly signal?: AbortSignal,
  ) {}

  get checkpointId(): string | null {
    return this.checkpoint?.id ?? null;
  }

  context(extra: Omit<RequestContext, 'mode' | 'checkpointId' | 'signal'> = {}): RequestContext {
    return { ...extra, mode: this.mode, checkpointId: this.checkpointId, signal: this.signal };
  }

  /**
   * Resumes the requested (or latest) checkpoint of this mode, or starts a new one.
   */
  async open(): Promise<Checkpoint | null> {
    if (!this.store) {
      logger.info('Checkpointing disabled', { mode: this.mode });
      return null;
    }

    const { platform } = this.config;
    const requestedId = this.config.checkpoint.id;
    const existing = await this.store.load(platform, this.mode, requestedId);
    if (existing) {
      logger.info('Resuming checkpoint', describeCheckpoint(existing));
      this.checkpoint = existing;
      return existing;
    }

    if (requestedId) {
      logger.warn(`Checkpoint ${requestedId} not found, starting a new one`, { mode: this.mode });
    }
    this.checkpoint = await this.store.create(platform, this.mode);
    return this.checkpoint;
  }

  /** Applies `mutate` to the header and persists it. */
  async save(mutate: (checkpoint: Checkpoint) => void): Promise<void> {
    if (!this.store || !this.checkpoint) return;
    mutate(this.checkpoint);
    await this.store.update(this.checkpoint);
  }

  /**
   * Runs one crawl unit (a keyword, a creator, a feed session). A failure is recorded and
   * logged with the checkpoint snapshot; IDENTITY_EXHAUSTED and CANCELLED end the run.
   */
  async runUnit(unit: string, task: () => Promise<void>): Promise<void> {
    try {
      await task();
    } catch (error: unknown) {
      if (isFatalError(error)) {
        await this.flush();
        throw error;
      }
      const failure = handleError(error, { unit, checkpointId: this.checkpointId ?? undefined });
      this.counters.unitFailures++;
      this.failures.push({ unit, code: failure.code, message: failure.message });
      logger.error(`Crawl unit failed: ${unit}`, failure, {
        checkpoint: describeCheckpoint(this.checkpoint),
        counters: { ...this.counters },
      });
    }
  }

  /** Best-effort write of the current header, used on the way out of a run. */
  async flush(): Promise<void> {
    if (!this.store || !this.checkpoint) return;
    try {
      await this.store.update(this.checkpoint);
    } catch (error: unknown) {
      logger.warn('Checkpoint flush failed', { checkpointId: this.checkpointId, error: String(error) });
    }
  }

  report(): HandlerReport {
    return {
      mode: this.mode,
      checkpointId: this.checkpointId,
      counters: { ...this.counters },
      failures: [...this.failures],
    };
  }
}
