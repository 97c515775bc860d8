/**
 * Shared crawl types
 */

export const CRAWL_MODES = ['search', 'detail', 'creator', 'homefeed'] as const;

export type CrawlMode = (typeof CRAWL_MODES)[number];

export function isCrawlMode(value: string): value is CrawlMode {
  return CRAWL_MODES.some((mode) => mode === value);
}

/**
 * Request-scoped values threaded from a handler through processors and the client.
 */
export interface RequestContext {
  mode?: CrawlMode;
  keyword?: string;
  creatorId?: string;
  checkpointId?: string | null;
  signal?: AbortSignal;
}

export interface ProgressCounters {
  pages: number;
  itemsSaved: number;
  itemsSkipped: number;
  itemsFailed: number;
  commentsSaved: number;
  unitFailures: number;
}

export interface UnitFailure {
  unit: string;
  code: string;
  message: string;
}

export interface HandlerReport {
  mode: CrawlMode;
  checkpointId: string | null;
  counters: ProgressCounters;
  failures: UnitFailure[];
}

export function createCounters(): ProgressCounters {
  return {
    pages: 0,
    itemsSaved: 0,
    itemsSkipped: 0,
    itemsFailed: 0,
    commentsSaved: 0,
    unitFailures: 0,
  };
}
