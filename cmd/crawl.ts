#!/usr/bin/env node
/**
 * Crawl CLI
 *
 * Usage:
 *   crawl --type search --keywords "cats,dogs" --max-items 20
 *   crawl --type detail --ids 7300000000000000001,7300000000000000002
 *   crawl --type creator --creators MS4wLjABAAAAexample --checkpoint-id 3f6c...
 *   crawl --type homefeed --no-checkpoint
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { Crawler } from '../core/crawler';
import { CRAWL_MODES, HandlerReport, isCrawlMode } from '../core/crawler.types';
import { ErrorCode, handleError, ScraperError } from '../core/errors';
import { ConfigManager, ConfigOverrides } from '../utils/config-manager';
import { closeLogger, createEnhancedLogger, LOG_LEVELS, LogLevel, setLogLevel } from '../utils/logger';

const logger = createEnhancedLogger('CLI');

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

export interface CrawlCliOptions {
  type?: string;
  keywords?: string[];
  ids?: string[];
  creators?: string[];
  checkpointId?: string;
  checkpoint: boolean;
  maxItems?: number;
  logLevel?: LogLevel;
  config?: string;
}

const LOG_LEVEL_CHOICES: string[] = Object.values(LOG_LEVELS);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_CHOICES.includes(value);
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Not a positive integer.');
  }
  return parsed;
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new InvalidArgumentError(`Allowed choices are ${LOG_LEVEL_CHOICES.join(', ')}.`);
  }
  return value;
}

export function createProgram(): Command {
  return new Command()
    .name('crawl')
    .description('Resumable crawler for search, detail, creator and homefeed modes')
    .addOption(new Option('-t, --type <mode>', 'crawl mode').choices([...CRAWL_MODES]))
    .option('-k, --keywords <list>', 'comma separated search keywords', parseList)
    .option('--ids <list>', 'comma separated content ids', parseList)
    .option('--creators <list>', 'comma separated creator ids', parseList)
    .option('--checkpoint-id <id>', 'resume this checkpoint')
    .option('--no-checkpoint', 'run without a checkpoint')
    .option('--max-items <n>', 'items per keyword, creator or feed session', parsePositiveInt)
    .option('--log-level <level>', `log level (${LOG_LEVEL_CHOICES.join('|')})`, parseLogLevel)
    .option('-c, --config <file>', 'config file (default: crawler.config.json)');
}

/**
 * Maps parsed flags onto the CLI layer of the configuration.
 */
export function toOverrides(options: CrawlCliOptions): ConfigOverrides {
  const overrides: ConfigOverrides = {};
  if (options.type !== undefined && isCrawlMode(options.type)) overrides.mode = options.type;
  if (options.keywords) overrides.keywords = options.keywords;
  if (options.ids) overrides.itemIds = options.ids;
  if (options.creators) overrides.creatorIds = options.creators;
  if (options.maxItems !== undefined) overrides.maxItemsCount = options.maxItems;
  if (options.logLevel) overrides.logging = { level: options.logLevel };

  if (!options.checkpoint) {
    overrides.checkpoint = { enabled: false };
  } else if (options.checkpointId) {
    overrides.checkpoint = { id: options.checkpointId };
  }
  return overrides;
}

export function exitCodeFor(error: unknown): number {
  return error instanceof ScraperError && error.code === ErrorCode.CANCELLED ? EXIT_CANCELLED : EXIT_FAILURE;
}

export function formatSummary(report: HandlerReport): string {
  const { counters } = report;
  return [
    `mode=${report.mode}`,
    `checkpoint=${report.checkpointId ?? 'none'}`,
    `pages=${counters.pages}`,
    `saved=${counters.itemsSaved}`,
    `skipped=${counters.itemsSkipped}`,
    `failed=${counters.itemsFailed}`,
    `comments=${counters.commentsSaved}`,
    `unitFailures=${counters.unitFailures}`,
  ].join(' ');
}

/**
 * Runs one crawl from CLI arguments and returns the process exit code.
 */
export async function runCli(argv: string[]): Promise<number> {
  const program = createProgram();
  program.parse(argv);
  const options = program.opts<CrawlCliOptions>();

  let crawler: Crawler;
  try {
    const manager = new ConfigManager({ configFile: options.config, overrides: toOverrides(options) });
    const config = manager.getConfig();
    setLogLevel(config.logging.level);
    crawler = new Crawler(config);
  } catch (error: unknown) {
    logger.error('Configuration failed', error);
    return EXIT_FAILURE;
  }

  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) return;
    logger.warn(`Received ${signal}, stopping after the current request`);
    controller.abort();
  };
  process.on('SIGINT', abort);
  process.on('SIGTERM', abort);

  try {
    const report = await crawler.run(controller.signal);
    logger.info(`Crawl finished: ${formatSummary(report)}`);
    return EXIT_OK;
  } catch (error: unknown) {
    const failure = handleError(error);
    if (failure.code === ErrorCode.CANCELLED) {
      logger.warn('Crawl cancelled', { context: failure.context });
    } else {
      logger.error('Crawl failed', failure);
    }
    return exitCodeFor(failure);
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
    try {
      await crawler.close();
    } catch (error: unknown) {
      logger.error('Failed to close crawler resources', error);
    }
  }
}

if (require.main === module) {
  runCli(process.argv)
    .then(async (code) => {
      await closeLogger();
      process.exit(code);
    })
    .catch(async (error: unknown) => {
      logger.error('Unexpected CLI failure', error);
      await closeLogger();
      process.exit(EXIT_FAILURE);
    });
}
