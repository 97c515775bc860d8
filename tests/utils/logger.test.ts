/**
 * Logger 单元测试
 */

import { Writable } from 'node:stream';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { transports } from 'winston';
import { ScraperErrors } from '../../core/errors';
import { createEnhancedLogger, createModuleLogger, describeError, logger, setLogLevel } from '../../utils/logger';

type Entry = Record<string, unknown>;

/** Lets entries travel through the logger's stream pipeline. */
function drain(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

describe('Logger', () => {
  let entries: Entry[];
  let capture: InstanceType<typeof transports.Stream>;

  beforeEach(() => {
    entries = [];
    const stream = new Writable({
      objectMode: true,
      write(chunk: Entry, _encoding, callback) {
        entries.push(chunk);
        callback();
      },
    });
    capture = new transports.Stream({ stream });
    logger.add(capture);
    setLogLevel('debug');
  });

  afterEach(() => {
    logger.remove(capture);
    setLogLevel('error');
  });

  describe('createModuleLogger', () => {
    it('tags entries with the module name and metadata', async () => {
      createModuleLogger('TestModule').info('hello', { itemId: '1' });
      await drain();

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({ level: 'info', message: 'hello', module: 'TestModule', itemId: '1' });
    });

    it('flattens a ScraperError into error fields', async () => {
      createModuleLogger('TestModule').error('failed', ScraperErrors.networkError('socket hang up', { url: '/x' }));
      await drain();

      expect(entries[0]).toMatchObject({
        level: 'error',
        message: 'failed',
        errorCode: 'NETWORK_ERROR',
        errorMessage: 'socket hang up',
        retryable: true,
      });
    });
  });

  describe('describeError', () => {
    it('describes plain errors and other values', () => {
      expect(describeError(new TypeError('bad'))).toEqual({ errorName: 'TypeError', errorMessage: 'bad' });
      expect(describeError('oops')).toEqual({ errorMessage: 'oops' });
      expect(describeError(undefined)).toEqual({});
    });
  });

  describe('EnhancedLogger', () => {
    it('merges context into every entry until cleared', async () => {
      const log = createEnhancedLogger('Handler');
      log.setContext({ checkpointId: 'cp-1' });
      log.warn('first', { page: 2 });
      log.clearContext();
      log.warn('second');
      await drain();

      expect(entries[0]).toMatchObject({ message: 'first', module: 'Handler', checkpointId: 'cp-1', page: 2 });
      expect(entries[1].checkpointId).toBeUndefined();
    });

    it('logs and rethrows a failed tracked operation', async () => {
      const log = createEnhancedLogger('Handler');

      await expect(
        log.trackAsync('load', async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');
      await drain();

      const messages = entries.map((entry) => entry.message);
      expect(messages).toEqual(['[START] load', '[PERF] load', '[FAILED] load']);
      expect(entries[2]).toMatchObject({ level: 'error', errorMessage: 'boom' });
    });
  });

  describe('setLogLevel', () => {
    it('drops entries below the level', async () => {
      setLogLevel('warn');
      const log = createEnhancedLogger('Levels');
      log.debug('hidden');
      log.info('hidden');
      log.warn('shown');
      await drain();

      expect(entries.map((entry) => entry.message)).toEqual(['shown']);
    });
  });
});
