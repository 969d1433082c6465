/**
 * Tests for Logger utility
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  Logger,
  OperationLogger,
  createLogger,
  getLoggerProvider,
  setLoggerProvider,
  resetLoggerProvider,
  withArticleContext,
  withArticleContextAsync,
  getArticleContext,
  type LoggerProvider,
} from '../../src/lib/logger.js';

/** First argument of the n-th call of a console spy, parsed as JSON */
function loggedJson(spy: { mock: { calls: unknown[][] } }, call = 0): Record<string, unknown> {
  const line = spy.mock.calls[call]?.[0];
  expect(typeof line).toBe('string');
  return JSON.parse(String(line));
}

describe('Logger', () => {
  let originalEnv: NodeJS.ProcessEnv;
  let logSpy: ReturnType<typeof vi.spyOn>;
  let errorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    originalEnv = { ...process.env };
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    process.env = originalEnv;
    vi.restoreAllMocks();
    resetLoggerProvider();
  });

  describe('constructor', () => {
    it('should create logger with default config', () => {
      const log = new Logger();
      const config = log.getConfig();

      expect(config.context).toBe('app');
      expect(config.timestamps).toBe(true);
    });

    it('should create logger with custom context and level', () => {
      const log = new Logger({ context: 'shred', level: 'error' });
      expect(log.getConfig().context).toBe('shred');
      expect(log.getConfig().level).toBe('error');
    });

    it('should respect LOG_LEVEL environment variable', () => {
      process.env['LOG_LEVEL'] = 'debug';
      expect(new Logger().getConfig().level).toBe('debug');
    });

    it('should ignore an unknown LOG_LEVEL', () => {
      process.env['LOG_LEVEL'] = 'verbose';
      process.env['NODE_ENV'] = 'test';
      expect(new Logger().getConfig().level).toBe('info');
    });

    it('should respect LOG_FORMAT environment variable', () => {
      process.env['LOG_FORMAT'] = 'json';
      expect(new Logger().getConfig().format).toBe('json');
    });
  });

  describe('level filtering', () => {
    it('should drop messages below the minimum level', () => {
      const log = new Logger({ level: 'warn', format: 'json' });
      log.debug('hidden');
      log.info('hidden');
      log.warn('shown');

      expect(logSpy).not.toHaveBeenCalled();
      expect(errorSpy).toHaveBeenCalledTimes(1);
    });

    it('should write info to stdout and errors to stderr', () => {
      const log = new Logger({ level: 'debug', format: 'json' });
      log.info('to stdout');
      log.error('to stderr');

      expect(loggedJson(logSpy).message).toBe('to stdout');
      expect(loggedJson(errorSpy).message).toBe('to stderr');
    });
  });

  describe('json output', () => {
    it('should include context, service and data', () => {
      const log = new Logger({ level: 'info', format: 'json', context: 'chunk' });
      log.info('Chunked article', { chunks: 3 });

      const entry = loggedJson(logSpy);
      expect(entry.level).toBe('info');
      expect(entry.context).toBe('chunk');
      expect(entry.service).toBe('wiki-shredder');
      expect(entry.data).toEqual({ chunks: 3 });
    });

    it('should replace an Error in data with its message and keep the stack', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      log.error('Failed', { error: new Error('boom') });

      const entry = loggedJson(errorSpy);
      expect(entry.data).toEqual({ error: 'boom' });
      expect(typeof entry.stack).toBe('string');
    });

    it('should merge default fields from withFields', () => {
      const log = new Logger({ level: 'info', format: 'json' }).withFields({ batch: 'b1' });
      log.info('Hello', { n: 1 });
      expect(loggedJson(logSpy).data).toEqual({ batch: 'b1', n: 1 });
    });

    it('should record the operation of an operation logger', () => {
      const op = new Logger({ level: 'info', format: 'json' }).withOperation('ingest');
      expect(op).toBeInstanceOf(OperationLogger);
      op.info('Started');
      expect(loggedJson(logSpy).operation).toBe('ingest');
    });

    it('should prefix child contexts', () => {
      const child = new Logger({ context: 'ingest' }).child('archive');
      expect(child.getConfig().context).toBe('ingest:archive');
    });
  });

  describe('article context', () => {
    it('should attach the article id inside withArticleContext', () => {
      const log = new Logger({ level: 'info', format: 'json' });
      withArticleContext({ articleId: 'A/Paris', fields: { pass: 1 } }, () => {
        log.info('Inside');
      });
      log.info('Outside');

      const inside = loggedJson(logSpy, 0);
      const outside = loggedJson(logSpy, 1);
      expect(inside.articleId).toBe('A/Paris');
      expect(inside.data).toEqual({ pass: 1 });
      expect(outside.articleId).toBeUndefined();
    });

    it('should keep the context across awaits', async () => {
      const id = await withArticleContextAsync({ articleId: 'A/Rome' }, async () => {
        await Promise.resolve();
        return getArticleContext()?.articleId;
      });
      expect(id).toBe('A/Rome');
      expect(getArticleContext()).toBeUndefined();
    });
  });

  describe('provider', () => {
    it('should cache module loggers', () => {
      expect(createLogger('shred')).toBe(createLogger('shred'));
    });

    it('should route createLogger through a provider that only creates loggers', () => {
      const custom = new Logger({ context: 'custom' });
      const provider: LoggerProvider = {
        createLogger: () => custom,
      };
      const previous = setLoggerProvider(provider);

      expect(createLogger('anything')).toBe(custom);
      expect(getLoggerProvider()).toBe(provider);

      setLoggerProvider(previous);
      expect(createLogger('anything')).not.toBe(custom);
    });
  });
});
