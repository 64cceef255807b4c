/**
 * Logger Tests
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  combineLoggers,
  createConsoleLogger,
  createFileLogger,
  formatFields,
  formatLine,
  isLogLevel,
} from '../logger';
import { createMockLogger } from '../../../__tests__/helpers/mocks';

describe('formatFields', () => {
  it('should render key=value pairs and quote values with whitespace', () => {
    expect(formatFields({ a: 'x y', b: 2, c: undefined, d: null })).toBe('a="x y" b=2 d=null');
  });

  it('should render nothing without fields', () => {
    expect(formatFields()).toBe('');
    expect(formatLine('hello')).toBe('hello');
    expect(formatLine('hello', { n: 1 })).toBe('hello n=1');
  });
});

describe('isLogLevel', () => {
  it('should accept known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});

describe('createConsoleLogger', () => {
  let logSpy: jest.SpyInstance;
  let errorSpy: jest.SpyInstance;

  beforeEach(() => {
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should filter below the minimum level', () => {
    const logger = createConsoleLogger({ level: 'warn' });

    logger.debug('noise');
    logger.info('noise');
    logger.warn('disk low', { free: 10 });
    logger.error('failed');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy.mock.calls).toEqual([['⚠️  disk low free=10'], ['❌ failed']]);
  });

  it('should send debug and info to stdout', () => {
    const logger = createConsoleLogger({ level: 'debug' });

    logger.debug('looking');
    logger.info('done', { pages: 3 });

    expect(logSpy.mock.calls).toEqual([['🔍 looking'], ['✅ done pages=3']]);
  });
});

describe('createFileLogger', () => {
  it('should append timestamped lines', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'logger-'));
    const file = path.join(dir, 'crawler.log');
    const logger = createFileLogger(file, { level: 'info' });

    logger.debug('skipped');
    logger.info('Crawling shop.test', { maxDepth: 3 });

    let content = '';
    for (let attempt = 0; attempt < 50 && !content; attempt++) {
      await new Promise((resolve) => setTimeout(resolve, 20));
      content = fs.existsSync(file) ? fs.readFileSync(file, 'utf8') : '';
    }

    expect(content).toMatch(/^\d{4}-\d{2}-\d{2}T[\d:.]+Z - INFO - Crawling shop\.test maxDepth=3\n$/);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});

describe('combineLoggers', () => {
  it('should fan out every call', () => {
    const first = createMockLogger();
    const second = createMockLogger();
    const logger = combineLoggers(first, second);

    logger.warn('careful', { n: 1 });

    expect(first.warn).toHaveBeenCalledWith('careful', { n: 1 });
    expect(second.warn).toHaveBeenCalledWith('careful', { n: 1 });
  });
});
