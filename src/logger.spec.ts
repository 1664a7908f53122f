/**
 * Loggers
 */

import { createConsoleLogger, MemoryLogger, silentLogger } from './logger';

describe('createConsoleLogger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should prefix lines with the tag', () => {
    const logger = createConsoleLogger('splits', 'info');
    logger.info('5 folds');
    logger.warn('empty train slice');

    expect(log).toHaveBeenCalledWith('[splits] 5 folds');
    expect(warn).toHaveBeenCalledWith('[splits] empty train slice');
  });

  it('should only print debug lines at debug level', () => {
    createConsoleLogger('features', 'info').debug('hidden');
    expect(log).not.toHaveBeenCalled();

    createConsoleLogger('features', 'debug').debug('shown');
    expect(log).toHaveBeenCalledWith('[features] shown');
  });
});

describe('MemoryLogger', () => {
  it('should record lines with their level', () => {
    const logger = new MemoryLogger();
    logger.info('a');
    logger.warn('b');
    logger.debug('c');
    expect(logger.lines).toEqual(['info: a', 'warn: b', 'debug: c']);
  });
});

describe('silentLogger', () => {
  it('should accept every level', () => {
    expect(() => {
      silentLogger.info('x');
      silentLogger.warn('x');
      silentLogger.debug('x');
    }).not.toThrow();
  });
});
