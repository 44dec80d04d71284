import { describe, it, expect, vi, afterEach } from 'vitest';
import { ConsoleLogger, LogLevel, SilentLogger, createLogger, parseLogLevel } from '../logging/logger.js';

describe('ConsoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should format level, prefix, message and meta', () => {
    const logger = new ConsoleLogger({ prefix: 'deck' });

    expect(logger.format('WARN', 'careful', { code: 'DECK_EMPTY_DIRECTORY' }, '')).toBe(
      'WARN [deck] careful {"code":"DECK_EMPTY_DIRECTORY"}'
    );
  });

  it('should write warnings to stderr and respect the level', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new ConsoleLogger({ level: LogLevel.WARN });

    logger.info('hidden');
    logger.warn('shown');

    expect(logSpy).not.toHaveBeenCalled();
    expect(errorSpy).toHaveBeenCalledWith('WARN shown');
  });

  it('should put the prefix after the level', () => {
    const logger = new ConsoleLogger({ prefix: 'deck' });

    expect(logger.format('INFO', 'done', undefined, '')).toBe('INFO [deck] done');
  });

  it('should truncate long meta strings', () => {
    const logger = new ConsoleLogger();
    const line = logger.format('DEBUG', 'x', { text: 'a'.repeat(600) }, '');

    expect(line).toBe(`DEBUG x {"text":"${'a'.repeat(500)}... [600 chars]"}`);
  });
});

describe('createLogger', () => {
  it('should be silent under NODE_ENV=test', () => {
    expect(createLogger()).toBeInstanceOf(SilentLogger);
  });

  it('should parse level names', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('SILENT')).toBe(LogLevel.SILENT);
    expect(parseLogLevel('loud')).toBeUndefined();
    expect(parseLogLevel(undefined)).toBeUndefined();
  });
});
