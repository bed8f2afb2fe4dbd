import { beforeEach, describe, expect, it } from 'vitest';
import { Logger, LogLevel, parseLogLevel } from './logger';

describe('Logger', () => {
  let lines: string[];
  let logger: Logger;

  beforeEach(() => {
    lines = [];
    logger = new Logger({ useColors: false, write: (line) => lines.push(line) });
  });

  it('should log info messages with timestamp and emoji', () => {
    logger.info('info message');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^\d{2}-\d{2} \d{2}:\d{2}:\d{2} ℹ️ info message$/);
  });

  it('should log error messages', () => {
    logger.error('error message');
    expect(lines[0]).toContain('❌ error message');
  });

  it('should filter messages based on level', () => {
    logger.setLevel(LogLevel.WARNING);

    logger.debug('debug');
    logger.info('info');
    logger.success('success');
    logger.warning('warning');
    logger.error('error');

    expect(lines).toHaveLength(2);
    expect(lines[0]).toContain('⚠️ warning');
    expect(lines[1]).toContain('❌ error');
  });

  it('should use colors when enabled', () => {
    logger.setUseColors(true);
    logger.success('message');
    expect(lines[0]).toContain('\x1b[32mmessage\x1b[0m');
  });

  it('should not emit escape codes when colors are disabled', () => {
    logger.info('message');
    expect(lines[0]).not.toContain('\x1b[');
  });
});

describe('parseLogLevel', () => {
  it('should accept level names in any case', () => {
    expect(parseLogLevel('debug')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('Warning')).toBe(LogLevel.WARNING);
    expect(parseLogLevel(' ERROR ')).toBe(LogLevel.ERROR);
  });

  it('should accept warn as an alias', () => {
    expect(parseLogLevel('warn')).toBe(LogLevel.WARNING);
  });

  it('should return undefined for unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
  });
});
