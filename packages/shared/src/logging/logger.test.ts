import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger, isLogLevel, type LogLevel } from './logger.js';

const fixedClock = () => new Date('2024-03-01T10:00:00.000Z');

function capture(): { lines: [LogLevel, string][]; sink: (level: LogLevel, line: string) => void } {
  const lines: [LogLevel, string][] = [];
  return { lines, sink: (level, line) => lines.push([level, line]) };
}

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the configured level', () => {
    const { lines, sink } = capture();

    const logger = createLogger({ level: 'warn', sink, now: fixedClock });
    logger.info('rendered');
    logger.error('failed');

    expect(lines).toEqual([['error', '[2024-03-01T10:00:00.000Z] [ERROR] [invoice-codec] failed']]);
  });

  it('should carry child context, the parent level and the sink', () => {
    const { lines, sink } = capture();

    const logger = createLogger({ level: 'warn', prefix: 'billing', sink, now: fixedClock }).child({
      schema: 'ZUGFeRD1p0',
    });
    logger.debug('rendered');
    logger.warn('Schema validation failed', { errors: 2 });

    expect(logger.level).toBe('warn');
    expect(lines).toEqual([
      [
        'warn',
        '[2024-03-01T10:00:00.000Z] [WARN] [billing] Schema validation failed {"schema":"ZUGFeRD1p0","errors":2}',
      ],
    ]);
  });

  it('should write to the console by default', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    createLogger({ now: fixedClock }).warn('slow');

    expect(warn).toHaveBeenCalledWith('[2024-03-01T10:00:00.000Z] [WARN] [invoice-codec] slow');
  });
});

describe('isLogLevel', () => {
  it('should recognise the four levels only', () => {
    expect(['debug', 'info', 'warn', 'error'].every(isLogLevel)).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
  });
});
