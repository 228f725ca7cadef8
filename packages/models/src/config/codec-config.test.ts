import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '@invoice-codec/shared';
import type { LogLevel } from '@invoice-codec/shared';
import {
  createCodecLogger,
  DEFAULT_CODEC_CONFIG,
  defaultCodecLogger,
  resolveCodecConfig,
} from './codec-config.js';

describe('resolveCodecConfig', () => {
  it('should fall back to defaults', () => {
    expect(resolveCodecConfig({}, {})).toEqual({
      logLevel: DEFAULT_CODEC_CONFIG.logLevel,
      logPrefix: 'invoice-codec',
      sources: ['default'],
    });
  });

  it('should read the level from the environment', () => {
    const config = resolveCodecConfig({}, { INVOICE_CODEC_LOG_LEVEL: 'debug' });

    expect(config.logLevel).toBe('debug');
    expect(config.sources).toEqual(['default', 'env']);
  });

  it('should prefer explicit overrides', () => {
    const config = resolveCodecConfig(
      { logLevel: 'error', logPrefix: 'billing' },
      { INVOICE_CODEC_LOG_LEVEL: 'debug' },
    );

    expect(config).toEqual({
      logLevel: 'error',
      logPrefix: 'billing',
      sources: ['default', 'env', 'override'],
    });
  });

  it('should reject an unknown level', () => {
    expect(() => resolveCodecConfig({}, { INVOICE_CODEC_LOG_LEVEL: 'verbose' })).toThrow(
      ConfigurationError,
    );
  });
});

describe('createCodecLogger', () => {
  it('should take level and prefix from the resolved configuration', () => {
    const lines: string[] = [];
    const config = resolveCodecConfig({ logLevel: 'warn', logPrefix: 'billing' }, {});

    const logger = createCodecLogger(config, (_level, line) => lines.push(line));
    logger.info('rendered');
    logger.warn('slow');

    expect(logger.level).toBe('warn');
    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/\[WARN\] \[billing\] slow$/);
  });
});

describe('defaultCodecLogger', () => {
  it('should fall back to the default level on an invalid variable', () => {
    const lines: [LogLevel, string][] = [];

    const logger = defaultCodecLogger({ INVOICE_CODEC_LOG_LEVEL: 'verbose' }, (level, line) =>
      lines.push([level, line]),
    );

    expect(logger.level).toBe('info');
    expect(lines).toHaveLength(1);
    expect(lines[0]?.[0]).toBe('warn');
    expect(lines[0]?.[1]).toMatch(/Ignoring invalid INVOICE_CODEC_LOG_LEVEL \{"value":"verbose"\}$/);
  });

  it('should reuse one logger while the variable is unchanged', () => {
    const env = { INVOICE_CODEC_LOG_LEVEL: 'error' };

    const first = defaultCodecLogger(env);

    expect(first.level).toBe('error');
    expect(defaultCodecLogger(env)).toBe(first);
    expect(defaultCodecLogger({ INVOICE_CODEC_LOG_LEVEL: 'debug' }).level).toBe('debug');
  });
});
