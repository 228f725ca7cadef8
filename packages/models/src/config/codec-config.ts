import {
  ConfigurationError,
  createLogger,
  isLogLevel,
  type Logger,
  type LoggerOptions,
  type LogLevel,
  type LogSink,
} from '@invoice-codec/shared';

/**
 * Defaults for the codec's ambient settings.
 */
export const DEFAULT_CODEC_CONFIG = {
  logLevel: 'info',
  logPrefix: 'invoice-codec',
} as const;

/**
 * Caller overrides
 */
export interface CodecConfig {
  /** Minimum level written by the codec logger */
  logLevel?: LogLevel;
  /** Prefix of every log line */
  logPrefix?: string;
}

export interface ResolvedCodecConfig {
  logLevel: LogLevel;
  logPrefix: string;
  /** Layers that contributed, lowest precedence first */
  sources: ('default' | 'env' | 'override')[];
}

/**
 * Build the effective codec configuration by merging:
 * 1. Defaults
 * 2. Environment (INVOICE_CODEC_LOG_LEVEL)
 * 3. Explicit overrides
 *
 * @throws ConfigurationError when INVOICE_CODEC_LOG_LEVEL is not a log level
 */
export function resolveCodecConfig(
  overrides: CodecConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedCodecConfig {
  const resolved: ResolvedCodecConfig = { ...DEFAULT_CODEC_CONFIG, sources: ['default'] };

  const envLevel = env['INVOICE_CODEC_LOG_LEVEL'];
  if (envLevel !== undefined && envLevel !== '') {
    if (!isLogLevel(envLevel)) {
      throw new ConfigurationError(`Invalid INVOICE_CODEC_LOG_LEVEL: ${envLevel}`, {
        value: envLevel,
      });
    }
    resolved.logLevel = envLevel;
    resolved.sources.push('env');
  }

  if (overrides.logLevel !== undefined || overrides.logPrefix !== undefined) {
    resolved.logLevel = overrides.logLevel ?? resolved.logLevel;
    resolved.logPrefix = overrides.logPrefix ?? resolved.logPrefix;
    resolved.sources.push('override');
  }

  return resolved;
}

/**
 * Logger built from a resolved configuration.
 */
export function createCodecLogger(config: ResolvedCodecConfig, sink?: LogSink): Logger {
  const options: LoggerOptions = { level: config.logLevel, prefix: config.logPrefix };
  if (sink !== undefined) {
    options.sink = sink;
  }
  return createLogger(options);
}

let ambient: { envLevel: string | undefined; logger: Logger } | undefined;

/**
 * Logger used by serialize and parse when the caller passes none.
 *
 * Resolved once per value of INVOICE_CODEC_LOG_LEVEL. An invalid value falls
 * back to the default level and is reported once as a warning.
 */
export function defaultCodecLogger(env: NodeJS.ProcessEnv = process.env, sink?: LogSink): Logger {
  const envLevel = env['INVOICE_CODEC_LOG_LEVEL'];
  if (ambient !== undefined && ambient.envLevel === envLevel && sink === undefined) {
    return ambient.logger;
  }

  let logger: Logger;
  try {
    logger = createCodecLogger(resolveCodecConfig({}, env), sink);
  } catch (error) {
    if (!(error instanceof ConfigurationError)) {
      throw error;
    }
    logger = createCodecLogger(resolveCodecConfig({}, {}), sink);
    logger.warn('Ignoring invalid INVOICE_CODEC_LOG_LEVEL', { value: envLevel });
  }

  if (sink === undefined) {
    ambient = { envLevel, logger };
  }
  return logger;
}
