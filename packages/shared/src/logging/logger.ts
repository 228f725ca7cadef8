/**
 * Codec logging
 *
 * Lines are written as `[time] [LEVEL] [prefix] message {context}` to a sink,
 * the console by default. Callers log tags, sizes and schema names only;
 * document content (party names, amounts, identifiers) never goes into a
 * log line.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogContext = Readonly<Record<string, unknown>>;

export interface Logger {
  readonly level: LogLevel;
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  /** Same sink and level, with extra context merged into every line */
  child(context: LogContext): Logger;
}

/**
 * Receives each formatted line that passes the level filter
 */
export type LogSink = (level: LogLevel, line: string) => void;

export interface LoggerOptions {
  /** @default 'info' */
  level?: LogLevel;
  /** @default 'invoice-codec' */
  prefix?: string;
  context?: LogContext;
  sink?: LogSink;
  /** Clock used for the timestamp */
  now?: () => Date;
}

export const LOG_LEVELS: Readonly<Record<LogLevel, number>> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

export const consoleSink: LogSink = (level, line) => {
  console[level](line);
};

class PrefixedLogger implements Logger {
  readonly level: LogLevel;
  private readonly prefix: string;
  private readonly context: LogContext;
  private readonly sink: LogSink;
  private readonly now: () => Date;

  constructor(options: LoggerOptions) {
    this.level = options.level ?? 'info';
    this.prefix = options.prefix ?? 'invoice-codec';
    this.context = options.context ?? {};
    this.sink = options.sink ?? consoleSink;
    this.now = options.now ?? (() => new Date());
  }

  debug(message: string, context?: LogContext): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write('warn', message, context);
  }

  error(message: string, context?: LogContext): void {
    this.write('error', message, context);
  }

  child(context: LogContext): Logger {
    return new PrefixedLogger({
      level: this.level,
      prefix: this.prefix,
      context: { ...this.context, ...context },
      sink: this.sink,
      now: this.now,
    });
  }

  private write(level: LogLevel, message: string, context: LogContext = {}): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.level]) {
      return;
    }
    const merged = { ...this.context, ...context };
    const suffix = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    const time = this.now().toISOString();
    this.sink(level, `[${time}] [${level.toUpperCase()}] [${this.prefix}] ${message}${suffix}`);
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new PrefixedLogger(options);
}
