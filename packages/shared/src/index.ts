/**
 * @invoice-codec/shared
 *
 * Shared utilities for the invoice codec.
 *
 * @packageDocumentation
 */

export {
  createLogger,
  consoleSink,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LogContext,
  type LogSink,
  type LoggerOptions,
} from './logging/logger.js';
export {
  CodecError,
  ConfigurationError,
  TagMismatchError,
  UnknownElementError,
  UnknownFieldError,
  FieldTypeError,
  MissingValueError,
  InvalidDecimalError,
  MissingAttributeError,
  MalformedDateContainerError,
  UnsupportedDateFormatError,
  InvalidDateError,
  MalformedIndicatorError,
  XmlParseError,
  SchemaValidationFailedError,
} from './errors/errors.js';

// Decimal arithmetic
export {
  add,
  subtract,
  multiply,
  sum,
  round,
  compare,
  equals,
  isValidDecimalAmount,
  type RoundingMode,
  type DecimalConfig,
  DEFAULT_ROUNDING_MODE,
  DEFAULT_DECIMAL_PLACES,
} from './decimal/decimal-utils.js';
