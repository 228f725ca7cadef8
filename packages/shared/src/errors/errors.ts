import type { SchemaValidationIssue } from '@invoice-codec/contracts';

/**
 * Base error class for the invoice codec.
 *
 * Every failure raised while encoding, decoding or validating a document is a
 * CodecError carrying a stable `code` and the offending tag, attribute or text
 * in `context`.
 */
export class CodecError extends Error {
  readonly code: string;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'CodecError';
    this.code = code;
    if (context !== undefined) {
      this.context = context;
    }

    // Maintains proper stack trace for where error was thrown

    Error.captureStackTrace?.(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/**
 * Error thrown for configuration issues (bad field declarations, unknown
 * schema names, invalid settings)
 */
export class ConfigurationError extends CodecError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
    this.name = 'ConfigurationError';
  }
}

/**
 * Decode target's tag disagrees with the input node
 */
export class TagMismatchError extends CodecError {
  readonly expected: string;
  readonly found: string;

  constructor(expected: string, found: string) {
    super(`Invalid document: found tag ${found} where ${expected} was expected`, 'TAG_MISMATCH', {
      expected,
      found,
    });
    this.name = 'TagMismatchError';
    this.expected = expected;
    this.found = found;
  }
}

/**
 * Input child tag has no matching declared field
 */
export class UnknownElementError extends CodecError {
  readonly tag: string;
  readonly parent: string;

  constructor(tag: string, parent: string) {
    super(`Unknown element ${tag} inside ${parent}`, 'UNKNOWN_ELEMENT', { tag, parent });
    this.name = 'UnknownElementError';
    this.tag = tag;
    this.parent = parent;
  }
}

/**
 * A field handle was used on an element type that does not declare it
 */
export class UnknownFieldError extends CodecError {
  readonly field: string;

  constructor(field: string, owner: string) {
    super(`Field '${field}' is not declared on ${owner}`, 'UNKNOWN_FIELD', { field, owner });
    this.name = 'UnknownFieldError';
    this.field = field;
  }
}

/**
 * A value of the wrong variant or tag was assigned to a field
 */
export class FieldTypeError extends CodecError {
  readonly field: string;

  constructor(field: string, expected: string, found: string) {
    super(`Field '${field}' expects ${expected}, got ${found}`, 'FIELD_TYPE_MISMATCH', {
      field,
      expected,
      found,
    });
    this.name = 'FieldTypeError';
    this.field = field;
  }
}

/**
 * A required value is absent (unset field, date or indicator without value)
 */
export class MissingValueError extends CodecError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'MISSING_VALUE', context);
    this.name = 'MissingValueError';
  }
}

/**
 * Leaf text is not a well-formed exact decimal
 */
export class InvalidDecimalError extends CodecError {
  readonly text: string;

  constructor(text: string, tag?: string) {
    super(
      tag === undefined ? `Invalid decimal '${text}'` : `Invalid decimal '${text}' in ${tag}`,
      'INVALID_DECIMAL',
      tag === undefined ? { text } : { text, tag },
    );
    this.name = 'InvalidDecimalError';
    this.text = text;
  }
}

/**
 * Required attribute absent on a leaf node
 */
export class MissingAttributeError extends CodecError {
  readonly attribute: string;
  readonly tag: string;

  constructor(attribute: string, tag: string) {
    super(`Missing attribute '${attribute}' on ${tag}`, 'MISSING_ATTRIBUTE', { attribute, tag });
    this.name = 'MissingAttributeError';
    this.attribute = attribute;
    this.tag = tag;
  }
}

/**
 * Date leaf does not hold exactly one DateTimeString child
 */
export class MalformedDateContainerError extends CodecError {
  constructor(message: string, tag: string) {
    super(message, 'MALFORMED_DATE_CONTAINER', { tag });
    this.name = 'MalformedDateContainerError';
  }
}

/**
 * Date leaf uses a format code other than "102"
 */
export class UnsupportedDateFormatError extends CodecError {
  readonly format: string;

  constructor(format: string, tag: string) {
    super(`Date format ${format} cannot be parsed in ${tag}`, 'UNSUPPORTED_DATE_FORMAT', {
      format,
      tag,
    });
    this.name = 'UnsupportedDateFormatError';
    this.format = format;
  }
}

/**
 * Date text is not a real YYYYMMDD calendar date
 */
export class InvalidDateError extends CodecError {
  readonly text: string;

  constructor(text: string, tag: string) {
    super(`Invalid date '${text}' in ${tag}`, 'INVALID_DATE', { text, tag });
    this.name = 'InvalidDateError';
    this.text = text;
  }
}

/**
 * Indicator leaf does not hold exactly one true/false Indicator child
 */
export class MalformedIndicatorError extends CodecError {
  constructor(message: string, tag: string) {
    super(message, 'MALFORMED_INDICATOR', { tag });
    this.name = 'MalformedIndicatorError';
  }
}

/**
 * Input bytes are not well-formed XML
 */
export class XmlParseError extends CodecError {
  readonly line?: number;
  readonly column?: number;

  constructor(message: string, line?: number, column?: number) {
    const context: Record<string, unknown> = {};
    if (line !== undefined) {
      context['line'] = line;
    }
    if (column !== undefined) {
      context['column'] = column;
    }
    super(message, 'XML_PARSE_ERROR', context);
    this.name = 'XmlParseError';
    if (line !== undefined) {
      this.line = line;
    }
    if (column !== undefined) {
      this.column = column;
    }
  }
}

/**
 * External schema check rejected the rendered bytes
 */
export class SchemaValidationFailedError extends CodecError {
  readonly schema: string;
  readonly issues: SchemaValidationIssue[];

  constructor(schema: string, issues: SchemaValidationIssue[]) {
    const errors = issues.filter((issue) => issue.severity === 'error');
    const first = errors[0];
    super(
      first === undefined
        ? `Document failed ${schema} validation`
        : `Document failed ${schema} validation: ${first.message}`,
      'VALIDATION_FAILED',
      { schema, errors: errors.length },
    );
    this.name = 'SchemaValidationFailedError';
    this.schema = schema;
    this.issues = issues;
  }
}
