/**
 * Severity of a schema validation issue
 */
export type SchemaIssueSeverity = 'error' | 'warning';

/**
 * A single finding reported by a schema validator
 */
export interface SchemaValidationIssue {
  /**
   * Stable issue code
   * @example "XSD-ERROR", "MOCK-002"
   */
  code: string;

  /**
   * Severity level
   */
  severity: SchemaIssueSeverity;

  /**
   * Human-readable message
   */
  message: string;

  /**
   * Line number in the validated document (if available)
   */
  line?: number;
}

/**
 * Result of validating one document against a named schema
 */
export interface SchemaValidationResult {
  /**
   * True when no error-level issue was reported
   */
  valid: boolean;

  /**
   * Schema name the document was checked against
   * @example "ZUGFeRD1p0"
   */
  schema: string;

  /**
   * All reported issues
   */
  issues: SchemaValidationIssue[];

  /**
   * Validator implementation and version
   */
  validatorVersion: string;

  /**
   * Duration in milliseconds
   */
  durationMs: number;
}

/**
 * Validates rendered document bytes against a named schema.
 *
 * Implementations:
 * - MockSchemaValidator: structural checks only, for tests
 * - XmllintSchemaValidator: XSD validation through the xmllint binary
 *
 * Validation is synchronous; serialization waits for the verdict.
 */
export interface SchemaValidator {
  /**
   * Validate a document.
   *
   * @param xml - Complete document bytes (prologue included)
   * @param schema - Schema name identifying the exact format and version
   */
  validate(xml: Uint8Array, schema: string): SchemaValidationResult;
}
