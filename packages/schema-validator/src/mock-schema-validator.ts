import type {
  SchemaValidationIssue,
  SchemaValidationResult,
  SchemaValidator,
} from '@invoice-codec/contracts';
import { KNOWN_SCHEMAS } from './constants.js';
import type { MockSchemaValidatorConfig, SchemaRootExpectation } from './types.js';

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * MockSchemaValidator applies structural checks only: non-empty input, XML
 * prologue, known schema name and the expected root element.
 *
 * Use it in tests and development where the XSD files are not available.
 */
export class MockSchemaValidator implements SchemaValidator {
  private readonly schemas: Record<string, SchemaRootExpectation>;
  private readonly debug: boolean;

  /**
   * Version string for this mock validator
   */
  static readonly VERSION = 'mock-schema-validator/1.0.0';

  constructor(config: MockSchemaValidatorConfig = {}) {
    this.schemas = { ...KNOWN_SCHEMAS, ...config.schemas };
    this.debug = config.debug ?? false;
  }

  validate(xml: Uint8Array, schema: string): SchemaValidationResult {
    const startTime = Date.now();
    const text = Buffer.from(xml).toString('utf-8');
    const issues: SchemaValidationIssue[] = [];

    if (text.trim().length === 0) {
      issues.push({
        code: 'MOCK-001',
        severity: 'error',
        message: 'Empty XML document',
      });
    } else if (!text.startsWith('<?xml')) {
      issues.push({
        code: 'MOCK-002',
        severity: 'error',
        message: 'Document does not start with an XML declaration',
      });
    }

    const expectation = this.schemas[schema];
    if (expectation === undefined) {
      issues.push({
        code: 'MOCK-003',
        severity: 'error',
        message: `Unknown schema '${schema}'`,
      });
    } else {
      const rootPattern = new RegExp(
        `^(?:<\\?xml[^>]*\\?>)?\\s*<(?:[\\w.-]+:)?${escapeRegExp(expectation.rootElement)}[\\s/>]`,
      );
      if (!rootPattern.test(text)) {
        issues.push({
          code: 'MOCK-004',
          severity: 'error',
          message: `Document root is not ${expectation.rootElement}`,
        });
      } else if (!text.includes(`"${expectation.namespace}"`)) {
        issues.push({
          code: 'MOCK-005',
          severity: 'error',
          message: `Namespace ${expectation.namespace} is not declared`,
        });
      }
    }

    const result: SchemaValidationResult = {
      valid: !issues.some((issue) => issue.severity === 'error'),
      schema,
      issues,
      validatorVersion: MockSchemaValidator.VERSION,
      durationMs: Date.now() - startTime,
    };

    if (this.debug) {
      console.log('[MockSchemaValidator] Validation result:', {
        schema,
        valid: result.valid,
        issues: issues.length,
      });
    }

    return result;
  }
}

/**
 * Create a validator that accepts every document
 */
export function createAlwaysValidValidator(): SchemaValidator {
  return {
    validate(_xml: Uint8Array, schema: string): SchemaValidationResult {
      return {
        valid: true,
        schema,
        issues: [],
        validatorVersion: 'always-valid/1.0.0',
        durationMs: 0,
      };
    },
  };
}

/**
 * Create a validator that always reports the given issues
 */
export function createFixedErrorValidator(issues: SchemaValidationIssue[]): SchemaValidator {
  return {
    validate(_xml: Uint8Array, schema: string): SchemaValidationResult {
      return {
        valid: !issues.some((issue) => issue.severity === 'error'),
        schema,
        issues,
        validatorVersion: 'fixed-error/1.0.0',
        durationMs: 0,
      };
    },
  };
}
