import { spawnSync } from 'node:child_process';
import type {
  SchemaValidationIssue,
  SchemaValidationResult,
  SchemaValidator,
} from '@invoice-codec/contracts';
import { resolveSchemaPath, resolveXmllintConfig } from './config.js';
import type { ResolvedXmllintConfig, XmllintValidatorConfig } from './types.js';

/**
 * Diagnostic line written by xmllint for a document read from stdin:
 * `-:12: element Foo: Schemas validity error : Element 'Foo': ...`
 */
const DIAGNOSTIC_LINE = /^-:(\d+):\s*(.*)$/;

/**
 * Convert xmllint stderr into validation issues.
 * The trailing "- validates" / "- fails to validate" verdict is not an issue.
 */
export function parseXmllintOutput(stderr: string): SchemaValidationIssue[] {
  const issues: SchemaValidationIssue[] = [];

  for (const rawLine of stderr.split(/\r?\n/)) {
    const line = rawLine.trim();
    const match = DIAGNOSTIC_LINE.exec(line);
    if (!match) {
      continue;
    }

    const lineNumber = Number(match[1]);
    const message = (match[2] ?? '').trim();
    const isWarning = /\bwarning\b/i.test(message) && !/\berror\b/i.test(message);

    issues.push({
      code: isWarning ? 'XSD-WARNING' : 'XSD-ERROR',
      severity: isWarning ? 'warning' : 'error',
      message,
      line: lineNumber,
    });
  }

  return issues;
}

/**
 * XmllintSchemaValidator runs `xmllint --noout --schema <xsd> -` with the
 * document on stdin.
 *
 * Requires the xmllint binary (libxml2) and the XSD files under the
 * configured schema directory.
 */
export class XmllintSchemaValidator implements SchemaValidator {
  private readonly config: ResolvedXmllintConfig;

  static readonly VERSION = 'xmllint-schema-validator/1.0.0';

  constructor(config: XmllintValidatorConfig = {}) {
    this.config = resolveXmllintConfig(config);
  }

  validate(xml: Uint8Array, schema: string): SchemaValidationResult {
    const startTime = Date.now();
    const schemaPath = resolveSchemaPath(this.config, schema);

    const proc = spawnSync(this.config.command, ['--noout', '--schema', schemaPath, '-'], {
      input: xml,
      encoding: 'utf-8',
      timeout: this.config.timeoutMs,
      killSignal: 'SIGKILL',
    });

    const finish = (issues: SchemaValidationIssue[]): SchemaValidationResult => ({
      valid: !issues.some((issue) => issue.severity === 'error'),
      schema,
      issues,
      validatorVersion: XmllintSchemaValidator.VERSION,
      durationMs: Date.now() - startTime,
    });

    if (proc.error) {
      const timedOut = 'code' in proc.error && proc.error.code === 'ETIMEDOUT';
      return finish([
        timedOut
          ? {
              code: 'XMLLINT-TIMEOUT',
              severity: 'error',
              message: `Validation timeout after ${String(this.config.timeoutMs)}ms`,
            }
          : {
              code: 'XMLLINT-SPAWN',
              severity: 'error',
              message: `Failed to run ${this.config.command}: ${proc.error.message}`,
            },
      ]);
    }

    const issues = parseXmllintOutput(proc.stderr);

    if (proc.status !== 0 && !issues.some((issue) => issue.severity === 'error')) {
      issues.push({
        code: 'XMLLINT-EXIT',
        severity: 'error',
        message: `${this.config.command} exited with status ${String(proc.status)}`,
      });
    }

    return finish(issues);
  }
}
