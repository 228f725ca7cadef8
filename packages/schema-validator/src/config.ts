import * as path from 'node:path';
import { ConfigurationError } from '@invoice-codec/shared';
import { DEFAULT_SCHEMA_FILES } from './constants.js';
import type { ResolvedXmllintConfig, XmllintValidatorConfig } from './types.js';

/**
 * Defaults for the xmllint validator
 */
export const DEFAULT_XMLLINT_CONFIG = {
  command: 'xmllint',
  schemaDir: 'schemas',
  timeoutMs: 30000,
} as const;

/**
 * Resolve xmllint configuration.
 *
 * Precedence: explicit config > environment > defaults.
 * - INVOICE_CODEC_XMLLINT overrides the executable
 * - INVOICE_CODEC_SCHEMA_DIR overrides the schema directory
 */
export function resolveXmllintConfig(
  config: XmllintValidatorConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedXmllintConfig {
  const timeoutMs = config.timeoutMs ?? DEFAULT_XMLLINT_CONFIG.timeoutMs;
  if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
    throw new ConfigurationError(`Invalid xmllint timeout: ${String(timeoutMs)}`, { timeoutMs });
  }

  return {
    command: config.command ?? env['INVOICE_CODEC_XMLLINT'] ?? DEFAULT_XMLLINT_CONFIG.command,
    schemaDir: config.schemaDir ?? env['INVOICE_CODEC_SCHEMA_DIR'] ?? DEFAULT_XMLLINT_CONFIG.schemaDir,
    schemas: { ...DEFAULT_SCHEMA_FILES, ...config.schemas },
    timeoutMs,
  };
}

/**
 * Absolute path of the entry XSD for a schema name.
 */
export function resolveSchemaPath(config: ResolvedXmllintConfig, schema: string): string {
  const file = config.schemas[schema];
  if (file === undefined) {
    throw new ConfigurationError(`No XSD configured for schema '${schema}'`, { schema });
  }
  return path.resolve(config.schemaDir, file);
}
