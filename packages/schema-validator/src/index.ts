/**
 * @invoice-codec/schema-validator
 *
 * Schema validators for rendered invoice documents.
 *
 * @packageDocumentation
 */

export {
  MockSchemaValidator,
  createAlwaysValidValidator,
  createFixedErrorValidator,
} from './mock-schema-validator.js';
export { XmllintSchemaValidator, parseXmllintOutput } from './xmllint-schema-validator.js';
export { resolveXmllintConfig, resolveSchemaPath, DEFAULT_XMLLINT_CONFIG } from './config.js';
export { ZUGFERD_1P0, KNOWN_SCHEMAS, DEFAULT_SCHEMA_FILES } from './constants.js';
export type {
  MockSchemaValidatorConfig,
  SchemaRootExpectation,
  XmllintValidatorConfig,
  ResolvedXmllintConfig,
} from './types.js';
