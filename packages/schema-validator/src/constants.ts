import type { SchemaRootExpectation } from './types.js';

/**
 * Schema name of the ZUGFeRD 1.0 invoice format
 */
export const ZUGFERD_1P0 = 'ZUGFeRD1p0';

/**
 * Root elements of the built-in schemas
 */
export const KNOWN_SCHEMAS: Readonly<Record<string, SchemaRootExpectation>> = {
  [ZUGFERD_1P0]: {
    rootElement: 'CrossIndustryDocument',
    namespace: 'urn:ferd:CrossIndustryDocument:invoice:1p0',
  },
};

/**
 * Entry XSD per schema name, relative to the schema directory
 */
export const DEFAULT_SCHEMA_FILES: Readonly<Record<string, string>> = {
  [ZUGFERD_1P0]: 'ZUGFeRD1p0/ZUGFeRD1p0.xsd',
};
