/**
 * Root element a schema expects, used by the mock validator
 */
export interface SchemaRootExpectation {
  /**
   * Local name of the root element
   * @example "CrossIndustryDocument"
   */
  rootElement: string;

  /**
   * Namespace URI of the root element
   */
  namespace: string;
}

/**
 * Mock validator configuration
 */
export interface MockSchemaValidatorConfig {
  /**
   * Known schemas and their root elements, merged over the built-in set
   */
  schemas?: Record<string, SchemaRootExpectation>;

  /**
   * Enable debug output
   */
  debug?: boolean;
}

/**
 * xmllint validator configuration
 */
export interface XmllintValidatorConfig {
  /**
   * Executable to run
   * @default 'xmllint'
   */
  command?: string;

  /**
   * Directory holding the XSD files
   * @default process.env.INVOICE_CODEC_SCHEMA_DIR ?? 'schemas'
   */
  schemaDir?: string;

  /**
   * Entry XSD per schema name, relative to schemaDir
   */
  schemas?: Record<string, string>;

  /**
   * Timeout in milliseconds
   * @default 30000
   */
  timeoutMs?: number;
}

/**
 * Fully resolved xmllint configuration
 */
export interface ResolvedXmllintConfig {
  command: string;
  schemaDir: string;
  schemas: Record<string, string>;
  timeoutMs: number;
}
