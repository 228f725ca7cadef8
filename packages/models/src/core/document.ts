/**
 * Document root
 *
 * The outermost element of a document type. Adds the byte boundary:
 * serialize renders, prepends the XML prologue and hands the bytes to a
 * schema validator; parse goes the other way.
 */

import type { SchemaValidator } from '@invoice-codec/contracts';
import { SchemaValidationFailedError, type Logger } from '@invoice-codec/shared';
import { parseXml, renderXml } from '@invoice-codec/xml';
import { defaultCodecLogger } from '../config/codec-config.js';
import { Element } from './element.js';

export const XML_PROLOGUE = '<?xml version="1.0" encoding="UTF-8"?>';

export interface SerializeOptions {
  /** Called once with the rendered bytes */
  validator: SchemaValidator;
  /** Defaults to the document type's schema */
  schema?: string;
  logger?: Logger;
}

export interface ParseOptions {
  logger?: Logger;
}

export abstract class DocumentRoot extends Element {
  /** Schema name handed to the validator */
  abstract readonly schemaName: string;

  /** Preferred prefix per namespace URI */
  readonly namespacePrefixes: Readonly<Record<string, string>> = {};

  /**
   * Encode and render the document, then validate the bytes.
   *
   * @returns UTF-8 bytes starting with the XML prologue
   * @throws SchemaValidationFailedError when the validator rejects the bytes
   */
  serialize(options: SerializeOptions): Buffer {
    const schema = options.schema ?? this.schemaName;
    const logger = (options.logger ?? defaultCodecLogger()).child({
      schema,
      root: this.tag.localName,
    });

    const body = renderXml(this.encode(), { prefixes: this.namespacePrefixes });
    const xml = Buffer.from(XML_PROLOGUE + body, 'utf-8');
    logger.debug('Document rendered', { bytes: xml.length });

    const result = options.validator.validate(xml, schema);
    if (!result.valid) {
      logger.warn('Schema validation failed', {
        validator: result.validatorVersion,
        errors: result.issues.filter((issue) => issue.severity === 'error').length,
      });
      throw new SchemaValidationFailedError(schema, result.issues);
    }

    logger.debug('Schema validation passed', {
      validator: result.validatorVersion,
      durationMs: result.durationMs,
    });
    return xml;
  }

  /**
   * Parse bytes into a fresh instance of the document type.
   */
  static parse<T extends DocumentRoot>(
    this: new () => T,
    input: string | Uint8Array,
    options: ParseOptions = {},
  ): T {
    const document = new this();
    const logger = (options.logger ?? defaultCodecLogger()).child({ root: document.tag.localName });

    const root = parseXml(input);
    document.decode(root);
    logger.debug('Document parsed', {
      bytes: typeof input === 'string' ? Buffer.byteLength(input, 'utf-8') : input.byteLength,
      children: root.children.length,
    });
    return document;
  }
}
