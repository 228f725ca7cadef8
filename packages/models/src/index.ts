/**
 * @invoice-codec/models
 *
 * Declarative element/field model with a bidirectional XML codec, and the
 * ZUGFeRD 1.0 invoice built on it.
 *
 * @example
 * ```ts
 * const invoice = new ZugferdDocument();
 * invoice.require(ZugferdDocument.fields.header).require(Header.fields.id).text = 'RE-1001';
 * const xml = invoice.serialize({ validator: new MockSchemaValidator() });
 * ```
 *
 * @packageDocumentation
 */

// Core
export { Element, type ElementMeta } from './core/element.js';
export {
  registerField,
  fieldsOf,
  tagOf,
  describeValue,
  type FieldSchema,
  type FieldOptions,
  type ElementClass,
  type Value,
  type ContainerItem,
} from './core/fields.js';
export { Container } from './core/container.js';
export {
  TextValue,
  DecimalValue,
  QuantityValue,
  AmountValue,
  ClassificationValue,
  AgencyIdValue,
  SchemeIdValue,
  DateValue,
  IndicatorValue,
  type LeafValue,
  type LeafKind,
} from './core/values.js';
export { encodeLeaf, decodeLeaf } from './core/leaf-codec.js';
export { isISODate, parseDate102, formatDate102 } from './core/dates.js';
export {
  DocumentRoot,
  XML_PROLOGUE,
  type SerializeOptions,
  type ParseOptions,
} from './core/document.js';

// Namespaces
export {
  NS_RSM,
  NS_RAM,
  NS_UDT,
  ZUGFERD_PREFIXES,
  DATE_TIME_STRING,
  INDICATOR,
  rsm,
  ram,
  udt,
} from './namespaces.js';

// Configuration
export {
  resolveCodecConfig,
  createCodecLogger,
  defaultCodecLogger,
  DEFAULT_CODEC_CONFIG,
  type CodecConfig,
  type ResolvedCodecConfig,
} from './config/codec-config.js';

// ZUGFeRD 1.0
export * from './zugferd/index.js';
