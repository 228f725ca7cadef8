/**
 * Leaf codec
 *
 * Maps each leaf variant to and from exactly one DocumentNode. Date and
 * indicator leaves wrap their value in a single `udt:` child; the other
 * variants carry text plus attributes.
 */

import type { DocumentNode, QName } from '@invoice-codec/contracts';
import {
  InvalidDateError,
  InvalidDecimalError,
  isValidDecimalAmount,
  MalformedDateContainerError,
  MalformedIndicatorError,
  MissingAttributeError,
  MissingValueError,
  UnknownElementError,
  UnsupportedDateFormatError,
} from '@invoice-codec/shared';
import { clark, sameQName } from '@invoice-codec/xml';
import { DATE_TIME_STRING, INDICATOR } from '../namespaces.js';
import { formatDate102, isISODate, parseDate102 } from './dates.js';
import type { LeafValue } from './values.js';

const SUPPORTED_DATE_FORMAT = '102';

function assertNever(value: never): never {
  throw new Error(`Unhandled leaf kind: ${JSON.stringify(value)}`);
}

function setOptionalAttribute(node: DocumentNode, name: string, value: string): void {
  if (value !== '') {
    node.attributes[name] = value;
  }
}

function requireAttribute(node: DocumentNode, name: string): string {
  const value = node.attributes[name];
  if (value === undefined) {
    throw new MissingAttributeError(name, clark(node.tag));
  }
  return value;
}

function readDecimal(node: DocumentNode): string {
  const text = node.text ?? '';
  if (!isValidDecimalAmount(text)) {
    throw new InvalidDecimalError(text, clark(node.tag));
  }
  return text.trim();
}

function writeDecimal(tag: QName, value: string): string {
  if (!isValidDecimalAmount(value)) {
    throw new InvalidDecimalError(value, clark(tag));
  }
  return value.trim();
}

function wrapper(tag: QName, text: string, attributes: Record<string, string> = {}): DocumentNode {
  return { tag, attributes, children: [], text };
}

/**
 * Encode a leaf as one node.
 *
 * @throws InvalidDecimalError when a decimal field was set to non-decimal text
 * @throws MissingValueError for a date or indicator without a value
 * @throws InvalidDateError when a date was set to something other than a calendar date
 * @throws UnsupportedDateFormatError for a date whose format is not 102
 */
export function encodeLeaf(leaf: LeafValue): DocumentNode {
  const node: DocumentNode = { tag: leaf.tag, attributes: {}, children: [] };

  switch (leaf.kind) {
    case 'text':
      node.text = leaf.text;
      break;

    case 'decimal':
      node.text = writeDecimal(leaf.tag, leaf.value);
      break;

    case 'quantity':
      node.text = writeDecimal(leaf.tag, leaf.amount);
      node.attributes['unitCode'] = leaf.unitCode;
      break;

    case 'amount':
      node.text = writeDecimal(leaf.tag, leaf.amount);
      node.attributes['currencyID'] = leaf.currency;
      break;

    case 'classification':
      node.text = leaf.text;
      setOptionalAttribute(node, 'listID', leaf.listId);
      setOptionalAttribute(node, 'listVersionID', leaf.listVersionId);
      break;

    case 'agency-id':
      node.text = leaf.text;
      setOptionalAttribute(node, 'schemeAgencyID', leaf.schemeAgencyId);
      break;

    case 'scheme-id':
      node.text = leaf.text;
      setOptionalAttribute(node, 'schemeID', leaf.schemeId);
      break;

    case 'date':
      if (leaf.value === null) {
        throw new MissingValueError(`Date ${clark(leaf.tag)} has no value`, { tag: clark(leaf.tag) });
      }
      if (!isISODate(leaf.value)) {
        throw new InvalidDateError(leaf.value, clark(leaf.tag));
      }
      if (leaf.format !== SUPPORTED_DATE_FORMAT) {
        throw new UnsupportedDateFormatError(leaf.format, clark(leaf.tag));
      }
      node.children.push(
        wrapper(DATE_TIME_STRING, formatDate102(leaf.value), { format: leaf.format }),
      );
      break;

    case 'indicator':
      if (leaf.value === null) {
        throw new MissingValueError(`Indicator ${clark(leaf.tag)} has no value`, {
          tag: clark(leaf.tag),
        });
      }
      node.children.push(wrapper(INDICATOR, String(leaf.value)));
      break;

    default:
      return assertNever(leaf);
  }

  return node;
}

function singleWrapper(node: DocumentNode): DocumentNode | undefined {
  return node.children.length === 1 ? node.children[0] : undefined;
}

function decodeDate(node: DocumentNode): { value: string; format: string } {
  const tag = clark(node.tag);
  const child = singleWrapper(node);

  if (child === undefined) {
    throw new MalformedDateContainerError(
      `Date container ${tag} must hold exactly one ${clark(DATE_TIME_STRING)}, found ${String(node.children.length)} children`,
      tag,
    );
  }
  if (!sameQName(child.tag, DATE_TIME_STRING)) {
    throw new MalformedDateContainerError(
      `Date container ${tag} holds ${clark(child.tag)} instead of ${clark(DATE_TIME_STRING)}`,
      tag,
    );
  }

  const format = requireAttribute(child, 'format');
  if (format !== SUPPORTED_DATE_FORMAT) {
    throw new UnsupportedDateFormatError(format, tag);
  }

  const text = child.text ?? '';
  const value = parseDate102(text);
  if (value === null) {
    throw new InvalidDateError(text, tag);
  }

  return { value, format };
}

function decodeIndicator(node: DocumentNode): boolean {
  const tag = clark(node.tag);
  const child = singleWrapper(node);

  if (child === undefined || !sameQName(child.tag, INDICATOR)) {
    throw new MalformedIndicatorError(
      `Indicator ${tag} must hold exactly one ${clark(INDICATOR)}`,
      tag,
    );
  }

  switch (child.text?.trim()) {
    case 'true':
      return true;
    case 'false':
      return false;
    default:
      throw new MalformedIndicatorError(
        `Indicator ${tag} holds '${child.text ?? ''}' instead of true or false`,
        tag,
      );
  }
}

/**
 * Overwrite a leaf's contents from a node whose tag already matched it.
 * Non-wrapper leaves accept no element children.
 */
export function decodeLeaf(leaf: LeafValue, node: DocumentNode): void {
  if (leaf.kind !== 'date' && leaf.kind !== 'indicator') {
    const stray = node.children[0];
    if (stray !== undefined) {
      throw new UnknownElementError(clark(stray.tag), clark(node.tag));
    }
  }

  switch (leaf.kind) {
    case 'text':
      leaf.text = node.text ?? '';
      break;

    case 'decimal':
      leaf.value = readDecimal(node);
      break;

    case 'quantity':
      leaf.amount = readDecimal(node);
      leaf.unitCode = requireAttribute(node, 'unitCode');
      break;

    case 'amount':
      leaf.amount = readDecimal(node);
      leaf.currency = requireAttribute(node, 'currencyID');
      break;

    case 'classification':
      leaf.text = node.text ?? '';
      leaf.listId = node.attributes['listID'] ?? '';
      leaf.listVersionId = node.attributes['listVersionID'] ?? '';
      break;

    case 'agency-id':
      leaf.text = node.text ?? '';
      leaf.schemeAgencyId = node.attributes['schemeAgencyID'] ?? '';
      break;

    case 'scheme-id':
      leaf.text = node.text ?? '';
      leaf.schemeId = node.attributes['schemeID'] ?? '';
      break;

    case 'date': {
      const { value, format } = decodeDate(node);
      leaf.value = value;
      leaf.format = format;
      break;
    }

    case 'indicator':
      leaf.value = decodeIndicator(node);
      break;

    default:
      assertNever(leaf);
  }
}
