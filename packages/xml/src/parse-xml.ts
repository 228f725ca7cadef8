/**
 * XML bytes to DocumentNode
 *
 * Parses a document with fast-xml-parser in ordered mode and resolves every
 * element name against the in-scope namespace declarations. The result keeps
 * child order and text as written, decodes character references, and drops
 * comments, processing instructions, `xmlns` attributes and the whitespace
 * that indents child elements.
 */

import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { DocumentNode, QName } from '@invoice-codec/contracts';
import { XmlParseError } from '@invoice-codec/shared';

export const XML_NAMESPACE = 'http://www.w3.org/XML/1998/namespace';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

type NamespaceScope = ReadonlyMap<string, string>;

const ROOT_SCOPE: NamespaceScope = new Map([['xml', XML_NAMESPACE]]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Decode input bytes as UTF-8 and drop a leading byte order mark.
 */
function decodeInput(input: string | Uint8Array): string {
  const text = typeof input === 'string' ? input : Buffer.from(input).toString('utf-8');
  return text.charCodeAt(0) === 0xfeff ? text.slice(1) : text;
}

function resolveName(rawName: string, scope: NamespaceScope): QName {
  const colon = rawName.indexOf(':');
  const prefix = colon < 0 ? '' : rawName.slice(0, colon);
  const localName = colon < 0 ? rawName : rawName.slice(colon + 1);
  const namespace = scope.get(prefix);

  if (namespace === undefined) {
    if (prefix === '') {
      return { namespace: '', localName };
    }
    throw new XmlParseError(`Undeclared namespace prefix '${prefix}' on element ${rawName}`);
  }

  return { namespace, localName };
}

/**
 * Convert one ordered-mode element entry into a DocumentNode.
 */
function toDocumentNode(entry: Record<string, unknown>, parentScope: NamespaceScope): DocumentNode {
  const rawName = Object.keys(entry).find((key) => key !== ATTRIBUTES_KEY);
  if (rawName === undefined) {
    throw new XmlParseError('Element entry without a name');
  }

  const scope = new Map(parentScope);
  const attributes: Record<string, string> = {};
  const rawAttributes = entry[ATTRIBUTES_KEY];

  if (isRecord(rawAttributes)) {
    for (const [key, value] of Object.entries(rawAttributes)) {
      if (!key.startsWith(ATTRIBUTE_PREFIX)) {
        continue;
      }
      const name = key.slice(ATTRIBUTE_PREFIX.length);
      const text = String(value);

      if (name === 'xmlns') {
        scope.set('', text);
      } else if (name.startsWith('xmlns:')) {
        scope.set(name.slice('xmlns:'.length), text);
      } else {
        attributes[name] = text;
      }
    }
  }

  const node: DocumentNode = {
    tag: resolveName(rawName, scope),
    attributes,
    children: [],
  };

  const rawChildren = entry[rawName];
  const entries: unknown[] = Array.isArray(rawChildren) ? rawChildren : [];
  const textParts: string[] = [];

  for (const child of entries) {
    if (!isRecord(child)) {
      continue;
    }
    if (TEXT_KEY in child) {
      const text = String(child[TEXT_KEY]);
      if (text.length > 0) {
        textParts.push(text);
      }
      continue;
    }
    node.children.push(toDocumentNode(child, scope));
  }

  // Blank runs between child elements are indentation, not content
  const text =
    node.children.length === 0
      ? textParts.join('')
      : textParts
          .filter((part) => part.trim().length > 0)
          .map((part) => part.trim())
          .join('');
  if (text.length > 0) {
    node.text = text;
  }

  return node;
}

/**
 * Parse XML into a namespace-resolved DocumentNode tree.
 *
 * @param input - Raw XML, as a string or UTF-8 bytes
 * @returns The root element
 * @throws XmlParseError when the input is not well-formed
 */
export function parseXml(input: string | Uint8Array): DocumentNode {
  const xml = decodeInput(input);

  if (xml.trim().length === 0) {
    throw new XmlParseError('Empty XML document');
  }

  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new XmlParseError(
      `Malformed XML: ${validation.err.msg}`,
      validation.err.line,
      validation.err.col,
    );
  }

  const parser = new XMLParser({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    parseTagValue: false,
    parseAttributeValue: false,
    trimValues: false,
    htmlEntities: true,
    ignoreDeclaration: true,
    ignorePiTags: true,
  });

  const parsed: unknown = parser.parse(xml);
  const entries: unknown[] = Array.isArray(parsed) ? parsed : [];
  const roots = entries.filter(
    (entry): entry is Record<string, unknown> => isRecord(entry) && !(TEXT_KEY in entry),
  );

  const root = roots[0];
  if (root === undefined) {
    throw new XmlParseError('Document has no root element');
  }
  if (roots.length > 1) {
    throw new XmlParseError('Document has more than one root element');
  }

  return toDocumentNode(root, ROOT_SCOPE);
}
