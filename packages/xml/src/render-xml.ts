/**
 * DocumentNode to XML text
 *
 * Every namespace used in the tree is bound to a prefix and declared once on
 * the root element. Preferred prefixes come from the caller; the rest are
 * numbered `ns0`, `ns1`, ...
 */

import { XMLBuilder } from 'fast-xml-parser';
import type { DocumentNode, QName } from '@invoice-codec/contracts';

const ATTRIBUTE_PREFIX = '@_';
const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

/**
 * Rendering options
 */
export interface RenderOptions {
  /**
   * Preferred prefix per namespace URI
   * @example { 'urn:un:unece:uncefact:data:standard:UnqualifiedDataType:15': 'udt' }
   */
  prefixes?: Readonly<Record<string, string>>;
}

type OrderedEntry = Record<string, unknown>;

function collectNamespaces(node: DocumentNode, found: string[]): void {
  const { namespace } = node.tag;
  if (namespace !== '' && !found.includes(namespace)) {
    found.push(namespace);
  }
  for (const child of node.children) {
    collectNamespaces(child, found);
  }
}

/**
 * Bind every namespace in the tree to a unique prefix, in order of first use.
 */
export function assignPrefixes(
  node: DocumentNode,
  preferred: Readonly<Record<string, string>> = {},
): Map<string, string> {
  const namespaces: string[] = [];
  collectNamespaces(node, namespaces);

  const bound = new Map<string, string>();
  const taken = new Set<string>();
  let counter = 0;

  for (const namespace of namespaces) {
    let prefix = preferred[namespace];
    if (prefix === undefined || taken.has(prefix)) {
      do {
        prefix = `ns${String(counter)}`;
        counter += 1;
      } while (taken.has(prefix));
    }
    bound.set(namespace, prefix);
    taken.add(prefix);
  }

  return bound;
}

function qualifiedName(tag: QName, prefixes: ReadonlyMap<string, string>): string {
  const prefix = prefixes.get(tag.namespace);
  return prefix === undefined ? tag.localName : `${prefix}:${tag.localName}`;
}

function toOrderedEntry(
  node: DocumentNode,
  prefixes: ReadonlyMap<string, string>,
  isRoot: boolean,
): OrderedEntry {
  const attributes: Record<string, string> = {};

  if (isRoot) {
    for (const [namespace, prefix] of prefixes) {
      attributes[`${ATTRIBUTE_PREFIX}xmlns:${prefix}`] = namespace;
    }
  }
  for (const [name, value] of Object.entries(node.attributes)) {
    attributes[`${ATTRIBUTE_PREFIX}${name}`] = value;
  }

  const children: OrderedEntry[] = [];
  if (node.text !== undefined && node.text.length > 0) {
    children.push({ [TEXT_KEY]: node.text });
  }
  for (const child of node.children) {
    children.push(toOrderedEntry(child, prefixes, false));
  }

  const entry: OrderedEntry = { [qualifiedName(node.tag, prefixes)]: children };
  if (Object.keys(attributes).length > 0) {
    entry[ATTRIBUTES_KEY] = attributes;
  }
  return entry;
}

/**
 * Render a DocumentNode tree to XML text (without prologue).
 */
export function renderXml(node: DocumentNode, options: RenderOptions = {}): string {
  const prefixes = assignPrefixes(node, options.prefixes);

  const builder = new XMLBuilder({
    preserveOrder: true,
    ignoreAttributes: false,
    attributeNamePrefix: ATTRIBUTE_PREFIX,
    suppressEmptyNode: true,
    format: false,
  });

  return String(builder.build([toOrderedEntry(node, prefixes, true)]));
}
