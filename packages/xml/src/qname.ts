import type { QName } from '@invoice-codec/contracts';

/**
 * Build a qualified name.
 */
export function qname(namespace: string, localName: string): QName {
  return { namespace, localName };
}

/**
 * Clark notation key: `{namespace}localName`, or the bare local name when the
 * element has no namespace.
 */
export function clark(name: QName): string {
  return name.namespace === '' ? name.localName : `{${name.namespace}}${name.localName}`;
}

/**
 * Inverse of {@link clark}.
 */
export function parseClark(key: string): QName {
  if (!key.startsWith('{')) {
    return { namespace: '', localName: key };
  }
  const end = key.indexOf('}');
  if (end < 0) {
    return { namespace: '', localName: key };
  }
  return { namespace: key.slice(1, end), localName: key.slice(end + 1) };
}

export function sameQName(a: QName, b: QName): boolean {
  return a.namespace === b.namespace && a.localName === b.localName;
}
