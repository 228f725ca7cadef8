/**
 * Namespace-qualified element name.
 */
export interface QName {
  /** Namespace URI, empty string for no namespace */
  namespace: string;

  /** Local part of the element name */
  localName: string;
}

/**
 * One node of a parsed or to-be-rendered document.
 *
 * This is the only tree shape exchanged between the XML boundary and the
 * element model. Children are ordered; attributes are plain string keys
 * (namespace declarations never appear here).
 */
export interface DocumentNode {
  tag: QName;
  attributes: Record<string, string>;
  children: DocumentNode[];
  text?: string;
}
