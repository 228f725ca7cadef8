/**
 * @invoice-codec/xml
 *
 * XML boundary: bytes to namespaced document nodes and back.
 *
 * @packageDocumentation
 */

export { parseXml, XML_NAMESPACE } from './parse-xml.js';
export { renderXml, assignPrefixes, type RenderOptions } from './render-xml.js';
export { qname, clark, parseClark, sameQName } from './qname.js';
