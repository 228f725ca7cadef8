import { ZUGFERD_1P0 } from '@invoice-codec/schema-validator';
import { DocumentRoot } from '../core/document.js';
import type { ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { NS_RSM, ZUGFERD_PREFIXES } from '../namespaces.js';
import { DocumentContext } from './context.js';
import { Header } from './header.js';
import { TradeTransaction } from './transaction.js';

/**
 * ZUGFeRD 1.0 invoice (`rsm:CrossIndustryDocument`)
 */
export class ZugferdDocument extends DocumentRoot {
  static override readonly meta: ElementMeta = { namespace: NS_RSM, tag: 'CrossIndustryDocument' };

  static readonly fields = {
    context: registerField(ZugferdDocument, 'context', () => new DocumentContext()),
    header: registerField(ZugferdDocument, 'header', () => new Header()),
    trade: registerField(ZugferdDocument, 'trade', () => new TradeTransaction()),
  };

  override readonly schemaName = ZUGFERD_1P0;
  override readonly namespacePrefixes = ZUGFERD_PREFIXES;
}
