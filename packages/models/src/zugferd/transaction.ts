import { Container } from '../core/container.js';
import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { NS_RSM } from '../namespaces.js';
import { TradeAgreement } from './agreement.js';
import { TradeDelivery } from './delivery.js';
import { LineItem } from './line-item.js';
import { TradeSettlement } from './settlement.js';

export class TradeTransaction extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RSM,
    tag: 'SpecifiedSupplyChainTradeTransaction',
  };

  static readonly fields = {
    agreement: registerField(TradeTransaction, 'agreement', () => new TradeAgreement()),
    delivery: registerField(TradeTransaction, 'delivery', () => new TradeDelivery()),
    settlement: registerField(TradeTransaction, 'settlement', () => new TradeSettlement()),
    lineItems: registerField(TradeTransaction, 'lineItems', () => new Container(() => new LineItem())),
  };
}
