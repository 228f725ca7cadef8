import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { TextValue } from '../core/values.js';
import { NS_RAM, ram } from '../namespaces.js';
import { ReferencedDocument } from './documents.js';
import { TradeParty } from './party.js';

export class TradeAgreement extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'ApplicableSupplyChainTradeAgreement',
  };

  static readonly fields = {
    buyerReference: registerField(
      TradeAgreement,
      'buyerReference',
      () => new TextValue(ram('BuyerReference')),
      { default: false },
    ),
    seller: registerField(TradeAgreement, 'seller', () => new TradeParty(ram('SellerTradeParty'))),
    buyer: registerField(TradeAgreement, 'buyer', () => new TradeParty(ram('BuyerTradeParty'))),
    buyerOrder: registerField(
      TradeAgreement,
      'buyerOrder',
      () => new ReferencedDocument(ram('BuyerOrderReferencedDocument')),
      { default: false },
    ),
    contract: registerField(
      TradeAgreement,
      'contract',
      () => new ReferencedDocument(ram('ContractReferencedDocument')),
      { default: false },
    ),
  };
}
