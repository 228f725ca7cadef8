import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { DateValue } from '../core/values.js';
import { NS_RAM, ram } from '../namespaces.js';
import { ReferencedDocument } from './documents.js';
import { TradeParty } from './party.js';

export class SupplyChainEvent extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'ActualDeliverySupplyChainEvent',
  };

  static readonly fields = {
    occurrenceDate: registerField(
      SupplyChainEvent,
      'occurrenceDate',
      () => new DateValue(ram('OccurrenceDateTime')),
    ),
  };
}

export class TradeDelivery extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'ApplicableSupplyChainTradeDelivery',
  };

  static readonly fields = {
    shipTo: registerField(TradeDelivery, 'shipTo', () => new TradeParty(ram('ShipToTradeParty')), {
      default: false,
    }),
    actualDelivery: registerField(TradeDelivery, 'actualDelivery', () => new SupplyChainEvent(), {
      default: false,
    }),
    deliveryNote: registerField(
      TradeDelivery,
      'deliveryNote',
      () => new ReferencedDocument(ram('DeliveryNoteReferencedDocument')),
      { default: false },
    ),
  };
}
