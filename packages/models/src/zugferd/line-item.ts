import type { QName } from '@invoice-codec/contracts';
import { Container } from '../core/container.js';
import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import {
  AmountValue,
  ClassificationValue,
  QuantityValue,
  SchemeIdValue,
  TextValue,
} from '../core/values.js';
import { NS_RAM, ram } from '../namespaces.js';
import { Note } from './header.js';
import { TradeTax } from './settlement.js';

export class LineDocument extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'AssociatedDocumentLineDocument',
  };

  static readonly fields = {
    lineId: registerField(LineDocument, 'lineId', () => new TextValue(ram('LineID'))),
    notes: registerField(LineDocument, 'notes', () => new Container(() => new Note())),
  };
}

/**
 * Gross or net unit price; `basisQuantity` is the quantity the price refers to
 */
export class TradePrice extends Element {
  static readonly fields = {
    chargeAmount: registerField(TradePrice, 'chargeAmount', () => new AmountValue(ram('ChargeAmount'))),
    basisQuantity: registerField(
      TradePrice,
      'basisQuantity',
      () => new QuantityValue(ram('BasisQuantity')),
      { default: false },
    ),
  };

  constructor(tag: QName = ram('NetPriceProductTradePrice')) {
    super(tag);
  }
}

export class LineAgreement extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'SpecifiedSupplyChainTradeAgreement',
  };

  static readonly fields = {
    grossPrice: registerField(
      LineAgreement,
      'grossPrice',
      () => new TradePrice(ram('GrossPriceProductTradePrice')),
      { default: false },
    ),
    netPrice: registerField(
      LineAgreement,
      'netPrice',
      () => new TradePrice(ram('NetPriceProductTradePrice')),
    ),
  };
}

export class LineDelivery extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'SpecifiedSupplyChainTradeDelivery',
  };

  static readonly fields = {
    billedQuantity: registerField(
      LineDelivery,
      'billedQuantity',
      () => new QuantityValue(ram('BilledQuantity'), '0', 'C62'),
    ),
  };
}

export class LineMonetarySummation extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'SpecifiedTradeSettlementMonetarySummation',
  };

  static readonly fields = {
    lineTotal: registerField(
      LineMonetarySummation,
      'lineTotal',
      () => new AmountValue(ram('LineTotalAmount')),
    ),
  };
}

export class LineSettlement extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'SpecifiedSupplyChainTradeSettlement',
  };

  static readonly fields = {
    taxes: registerField(LineSettlement, 'taxes', () => new Container(() => new TradeTax())),
    totals: registerField(LineSettlement, 'totals', () => new LineMonetarySummation()),
  };
}

export class ProductClassification extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'DesignatedProductClassification',
  };

  static readonly fields = {
    classCode: registerField(
      ProductClassification,
      'classCode',
      () => new ClassificationValue(ram('ClassCode')),
    ),
    className: registerField(
      ProductClassification,
      'className',
      () => new TextValue(ram('ClassName')),
      { default: false },
    ),
  };
}

export class OriginCountry extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'OriginTradeCountry' };

  static readonly fields = {
    id: registerField(OriginCountry, 'id', () => new TextValue(ram('ID'))),
  };
}

export class TradeProduct extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'SpecifiedTradeProduct' };

  static readonly fields = {
    globalId: registerField(TradeProduct, 'globalId', () => new SchemeIdValue(ram('GlobalID')), {
      default: false,
    }),
    sellerAssignedId: registerField(
      TradeProduct,
      'sellerAssignedId',
      () => new TextValue(ram('SellerAssignedID')),
      { default: false },
    ),
    buyerAssignedId: registerField(
      TradeProduct,
      'buyerAssignedId',
      () => new TextValue(ram('BuyerAssignedID')),
      { default: false },
    ),
    name: registerField(TradeProduct, 'name', () => new TextValue(ram('Name'))),
    description: registerField(
      TradeProduct,
      'description',
      () => new TextValue(ram('Description')),
      { default: false },
    ),
    classifications: registerField(
      TradeProduct,
      'classifications',
      () => new Container(() => new ProductClassification()),
    ),
    originCountry: registerField(TradeProduct, 'originCountry', () => new OriginCountry(), {
      default: false,
    }),
  };
}

export class LineItem extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'IncludedSupplyChainTradeLineItem',
  };

  static readonly fields = {
    document: registerField(LineItem, 'document', () => new LineDocument()),
    agreement: registerField(LineItem, 'agreement', () => new LineAgreement()),
    delivery: registerField(LineItem, 'delivery', () => new LineDelivery()),
    settlement: registerField(LineItem, 'settlement', () => new LineSettlement()),
    product: registerField(LineItem, 'product', () => new TradeProduct()),
  };
}
