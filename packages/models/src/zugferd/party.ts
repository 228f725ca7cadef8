import type { QName } from '@invoice-codec/contracts';
import { Container } from '../core/container.js';
import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { SchemeIdValue, TextValue } from '../core/values.js';
import { NS_RAM, ram } from '../namespaces.js';

export class PostalAddress extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'PostalTradeAddress' };

  static readonly fields = {
    postcode: registerField(PostalAddress, 'postcode', () => new TextValue(ram('PostcodeCode'))),
    lineOne: registerField(PostalAddress, 'lineOne', () => new TextValue(ram('LineOne'))),
    lineTwo: registerField(PostalAddress, 'lineTwo', () => new TextValue(ram('LineTwo')), {
      default: false,
    }),
    city: registerField(PostalAddress, 'city', () => new TextValue(ram('CityName'))),
    countryId: registerField(PostalAddress, 'countryId', () => new TextValue(ram('CountryID'))),
  };
}

/**
 * Phone number or e-mail address; the tag says which
 */
export class UniversalCommunication extends Element {
  static readonly fields = {
    uri: registerField(UniversalCommunication, 'uri', () => new TextValue(ram('URIID')), {
      default: false,
    }),
    number: registerField(
      UniversalCommunication,
      'number',
      () => new TextValue(ram('CompleteNumber')),
      { default: false },
    ),
  };

  constructor(tag: QName = ram('TelephoneUniversalCommunication')) {
    super(tag);
  }
}

export class TradeContact extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'DefinedTradeContact' };

  static readonly fields = {
    personName: registerField(TradeContact, 'personName', () => new TextValue(ram('PersonName'))),
    department: registerField(
      TradeContact,
      'department',
      () => new TextValue(ram('DepartmentName')),
      { default: false },
    ),
    telephone: registerField(
      TradeContact,
      'telephone',
      () => new UniversalCommunication(ram('TelephoneUniversalCommunication')),
      { default: false },
    ),
    fax: registerField(
      TradeContact,
      'fax',
      () => new UniversalCommunication(ram('FaxUniversalCommunication')),
      { default: false },
    ),
    email: registerField(
      TradeContact,
      'email',
      () => new UniversalCommunication(ram('EmailURIUniversalCommunication')),
      { default: false },
    ),
  };
}

/**
 * VAT (`VA`) or local tax (`FC`) registration
 */
export class TaxRegistration extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'SpecifiedTaxRegistration' };

  static readonly fields = {
    id: registerField(TaxRegistration, 'id', () => new SchemeIdValue(ram('ID'), '', 'VA')),
  };
}

/**
 * Seller, buyer, payee, ...; the role is the tag
 */
export class TradeParty extends Element {
  static readonly fields = {
    ids: registerField(TradeParty, 'ids', () => new Container(() => new TextValue(ram('ID')))),
    globalIds: registerField(
      TradeParty,
      'globalIds',
      () => new Container(() => new SchemeIdValue(ram('GlobalID'))),
    ),
    name: registerField(TradeParty, 'name', () => new TextValue(ram('Name'))),
    contact: registerField(TradeParty, 'contact', () => new TradeContact(), { default: false }),
    address: registerField(TradeParty, 'address', () => new PostalAddress(), { default: false }),
    taxRegistrations: registerField(
      TradeParty,
      'taxRegistrations',
      () => new Container(() => new TaxRegistration()),
    ),
  };

  constructor(tag: QName) {
    super(tag);
  }
}
