/**
 * Leaf values
 *
 * A leaf is a mutable value object that carries its own tag and encodes to a
 * single node. The `kind` discriminant drives the exhaustive codec in
 * leaf-codec.ts; adding a variant means adding a case there.
 */

import type { CurrencyCode, DecimalAmount, ISODate, QName } from '@invoice-codec/contracts';
import { InvalidDateError, InvalidDecimalError, isValidDecimalAmount } from '@invoice-codec/shared';
import { clark } from '@invoice-codec/xml';
import { isISODate } from './dates.js';

function checkedDecimal(value: DecimalAmount, tag: QName): DecimalAmount {
  const trimmed = value.trim();
  if (!isValidDecimalAmount(trimmed)) {
    throw new InvalidDecimalError(value, clark(tag));
  }
  return trimmed;
}

/** Plain text content */
export class TextValue {
  readonly kind = 'text';
  readonly tag: QName;
  text: string;

  constructor(tag: QName, text = '') {
    this.tag = tag;
    this.text = text;
  }
}

/** Exact decimal without unit (percentages, rates) */
export class DecimalValue {
  readonly kind = 'decimal';
  readonly tag: QName;
  value: DecimalAmount;

  constructor(tag: QName, value: DecimalAmount = '0') {
    this.tag = tag;
    this.value = checkedDecimal(value, tag);
  }
}

/** Decimal with a `unitCode` attribute (UN/ECE Rec 20) */
export class QuantityValue {
  readonly kind = 'quantity';
  readonly tag: QName;
  amount: DecimalAmount;
  unitCode: string;

  constructor(tag: QName, amount: DecimalAmount = '0', unitCode = '') {
    this.tag = tag;
    this.amount = checkedDecimal(amount, tag);
    this.unitCode = unitCode;
  }
}

/** Decimal with a `currencyID` attribute */
export class AmountValue {
  readonly kind = 'amount';
  readonly tag: QName;
  amount: DecimalAmount;
  currency: CurrencyCode;

  constructor(tag: QName, amount: DecimalAmount = '0', currency: CurrencyCode = 'EUR') {
    this.tag = tag;
    this.amount = checkedDecimal(amount, tag);
    this.currency = currency;
  }
}

/**
 * Code from a code list, with `listID` and `listVersionID`.
 * The code is opaque text; "0012" stays "0012".
 */
export class ClassificationValue {
  readonly kind = 'classification';
  readonly tag: QName;
  text: string;
  listId: string;
  listVersionId: string;

  constructor(tag: QName, text = '', listId = '', listVersionId = '') {
    this.tag = tag;
    this.text = text;
    this.listId = listId;
    this.listVersionId = listVersionId;
  }
}

/** Identifier qualified by `schemeAgencyID` */
export class AgencyIdValue {
  readonly kind = 'agency-id';
  readonly tag: QName;
  text: string;
  schemeAgencyId: string;

  constructor(tag: QName, text = '', schemeAgencyId = '') {
    this.tag = tag;
    this.text = text;
    this.schemeAgencyId = schemeAgencyId;
  }
}

/** Identifier qualified by `schemeID` (VA, FC, 0088, ...) */
export class SchemeIdValue {
  readonly kind = 'scheme-id';
  readonly tag: QName;
  text: string;
  schemeId: string;

  constructor(tag: QName, text = '', schemeId = '') {
    this.tag = tag;
    this.text = text;
    this.schemeId = schemeId;
  }
}

/** Calendar date wrapped in `udt:DateTimeString` */
export class DateValue {
  readonly kind = 'date';
  readonly tag: QName;
  value: ISODate | null;
  format: string;

  constructor(tag: QName, value: ISODate | null = null, format = '102') {
    if (value !== null && !isISODate(value)) {
      throw new InvalidDateError(value, clark(tag));
    }
    this.tag = tag;
    this.value = value;
    this.format = format;
  }
}

/** Boolean wrapped in `udt:Indicator` */
export class IndicatorValue {
  readonly kind = 'indicator';
  readonly tag: QName;
  value: boolean | null;

  constructor(tag: QName, value: boolean | null = null) {
    this.tag = tag;
    this.value = value;
  }
}

export type LeafValue =
  | TextValue
  | DecimalValue
  | QuantityValue
  | AmountValue
  | ClassificationValue
  | AgencyIdValue
  | SchemeIdValue
  | DateValue
  | IndicatorValue;

export type LeafKind = LeafValue['kind'];
