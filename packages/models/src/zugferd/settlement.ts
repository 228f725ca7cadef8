import { Container } from '../core/container.js';
import { Element, type ElementMeta } from '../core/element.js';
import { registerField } from '../core/fields.js';
import { AmountValue, DateValue, DecimalValue, TextValue } from '../core/values.js';
import { NS_RAM, ram } from '../namespaces.js';
import { TradeParty } from './party.js';

/**
 * VAT breakdown entry; also used per line, where the amounts stay unset
 */
export class TradeTax extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'ApplicableTradeTax' };

  static readonly fields = {
    calculatedAmount: registerField(
      TradeTax,
      'calculatedAmount',
      () => new AmountValue(ram('CalculatedAmount')),
      { default: false },
    ),
    typeCode: registerField(TradeTax, 'typeCode', () => new TextValue(ram('TypeCode'), 'VAT')),
    exemptionReason: registerField(
      TradeTax,
      'exemptionReason',
      () => new TextValue(ram('ExemptionReason')),
      { default: false },
    ),
    basisAmount: registerField(TradeTax, 'basisAmount', () => new AmountValue(ram('BasisAmount')), {
      default: false,
    }),
    categoryCode: registerField(TradeTax, 'categoryCode', () => new TextValue(ram('CategoryCode'), 'S')),
    rate: registerField(TradeTax, 'rate', () => new DecimalValue(ram('ApplicablePercent'))),
  };
}

export class FinancialAccount extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'PayeePartyCreditorFinancialAccount',
  };

  static readonly fields = {
    iban: registerField(FinancialAccount, 'iban', () => new TextValue(ram('IBANID'))),
    accountName: registerField(
      FinancialAccount,
      'accountName',
      () => new TextValue(ram('AccountName')),
      { default: false },
    ),
    proprietaryId: registerField(
      FinancialAccount,
      'proprietaryId',
      () => new TextValue(ram('ProprietaryID')),
      { default: false },
    ),
  };
}

export class FinancialInstitution extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'PayeeSpecifiedCreditorFinancialInstitution',
  };

  static readonly fields = {
    bic: registerField(FinancialInstitution, 'bic', () => new TextValue(ram('BICID'))),
    bankCode: registerField(
      FinancialInstitution,
      'bankCode',
      () => new TextValue(ram('GermanBankleitzahlID')),
      { default: false },
    ),
    name: registerField(FinancialInstitution, 'name', () => new TextValue(ram('Name')), {
      default: false,
    }),
  };
}

/**
 * UNTDID 4461 payment means (58 SEPA transfer, 59 SEPA direct debit, ...)
 */
export class PaymentMeans extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'SpecifiedTradeSettlementPaymentMeans',
  };

  static readonly fields = {
    typeCode: registerField(PaymentMeans, 'typeCode', () => new TextValue(ram('TypeCode'), '58')),
    information: registerField(
      PaymentMeans,
      'information',
      () => new Container(() => new TextValue(ram('Information'))),
    ),
    payeeAccount: registerField(PaymentMeans, 'payeeAccount', () => new FinancialAccount(), {
      default: false,
    }),
    payeeInstitution: registerField(
      PaymentMeans,
      'payeeInstitution',
      () => new FinancialInstitution(),
      { default: false },
    ),
  };
}

export class PaymentTerms extends Element {
  static override readonly meta: ElementMeta = { namespace: NS_RAM, tag: 'SpecifiedTradePaymentTerms' };

  static readonly fields = {
    description: registerField(PaymentTerms, 'description', () => new TextValue(ram('Description'))),
    dueDate: registerField(PaymentTerms, 'dueDate', () => new DateValue(ram('DueDateDateTime')), {
      default: false,
    }),
  };
}

/**
 * Document totals. Every amount is materialized; recalculateTotals fills
 * them from the lines and the tax breakdown.
 */
export class MonetarySummation extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'SpecifiedTradeSettlementMonetarySummation',
  };

  static readonly fields = {
    lineTotal: registerField(MonetarySummation, 'lineTotal', () => new AmountValue(ram('LineTotalAmount'))),
    chargeTotal: registerField(
      MonetarySummation,
      'chargeTotal',
      () => new AmountValue(ram('ChargeTotalAmount')),
    ),
    allowanceTotal: registerField(
      MonetarySummation,
      'allowanceTotal',
      () => new AmountValue(ram('AllowanceTotalAmount')),
    ),
    taxBasisTotal: registerField(
      MonetarySummation,
      'taxBasisTotal',
      () => new AmountValue(ram('TaxBasisTotalAmount')),
    ),
    taxTotal: registerField(MonetarySummation, 'taxTotal', () => new AmountValue(ram('TaxTotalAmount'))),
    grandTotal: registerField(
      MonetarySummation,
      'grandTotal',
      () => new AmountValue(ram('GrandTotalAmount')),
    ),
    totalPrepaid: registerField(
      MonetarySummation,
      'totalPrepaid',
      () => new AmountValue(ram('TotalPrepaidAmount')),
      { default: false },
    ),
    duePayable: registerField(
      MonetarySummation,
      'duePayable',
      () => new AmountValue(ram('DuePayableAmount')),
    ),
  };
}

export class TradeSettlement extends Element {
  static override readonly meta: ElementMeta = {
    namespace: NS_RAM,
    tag: 'ApplicableSupplyChainTradeSettlement',
  };

  static readonly fields = {
    paymentReference: registerField(
      TradeSettlement,
      'paymentReference',
      () => new TextValue(ram('PaymentReference')),
      { default: false },
    ),
    currency: registerField(
      TradeSettlement,
      'currency',
      () => new TextValue(ram('InvoiceCurrencyCode'), 'EUR'),
    ),
    payee: registerField(TradeSettlement, 'payee', () => new TradeParty(ram('PayeeTradeParty')), {
      default: false,
    }),
    paymentMeans: registerField(
      TradeSettlement,
      'paymentMeans',
      () => new Container(() => new PaymentMeans()),
    ),
    taxes: registerField(TradeSettlement, 'taxes', () => new Container(() => new TradeTax())),
    paymentTerms: registerField(
      TradeSettlement,
      'paymentTerms',
      () => new Container(() => new PaymentTerms()),
    ),
    totals: registerField(TradeSettlement, 'totals', () => new MonetarySummation()),
  };
}

