/**
 * Monetary summation
 *
 * Fills line totals, tax amounts and document totals from quantities, net
 * prices and tax rates. Amounts are rounded half-up to two places.
 */

import type { DecimalAmount } from '@invoice-codec/contracts';
import { add, CodecError, equals, multiply, subtract, sum } from '@invoice-codec/shared';
import type { AmountValue } from '../core/values.js';
import { ZugferdDocument } from './document.js';
import {
  LineAgreement,
  LineDelivery,
  LineItem,
  LineMonetarySummation,
  LineSettlement,
  TradePrice,
} from './line-item.js';
import { MonetarySummation, TradeSettlement, TradeTax } from './settlement.js';
import { TradeTransaction } from './transaction.js';

const MONEY = { decimalPlaces: 2 } as const;

function assign(target: AmountValue, amount: DecimalAmount, currency: string): void {
  target.amount = amount;
  target.currency = currency;
}

/**
 * Quantity × net unit price.
 * @throws CodecError (UNSUPPORTED_PRICE_BASIS) when the price refers to a quantity other than 1
 */
export function lineNetAmount(line: LineItem): DecimalAmount {
  const quantity = line.require(LineItem.fields.delivery).require(LineDelivery.fields.billedQuantity);
  const price = line.require(LineItem.fields.agreement).require(LineAgreement.fields.netPrice);
  const basis = price.get(TradePrice.fields.basisQuantity);

  if (basis !== null && !equals(basis.amount, '1')) {
    throw new CodecError(
      `Net price basis quantity ${basis.amount} is not supported`,
      'UNSUPPORTED_PRICE_BASIS',
      { basis: basis.amount },
    );
  }

  return multiply(quantity.amount, price.require(TradePrice.fields.chargeAmount).amount);
}

/**
 * Tax amount of a breakdown entry: basis × rate / 100.
 */
export function taxAmount(basis: DecimalAmount, rate: DecimalAmount): DecimalAmount {
  return multiply(multiply(basis, rate, { decimalPlaces: 6 }), '0.01');
}

/**
 * Recalculate every derived amount of the document in place.
 *
 * - each line total from quantity and net price
 * - each tax entry's calculated amount from its basis and rate
 * - the document totals from the above, charges, allowances and prepayment
 */
export function recalculateTotals(document: ZugferdDocument): MonetarySummation {
  const trade = document.require(ZugferdDocument.fields.trade);
  const settlement = trade.require(TradeTransaction.fields.settlement);
  const currency = settlement.require(TradeSettlement.fields.currency).text;

  const lineTotals: DecimalAmount[] = [];
  for (const line of trade.require(TradeTransaction.fields.lineItems)) {
    const amount = lineNetAmount(line);
    const lineSummation = line
      .require(LineItem.fields.settlement)
      .require(LineSettlement.fields.totals);
    assign(lineSummation.require(LineMonetarySummation.fields.lineTotal), amount, currency);
    lineTotals.push(amount);
  }

  const taxAmounts: DecimalAmount[] = [];
  for (const tax of settlement.require(TradeSettlement.fields.taxes)) {
    const basis = tax.get(TradeTax.fields.basisAmount);
    if (basis === null) {
      continue;
    }
    const amount = taxAmount(basis.amount, tax.require(TradeTax.fields.rate).value);
    assign(tax.ensure(TradeTax.fields.calculatedAmount), amount, currency);
    taxAmounts.push(amount);
  }

  const totals = settlement.require(TradeSettlement.fields.totals);
  const charges = totals.require(MonetarySummation.fields.chargeTotal);
  const allowances = totals.require(MonetarySummation.fields.allowanceTotal);
  const prepaid = totals.get(MonetarySummation.fields.totalPrepaid);

  const lineTotal = sum(lineTotals);
  const taxBasisTotal = subtract(add(lineTotal, charges.amount), allowances.amount, MONEY);
  const taxTotal = sum(taxAmounts);
  const grandTotal = add(taxBasisTotal, taxTotal, MONEY);
  const duePayable = subtract(grandTotal, prepaid?.amount ?? '0', MONEY);

  charges.currency = currency;
  allowances.currency = currency;
  if (prepaid !== null) {
    prepaid.currency = currency;
  }
  assign(totals.require(MonetarySummation.fields.lineTotal), lineTotal, currency);
  assign(totals.require(MonetarySummation.fields.taxBasisTotal), taxBasisTotal, currency);
  assign(totals.require(MonetarySummation.fields.taxTotal), taxTotal, currency);
  assign(totals.require(MonetarySummation.fields.grandTotal), grandTotal, currency);
  assign(totals.require(MonetarySummation.fields.duePayable), duePayable, currency);

  return totals;
}
