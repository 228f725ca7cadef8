/**
 * ZUGFeRD 1.0 model tests
 */

import { readFileSync } from 'node:fs';
import { describe, it, expect, vi } from 'vitest';
import { CodecError, UnknownElementError, type Logger } from '@invoice-codec/shared';
import { MockSchemaValidator, ZUGFERD_1P0 } from '@invoice-codec/schema-validator';
import { parseXml } from '@invoice-codec/xml';
import { DateValue, QuantityValue, SchemeIdValue, TextValue } from '../core/values.js';
import { NS_RSM, ram } from '../namespaces.js';
import { DocumentContext } from './context.js';
import { ZugferdDocument } from './document.js';
import { Header, Note } from './header.js';
import {
  LineAgreement,
  LineDelivery,
  LineDocument,
  LineItem,
  LineMonetarySummation,
  LineSettlement,
  ProductClassification,
  TradePrice,
  TradeProduct,
} from './line-item.js';
import { PostalAddress, TaxRegistration, TradeParty } from './party.js';
import { TradeAgreement } from './agreement.js';
import { MonetarySummation, TradeSettlement, TradeTax } from './settlement.js';
import { lineNetAmount, recalculateTotals } from './totals.js';
import { TradeTransaction } from './transaction.js';

const fixture = readFileSync(new URL('../../fixtures/zugferd-basic.xml', import.meta.url));

function silentLogger(): Logger {
  const logger: Logger = {
    level: 'debug',
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    child: () => logger,
  };
  return logger;
}

function addLine(
  document: ZugferdDocument,
  lineId: string,
  name: string,
  quantity: string,
  unitCode: string,
  netPrice: string,
): LineItem {
  const line = document
    .require(ZugferdDocument.fields.trade)
    .require(TradeTransaction.fields.lineItems)
    .add();

  line.require(LineItem.fields.document).require(LineDocument.fields.lineId).text = lineId;
  line
    .require(LineItem.fields.agreement)
    .require(LineAgreement.fields.netPrice)
    .require(TradePrice.fields.chargeAmount).amount = netPrice;
  line
    .require(LineItem.fields.delivery)
    .set(LineDelivery.fields.billedQuantity, new QuantityValue(ram('BilledQuantity'), quantity, unitCode));
  line
    .require(LineItem.fields.settlement)
    .require(LineSettlement.fields.taxes)
    .add()
    .require(TradeTax.fields.rate).value = '19.00';
  line.require(LineItem.fields.product).require(TradeProduct.fields.name).text = name;

  return line;
}

function buildInvoice(): ZugferdDocument {
  const invoice = new ZugferdDocument();

  const header = invoice.require(ZugferdDocument.fields.header);
  header.require(Header.fields.id).text = 'RE-1001';
  header.set(Header.fields.issueDate, new DateValue(ram('IssueDateTime'), '2023-03-01'));

  const agreement = invoice
    .require(ZugferdDocument.fields.trade)
    .require(TradeTransaction.fields.agreement);
  const seller = agreement.require(TradeAgreement.fields.seller);
  seller.require(TradeParty.fields.name).text = 'Musterlieferant GmbH';
  seller
    .require(TradeParty.fields.taxRegistrations)
    .add()
    .set(TaxRegistration.fields.id, new SchemeIdValue(ram('ID'), 'DE000000000', 'VA'));
  const address = seller.ensure(TradeParty.fields.address);
  address.require(PostalAddress.fields.city).text = 'Musterstadt';
  agreement.require(TradeAgreement.fields.buyer).require(TradeParty.fields.name).text = 'Beispielkunde AG';

  addLine(invoice, '1', 'Trennblätter A4', '2', 'C62', '12.50');
  addLine(invoice, '2', 'Kabelbinder', '1.5', 'KGM', '10.00');

  const tax = invoice
    .require(ZugferdDocument.fields.trade)
    .require(TradeTransaction.fields.settlement)
    .require(TradeSettlement.fields.taxes)
    .add();
  tax.ensure(TradeTax.fields.basisAmount).amount = '40.00';
  tax.require(TradeTax.fields.rate).value = '19.00';

  return invoice;
}

function totalsOf(document: ZugferdDocument): MonetarySummation {
  return document
    .require(ZugferdDocument.fields.trade)
    .require(TradeTransaction.fields.settlement)
    .require(TradeSettlement.fields.totals);
}

describe('ZugferdDocument', () => {
  it('should decode the basic fixture', () => {
    const invoice = ZugferdDocument.parse(fixture, { logger: silentLogger() });

    const context = invoice.require(ZugferdDocument.fields.context);
    expect(context.require(DocumentContext.fields.testIndicator).value).toBe(true);

    const header = invoice.require(ZugferdDocument.fields.header);
    expect(header.require(Header.fields.id).text).toBe('RE-2023-0042');
    expect(header.require(Header.fields.issueDate).value).toBe('2023-01-15');
    const subjects = header
      .require(Header.fields.notes)
      .items.map((note) => note.get(Note.fields.subjectCode)?.text);
    expect(subjects).toEqual([undefined, 'REG']);

    const trade = invoice.require(ZugferdDocument.fields.trade);
    const seller = trade.require(TradeTransaction.fields.agreement).require(TradeAgreement.fields.seller);
    const registration = seller.require(TradeParty.fields.taxRegistrations).items[0];
    expect(registration?.require(TaxRegistration.fields.id).schemeId).toBe('VA');

    const lines = trade.require(TradeTransaction.fields.lineItems);
    expect(lines.length).toBe(2);
    const classification = lines.items[1]
      ?.require(LineItem.fields.product)
      .require(TradeProduct.fields.classifications).items[0]
      ?.require(ProductClassification.fields.classCode);
    expect(classification?.text).toBe('0012');
    expect(classification?.listId).toBe('IB');

    expect(totalsOf(invoice).require(MonetarySummation.fields.grandTotal).amount).toBe('47.60');
  });

  it('should encode the fixture back to the same tree', () => {
    const invoice = ZugferdDocument.parse(fixture, { logger: silentLogger() });

    expect(invoice.encode()).toEqual(parseXml(fixture));
  });

  it('should reject elements the model does not declare', () => {
    const xml = fixture
      .toString('utf-8')
      .replace('<ram:Name>RECHNUNG</ram:Name>', '<ram:Name>RECHNUNG</ram:Name><ram:Remark>x</ram:Remark>');

    expect(() => ZugferdDocument.parse(xml, { logger: silentLogger() })).toThrow(UnknownElementError);
  });

  it('should serialize a built invoice that passes the mock validator', () => {
    const invoice = buildInvoice();
    recalculateTotals(invoice);

    const xml = invoice
      .serialize({ validator: new MockSchemaValidator(), logger: silentLogger() })
      .toString('utf-8');

    expect(xml).toContain(`<rsm:CrossIndustryDocument xmlns:rsm="${NS_RSM}"`);
    expect(xml).toContain(
      '<ram:IssueDateTime><udt:DateTimeString format="102">20230301</udt:DateTimeString></ram:IssueDateTime>',
    );
    expect(xml).toContain('<ram:ID schemeID="VA">DE000000000</ram:ID>');
    expect(xml).toContain('<ram:GrandTotalAmount currencyID="EUR">47.60</ram:GrandTotalAmount>');
  });

  it('should survive a serialize and parse round trip', () => {
    const invoice = buildInvoice();
    recalculateTotals(invoice);
    const xml = invoice.serialize({ validator: new MockSchemaValidator(), logger: silentLogger() });

    const parsed = ZugferdDocument.parse(xml, { logger: silentLogger() });

    expect(parsed.encode()).toEqual(invoice.encode());
    expect(parsed.schemaName).toBe(ZUGFERD_1P0);
  });

  it('should let optional parts stay out of the output', () => {
    const invoice = buildInvoice();
    recalculateTotals(invoice);

    const header = invoice.encode().children[1];

    expect(header?.children.map((child) => child.tag.localName)).toEqual([
      'ID',
      'Name',
      'TypeCode',
      'IssueDateTime',
    ]);
  });

  it('should accept notes in the header container', () => {
    const invoice = buildInvoice();
    const notes = invoice.require(ZugferdDocument.fields.header).require(Header.fields.notes);

    notes.add().set(Note.fields.content, new TextValue(ram('Content'), 'Vielen Dank'));

    expect(notes.encode()[0]?.children[0]?.text).toBe('Vielen Dank');
  });
});

describe('recalculateTotals', () => {
  it('should compute line, tax and document totals', () => {
    const invoice = buildInvoice();

    const totals = recalculateTotals(invoice);

    expect(totals.require(MonetarySummation.fields.lineTotal).amount).toBe('40.00');
    expect(totals.require(MonetarySummation.fields.taxBasisTotal).amount).toBe('40.00');
    expect(totals.require(MonetarySummation.fields.taxTotal).amount).toBe('7.60');
    expect(totals.require(MonetarySummation.fields.grandTotal).amount).toBe('47.60');
    expect(totals.require(MonetarySummation.fields.duePayable).amount).toBe('47.60');

    const lineTotals = invoice
      .require(ZugferdDocument.fields.trade)
      .require(TradeTransaction.fields.lineItems)
      .items.map(
        (line) =>
          line
            .require(LineItem.fields.settlement)
            .require(LineSettlement.fields.totals)
            .require(LineMonetarySummation.fields.lineTotal).amount,
      );
    expect(lineTotals).toEqual(['25.00', '15.00']);
  });

  it('should subtract allowances and prepayments', () => {
    const invoice = buildInvoice();
    const summation = totalsOf(invoice);
    summation.require(MonetarySummation.fields.allowanceTotal).amount = '5.00';
    summation.ensure(MonetarySummation.fields.totalPrepaid).amount = '10.00';

    recalculateTotals(invoice);

    expect(summation.require(MonetarySummation.fields.taxBasisTotal).amount).toBe('35.00');
    expect(summation.require(MonetarySummation.fields.grandTotal).amount).toBe('42.60');
    expect(summation.require(MonetarySummation.fields.duePayable).amount).toBe('32.60');
  });

  it('should match the totals stored in the fixture', () => {
    const invoice = ZugferdDocument.parse(fixture, { logger: silentLogger() });
    const before = invoice.encode();

    recalculateTotals(invoice);

    expect(invoice.encode()).toEqual(before);
  });

  it('should refuse prices for a basis quantity other than one', () => {
    const invoice = buildInvoice();
    const line = invoice
      .require(ZugferdDocument.fields.trade)
      .require(TradeTransaction.fields.lineItems)
      .items[0];
    line
      ?.require(LineItem.fields.agreement)
      .require(LineAgreement.fields.netPrice)
      .set(TradePrice.fields.basisQuantity, new QuantityValue(ram('BasisQuantity'), '100', 'C62'));

    expect(() => recalculateTotals(invoice)).toThrow(CodecError);
    expect(() => recalculateTotals(invoice)).toThrow('Net price basis quantity 100 is not supported');
  });

  it('should multiply quantity and net price per line', () => {
    const line = buildInvoice()
      .require(ZugferdDocument.fields.trade)
      .require(TradeTransaction.fields.lineItems)
      .items[1];

    expect(line === undefined ? undefined : lineNetAmount(line)).toBe('15.00');
  });
});
