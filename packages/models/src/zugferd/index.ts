export { ZugferdDocument } from './document.js';
export { DocumentContext, GuidelineParameter, ZUGFERD_PROFILES } from './context.js';
export { Header, Note, INVOICE_TYPE_CODE } from './header.js';
export { TradeTransaction } from './transaction.js';
export { TradeAgreement } from './agreement.js';
export { ReferencedDocument } from './documents.js';
export { TradeParty, PostalAddress, TradeContact, UniversalCommunication, TaxRegistration } from './party.js';
export { TradeDelivery, SupplyChainEvent } from './delivery.js';
export {
  TradeSettlement,
  PaymentMeans,
  FinancialAccount,
  FinancialInstitution,
  TradeTax,
  PaymentTerms,
  MonetarySummation,
} from './settlement.js';
export {
  LineItem,
  LineDocument,
  LineAgreement,
  TradePrice,
  LineDelivery,
  LineSettlement,
  LineMonetarySummation,
  TradeProduct,
  ProductClassification,
  OriginCountry,
} from './line-item.js';
export { recalculateTotals, lineNetAmount, taxAmount } from './totals.js';
