import type { QName } from '@invoice-codec/contracts';
import { qname } from '@invoice-codec/xml';

/** ZUGFeRD 1.0 root message namespace */
export const NS_RSM = 'urn:ferd:CrossIndustryDocument:invoice:1p0';

/** Reusable aggregate business information entities */
export const NS_RAM = 'urn:un:unece:uncefact:data:standard:ReusableAggregateBusinessInformationEntity:12';

/** Unqualified data types; also the namespace of the date and indicator wrappers */
export const NS_UDT = 'urn:un:unece:uncefact:data:standard:UnqualifiedDataType:15';

/**
 * Preferred prefixes when rendering ZUGFeRD documents
 */
export const ZUGFERD_PREFIXES: Readonly<Record<string, string>> = {
  [NS_RSM]: 'rsm',
  [NS_RAM]: 'ram',
  [NS_UDT]: 'udt',
};

export const rsm = (localName: string): QName => qname(NS_RSM, localName);
export const ram = (localName: string): QName => qname(NS_RAM, localName);
export const udt = (localName: string): QName => qname(NS_UDT, localName);

/** Wrapper child of every date leaf */
export const DATE_TIME_STRING: QName = udt('DateTimeString');

/** Wrapper child of every indicator leaf */
export const INDICATOR: QName = udt('Indicator');
