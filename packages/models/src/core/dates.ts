import type { ISODate } from '@invoice-codec/contracts';

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT_DATE_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return [4, 6, 9, 11].includes(month) ? 30 : 31;
}

function isCalendarDate(year: number, month: number, day: number): boolean {
  return month >= 1 && month <= 12 && day >= 1 && day <= daysInMonth(year, month);
}

function fromMatch(match: RegExpExecArray | null): ISODate | null {
  if (match === null) {
    return null;
  }
  const [, year = '', month = '', day = ''] = match;
  if (!isCalendarDate(Number(year), Number(month), Number(day))) {
    return null;
  }
  return `${year}-${month}-${day}`;
}

/**
 * Check a `YYYY-MM-DD` string names a real calendar day.
 */
export function isISODate(value: string): boolean {
  return fromMatch(ISO_DATE_PATTERN.exec(value)) !== null;
}

/**
 * Parse format 102 text (`YYYYMMDD`); null when the text is not a real date.
 */
export function parseDate102(text: string): ISODate | null {
  return fromMatch(COMPACT_DATE_PATTERN.exec(text.trim()));
}

/**
 * `2023-01-15` → `20230115`
 */
export function formatDate102(date: ISODate): string {
  return date.replaceAll('-', '');
}
