/**
 * Decimal amount represented as string to avoid floating-point issues.
 * The textual form is kept exactly as written (trailing zeros included).
 *
 * @example "1234.56", "-100.00", "0.01"
 */
export type DecimalAmount = string;

/**
 * ISO 4217 currency code
 * @example "EUR", "USD", "GBP"
 */
export type CurrencyCode = string;

/**
 * ISO 8601 calendar date
 * @example "2024-01-23"
 */
export type ISODate = string;
