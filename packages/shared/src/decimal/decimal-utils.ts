/**
 * Exact decimal utilities.
 *
 * Amounts, quantities and percentages are carried as strings (DecimalAmount)
 * so that the text read from a document is written back unchanged. The
 * arithmetic here works on bigint with an explicit scale and rounding mode.
 */

import type { DecimalAmount } from '@invoice-codec/contracts';

/**
 * Rounding modes for decimal operations.
 *
 * - ROUND_HALF_EVEN (Banker's rounding): Round to nearest even number.
 * - ROUND_HALF_UP (Commercial rounding): Round 0.5 up.
 * - ROUND_DOWN (Truncate): Always round towards zero.
 * - ROUND_UP: Always round away from zero.
 */
export type RoundingMode =
  | 'ROUND_HALF_EVEN'
  | 'ROUND_HALF_UP'
  | 'ROUND_DOWN'
  | 'ROUND_UP';

/**
 * Default rounding mode.
 */
export const DEFAULT_ROUNDING_MODE: RoundingMode = 'ROUND_HALF_UP';

/**
 * Default decimal places for monetary amounts.
 */
export const DEFAULT_DECIMAL_PLACES = 2;

/**
 * Accepted textual form: optional sign, digits, optional fraction.
 */
const DECIMAL_PATTERN = /^[+-]?(\d+)(?:\.(\d+))?$/;

/**
 * Internal representation of a decimal value.
 */
interface DecimalValue {
  /** Integer representation (value * 10^scale), unsigned */
  value: bigint;
  /** Number of decimal places */
  scale: number;
  /** Whether the value is negative */
  negative: boolean;
}

/**
 * Parse a decimal string into internal representation.
 */
function parseDecimal(str: string): DecimalValue {
  const trimmed = str.trim();
  const match = DECIMAL_PATTERN.exec(trimmed);
  if (!match) {
    throw new Error(`Invalid decimal format: ${str}`);
  }

  const intPart = match[1] ?? '0';
  const fracPart = match[2] ?? '';

  return {
    value: BigInt(intPart + fracPart),
    scale: fracPart.length,
    negative: trimmed.startsWith('-'),
  };
}

/**
 * Format a decimal value back to string.
 */
function formatDecimal(decimal: DecimalValue, places?: number): string {
  const targetScale = places ?? decimal.scale;
  let { value, scale } = decimal;

  if (scale < targetScale) {
    value = value * 10n ** BigInt(targetScale - scale);
    scale = targetScale;
  } else if (scale > targetScale) {
    value = value / 10n ** BigInt(scale - targetScale);
    scale = targetScale;
  }

  let str = value.toString();

  // Pad with leading zeros if needed
  while (str.length <= scale) {
    str = '0' + str;
  }

  const insertPoint = str.length - scale;
  let result =
    scale > 0
      ? str.slice(0, insertPoint) + '.' + str.slice(insertPoint)
      : str;

  if (decimal.negative && value !== 0n) {
    result = '-' + result;
  }

  return result;
}

/**
 * Signed integer values of two decimals at their common scale.
 */
function normalize(a: DecimalValue, b: DecimalValue): [bigint, bigint, number] {
  const targetScale = Math.max(a.scale, b.scale);

  let aValue = a.value * 10n ** BigInt(targetScale - a.scale);
  let bValue = b.value * 10n ** BigInt(targetScale - b.scale);

  if (a.negative) aValue = -aValue;
  if (b.negative) bValue = -bValue;

  return [aValue, bValue, targetScale];
}

/**
 * Apply rounding mode to a truncated quotient (all operands unsigned).
 */
function applyRounding(
  quotient: bigint,
  remainder: bigint,
  divisor: bigint,
  mode: RoundingMode,
): bigint {
  if (remainder === 0n) {
    return quotient;
  }

  const isHalf = remainder * 2n === divisor;
  const isMoreThanHalf = remainder * 2n > divisor;

  switch (mode) {
    case 'ROUND_DOWN':
      return quotient;

    case 'ROUND_UP':
      return quotient + 1n;

    case 'ROUND_HALF_UP':
      return isHalf || isMoreThanHalf ? quotient + 1n : quotient;

    case 'ROUND_HALF_EVEN':
      if (isMoreThanHalf) {
        return quotient + 1n;
      }
      if (isHalf && quotient % 2n === 1n) {
        return quotient + 1n;
      }
      return quotient;
  }
}

/**
 * Configuration for decimal operations.
 */
export interface DecimalConfig {
  /**
   * Rounding mode to use
   * @default 'ROUND_HALF_UP'
   */
  roundingMode?: RoundingMode;

  /**
   * Number of decimal places for results
   */
  decimalPlaces?: number;
}

/**
 * Validate that a string is a well-formed decimal amount.
 */
export function isValidDecimalAmount(value: string): boolean {
  return DECIMAL_PATTERN.test(value.trim());
}

/**
 * Add two decimal amounts.
 */
export function add(
  a: DecimalAmount,
  b: DecimalAmount,
  config: DecimalConfig = {},
): DecimalAmount {
  const [valA, valB, scale] = normalize(parseDecimal(a), parseDecimal(b));
  const result = valA + valB;
  const negative = result < 0n;

  return round(
    formatDecimal({ value: negative ? -result : result, scale, negative }),
    config.decimalPlaces ?? scale,
    config.roundingMode,
  );
}

/**
 * Subtract b from a.
 */
export function subtract(
  a: DecimalAmount,
  b: DecimalAmount,
  config: DecimalConfig = {},
): DecimalAmount {
  const [valA, valB, scale] = normalize(parseDecimal(a), parseDecimal(b));
  const result = valA - valB;
  const negative = result < 0n;

  return round(
    formatDecimal({ value: negative ? -result : result, scale, negative }),
    config.decimalPlaces ?? scale,
    config.roundingMode,
  );
}

/**
 * Multiply two decimal amounts.
 */
export function multiply(
  a: DecimalAmount,
  b: DecimalAmount,
  config: DecimalConfig = {},
): DecimalAmount {
  const decA = parseDecimal(a);
  const decB = parseDecimal(b);

  const product: DecimalValue = {
    value: decA.value * decB.value,
    scale: decA.scale + decB.scale,
    negative: decA.negative !== decB.negative,
  };

  return round(
    formatDecimal(product),
    config.decimalPlaces ?? DEFAULT_DECIMAL_PLACES,
    config.roundingMode,
  );
}

/**
 * Sum an array of decimal amounts.
 */
export function sum(amounts: DecimalAmount[], config: DecimalConfig = {}): DecimalAmount {
  const total = amounts.reduce((acc, amount) => add(acc, amount), '0');
  return round(total, config.decimalPlaces ?? DEFAULT_DECIMAL_PLACES, config.roundingMode);
}

/**
 * Round a decimal amount to the given number of places.
 * Amounts with fewer places are padded with zeros.
 */
export function round(
  a: DecimalAmount,
  places: number = DEFAULT_DECIMAL_PLACES,
  mode: RoundingMode = DEFAULT_ROUNDING_MODE,
): DecimalAmount {
  const dec = parseDecimal(a);

  if (dec.scale <= places) {
    return formatDecimal(dec, places);
  }

  const factor = 10n ** BigInt(dec.scale - places);
  const quotient = dec.value / factor;
  const remainder = dec.value % factor;
  const rounded = applyRounding(quotient, remainder, factor, mode);

  return formatDecimal({ value: rounded, scale: places, negative: dec.negative }, places);
}

/**
 * Compare two decimal amounts.
 * Returns: -1 if a < b, 0 if a == b, 1 if a > b
 */
export function compare(a: DecimalAmount, b: DecimalAmount): -1 | 0 | 1 {
  const [valA, valB] = normalize(parseDecimal(a), parseDecimal(b));

  if (valA < valB) return -1;
  if (valA > valB) return 1;
  return 0;
}

/**
 * Check if two decimal amounts are numerically equal ("1.50" equals "1.5").
 */
export function equals(a: DecimalAmount, b: DecimalAmount): boolean {
  return compare(a, b) === 0;
}
