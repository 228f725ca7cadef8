/**
 * Exact decimal utility tests
 */

import { describe, it, expect } from 'vitest';
import {
  add,
  subtract,
  multiply,
  sum,
  round,
  compare,
  equals,
  isValidDecimalAmount,
} from './decimal-utils.js';

describe('isValidDecimalAmount', () => {
  it('should accept plain decimals', () => {
    expect(isValidDecimalAmount('12.50')).toBe(true);
    expect(isValidDecimalAmount('-0.5')).toBe(true);
    expect(isValidDecimalAmount(' 7 ')).toBe(true);
  });

  it('should reject malformed text', () => {
    expect(isValidDecimalAmount('')).toBe(false);
    expect(isValidDecimalAmount('1e5')).toBe(false);
    expect(isValidDecimalAmount('1.2.3')).toBe(false);
    expect(isValidDecimalAmount('.5')).toBe(false);
    expect(isValidDecimalAmount('abc')).toBe(false);
  });
});

describe('add', () => {
  it('should keep the larger scale', () => {
    expect(add('1.10', '2.205')).toBe('3.305');
  });

  it('should handle negative results', () => {
    expect(add('-5', '2.5')).toBe('-2.5');
  });
});

describe('subtract', () => {
  it('should keep the larger scale', () => {
    expect(subtract('10.00', '2.5')).toBe('7.50');
  });

  it('should go below zero', () => {
    expect(subtract('1', '3')).toBe('-2');
  });
});

describe('multiply', () => {
  it('should round to two places by default', () => {
    expect(multiply('3', '19.99')).toBe('59.97');
    expect(multiply('2.5', '0.333')).toBe('0.83');
  });

  it('should honour the rounding mode', () => {
    expect(multiply('0.125', '1', { roundingMode: 'ROUND_HALF_EVEN' })).toBe('0.12');
    expect(multiply('0.125', '1', { roundingMode: 'ROUND_HALF_UP' })).toBe('0.13');
  });
});

describe('sum', () => {
  it('should add all amounts', () => {
    expect(sum(['10.00', '5.5', '0.25'])).toBe('15.75');
  });

  it('should return zero for an empty list', () => {
    expect(sum([])).toBe('0.00');
  });
});

describe('round', () => {
  it('should round half up away from zero', () => {
    expect(round('2.345', 2)).toBe('2.35');
    expect(round('-2.345', 2)).toBe('-2.35');
  });

  it('should pad shorter amounts', () => {
    expect(round('7', 2)).toBe('7.00');
  });
});

describe('compare / equals', () => {
  it('should compare numerically', () => {
    expect(compare('1.50', '1.5')).toBe(0);
    expect(compare('-1', '0.5')).toBe(-1);
    expect(compare('10', '9.99')).toBe(1);
    expect(equals('100.00', '100')).toBe(true);
  });
});
