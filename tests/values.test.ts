import { describe, it, expect } from 'vitest';
import { formatValue, parseNumber, toNumber, valuesEqual } from '../src/dsl/values';
import { readCliOptions } from '../src/runtime/config';

describe('parseNumber', () => {
  it('reads decimal text', () => {
    expect(parseNumber('42')).toBe(42);
    expect(parseNumber(' -2.5 ')).toBe(-2.5);
    expect(parseNumber('1e3')).toBe(1000);
    expect(parseNumber('+.5')).toBe(0.5);
    expect(parseNumber('3.')).toBe(3);
  });

  it('reads infinity and nan words', () => {
    expect(parseNumber('inf')).toBe(Infinity);
    expect(parseNumber('-Infinity')).toBe(-Infinity);
    expect(parseNumber('NaN')).toBeNaN();
  });

  it('rejects prefixed, blank and partial text', () => {
    expect(parseNumber('0x1A')).toBeNull();
    expect(parseNumber('0b101')).toBeNull();
    expect(parseNumber('0o17')).toBeNull();
    expect(parseNumber('')).toBeNull();
    expect(parseNumber('12abc')).toBeNull();
    expect(parseNumber('1_000')).toBeNull();
  });
});

describe('toNumber and valuesEqual', () => {
  it('gives booleans a numeric view', () => {
    expect(toNumber(true)).toBe(1);
    expect(toNumber(false)).toBe(0);
    expect(toNumber('1')).toBeNull();
    expect(toNumber(null)).toBeNull();
  });

  it('compares nested arrays by content', () => {
    expect(valuesEqual([1, ['a', true]], [1, ['a', 1]])).toBe(true);
    expect(valuesEqual([1, 2], [1, 2, 3])).toBe(false);
    expect(valuesEqual([], 0)).toBe(false);
    expect(valuesEqual(null, null)).toBe(true);
    expect(valuesEqual('a', 'a')).toBe(true);
  });

  it('formats nested values', () => {
    expect(formatValue([1, ['a'], null])).toBe('[1, ["a"], none]');
  });
});

describe('readCliOptions', () => {
  it('turns decimal entry text into a number and keeps other text', () => {
    expect(readCliOptions(['--entry', '1e3'], '/tmp').entry).toBe(1000);
    expect(readCliOptions(['--entry', '0x1A'], '/tmp').entry).toBe('0x1A');
    expect(readCliOptions([], '/tmp').entry).toBe(0);
  });
});
