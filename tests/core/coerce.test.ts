import { describe, expect, test } from 'vitest';
import { coerceOptionValue, parseFloat64, parseInt64 } from '@/core/coerce';
import { isParseError } from '@/core/errors';
import { float, int, string } from '@/core/values';
import type { Option } from '@/types';

describe('parseInt64', () => {
  test('parses signed base-10 integers', () => {
    expect(parseInt64('42')).toBe(42n);
    expect(parseInt64('-7')).toBe(-7n);
    expect(parseInt64('+5')).toBe(5n);
    expect(parseInt64('007')).toBe(7n);
  });

  test('accepts the full signed 64-bit range', () => {
    expect(parseInt64('9223372036854775807')).toBe(9223372036854775807n);
    expect(parseInt64('-9223372036854775808')).toBe(-9223372036854775808n);
  });

  test('rejects values outside the 64-bit range', () => {
    expect(parseInt64('9223372036854775808')).toBeNull();
    expect(parseInt64('-9223372036854775809')).toBeNull();
  });

  test('rejects anything that is not a plain decimal literal', () => {
    for (const raw of ['', '-', '1_000', '1,000', ' 1', '1 ', '0x10', '1.0', '1e3', 'abc']) {
      expect(parseInt64(raw)).toBeNull();
    }
  });
});

describe('parseFloat64', () => {
  test('parses decimal and scientific literals', () => {
    expect(parseFloat64('1.5')).toBe(1.5);
    expect(parseFloat64('-2')).toBe(-2);
    expect(parseFloat64('.5')).toBe(0.5);
    expect(parseFloat64('5.')).toBe(5);
    expect(parseFloat64('1e3')).toBe(1000);
    expect(parseFloat64('2.5E-3')).toBe(0.0025);
  });

  test('parses inf and nan spellings', () => {
    expect(parseFloat64('inf')).toBe(Number.POSITIVE_INFINITY);
    expect(parseFloat64('-Infinity')).toBe(Number.NEGATIVE_INFINITY);
    expect(parseFloat64('NaN')).toBeNaN();
  });

  test('rejects malformed literals', () => {
    for (const raw of ['', '.', 'e5', '1e', '1.2.3', 'abc', '1,5', ' 1', '0x1p3']) {
      expect(parseFloat64(raw)).toBeNull();
    }
  });
});

describe('coerceOptionValue', () => {
  const label: Option = { longName: 'label', help: '', default: string('x') };
  const count: Option = { longName: 'count', help: '', default: int(1) };
  const ratio: Option = { longName: 'ratio', help: '', default: float(1) };

  test('keeps string values verbatim', () => {
    expect(coerceOptionValue(label, '--not-an-option')).toEqual({
      kind: 'string',
      value: '--not-an-option',
    });
  });

  test('coerces to the declared type', () => {
    expect(coerceOptionValue(count, '-12')).toEqual({ kind: 'int', value: -12n });
    expect(coerceOptionValue(ratio, '0.25')).toEqual({ kind: 'float', value: 0.25 });
  });

  test('raises a ParseError naming the option', () => {
    let caught: unknown;
    try {
      coerceOptionValue(count, '1.5');
    } catch (error) {
      caught = error;
    }
    expect(isParseError(caught)).toBe(true);
    if (!isParseError(caught)) return;
    expect(caught.kind).toBe('InvalidIntegerValue');
    expect(caught.subject).toBe('count');
  });

  test('raises InvalidFloatValue for a bad float', () => {
    expect(() => coerceOptionValue(ratio, 'half')).toThrow(
      'option(ratio): cannot parse float value',
    );
  });
});
