import { ParseError } from '@/core/errors';
import type { Option, OptionValue } from '@/types';

const INT_PATTERN = /^[+-]?[0-9]+$/;
const FLOAT_PATTERN = /^[+-]?(?:[0-9]+\.?[0-9]*|\.[0-9]+)(?:[eE][+-]?[0-9]+)?$/;
const FLOAT_SPECIAL_PATTERN = /^([+-]?)(inf|infinity|nan)$/i;

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Parse a base-10 signed 64-bit integer. Returns null on any malformed or
 * out-of-range input.
 */
export function parseInt64(raw: string): bigint | null {
  if (!INT_PATTERN.test(raw)) {
    return null;
  }
  const value = BigInt(raw);
  if (value < INT64_MIN || value > INT64_MAX) {
    return null;
  }
  return value;
}

/**
 * Parse a decimal or scientific float literal, or inf/infinity/nan.
 * Returns null when the whole string is not a literal.
 */
export function parseFloat64(raw: string): number | null {
  const special = FLOAT_SPECIAL_PATTERN.exec(raw);
  if (special) {
    const negative = special[1] === '-';
    if (special[2]?.toLowerCase() === 'nan') {
      return Number.NaN;
    }
    return negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  if (!FLOAT_PATTERN.test(raw)) {
    return null;
  }
  return Number(raw);
}

/**
 * Coerce the token following a valued option to the option's declared type.
 */
export function coerceOptionValue(option: Option, raw: string): OptionValue {
  switch (option.default.kind) {
    case 'bool':
      // Bool options never take a value token
      return { kind: 'bool', value: true };
    case 'string':
      return { kind: 'string', value: raw };
    case 'int': {
      const value = parseInt64(raw);
      if (value === null) {
        throw new ParseError(
          'InvalidIntegerValue',
          option.longName,
          `option(${option.longName}): cannot parse int value`,
        );
      }
      return { kind: 'int', value };
    }
    case 'float': {
      const value = parseFloat64(raw);
      if (value === null) {
        throw new ParseError(
          'InvalidFloatValue',
          option.longName,
          `option(${option.longName}): cannot parse float value`,
        );
      }
      return { kind: 'float', value };
    }
  }
}
