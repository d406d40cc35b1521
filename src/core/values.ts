import type { Option, OptionKind, OptionValue } from '@/types';

export function bool(value = false): OptionValue {
  return { kind: 'bool', value };
}

export function string(value = ''): OptionValue {
  return { kind: 'string', value };
}

export function int(value: bigint | number = 0n): OptionValue {
  return { kind: 'int', value: BigInt(value) };
}

export function float(value = 0): OptionValue {
  return { kind: 'float', value };
}

function kindMismatch(option: Option, expected: OptionKind): TypeError {
  return new TypeError(
    `option --${option.longName} is declared as ${option.default.kind}, not ${expected}`,
  );
}

/**
 * Option values captured by a single parse, keyed by option identity.
 * Options that never appeared read back as their declared default.
 */
export class OptionValues {
  private readonly captured = new Map<Option, OptionValue>();

  /** @internal Called by the parser */
  set(option: Option, value: OptionValue): void {
    this.captured.set(option, value);
  }

  get(option: Option): OptionValue {
    return this.captured.get(option) ?? option.default;
  }

  getBool(option: Option): boolean {
    const value = this.get(option);
    if (value.kind !== 'bool') throw kindMismatch(option, 'bool');
    return value.value;
  }

  getString(option: Option): string {
    const value = this.get(option);
    if (value.kind !== 'string') throw kindMismatch(option, 'string');
    return value.value;
  }

  getInt(option: Option): bigint {
    const value = this.get(option);
    if (value.kind !== 'int') throw kindMismatch(option, 'int');
    return value.value;
  }

  getFloat(option: Option): number {
    const value = this.get(option);
    if (value.kind !== 'float') throw kindMismatch(option, 'float');
    return value.value;
  }

  /** True if the option appeared on the command line. */
  has(option: Option): boolean {
    return this.captured.has(option);
  }

  /** Captured pairs in first-capture order. */
  entries(): [Option, OptionValue][] {
    return [...this.captured.entries()];
  }

  get size(): number {
    return this.captured.size;
  }
}
