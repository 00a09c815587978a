import Decimal from 'decimal.js';

const DECIMAL_PATTERN = /^[+-]?(?:(\d+)(?:\.(\d*))?|\.(\d+))(?:[eE]([+-]?\d+))?$/;

// Longest plain-notation rendering accepted, in digits.
export const MAX_DECIMAL_DIGITS = 1000;

/**
 * Base-10 amount that keeps the scale of the text it was parsed from,
 * so "10.0" is rendered back as "10.0" rather than "10".
 */
export class ExactDecimal {
  private constructor(
    private readonly value: Decimal,
    private readonly scale: number,
  ) {}

  static parse(input: string | number): ExactDecimal {
    const parsed = ExactDecimal.tryParse(input);
    if (!parsed) {
      throw new RangeError(`Not an exact decimal: ${String(input)}`);
    }
    return parsed;
  }

  /** Returns null for anything that is not a finite number or a decimal string. */
  static tryParse(input: unknown): ExactDecimal | null {
    let text: string;
    if (typeof input === 'number') {
      if (!Number.isFinite(input)) return null;
      text = String(input);
    } else if (typeof input === 'string') {
      text = input.trim();
    } else {
      return null;
    }

    const match = DECIMAL_PATTERN.exec(text);
    if (!match) return null;

    const integer = match[1] ?? '';
    const fraction = match[2] ?? match[3] ?? '';
    const exponent = match[4] ? Number(match[4]) : 0;
    if (!Number.isSafeInteger(exponent)) return null;

    const scale = Math.max(0, fraction.length - exponent);
    const integerDigits = Math.max(1, integer.length + exponent);
    if (integerDigits + scale > MAX_DECIMAL_DIGITS) return null;

    return new ExactDecimal(new Decimal(text), scale);
  }

  static isValid(input: unknown): boolean {
    return ExactDecimal.tryParse(input) !== null;
  }

  toDecimal(): Decimal {
    return this.value;
  }

  isPositive(): boolean {
    return this.value.greaterThan(0);
  }

  lte(other: ExactDecimal | number): boolean {
    return this.value.lessThanOrEqualTo(other instanceof ExactDecimal ? other.value : other);
  }

  equals(other: ExactDecimal): boolean {
    return this.value.equals(other.value) && this.toString() === other.toString();
  }

  toString(): string {
    const text = this.value.toFixed(this.scale);
    // toFixed drops the sign of negative zero
    return this.value.isZero() && this.value.isNegative() && !text.startsWith('-') ? `-${text}` : text;
  }

  toJSON(): string {
    return this.toString();
  }
}
