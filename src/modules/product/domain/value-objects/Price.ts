import { ValidationError } from '../../../../domain/errors/ValidationError';

const DECIMAL_PATTERN = /^(\d+)(?:\.(\d{1,2}))?$/;

/** DECIMAL(10,2): eight integer digits, two fractional */
const MAX_INTEGER_DIGITS = 8;

/**
 * Price value object
 *
 * Exact fixed-point money amount held as an integer number of cents, so that
 * comparisons and arithmetic never go through binary floating point. Prices enter
 * as decimal strings (PostgreSQL NUMERIC, JSON strings) or JSON numbers, and leave
 * as fixed 2-digit decimal strings.
 *
 * @example
 * ```typescript
 * Price.parse('19.9').toString(); // '19.90'
 * Price.parse(0.1).toCents() + Price.parse(0.2).toCents(); // 30
 * ```
 */
export class Price {
  private readonly cents: number;

  private constructor(cents: number) {
    this.cents = cents;
  }

  /**
   * Parses a decimal string or number with at most two fractional digits.
   * Numbers are read through their shortest round-trip representation, so
   * `19.99` is exact while `1.005` is rejected rather than rounded.
   */
  public static parse(value: string | number): Price {
    const text = typeof value === 'number' ? String(value) : value.trim();

    if (text.startsWith('-')) {
      throw ValidationError.forField('price', 'Price cannot be negative');
    }

    const match = DECIMAL_PATTERN.exec(text);
    if (!match) {
      throw ValidationError.forField(
        'price',
        `Price must be a decimal number with at most 2 fractional digits, got "${text}"`
      );
    }

    const integerDigits = match[1].replace(/^0+(?=\d)/, '');
    if (integerDigits.length > MAX_INTEGER_DIGITS) {
      throw ValidationError.forField('price', `Price cannot exceed ${Price.max().toString()}`);
    }

    const fractionDigits = (match[2] ?? '').padEnd(2, '0');
    return new Price(Number(integerDigits) * 100 + Number(fractionDigits));
  }

  public static fromCents(cents: number): Price {
    if (!Number.isSafeInteger(cents) || cents < 0) {
      throw ValidationError.forField('price', `Price in cents must be a non-negative integer, got ${cents}`);
    }
    if (cents > Price.max().cents) {
      throw ValidationError.forField('price', `Price cannot exceed ${Price.max().toString()}`);
    }
    return new Price(cents);
  }

  public static zero(): Price {
    return new Price(0);
  }

  public static max(): Price {
    return new Price(10 ** (MAX_INTEGER_DIGITS + 2) - 1);
  }

  public toCents(): number {
    return this.cents;
  }

  public compareTo(other: Price): number {
    return Math.sign(this.cents - other.cents);
  }

  public equals(other: Price): boolean {
    return this.cents === other.cents;
  }

  /**
   * Fixed 2-digit decimal string, e.g. "1299.99" or "5.00"
   */
  public toString(): string {
    const whole = Math.trunc(this.cents / 100);
    const fraction = String(this.cents % 100).padStart(2, '0');
    return `${whole}.${fraction}`;
  }

  public toJSON(): string {
    return this.toString();
  }
}
