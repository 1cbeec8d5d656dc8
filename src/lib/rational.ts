import { EvaluationError, ValidationError } from './errors.js';

export type RationalLike = Rational | bigint | number | string;

const FRACTION_PATTERN = /^([+-]?\d+)\s*\/\s*([+-]?\d+)$/;
const DECIMAL_PATTERN = /^([+-])?(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;

function gcd(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    const t = x % y;
    x = y;
    y = t;
  }
  return x;
}

/**
 * Exact rational number with a bigint numerator and a positive bigint
 * denominator, always stored in lowest terms. Every timing bound and numeric
 * fluent in the engine is a Rational; floating point never enters a comparison.
 */
export class Rational {
  static readonly ZERO = new Rational(0n, 1n);
  static readonly ONE = new Rational(1n, 1n);

  readonly num: bigint;
  readonly den: bigint;

  private constructor(num: bigint, den: bigint) {
    this.num = num;
    this.den = den;
  }

  static of(num: bigint | number, den: bigint | number = 1n): Rational {
    const n = typeof num === 'number' ? BigInt(num) : num;
    const d = typeof den === 'number' ? BigInt(den) : den;
    if (d === 0n) {
      throw new EvaluationError('Rational with a zero denominator');
    }
    const sign = d < 0n ? -1n : 1n;
    const g = gcd(n, d);
    return new Rational((sign * n) / (g === 0n ? 1n : g), (sign * d) / (g === 0n ? 1n : g));
  }

  static from(value: RationalLike): Rational {
    if (value instanceof Rational) return value;
    if (typeof value === 'bigint') return new Rational(value, 1n);
    if (typeof value === 'number') {
      if (!Number.isFinite(value)) {
        throw new ValidationError(`Cannot represent ${value} as a rational`);
      }
      if (Number.isInteger(value)) return new Rational(BigInt(value), 1n);
      return Rational.parse(String(value));
    }
    return Rational.parse(value);
  }

  /**
   * Parses "3", "-1/1000", "0.25" or "1e-3".
   */
  static parse(text: string): Rational {
    const trimmed = text.trim();
    const fraction = FRACTION_PATTERN.exec(trimmed);
    if (fraction) {
      return Rational.of(BigInt(fraction[1]), BigInt(fraction[2]));
    }
    const decimal = DECIMAL_PATTERN.exec(trimmed);
    if (!decimal || (decimal[2] === '' && (decimal[3] ?? '') === '')) {
      throw new ValidationError(`Invalid rational literal: '${text}'`);
    }
    const sign = decimal[1] === '-' ? -1n : 1n;
    const whole = decimal[2] === '' ? '0' : decimal[2];
    const frac = decimal[3] ?? '';
    const exponent = decimal[4] === undefined ? 0 : Number(decimal[4]);
    let num = BigInt(whole + frac) * sign;
    let den = 10n ** BigInt(frac.length);
    if (exponent > 0) num *= 10n ** BigInt(exponent);
    if (exponent < 0) den *= 10n ** BigInt(-exponent);
    return Rational.of(num, den);
  }

  add(other: RationalLike): Rational {
    const o = Rational.from(other);
    return Rational.of(this.num * o.den + o.num * this.den, this.den * o.den);
  }

  sub(other: RationalLike): Rational {
    const o = Rational.from(other);
    return Rational.of(this.num * o.den - o.num * this.den, this.den * o.den);
  }

  mul(other: RationalLike): Rational {
    const o = Rational.from(other);
    return Rational.of(this.num * o.num, this.den * o.den);
  }

  div(other: RationalLike): Rational {
    const o = Rational.from(other);
    if (o.num === 0n) {
      throw new EvaluationError(`Division by zero: ${this.toString()} / 0`);
    }
    return Rational.of(this.num * o.den, this.den * o.num);
  }

  neg(): Rational {
    return new Rational(-this.num, this.den);
  }

  compare(other: RationalLike): -1 | 0 | 1 {
    const o = Rational.from(other);
    const lhs = this.num * o.den;
    const rhs = o.num * this.den;
    if (lhs < rhs) return -1;
    if (lhs > rhs) return 1;
    return 0;
  }

  equals(other: RationalLike): boolean {
    return this.compare(other) === 0;
  }

  lt(other: RationalLike): boolean {
    return this.compare(other) < 0;
  }

  le(other: RationalLike): boolean {
    return this.compare(other) <= 0;
  }

  gt(other: RationalLike): boolean {
    return this.compare(other) > 0;
  }

  ge(other: RationalLike): boolean {
    return this.compare(other) >= 0;
  }

  sign(): -1 | 0 | 1 {
    return this.num < 0n ? -1 : this.num > 0n ? 1 : 0;
  }

  isZero(): boolean {
    return this.num === 0n;
  }

  isInteger(): boolean {
    return this.den === 1n;
  }

  static min(a: Rational, b: Rational): Rational {
    return a.le(b) ? a : b;
  }

  static max(a: Rational, b: Rational): Rational {
    return a.ge(b) ? a : b;
  }

  /** Lossy; for display and logging only. */
  toNumber(): number {
    return Number(this.num) / Number(this.den);
  }

  toString(): string {
    return this.den === 1n ? this.num.toString() : `${this.num}/${this.den}`;
  }

  toJSON(): string {
    return this.toString();
  }
}

export function rational(value: RationalLike): Rational {
  return Rational.from(value);
}
