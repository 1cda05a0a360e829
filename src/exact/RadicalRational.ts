/**
 * RadicalRational: the field of fractions over RadicalInteger.
 *
 * The denominator is always a positive plain integer. Construction
 * rationalizes a radical denominator by multiplying through by conjugates
 * until its basis is empty, then normalizes the sign and divides out the
 * integer gcd, so equal values are structurally equal.
 */

import { DivisionByZeroError, InvalidArgumentError } from "../errors";
import { RadicalInteger, type IntegerLike } from "./RadicalInteger";
import { abs, gcd } from "./radicals";

export type RationalLike = RadicalRational | IntegerLike;

/** Bits kept when scaling huge values down for approximateValue(). */
const APPROXIMATION_BITS = 960n;

function bitLength(n: bigint): bigint {
  return BigInt(abs(n).toString(2).length);
}

export class RadicalRational {
  static readonly ZERO = new RadicalRational(RadicalInteger.ZERO, 1n);
  static readonly ONE = new RadicalRational(RadicalInteger.ONE, 1n);

  private constructor(
    readonly numerator: RadicalInteger,
    readonly denominator: bigint
  ) {}

  static of(numerator: IntegerLike, denominator: IntegerLike = 1n): RadicalRational {
    let num = RadicalInteger.from(numerator);
    let den = RadicalInteger.from(denominator);
    if (den.isZero()) {
      throw new DivisionByZeroError(`Denominator of ${num.toString()} is zero`);
    }

    // Each pass removes one generator from the denominator's basis.
    while (!den.isInteger()) {
      const conjugate = den.conjugate(0);
      num = num.mul(conjugate);
      den = den.mul(conjugate);
    }

    let d = den.asInteger();
    if (d < 0n) {
      num = num.neg();
      d = -d;
    }

    const common = gcd(num.contentGcd(), d);
    return new RadicalRational(num.divideExact(common), d / common);
  }

  static from(value: RationalLike): RadicalRational {
    return value instanceof RadicalRational ? value : RadicalRational.of(value);
  }

  add(other: RationalLike): RadicalRational {
    const b = RadicalRational.from(other);
    return RadicalRational.of(
      this.numerator.scale(b.denominator).add(b.numerator.scale(this.denominator)),
      this.denominator * b.denominator
    );
  }

  sub(other: RationalLike): RadicalRational {
    return this.add(RadicalRational.from(other).neg());
  }

  neg(): RadicalRational {
    return new RadicalRational(this.numerator.neg(), this.denominator);
  }

  mul(other: RationalLike): RadicalRational {
    const b = RadicalRational.from(other);
    return RadicalRational.of(this.numerator.mul(b.numerator), this.denominator * b.denominator);
  }

  div(other: RationalLike): RadicalRational {
    const b = RadicalRational.from(other);
    if (b.isZero()) {
      throw new DivisionByZeroError(`Cannot divide ${this.toString()} by zero`);
    }
    return RadicalRational.of(this.numerator.scale(b.denominator), b.numerator.scale(this.denominator));
  }

  /** Binary exponentiation; negative exponents invert first, 0^0 = 1. */
  pow(exponent: number): RadicalRational {
    if (!Number.isSafeInteger(exponent)) {
      throw new InvalidArgumentError(`Exponent must be an integer, got ${exponent}`);
    }
    if (exponent === 0) return RadicalRational.ONE;

    let base: RadicalRational = exponent < 0 ? RadicalRational.ONE.div(this) : this;
    let e = Math.abs(exponent);
    let result = RadicalRational.ONE;
    while (e > 0) {
      if (e % 2 === 1) result = result.mul(base);
      base = base.mul(base);
      e = Math.floor(e / 2);
    }
    return result;
  }

  isZero(): boolean {
    return this.numerator.isZero();
  }

  equals(other: RationalLike): boolean {
    const b = RadicalRational.from(other);
    return this.denominator === b.denominator && this.numerator.equals(b.numerator);
  }

  key(): string {
    return `${this.numerator.key()}/${this.denominator}`;
  }

  /** Floating approximation, for rendering and diagnostics only. */
  approximateValue(): number {
    const terms = this.numerator.terms();
    const widest = terms.reduce(
      (max, [, coefficient]) => (bitLength(coefficient) > max ? bitLength(coefficient) : max),
      bitLength(this.denominator)
    );
    const shift = widest > APPROXIMATION_BITS ? widest - APPROXIMATION_BITS : 0n;

    const numerator = terms.reduce(
      (sum, [radicand, coefficient]) => sum + Number(coefficient >> shift) * Math.sqrt(Number(radicand)),
      0
    );
    return numerator / Number(this.denominator >> shift);
  }

  toString(): string {
    if (this.denominator === 1n) return this.numerator.toString();
    const numerator = this.numerator.terms().length > 1
      ? `(${this.numerator.toString()})`
      : this.numerator.toString();
    return `${numerator} / ${this.denominator}`;
  }
}
