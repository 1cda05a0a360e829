/**
 * RadicalInteger: exact elements of Z[√n₁, …, √n_k].
 *
 * An element is a basis of square-free generators plus a coefficient tensor
 * with one size-2 axis per generator, stored flat and indexed by bitmask.
 * The coefficient at mask m multiplies √(radicand of m), see basisProducts().
 *
 * Every public constructor returns the reduced form, whose basis is the
 * canonical basis of the radicands with non-zero coefficients. Structural
 * comparison of two reduced elements is therefore exact equality.
 */

import {
  BasisMismatchError,
  InvalidArgumentError,
  NotRationalError,
} from "../errors";
import {
  abs,
  basisProducts,
  compareBigInt,
  gcd,
  isSquareFree,
  spanningGenerators,
  squareFreeDecompose,
  squareFreeProduct,
} from "./radicals";

export type IntegerLike = RadicalInteger | bigint | number;

export function toBigInt(value: bigint | number): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isSafeInteger(value)) {
    throw new InvalidArgumentError(`Expected a safe integer, got ${value}`);
  }
  return BigInt(value);
}

export class RadicalInteger {
  static readonly ZERO = new RadicalInteger([], [0n]);
  static readonly ONE = new RadicalInteger([], [1n]);

  private productsCache: bigint[] | null = null;

  private constructor(
    readonly generators: readonly bigint[],
    readonly coefficients: readonly bigint[]
  ) {
    if (coefficients.length !== 2 ** generators.length) {
      throw new BasisMismatchError(
        `A basis of ${generators.length} generators needs ${2 ** generators.length} coefficients, got ${coefficients.length}`
      );
    }
  }

  static fromInteger(value: bigint | number): RadicalInteger {
    return new RadicalInteger([], [toBigInt(value)]);
  }

  static from(value: IntegerLike): RadicalInteger {
    return value instanceof RadicalInteger ? value : RadicalInteger.fromInteger(value);
  }

  /** k·√r for n = k²·r with r square-free; a plain integer when r = 1. */
  static sqrt(n: bigint | number): RadicalInteger {
    const { square, radicand } = squareFreeDecompose(toBigInt(n));
    if (radicand === 1n) return RadicalInteger.fromInteger(square);
    return new RadicalInteger([radicand], [0n, square]);
  }

  /** Σ coefficient·√radicand over (radicand, coefficient) pairs. */
  static fromTerms(terms: Iterable<readonly [bigint, bigint]>): RadicalInteger {
    let result = RadicalInteger.ZERO;
    for (const [radicand, coefficient] of terms) {
      if (!isSquareFree(radicand)) {
        throw new InvalidArgumentError(`Radicand ${radicand} is not a positive square-free integer`);
      }
      result = result.add(RadicalInteger.sqrt(radicand).scale(coefficient));
    }
    return result;
  }

  /** Radicand of every coefficient slot, indexed by mask. */
  get products(): readonly bigint[] {
    if (this.productsCache === null) {
      this.productsCache = basisProducts(this.generators);
    }
    return this.productsCache;
  }

  /** Radicands carrying a non-zero coefficient, ascending. */
  radicands(): bigint[] {
    return this.terms().map(([radicand]) => radicand);
  }

  /** Non-zero (radicand, coefficient) pairs, ascending by radicand. */
  terms(): Array<[bigint, bigint]> {
    const products = this.products;
    const terms: Array<[bigint, bigint]> = [];
    this.coefficients.forEach((coefficient, mask) => {
      if (coefficient !== 0n) terms.push([products[mask], coefficient]);
    });
    return terms.sort((a, b) => compareBigInt(a[0], b[0]));
  }

  /**
   * Re-express this element in the canonical basis spanning
   * `targetRadicands` together with its own radicands.
   */
  rebase(targetRadicands: Iterable<bigint>): RadicalInteger {
    const generators = spanningGenerators([...targetRadicands, ...this.radicands()]);
    const products = basisProducts(generators);
    const slotOf = new Map<bigint, number>();
    products.forEach((radicand, mask) => slotOf.set(radicand, mask));

    const coefficients: bigint[] = new Array<bigint>(products.length).fill(0n);
    for (const [radicand, coefficient] of this.terms()) {
      const slot = slotOf.get(radicand);
      if (slot === undefined) {
        throw new BasisMismatchError(`Radicand ${radicand} is missing from basis [${generators.join(", ")}]`);
      }
      coefficients[slot] += coefficient;
    }
    return new RadicalInteger(generators, coefficients);
  }

  /** Drop every generator the non-zero coefficients do not need. */
  reduce(): RadicalInteger {
    return this.rebase([]);
  }

  /** Both operands in one common basis (the union of their radicands). */
  private commonBasis(other: RadicalInteger): [RadicalInteger, RadicalInteger] {
    const union = [...this.radicands(), ...other.radicands()];
    return [this.rebase(union), other.rebase(union)];
  }

  add(other: IntegerLike): RadicalInteger {
    const [a, b] = this.commonBasis(RadicalInteger.from(other));
    const coefficients = a.coefficients.map((c, mask) => c + b.coefficients[mask]);
    return new RadicalInteger(a.generators, coefficients).reduce();
  }

  sub(other: IntegerLike): RadicalInteger {
    return this.add(RadicalInteger.from(other).neg());
  }

  neg(): RadicalInteger {
    return new RadicalInteger(this.generators, this.coefficients.map((c) => -c));
  }

  scale(factor: bigint | number): RadicalInteger {
    const k = toBigInt(factor);
    if (k === 0n) return RadicalInteger.ZERO;
    return new RadicalInteger(this.generators, this.coefficients.map((c) => c * k));
  }

  mul(other: IntegerLike): RadicalInteger {
    const [a, b] = this.commonBasis(RadicalInteger.from(other));
    const products = a.products;
    const slotOf = new Map<bigint, number>();
    products.forEach((radicand, mask) => slotOf.set(radicand, mask));

    const coefficients: bigint[] = new Array<bigint>(products.length).fill(0n);
    a.coefficients.forEach((ca, i) => {
      if (ca === 0n) return;
      b.coefficients.forEach((cb, j) => {
        if (cb === 0n) return;
        const { factor, radicand } = squareFreeProduct(products[i], products[j]);
        const slot = slotOf.get(radicand);
        if (slot === undefined) {
          throw new BasisMismatchError(`Product radicand ${radicand} escapes basis [${a.generators.join(", ")}]`);
        }
        coefficients[slot] += ca * cb * factor;
      });
    });
    return new RadicalInteger(a.generators, coefficients).reduce();
  }

  pow(exponent: number): RadicalInteger {
    if (!Number.isSafeInteger(exponent) || exponent < 0) {
      throw new InvalidArgumentError(`Exponent must be a non-negative integer, got ${exponent}`);
    }
    let result = RadicalInteger.ONE;
    let base: RadicalInteger = this;
    let e = exponent;
    while (e > 0) {
      if (e % 2 === 1) result = result.mul(base);
      base = base.mul(base);
      e = Math.floor(e / 2);
    }
    return result;
  }

  /** Negate the coefficients whose mask contains `axis`. */
  conjugate(axis: number): RadicalInteger {
    if (!Number.isInteger(axis) || axis < 0 || axis >= this.generators.length) {
      throw new BasisMismatchError(`Axis ${axis} is outside a basis of ${this.generators.length} generators`);
    }
    const bit = 1 << axis;
    return new RadicalInteger(
      this.generators,
      this.coefficients.map((c, mask) => (mask & bit ? -c : c))
    );
  }

  isZero(): boolean {
    return this.coefficients.every((c) => c === 0n);
  }

  isInteger(): boolean {
    return this.generators.length === 0;
  }

  asInteger(): bigint {
    if (!this.isInteger()) {
      throw new NotRationalError(`${this.toString()} is not an integer`);
    }
    return this.coefficients[0];
  }

  /** gcd of the coefficient magnitudes (0 for the zero element). */
  contentGcd(): bigint {
    return this.coefficients.reduce((acc, c) => gcd(acc, c), 0n);
  }

  divideExact(divisor: bigint): RadicalInteger {
    if (divisor === 0n) {
      throw new InvalidArgumentError("Cannot divide coefficients by zero");
    }
    return new RadicalInteger(
      this.generators,
      this.coefficients.map((c) => {
        if (c % divisor !== 0n) {
          throw new InvalidArgumentError(`${divisor} does not divide coefficient ${c}`);
        }
        return c / divisor;
      })
    );
  }

  equals(other: IntegerLike): boolean {
    const a = this.reduce();
    const b = RadicalInteger.from(other).reduce();
    if (a.generators.length !== b.generators.length) return false;
    if (a.generators.some((g, i) => g !== b.generators[i])) return false;
    return a.coefficients.every((c, mask) => c === b.coefficients[mask]);
  }

  /** Canonical string, usable as a hash key. */
  key(): string {
    return this.terms()
      .map(([radicand, coefficient]) => `${coefficient}r${radicand}`)
      .join(",");
  }

  /** Floating approximation, for rendering and diagnostics only. */
  approximateValue(): number {
    return this.terms().reduce(
      (sum, [radicand, coefficient]) => sum + Number(coefficient) * Math.sqrt(Number(radicand)),
      0
    );
  }

  toString(): string {
    const terms = this.terms();
    if (terms.length === 0) return "0";

    return terms
      .map(([radicand, coefficient], index) => {
        const magnitude = abs(coefficient);
        let body: string;
        if (radicand === 1n) body = `${magnitude}`;
        else if (magnitude === 1n) body = `sqrt(${radicand})`;
        else body = `${magnitude} * sqrt(${radicand})`;

        if (index === 0) return coefficient < 0n ? `-${body}` : body;
        return coefficient < 0n ? ` - ${body}` : ` + ${body}`;
      })
      .join("");
  }
}

export const sqrt = RadicalInteger.sqrt;
