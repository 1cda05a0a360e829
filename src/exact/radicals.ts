/**
 * Number theory on square-free radicands.
 *
 * Notes:
 * - Every radicand handled here is a positive square-free bigint; 1 stands
 *   for the rational part.
 * - Square-free radicands form a group under "multiply, then drop squares"
 *   (√a·√b = gcd(a,b)·√(ab/gcd²)). A basis is a set of generators of a
 *   finite subgroup; the radicand of a basis mask is the square-free product
 *   of the generators whose bits are set.
 */

import { InvalidArgumentError } from "../errors";

export function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

/** Non-negative gcd; gcd(0, 0) = 0. */
export function gcd(a: bigint, b: bigint): bigint {
  let x = abs(a);
  let y = abs(b);
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

export function compareBigInt(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export interface SquareFreeDecomposition {
  /** k in n = k²·r */
  square: bigint;
  /** square-free r in n = k²·r */
  radicand: bigint;
}

/**
 * Split n into k²·r with r square-free, by trial division.
 * 0 decomposes as 0²·1.
 */
export function squareFreeDecompose(n: bigint): SquareFreeDecomposition {
  if (n < 0n) {
    throw new InvalidArgumentError(`Cannot take the square root of negative number ${n}`);
  }
  if (n === 0n) return { square: 0n, radicand: 1n };

  let square = 1n;
  let radicand = n;
  for (let p = 2n; p * p <= radicand; p++) {
    while (radicand % (p * p) === 0n) {
      square *= p;
      radicand /= p * p;
    }
  }
  return { square, radicand };
}

export function isSquareFree(n: bigint): boolean {
  return n > 0n && squareFreeDecompose(n).radicand === n;
}

export interface SquareFreeProduct {
  /** Integer factor pulled out of the root: gcd(a, b). */
  factor: bigint;
  radicand: bigint;
}

/** √a·√b for square-free a and b. */
export function squareFreeProduct(a: bigint, b: bigint): SquareFreeProduct {
  const g = gcd(a, b);
  return { factor: g, radicand: (a * b) / (g * g) };
}

/**
 * Radicand of every mask of a basis, indexed by mask.
 * Bit i of the mask selects generators[i].
 */
export function basisProducts(generators: readonly bigint[]): bigint[] {
  const products: bigint[] = [1n];
  for (const generator of generators) {
    const count = products.length;
    for (let mask = 0; mask < count; mask++) {
      products.push(squareFreeProduct(products[mask], generator).radicand);
    }
  }
  return products;
}

/** Every radicand reachable from `radicands` by square-free products. */
export function radicandClosure(radicands: Iterable<bigint>): bigint[] {
  let span: bigint[] = [1n];
  for (const radicand of radicands) {
    if (span.includes(radicand)) continue;
    span = span.concat(span.map((p) => squareFreeProduct(p, radicand).radicand));
  }
  return span;
}

/**
 * The canonical minimal basis spanning `radicands`.
 *
 * Walks the closure in ascending order and introduces a value as a generator
 * whenever it is not yet representable by the generators already chosen.
 * The result depends only on the span, so two elements rebased onto the same
 * set of radicands always share a basis.
 */
export function spanningGenerators(radicands: Iterable<bigint>): bigint[] {
  const closure = radicandClosure(radicands).sort(compareBigInt);

  const generators: bigint[] = [];
  let reached: bigint[] = [1n];
  for (const value of closure) {
    if (reached.includes(value)) continue;
    generators.push(value);
    reached = reached.concat(reached.map((p) => squareFreeProduct(p, value).radicand));
  }
  return generators;
}
